import type {
  GameStats,
  SeasonFielding,
  SeasonHitting,
  SeasonPitching,
  SeasonSummary,
} from "../../../shared/types.js";

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function sum(records: GameStats[], pick: (gs: GameStats) => number | undefined): number {
  return records.reduce((total, gs) => total + (pick(gs) ?? 0), 0);
}

/**
 * Convert baseball innings-pitched notation to true fractional innings.
 *
 * The digit after the point counts outs, not tenths:
 *   1.0 -> 1 inning, 1.1 -> 1⅓ (1.333), 1.2 -> 1⅔ (1.667)
 */
export function convertBaseballIp(ip: number): number {
  const fullInnings = Math.trunc(ip);
  const outs = Math.round((ip - fullInnings) * 10);
  return fullInnings + outs / 3;
}

export function aggregateHitting(records: GameStats[]): SeasonHitting {
  const hitting: SeasonHitting = {
    ab: sum(records, (gs) => gs.ab),
    r: sum(records, (gs) => gs.r),
    h: sum(records, (gs) => gs.h),
    doubles: sum(records, (gs) => gs.doubles),
    triples: sum(records, (gs) => gs.triples),
    hr: sum(records, (gs) => gs.hr),
    rbi: sum(records, (gs) => gs.rbi),
    bb: sum(records, (gs) => gs.bb),
    so: sum(records, (gs) => gs.so),
    sb: sum(records, (gs) => gs.sb),
    cs: sum(records, (gs) => gs.cs),
  };

  if (hitting.ab > 0) {
    hitting.avg = round(hitting.h / hitting.ab, 3);

    const singles = hitting.h - hitting.doubles - hitting.triples - hitting.hr;
    const totalBases = singles + hitting.doubles * 2 + hitting.triples * 3 + hitting.hr * 4;
    hitting.slg = round(totalBases / hitting.ab, 3);

    const plateAppearances = hitting.ab + hitting.bb;
    if (plateAppearances > 0) {
      hitting.obp = round((hitting.h + hitting.bb) / plateAppearances, 3);
    }

    hitting.ops = round((hitting.obp ?? 0) + hitting.slg, 3);
  }

  return hitting;
}

export function aggregatePitching(records: GameStats[]): SeasonPitching {
  const pitching: SeasonPitching = {
    // Raw notation is summed first; outs carry correctly until the single conversion below.
    ip: sum(records, (gs) => gs.ip),
    h: sum(records, (gs) => gs.h_allowed),
    r: sum(records, (gs) => gs.r_allowed),
    er: sum(records, (gs) => gs.er),
    bb: sum(records, (gs) => gs.bb_allowed),
    k: sum(records, (gs) => gs.k),
    pitches: sum(records, (gs) => gs.pitches),
  };

  if (pitching.ip > 0) {
    const actualIp = convertBaseballIp(pitching.ip);
    pitching.era = round((pitching.er * 9) / actualIp, 2);
    pitching.whip = round((pitching.h + pitching.bb) / actualIp, 2);
  }

  return pitching;
}

export function aggregateFielding(records: GameStats[]): SeasonFielding {
  const fielding: SeasonFielding = {
    po: sum(records, (gs) => gs.po),
    a: sum(records, (gs) => gs.a),
    e: sum(records, (gs) => gs.e),
  };

  const chances = fielding.po + fielding.a + fielding.e;
  if (chances > 0) {
    fielding.fpct = round((fielding.po + fielding.a) / chances, 3);
  }

  return fielding;
}

/**
 * Roll a player's per-game stat lines up into season totals and rates.
 * The caller is responsible for checking that the player exists.
 */
export function aggregateSeasonStats(records: GameStats[]): SeasonSummary {
  if (records.length === 0) {
    return { games_played: 0, hitting: {}, pitching: {}, fielding: {} };
  }

  return {
    games_played: records.length,
    hitting: aggregateHitting(records),
    pitching: aggregatePitching(records),
    fielding: aggregateFielding(records),
  };
}
