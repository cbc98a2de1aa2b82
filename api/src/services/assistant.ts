import { DEFAULT_MODEL } from "../config.js";
import { HttpError } from "../lib/errors.js";
import { collect } from "./ai.js";
import { listPlayers } from "./players.js";
import { getField, getLineup } from "./lineup.js";
import { BASE_POSITIONS } from "../../../shared/types.js";
import type { AIGateway } from "./ai.js";
import type { AssistantAnalysis, FieldPosition, LineupSlot, Player } from "../../../shared/types.js";

const PREAMBLE = [
  "You are a coaching perspective assistant for youth baseball.",
  "You provide observations, patterns, and considerations.",
  "You do NOT make decisions, optimize lineups, or give commands.",
  "The coach is always the decision-maker.",
  "Be concise, specific, and highlight tradeoffs when relevant.",
].join("\n");

const DEFAULT_REQUEST = "Provide observations and considerations about this lineup and defensive alignment.";
const QUESTION_REQUEST = "Provide your perspective on the coach's question based on the current situation.";

function label(player: Player): string {
  return player.number === null ? player.name : `#${player.number} ${player.name}`;
}

/**
 * Render the current game state as a plain-text prompt: batting order,
 * defense, any player notes, then the coach's question or a general ask.
 */
export function buildAssistantPrompt(
  lineup: LineupSlot[],
  field: FieldPosition[],
  players: Player[],
  question?: string | null
): string {
  const byId = new Map(players.map((p) => [p.id, p]));
  const lookup = (id: string | null) => (id ? byId.get(id) : undefined);

  const battingOrder = [...lineup]
    .sort((a, b) => a.slot_number - b.slot_number)
    .map((slot) => {
      const player = lookup(slot.player_id);
      return player
        ? `${slot.slot_number}. ${label(player)} (${player.bats}/${player.throws})`
        : `${slot.slot_number}. (empty)`;
    });

  const defense = BASE_POSITIONS.map((pos) => {
    const player = lookup(field.find((fp) => fp.position === pos)?.player_id ?? null);
    return `${pos}: ${player ? label(player) : "(empty)"}`;
  });
  const dh = lookup(field.find((fp) => fp.position === "DH")?.player_id ?? null);
  if (dh) defense.push(`DH: ${label(dh)}`);

  const sections = [
    PREAMBLE,
    "CURRENT SITUATION:",
    ["BATTING ORDER:", ...battingOrder].join("\n"),
    ["DEFENSIVE POSITIONS:", ...defense].join("\n"),
  ];

  const withNotes = players.filter((p) => p.notes.trim());
  if (withNotes.length > 0) {
    sections.push(["PLAYER NOTES:", ...withNotes.map((p) => `${label(p)}: ${p.notes}`)].join("\n"));
  }

  if (question?.trim()) {
    sections.push(`COACH'S QUESTION:\n${question}`, QUESTION_REQUEST);
  } else {
    sections.push(DEFAULT_REQUEST);
  }

  return sections.join("\n\n");
}

export interface AnalyzeRequest {
  lineup?: LineupSlot[];
  field_positions?: FieldPosition[];
  question?: string | null;
}

const ERROR_FRAGMENT = /^\n\[AI Error: ([\s\S]*)\]$/;

/**
 * One-shot advisory analysis over the local model. The lineup and field
 * default to the saved state when the request leaves them out.
 */
export async function analyze(gateway: AIGateway, request: AnalyzeRequest): Promise<AssistantAnalysis> {
  const [players, lineup, field] = await Promise.all([
    listPlayers(),
    request.lineup ? Promise.resolve(request.lineup) : getLineup(),
    request.field_positions ? Promise.resolve(request.field_positions) : getField(),
  ]);

  const prompt = buildAssistantPrompt(lineup, field, players, request.question);
  const text = await collect(gateway.local().stream([{ role: "user", content: prompt }], DEFAULT_MODEL));

  const failure = ERROR_FRAGMENT.exec(text);
  if (failure) {
    throw new HttpError(500, `Error communicating with the assistant: ${failure[1]}`);
  }

  return { analysis: text, timestamp: new Date().toISOString() };
}
