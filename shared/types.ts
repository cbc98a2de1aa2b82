// Shared types for the dugout API

export const POSITIONS = ["P", "C", "1B", "2B", "3B", "SS", "LF", "CF", "RF", "DH"] as const;
export const BASE_POSITIONS = ["P", "C", "1B", "2B", "3B", "SS", "LF", "CF", "RF"] as const;

export type Position = (typeof POSITIONS)[number];
export type Bats = "L" | "R" | "S";
export type Throws = "L" | "R";
export type PlayerStatus = "active" | "inactive" | "archived";

export interface Player {
  id: string;
  name: string;
  number: number | null;
  primary_position: Position;
  secondary_positions: Position[];
  bats: Bats;
  throws: Throws;
  status: PlayerStatus;
  notes: string;
}

export interface LineupSlot {
  slot_number: number; // 1-9
  player_id: string | null;
}

export interface FieldPosition {
  position: Position;
  player_id: string | null;
}

export interface Configuration {
  id: string;
  name: string;
  lineup: LineupSlot[];
  field_positions: FieldPosition[];
  use_dh: boolean;
  notes: string;
  last_used_timestamp: string | null;
}

export type HomeAway = "home" | "away";
export type GameResult = "W" | "L" | "T";
export type GameSource = "schedule" | "manual";
export type GameStatus = "scheduled" | "completed";

export interface Game {
  id: string;
  date: string; // YYYY-MM-DD
  opponent: string;
  home_away: HomeAway;
  result: GameResult | null;
  score_us: number | null;
  score_them: number | null;
  notes: string;
  source: GameSource;
  status: GameStatus;
  created_at: string | null;
}

export interface HittingLine {
  ab: number;
  r: number;
  h: number;
  doubles: number;
  triples: number;
  hr: number;
  rbi: number;
  bb: number;
  so: number;
  sb: number;
  cs: number;
}

export interface PitchingLine {
  ip: number; // baseball notation: .1 = one out, .2 = two outs
  h_allowed: number;
  r_allowed: number;
  er: number;
  bb_allowed: number;
  k: number;
  pitches: number;
}

export interface FieldingLine {
  po: number;
  a: number;
  e: number;
}

export interface GameStats extends HittingLine, PitchingLine, FieldingLine {
  game_id: string;
  player_id: string;
  position_played: Position[];
  innings_played: number;
}

// Season summary. Derived rates are only present when their denominators are non-zero;
// an empty object means the player has no recorded games.
export interface SeasonHitting extends HittingLine {
  avg?: number;
  obp?: number;
  slg?: number;
  ops?: number;
}

export interface SeasonPitching {
  ip: number;
  h: number;
  r: number;
  er: number;
  bb: number;
  k: number;
  pitches: number;
  era?: number;
  whip?: number;
}

export interface SeasonFielding extends FieldingLine {
  fpct?: number;
}

export interface SeasonSummary {
  games_played: number;
  hitting: SeasonHitting | Record<string, never>;
  pitching: SeasonPitching | Record<string, never>;
  fielding: SeasonFielding | Record<string, never>;
}

export interface PlayerSeasonStats extends SeasonSummary {
  player_id: string;
}

// AI

export type AIProviderName = "ollama" | "openai" | "anthropic";

export interface AIConfig {
  provider: AIProviderName;
  ollama_url: string;
  preferred_model: string;
  openai_key: string | null;
  anthropic_key: string | null;
}

// What the settings endpoint hands back: keys are never echoed.
export interface AIConfigView {
  provider: AIProviderName;
  ollama_url: string;
  preferred_model: string;
  openai_key_set: boolean;
  anthropic_key_set: boolean;
}

export type ChatRole = "user" | "assistant" | "system";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface AssistantAnalysis {
  analysis: string;
  timestamp: string;
}

export interface CascadeSummary {
  lineup_slots_cleared: number;
  field_positions_cleared: number;
  configurations_updated: number;
}
