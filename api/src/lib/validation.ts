import { z } from "zod";
import { DEFAULT_MODEL, DEFAULT_OLLAMA_URL } from "../config.js";
import { POSITIONS } from "../../../shared/types.js";

const position = z.enum(POSITIONS);

const nonNegativeInt = z.number().int().min(0);

const trimmedName = (min: number, max: number, label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} cannot be empty or just whitespace`)
    .min(min, `${label} must be at least ${min} characters`)
    .max(max, `${label} must be at most ${max} characters`);

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "date must be an ISO calendar date (YYYY-MM-DD)")
  .refine((val) => !Number.isNaN(Date.parse(val)), "date must be a valid calendar date");

// ============================================================================
// Players
// ============================================================================

export const playerCreateSchema = z.object({
  name: trimmedName(2, 50, "Name"),
  number: z.number().int().min(1).max(99).nullish(),
  primary_position: position,
  secondary_positions: z.array(position).optional().default([]),
  bats: z.enum(["L", "R", "S"]),
  throws: z.enum(["L", "R"]),
  status: z.enum(["active", "inactive", "archived"]).optional().default("active"),
  notes: z.string().optional().default(""),
});

export const playerUpdateSchema = z.object({
  name: trimmedName(2, 50, "Name").optional(),
  number: z.number().int().min(1).max(99).nullish(),
  primary_position: position.optional(),
  secondary_positions: z.array(position).optional(),
  bats: z.enum(["L", "R", "S"]).optional(),
  throws: z.enum(["L", "R"]).optional(),
  status: z.enum(["active", "inactive", "archived"]).optional(),
  notes: z.string().optional(),
});

export type PlayerCreateInput = z.infer<typeof playerCreateSchema>;
export type PlayerUpdateInput = z.infer<typeof playerUpdateSchema>;

// ============================================================================
// Lineup / field / configurations
// ============================================================================

export const lineupSlotSchema = z.object({
  slot_number: z.number().int().min(1).max(9),
  player_id: z.string().nullish().transform((v) => v ?? null),
});

export const fieldPositionSchema = z.object({
  position,
  player_id: z.string().nullish().transform((v) => v ?? null),
});

export const lineupUpdateSchema = z.object({
  lineup: z.array(lineupSlotSchema),
});

export const fieldUpdateSchema = z.object({
  field_positions: z.array(fieldPositionSchema),
});

export const configurationCreateSchema = z.object({
  name: trimmedName(1, 100, "Configuration name"),
  lineup: z.array(lineupSlotSchema),
  field_positions: z.array(fieldPositionSchema),
  use_dh: z.boolean().optional().default(false),
  notes: z.string().optional().default(""),
});

export type ConfigurationCreateInput = z.infer<typeof configurationCreateSchema>;

// ============================================================================
// Games & stats
// ============================================================================

const homeAway = z.enum(["home", "away"]);
const result = z.enum(["W", "L", "T"]);
const source = z.enum(["schedule", "manual"]);
const status = z.enum(["scheduled", "completed"]);

export const gameCreateSchema = z.object({
  date: isoDate,
  opponent: trimmedName(1, 100, "Opponent name"),
  home_away: homeAway.optional().default("home"),
  result: result.nullish(),
  score_us: nonNegativeInt.nullish(),
  score_them: nonNegativeInt.nullish(),
  notes: z.string().optional().default(""),
  source: source.optional().default("manual"),
  status: status.optional(),
});

export const gameUpdateSchema = z.object({
  date: isoDate.optional(),
  opponent: trimmedName(1, 100, "Opponent name").optional(),
  home_away: homeAway.optional(),
  result: result.optional(),
  score_us: nonNegativeInt.optional(),
  score_them: nonNegativeInt.optional(),
  notes: z.string().optional(),
  source: source.optional(),
  status: status.optional(),
});

export type GameCreateInput = z.infer<typeof gameCreateSchema>;
export type GameUpdateInput = z.infer<typeof gameUpdateSchema>;

const counter = nonNegativeInt.optional().default(0);

export const gameStatsEntrySchema = z.object({
  player_id: z.string().min(1),
  ab: counter,
  r: counter,
  h: counter,
  doubles: counter,
  triples: counter,
  hr: counter,
  rbi: counter,
  bb: counter,
  so: counter,
  sb: counter,
  cs: counter,
  ip: z.number().min(0).optional().default(0),
  h_allowed: counter,
  r_allowed: counter,
  er: counter,
  bb_allowed: counter,
  k: counter,
  pitches: counter,
  po: counter,
  a: counter,
  e: counter,
  position_played: z.array(position).optional().default([]),
  innings_played: z.number().min(0).optional().default(0),
});

export const bulkGameStatsSchema = z.object({
  game_id: z.string().optional(),
  stats: z.array(gameStatsEntrySchema),
});

export type GameStatsEntryInput = z.infer<typeof gameStatsEntrySchema>;

// ============================================================================
// AI
// ============================================================================

export const chatRequestSchema = z.object({
  messages: z
    .array(
      z.object({
        role: z.enum(["user", "assistant", "system"]),
        content: z.string(),
      })
    )
    .min(1, "messages must contain at least one message"),
  model: z.string().trim().min(1).nullish(),
});

const apiKey = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v === undefined ? undefined : v || null));

export const aiConfigSchema = z.object({
  provider: z.enum(["ollama", "openai", "anthropic"]).optional().default("ollama"),
  ollama_url: z
    .string()
    .trim()
    .url("ollama_url must be a valid URL")
    .optional()
    .default(DEFAULT_OLLAMA_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  preferred_model: z.string().trim().min(1).optional().default(DEFAULT_MODEL),
  // undefined keeps the stored key; null or "" clears it
  openai_key: apiKey,
  anthropic_key: apiKey,
});

export type AIConfigInput = z.infer<typeof aiConfigSchema>;

// lineup/field default to the saved state when omitted
export const assistantAnalyzeSchema = z.object({
  lineup: z.array(lineupSlotSchema).optional(),
  field_positions: z.array(fieldPositionSchema).optional(),
  question: z.string().nullish(),
});
