import { getStore } from "./store.js";
import { ValidationError } from "../lib/errors.js";
import { BASE_POSITIONS } from "../../../shared/types.js";
import type { FieldPosition, LineupSlot, Position } from "../../../shared/types.js";

/**
 * A batting order is exactly nine slots numbered 1-9, each number once.
 * Throws a ValidationError describing the first violation.
 */
export function validateLineup(lineup: LineupSlot[]): void {
  if (lineup.length !== 9) {
    throw new ValidationError("Lineup must have exactly 9 slots");
  }

  const slotNumbers = lineup.map((s) => s.slot_number).sort((a, b) => a - b);
  if (!slotNumbers.every((n, i) => n === i + 1)) {
    throw new ValidationError("Lineup must have slots numbered 1-9 (no duplicates)");
  }
}

/**
 * A field assignment covers exactly the nine base positions, plus DH when
 * the payload includes it. Whether DH agrees with a configuration's use_dh
 * flag is up to the caller.
 */
export function validateField(fieldPositions: FieldPosition[]): void {
  const provided = fieldPositions.map((p) => p.position);
  const providedSet = new Set<Position>(provided);
  const expected = new Set<Position>(BASE_POSITIONS);
  if (providedSet.has("DH")) expected.add("DH");

  const matches =
    provided.length === expected.size &&
    providedSet.size === expected.size &&
    [...expected].every((pos) => providedSet.has(pos));

  if (!matches) {
    throw new ValidationError(
      `Must provide exactly these positions: ${[...expected].join(", ")}. Got: ${provided.join(", ")}`
    );
  }
}

export async function getLineup(): Promise<LineupSlot[]> {
  return getStore().load("lineup");
}

export async function saveLineup(lineup: LineupSlot[]): Promise<LineupSlot[]> {
  validateLineup(lineup);
  await getStore().save("lineup", lineup);
  return lineup;
}

export async function getField(): Promise<FieldPosition[]> {
  return getStore().load("field");
}

export async function saveField(fieldPositions: FieldPosition[]): Promise<FieldPosition[]> {
  validateField(fieldPositions);
  await getStore().save("field", fieldPositions);
  return fieldPositions;
}
