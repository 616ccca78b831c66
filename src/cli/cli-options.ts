import { InvalidArgumentError } from "commander";

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/** `1,2, 3` → `["1", "2", "3"]`; empty segments are dropped. */
export function parsePreparationIds(value: string): string[] {
  const ids = value
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
  if (ids.length === 0) {
    throw new InvalidArgumentError("Expected a comma-separated list of preparation ids");
  }
  return ids;
}
