import { InvalidArgumentError } from "commander";

/** Option parser for counts; rejects anything that is not a whole number above zero. */
export function parsePositiveInt(raw: string): number {
  const trimmed = raw.trim();
  const value = trimmed ? Number(trimmed) : Number.NaN;
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${raw}'.`);
  }
  return value;
}
