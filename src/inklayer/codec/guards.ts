export class MalformedRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedRecordError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function readNumber(
  record: Record<string, unknown>,
  key: string,
  context: string,
): number {
  const value = record[key];
  if (!isFiniteNumber(value)) {
    throw new MalformedRecordError(`${context}: ${key} must be a number`);
  }
  return value;
}

export function readOptionalNumber(
  record: Record<string, unknown>,
  key: string,
  fallback: number,
  context: string,
): number {
  const value = record[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (!isFiniteNumber(value)) {
    throw new MalformedRecordError(`${context}: ${key} must be a number`);
  }
  return value;
}

/**
 * Parses a persisted array. Blank input is an empty collection; anything
 * that is not a JSON array throws.
 */
export function parseArray(json: string): unknown[] | null {
  if (json.trim() === "") {
    return null;
  }
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new MalformedRecordError("expected an array of records");
  }
  return parsed;
}
