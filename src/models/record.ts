/**
 * Shared helpers for the encode/decode boundary between entities and
 * store records. Everything read back from the store is a string.
 */

// Anything that is not a finite number decodes to 0
export function toInt(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
}

export function parseJson<T>(raw: string | undefined, fallback: T): T {
  if (!raw) return fallback;
  try {
    return JSON.parse(raw);
  } catch {
    return fallback;
  }
}

export function parseJsonArray(raw: string | undefined): unknown[] {
  const parsed: unknown = parseJson<unknown>(raw, []);
  return Array.isArray(parsed) ? parsed : [];
}

export function now(): string {
  return new Date().toISOString();
}

export function isEmptyRecord(record: Record<string, string>): boolean {
  return Object.keys(record).length === 0;
}

// Outcome kinds shared by the repositories
export type FailureKind =
  | "validation"
  | "not_found"
  | "conflict"
  | "limit_reached";

export type Outcome<T extends object> =
  | ({ success: true } & T)
  | { success: false; error: FailureKind; message: string };
