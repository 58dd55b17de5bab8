import type { DocumentFields, FieldValue } from "./types.js";

const MS_EPOCH_THRESHOLD = 1_000_000_000_000;
const NUMERIC = /^-?\d+(\.\d+)?$/;

export const MISSING: { kind: "missing" } = { kind: "missing" };

export function present<T>(value: T): FieldValue<T> {
  return { kind: "present", value };
}

export function isRecord(value: unknown): value is DocumentFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAbsent(raw: unknown): boolean {
  return raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "");
}

/**
 * Trimmed string value; numbers are accepted since some UIDs are stored numerically.
 */
export function readString(doc: DocumentFields, key: string): string | undefined {
  const raw = doc[key];
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readNumber(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw === "string" && NUMERIC.test(raw.trim())) return Number(raw.trim());
  return undefined;
}

export function readArray(raw: unknown): unknown[] {
  return Array.isArray(raw) ? raw : [];
}

export function readBoolean(raw: unknown): FieldValue<boolean> {
  if (isAbsent(raw)) return MISSING;
  if (typeof raw === "boolean") return present(raw);
  return { kind: "malformed", raw };
}

function fromEpoch(value: number): Date {
  return new Date(value > MS_EPOCH_THRESHOLD ? value : value * 1000);
}

function validDate(date: Date, raw: unknown): FieldValue<Date> {
  return Number.isNaN(date.getTime()) ? { kind: "malformed", raw } : present(date);
}

/**
 * Accepts epoch seconds, epoch milliseconds, numeric strings, ISO strings,
 * Date values and `{seconds}` / `{_seconds}` timestamp objects. A zero
 * epoch is treated as "not recorded".
 */
export function readTimestamp(raw: unknown): FieldValue<Date> {
  if (isAbsent(raw) || raw === 0) return MISSING;

  if (raw instanceof Date) return validDate(raw, raw);

  if (typeof raw === "number") {
    return Number.isFinite(raw) ? validDate(fromEpoch(raw), raw) : { kind: "malformed", raw };
  }

  if (typeof raw === "string") {
    const text = raw.trim();
    if (NUMERIC.test(text)) {
      const value = Number(text);
      return value === 0 ? MISSING : validDate(fromEpoch(value), raw);
    }
    return validDate(new Date(text), raw);
  }

  if (isRecord(raw)) {
    const seconds = readNumber(raw.seconds ?? raw._seconds);
    if (seconds !== undefined) {
      const nanos = readNumber(raw.nanoseconds ?? raw._nanoseconds) ?? 0;
      return validDate(new Date(seconds * 1000 + Math.floor(nanos / 1_000_000)), raw);
    }
  }

  return { kind: "malformed", raw };
}

export function firstPresent<T>(...values: FieldValue<T>[]): FieldValue<T> {
  let fallback: FieldValue<T> = MISSING;
  for (const value of values) {
    if (value.kind === "present") return value;
    if (value.kind === "malformed" && fallback.kind === "missing") fallback = value;
  }
  return fallback;
}

export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / HOUR_MS;
}

export function utcDateKey(date: Date): string {
  return date.toISOString().substring(0, 10);
}
