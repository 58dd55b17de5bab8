import { MalformedValueError, MissingFieldError, type DataQualityError } from "../errors.js";
import type { FieldValue } from "../records/types.js";

export type MetricStatus = "ok" | "no_data";

export interface ExclusionTally {
  missingField: number;
  malformedValue: number;
  /** Excluded records per field, keyed `<field>`; each record counts once. */
  byField: Record<string, { missing: number; malformed: number }>;
}

export interface MetricBase {
  status: MetricStatus;
  denominator: number;
  excludedCount: number;
  exclusions: ExclusionTally;
}

/**
 * Shared shape for rate-style metrics: `value` is a fraction in [0, 1] or
 * undefined when the denominator is zero.
 */
export interface RateMetric extends MetricBase {
  value: number | undefined;
  numerator: number;
  percentage: number | undefined;
  breakdown: Record<string, RateMetric>;
}

export function emptyTally(): ExclusionTally {
  return { missingField: 0, malformedValue: 0, byField: {} };
}

/**
 * Collects the records a metric had to leave out. Each record is excluded
 * at most once, on the first field that fails.
 */
export class ExclusionCounter {
  private readonly errors: DataQualityError[] = [];

  exclude(error: DataQualityError): void {
    this.errors.push(error);
  }

  /**
   * Returns the field's value, or records the record's exclusion and
   * returns undefined.
   */
  take<T>(field: string, uid: string, value: FieldValue<T>): T | undefined {
    if (value.kind === "present") return value.value;
    this.exclude(
      value.kind === "missing" ? new MissingFieldError(field, uid) : new MalformedValueError(field, uid, value.raw)
    );
    return undefined;
  }

  absorb(other: ExclusionCounter): void {
    this.errors.push(...other.errors);
  }

  get count(): number {
    return this.errors.length;
  }

  tally(): ExclusionTally {
    const tally = emptyTally();
    for (const error of this.errors) {
      const entry = tally.byField[error.field] ?? { missing: 0, malformed: 0 };
      if (error instanceof MissingFieldError) {
        tally.missingField += 1;
        entry.missing += 1;
      } else {
        tally.malformedValue += 1;
        entry.malformed += 1;
      }
      tally.byField[error.field] = entry;
    }
    return tally;
  }
}

export function fraction(numerator: number, denominator: number): number | undefined {
  return denominator > 0 ? numerator / denominator : undefined;
}

export function toPercentage(rate: number | undefined): number | undefined {
  return rate === undefined ? undefined : rate * 100;
}

export function rateMetric(
  numerator: number,
  denominator: number,
  exclusions: ExclusionCounter | ExclusionTally = emptyTally(),
  breakdown: Record<string, RateMetric> = {}
): RateMetric {
  const tally = exclusions instanceof ExclusionCounter ? exclusions.tally() : exclusions;
  const value = fraction(numerator, denominator);
  return {
    status: value === undefined ? "no_data" : "ok",
    value,
    numerator,
    denominator,
    percentage: toPercentage(value),
    excludedCount: tally.missingField + tally.malformedValue,
    exclusions: tally,
    breakdown,
  };
}

export function median(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function statusOf(value: number | undefined): MetricStatus {
  return value === undefined ? "no_data" : "ok";
}
