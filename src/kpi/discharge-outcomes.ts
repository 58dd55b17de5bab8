import type { DischargeRecord } from "../records/types.js";
import { ExclusionCounter, rateMetric, statusOf, type MetricBase, type RateMetric } from "./result.js";

export interface DischargeOutcomes extends MetricBase {
  /** Total distinct discharges counted; undefined when there are none. */
  value: number | undefined;
  total: number;
  duplicates: number;
  /** One entry per outcome category: numerator is the count, denominator the total. */
  breakdown: Record<string, RateMetric>;
}

/**
 * Groups discharges by outcome category. A UID is counted once, on its
 * first record with an outcome; its other records are duplicates. A UID
 * with no outcome on any record is excluded and tallied once.
 */
export function dischargeOutcomes(
  records: readonly DischargeRecord[],
  knownCategories: readonly string[] = []
): DischargeOutcomes {
  const exclusions = new ExclusionCounter();
  const seen = new Set<string>();
  const counts = new Map<string, number>(knownCategories.map((category) => [category, 0]));
  let duplicates = 0;

  const firstWithOutcome = new Map<string, DischargeRecord>();
  for (const record of records) {
    if (record.outcome.kind === "present" && !firstWithOutcome.has(record.uid)) {
      firstWithOutcome.set(record.uid, record);
    }
  }

  for (const record of records) {
    const chosen = firstWithOutcome.get(record.uid);
    if (chosen !== undefined ? chosen !== record : seen.has(record.uid)) {
      duplicates += 1;
      continue;
    }
    seen.add(record.uid);

    const outcome = exclusions.take("outcome", record.uid, record.outcome);
    if (outcome === undefined) continue;
    counts.set(outcome, (counts.get(outcome) ?? 0) + 1);
  }

  const total = [...counts.values()].reduce((sum, n) => sum + n, 0);
  const breakdown: Record<string, RateMetric> = {};
  for (const [category, count] of counts) {
    breakdown[category] = rateMetric(count, total);
  }

  const value = total > 0 ? total : undefined;
  return {
    status: statusOf(value),
    value,
    total,
    denominator: total,
    duplicates,
    excludedCount: exclusions.count,
    exclusions: exclusions.tally(),
    breakdown,
  };
}
