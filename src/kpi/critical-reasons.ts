import type { DischargeRecord } from "../records/types.js";

export interface CriticalReasonCount {
  count: number;
  uids: string[];
}

export interface CriticalReasons {
  reasons: Record<string, CriticalReasonCount>;
  totalBabiesWithReasons: number;
  totalUniqueReasons: number;
  totalDischarges: number;
}

/**
 * Counts each individual critical reason once per baby, using the first
 * discharge record per UID.
 */
export function criticalReasons(records: readonly DischargeRecord[]): CriticalReasons {
  const seen = new Set<string>();
  const reasons = new Map<string, CriticalReasonCount>();
  let withReasons = 0;

  for (const record of records) {
    if (seen.has(record.uid)) continue;
    seen.add(record.uid);
    if (record.criticalReasons.length === 0) continue;

    withReasons += 1;
    for (const reason of new Set(record.criticalReasons)) {
      const entry: CriticalReasonCount = reasons.get(reason) ?? { count: 0, uids: [] };
      entry.count += 1;
      entry.uids.push(record.uid);
      reasons.set(reason, entry);
    }
  }

  const sorted = [...reasons.entries()].sort((a, b) => b[1].count - a[1].count || a[0].localeCompare(b[0]));
  return {
    reasons: Object.fromEntries(sorted),
    totalBabiesWithReasons: withReasons,
    totalUniqueReasons: reasons.size,
    totalDischarges: seen.size,
  };
}
