import { MalformedValueError } from "../errors.js";
import { DAY_MS } from "../records/fields.js";
import type { BabyRecord } from "../records/types.js";
import { ExclusionCounter, type ExclusionTally } from "./result.js";

export interface LocationStay {
  count: number;
  avgDays: number;
  /** "<days> days <hours> hours" */
  avgFormatted: string;
}

export interface HospitalStayDuration {
  totalBabies: number;
  locations: Record<string, LocationStay>;
  excludedCount: number;
  exclusions: ExclusionTally;
}

export function formatStay(days: number): string {
  const whole = Math.floor(days);
  const hours = Math.floor((days - whole) * 24);
  return `${whole} days ${hours} hours`;
}

/**
 * Birth-to-discharge stay per current location, for babies with a
 * recorded discharge. A discharge at or before birth is malformed.
 */
export function hospitalStayDuration(records: readonly BabyRecord[]): HospitalStayDuration {
  const exclusions = new ExclusionCounter();
  const byLocation = new Map<string, number[]>();

  for (const baby of records) {
    if (baby.dischargedAt.kind === "missing") continue;
    const discharged = exclusions.take("dischargeDate", baby.uid, baby.dischargedAt);
    if (discharged === undefined) continue;
    const birth = exclusions.take("dateOfBirth", baby.uid, baby.birthAt);
    if (birth === undefined) continue;
    if (discharged.getTime() <= birth.getTime()) {
      exclusions.exclude(new MalformedValueError("dischargeDate", baby.uid, discharged.toISOString()));
      continue;
    }

    const location = baby.location ?? "Unknown";
    const stays: number[] = byLocation.get(location) ?? [];
    stays.push((discharged.getTime() - birth.getTime()) / DAY_MS);
    byLocation.set(location, stays);
  }

  const locations: Record<string, LocationStay> = {};
  let totalBabies = 0;
  for (const location of [...byLocation.keys()].sort()) {
    const stays: number[] = byLocation.get(location) ?? [];
    if (stays.length === 0) continue;
    const avgDays = stays.reduce((sum, d) => sum + d, 0) / stays.length;
    locations[location] = { count: stays.length, avgDays, avgFormatted: formatStay(avgDays) };
    totalBabies += stays.length;
  }

  return { totalBabies, locations, excludedCount: exclusions.count, exclusions: exclusions.tally() };
}
