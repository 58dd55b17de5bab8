import { MissingFieldError } from "../errors.js";
import { MISSING } from "../records/fields.js";
import type { BabyRecord, DischargeRecord, FieldValue } from "../records/types.js";
import { ExclusionCounter, type ExclusionTally } from "./result.js";

export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Recognised filter options. Every option is an exact restriction: a
 * record lacking the filtered field never matches.
 */
export interface FilterConfig {
  hospital?: string;
  /** Inclusive bounds on the registration timestamp. */
  dateRange?: DateRange;
  uid?: string;
}

export interface FilteredView {
  filter: FilterConfig;
  babies: readonly BabyRecord[];
  discharges: readonly DischargeRecord[];
  /** Records dropped from the view because a filtered field was absent or unreadable. */
  filterExclusions: {
    babies: ExclusionTally;
    discharges: ExclusionTally;
  };
}

export function isFilterActive(filter: FilterConfig): boolean {
  return filter.hospital !== undefined || filter.dateRange !== undefined || filter.uid !== undefined;
}

function inRange(value: FieldValue<Date>, range: DateRange, uid: string, counter: ExclusionCounter): boolean {
  const at = counter.take("registrationDate", uid, value);
  if (at === undefined) return false;
  const t = at.getTime();
  return t >= range.start.getTime() && t <= range.end.getTime();
}

function matchesHospital(hospital: string | undefined, wanted: string, uid: string, counter: ExclusionCounter): boolean {
  if (hospital === undefined) {
    counter.exclude(new MissingFieldError("hospitalName", uid));
    return false;
  }
  return hospital === wanted;
}

/**
 * Narrows a snapshot to one filtered view. Discharges are matched on their
 * own hospital and UID; the date range reaches them through the baby
 * record sharing their UID.
 */
export function applyFilters(
  babies: readonly BabyRecord[],
  discharges: readonly DischargeRecord[],
  filter: FilterConfig
): FilteredView {
  const babyCounter = new ExclusionCounter();
  const dischargeCounter = new ExclusionCounter();

  const keptBabies = babies.filter((baby) => {
    if (filter.uid !== undefined && baby.uid !== filter.uid) return false;
    if (filter.hospital !== undefined && !matchesHospital(baby.hospital, filter.hospital, baby.uid, babyCounter)) {
      return false;
    }
    if (filter.dateRange !== undefined && !inRange(baby.registeredAt, filter.dateRange, baby.uid, babyCounter)) {
      return false;
    }
    return true;
  });

  const registrationByUid = new Map<string, FieldValue<Date>>();
  for (const baby of babies) {
    if (!registrationByUid.has(baby.uid)) registrationByUid.set(baby.uid, baby.registeredAt);
  }

  const keptDischarges = discharges.filter((discharge) => {
    if (filter.uid !== undefined && discharge.uid !== filter.uid) return false;
    if (
      filter.hospital !== undefined &&
      !matchesHospital(discharge.hospital, filter.hospital, discharge.uid, dischargeCounter)
    ) {
      return false;
    }
    if (filter.dateRange !== undefined) {
      const registered = registrationByUid.get(discharge.uid) ?? MISSING;
      if (!inRange(registered, filter.dateRange, discharge.uid, dischargeCounter)) return false;
    }
    return true;
  });

  return {
    filter,
    babies: keptBabies,
    discharges: keptDischarges,
    filterExclusions: {
      babies: babyCounter.tally(),
      discharges: dischargeCounter.tally(),
    },
  };
}
