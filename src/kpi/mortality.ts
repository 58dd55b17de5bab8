import { MalformedValueError, MissingFieldError } from "../errors.js";
import { KMC_MINUTES_FIELD } from "../records/baby.js";
import type { BabyRecord } from "../records/types.js";
import { ExclusionCounter, rateMetric, type ExclusionTally, type RateMetric } from "./result.js";

export type MortalityGroupBy = "none" | "hospital" | "inborn_outborn" | "location" | "kmc_stability";

export const MORTALITY_GROUPINGS: readonly MortalityGroupBy[] = [
  "none",
  "hospital",
  "inborn_outborn",
  "location",
  "kmc_stability",
];

export interface MortalityRate extends RateMetric {
  groupBy: MortalityGroupBy;
  deaths: number;
  total: number;
  /** Records counted overall but left out of the breakdown for lack of a group key. */
  groupExclusions: ExclusionTally;
}

const FIXED_KEYS: Record<MortalityGroupBy, readonly string[]> = {
  none: [],
  hospital: [],
  inborn_outborn: ["inborn", "outborn"],
  location: [],
  kmc_stability: ["stable", "unstable"],
};

function groupKey(baby: BabyRecord, groupBy: MortalityGroupBy, counter: ExclusionCounter): string | undefined {
  switch (groupBy) {
    case "none":
      return undefined;
    case "hospital":
      if (baby.hospital === undefined) counter.exclude(new MissingFieldError("hospitalName", baby.uid));
      return baby.hospital;
    case "location":
      if (baby.location === undefined) counter.exclude(new MissingFieldError("currentLocationOfTheBaby", baby.uid));
      return baby.location;
    case "inborn_outborn": {
      const inborn = counter.take("placeOfDelivery", baby.uid, baby.inborn);
      if (inborn === undefined) return undefined;
      return inborn ? "inborn" : "outborn";
    }
    case "kmc_stability":
      return counter.take(KMC_MINUTES_FIELD, baby.uid, baby.kmcStability);
  }
}

/**
 * Deaths (`deadBaby = true`) over all records, overall and per group.
 * Groups that exist but hold no records report an undefined rate, so
 * "no data" stays distinct from "no deaths".
 */
export function mortalityRate(
  records: readonly BabyRecord[],
  groupBy: MortalityGroupBy,
  knownKeys: readonly string[] = []
): MortalityRate {
  const exclusions = new ExclusionCounter();
  const groupExclusions = new ExclusionCounter();
  const groups = new Map<string, { deaths: number; total: number; exclusions: ExclusionCounter }>();
  for (const key of [...FIXED_KEYS[groupBy], ...(groupBy === "none" ? [] : knownKeys)]) {
    groups.set(key, { deaths: 0, total: 0, exclusions: new ExclusionCounter() });
  }

  let deaths = 0;
  let total = 0;

  for (const baby of records) {
    const key = groupKey(baby, groupBy, groupExclusions);
    const group = key === undefined ? undefined : groups.get(key) ?? { deaths: 0, total: 0, exclusions: new ExclusionCounter() };
    if (key !== undefined && group) groups.set(key, group);

    if (baby.deadBaby.kind !== "present") {
      const error =
        baby.deadBaby.kind === "missing"
          ? new MissingFieldError("deadBaby", baby.uid)
          : new MalformedValueError("deadBaby", baby.uid, baby.deadBaby.raw);
      exclusions.exclude(error);
      group?.exclusions.exclude(error);
      continue;
    }

    const dead = baby.deadBaby.value;
    total += 1;
    if (dead) deaths += 1;
    if (group) {
      group.total += 1;
      if (dead) group.deaths += 1;
    }
  }

  const breakdown: Record<string, RateMetric> = {};
  for (const key of [...groups.keys()].sort()) {
    const group = groups.get(key);
    if (group) breakdown[key] = rateMetric(group.deaths, group.total, group.exclusions);
  }

  return {
    ...rateMetric(deaths, total, exclusions, breakdown),
    groupBy,
    deaths,
    total,
    groupExclusions: groupExclusions.tally(),
  };
}
