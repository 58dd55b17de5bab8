import { MalformedValueError } from "../errors.js";
import { hoursBetween } from "../records/fields.js";
import type { BabyRecord } from "../records/types.js";
import { ExclusionCounter, rateMetric, type RateMetric } from "./result.js";

export type RegistrationThreshold = 12 | 24;

export const REGISTRATION_THRESHOLDS: readonly RegistrationThreshold[] = [12, 24];

export interface RegistrationTimeliness extends RateMetric {
  thresholdHours: RegistrationThreshold;
  withinThreshold: number;
  late: number;
  /** within + late + excluded */
  totalConsidered: number;
}

/**
 * Share of inborn babies registered within `thresholdHours` of birth.
 * Babies with an unknown delivery place, or a missing or unreadable birth
 * or registration time, are excluded and counted; a registration before
 * birth is treated as a malformed value.
 */
export function registrationTimeliness(
  records: readonly BabyRecord[],
  thresholdHours: RegistrationThreshold
): RegistrationTimeliness {
  const exclusions = new ExclusionCounter();
  let within = 0;
  let late = 0;

  for (const baby of records) {
    const inborn = exclusions.take("placeOfDelivery", baby.uid, baby.inborn);
    if (inborn !== true) continue;

    const birth = exclusions.take("dateOfBirth", baby.uid, baby.birthAt);
    if (birth === undefined) continue;
    const registered = exclusions.take("registrationDate", baby.uid, baby.registeredAt);
    if (registered === undefined) continue;

    const delay = hoursBetween(birth, registered);
    if (delay < 0) {
      exclusions.exclude(new MalformedValueError("registrationDate", baby.uid, registered.toISOString()));
      continue;
    }

    if (delay <= thresholdHours) {
      within += 1;
    } else {
      late += 1;
    }
  }

  return {
    ...rateMetric(within, within + late, exclusions),
    thresholdHours,
    withinThreshold: within,
    late,
    totalConsidered: within + late + exclusions.count,
  };
}
