import type { DataQualityError } from "../errors.js";
import { MalformedValueError, MissingFieldError } from "../errors.js";
import { KMC_MINUTES_FIELD, kmcSessions } from "../records/baby.js";
import type { BabyRecord } from "../records/types.js";
import { ExclusionCounter, mean, median, statusOf, type MetricBase } from "./result.js";

export interface InitiationBucket {
  label: string;
  lowerHours: number;
  /** Exclusive; undefined for the open-ended last bucket. */
  upperHours: number | undefined;
  count: number;
}

export interface KmcInitiationTiming extends MetricBase {
  /** Median hours from birth to the first KMC session. */
  value: number | undefined;
  medianHours: number | undefined;
  meanHours: number | undefined;
  initiated: number;
  notInitiated: number;
  /** initiated + notInitiated + excluded */
  totalConsidered: number;
  within24h: number;
  within48h: number;
  buckets: InitiationBucket[];
  breakdown: Record<string, KmcInitiationTiming>;
}

const BUCKET_BOUNDS: ReadonlyArray<{ label: string; lower: number; upper: number | undefined }> = [
  { label: "<1h", lower: 0, upper: 1 },
  { label: "1-6h", lower: 1, upper: 6 },
  { label: "6-24h", lower: 6, upper: 24 },
  { label: "24-48h", lower: 24, upper: 48 },
  { label: ">=48h", lower: 48, upper: undefined },
];

type InitiationOutcome =
  | { kind: "timed"; hours: number }
  | { kind: "not_initiated" }
  | { kind: "excluded"; error: DataQualityError };

interface BabyInitiation {
  outcome: InitiationOutcome;
  inborn: boolean | undefined;
  location: string | undefined;
}

function initiationOf(baby: BabyRecord): InitiationOutcome {
  const sessions = kmcSessions(baby.observationDays);
  if (sessions.length === 0) return { kind: "not_initiated" };

  // An unreadable day may hold the first session
  for (const { totalKmcMinutes } of sessions) {
    if (totalKmcMinutes.kind === "malformed") {
      return { kind: "excluded", error: new MalformedValueError(KMC_MINUTES_FIELD, baby.uid, totalKmcMinutes.raw) };
    }
  }

  if (baby.birthAt.kind === "missing") {
    return { kind: "excluded", error: new MissingFieldError("dateOfBirth", baby.uid) };
  }
  if (baby.birthAt.kind === "malformed") {
    return { kind: "excluded", error: new MalformedValueError("dateOfBirth", baby.uid, baby.birthAt.raw) };
  }

  let firstDay: number | undefined;
  for (const session of sessions) {
    const age = session.ageDay;
    if (age.kind === "missing") {
      return { kind: "excluded", error: new MissingFieldError("observationDay.ageDay", baby.uid) };
    }
    if (age.kind === "malformed") {
      return { kind: "excluded", error: new MalformedValueError("observationDay.ageDay", baby.uid, age.raw) };
    }
    if (firstDay === undefined || age.value < firstDay) firstDay = age.value;
  }

  // Sessions are logged per day of life, so the session starts `ageDay` days after birth
  return { kind: "timed", hours: (firstDay ?? 0) * 24 };
}

function bucketize(hours: readonly number[]): InitiationBucket[] {
  return BUCKET_BOUNDS.map(({ label, lower, upper }) => ({
    label,
    lowerHours: lower,
    upperHours: upper,
    count: hours.filter((h) => h >= lower && (upper === undefined || h < upper)).length,
  }));
}

function summarize(
  entries: readonly BabyInitiation[],
  breakdown: Record<string, KmcInitiationTiming> = {}
): KmcInitiationTiming {
  const exclusions = new ExclusionCounter();
  const hours: number[] = [];
  let notInitiated = 0;

  for (const { outcome } of entries) {
    if (outcome.kind === "timed") hours.push(outcome.hours);
    else if (outcome.kind === "not_initiated") notInitiated += 1;
    else exclusions.exclude(outcome.error);
  }

  const medianHours = median(hours);
  const tally = exclusions.tally();
  return {
    status: statusOf(medianHours),
    value: medianHours,
    denominator: hours.length,
    excludedCount: exclusions.count,
    exclusions: tally,
    medianHours,
    meanHours: mean(hours),
    initiated: hours.length,
    notInitiated,
    totalConsidered: hours.length + notInitiated + exclusions.count,
    within24h: hours.filter((h) => h <= 24).length,
    within48h: hours.filter((h) => h <= 48).length,
    buckets: bucketize(hours),
    breakdown,
  };
}

/**
 * Time from birth to the first logged KMC session. Babies without any
 * session are reported as not initiated rather than dropped.
 */
export function kmcInitiationTiming(records: readonly BabyRecord[]): KmcInitiationTiming {
  const entries: BabyInitiation[] = records.map((baby) => ({
    outcome: initiationOf(baby),
    inborn: baby.inborn.kind === "present" ? baby.inborn.value : undefined,
    location: baby.location,
  }));

  const inborn = entries.filter((e) => e.inborn === true);
  const breakdown: Record<string, KmcInitiationTiming> = {
    inborn: summarize(inborn),
    outborn: summarize(entries.filter((e) => e.inborn === false)),
  };

  const locations = [...new Set(inborn.map((e) => e.location).filter((l): l is string => l !== undefined))].sort();
  for (const location of locations) {
    breakdown[`inborn:${location}`] = summarize(inborn.filter((e) => e.location === location));
  }

  return summarize(entries, breakdown);
}
