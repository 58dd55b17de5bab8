import type { BabyRecord } from "../records/types.js";
import { DAY_MS } from "../records/fields.js";
import { ExclusionCounter, rateMetric, type RateMetric } from "./result.js";

export type FollowUpDay = 2 | 7 | 14 | 28;

export const FOLLOW_UP_DAYS: readonly FollowUpDay[] = [2, 7, 14, 28];

export interface FollowUpCompletion extends RateMetric {
  day: FollowUpDay;
  anchor: "discharge" | "birth";
  completed: number;
  notCompleted: number;
  /** completed + notCompleted; equals the denominator */
  due: number;
  notYetDue: number;
  ineligible: number;
  /** completed + notCompleted + excluded */
  totalConsidered: number;
  breakdown: Record<string, FollowUpCompletion>;
}

type FollowUpState = "completed" | "not_completed" | "not_yet_due" | "ineligible" | "excluded";

interface HospitalGroup {
  states: FollowUpState[];
  exclusions: ExclusionCounter;
}

function anchorFor(day: FollowUpDay): "discharge" | "birth" {
  return day === 28 ? "birth" : "discharge";
}

function isDead(baby: BabyRecord): boolean {
  return baby.deadBaby.kind === "present" && baby.deadBaby.value;
}

function stateOf(baby: BabyRecord, day: FollowUpDay, asOf: Date, exclusions: ExclusionCounter): FollowUpState {
  if (isDead(baby)) return "ineligible";

  let anchorAt: Date | undefined;
  if (anchorFor(day) === "birth") {
    anchorAt = exclusions.take("dateOfBirth", baby.uid, baby.birthAt);
  } else {
    const dischargeType = baby.lastDischargeType?.toLowerCase();
    // Follow-ups after discharge apply only to babies discharged alive
    if (dischargeType === undefined || dischargeType === "died") return "ineligible";
    anchorAt = exclusions.take("dischargeDate", baby.uid, baby.dischargedAt);
  }
  if (anchorAt === undefined) return "excluded";

  const elapsedDays = (asOf.getTime() - anchorAt.getTime()) / DAY_MS;
  if (elapsedDays <= day) return "not_yet_due";

  return baby.followUps.some((entry) => entry.followUpNumber === day) ? "completed" : "not_completed";
}

function summarize(
  day: FollowUpDay,
  states: readonly FollowUpState[],
  exclusions: ExclusionCounter,
  breakdown: Record<string, FollowUpCompletion> = {}
): FollowUpCompletion {
  const count = (state: FollowUpState) => states.filter((s) => s === state).length;
  const completed = count("completed");
  const notCompleted = count("not_completed");
  return {
    ...rateMetric(completed, completed + notCompleted, exclusions),
    day,
    anchor: anchorFor(day),
    completed,
    notCompleted,
    due: completed + notCompleted,
    notYetDue: count("not_yet_due"),
    ineligible: count("ineligible"),
    totalConsidered: completed + notCompleted + exclusions.count,
    breakdown,
  };
}

/**
 * Completion of the day-`day` follow-up among babies for whom it is due at
 * `asOf`. Days 2, 7 and 14 count from discharge, day 28 from birth; a
 * follow-up falls due once more than `day` days have elapsed.
 */
export function followUpCompletion(
  records: readonly BabyRecord[],
  day: FollowUpDay,
  asOf: Date
): FollowUpCompletion {
  const overall = new ExclusionCounter();
  const perHospital = new Map<string, HospitalGroup>();
  const states: FollowUpState[] = [];

  for (const baby of records) {
    const local = new ExclusionCounter();
    const state = stateOf(baby, day, asOf, local);
    states.push(state);

    const hospital = baby.hospital ?? "Unknown";
    const group: HospitalGroup = perHospital.get(hospital) ?? { states: [], exclusions: new ExclusionCounter() };
    group.states.push(state);
    perHospital.set(hospital, group);

    if (state === "excluded") {
      overall.absorb(local);
      group.exclusions.absorb(local);
    }
  }

  const breakdown: Record<string, FollowUpCompletion> = {};
  for (const hospital of [...perHospital.keys()].sort()) {
    const group = perHospital.get(hospital);
    if (group) breakdown[hospital] = summarize(day, group.states, group.exclusions);
  }

  return summarize(day, states, overall, breakdown);
}
