import type { BabyRecord, ObservationDay } from "../records/types.js";
import { mean } from "./result.js";

export type KmcVerificationStatus = "correct" | "incorrect" | "unable_to_verify" | "not_verified";
export type ObservationVerificationStatus = "correct_or_not_checked" | "incorrect";

export interface VerificationSummary<S extends string> {
  totalBabies: number;
  totalObservations: number;
  stats: Record<S, number>;
  byHospital: Record<string, Record<S, number>>;
}

export function kmcVerificationStatus(day: ObservationDay): KmcVerificationStatus {
  // A monitoring comment means the entry was found wrong
  if (day.mneComment.length > 0) return "incorrect";
  if (day.filledCorrectly !== undefined) return day.filledCorrectly ? "correct" : "incorrect";

  const kmc = day.kmcFilledCorrectly;
  if (typeof kmc === "boolean") return kmc ? "correct" : "incorrect";
  if (typeof kmc === "string") {
    const value = kmc.trim().toLowerCase();
    if (value === "correct" || value === "true") return "correct";
    if (value === "incorrect" || value === "false") return "incorrect";
    if (value.includes("unable")) return "unable_to_verify";
  }
  return "not_verified";
}

export function observationVerificationStatus(day: ObservationDay): ObservationVerificationStatus {
  if (day.mneComment.length > 0 || day.filledIncorrectly === true) return "incorrect";
  return "correct_or_not_checked";
}

function summarizeVerification<S extends string>(
  records: readonly BabyRecord[],
  zero: () => Record<S, number>,
  classify: (day: ObservationDay) => S
): VerificationSummary<S> {
  const stats = zero();
  const byHospital: Record<string, Record<S, number>> = {};
  let totalObservations = 0;

  for (const baby of records) {
    const hospital = baby.hospital ?? "Unknown";
    const hospitalStats = byHospital[hospital] ?? zero();
    for (const day of baby.observationDays) {
      const status = classify(day);
      stats[status] += 1;
      hospitalStats[status] += 1;
      totalObservations += 1;
    }
    byHospital[hospital] = hospitalStats;
  }

  return { totalBabies: records.length, totalObservations, stats, byHospital };
}

export function kmcVerification(records: readonly BabyRecord[]): VerificationSummary<KmcVerificationStatus> {
  return summarizeVerification(
    records,
    () => ({ correct: 0, incorrect: 0, unable_to_verify: 0, not_verified: 0 }),
    kmcVerificationStatus
  );
}

export function observationVerification(
  records: readonly BabyRecord[]
): VerificationSummary<ObservationVerificationStatus> {
  return summarizeVerification(
    records,
    () => ({ correct_or_not_checked: 0, incorrect: 0 }),
    observationVerificationStatus
  );
}

export interface SkinContactEntry {
  uid: string;
  hospital: string;
  followUpNumber: number | undefined;
  numberSkinContact: number;
}

export interface SkinContactSummary {
  entries: number;
  average: number | undefined;
  min: number | undefined;
  max: number | undefined;
  /** Entries above the alert threshold, highest first. */
  alerts: SkinContactEntry[];
}

export const SKIN_CONTACT_ALERT_THRESHOLD = 10;

/**
 * Skin-to-skin contact counts reported at follow-ups, leaving out the
 * day-28 follow-up.
 */
export function skinContact(records: readonly BabyRecord[]): SkinContactSummary {
  const entries: SkinContactEntry[] = [];
  for (const baby of records) {
    for (const followUp of baby.followUps) {
      if (followUp.followUpNumber === 28 || followUp.numberSkinContact === undefined) continue;
      entries.push({
        uid: baby.uid,
        hospital: baby.hospital ?? "Unknown",
        followUpNumber: followUp.followUpNumber,
        numberSkinContact: followUp.numberSkinContact,
      });
    }
  }

  const values = entries.map((e) => e.numberSkinContact);
  return {
    entries: entries.length,
    average: mean(values),
    min: values.length > 0 ? Math.min(...values) : undefined,
    max: values.length > 0 ? Math.max(...values) : undefined,
    alerts: entries
      .filter((e) => e.numberSkinContact > SKIN_CONTACT_ALERT_THRESHOLD)
      .sort((a, b) => b.numberSkinContact - a.numberSkinContact),
  };
}

export interface HighKmcFollowUp {
  uid: string;
  hospital: string;
  followUpNumber: number | undefined;
  kmcHours: number;
  nurseName: string | undefined;
  source: BabyRecord["source"];
}

export const HIGH_KMC_HOURS_PER_DAY = 12;

export function highKmcFollowUps(records: readonly BabyRecord[]): HighKmcFollowUp[] {
  const flagged: HighKmcFollowUp[] = [];
  for (const baby of records) {
    for (const followUp of baby.followUps) {
      if (followUp.kmcHours === undefined || followUp.kmcHours <= HIGH_KMC_HOURS_PER_DAY) continue;
      flagged.push({
        uid: baby.uid,
        hospital: baby.hospital ?? "Unknown",
        followUpNumber: followUp.followUpNumber,
        kmcHours: followUp.kmcHours,
        nurseName: followUp.nurseName ?? baby.nurseName,
        source: baby.source,
      });
    }
  }
  return flagged;
}
