import { loggedKmcMinutes } from "../records/baby.js";
import type { BabyRecord } from "../records/types.js";
import { FOLLOW_UP_DAYS, type FollowUpDay } from "./followup.js";
import { mean } from "./result.js";

export interface ProgramOverview {
  totalBabies: number;
  /** Babies flagged as still in the program. */
  activeCases: number;
  /** Discharged babies among the active cases. */
  discharged: number;
  hospitals: number;
  babiesPerHospital: Record<string, number>;
}

export function programOverview(records: readonly BabyRecord[]): ProgramOverview {
  const active = records.filter((baby) => baby.inProgram);
  const perHospital = new Map<string, number>();
  for (const baby of records) {
    const hospital = baby.hospital ?? "Unknown";
    perHospital.set(hospital, (perHospital.get(hospital) ?? 0) + 1);
  }

  return {
    totalBabies: records.length,
    activeCases: active.length,
    discharged: active.filter((baby) => baby.discharged).length,
    hospitals: new Set(records.map((b) => b.hospital).filter((h) => h !== undefined)).size,
    babiesPerHospital: Object.fromEntries([...perHospital.entries()].sort((a, b) => a[0].localeCompare(b[0]))),
  };
}

export interface BabySummary {
  uid: string;
  source: BabyRecord["source"];
  motherName?: string;
  hospital?: string;
  location?: string;
  birthAt?: string;
  totalKmcHours: number;
  avgKmcHoursPerDay: number | undefined;
  kmcDays: number;
  /** Mean KMC hours reported at each follow-up, keyed by follow-up day. */
  followUpKmcHours: Record<`${FollowUpDay}`, number | undefined>;
  dead: boolean | undefined;
  dangerSigns?: string;
}

function followUpHours(baby: BabyRecord, day: FollowUpDay): number | undefined {
  const hours = baby.followUps
    .filter((entry) => entry.followUpNumber === day && entry.totalKmcMinutes !== undefined)
    .map((entry) => Math.max(0, entry.totalKmcMinutes ?? 0) / 60);
  return mean(hours);
}

export function babySummaries(records: readonly BabyRecord[]): BabySummary[] {
  return records.map((baby) => {
    const kmcDays = baby.observationDays.filter((day) => loggedKmcMinutes(day) > 0);
    const totalKmcHours = kmcDays.reduce((sum, day) => sum + loggedKmcMinutes(day), 0) / 60;
    const [d2, d7, d14, d28] = FOLLOW_UP_DAYS.map((day) => followUpHours(baby, day));

    return {
      uid: baby.uid,
      source: baby.source,
      motherName: baby.motherName,
      hospital: baby.hospital,
      location: baby.location,
      birthAt: baby.birthAt.kind === "present" ? baby.birthAt.value.toISOString() : undefined,
      totalKmcHours,
      avgKmcHoursPerDay: kmcDays.length > 0 ? totalKmcHours / kmcDays.length : undefined,
      kmcDays: kmcDays.length,
      followUpKmcHours: { "2": d2, "7": d7, "14": d14, "28": d28 },
      dead: baby.deadBaby.kind === "present" ? baby.deadBaby.value : undefined,
      dangerSigns: baby.dangerSigns,
    };
  });
}
