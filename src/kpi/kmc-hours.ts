import { KMC_MINUTES_FIELD, kmcSessions } from "../records/baby.js";
import { DAY_MS, utcDateKey } from "../records/fields.js";
import type { BabyRecord, FieldValue, ObservationDay } from "../records/types.js";
import type { DateRange } from "./filters.js";
import { ExclusionCounter, type ExclusionTally } from "./result.js";

export interface LocationKmcRow {
  hospital: string;
  location: string;
  avgHoursPerDay: number;
  avgHoursPerBaby: number;
  babyCount: number;
  observationDays: number;
}

export interface LocationKmcAverages {
  rows: LocationKmcRow[];
  excludedCount: number;
  exclusions: ExclusionTally;
}

export interface DailyKmcCell {
  hospital: string;
  location: string;
  totalKmcMinutes: number;
  babyCount: number;
  /** Rounded to one decimal; undefined when no baby had KMC that day. */
  averageKmcHours: number | undefined;
}

export interface DailyKmcDay {
  date: string;
  /** Babies discharged on this date, left out of its averages. */
  excludedDischarged: number;
  cells: DailyKmcCell[];
}

export interface DailyKmcAnalysis {
  hospitals: string[];
  locations: string[];
  days: DailyKmcDay[];
  excludedCount: number;
  exclusions: ExclusionTally;
}

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Calendar date (UTC) an observation day refers to. Missing when its day of
 * life is not recorded; malformed when it is unreadable or lands outside
 * the calendar.
 */
export function observationDate(birth: Date, day: ObservationDay): FieldValue<string> {
  if (day.ageDay.kind !== "present") return day.ageDay;
  const date = new Date(startOfUtcDay(birth) + Math.floor(day.ageDay.value) * DAY_MS);
  if (Number.isNaN(date.getTime())) return { kind: "malformed", raw: day.ageDay.value };
  return { kind: "present", value: utcDateKey(date) };
}

/**
 * KMC minutes per calendar date for one baby, or undefined (with the
 * exclusion recorded) when a session's time or date cannot be read.
 */
function minutesByDate(baby: BabyRecord, birth: Date, exclusions: ExclusionCounter): Map<string, number> | undefined {
  const byDate = new Map<string, number>();
  for (const day of kmcSessions(baby.observationDays)) {
    const minutes = exclusions.take(KMC_MINUTES_FIELD, baby.uid, day.totalKmcMinutes);
    if (minutes === undefined) return undefined;
    const date = exclusions.take("observationDay.ageDay", baby.uid, observationDate(birth, day));
    if (date === undefined) return undefined;
    byDate.set(date, (byDate.get(date) ?? 0) + minutes);
  }
  return byDate;
}

/**
 * Average logged KMC hours per hospital and location over the observation
 * days falling inside `range` (compared by UTC calendar date). Sessions on
 * the same date count as one day.
 */
export function averageKmcByLocation(records: readonly BabyRecord[], range: DateRange): LocationKmcAverages {
  const exclusions = new ExclusionCounter();
  const startKey = utcDateKey(range.start);
  const endKey = utcDateKey(range.end);
  const groups = new Map<string, { hospital: string; location: string; minutes: number; days: number; babies: number }>();

  for (const baby of records) {
    if (kmcSessions(baby.observationDays).length === 0) continue;
    const birth = exclusions.take("dateOfBirth", baby.uid, baby.birthAt);
    if (birth === undefined) continue;
    const sessions = minutesByDate(baby, birth, exclusions);
    if (sessions === undefined) continue;

    const hospital = baby.hospital ?? "Unknown";
    const location = baby.location ?? "Unknown";
    const key = `${hospital}\u0000${location}`;
    const group = groups.get(key) ?? { hospital, location, minutes: 0, days: 0, babies: 0 };

    let counted = false;
    for (const [date, minutes] of sessions) {
      if (date < startKey || date > endKey) continue;
      group.minutes += minutes;
      group.days += 1;
      counted = true;
    }
    if (counted) group.babies += 1;
    groups.set(key, group);
  }

  const rows = [...groups.values()]
    .filter((group) => group.days > 0)
    .map((group) => ({
      hospital: group.hospital,
      location: group.location,
      avgHoursPerDay: group.minutes / group.days / 60,
      avgHoursPerBaby: group.minutes / group.babies / 60,
      babyCount: group.babies,
      observationDays: group.days,
    }))
    .sort((a, b) => a.hospital.localeCompare(b.hospital) || a.location.localeCompare(b.location));

  return { rows, excludedCount: exclusions.count, exclusions: exclusions.tally() };
}

/**
 * KMC hours per hospital and location for each of the `days` calendar
 * days before `asOf`. A baby discharged on a given day is not counted in
 * that day's averages.
 */
export function dailyKmcAnalysis(records: readonly BabyRecord[], asOf: Date, days = 3): DailyKmcAnalysis {
  const hospitals = [...new Set(records.map((b) => b.hospital).filter((h): h is string => h !== undefined))].sort();
  const locations = [...new Set(records.map((b) => b.location).filter((l): l is string => l !== undefined))].sort();
  const today = startOfUtcDay(asOf);
  const exclusions = new ExclusionCounter();

  const tracked: Array<{ baby: BabyRecord; cellKey: string; sessions: Map<string, number> }> = [];
  for (const baby of records) {
    if (baby.hospital === undefined || baby.location === undefined) continue;
    if (kmcSessions(baby.observationDays).length === 0) continue;
    const birth = exclusions.take("dateOfBirth", baby.uid, baby.birthAt);
    if (birth === undefined) continue;
    const sessions = minutesByDate(baby, birth, exclusions);
    if (sessions === undefined) continue;
    tracked.push({ baby, cellKey: `${baby.hospital}\u0000${baby.location}`, sessions });
  }

  const result: DailyKmcDay[] = [];
  for (let offset = 1; offset <= days; offset++) {
    const date = utcDateKey(new Date(today - offset * DAY_MS));
    const cells = new Map<string, DailyKmcCell>();
    for (const hospital of hospitals) {
      for (const location of locations) {
        cells.set(`${hospital}\u0000${location}`, {
          hospital,
          location,
          totalKmcMinutes: 0,
          babyCount: 0,
          averageKmcHours: undefined,
        });
      }
    }

    let excludedDischarged = 0;
    for (const { baby, cellKey, sessions } of tracked) {
      if (baby.dischargedAt.kind === "present" && utcDateKey(baby.dischargedAt.value) === date) {
        excludedDischarged += 1;
        continue;
      }
      const minutes = sessions.get(date);
      const cell = cells.get(cellKey);
      if (minutes === undefined || !cell) continue;
      cell.totalKmcMinutes += minutes;
      cell.babyCount += 1;
    }

    for (const cell of cells.values()) {
      if (cell.babyCount > 0) {
        cell.averageKmcHours = Math.round((cell.totalKmcMinutes / cell.babyCount / 60) * 10) / 10;
      }
    }
    result.push({ date, excludedDischarged, cells: [...cells.values()] });
  }

  return { hospitals, locations, days: result, excludedCount: exclusions.count, exclusions: exclusions.tally() };
}
