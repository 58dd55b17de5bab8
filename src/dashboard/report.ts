import { DAY_MS } from "../records/fields.js";
import { DISCHARGE_CATEGORIES } from "../records/types.js";
import { criticalReasons, type CriticalReasons } from "../kpi/critical-reasons.js";
import { dischargeOutcomes, type DischargeOutcomes } from "../kpi/discharge-outcomes.js";
import { applyFilters, type DateRange, type FilterConfig, type FilteredView } from "../kpi/filters.js";
import { FOLLOW_UP_DAYS, followUpCompletion, type FollowUpCompletion } from "../kpi/followup.js";
import { hospitalStayDuration, type HospitalStayDuration } from "../kpi/hospital-stay.js";
import { kmcInitiationTiming, type KmcInitiationTiming } from "../kpi/initiation.js";
import {
  averageKmcByLocation,
  dailyKmcAnalysis,
  type DailyKmcAnalysis,
  type LocationKmcAverages,
} from "../kpi/kmc-hours.js";
import {
  highKmcFollowUps,
  kmcVerification,
  observationVerification,
  skinContact,
  type HighKmcFollowUp,
  type KmcVerificationStatus,
  type ObservationVerificationStatus,
  type SkinContactSummary,
  type VerificationSummary,
} from "../kpi/monitoring.js";
import { mortalityRate, type MortalityGroupBy, type MortalityRate } from "../kpi/mortality.js";
import { babySummaries, programOverview, type BabySummary, type ProgramOverview } from "../kpi/overview.js";
import { REGISTRATION_THRESHOLDS, registrationTimeliness, type RegistrationTimeliness } from "../kpi/registration.js";
import type { Snapshot } from "../snapshot/snapshot.js";

/** KMC-by-location covers this many days before `asOf` when no date range is set. */
export const DEFAULT_KMC_WINDOW_DAYS = 30;

export interface DashboardReport {
  asOf: string;
  fetchedAt: string;
  filter: {
    hospital?: string;
    from?: string;
    to?: string;
    uid?: string;
  };
  records: { babies: number; discharges: number };
  filterExclusions: FilteredView["filterExclusions"];
  overview: ProgramOverview;
  registrationTimeliness: Record<string, RegistrationTimeliness>;
  kmcInitiation: KmcInitiationTiming;
  followUp: Record<string, FollowUpCompletion>;
  dischargeOutcomes: DischargeOutcomes;
  mortality: Record<MortalityGroupBy, MortalityRate>;
  kmcByLocation: LocationKmcAverages;
  dailyKmc: DailyKmcAnalysis;
  hospitalStay: HospitalStayDuration;
  criticalReasons: CriticalReasons;
  kmcVerification: VerificationSummary<KmcVerificationStatus>;
  observationVerification: VerificationSummary<ObservationVerificationStatus>;
  skinContact: SkinContactSummary;
  highKmcFollowUps: HighKmcFollowUp[];
  babies: BabySummary[];
}

export function selectView(snapshot: Snapshot, filter: FilterConfig): FilteredView {
  return applyFilters(snapshot.babies, snapshot.discharges, filter);
}

/**
 * Group keys that must appear in a mortality breakdown even with no records,
 * so a selected hospital with nothing in range still reports "no data".
 */
export function mortalityKnownKeys(snapshot: Snapshot, filter: FilterConfig, groupBy: MortalityGroupBy): string[] {
  if (groupBy === "hospital") return filter.hospital !== undefined ? [filter.hospital] : [...snapshot.hospitals];
  return [];
}

function kmcWindow(filter: FilterConfig, asOf: Date): DateRange {
  return filter.dateRange ?? { start: new Date(asOf.getTime() - DEFAULT_KMC_WINDOW_DAYS * DAY_MS), end: asOf };
}

/**
 * One recomputation pass: every metric for one filtered view of a snapshot.
 */
export function computeDashboard(snapshot: Snapshot, filter: FilterConfig, asOf: Date): DashboardReport {
  const view = selectView(snapshot, filter);
  const babies = view.babies;

  const registration: Record<string, RegistrationTimeliness> = {};
  for (const threshold of REGISTRATION_THRESHOLDS) {
    registration[`${threshold}h`] = registrationTimeliness(babies, threshold);
  }

  const followUp: Record<string, FollowUpCompletion> = {};
  for (const day of FOLLOW_UP_DAYS) {
    followUp[`day${day}`] = followUpCompletion(babies, day, asOf);
  }

  const mortalityBy = (groupBy: MortalityGroupBy) =>
    mortalityRate(babies, groupBy, mortalityKnownKeys(snapshot, filter, groupBy));

  return {
    asOf: asOf.toISOString(),
    fetchedAt: snapshot.fetchedAt.toISOString(),
    filter: {
      hospital: filter.hospital,
      from: filter.dateRange?.start.toISOString(),
      to: filter.dateRange?.end.toISOString(),
      uid: filter.uid,
    },
    records: { babies: babies.length, discharges: view.discharges.length },
    filterExclusions: view.filterExclusions,
    overview: programOverview(babies),
    registrationTimeliness: registration,
    kmcInitiation: kmcInitiationTiming(babies),
    followUp,
    dischargeOutcomes: dischargeOutcomes(view.discharges, DISCHARGE_CATEGORIES),
    mortality: {
      none: mortalityBy("none"),
      hospital: mortalityBy("hospital"),
      inborn_outborn: mortalityBy("inborn_outborn"),
      location: mortalityBy("location"),
      kmc_stability: mortalityBy("kmc_stability"),
    },
    kmcByLocation: averageKmcByLocation(babies, kmcWindow(filter, asOf)),
    dailyKmc: dailyKmcAnalysis(babies, asOf),
    hospitalStay: hospitalStayDuration(babies),
    criticalReasons: criticalReasons(view.discharges),
    kmcVerification: kmcVerification(babies),
    observationVerification: observationVerification(babies),
    skinContact: skinContact(babies),
    highKmcFollowUps: highKmcFollowUps(babies),
    babies: babySummaries(babies),
  };
}
