export type CollectionName = "baby" | "babyBackUp" | "discharges";

export type BabySource = "baby" | "babyBackUp";

/**
 * A document as delivered by the record store, before any interpretation.
 */
export interface RawDocument {
  id: string;
  data: unknown;
}

export type DocumentFields = Record<string, unknown>;

/**
 * Outcome of reading one field from a document. Metrics decide what a
 * missing or malformed value means for them; the mapper only reports it.
 */
export type FieldValue<T> =
  | { kind: "present"; value: T }
  | { kind: "missing" }
  | { kind: "malformed"; raw: unknown };

export type KmcStability = "stable" | "unstable";

export interface ObservationDay {
  ageDay: FieldValue<number>;
  date?: string;
  totalKmcMinutes: FieldValue<number>;
  unstableForKmc: boolean;
  dangerSign: string;
  filledCorrectly?: boolean;
  kmcFilledCorrectly?: boolean | string;
  filledIncorrectly?: boolean;
  mneComment: string;
}

export interface FollowUpEntry {
  followUpNumber?: number;
  date: FieldValue<Date>;
  totalKmcMinutes?: number;
  numberSkinContact?: number;
  kmcHours?: number;
  nurseName?: string;
}

export interface BabyRecord {
  id: string;
  uid: string;
  source: BabySource;
  hospital?: string;
  location?: string;
  motherName?: string;
  dangerSigns?: string;
  nurseName?: string;
  birthAt: FieldValue<Date>;
  registeredAt: FieldValue<Date>;
  inborn: FieldValue<boolean>;
  deadBaby: FieldValue<boolean>;
  inProgram: boolean;
  discharged: boolean;
  lastDischargeType?: string;
  dischargedAt: FieldValue<Date>;
  dischargedStatusString?: string;
  observationDays: readonly ObservationDay[];
  followUps: readonly FollowUpEntry[];
  kmcStability: FieldValue<KmcStability>;
}

export const DISCHARGE_CATEGORIES = [
  "critical_home",
  "stable_home",
  "critical_referred",
  "died",
  "other",
] as const;

export type DischargeCategory = (typeof DISCHARGE_CATEGORIES)[number];

export interface DischargeRecord {
  id: string;
  uid: string;
  source: "discharges" | "babyBackUp";
  hospital?: string;
  dischargeStatus?: string;
  dischargeType?: string;
  /** Outcome category; free-form so callers can group on any labelling. */
  outcome: FieldValue<string>;
  criticalReasons: readonly string[];
  dischargedAt: FieldValue<Date>;
}
