import { MissingFieldError } from "../errors.js";
import {
  MISSING,
  firstPresent,
  isRecord,
  present,
  readArray,
  readBoolean,
  readNumber,
  readString,
  readTimestamp,
} from "./fields.js";
import type {
  BabyRecord,
  BabySource,
  DocumentFields,
  FieldValue,
  FollowUpEntry,
  KmcStability,
  ObservationDay,
  RawDocument,
} from "./types.js";

export type MapOutcome<T> = { ok: true; record: T } | { ok: false; error: MissingFieldError };

// Delivery place values the data-entry app writes for inborn babies
const INBORN_PLACES = new Set(["this hospital", "यह अस्पताल"]);

export const KMC_MINUTES_FIELD = "observationDay.totalKMCtimeDay";

const KMC_UNSTABLE_SIGNS = ["केएमसी के लिए अस्थिर", "unstable for kmc"];

export class BabyMapper {
  constructor(private readonly source: BabySource) {}

  map(raw: RawDocument): MapOutcome<BabyRecord> {
    const doc: DocumentFields = isRecord(raw.data) ? raw.data : {};
    const uid = readString(doc, "UID");
    if (!uid) {
      return { ok: false, error: new MissingFieldError("UID", undefined) };
    }

    const observationDays = readArray(doc.observationDay)
      .filter(isRecord)
      .map(mapObservationDay);
    const followUps = readArray(doc.followUp)
      .filter(isRecord)
      .map(mapFollowUp);

    const registrationGroup = isRecord(doc.registrationDataType) ? doc.registrationDataType : {};

    return {
      ok: true,
      record: {
        id: raw.id,
        uid,
        source: this.source,
        hospital: readString(doc, "hospitalName"),
        location: readString(doc, "currentLocationOfTheBaby"),
        motherName: readString(doc, "motherName"),
        dangerSigns: readString(doc, "dangerSigns"),
        nurseName: readString(doc, "nurseName"),
        birthAt: readTimestamp(doc.dateOfBirth),
        registeredAt: firstPresent(
          readTimestamp(doc.registrationDate),
          readTimestamp(registrationGroup.registrationDate)
        ),
        inborn: readInborn(doc.placeOfDelivery),
        deadBaby: readDeadFlag(doc.deadBaby),
        inProgram: doc.babyInProgram === true,
        discharged: doc.discharged === true,
        lastDischargeType: readString(doc, "lastDischargeType"),
        dischargedAt: firstPresent(
          readTimestamp(doc.dischargeDate),
          readTimestamp(doc.lastDischargeDate),
          readTimestamp(doc.actualDischargeDate)
        ),
        dischargedStatusString: readString(doc, "dischargedStatusString"),
        observationDays,
        followUps,
        kmcStability: checkKmcStability(observationDays),
      },
    };
  }
}

function readInborn(raw: unknown): FieldValue<boolean> {
  if (raw === undefined || raw === null) return MISSING;
  if (typeof raw !== "string") return { kind: "malformed", raw };
  const place = raw.trim().toLowerCase();
  if (place.length === 0) return MISSING;
  return present(INBORN_PLACES.has(place));
}

// An absent flag means the baby is not recorded as dead
function readDeadFlag(raw: unknown): FieldValue<boolean> {
  const flag = readBoolean(raw);
  return flag.kind === "missing" ? present(false) : flag;
}

function readAgeDay(raw: unknown): FieldValue<number> {
  if (raw === undefined || raw === null) return MISSING;
  const value = readNumber(raw);
  return value === undefined || value < 0 ? { kind: "malformed", raw } : present(value);
}

// Absent means no KMC was logged that day; anything unreadable or negative is malformed
function readKmcMinutes(raw: unknown): FieldValue<number> {
  if (raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "")) return MISSING;
  const value = readNumber(raw);
  return value === undefined || value < 0 ? { kind: "malformed", raw } : present(value);
}

function mapObservationDay(doc: DocumentFields): ObservationDay {
  const filledCorrectly = doc.filledCorrectly ?? doc.filledcorrectly;
  const kmcFilledCorrectly = doc.kmcfilledcorrectly;
  return {
    ageDay: readAgeDay(doc.ageDay),
    date: readString(doc, "date"),
    totalKmcMinutes: readKmcMinutes(doc.totalKMCtimeDay),
    unstableForKmc: doc.unstableForKMC === true,
    dangerSign: typeof doc.dangerSign === "string" ? doc.dangerSign : "",
    filledCorrectly: typeof filledCorrectly === "boolean" ? filledCorrectly : undefined,
    kmcFilledCorrectly:
      typeof kmcFilledCorrectly === "boolean" || typeof kmcFilledCorrectly === "string"
        ? kmcFilledCorrectly
        : undefined,
    filledIncorrectly: typeof doc.filledincorrectly === "boolean" ? doc.filledincorrectly : undefined,
    mneComment: typeof doc.mnecomment === "string" ? doc.mnecomment.trim() : "",
  };
}

function mapFollowUp(doc: DocumentFields): FollowUpEntry {
  return {
    followUpNumber: readNumber(doc.followUpNumber),
    date: readTimestamp(doc.date),
    totalKmcMinutes: readNumber(doc.totalKMCTime),
    numberSkinContact: readNumber(doc.numberSkinContact),
    kmcHours: readNumber(doc.kmcHours),
    nurseName: readString(doc, "nurseName"),
  };
}

/** Minutes logged on the day; zero when none were recorded or the value is unreadable. */
export function loggedKmcMinutes(day: ObservationDay): number {
  return day.totalKmcMinutes.kind === "present" ? day.totalKmcMinutes.value : 0;
}

/** Days with KMC time logged, plus days whose logged time cannot be read. */
export function kmcSessions(days: readonly ObservationDay[]): ObservationDay[] {
  return days.filter((day) => day.totalKmcMinutes.kind === "malformed" || loggedKmcMinutes(day) > 0);
}

/**
 * A baby is unstable for KMC when any day flags it, a danger sign marks
 * KMC instability, or no KMC time was ever logged. With no readable KMC
 * time and an unreadable day, stability is unknown and reported malformed.
 */
export function checkKmcStability(days: readonly ObservationDay[]): FieldValue<KmcStability> {
  let totalMinutes = 0;
  let unreadable: FieldValue<KmcStability> | undefined;
  for (const day of days) {
    if (day.unstableForKmc) return present("unstable");
    const sign = day.dangerSign.toLowerCase();
    if (KMC_UNSTABLE_SIGNS.some((marker) => sign.includes(marker))) return present("unstable");
    if (day.totalKmcMinutes.kind === "malformed") unreadable ??= { kind: "malformed", raw: day.totalKmcMinutes.raw };
    totalMinutes += loggedKmcMinutes(day);
  }
  if (totalMinutes > 0) return present("stable");
  return unreadable ?? present("unstable");
}
