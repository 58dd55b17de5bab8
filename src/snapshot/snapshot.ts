import { BabyMapper } from "../records/baby.js";
import { DischargeMapper } from "../records/discharge.js";
import type { BabyRecord, CollectionName, DischargeRecord, RawDocument } from "../records/types.js";
import type { RecordStore } from "../store/record-store.js";

export type RawCollections = Record<CollectionName, readonly RawDocument[]>;

export interface SnapshotQuality {
  /** Documents without a UID, per collection. */
  missingUid: Record<CollectionName, number>;
  /** Baby documents set aside because their UID was already taken. */
  duplicateUids: number;
  /** Records dropped because their hospital name contains a test term. */
  testHospitalBabies: number;
  testHospitalDischarges: number;
  /** Discharge records derived from babyBackUp status strings. */
  derivedDischarges: number;
  /** Babies marked dead whose discharge outcome is stable_home. */
  deadWithSuccessfulDischarge: number;
}

/**
 * Typed, frozen view of the three collections at one point in time.
 */
export interface Snapshot {
  fetchedAt: Date;
  babies: readonly BabyRecord[];
  discharges: readonly DischargeRecord[];
  hospitals: readonly string[];
  quality: SnapshotQuality;
}

export interface SnapshotOptions {
  /** Lowercase terms marking a hospital as a test or training site. */
  excludedHospitalTerms: readonly string[];
}

export async function fetchCollections(store: RecordStore): Promise<RawCollections> {
  // One collection at a time
  const baby = await store.fetch("baby");
  const babyBackUp = await store.fetch("babyBackUp");
  const discharges = await store.fetch("discharges");
  return { baby, babyBackUp, discharges };
}

function isTestHospital(hospital: string | undefined, terms: readonly string[]): boolean {
  if (hospital === undefined) return false;
  const name = hospital.toLowerCase();
  return terms.some((term) => name.includes(term));
}

/** Freezes a record together with every array and object it holds. */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((nested: unknown) => deepFreeze(nested));
  }
  return value;
}

export function buildSnapshot(raw: RawCollections, options: SnapshotOptions, fetchedAt: Date): Snapshot {
  const quality: SnapshotQuality = {
    missingUid: { baby: 0, babyBackUp: 0, discharges: 0 },
    duplicateUids: 0,
    testHospitalBabies: 0,
    testHospitalDischarges: 0,
    derivedDischarges: 0,
    deadWithSuccessfulDischarge: 0,
  };
  const terms = options.excludedHospitalTerms;

  const babies: BabyRecord[] = [];
  const backups: BabyRecord[] = [];
  const seenUids = new Set<string>();

  for (const source of ["baby", "babyBackUp"] as const) {
    const mapper = new BabyMapper(source);
    for (const document of raw[source]) {
      const outcome = mapper.map(document);
      if (!outcome.ok) {
        quality.missingUid[source] += 1;
        continue;
      }
      const record = outcome.record;
      if (isTestHospital(record.hospital, terms)) {
        quality.testHospitalBabies += 1;
        continue;
      }
      if (source === "babyBackUp") backups.push(record);
      if (seenUids.has(record.uid)) {
        quality.duplicateUids += 1;
        continue;
      }
      seenUids.add(record.uid);
      babies.push(deepFreeze(record));
    }
  }

  const dischargeMapper = new DischargeMapper();
  const discharges: DischargeRecord[] = [];
  for (const document of raw.discharges) {
    const outcome = dischargeMapper.map(document);
    if (!outcome.ok) {
      quality.missingUid.discharges += 1;
      continue;
    }
    if (isTestHospital(outcome.record.hospital, terms)) {
      quality.testHospitalDischarges += 1;
      continue;
    }
    discharges.push(deepFreeze(outcome.record));
  }

  // A discharge without an outcome does not stand in for the backup's status
  const dischargedUids = new Set(discharges.filter((d) => d.outcome.kind === "present").map((d) => d.uid));
  for (const backup of backups) {
    if (dischargedUids.has(backup.uid)) continue;
    const derived = dischargeMapper.fromBackup(backup);
    if (!derived) continue;
    dischargedUids.add(derived.uid);
    discharges.push(deepFreeze(derived));
    quality.derivedDischarges += 1;
  }

  const deadUids = new Set(
    babies.filter((b) => b.deadBaby.kind === "present" && b.deadBaby.value).map((b) => b.uid)
  );
  quality.deadWithSuccessfulDischarge = discharges.filter(
    (d) => deadUids.has(d.uid) && d.outcome.kind === "present" && d.outcome.value === "stable_home"
  ).length;

  const hospitals = new Set<string>();
  for (const record of [...babies, ...discharges]) {
    if (record.hospital !== undefined) hospitals.add(record.hospital);
  }

  return Object.freeze({
    fetchedAt,
    babies: Object.freeze(babies),
    discharges: Object.freeze(discharges),
    hospitals: Object.freeze([...hospitals].sort()),
    quality: deepFreeze(quality),
  });
}
