import { BabyMapper } from "../records/baby.js";
import { DischargeMapper } from "../records/discharge.js";
import type { BabyRecord, BabySource, DischargeRecord, DocumentFields } from "../records/types.js";

let sequence = 0;

export const BIRTH = "2025-03-01T00:00:00Z";

export function hoursAfter(iso: string, hours: number): string {
  return new Date(new Date(iso).getTime() + hours * 3_600_000).toISOString();
}

export function daysAfter(iso: string, days: number): string {
  return hoursAfter(iso, days * 24);
}

export function baby(data: DocumentFields, source: BabySource = "baby"): BabyRecord {
  sequence += 1;
  const outcome = new BabyMapper(source).map({ id: `doc-${sequence}`, data });
  if (!outcome.ok) throw new Error(`fixture did not map: ${outcome.error.message}`);
  return outcome.record;
}

export function discharge(data: DocumentFields): DischargeRecord {
  sequence += 1;
  const outcome = new DischargeMapper().map({ id: `dis-${sequence}`, data });
  if (!outcome.ok) throw new Error(`fixture did not map: ${outcome.error.message}`);
  return outcome.record;
}

export function withOutcome(uid: string, outcome: string, hospital = "H1"): DischargeRecord {
  return { ...discharge({ UID: uid, hospitalName: hospital }), outcome: { kind: "present", value: outcome } };
}
