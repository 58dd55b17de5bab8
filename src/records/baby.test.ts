import { describe, expect, it } from "vitest";
import { BabyMapper, checkKmcStability } from "./baby.js";
import { present } from "./fields.js";
import type { FieldValue } from "./types.js";

const mapper = new BabyMapper("baby");

describe("BabyMapper", () => {
  it("maps a complete document", () => {
    const outcome = mapper.map({
      id: "doc-1",
      data: {
        UID: "B1",
        hospitalName: "H1",
        currentLocationOfTheBaby: "SNCU",
        placeOfDelivery: "This Hospital",
        dateOfBirth: "2025-03-01T00:00:00Z",
        registrationDataType: { registrationDate: "2025-03-01T10:00:00Z" },
        deadBaby: false,
        babyInProgram: true,
        lastDischargeType: "home",
        lastDischargeDate: "2025-03-05T00:00:00Z",
        observationDay: [
          { ageDay: 0, totalKMCtimeDay: 0 },
          { ageDay: 1, totalKMCtimeDay: 120, kmcfilledcorrectly: true },
          "not an object",
        ],
        followUp: [{ followUpNumber: 2, date: "2025-03-08T00:00:00Z", numberSkinContact: "4" }],
      },
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    const baby = outcome.record;
    expect(baby.uid).toBe("B1");
    expect(baby.source).toBe("baby");
    expect(baby.inborn).toEqual({ kind: "present", value: true });
    expect(baby.registeredAt).toEqual({ kind: "present", value: new Date("2025-03-01T10:00:00Z") });
    expect(baby.dischargedAt).toEqual({ kind: "present", value: new Date("2025-03-05T00:00:00Z") });
    expect(baby.observationDays).toHaveLength(2);
    expect(baby.observationDays[1]?.kmcFilledCorrectly).toBe(true);
    expect(baby.followUps[0]?.numberSkinContact).toBe(4);
    expect(baby.kmcStability).toEqual({ kind: "present", value: "stable" });
    expect(baby.inProgram).toBe(true);
  });

  it("reports a missing UID instead of inventing one", () => {
    const outcome = mapper.map({ id: "doc-2", data: { hospitalName: "H1" } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.field).toBe("UID");
    expect(outcome.error.code).toBe("MISSING_FIELD");
  });

  it("treats an absent dead flag as alive and a non-boolean one as malformed", () => {
    const alive = mapper.map({ id: "a", data: { UID: "A" } });
    const odd = mapper.map({ id: "b", data: { UID: "B", deadBaby: "yes" } });

    expect(alive.ok && alive.record.deadBaby).toEqual({ kind: "present", value: false });
    expect(odd.ok && odd.record.deadBaby).toEqual({ kind: "malformed", raw: "yes" });
  });

  it("keeps an unreadable or negative KMC time as malformed and an absent one as missing", () => {
    const outcome = mapper.map({
      id: "e",
      data: {
        UID: "E",
        observationDay: [{ ageDay: 0, totalKMCtimeDay: "90 min" }, { ageDay: 1, totalKMCtimeDay: -5 }, { ageDay: 2 }],
      },
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.record.observationDays.map((day) => day.totalKmcMinutes)).toEqual([
      { kind: "malformed", raw: "90 min" },
      { kind: "malformed", raw: -5 },
      { kind: "missing" },
    ]);
    expect(outcome.record.kmcStability).toEqual({ kind: "malformed", raw: "90 min" });
  });

  it("classifies delivery places other than this hospital as outborn", () => {
    const outborn = mapper.map({ id: "c", data: { UID: "C", placeOfDelivery: "District hospital" } });
    const unknown = mapper.map({ id: "d", data: { UID: "D" } });

    expect(outborn.ok && outborn.record.inborn).toEqual({ kind: "present", value: false });
    expect(unknown.ok && unknown.record.inborn).toEqual({ kind: "missing" });
  });
});

describe("checkKmcStability", () => {
  const day = (minutes: number | FieldValue<number>, extra: Partial<{ unstableForKmc: boolean; dangerSign: string }> = {}) => ({
    ageDay: { kind: "present" as const, value: 0 },
    totalKmcMinutes: typeof minutes === "number" ? present(minutes) : minutes,
    unstableForKmc: extra.unstableForKmc ?? false,
    dangerSign: extra.dangerSign ?? "",
    mneComment: "",
  });

  it("is unstable without any KMC time", () => {
    expect(checkKmcStability([])).toEqual(present("unstable"));
    expect(checkKmcStability([day(0)])).toEqual(present("unstable"));
  });

  it("is unstable when a day is flagged or carries the instability sign", () => {
    expect(checkKmcStability([day(60), day(30, { unstableForKmc: true })])).toEqual(present("unstable"));
    expect(checkKmcStability([day(60, { dangerSign: "केएमसी के लिए अस्थिर 🦘🚫" })])).toEqual(present("unstable"));
  });

  it("is stable with KMC time and no flags", () => {
    expect(checkKmcStability([day(60)])).toEqual(present("stable"));
    expect(checkKmcStability([day(60), day({ kind: "malformed", raw: "90 min" })])).toEqual(present("stable"));
  });

  it("is unknown when the only KMC time logged cannot be read", () => {
    expect(checkKmcStability([day(0), day({ kind: "malformed", raw: "90 min" })])).toEqual({
      kind: "malformed",
      raw: "90 min",
    });
  });
});
