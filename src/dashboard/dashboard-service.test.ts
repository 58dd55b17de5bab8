import { describe, expect, it } from "vitest";
import { UpstreamFetchError } from "../errors.js";
import { BIRTH, hoursAfter } from "../testing/fixtures.js";
import { InMemoryRecordStore } from "../testing/memory-store.js";
import { DashboardService } from "./dashboard-service.js";

const options = { snapshotTtlMs: 60_000, excludedHospitalTerms: ["test"] };

function setup() {
  const store = new InMemoryRecordStore({
    baby: [
      {
        UID: "A",
        hospitalName: "H1",
        placeOfDelivery: "this hospital",
        dateOfBirth: BIRTH,
        registrationDate: hoursAfter(BIRTH, 6),
        deadBaby: false,
      },
      {
        UID: "B",
        hospitalName: "H2",
        placeOfDelivery: "this hospital",
        dateOfBirth: BIRTH,
        registrationDate: hoursAfter(BIRTH, 30),
        deadBaby: true,
      },
    ],
    discharges: [{ UID: "A", hospitalName: "H1", dischargeStatus: "Stable", dischargeType: "Home" }],
  });
  const clock = { now: new Date("2025-04-01T00:00:00Z") };
  const service = new DashboardService(store, options, undefined, () => clock.now);
  return { store, clock, service };
}

describe("DashboardService", () => {
  it("serves the cached snapshot until it expires", async () => {
    const { store, clock, service } = setup();

    const first = await service.snapshot();
    clock.now = new Date("2025-04-01T00:00:59Z");
    const second = await service.snapshot();
    clock.now = new Date("2025-04-01T00:01:00Z");
    const third = await service.snapshot();

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(store.fetches).toHaveLength(6);
  });

  it("shares one refresh between concurrent callers", async () => {
    const { store, service } = setup();

    const [a, b] = await Promise.all([service.refresh(), service.refresh()]);

    expect(a).toBe(b);
    expect(store.fetches).toEqual(["baby", "babyBackUp", "discharges"]);
  });

  it("drops the cached snapshot when a refresh fails", async () => {
    const { store, service } = setup();
    await service.snapshot();
    const failure = new UpstreamFetchError("discharges", 3, new Error("connection refused"));
    store.failing.set("discharges", failure);

    await expect(service.refresh()).rejects.toBe(failure);
    expect(service.cachedSnapshot).toBeUndefined();

    store.failing.clear();
    const recovered = await service.snapshot();
    expect(recovered.babies).toHaveLength(2);
  });

  it("computes the dashboard for a filter", async () => {
    const { service } = setup();

    const report = await service.report({ hospital: "H1" });

    expect(report.records).toEqual({ babies: 1, discharges: 1 });
    expect(report.registrationTimeliness["12h"]?.value).toBe(1);
    expect(report.dischargeOutcomes.breakdown.stable_home?.percentage).toBe(100);
    expect(report.mortality.none.value).toBe(0);
    expect(report.asOf).toBe("2025-04-01T00:00:00.000Z");
  });

  it("reports no data everywhere for a hospital without records", async () => {
    const { service } = setup();

    const report = await service.report({ hospital: "Nowhere" });

    expect(report.registrationTimeliness["24h"]?.status).toBe("no_data");
    expect(report.kmcInitiation.status).toBe("no_data");
    expect(report.followUp.day7?.status).toBe("no_data");
    expect(report.dischargeOutcomes.status).toBe("no_data");
    expect(report.mortality.none.status).toBe("no_data");
    expect(report.mortality.hospital.breakdown.Nowhere?.value).toBeUndefined();
  });

  it("returns the same result for the same snapshot and filter", async () => {
    const { service } = setup();
    const asOf = new Date("2025-04-01T00:00:00Z");

    const first = await service.report({}, asOf);
    const second = await service.report({}, asOf);

    expect(second).toEqual(first);
    expect(first.mortality.hospital.breakdown.H2?.value).toBe(1);
  });

  it("keeps reporting when one record's day of life cannot be placed on the calendar", async () => {
    const store = new InMemoryRecordStore({
      baby: [
        {
          UID: "A",
          hospitalName: "H1",
          currentLocationOfTheBaby: "SNCU",
          dateOfBirth: BIRTH,
          observationDay: [{ ageDay: 1, totalKMCtimeDay: 60 }],
        },
        {
          UID: "Z",
          hospitalName: "H1",
          currentLocationOfTheBaby: "SNCU",
          dateOfBirth: BIRTH,
          observationDay: [{ ageDay: 1e12, totalKMCtimeDay: 60 }],
        },
      ],
    });
    const service = new DashboardService(store, options, undefined, () => new Date("2025-03-04T00:00:00Z"));

    const report = await service.report({});

    expect(report.kmcByLocation.rows.map((row) => row.babyCount)).toEqual([1]);
    expect(report.kmcByLocation.exclusions.byField).toEqual({ "observationDay.ageDay": { missing: 0, malformed: 1 } });
    expect(report.dailyKmc.excludedCount).toBe(1);
  });
});
