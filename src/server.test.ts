import type { Server } from "http";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { DashboardService } from "./dashboard/dashboard-service.js";
import { UpstreamFetchError } from "./errors.js";
import { createServer } from "./server.js";
import { InMemoryRecordStore } from "./testing/memory-store.js";

const store = new InMemoryRecordStore({
  baby: [
    {
      UID: "A",
      hospitalName: "H1",
      placeOfDelivery: "this hospital",
      dateOfBirth: "2025-03-01T06:00:00Z",
      registrationDate: "2025-03-01T18:00:00Z",
    },
    {
      UID: "B",
      hospitalName: "H2",
      placeOfDelivery: "this hospital",
      dateOfBirth: "2025-03-02T06:00:00Z",
      registrationDate: "2025-03-02T08:00:00Z",
    },
  ],
  discharges: [{ UID: "A", hospitalName: "H1", dischargeStatus: "Critical", dischargeType: "Referred" }],
});

let service: DashboardService;
let server: Server;
let baseUrl = "";

beforeAll(async () => {
  service = new DashboardService(store, { snapshotTtlMs: 0, excludedHospitalTerms: [] });
  server = createServer(service).listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  store.failing.clear();
});

async function get(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${path}`, init);
  const contentType = response.headers.get("content-type") ?? "";
  const body: unknown = contentType.includes("json") ? await response.json() : await response.text();
  return { status: response.status, body };
}

describe("dashboard HTTP API", () => {
  it("answers health checks", async () => {
    const { status, body } = await get("/health");

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: "ok" });
  });

  it("serves one metric for a filtered view", async () => {
    const { status, body } = await get("/api/kpi/discharge-outcomes?hospital=H1");

    expect(status).toBe(200);
    expect(body).toMatchObject({
      filter: { hospital: "H1" },
      metric: { total: 1, breakdown: { critical_referred: { percentage: 100 } } },
    });
  });

  it("covers the whole day named by `to`", async () => {
    const { body } = await get("/api/kpi/registration-timeliness?threshold=12&from=2025-03-01&to=2025-03-01");

    expect(body).toMatchObject({ metric: { withinThreshold: 1, totalConsidered: 1, value: 1 } });
  });

  it("lists hospitals for the selector", async () => {
    const { body } = await get("/api/hospitals");

    expect(body).toEqual({ hospitals: ["H1", "H2"] });
  });

  it("rejects an unsupported threshold with 400", async () => {
    const { status, body } = await get("/api/kpi/registration-timeliness?threshold=13");

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: "Invalid query parameters" });
  });

  it("rejects a reversed date range with 400", async () => {
    const { status } = await get("/api/dashboard?from=2025-05-01&to=2025-04-01");

    expect(status).toBe(400);
  });

  it("rejects a date past the end of the calendar with 400", async () => {
    const { status, body } = await get("/api/dashboard?to=275760-09-13");

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: "Invalid query parameters" });
  });

  it("maps an upstream failure to 502 naming the collection", async () => {
    store.failing.set("babyBackUp", new UpstreamFetchError("babyBackUp", 3, new Error("timeout")));

    const { status, body } = await get("/api/kpi/mortality?groupBy=hospital");

    expect(status).toBe(502);
    expect(body).toMatchObject({ code: "UPSTREAM_FETCH", collection: "babyBackUp" });
  });

  it("refreshes the snapshot on request", async () => {
    const { status, body } = await get("/api/snapshot/refresh", { method: "POST" });

    expect(status).toBe(200);
    expect(body).toMatchObject({ babies: 2, discharges: 1, hospitals: 2 });
  });

  it("exposes Prometheus metrics", async () => {
    const { status, body } = await get("/metrics");

    expect(status).toBe(200);
    expect(typeof body === "string" && body.includes("kmc_snapshot_refresh_total")).toBe(true);
  });
});
