import { describe, expect, it } from "vitest";
import {
  endOfRange,
  filterQuerySchema,
  followUpQuerySchema,
  registrationQuerySchema,
  toParsedFilter,
} from "./types.js";

describe("filter query", () => {
  it("extends a bare `to` date to the end of that UTC day", () => {
    expect(endOfRange("2025-03-01").toISOString()).toBe("2025-03-01T23:59:59.999Z");
    expect(endOfRange("2025-03-01T12:00:00Z").toISOString()).toBe("2025-03-01T12:00:00.000Z");
  });

  it("builds a filter from the recognised parameters", () => {
    const parsed = toParsedFilter(
      filterQuerySchema.parse({ hospital: " H1 ", uid: "", from: "2025-03-01", to: "2025-03-31", asOf: "2025-04-02" })
    );

    expect(parsed.filter).toEqual({
      hospital: "H1",
      dateRange: { start: new Date("2025-03-01T00:00:00Z"), end: new Date("2025-03-31T23:59:59.999Z") },
    });
    expect(parsed.asOf).toEqual(new Date("2025-04-02T00:00:00Z"));
  });

  it("leaves the date range open on the side not given", () => {
    const { filter } = toParsedFilter(filterQuerySchema.parse({ from: "2025-03-01" }));

    expect(filter.dateRange?.start).toEqual(new Date("2025-03-01T00:00:00Z"));
    expect(filter.dateRange?.end.getTime()).toBe(8.64e15);
  });

  it("rejects unreadable dates and a reversed range", () => {
    expect(filterQuerySchema.safeParse({ from: "yesterday" }).success).toBe(false);
    expect(filterQuerySchema.safeParse({ from: "2025-04-01", to: "2025-03-01" }).success).toBe(false);
    expect(filterQuerySchema.safeParse({ from: "2025-03-01", to: "2025-03-01" }).success).toBe(true);
  });

  it("rejects dates outside the accepted calendar", () => {
    expect(filterQuerySchema.safeParse({ to: "275760-09-13" }).success).toBe(false);
    expect(filterQuerySchema.safeParse({ asOf: "+275760-09-13T00:00:00Z" }).success).toBe(false);
    expect(filterQuerySchema.safeParse({ from: "1899-12-31" }).success).toBe(false);
    expect(filterQuerySchema.safeParse({ to: "9999-12-31" }).success).toBe(true);
  });
});

describe("metric parameters", () => {
  it("accepts only the supported thresholds and follow-up days", () => {
    expect(registrationQuerySchema.parse({}).threshold).toBe(24);
    expect(registrationQuerySchema.parse({ threshold: "12" }).threshold).toBe(12);
    expect(registrationQuerySchema.safeParse({ threshold: "13" }).success).toBe(false);
    expect(followUpQuerySchema.parse({ day: "28" }).day).toBe(28);
    expect(followUpQuerySchema.safeParse({ day: "3" }).success).toBe(false);
  });
});
