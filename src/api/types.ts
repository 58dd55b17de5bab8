// Query parameter schemas for the dashboard API

import { z } from "zod";
import type { FilterConfig } from "../kpi/filters.js";
import type { FollowUpDay } from "../kpi/followup.js";
import type { RegistrationThreshold } from "../kpi/registration.js";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// Open ends of a one-sided date range
const EARLIEST = new Date(-8.64e15);
const LATEST = new Date(8.64e15);

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

// Accepted calendar for date parameters
const MIN_DATE_MS = Date.UTC(1900, 0, 1);
const MAX_DATE_MS = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

const dateParam = z
  .string()
  .trim()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "must be a date (YYYY-MM-DD) or ISO timestamp" })
  .refine(
    (value) => {
      const start = Date.parse(value);
      const end = endOfRange(value).getTime();
      return start >= MIN_DATE_MS && end <= MAX_DATE_MS;
    },
    { message: "must fall between 1900-01-01 and 9999-12-31" }
  );

/**
 * Upper bound of a `to` parameter: a bare date covers the whole UTC day.
 */
export function endOfRange(value: string): Date {
  const date = new Date(value);
  return DATE_ONLY.test(value) ? new Date(date.getTime() + 86_400_000 - 1) : date;
}

export const filterQuerySchema = z
  .object({
    hospital: optionalText,
    uid: optionalText,
    from: dateParam.optional(),
    to: dateParam.optional(),
    asOf: dateParam.optional(),
  })
  .refine((q) => q.from === undefined || q.to === undefined || new Date(q.from) <= endOfRange(q.to), {
    message: "'from' must not be after 'to'",
    path: ["from"],
  });

export type FilterQuery = z.infer<typeof filterQuerySchema>;

export interface ParsedFilter {
  filter: FilterConfig;
  asOf?: Date;
}

export function toParsedFilter(query: FilterQuery): ParsedFilter {
  const filter: FilterConfig = {};
  if (query.hospital !== undefined) filter.hospital = query.hospital;
  if (query.uid !== undefined) filter.uid = query.uid;
  if (query.from !== undefined || query.to !== undefined) {
    filter.dateRange = {
      start: query.from !== undefined ? new Date(query.from) : EARLIEST,
      end: query.to !== undefined ? endOfRange(query.to) : LATEST,
    };
  }
  return { filter, asOf: query.asOf !== undefined ? new Date(query.asOf) : undefined };
}

export const registrationQuerySchema = z.object({
  threshold: z
    .enum(["12", "24"])
    .default("24")
    .transform((value): RegistrationThreshold => (value === "12" ? 12 : 24)),
});

const FOLLOW_UP_DAY_PARAMS: Record<"2" | "7" | "14" | "28", FollowUpDay> = { "2": 2, "7": 7, "14": 14, "28": 28 };

export const followUpQuerySchema = z.object({
  day: z
    .enum(["2", "7", "14", "28"])
    .default("7")
    .transform((value) => FOLLOW_UP_DAY_PARAMS[value]),
});

export const mortalityQuerySchema = z.object({
  groupBy: z.enum(["none", "hospital", "inborn_outborn", "location", "kmc_stability"]).default("none"),
});

export interface MetricResponse<T> {
  fetchedAt: string;
  asOf?: string;
  filter: FilterConfig;
  metric: T;
}
