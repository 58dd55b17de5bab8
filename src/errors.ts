export type ErrorCode =
  | "MISSING_FIELD"
  | "MALFORMED_VALUE"
  | "UPSTREAM_FETCH";

/**
 * Base class for every error this service raises or records.
 */
export class KmcDashboardError extends Error {
  constructor(message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A record cannot take part in a metric because of its own content.
 * These are never thrown out of the engine: they are counted in the
 * exclusion tally of the metric that hit them.
 */
export abstract class DataQualityError extends KmcDashboardError {
  constructor(
    message: string,
    code: "MISSING_FIELD" | "MALFORMED_VALUE",
    public readonly field: string,
    public readonly uid?: string
  ) {
    super(message, code);
  }
}

export class MissingFieldError extends DataQualityError {
  constructor(field: string, uid?: string) {
    super(`Record ${uid ?? "<no UID>"} is missing '${field}'`, "MISSING_FIELD", field, uid);
  }
}

export class MalformedValueError extends DataQualityError {
  constructor(field: string, uid: string | undefined, public readonly raw: unknown) {
    super(`Record ${uid ?? "<no UID>"} has an unreadable '${field}': ${describeRaw(raw)}`, "MALFORMED_VALUE", field, uid);
  }
}

/**
 * The record store could not deliver a complete collection.
 */
export class UpstreamFetchError extends KmcDashboardError {
  constructor(public readonly collection: string, public readonly attempts: number, cause: unknown) {
    super(
      `Failed to load collection '${collection}' after ${attempts} attempt(s): ${errorMessage(cause)}`,
      "UPSTREAM_FETCH",
      { cause }
    );
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function describeRaw(raw: unknown): string {
  const text = typeof raw === "string" ? `'${raw}'` : JSON.stringify(raw) ?? String(raw);
  return text.length > 80 ? `${text.substring(0, 77)}...` : text;
}
