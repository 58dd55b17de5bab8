import type { Logger } from "pino";
import { KmcDashboardError, errorMessage } from "../errors.js";
import { logger as rootLogger } from "../observability/logger.js";
import type { Snapshot, SnapshotQuality } from "../snapshot/snapshot.js";

export interface RefreshResult {
  status: "success" | "error";
  babies?: number;
  discharges?: number;
  hospitals?: number;
  error?: string;
  errorCode?: string;
  durationMs: number;
}

export interface AuditEvent {
  eventType: "snapshot_refresh" | "data_quality";
  source: string;
  timestamp: string;
  result?: RefreshResult;
  metadata?: Record<string, unknown>;
}

/**
 * Audit trail for snapshot refreshes and the data-quality findings of
 * each snapshot.
 */
export class AuditLogger {
  constructor(
    private readonly source = "kmc-dashboard",
    private readonly logger: Logger = rootLogger
  ) {}

  logRefreshSucceeded(snapshot: Snapshot, durationMs: number): void {
    const event: AuditEvent = {
      eventType: "snapshot_refresh",
      source: this.source,
      timestamp: new Date().toISOString(),
      result: {
        status: "success",
        babies: snapshot.babies.length,
        discharges: snapshot.discharges.length,
        hospitals: snapshot.hospitals.length,
        durationMs,
      },
      metadata: { fetchedAt: snapshot.fetchedAt.toISOString() },
    };

    this.logger.info(
      { event: "snapshot_refresh", ...event },
      `Snapshot refreshed: ${snapshot.babies.length} babies, ${snapshot.discharges.length} discharges`
    );
    this.logDataQuality(snapshot.quality);
  }

  logRefreshFailed(error: unknown, durationMs: number): void {
    const event: AuditEvent = {
      eventType: "snapshot_refresh",
      source: this.source,
      timestamp: new Date().toISOString(),
      result: {
        status: "error",
        error: errorMessage(error),
        errorCode: error instanceof KmcDashboardError ? error.code : undefined,
        durationMs,
      },
    };

    this.logger.error({ event: "snapshot_refresh", ...event }, `Snapshot refresh failed: ${errorMessage(error)}`);
  }

  /**
   * Warns only when the snapshot set records aside or found inconsistent ones.
   */
  logDataQuality(quality: SnapshotQuality): void {
    const missingUid = quality.missingUid.baby + quality.missingUid.babyBackUp + quality.missingUid.discharges;
    const flagged = missingUid + quality.duplicateUids + quality.deadWithSuccessfulDischarge;
    if (flagged === 0) return;

    const event: AuditEvent = {
      eventType: "data_quality",
      source: this.source,
      timestamp: new Date().toISOString(),
      metadata: { ...quality },
    };
    this.logger.warn(
      { event: "data_quality", ...event },
      `Snapshot data quality: ${missingUid} without UID, ${quality.duplicateUids} duplicate UID(s), ` +
        `${quality.deadWithSuccessfulDischarge} dead with stable discharge`
    );
  }
}
