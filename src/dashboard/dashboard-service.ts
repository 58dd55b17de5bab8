import { AuditLogger } from "../audit/audit-logger.js";
import type { FilterConfig } from "../kpi/filters.js";
import { childLogger } from "../observability/logger.js";
import { recomputeDurationSeconds, snapshotRecords, snapshotRefreshTotal } from "../observability/metrics.js";
import { buildSnapshot, fetchCollections, type Snapshot, type SnapshotOptions } from "../snapshot/snapshot.js";
import type { RecordStore } from "../store/record-store.js";
import { computeDashboard, type DashboardReport } from "./report.js";

const log = childLogger("dashboard-service");

export interface DashboardServiceOptions extends SnapshotOptions {
  /** How long a snapshot is served before the next request refreshes it. */
  snapshotTtlMs: number;
}

/**
 * Owns the cached snapshot and runs recomputation passes over it.
 */
export class DashboardService {
  private current: Snapshot | undefined;
  private inFlight: Promise<Snapshot> | undefined;

  constructor(
    private readonly store: RecordStore,
    private readonly options: DashboardServiceOptions,
    private readonly audit: AuditLogger = new AuditLogger(),
    readonly now: () => Date = () => new Date()
  ) {}

  get cachedSnapshot(): Snapshot | undefined {
    return this.current;
  }

  /** The cached snapshot while it is fresh, otherwise a refreshed one. */
  async snapshot(): Promise<Snapshot> {
    const cached = this.current;
    if (cached && this.now().getTime() - cached.fetchedAt.getTime() < this.options.snapshotTtlMs) {
      return cached;
    }
    return this.refresh();
  }

  /**
   * Fetches and rebuilds the snapshot. Callers arriving while a refresh is
   * running share it. A failed refresh leaves no snapshot cached.
   */
  refresh(): Promise<Snapshot> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async load(): Promise<Snapshot> {
    const started = Date.now();
    try {
      const raw = await fetchCollections(this.store);
      const snapshot = buildSnapshot(raw, this.options, this.now());
      this.current = snapshot;

      snapshotRefreshTotal.inc({ outcome: "success" });
      snapshotRecords.set({ collection: "babies" }, snapshot.babies.length);
      snapshotRecords.set({ collection: "discharges" }, snapshot.discharges.length);
      this.audit.logRefreshSucceeded(snapshot, Date.now() - started);
      return snapshot;
    } catch (err) {
      this.current = undefined;
      snapshotRefreshTotal.inc({ outcome: "error" });
      snapshotRecords.reset();
      this.audit.logRefreshFailed(err, Date.now() - started);
      throw err;
    }
  }

  /**
   * Runs one computation over the current snapshot, timed under `view`.
   */
  async compute<T>(view: string, fn: (snapshot: Snapshot) => T): Promise<T> {
    const snapshot = await this.snapshot();
    const end = recomputeDurationSeconds.startTimer({ view });
    try {
      return fn(snapshot);
    } finally {
      const seconds = end();
      log.debug({ view, seconds }, "Recomputed");
    }
  }

  report(filter: FilterConfig, asOf: Date = this.now()): Promise<DashboardReport> {
    return this.compute("dashboard", (snapshot) => computeDashboard(snapshot, filter, asOf));
  }
}
