import { Request, Response } from "express";
import { ZodError } from "zod";
import type { DashboardService } from "../../dashboard/dashboard-service.js";
import { mortalityKnownKeys, selectView } from "../../dashboard/report.js";
import { UpstreamFetchError } from "../../errors.js";
import { DISCHARGE_CATEGORIES } from "../../records/types.js";
import { dischargeOutcomes } from "../../kpi/discharge-outcomes.js";
import { followUpCompletion } from "../../kpi/followup.js";
import { kmcInitiationTiming } from "../../kpi/initiation.js";
import { mortalityRate } from "../../kpi/mortality.js";
import { registrationTimeliness } from "../../kpi/registration.js";
import { childLogger } from "../../observability/logger.js";
import type { Snapshot } from "../../snapshot/snapshot.js";
import {
  filterQuerySchema,
  followUpQuerySchema,
  mortalityQuerySchema,
  registrationQuerySchema,
  toParsedFilter,
  type MetricResponse,
  type ParsedFilter,
} from "../types.js";

const log = childLogger("dashboard-api");

export class DashboardController {
  constructor(private readonly service: DashboardService) {}

  /**
   * GET /api/dashboard?hospital=&from=&to=&uid=&asOf=
   */
  async dashboard(req: Request, res: Response): Promise<void> {
    try {
      const { filter, asOf } = toParsedFilter(filterQuerySchema.parse(req.query));
      const report = await this.service.report(filter, asOf);
      res.status(200).json(report);
    } catch (err) {
      this.handleError(res, err);
    }
  }

  /**
   * GET /api/kpi/registration-timeliness?threshold=12|24
   */
  async registrationTimeliness(req: Request, res: Response): Promise<void> {
    await this.metric(req, res, "registration-timeliness", () => {
      const { threshold } = registrationQuerySchema.parse(req.query);
      return (snapshot, { filter }) => registrationTimeliness(selectView(snapshot, filter).babies, threshold);
    });
  }

  /**
   * GET /api/kpi/kmc-initiation
   */
  async kmcInitiation(req: Request, res: Response): Promise<void> {
    await this.metric(req, res, "kmc-initiation", () => (snapshot, { filter }) =>
      kmcInitiationTiming(selectView(snapshot, filter).babies)
    );
  }

  /**
   * GET /api/kpi/follow-up?day=2|7|14|28
   */
  async followUp(req: Request, res: Response): Promise<void> {
    await this.metric(req, res, "follow-up", () => {
      const { day } = followUpQuerySchema.parse(req.query);
      return (snapshot, { filter, asOf }) =>
        followUpCompletion(selectView(snapshot, filter).babies, day, asOf ?? this.service.now());
    });
  }

  /**
   * GET /api/kpi/discharge-outcomes
   */
  async dischargeOutcomes(req: Request, res: Response): Promise<void> {
    await this.metric(req, res, "discharge-outcomes", () => (snapshot, { filter }) =>
      dischargeOutcomes(selectView(snapshot, filter).discharges, DISCHARGE_CATEGORIES)
    );
  }

  /**
   * GET /api/kpi/mortality?groupBy=none|hospital|inborn_outborn|location|kmc_stability
   */
  async mortality(req: Request, res: Response): Promise<void> {
    await this.metric(req, res, "mortality", () => {
      const { groupBy } = mortalityQuerySchema.parse(req.query);
      return (snapshot, { filter }) =>
        mortalityRate(selectView(snapshot, filter).babies, groupBy, mortalityKnownKeys(snapshot, filter, groupBy));
    });
  }

  /**
   * GET /api/hospitals
   */
  async hospitals(_req: Request, res: Response): Promise<void> {
    try {
      const hospitals = await this.service.compute("hospitals", (snapshot) => [...snapshot.hospitals]);
      res.status(200).json({ hospitals });
    } catch (err) {
      this.handleError(res, err);
    }
  }

  /**
   * POST /api/snapshot/refresh
   */
  async refresh(_req: Request, res: Response): Promise<void> {
    try {
      const snapshot = await this.service.refresh();
      res.status(200).json({
        fetchedAt: snapshot.fetchedAt.toISOString(),
        babies: snapshot.babies.length,
        discharges: snapshot.discharges.length,
        hospitals: snapshot.hospitals.length,
        quality: snapshot.quality,
      });
    } catch (err) {
      this.handleError(res, err);
    }
  }

  /**
   * `prepare` validates the endpoint's own parameters before any data is
   * loaded and returns the computation to run on the snapshot.
   */
  private async metric<T>(
    req: Request,
    res: Response,
    view: string,
    prepare: () => (snapshot: Snapshot, parsed: ParsedFilter) => T
  ): Promise<void> {
    try {
      const parsed = toParsedFilter(filterQuerySchema.parse(req.query));
      const compute = prepare();
      const response = await this.service.compute(view, (snapshot): MetricResponse<T> => ({
        fetchedAt: snapshot.fetchedAt.toISOString(),
        asOf: parsed.asOf?.toISOString(),
        filter: parsed.filter,
        metric: compute(snapshot, parsed),
      }));
      res.status(200).json(response);
    } catch (err) {
      this.handleError(res, err);
    }
  }

  private handleError(res: Response, err: unknown): void {
    if (err instanceof ZodError) {
      res.status(400).json({ error: "Invalid query parameters", issues: err.issues });
      return;
    }
    if (err instanceof UpstreamFetchError) {
      log.error({ err, collection: err.collection }, "Dashboard data unavailable");
      res.status(502).json({ error: err.message, code: err.code, collection: err.collection });
      return;
    }
    log.error({ err }, "Dashboard request failed");
    res.status(500).json({ error: "Internal server error" });
  }
}
