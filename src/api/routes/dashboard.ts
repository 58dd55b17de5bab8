import { Router } from "express";
import { DashboardController } from "../controllers/dashboard.js";
import type { DashboardService } from "../../dashboard/dashboard-service.js";

export function createDashboardRoutes(service: DashboardService): Router {
  const router = Router();
  const controller = new DashboardController(service);

  /**
   * Every metric for one filter
   * GET /api/dashboard?hospital=H1&from=2025-01-01&to=2025-03-31
   */
  router.get("/dashboard", (req, res) => {
    void controller.dashboard(req, res);
  });

  router.get("/kpi/registration-timeliness", (req, res) => {
    void controller.registrationTimeliness(req, res);
  });

  router.get("/kpi/kmc-initiation", (req, res) => {
    void controller.kmcInitiation(req, res);
  });

  router.get("/kpi/follow-up", (req, res) => {
    void controller.followUp(req, res);
  });

  router.get("/kpi/discharge-outcomes", (req, res) => {
    void controller.dischargeOutcomes(req, res);
  });

  router.get("/kpi/mortality", (req, res) => {
    void controller.mortality(req, res);
  });

  /**
   * Hospital selector options
   * GET /api/hospitals
   */
  router.get("/hospitals", (req, res) => {
    void controller.hospitals(req, res);
  });

  /**
   * Discards the cached snapshot and reloads all collections
   * POST /api/snapshot/refresh
   */
  router.post("/snapshot/refresh", (req, res) => {
    void controller.refresh(req, res);
  });

  return router;
}
