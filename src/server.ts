import express, { Request, Response } from "express";
import { createDashboardRoutes } from "./api/routes/dashboard.js";
import type { DashboardService } from "./dashboard/dashboard-service.js";
import { httpMetricsMiddleware, metricsHandler } from "./observability/metrics.js";

export function createServer(service: DashboardService) {
  const app = express();
  app.use(express.json());
  app.use(httpMetricsMiddleware);

  app.get("/health", (_req: Request, res: Response) => {
    const snapshot = service.cachedSnapshot;
    res.status(200).json({ status: "ok", snapshotFetchedAt: snapshot?.fetchedAt.toISOString() ?? null });
  });

  app.get("/metrics", (req: Request, res: Response) => {
    void metricsHandler(req, res);
  });

  app.use("/api", createDashboardRoutes(service));

  return app;
}
