import client from "prom-client";
import { NextFunction, Request, Response } from "express";

client.collectDefaultMetrics();

export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"],
  buckets: [0.05, 0.1, 0.2, 0.5, 1, 2, 5]
});

export const snapshotRefreshTotal = new client.Counter({
  name: "kmc_snapshot_refresh_total",
  help: "Snapshot refresh attempts by outcome",
  labelNames: ["outcome"]
});

export const snapshotRecords = new client.Gauge({
  name: "kmc_snapshot_records",
  help: "Records held in the current snapshot",
  labelNames: ["collection"]
});

export const recomputeDurationSeconds = new client.Histogram({
  name: "kmc_recompute_duration_seconds",
  help: "Duration of one dashboard recomputation pass",
  labelNames: ["view"],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1]
});

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const end = httpRequestDurationSeconds.startTimer({ method: req.method });
  res.on("finish", () => {
    const route = typeof req.route?.path === "string" ? `${req.baseUrl}${req.route.path}` : req.path;
    end({ route, status_code: String(res.statusCode) });
  });
  next();
}

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.set("Content-Type", client.register.contentType);
  res.end(await client.register.metrics());
}
