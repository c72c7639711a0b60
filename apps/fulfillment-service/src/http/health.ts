import express, { type Express, type RequestHandler } from "express";
import { httpStatusFor, type HealthAggregator } from "@orderflow/core";

/**
 * `GET /health`: the aggregated report as JSON, 200 for healthy or
 * degraded and 503 for unhealthy.
 */
export function healthHandler(health: Pick<HealthAggregator, "getHealth">): RequestHandler {
  return (_req, res) => {
    const report = health.getHealth();
    res.status(httpStatusFor(report.status)).json(report);
  };
}

export function createHttpApp(health: Pick<HealthAggregator, "getHealth">): Express {
  const app = express();
  app.disable("x-powered-by");
  app.get("/health", healthHandler(health));
  return app;
}
