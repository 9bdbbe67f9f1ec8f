import { Router } from "express";
import {
  developerSummaryController,
  getConfigController,
  teamReportController,
  timeBreakdownController,
  workItemMetricsController
} from "../controllers/metrics.controller";
import { validateRequest } from "../middleware/validateRequest";
import type { MetricsSettings } from "../models/_types";
import {
  developerSummaryRequestSchema,
  teamReportRequestSchema,
  timeBreakdownRequestSchema,
  workItemMetricsRequestSchema
} from "../utils/validation";

export function createMetricsRouter(settings: MetricsSettings) {
  const router = Router();

  router.get("/config", getConfigController(settings));
  router.post(
    "/time-breakdown",
    validateRequest({ body: timeBreakdownRequestSchema }),
    timeBreakdownController(settings)
  );
  router.post(
    "/work-item",
    validateRequest({ body: workItemMetricsRequestSchema }),
    workItemMetricsController(settings)
  );
  router.post(
    "/developer-summary",
    validateRequest({ body: developerSummaryRequestSchema }),
    developerSummaryController(settings)
  );
  router.post("/report", validateRequest({ body: teamReportRequestSchema }), teamReportController(settings));

  return router;
}
