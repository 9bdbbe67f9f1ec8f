import type { NextFunction, Request, Response } from "express";
import type { MetricsSettings } from "../models/_types";
import {
  buildTeamReport,
  computeDeveloperSummary,
  computeTimeBreakdown,
  computeWorkItemMetrics
} from "../services/metrics.service";
import { mergeSettings } from "../utils/settings";
import type {
  DeveloperSummaryRequest,
  TeamReportRequest,
  TimeBreakdownRequest,
  WorkItemMetricsRequest
} from "../utils/validation";

export function getConfigController(settings: MetricsSettings) {
  return (_req: Request, res: Response) => {
    res.json({ settings });
  };
}

export function timeBreakdownController(settings: MetricsSettings) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const payload: TimeBreakdownRequest = req.body;
      const effective = mergeSettings(settings, payload.overrides);
      const result = computeTimeBreakdown(payload.events, effective.stateCategories, effective.businessHours, {
        asOf: payload.asOf,
        windowStart: payload.windowStart,
        createdAt: payload.createdAt
      });
      if (!result.ok) {
        return next(result.error);
      }
      res.json({ breakdown: result.value });
    } catch (error) {
      next(error);
    }
  };
}

export function workItemMetricsController(settings: MetricsSettings) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const payload: WorkItemMetricsRequest = req.body;
      const effective = mergeSettings(settings, payload.overrides);
      const result = computeWorkItemMetrics(
        payload.breakdown,
        payload.estimatedHours,
        payload.isCompleted,
        payload.targetDate,
        payload.closedDate,
        effective.scoring
      );
      if (!result.ok) {
        return next(result.error);
      }
      res.json({ metrics: result.value });
    } catch (error) {
      next(error);
    }
  };
}

export function developerSummaryController(settings: MetricsSettings) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const payload: DeveloperSummaryRequest = req.body;
      const effective = mergeSettings(settings, {
        weights: payload.weights,
        minItemsForScoring: payload.minItemsForScoring
      });
      const result = computeDeveloperSummary(payload.developer, payload.items, effective.weights, {
        minItemsForScoring: effective.minItemsForScoring,
        totalAssigned: payload.totalAssigned
      });
      if (!result.ok) {
        return next(result.error);
      }
      res.json({ summary: result.value });
    } catch (error) {
      next(error);
    }
  };
}

export function teamReportController(settings: MetricsSettings) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const payload: TeamReportRequest = req.body;
      const report = buildTeamReport(payload, settings);
      res.json({ report });
    } catch (error) {
      next(error);
    }
  };
}
