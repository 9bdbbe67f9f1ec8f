import { DateTime } from "luxon";
import { z } from "zod";
import { STATE_CATEGORIES, type DeveloperScoreWeights } from "../models/_types";
import { ConfigError } from "./errors";

export const DELIVERY_TIER_NAMES = [
  "very_early",
  "early",
  "slightly_early",
  "on_time",
  "late_1_3",
  "late_4_7",
  "late_8_14",
  "late_15_plus"
] as const;

const WEIGHT_TOLERANCE = 1e-6;

export const timeZoneSchema = z
  .string({ required_error: "timezone is required." })
  .trim()
  .min(1, "timezone is required.")
  .refine((value) => {
    try {
      Intl.DateTimeFormat("en-US", { timeZone: value });
      return true;
    } catch {
      return false;
    }
  }, "timezone must be a valid IANA time zone.");

const stateLabelsSchema = z.array(z.string().trim().min(1));

export const stateCategoryConfigSchema = z.object({
  assigned: stateLabelsSchema,
  productive: stateLabelsSchema,
  paused: stateLabelsSchema,
  completion: stateLabelsSchema,
  ignored: stateLabelsSchema,
  defaultCategory: z.enum(STATE_CATEGORIES)
});

const businessHoursShape = z.object({
  officeStartHour: z.number().int().min(0).max(23),
  officeEndHour: z.number().int().min(1).max(24),
  maxHoursPerDay: z.number().positive().max(24),
  timezone: timeZoneSchema,
  workingWeekdays: z.array(z.number().int().min(1).max(7)).min(1, "At least one working weekday is required.")
});

export const businessHoursConfigSchema = businessHoursShape.refine(
  (config) => config.officeEndHour > config.officeStartHour,
  { message: "officeEndHour must be later than officeStartHour.", path: ["officeEndHour"] }
);

export const deliveryTierSchema = z
  .object({
    name: z.enum(DELIVERY_TIER_NAMES),
    fromDays: z.number().int().nullable(),
    toDays: z.number().int().nullable(),
    score: z.number().nonnegative(),
    mitigationHours: z.number().nonnegative(),
    bonusHoursPerDay: z.number().nonnegative()
  })
  .refine((tier) => tier.fromDays === null || tier.toDays === null || tier.fromDays < tier.toDays, {
    message: "fromDays must be lower than toDays.",
    path: ["toDays"]
  });

const scoringShape = z.object({
  completionBonusPct: z.number().min(0).max(1),
  maxEfficiencyCap: z.number().positive(),
  activeHoursCapMultiplier: z.number().positive().nullable(),
  deliveryTiers: z.array(deliveryTierSchema).min(1, "At least one delivery tier is required.")
});

export const scoringConfigSchema = scoringShape;

const weightsShape = z.object({
  fairEfficiency: z.number().min(0).max(1),
  delivery: z.number().min(0).max(1),
  completionRate: z.number().min(0).max(1),
  onTime: z.number().min(0).max(1)
});

export const weightsSchema = weightsShape;

export const metricsSettingsSchema = z.object({
  stateCategories: stateCategoryConfigSchema,
  businessHours: businessHoursConfigSchema,
  scoring: scoringConfigSchema,
  weights: weightsSchema,
  minItemsForScoring: z.number().int().min(0)
});

export const metricsOverridesSchema = z
  .object({
    stateCategories: stateCategoryConfigSchema.partial().optional(),
    businessHours: businessHoursShape.partial().optional(),
    scoring: scoringShape.partial().optional(),
    weights: weightsShape.partial().optional(),
    minItemsForScoring: z.number().int().min(0).optional()
  })
  .strict();

export type MetricsOverrides = z.infer<typeof metricsOverridesSchema>;

export function formatIssues(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

export function assertWeights(weights: DeveloperScoreWeights) {
  const total = weights.fairEfficiency + weights.delivery + weights.completionRate + weights.onTime;
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigError(`Developer score weights must sum to 1.0 (got ${total}).`, { weights });
  }
}

const isoInstantSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => DateTime.fromISO(value).isValid, "must be an ISO-8601 timestamp.");

const nullableDateSchema = z.string().trim().nullable().optional();

export const rawStateEventSchema = z.object({
  timestamp: z.string().trim().nullable().optional(),
  state: z.string().trim().min(1, "state is required.")
});

export const timeBreakdownSchema = z
  .object({
    activeHours: z.number().nonnegative(),
    pausedHours: z.number().nonnegative(),
    preReopenActiveHours: z.number().nonnegative(),
    postReopenActiveHours: z.number().nonnegative(),
    wasReopened: z.boolean(),
    reopenCount: z.number().int().min(0),
    totalHours: z.number().nonnegative().default(0),
    stateBreakdown: z.record(z.number()).default({}),
    pausedStateBreakdown: z.record(z.number()).default({}),
    finalCategory: z.enum(STATE_CATEGORIES).nullable().default(null),
    isCompleted: z.boolean().default(false),
    isIgnored: z.boolean().default(false),
    eventCount: z.number().int().min(0).optional(),
    lastCompletionAt: z.string().nullable().default(null)
  })
  .transform(({ eventCount, ...breakdown }) => ({
    ...breakdown,
    eventCount: eventCount ?? (breakdown.activeHours === 0 && breakdown.totalHours === 0 ? 0 : 1)
  }));

export const workItemMetricsSchema = z.object({
  estimatedHours: z.number().positive().nullable(),
  activeHours: z.number().nonnegative(),
  rawActiveHours: z.number().nonnegative(),
  completionBonusHours: z.number().nonnegative(),
  latePenaltyMitigationHours: z.number().nonnegative(),
  timingBonusHours: z.number().nonnegative().default(0),
  fairEfficiencyPct: z.number().nonnegative().nullable(),
  traditionalEfficiencyPct: z.number().nonnegative().nullable().default(null),
  deliveryScore: z.number().nullable(),
  deliveryTier: z.enum(DELIVERY_TIER_NAMES).nullable(),
  daysAheadBehind: z.number().int().nullable(),
  isCompleted: z.boolean(),
  eligible: z.boolean(),
  ineligibleReason: z.enum(["no_estimate", "no_state_history"]).nullable()
});

export const workItemInputSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().int()]).transform((value) => String(value)),
  title: z.string().trim().optional(),
  assignedTo: z.string().trim().optional(),
  workItemType: z.string().trim().optional(),
  projectName: z.string().trim().optional(),
  state: z.string().trim().min(1).optional(),
  createdAt: isoInstantSchema.optional(),
  estimatedHours: z.number().nullable().optional(),
  targetDate: nullableDateSchema,
  closedDate: nullableDateSchema,
  events: z.array(rawStateEventSchema)
});

export const timeBreakdownRequestSchema = z.object({
  events: z.array(rawStateEventSchema),
  asOf: isoInstantSchema.optional(),
  windowStart: isoInstantSchema.optional(),
  createdAt: isoInstantSchema.optional(),
  overrides: metricsOverridesSchema.optional()
});

export const workItemMetricsRequestSchema = z.object({
  breakdown: timeBreakdownSchema,
  estimatedHours: z.number().nullable().optional(),
  isCompleted: z.boolean(),
  targetDate: nullableDateSchema,
  closedDate: nullableDateSchema,
  overrides: metricsOverridesSchema.optional()
});

export const developerSummaryRequestSchema = z.object({
  developer: z.string().trim().min(1, "developer is required."),
  items: z.array(
    z.object({
      id: z.union([z.string().trim().min(1), z.number().int()]).transform((value) => String(value)),
      workItemType: z.string().trim().optional(),
      projectName: z.string().trim().optional(),
      wasReopened: z.boolean().default(false),
      metrics: workItemMetricsSchema
    })
  ),
  weights: weightsShape.partial().optional(),
  minItemsForScoring: z.number().int().min(0).optional(),
  totalAssigned: z.number().int().min(0).optional()
});

export const teamReportRequestSchema = z.object({
  workItems: z.array(workItemInputSchema),
  asOf: isoInstantSchema.optional(),
  windowStart: isoInstantSchema.optional(),
  overrides: metricsOverridesSchema.optional()
});

export type TimeBreakdownRequest = z.infer<typeof timeBreakdownRequestSchema>;
export type WorkItemMetricsRequest = z.infer<typeof workItemMetricsRequestSchema>;
export type DeveloperSummaryRequest = z.infer<typeof developerSummaryRequestSchema>;
export type TeamReportRequest = z.infer<typeof teamReportRequestSchema>;
