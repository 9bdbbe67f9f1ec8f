import type {
  BusinessHoursConfig,
  DeliveryTier,
  DeveloperScoreWeights,
  MetricsSettings,
  ScoringConfig,
  StateCategoryConfig
} from "../models/_types";
import { ConfigError } from "./errors";
import { assertWeights, formatIssues, metricsSettingsSchema, type MetricsOverrides } from "./validation";

export const DEFAULT_STATE_CATEGORIES: StateCategoryConfig = {
  assigned: ["New", "To Do", "Proposed"],
  productive: ["Active", "In Progress", "Development", "Code Review", "Testing"],
  paused: ["Stopper", "Blocked", "On Hold", "Waiting"],
  completion: ["Resolved", "Closed", "Done"],
  ignored: ["Removed", "Discarded", "Cancelled"],
  defaultCategory: "ignored"
};

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = {
  officeStartHour: 9,
  officeEndHour: 17,
  maxHoursPerDay: 8,
  timezone: "America/Mexico_City",
  workingWeekdays: [1, 2, 3, 4, 5]
};

export const DEFAULT_DELIVERY_TIERS: DeliveryTier[] = [
  { name: "very_early", fromDays: null, toDays: -4, score: 130, mitigationHours: 0, bonusHoursPerDay: 1 },
  { name: "early", fromDays: -4, toDays: -2, score: 120, mitigationHours: 0, bonusHoursPerDay: 0.5 },
  { name: "slightly_early", fromDays: -2, toDays: 0, score: 110, mitigationHours: 0, bonusHoursPerDay: 0.25 },
  { name: "on_time", fromDays: 0, toDays: 1, score: 100, mitigationHours: 0, bonusHoursPerDay: 0 },
  { name: "late_1_3", fromDays: 1, toDays: 4, score: 95, mitigationHours: 2, bonusHoursPerDay: 0 },
  { name: "late_4_7", fromDays: 4, toDays: 8, score: 90, mitigationHours: 4, bonusHoursPerDay: 0 },
  { name: "late_8_14", fromDays: 8, toDays: 15, score: 85, mitigationHours: 6, bonusHoursPerDay: 0 },
  { name: "late_15_plus", fromDays: 15, toDays: null, score: 70, mitigationHours: 8, bonusHoursPerDay: 0 }
];

export const DEFAULT_SCORING: ScoringConfig = {
  completionBonusPct: 0.2,
  maxEfficiencyCap: 150,
  activeHoursCapMultiplier: null,
  deliveryTiers: DEFAULT_DELIVERY_TIERS
};

export const DEFAULT_WEIGHTS: DeveloperScoreWeights = {
  fairEfficiency: 0.25,
  delivery: 0.5,
  completionRate: 0.15,
  onTime: 0.1
};

export const DEFAULT_SETTINGS: MetricsSettings = {
  stateCategories: DEFAULT_STATE_CATEGORIES,
  businessHours: DEFAULT_BUSINESS_HOURS,
  scoring: DEFAULT_SCORING,
  weights: DEFAULT_WEIGHTS,
  minItemsForScoring: 3
};

export function validateSettings(input: unknown): MetricsSettings {
  const parsed = metricsSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid metrics configuration.", formatIssues(parsed.error));
  }
  assertWeights(parsed.data.weights);
  return parsed.data;
}

/** Section objects merge key by key; arrays and scalars replace. */
export function mergeSettings(base: MetricsSettings, overrides: MetricsOverrides = {}): MetricsSettings {
  return validateSettings({
    stateCategories: { ...base.stateCategories, ...overrides.stateCategories },
    businessHours: { ...base.businessHours, ...overrides.businessHours },
    scoring: { ...base.scoring, ...overrides.scoring },
    weights: { ...base.weights, ...overrides.weights },
    minItemsForScoring: overrides.minItemsForScoring ?? base.minItemsForScoring
  });
}

function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || !value.trim()) {
    return fallback;
  }
  return Number(value);
}

export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): MetricsSettings {
  return mergeSettings(DEFAULT_SETTINGS, {
    businessHours: {
      timezone: env.METRICS_TIMEZONE || DEFAULT_BUSINESS_HOURS.timezone,
      officeStartHour: readNumber(env.OFFICE_START_HOUR, DEFAULT_BUSINESS_HOURS.officeStartHour),
      officeEndHour: readNumber(env.OFFICE_END_HOUR, DEFAULT_BUSINESS_HOURS.officeEndHour),
      maxHoursPerDay: readNumber(env.MAX_HOURS_PER_DAY, DEFAULT_BUSINESS_HOURS.maxHoursPerDay)
    },
    minItemsForScoring: readNumber(env.MIN_ITEMS_FOR_SCORING, DEFAULT_SETTINGS.minItemsForScoring)
  });
}
