import type {
  DeliveryTierName,
  DeveloperScoreWeights,
  DeveloperSummary,
  ScoredWorkItem,
  SummaryOptions
} from "../models/_types";
import { ConfigError } from "../utils/errors";
import { assertWeights } from "../utils/validation";

export type ScoreComponents = {
  avgFairEfficiency: number | null;
  avgDeliveryScore: number | null;
  completionRate: number | null;
  onTimeRate: number | null;
};

function mean(values: number[]): number | null {
  if (!values.length) {
    return null;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

function percentage(part: number, whole: number): number | null {
  return whole > 0 ? (part / whole) * 100 : null;
}

function compareIds(a: ScoredWorkItem, b: ScoredWorkItem): number {
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

function uniqueSorted(values: Array<string | undefined>): string[] {
  return Array.from(new Set(values.filter((value): value is string => Boolean(value)))).sort();
}

function emptyTimingBreakdown(): Record<DeliveryTierName, number> {
  return {
    very_early: 0,
    early: 0,
    slightly_early: 0,
    on_time: 0,
    late_1_3: 0,
    late_4_7: 0,
    late_8_14: 0,
    late_15_plus: 0
  };
}

/** Absent components contribute nothing; on-time rate is capped at 100. */
export function calculateOverallScore(components: ScoreComponents, weights: DeveloperScoreWeights): number {
  assertWeights(weights);
  return (
    (components.avgFairEfficiency ?? 0) * weights.fairEfficiency +
    (components.avgDeliveryScore ?? 0) * weights.delivery +
    (components.completionRate ?? 0) * weights.completionRate +
    Math.min(100, components.onTimeRate ?? 0) * weights.onTime
  );
}

export function summarizeDeveloper(
  developer: string,
  items: ScoredWorkItem[],
  weights: DeveloperScoreWeights,
  options: SummaryOptions = {}
): DeveloperSummary {
  assertWeights(weights);
  const totalAssigned = options.totalAssigned ?? items.length;
  if (!Number.isInteger(totalAssigned) || totalAssigned < 0) {
    throw new ConfigError(`totalAssigned must be a non-negative integer (got ${totalAssigned}).`);
  }

  const ordered = [...items].sort(compareIds);
  const metrics = ordered.map((item) => item.metrics);
  const eligible = metrics.filter((entry) => entry.eligible);
  const efficiencyValues = eligible
    .map((entry) => entry.fairEfficiencyPct)
    .filter((value): value is number => value !== null);
  const deliveryValues = eligible
    .map((entry) => entry.deliveryScore)
    .filter((value): value is number => value !== null);
  const timingValues = metrics
    .map((entry) => entry.daysAheadBehind)
    .filter((value): value is number => value !== null);

  const completedCount = metrics.filter((entry) => entry.isCompleted).length;
  const onTimeCount = timingValues.filter((days) => days <= 0).length;
  const withEstimate = metrics.filter((entry) => entry.estimatedHours !== null).length;
  const measured = eligible.filter((entry) => entry.fairEfficiencyPct !== null && entry.activeHours > 0).length;
  const reopenedItems = ordered.filter((item) => item.wasReopened).length;

  const deliveryTimingBreakdown = emptyTimingBreakdown();
  metrics.forEach((entry) => {
    if (entry.deliveryTier) {
      deliveryTimingBreakdown[entry.deliveryTier] += 1;
    }
  });

  const components: ScoreComponents = {
    avgFairEfficiency: mean(efficiencyValues),
    avgDeliveryScore: mean(deliveryValues),
    completionRate: percentage(completedCount, totalAssigned),
    onTimeRate: percentage(onTimeCount, timingValues.length)
  };

  const summary: DeveloperSummary = {
    developer,
    totalAssigned,
    completedCount,
    eligibleCount: eligible.length,
    itemsWithTiming: timingValues.length,
    onTimeCount,
    ...components,
    overallScore: calculateOverallScore(components, weights),
    lowConfidence: items.length < (options.minItemsForScoring ?? 0),
    sampleConfidence: percentage(measured, withEstimate),
    totalActiveHours: metrics.reduce((acc, entry) => acc + entry.activeHours, 0),
    totalEstimatedHours: metrics.reduce((acc, entry) => acc + (entry.estimatedHours ?? 0), 0),
    averageDaysAheadBehind: mean(timingValues),
    reopenedItems,
    reopenedRate: percentage(reopenedItems, items.length),
    deliveryTimingBreakdown,
    workItemTypes: uniqueSorted(ordered.map((item) => item.workItemType)),
    projects: uniqueSorted(ordered.map((item) => item.projectName))
  };
  return Object.freeze(summary);
}
