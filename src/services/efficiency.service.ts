import { DateTime } from "luxon";
import type {
  DeliveryTier,
  IneligibleReason,
  ScoringConfig,
  TimeBreakdown,
  WorkItemMetrics
} from "../models/_types";
import { InputError } from "../utils/errors";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type DeliveryTiming = {
  daysAheadBehind: number;
  tier: DeliveryTier | null;
};

function parseDate(value: string, label: string): DateTime {
  const parsed = DateTime.fromISO(value, { zone: "utc" });
  if (!parsed.isValid) {
    throw new InputError(`${label} "${value}" is not a valid date.`);
  }
  return parsed;
}

export function resolveDeliveryTier(daysAheadBehind: number, tiers: DeliveryTier[]): DeliveryTier | null {
  return (
    tiers.find(
      (tier) =>
        (tier.fromDays === null || daysAheadBehind >= tier.fromDays) &&
        (tier.toDays === null || daysAheadBehind < tier.toDays)
    ) ?? null
  );
}

/** Negative days mean the item closed before its target date. */
export function calculateDeliveryTiming(targetDate: string, closedDate: string, tiers: DeliveryTier[]): DeliveryTiming {
  const target = parseDate(targetDate, "targetDate");
  const closed = parseDate(closedDate, "closedDate");
  const daysAheadBehind = Math.floor((closed.toMillis() - target.toMillis()) / MS_PER_DAY);
  return { daysAheadBehind, tier: resolveDeliveryTier(daysAheadBehind, tiers) };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function normalizeEstimate(estimatedHours: number | null | undefined): number | null {
  if (estimatedHours === null || estimatedHours === undefined) {
    return null;
  }
  if (!Number.isFinite(estimatedHours) || estimatedHours < 0) {
    throw new InputError(`estimatedHours must be a non-negative number (got ${estimatedHours}).`);
  }
  return estimatedHours > 0 ? estimatedHours : null;
}

export function scoreWorkItem(
  breakdown: TimeBreakdown,
  estimatedHours: number | null | undefined,
  isCompleted: boolean,
  targetDate: string | null | undefined,
  closedDate: string | null | undefined,
  config: ScoringConfig
): WorkItemMetrics {
  const estimate = normalizeEstimate(estimatedHours);
  let ineligibleReason: IneligibleReason | null = null;
  if (estimate === null) {
    ineligibleReason = "no_estimate";
  } else if (breakdown.eventCount === 0) {
    ineligibleReason = "no_state_history";
  }

  const rawActiveHours = breakdown.activeHours;
  const activeHours =
    estimate !== null && config.activeHoursCapMultiplier !== null
      ? Math.min(rawActiveHours, estimate * config.activeHoursCapMultiplier)
      : rawActiveHours;

  const completionBonusHours = isCompleted && estimate !== null ? estimate * config.completionBonusPct : 0;

  const timing =
    isCompleted && targetDate && closedDate
      ? calculateDeliveryTiming(targetDate, closedDate, config.deliveryTiers)
      : null;
  const tier = timing?.tier ?? null;
  const latePenaltyMitigationHours = tier?.mitigationHours ?? 0;
  const timingBonusHours = timing && tier ? Math.abs(timing.daysAheadBehind) * tier.bonusHoursPerDay : 0;

  const denominator = (estimate ?? 0) + latePenaltyMitigationHours;
  const fairEfficiencyPct =
    ineligibleReason === null && denominator > 0
      ? clamp(((activeHours + completionBonusHours) / denominator) * 100, 0, config.maxEfficiencyCap)
      : null;
  const traditionalEfficiencyPct =
    estimate !== null && activeHours > 0 ? Math.min((estimate / activeHours) * 100, config.maxEfficiencyCap) : null;

  return {
    estimatedHours: estimate,
    activeHours,
    rawActiveHours,
    completionBonusHours,
    latePenaltyMitigationHours,
    timingBonusHours,
    fairEfficiencyPct,
    traditionalEfficiencyPct,
    deliveryScore: tier?.score ?? null,
    deliveryTier: tier?.name ?? null,
    daysAheadBehind: timing?.daysAheadBehind ?? null,
    isCompleted,
    eligible: ineligibleReason === null,
    ineligibleReason
  };
}
