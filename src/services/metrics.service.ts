import { DateTime } from "luxon";
import type {
  BreakdownOptions,
  BusinessHoursConfig,
  DeveloperScoreWeights,
  DeveloperSummary,
  ItemIssue,
  MetricsSettings,
  RawStateEvent,
  ScoredWorkItem,
  ScoringConfig,
  StateBottleneck,
  StateCategoryConfig,
  StateEvent,
  SummaryOptions,
  TeamOverview,
  TeamReport,
  TimeBreakdown,
  WorkItemInput,
  WorkItemMetrics,
  WorkItemReportRow
} from "../models/_types";
import { captureResult, InputError, type Result } from "../utils/errors";
import { mergeSettings } from "../utils/settings";
import { buildStateClassifier, type StateClassifier } from "../utils/stateCategories";
import { accumulate } from "../utils/stateTransitionStack";
import type { MetricsOverrides } from "../utils/validation";
import { summarizeDeveloper } from "./developerScore.service";
import { scoreWorkItem } from "./efficiency.service";

const UNASSIGNED = "Unassigned";
const MAX_BOTTLENECKS = 5;

export type TeamReportInput = {
  workItems: WorkItemInput[];
  asOf?: string;
  windowStart?: string;
  overrides?: MetricsOverrides;
};

export function classifyEvents(events: RawStateEvent[], classifier: StateClassifier): StateEvent[] {
  return events.map((event) => ({
    timestamp: event.timestamp ?? "",
    rawState: event.state,
    category: classifier.classify(event.state)
  }));
}

export function computeTimeBreakdown(
  events: RawStateEvent[],
  stateCategories: StateCategoryConfig,
  businessHours: BusinessHoursConfig,
  options: BreakdownOptions = {}
): Result<TimeBreakdown> {
  return captureResult(() => {
    const classifier = buildStateClassifier(stateCategories);
    return accumulate(classifyEvents(events, classifier), businessHours, options);
  });
}

export function computeWorkItemMetrics(
  breakdown: TimeBreakdown,
  estimatedHours: number | null | undefined,
  isCompleted: boolean,
  targetDate: string | null | undefined,
  closedDate: string | null | undefined,
  scoring: ScoringConfig
): Result<WorkItemMetrics> {
  return captureResult(() => scoreWorkItem(breakdown, estimatedHours, isCompleted, targetDate, closedDate, scoring));
}

export function computeDeveloperSummary(
  developer: string,
  items: ScoredWorkItem[],
  weights: DeveloperScoreWeights,
  options: SummaryOptions = {}
): Result<DeveloperSummary> {
  return captureResult(() => summarizeDeveloper(developer, items, weights, options));
}

function resolveInstant(value: string | undefined, label: string): string | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = DateTime.fromISO(value, { zone: "utc" });
  if (!parsed.isValid) {
    throw new InputError(`${label} "${value}" is not a valid ISO-8601 timestamp.`);
  }
  return parsed.toISO() ?? undefined;
}

function unmappedStates(item: WorkItemInput, classifier: StateClassifier): string[] {
  const labels = item.events.map((event) => event.state);
  if (item.state) {
    labels.push(item.state);
  }
  return Array.from(new Set(labels.filter((label) => !classifier.isMapped(label))));
}

function scoreItem(
  item: WorkItemInput,
  settings: MetricsSettings,
  classifier: StateClassifier,
  options: BreakdownOptions
): { row: WorkItemReportRow; skipped: boolean } {
  const breakdown = accumulate(classifyEvents(item.events, classifier), settings.businessHours, {
    ...options,
    createdAt: item.createdAt
  });
  const currentCategory = item.state ? classifier.classify(item.state) : breakdown.finalCategory;
  const isCompleted = currentCategory === "completion";
  const closedDate = item.closedDate ?? (isCompleted ? breakdown.lastCompletionAt : null);
  const metrics = scoreWorkItem(
    breakdown,
    item.estimatedHours,
    isCompleted,
    item.targetDate,
    closedDate,
    settings.scoring
  );
  return {
    row: {
      id: item.id,
      title: item.title,
      assignedTo: item.assignedTo?.trim() || UNASSIGNED,
      workItemType: item.workItemType,
      projectName: item.projectName,
      breakdown,
      metrics
    },
    skipped: currentCategory === "ignored"
  };
}

function meanOf(values: Array<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  if (!present.length) {
    return null;
  }
  return present.reduce((acc, value) => acc + value, 0) / present.length;
}

export function findBottlenecks(rows: WorkItemReportRow[], limit = MAX_BOTTLENECKS): StateBottleneck[] {
  const totals = new Map<string, { hours: number; occurrences: number }>();
  for (const row of rows) {
    for (const [state, hours] of Object.entries(row.breakdown.stateBreakdown)) {
      const entry = totals.get(state) ?? { hours: 0, occurrences: 0 };
      entry.hours += hours;
      entry.occurrences += 1;
      totals.set(state, entry);
    }
  }
  return Array.from(totals.entries())
    .map(([state, entry]) => ({
      state,
      averageHours: entry.hours / entry.occurrences,
      occurrences: entry.occurrences
    }))
    .sort((a, b) => b.averageHours - a.averageHours || a.state.localeCompare(b.state))
    .slice(0, limit);
}

function toScoredWorkItem(row: WorkItemReportRow): ScoredWorkItem {
  return {
    id: row.id,
    workItemType: row.workItemType,
    projectName: row.projectName,
    wasReopened: row.breakdown.wasReopened,
    metrics: row.metrics
  };
}

export function buildTeamReport(input: TeamReportInput, baseSettings: MetricsSettings): TeamReport {
  const settings = mergeSettings(baseSettings, input.overrides);
  const classifier = buildStateClassifier(settings.stateCategories);
  const asOf = resolveInstant(input.asOf, "asOf") ?? DateTime.utc().toISO();
  const windowStart = resolveInstant(input.windowStart, "windowStart") ?? null;

  const rows: WorkItemReportRow[] = [];
  const errors: ItemIssue[] = [];
  const warnings: ItemIssue[] = [];

  for (const item of input.workItems) {
    try {
      const { row, skipped } = scoreItem(item, settings, classifier, {
        asOf,
        windowStart: windowStart ?? undefined
      });
      const unmapped = unmappedStates(item, classifier);
      if (unmapped.length) {
        warnings.push({
          workItemId: item.id,
          message: `Unmapped states treated as "${settings.stateCategories.defaultCategory}": ${unmapped.join(", ")}.`
        });
      }
      if (skipped) {
        warnings.push({ workItemId: item.id, message: "Skipped: current state is ignored." });
        continue;
      }
      rows.push(row);
    } catch (error) {
      if (error instanceof InputError) {
        errors.push({ workItemId: item.id, message: error.message });
        continue;
      }
      throw error;
    }
  }

  const groups = new Map<string, WorkItemReportRow[]>();
  rows.forEach((row) => {
    const bucket = groups.get(row.assignedTo) ?? [];
    bucket.push(row);
    groups.set(row.assignedTo, bucket);
  });

  const developers = Array.from(groups.keys())
    .sort((a, b) => a.localeCompare(b))
    .map((developer) =>
      summarizeDeveloper(developer, (groups.get(developer) ?? []).map(toScoredWorkItem), settings.weights, {
        minItemsForScoring: settings.minItemsForScoring
      })
    );

  const overview: TeamOverview = {
    totalWorkItems: rows.length,
    totalDevelopers: developers.length,
    averageFairEfficiency: meanOf(developers.map((summary) => summary.avgFairEfficiency)),
    averageDeliveryScore: meanOf(developers.map((summary) => summary.avgDeliveryScore)),
    totalActiveHours: rows.reduce((acc, row) => acc + row.metrics.activeHours, 0)
  };

  if (errors.length) {
    console.warn(`[Metrics] ${errors.length} work item(s) excluded from the report`);
  }

  return {
    asOf,
    windowStart,
    overview,
    developers,
    items: rows,
    bottlenecks: findBottlenecks(rows),
    errors,
    warnings
  };
}
