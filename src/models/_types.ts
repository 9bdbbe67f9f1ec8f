export type StateCategory = "assigned" | "productive" | "paused" | "completion" | "ignored";

export const STATE_CATEGORIES = ["assigned", "productive", "paused", "completion", "ignored"] as const;

export type DeliveryTierName =
  | "very_early"
  | "early"
  | "slightly_early"
  | "on_time"
  | "late_1_3"
  | "late_4_7"
  | "late_8_14"
  | "late_15_plus";

export interface RawStateEvent {
  timestamp?: string | null;
  state: string;
}

export interface StateEvent {
  timestamp: string;
  rawState: string;
  category: StateCategory;
}

export type StateCategoryConfig = {
  assigned: string[];
  productive: string[];
  paused: string[];
  completion: string[];
  ignored: string[];
  defaultCategory: StateCategory;
};

export type BusinessHoursConfig = {
  officeStartHour: number;
  officeEndHour: number;
  maxHoursPerDay: number;
  timezone: string;
  /** ISO weekdays, 1 = Monday through 7 = Sunday. */
  workingWeekdays: number[];
};

export type DeliveryTier = {
  name: DeliveryTierName;
  /** Inclusive lower bound in days; null is unbounded. */
  fromDays: number | null;
  /** Exclusive upper bound in days; null is unbounded. */
  toDays: number | null;
  score: number;
  mitigationHours: number;
  bonusHoursPerDay: number;
};

export type ScoringConfig = {
  completionBonusPct: number;
  maxEfficiencyCap: number;
  activeHoursCapMultiplier: number | null;
  deliveryTiers: DeliveryTier[];
};

export type DeveloperScoreWeights = {
  fairEfficiency: number;
  delivery: number;
  completionRate: number;
  onTime: number;
};

export type MetricsSettings = {
  stateCategories: StateCategoryConfig;
  businessHours: BusinessHoursConfig;
  scoring: ScoringConfig;
  weights: DeveloperScoreWeights;
  minItemsForScoring: number;
};

export type BreakdownOptions = {
  asOf?: string;
  windowStart?: string;
  createdAt?: string;
};

export interface TimeBreakdown {
  activeHours: number;
  pausedHours: number;
  preReopenActiveHours: number;
  postReopenActiveHours: number;
  wasReopened: boolean;
  reopenCount: number;
  totalHours: number;
  stateBreakdown: Record<string, number>;
  pausedStateBreakdown: Record<string, number>;
  finalCategory: StateCategory | null;
  isCompleted: boolean;
  isIgnored: boolean;
  eventCount: number;
  lastCompletionAt: string | null;
}

export type IneligibleReason = "no_estimate" | "no_state_history";

export interface WorkItemMetrics {
  estimatedHours: number | null;
  activeHours: number;
  rawActiveHours: number;
  completionBonusHours: number;
  latePenaltyMitigationHours: number;
  timingBonusHours: number;
  fairEfficiencyPct: number | null;
  traditionalEfficiencyPct: number | null;
  deliveryScore: number | null;
  deliveryTier: DeliveryTierName | null;
  daysAheadBehind: number | null;
  isCompleted: boolean;
  eligible: boolean;
  ineligibleReason: IneligibleReason | null;
}

export interface ScoredWorkItem {
  id: string;
  workItemType?: string;
  projectName?: string;
  wasReopened: boolean;
  metrics: WorkItemMetrics;
}

export type SummaryOptions = {
  minItemsForScoring?: number;
  totalAssigned?: number;
};

export interface DeveloperSummary {
  developer: string;
  totalAssigned: number;
  completedCount: number;
  eligibleCount: number;
  itemsWithTiming: number;
  onTimeCount: number;
  completionRate: number | null;
  onTimeRate: number | null;
  avgFairEfficiency: number | null;
  avgDeliveryScore: number | null;
  overallScore: number;
  lowConfidence: boolean;
  sampleConfidence: number | null;
  totalActiveHours: number;
  totalEstimatedHours: number;
  averageDaysAheadBehind: number | null;
  reopenedItems: number;
  reopenedRate: number | null;
  deliveryTimingBreakdown: Record<DeliveryTierName, number>;
  workItemTypes: string[];
  projects: string[];
}

export interface WorkItemInput {
  id: string;
  title?: string;
  assignedTo?: string;
  workItemType?: string;
  projectName?: string;
  state?: string;
  createdAt?: string;
  estimatedHours?: number | null;
  targetDate?: string | null;
  closedDate?: string | null;
  events: RawStateEvent[];
}

export interface WorkItemReportRow {
  id: string;
  title?: string;
  assignedTo: string;
  workItemType?: string;
  projectName?: string;
  breakdown: TimeBreakdown;
  metrics: WorkItemMetrics;
}

export type ItemIssue = {
  workItemId: string;
  message: string;
};

export type StateBottleneck = {
  state: string;
  averageHours: number;
  occurrences: number;
};

export type TeamOverview = {
  totalWorkItems: number;
  totalDevelopers: number;
  averageFairEfficiency: number | null;
  averageDeliveryScore: number | null;
  totalActiveHours: number;
};

export interface TeamReport {
  asOf: string;
  windowStart: string | null;
  overview: TeamOverview;
  developers: DeveloperSummary[];
  items: WorkItemReportRow[];
  bottlenecks: StateBottleneck[];
  errors: ItemIssue[];
  warnings: ItemIssue[];
}
