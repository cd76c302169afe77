// Agent kinds
export type AgentKind = "human" | "ai";

// Human experience levels
export type ExperienceLevel = "junior" | "mid" | "senior" | "staff" | "principal";

// Known AI model identifiers ("custom" requires explicit parameters)
export type AIModelId = "claude-sonnet" | "claude-opus" | "gpt-4" | "codellama" | "custom";

// Communication overhead scaling
export type OverheadModel = "linear" | "quadratic" | "hierarchical";

// Pull request lifecycle
export type PRState = "open" | "in_review" | "approved" | "merged" | "reverted" | "abandoned";

export type IncidentSeverity = "low" | "medium" | "high" | "critical";

// A pull request tracked by the simulation
export interface PullRequest {
  id: string;
  authorId: string;
  authorKind: AgentKind;
  createdDay: number;
  state: PRState;
  reviewers: string[];           // Reviewer agent IDs, in assignment order
  approvals: string[];
  requiredApprovals: number;
  latentSuccess: boolean;        // Sampled once at creation, revealed on merge/revert
  costUsd: number;               // Production cost (AI authors only)
  supervisionFactor: number;     // Multiplier on human review time
  mergedDay?: number;
  revertedDay?: number;
  abandonedDay?: number;
  abandonedBy?: string;          // Reviewer whose rejection closed the PR
}

// A code review assigned to one reviewer
export interface CodeReview {
  id: string;
  prId: string;
  reviewerId: string;
  assignedDay: number;
  completedDay?: number;
  approved?: boolean;
  hoursInvested: number;
}

// ---------------------------------------------------------------------------
// Event log
// ---------------------------------------------------------------------------

export interface RunStartedPayload {
  scenario: string;
  seed: string;
  durationDays: number;
  overheadModel: OverheadModel;
  communicationOverhead: number;
  humanCount: number;
  aiCount: number;
  techDebtEnabled: boolean;
  techDebtMaxImpact: number;
  incidentsEnabled: boolean;
}

export interface AgentAddedPayload {
  kind: AgentKind;
  name: string;
  model?: AIModelId;
  experienceLevel?: ExperienceLevel;
}

export interface PrCreatedPayload {
  prId: string;
  authorKind: AgentKind;
  costUsd: number;
  supervisionFactor: number;
}

export interface ReviewAssignedPayload {
  prId: string;
  reviewId: string;
  authorId: string;
  reviewerKind: AgentKind;
}

export interface ReviewCompletedPayload {
  prId: string;
  reviewId: string;
  approved: boolean;
  hours: number;
  supervised: boolean;
}

export interface PrApprovedPayload {
  prId: string;
  approvals: number;
}

export interface PrMergedPayload {
  prId: string;
  cycleTimeDays: number;
  latentSuccess: boolean;
}

export interface PrAbandonedPayload {
  prId: string;
  reason: "rejected_in_review";
  reviewerId: string;
  defectCaught: boolean;
}

export interface PrRevertedPayload {
  prId: string;
  daysAfterMerge: number;
}

export interface TechDebtCreatedPayload {
  debtId: string;
  prId: string;
  severity: number;
  productivityImpact: number;
}

export interface TechDebtPaidPayload {
  debtId: string;
  reason: "paydown" | "reverted";
}

export interface IncidentCreatedPayload {
  incidentId: string;
  severity: IncidentSeverity;
  assignees: string[];
  estimatedHours: number;
}

export interface IncidentResolvedPayload {
  incidentId: string;
  daysToResolve: number;
}

export interface RunCompletedPayload {
  daysElapsed: number;
}

export interface SimulationEventPayloadMap {
  run_started: RunStartedPayload;
  agent_added: AgentAddedPayload;
  pr_created: PrCreatedPayload;
  review_assigned: ReviewAssignedPayload;
  review_completed: ReviewCompletedPayload;
  pr_approved: PrApprovedPayload;
  pr_merged: PrMergedPayload;
  pr_abandoned: PrAbandonedPayload;
  pr_reverted: PrRevertedPayload;
  techdebt_created: TechDebtCreatedPayload;
  techdebt_paid: TechDebtPaidPayload;
  incident_created: IncidentCreatedPayload;
  incident_resolved: IncidentResolvedPayload;
  run_completed: RunCompletedPayload;
}

export type SimulationEventKind = keyof SimulationEventPayloadMap;

export type SimulationEvent<K extends SimulationEventKind = SimulationEventKind> = {
  readonly seq: number;
  readonly kind: K;
  readonly day: number;
  readonly agentId: string | null;
  readonly payload: Readonly<SimulationEventPayloadMap[K]>;
};

/** Narrow an event to one kind. */
export function isEventKind<K extends SimulationEventKind>(
  event: SimulationEvent,
  kind: K
): event is SimulationEvent<K> {
  return event.kind === kind;
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export interface AgentKindMetrics {
  prsCreated: number;
  prsMerged: number;
  prsReverted: number;
  prsAbandoned: number;
  failureRate: number;
  prsPerWeek: number;
  avgCycleTimeDays: number;
}

export interface TechDebtMetrics {
  activeCount: number;
  totalCreated: number;
  totalPaid: number;
  productivityImpact: number;
}

export interface IncidentMetrics {
  total: number;
  active: number;
  resolved: number;
  avgMttrDays: number;
}

export interface SimulationMetrics {
  currentDay: number;
  currentWeek: number;
  daysElapsed: number;

  // Team composition
  totalAgents: number;
  humanDevelopers: number;
  aiAgents: number;
  communicationOverhead: number;

  // Overall delivery
  totalPrsCreated: number;
  totalPrsMerged: number;        // Cumulative, including PRs later reverted
  totalPrsReverted: number;
  totalPrsAbandoned: number;
  openPrs: number;
  defectsCaughtInReview: number;
  avgCycleTimeDays: number;
  changeFailureRate: number;
  prsPerWeek: number;

  // Review effort
  reviewsCompleted: number;
  reviewHours: number;
  supervisionHours: number;      // Review hours spent on AI-authored PRs

  human: AgentKindMetrics;
  ai: AgentKindMetrics;
  aiTotalCost: number;
  aiAvgCostPerPr: number;

  // Present only when the subsystem is enabled
  techDebt?: TechDebtMetrics;
  incidents?: IncidentMetrics;
}

// Per-agent aggregate counts
export interface AgentStats {
  agentId: string;
  name: string;
  kind: AgentKind;
  model?: AIModelId;
  experienceLevel?: ExperienceLevel;
  prsCreated: number;
  prsMerged: number;
  prsReverted: number;
  prsAbandoned: number;
  reviewsCompleted: number;
  reviewHours: number;
  costUsd: number;
  weeksInRole?: number;
  productivityMultiplier?: number;
}

// Progress update handed to streaming consumers
export interface ProgressSnapshot {
  day: number;
  fraction: number;              // 0..1
  metrics: SimulationMetrics;
}

// Structured log entry
export type LogScope = "simulation" | "comparison" | "cli";

export interface LogEntry {
  timestamp: number;
  level: "debug" | "info" | "warn" | "error";
  component: string;
  scope: LogScope;
  scenario?: string;
  message: string;
  data?: Record<string, unknown>;
}
