import { isEventKind } from "@devteam-sim/core";
import type {
  AgentKind,
  AgentKindMetrics,
  AgentStats,
  IncidentMetrics,
  SimulationEvent,
  SimulationMetrics,
  TechDebtMetrics,
} from "@devteam-sim/core";

export interface DeriveOptions {
  /** Only consider events up to and including this day. */
  atDay?: number;
}

interface KindTally {
  created: number;
  merged: number;
  reverted: number;
  abandoned: number;
  cycleTimes: number[];
}

function emptyTally(): KindTally {
  return { created: 0, merged: 0, reverted: 0, abandoned: 0, cycleTimes: [] };
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function toKindMetrics(tally: KindTally, weeks: number): AgentKindMetrics {
  return {
    prsCreated: tally.created,
    prsMerged: tally.merged,
    prsReverted: tally.reverted,
    prsAbandoned: tally.abandoned,
    failureRate: ratio(tally.reverted, tally.merged),
    prsPerWeek: tally.merged / weeks,
    avgCycleTimeDays: average(tally.cycleTimes),
  };
}

function visibleEvents(events: readonly SimulationEvent[], options: DeriveOptions): readonly SimulationEvent[] {
  const { atDay } = options;
  if (atDay === undefined) return events;
  return events.filter((e) => e.day <= atDay);
}

/**
 * Derive the metrics record from an event log. Pure: the same log always
 * yields the same record, and nothing outside the log is consulted.
 */
export function deriveMetrics(events: readonly SimulationEvent[], options: DeriveOptions = {}): SimulationMetrics {
  const visible = visibleEvents(events, options);

  let humanDevelopers = 0;
  let aiAgents = 0;
  let communicationOverhead = 1;
  let techDebtEnabled = false;
  let techDebtMaxImpact = 0;
  let incidentsEnabled = false;
  let lastDay = 0;
  let completedDays: number | null = null;

  const prKind = new Map<string, AgentKind>();
  const tallies: Record<AgentKind, KindTally> = { human: emptyTally(), ai: emptyTally() };
  const allCycleTimes: number[] = [];

  let defectsCaughtInReview = 0;
  let reviewsCompleted = 0;
  let reviewHours = 0;
  let supervisionHours = 0;
  let aiTotalCost = 0;

  const debtImpact = new Map<string, number>();
  let debtCreated = 0;
  let debtPaid = 0;

  const incidentOpen = new Set<string>();
  let incidentsTotal = 0;
  const mttr: number[] = [];

  for (const event of visible) {
    lastDay = Math.max(lastDay, event.day);

    if (isEventKind(event, "run_started")) {
      communicationOverhead = event.payload.communicationOverhead;
      techDebtEnabled = event.payload.techDebtEnabled;
      techDebtMaxImpact = event.payload.techDebtMaxImpact;
      incidentsEnabled = event.payload.incidentsEnabled;
    } else if (isEventKind(event, "agent_added")) {
      if (event.payload.kind === "human") humanDevelopers++;
      else aiAgents++;
    } else if (isEventKind(event, "pr_created")) {
      const kind = event.payload.authorKind;
      prKind.set(event.payload.prId, kind);
      tallies[kind].created++;
      if (kind === "ai") aiTotalCost += event.payload.costUsd;
    } else if (isEventKind(event, "review_completed")) {
      reviewsCompleted++;
      reviewHours += event.payload.hours;
      if (event.payload.supervised) supervisionHours += event.payload.hours;
    } else if (isEventKind(event, "pr_merged")) {
      const tally = tallies[prKind.get(event.payload.prId) ?? "human"];
      tally.merged++;
      tally.cycleTimes.push(event.payload.cycleTimeDays);
      allCycleTimes.push(event.payload.cycleTimeDays);
    } else if (isEventKind(event, "pr_reverted")) {
      tallies[prKind.get(event.payload.prId) ?? "human"].reverted++;
    } else if (isEventKind(event, "pr_abandoned")) {
      tallies[prKind.get(event.payload.prId) ?? "human"].abandoned++;
      if (event.payload.defectCaught) defectsCaughtInReview++;
    } else if (isEventKind(event, "techdebt_created")) {
      debtCreated++;
      debtImpact.set(event.payload.debtId, event.payload.productivityImpact);
    } else if (isEventKind(event, "techdebt_paid")) {
      debtPaid++;
      debtImpact.delete(event.payload.debtId);
    } else if (isEventKind(event, "incident_created")) {
      incidentsTotal++;
      incidentOpen.add(event.payload.incidentId);
    } else if (isEventKind(event, "incident_resolved")) {
      incidentOpen.delete(event.payload.incidentId);
      mttr.push(event.payload.daysToResolve);
    } else if (isEventKind(event, "run_completed")) {
      completedDays = event.payload.daysElapsed;
    }
  }

  const currentDay = options.atDay ?? lastDay;
  const daysElapsed = completedDays ?? currentDay + 1;
  const weeks = Math.max(1, daysElapsed / 7);

  const human = tallies.human;
  const ai = tallies.ai;
  const created = human.created + ai.created;
  const merged = human.merged + ai.merged;
  const reverted = human.reverted + ai.reverted;
  const abandoned = human.abandoned + ai.abandoned;

  const metrics: SimulationMetrics = {
    currentDay,
    currentWeek: Math.floor(currentDay / 7),
    daysElapsed,
    totalAgents: humanDevelopers + aiAgents,
    humanDevelopers,
    aiAgents,
    communicationOverhead,
    totalPrsCreated: created,
    totalPrsMerged: merged,
    totalPrsReverted: reverted,
    totalPrsAbandoned: abandoned,
    openPrs: created - merged - abandoned,
    defectsCaughtInReview,
    avgCycleTimeDays: average(allCycleTimes),
    changeFailureRate: ratio(reverted, merged),
    prsPerWeek: merged / weeks,
    reviewsCompleted,
    reviewHours,
    supervisionHours,
    human: toKindMetrics(human, weeks),
    ai: toKindMetrics(ai, weeks),
    aiTotalCost,
    aiAvgCostPerPr: ratio(aiTotalCost, ai.created),
  };

  if (techDebtEnabled) {
    const totalImpact = Array.from(debtImpact.values()).reduce((sum, v) => sum + v, 0);
    const techDebt: TechDebtMetrics = {
      activeCount: debtImpact.size,
      totalCreated: debtCreated,
      totalPaid: debtPaid,
      productivityImpact: Math.min(totalImpact, techDebtMaxImpact),
    };
    metrics.techDebt = techDebt;
  }

  if (incidentsEnabled) {
    const incidents: IncidentMetrics = {
      total: incidentsTotal,
      active: incidentOpen.size,
      resolved: mttr.length,
      avgMttrDays: average(mttr),
    };
    metrics.incidents = incidents;
  }

  return metrics;
}

/** Per-agent counts derived from the event log, in registration order. */
export function deriveAgentStats(events: readonly SimulationEvent[], options: DeriveOptions = {}): AgentStats[] {
  const visible = visibleEvents(events, options);
  const stats = new Map<string, AgentStats>();
  const prAuthor = new Map<string, string>();

  const forAgent = (agentId: string | null): AgentStats | undefined =>
    agentId === null ? undefined : stats.get(agentId);
  const forPr = (prId: string): AgentStats | undefined => forAgent(prAuthor.get(prId) ?? null);

  for (const event of visible) {
    if (isEventKind(event, "agent_added") && event.agentId !== null) {
      stats.set(event.agentId, {
        agentId: event.agentId,
        name: event.payload.name,
        kind: event.payload.kind,
        model: event.payload.model,
        experienceLevel: event.payload.experienceLevel,
        prsCreated: 0,
        prsMerged: 0,
        prsReverted: 0,
        prsAbandoned: 0,
        reviewsCompleted: 0,
        reviewHours: 0,
        costUsd: 0,
      });
    } else if (isEventKind(event, "pr_created")) {
      if (event.agentId !== null) prAuthor.set(event.payload.prId, event.agentId);
      const author = forAgent(event.agentId);
      if (author) {
        author.prsCreated++;
        author.costUsd += event.payload.costUsd;
      }
    } else if (isEventKind(event, "pr_merged")) {
      const author = forPr(event.payload.prId);
      if (author) author.prsMerged++;
    } else if (isEventKind(event, "pr_reverted")) {
      const author = forPr(event.payload.prId);
      if (author) author.prsReverted++;
    } else if (isEventKind(event, "pr_abandoned")) {
      const author = forPr(event.payload.prId);
      if (author) author.prsAbandoned++;
    } else if (isEventKind(event, "review_completed")) {
      const reviewer = forAgent(event.agentId);
      if (reviewer) {
        reviewer.reviewsCompleted++;
        reviewer.reviewHours += event.payload.hours;
      }
    }
  }

  return Array.from(stats.values());
}
