import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { RandomSource, RunCancelledError, StateError, createLogger, errorMessage } from "@devteam-sim/core";
import type {
  AgentStats,
  Logger,
  PRState,
  ProgressSnapshot,
  PullRequest,
  SimulationEvent,
  SimulationMetrics,
} from "@devteam-sim/core";
import type { AgentAction, AgentRandom, CreatePrAction, SimAgent, SimulationContext } from "./agents/agent.js";
import { EventLog } from "./event-log.js";
import { IncidentTracker } from "./incidents.js";
import { deriveAgentStats, deriveMetrics } from "./metrics.js";
import { communicationOverhead, overheadFactor } from "./overhead.js";
import { PullRequestStore } from "./pr-workflow.js";
import type { SimulationSettings } from "./scenario.js";
import { TechDebtTracker } from "./tech-debt.js";

const logger = createLogger("simulation", "simulation");

export type ProgressHook = (snapshot: ProgressSnapshot) => void | Promise<void>;

export interface SimulationOptions {
  scenario: string;
  settings: SimulationSettings;
  seed: string | number;
  /** Days between progress snapshots. Defaults to 7. */
  progressIntervalDays?: number;
  onProgress?: ProgressHook;
  metadata?: Record<string, unknown>;
}

export interface RunAsyncOptions {
  signal?: AbortSignal;
}

export interface SimulationOutcome {
  metrics: SimulationMetrics;
  agentStats: AgentStats[];
  events: readonly SimulationEvent[];
  seed: string;
  daysElapsed: number;
}

type SimulationStatus = "setup" | "running" | "completed" | "cancelled";

/** Streams of one PR: reviewer picks and revert discovery. */
interface PullRequestRandom {
  key: string;
  assignment: RandomSource;
  revert: RandomSource;
}

interface EngineRandom {
  techDebt: RandomSource;
  incidents: RandomSource;
}

/**
 * One run of one scenario. Owns its agents, pull requests, event log and
 * random streams; nothing is shared between instances.
 *
 * Lifecycle: add agents, then `run()` or `runAsync()` exactly once.
 */
export class Simulation {
  private readonly scenario: string;
  private readonly settings: SimulationSettings;
  private readonly root: RandomSource;
  private readonly random: EngineRandom;
  private readonly progressIntervalDays: number;
  private readonly onProgress: ProgressHook | undefined;
  private readonly metadata: Readonly<Record<string, unknown>>;
  private readonly log: Logger;

  private agents: SimAgent[] = [];
  private agentsById: Map<string, SimAgent> = new Map();
  private agentRandom: Map<string, AgentRandom> = new Map();
  private prRandom: Map<string, PullRequestRandom> = new Map();
  private authoredCount: Map<string, number> = new Map();

  private readonly events = new EventLog();
  private readonly prs = new PullRequestStore();
  private readonly techDebt: TechDebtTracker | null;
  private readonly incidents: IncidentTracker | null;

  private status: SimulationStatus = "setup";
  private currentDay = 0;
  private overhead = 1;
  private overheadMultiplier = 1;

  constructor(options: SimulationOptions) {
    this.scenario = options.scenario;
    this.settings = options.settings;
    this.root = new RandomSource(options.seed);
    this.random = {
      techDebt: this.root.fork("techdebt"),
      incidents: this.root.fork("incidents"),
    };
    this.progressIntervalDays = Math.max(1, Math.floor(options.progressIntervalDays ?? 7));
    this.onProgress = options.onProgress;
    this.metadata = Object.freeze({ ...options.metadata });
    this.log = logger.withScenario(options.scenario);

    const { techDebt, incidents } = options.settings;
    this.techDebt = techDebt.enabled ? new TechDebtTracker(techDebt) : null;
    this.incidents = incidents.enabled ? new IncidentTracker(incidents) : null;

    this.prs.onStatusChange((pr, oldState, newState) => this.recordTransition(pr, oldState, newState));
  }

  get seed(): string {
    return this.root.seed;
  }

  get durationDays(): number {
    return this.settings.durationWeeks * 7;
  }

  addAgent(agent: SimAgent): void {
    if (this.status !== "setup") {
      throw new StateError(`Cannot add agent ${agent.id} after the run has started`);
    }
    if (this.agentsById.has(agent.id)) {
      throw new StateError(`Duplicate agent id ${agent.id}`);
    }
    this.agents.push(agent);
    this.agentsById.set(agent.id, agent);
    // Private streams keyed by id: adding an agent never shifts another's draws.
    this.agentRandom.set(agent.id, {
      production: this.root.fork(`agent/${agent.id}/production`),
    });
  }

  getAgents(): readonly SimAgent[] {
    return this.agents;
  }

  getPullRequests(): PullRequest[] {
    return this.prs.getAll();
  }

  getEvents(): readonly SimulationEvent[] {
    this.assertNotCancelled();
    return this.events.toArray();
  }

  /** Metrics re-derived from the log, optionally as of an earlier day. */
  getMetrics(atDay?: number): SimulationMetrics {
    this.assertNotCancelled();
    return deriveMetrics(this.events.toArray(), { atDay });
  }

  /** Run every day-step synchronously. */
  run(): SimulationOutcome {
    this.begin();
    for (let day = 0; day < this.durationDays; day++) {
      this.step(day);
    }
    return this.finish();
  }

  /**
   * Same as `run()`, yielding to the event loop between steps. An aborted
   * signal stops the run before the next step with RunCancelledError.
   */
  async runAsync(options: RunAsyncOptions = {}): Promise<SimulationOutcome> {
    const { signal } = options;
    this.begin();
    for (let day = 0; day < this.durationDays; day++) {
      if (signal?.aborted) this.cancel(day);
      this.step(day);
      await yieldToEventLoop();
    }
    if (signal?.aborted) this.cancel(this.durationDays);
    return this.finish();
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  private begin(): void {
    if (this.status !== "setup") {
      throw new StateError(`Simulation "${this.scenario}" has already been run`);
    }
    if (this.agents.length === 0) {
      throw new StateError(`Simulation "${this.scenario}" has no agents`);
    }
    this.status = "running";

    const humanCount = this.agents.filter((a) => a.kind === "human").length;
    const aiCount = this.agents.length - humanCount;
    const { overheadModel, overheadCountsAiAgents, communicationLossFactor } = this.settings;
    const teamSize = overheadCountsAiAgents ? this.agents.length : humanCount;
    this.overhead = communicationOverhead(teamSize, overheadModel);
    this.overheadMultiplier = overheadFactor(teamSize, overheadModel, communicationLossFactor);

    this.events.append("run_started", 0, null, {
      scenario: this.scenario,
      seed: this.seed,
      durationDays: this.durationDays,
      overheadModel,
      communicationOverhead: this.overhead,
      humanCount,
      aiCount,
      techDebtEnabled: this.techDebt !== null,
      techDebtMaxImpact: this.settings.techDebt.maxImpact,
      incidentsEnabled: this.incidents !== null,
    });
    for (const agent of this.agents) {
      const profile = agent.describe();
      this.events.append("agent_added", 0, agent.id, {
        kind: agent.kind,
        name: agent.name,
        model: profile.model,
        experienceLevel: profile.experienceLevel,
      });
    }

    this.log.info("Run started", {
      seed: this.seed,
      durationDays: this.durationDays,
      humans: humanCount,
      aiAgents: aiCount,
      overhead: this.overhead,
    });
  }

  private finish(): SimulationOutcome {
    const daysElapsed = this.durationDays;
    this.events.append("run_completed", daysElapsed - 1, null, { daysElapsed });
    this.status = "completed";

    const events = this.events.toArray();
    const metrics = deriveMetrics(events);
    const profiles = new Map(this.agents.map((a) => [a.id, a.describe()]));
    const agentStats = deriveAgentStats(events).map((stats) => {
      const profile = profiles.get(stats.agentId);
      return profile?.weeksInRole === undefined
        ? stats
        : { ...stats, weeksInRole: profile.weeksInRole, productivityMultiplier: profile.productivityMultiplier };
    });

    this.log.info("Run completed", {
      events: events.length,
      prsCreated: metrics.totalPrsCreated,
      prsMerged: metrics.totalPrsMerged,
      changeFailureRate: metrics.changeFailureRate,
    });
    return { metrics, agentStats, events, seed: this.seed, daysElapsed };
  }

  private cancel(day: number): never {
    this.status = "cancelled";
    this.log.warn("Run cancelled", { day });
    throw new RunCancelledError(this.scenario, day);
  }

  private assertNotCancelled(): void {
    if (this.status === "cancelled") {
      throw new StateError(`Run of "${this.scenario}" was cancelled; its partial results are discarded`);
    }
  }

  // -------------------------------------------------------------------------
  // Day step
  // -------------------------------------------------------------------------

  private step(day: number): void {
    this.currentDay = day;
    const currentWeek = Math.floor(day / 7);

    if (this.techDebt && day > 0 && day % 7 === 0) {
      for (const item of this.techDebt.paydown(this.random.techDebt, day)) {
        this.events.append("techdebt_paid", day, null, { debtId: item.id, reason: "paydown" });
      }
    }

    const debtImpact = this.techDebt?.getTotalImpact() ?? 0;
    const context: SimulationContext = Object.freeze({
      currentDay: day,
      currentWeek,
      seed: this.seed,
      creationFactor: this.overheadMultiplier * (1 - debtImpact),
      reviewFactor: this.overheadMultiplier,
      incidentDuty: this.incidents?.onDuty() ?? new Set<string>(),
      metadata: this.metadata,
    });

    const actions: AgentAction[] = [];
    for (const agent of this.agents) {
      const random = this.agentRandom.get(agent.id);
      if (random) actions.push(...agent.step(context, random));
    }

    for (const action of actions) {
      if (action.type === "create_pr") this.createPullRequest(action, day);
    }
    this.assignReviewers(day);

    for (const action of actions) {
      if (action.type === "complete_review") this.completeReview(action.reviewId, action.approved, day);
    }

    this.discoverReverts(day);

    if (this.incidents) this.stepIncidents(this.incidents, day, debtImpact);

    this.log.debug("Step complete", { day, actions: actions.length, events: this.events.size });
    this.reportProgress(day);
  }

  private createPullRequest(action: CreatePrAction, day: number): void {
    const author = this.agentsById.get(action.authorId);
    if (!author) return;
    const pr = this.prs.create({
      authorId: author.id,
      authorKind: author.kind,
      day,
      latentSuccess: action.latentSuccess,
      costUsd: action.costUsd,
      supervisionFactor: action.supervisionFactor,
      requiredApprovals: this.settings.review.requiredApprovals,
    });

    // Keyed by author and ordinal, not by the global PR id, so one author's
    // PRs draw the same numbers whoever else is on the team.
    const ordinal = (this.authoredCount.get(author.id) ?? 0) + 1;
    this.authoredCount.set(author.id, ordinal);
    const key = `pr/${author.id}/${ordinal}`;
    this.prRandom.set(pr.id, {
      key,
      assignment: this.root.fork(`${key}/assignment`),
      revert: this.root.fork(`${key}/revert`),
    });
  }

  private randomFor(prId: string): PullRequestRandom {
    const random = this.prRandom.get(prId);
    if (!random) throw new StateError(`No random streams for PR ${prId}`);
    return random;
  }

  /** Weighted by spare capacity, so idle reviewers are favored. */
  private assignReviewers(day: number): void {
    const { reviewersPerPr, defectDetectionRate, falseRejectionRate } = this.settings.review;

    for (const pr of this.prs.needingReviewers(reviewersPerPr)) {
      const pool = this.agents.filter(
        (a) => a.id !== pr.authorId && !pr.reviewers.includes(a.id) && a.canReview(pr.authorKind)
      );
      const needed = Math.min(reviewersPerPr - pr.reviewers.length, pool.length);
      const random = this.randomFor(pr.id);

      for (let i = 0; i < needed; i++) {
        const reviewer = random.assignment.weightedPick(
          pool,
          pool.map((a) => a.spareReviewCapacity() + 0.1)
        );
        if (!reviewer) break;
        pool.splice(pool.indexOf(reviewer), 1);

        const review = this.prs.assignReviewer(pr.id, reviewer.id, day);
        reviewer.acceptReview({
          reviewId: review.id,
          prId: pr.id,
          authorId: pr.authorId,
          authorKind: pr.authorKind,
          latentSuccess: pr.latentSuccess,
          defectDetectionRate,
          falseRejectionRate,
          random: this.root.fork(`${random.key}/review/${reviewer.id}`),
        });
        this.events.append("review_assigned", day, reviewer.id, {
          prId: pr.id,
          reviewId: review.id,
          authorId: pr.authorId,
          reviewerKind: reviewer.kind,
        });
      }
    }
  }

  private completeReview(reviewId: string, approved: boolean, day: number): void {
    const pending = this.prs.getReview(reviewId);
    if (!pending) return;
    const pr = this.prs.getById(pending.prId);
    // A sibling review may have closed the PR earlier in this step.
    if (!pr || pr.state !== "in_review") return;

    const hours = this.settings.review.baseReviewHours * pr.supervisionFactor;
    const review = this.prs.completeReview(reviewId, day, approved, hours);
    this.events.append("review_completed", day, review.reviewerId, {
      prId: pr.id,
      reviewId,
      approved,
      hours,
      supervised: pr.authorKind === "ai",
    });

    if (!approved) {
      this.prs.abandon(pr.id, day, review.reviewerId);
      this.withdrawPendingReviews(pr.id);
    } else if (this.prs.getState(pr.id) === "approved") {
      this.prs.merge(pr.id, day);
      this.withdrawPendingReviews(pr.id);
      this.accrueDebt(pr, day);
    }
  }

  private withdrawPendingReviews(prId: string): void {
    for (const review of this.prs.getPendingReviews(prId)) {
      this.agentsById.get(review.reviewerId)?.withdrawReview(review.id);
    }
  }

  private accrueDebt(pr: PullRequest, day: number): void {
    if (!this.techDebt || pr.latentSuccess) return;
    if (!this.techDebt.shouldAccrue(this.random.techDebt)) return;

    const author = this.agentsById.get(pr.authorId);
    const item = this.techDebt.add(day, pr.id, author?.effectiveQuality() ?? 1);
    this.events.append("techdebt_created", day, pr.authorId, {
      debtId: item.id,
      prId: pr.id,
      severity: item.severity,
      productivityImpact: item.productivityImpact,
    });
  }

  /**
   * Latent failures surface after merge with probability
   * `initialProbability × decay^(d − 1)` on day d, up to `windowDays`.
   */
  private discoverReverts(day: number): void {
    const { initialProbability, decay, windowDays } = this.settings.revertDiscovery;

    for (const pr of this.prs.getByState("merged")) {
      if (pr.latentSuccess || pr.mergedDay === undefined) continue;
      const daysAfterMerge = day - pr.mergedDay;
      if (daysAfterMerge < 1 || daysAfterMerge > windowDays) continue;

      const p = initialProbability * Math.pow(decay, daysAfterMerge - 1);
      if (!this.randomFor(pr.id).revert.chance(p)) continue;

      this.prs.revert(pr.id, day);
      if (this.techDebt) {
        for (const item of this.techDebt.activeForPr(pr.id)) {
          this.techDebt.payOff(item, day);
          this.events.append("techdebt_paid", day, null, { debtId: item.id, reason: "reverted" });
        }
      }
    }
  }

  private stepIncidents(incidents: IncidentTracker, day: number, debtImpact: number): void {
    const resolved = incidents.work(day, (agentId) => {
      const agent = this.agentsById.get(agentId);
      return agent && agent.isWorkingDay(day) ? agent.effectiveAvailability() : 0;
    });
    for (const incident of resolved) {
      this.events.append("incident_resolved", day, null, {
        incidentId: incident.id,
        daysToResolve: day - incident.createdDay,
      });
    }

    const recentReverts = this.prs
      .getByState("reverted")
      .filter((pr) => pr.revertedDay !== undefined && pr.revertedDay > day - 7).length;
    const probability = incidents.dailyProbability(debtImpact, recentReverts);
    const responders = this.agents.filter((a) => a.kind === "human").map((a) => a.id);

    for (let i = 0; i < responders.length; i++) {
      if (!this.random.incidents.chance(probability)) continue;
      const incident = incidents.open(day, this.random.incidents, responders);
      if (!incident) continue;
      this.events.append("incident_created", day, null, {
        incidentId: incident.id,
        severity: incident.severity,
        assignees: [...incident.assignees],
        estimatedHours: incident.estimatedHours,
      });
    }
  }

  // -------------------------------------------------------------------------
  // Events and progress
  // -------------------------------------------------------------------------

  private recordTransition(pr: PullRequest, oldState: PRState | null, newState: PRState): void {
    const day = this.currentDay;
    switch (newState) {
      case "open":
        if (oldState === null) {
          this.events.append("pr_created", day, pr.authorId, {
            prId: pr.id,
            authorKind: pr.authorKind,
            costUsd: pr.costUsd,
            supervisionFactor: pr.supervisionFactor,
          });
        }
        break;
      case "approved":
        this.events.append("pr_approved", day, pr.authorId, { prId: pr.id, approvals: pr.approvals.length });
        break;
      case "merged":
        this.events.append("pr_merged", day, pr.authorId, {
          prId: pr.id,
          cycleTimeDays: day - pr.createdDay,
          latentSuccess: pr.latentSuccess,
        });
        break;
      case "reverted":
        this.events.append("pr_reverted", day, pr.authorId, {
          prId: pr.id,
          daysAfterMerge: day - (pr.mergedDay ?? day),
        });
        break;
      case "abandoned":
        this.events.append("pr_abandoned", day, pr.authorId, {
          prId: pr.id,
          reason: "rejected_in_review",
          reviewerId: pr.abandonedBy ?? "",
          defectCaught: !pr.latentSuccess,
        });
        break;
      case "in_review":
        break;
    }
  }

  /** Fire-and-forget: the hook is never awaited and its failures are only logged. */
  private reportProgress(day: number): void {
    const hook = this.onProgress;
    if (!hook) return;
    const isLast = day === this.durationDays - 1;
    if ((day + 1) % this.progressIntervalDays !== 0 && !isLast) return;

    const snapshot: ProgressSnapshot = {
      day,
      fraction: (day + 1) / this.durationDays,
      metrics: deriveMetrics(this.events.toArray(), { atDay: day }),
    };
    try {
      const result = hook(snapshot);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          this.log.warn("Progress hook failed", { day, error: errorMessage(err) });
        });
      }
    } catch (err) {
      this.log.warn("Progress hook failed", { day, error: errorMessage(err) });
    }
  }
}
