import type { AgentKind, AIModelId, ExperienceLevel, RandomSource } from "@devteam-sim/core";

/**
 * Read-only view of the current step handed to every agent.
 * A fresh object is built for each simulated day.
 */
export interface SimulationContext {
  readonly currentDay: number;
  readonly currentWeek: number;
  readonly seed: string;
  /** Communication overhead × tech-debt multiplier on PR creation. */
  readonly creationFactor: number;
  /** Communication overhead multiplier on review completion. */
  readonly reviewFactor: number;
  /** Agents pulled onto incident response for this day. */
  readonly incidentDuty: ReadonlySet<string>;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** Private random stream of one agent. */
export interface AgentRandom {
  production: RandomSource;
}

export interface CreatePrAction {
  type: "create_pr";
  authorId: string;
  latentSuccess: boolean;
  costUsd: number;
  supervisionFactor: number;
}

export interface CompleteReviewAction {
  type: "complete_review";
  reviewerId: string;
  reviewId: string;
  approved: boolean;
}

/** Declarative requests consumed by the engine. Agents never touch PRs directly. */
export type AgentAction = CreatePrAction | CompleteReviewAction;

/** What a reviewer is told about a PR when it is assigned. */
export interface ReviewAssignment {
  reviewId: string;
  prId: string;
  authorId: string;
  authorKind: AgentKind;
  latentSuccess: boolean;
  defectDetectionRate: number;
  falseRejectionRate: number;
  /** Completion and decision draws for this review only. */
  random: RandomSource;
}

export interface AgentProfile {
  id: string;
  name: string;
  kind: AgentKind;
  model?: AIModelId;
  experienceLevel?: ExperienceLevel;
  specializations: string[];
  weeksInRole?: number;
  productivityMultiplier?: number;
}

/**
 * Behavior contract shared by every agent variant. The engine dispatches only
 * through this interface.
 */
export interface SimAgent {
  readonly id: string;
  readonly kind: AgentKind;
  readonly name: string;

  step(context: SimulationContext, random: AgentRandom): AgentAction[];

  /** Whether this agent may review a PR written by an agent of `authorKind`. */
  canReview(authorKind: AgentKind): boolean;

  /**
   * Reviews per week still unclaimed by human-authored PRs. Used to weight
   * reviewer assignment; AI supervision is priced in review hours instead.
   */
  spareReviewCapacity(): number;

  /** Effective availability, used for incident work hours. */
  effectiveAvailability(): number;

  /** Probability that a PR written now carries no latent defect. */
  effectiveQuality(): number;

  isWorkingDay(day: number): boolean;

  acceptReview(assignment: ReviewAssignment): void;
  withdrawReview(reviewId: string): void;

  describe(): AgentProfile;
}
