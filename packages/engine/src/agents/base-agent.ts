import type { AgentKind, RandomSource } from "@devteam-sim/core";
import type {
  AgentAction,
  AgentProfile,
  AgentRandom,
  CompleteReviewAction,
  CreatePrAction,
  ReviewAssignment,
  SimAgent,
  SimulationContext,
} from "./agent.js";

export interface BaseAgentParams {
  id: string;
  name: string;
  productivityRate: number;      // PRs per week
  quality: number;               // Probability a PR is free of latent defects
  reviewCapacity: number;        // Reviews per week
  availability: number;          // Fraction of time available for work
  workingDaysPerWeek: number;
  specializations: string[];
}

/**
 * Shared production and review behavior. Variants decide how productivity,
 * quality, cost and reviewing rights are derived.
 */
export abstract class BaseAgent implements SimAgent {
  readonly id: string;
  readonly name: string;
  abstract readonly kind: AgentKind;

  protected readonly productivityRate: number;
  protected readonly quality: number;
  protected readonly reviewCapacity: number;
  protected readonly availability: number;
  protected readonly workingDaysPerWeek: number;
  protected readonly specializations: string[];

  private pendingReviews: ReviewAssignment[] = [];

  constructor(params: BaseAgentParams) {
    this.id = params.id;
    this.name = params.name;
    this.productivityRate = params.productivityRate;
    this.quality = params.quality;
    this.reviewCapacity = params.reviewCapacity;
    this.availability = params.availability;
    this.workingDaysPerWeek = params.workingDaysPerWeek;
    this.specializations = [...params.specializations];
  }

  /** Multiplier on the weekly productivity rate (onboarding, seniority). */
  protected abstract productionMultiplier(): number;

  /** Probability that a PR created now carries no latent defect. */
  abstract effectiveQuality(): number;

  protected abstract costPerPr(): number;

  /** Multiplier on human review time for PRs this agent writes. */
  protected abstract supervisionFactor(): number;

  abstract canReview(authorKind: AgentKind): boolean;

  abstract describe(): AgentProfile;

  /** Hook for per-day state updates. Runs on every day, working or not. */
  protected observeDay(_context: SimulationContext): void {}

  effectiveAvailability(): number {
    return this.availability;
  }

  isWorkingDay(day: number): boolean {
    return day % 7 < this.workingDaysPerWeek;
  }

  step(context: SimulationContext, random: AgentRandom): AgentAction[] {
    this.observeDay(context);
    if (!this.isWorkingDay(context.currentDay)) return [];

    return [
      ...this.producePullRequests(context, random.production),
      ...this.progressReviews(context),
    ];
  }

  dailyCreationProbability(context: SimulationContext): number {
    if (this.productivityRate <= 0 || this.effectiveAvailability() <= 0 || this.workingDaysPerWeek <= 0) {
      return 0;
    }
    const p =
      (this.productivityRate / this.workingDaysPerWeek) *
      this.productionMultiplier() *
      this.effectiveAvailability() *
      context.creationFactor;
    return Number.isFinite(p) && p > 0 ? p : 0;
  }

  dailyReviewProbability(context: SimulationContext): number {
    if (this.reviewCapacity <= 0 || this.effectiveAvailability() <= 0 || this.workingDaysPerWeek <= 0) {
      return 0;
    }
    const p =
      (this.reviewCapacity / this.workingDaysPerWeek) *
      this.effectiveAvailability() *
      context.reviewFactor;
    return Math.min(1, Math.max(0, p));
  }

  private producePullRequests(context: SimulationContext, rng: RandomSource): CreatePrAction[] {
    if (context.incidentDuty.has(this.id)) return [];

    const p = this.dailyCreationProbability(context);
    if (p <= 0) return [];

    // Rates above one PR per day yield the whole part deterministically.
    const whole = Math.floor(p);
    const count = whole + (rng.chance(p - whole) ? 1 : 0);

    const actions: CreatePrAction[] = [];
    for (let i = 0; i < count; i++) {
      actions.push({
        type: "create_pr",
        authorId: this.id,
        latentSuccess: rng.chance(this.effectiveQuality()),
        costUsd: this.costPerPr(),
        supervisionFactor: this.supervisionFactor(),
      });
    }
    return actions;
  }

  private progressReviews(context: SimulationContext): CompleteReviewAction[] {
    if (this.pendingReviews.length === 0) return [];

    const p = this.dailyReviewProbability(context);
    const actions: CompleteReviewAction[] = [];
    const stillPending: ReviewAssignment[] = [];

    for (const assignment of this.pendingReviews) {
      const rng = assignment.random;
      if (!rng.chance(p)) {
        stillPending.push(assignment);
        continue;
      }
      const rejectProbability = assignment.latentSuccess
        ? assignment.falseRejectionRate
        : assignment.defectDetectionRate * this.effectiveQuality();
      actions.push({
        type: "complete_review",
        reviewerId: this.id,
        reviewId: assignment.reviewId,
        approved: !rng.chance(rejectProbability),
      });
    }

    this.pendingReviews = stillPending;
    return actions;
  }

  spareReviewCapacity(): number {
    const claimed = this.pendingReviews.filter((r) => r.authorKind === "human").length;
    return Math.max(0, this.reviewCapacity - claimed);
  }

  acceptReview(assignment: ReviewAssignment): void {
    this.pendingReviews.push(assignment);
  }

  withdrawReview(reviewId: string): void {
    this.pendingReviews = this.pendingReviews.filter((r) => r.reviewId !== reviewId);
  }
}
