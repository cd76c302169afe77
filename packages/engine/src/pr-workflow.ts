import { StateError } from "@devteam-sim/core";
import type { AgentKind, CodeReview, PRState, PullRequest } from "@devteam-sim/core";

/**
 * Valid state transitions for pull requests.
 * Forward-only; merged → reverted is the one post-merge transition.
 */
export const VALID_TRANSITIONS: Record<PRState, PRState[]> = {
  open: ["in_review", "abandoned"],
  in_review: ["approved", "abandoned"],
  approved: ["merged", "abandoned"],
  merged: ["reverted"],
  reverted: [],
  abandoned: [],
};

/**
 * Callback type for status change events
 */
type StatusCallback = (pr: PullRequest, oldState: PRState | null, newState: PRState) => void;

export interface NewPullRequest {
  authorId: string;
  authorKind: AgentKind;
  day: number;
  latentSuccess: boolean;
  costUsd: number;
  supervisionFactor: number;
  requiredApprovals: number;
}

function formatId(prefix: string, n: number): string {
  return `${prefix}-${String(n).padStart(4, "0")}`;
}

/**
 * Pull requests and their reviews for one run. PRs are never removed, only
 * transitioned, so the full history stays auditable.
 */
export class PullRequestStore {
  private prs: Map<string, PullRequest> = new Map();
  private reviews: Map<string, CodeReview> = new Map();
  private reviewsByPr: Map<string, string[]> = new Map();
  private statusCallbacks: StatusCallback[] = [];

  /**
   * Create a PR in state "open"
   */
  create(input: NewPullRequest): PullRequest {
    const pr: PullRequest = {
      id: formatId("pr", this.prs.size + 1),
      authorId: input.authorId,
      authorKind: input.authorKind,
      createdDay: input.day,
      state: "open",
      reviewers: [],
      approvals: [],
      requiredApprovals: input.requiredApprovals,
      latentSuccess: input.latentSuccess,
      costUsd: input.costUsd,
      supervisionFactor: input.supervisionFactor,
    };
    this.prs.set(pr.id, pr);
    this.reviewsByPr.set(pr.id, []);
    this.fireStatusCallbacks(pr, null, "open");
    return pr;
  }

  /**
   * Assign a reviewer (open → in_review on the first assignment)
   */
  assignReviewer(prId: string, reviewerId: string, day: number): CodeReview {
    const pr = this.require(prId);

    if (pr.authorId === reviewerId) {
      throw new StateError(`Agent ${reviewerId} cannot review its own PR ${prId}`);
    }
    if (pr.state !== "open" && pr.state !== "in_review") {
      throw new StateError(`Cannot assign reviewers to PR ${prId} in state "${pr.state}"`);
    }
    if (pr.reviewers.includes(reviewerId)) {
      throw new StateError(`Agent ${reviewerId} is already reviewing PR ${prId}`);
    }

    const review: CodeReview = {
      id: formatId("rv", this.reviews.size + 1),
      prId,
      reviewerId,
      assignedDay: day,
      hoursInvested: 0,
    };
    this.reviews.set(review.id, review);
    this.reviewsByPr.get(prId)?.push(review.id);
    pr.reviewers.push(reviewerId);

    if (pr.state === "open") {
      this.transition(pr, "in_review");
    }
    return review;
  }

  /**
   * Record a finished review. Approvals are counted toward the PR; reaching
   * the required count moves it to "approved".
   */
  completeReview(reviewId: string, day: number, approved: boolean, hours: number): CodeReview {
    const review = this.reviews.get(reviewId);
    if (!review) {
      throw new StateError(`Review ${reviewId} not found`);
    }
    if (review.completedDay !== undefined) {
      throw new StateError(`Review ${reviewId} is already complete`);
    }

    review.completedDay = day;
    review.approved = approved;
    review.hoursInvested = hours;

    const pr = this.require(review.prId);
    if (approved && pr.state === "in_review" && !pr.approvals.includes(review.reviewerId)) {
      pr.approvals.push(review.reviewerId);
      if (pr.approvals.length >= pr.requiredApprovals) {
        this.transition(pr, "approved");
      }
    }
    return review;
  }

  merge(prId: string, day: number): PullRequest {
    const pr = this.require(prId);
    this.transition(pr, "merged", () => {
      pr.mergedDay = day;
    });
    return pr;
  }

  abandon(prId: string, day: number, rejectedBy?: string): PullRequest {
    const pr = this.require(prId);
    this.transition(pr, "abandoned", () => {
      pr.abandonedDay = day;
      pr.abandonedBy = rejectedBy;
    });
    return pr;
  }

  revert(prId: string, day: number): PullRequest {
    const pr = this.require(prId);
    if (pr.mergedDay !== undefined && day < pr.mergedDay) {
      throw new StateError(`PR ${prId} cannot be reverted before it was merged`);
    }
    this.transition(pr, "reverted", () => {
      pr.revertedDay = day;
    });
    return pr;
  }

  /**
   * PRs that still need reviewers, oldest first
   */
  needingReviewers(reviewersPerPr: number): PullRequest[] {
    return this.getAll().filter(
      (pr) => (pr.state === "open" || pr.state === "in_review") && pr.reviewers.length < reviewersPerPr
    );
  }

  /**
   * Reviews on a PR that have not completed yet
   */
  getPendingReviews(prId: string): CodeReview[] {
    const ids = this.reviewsByPr.get(prId) ?? [];
    const pending: CodeReview[] = [];
    for (const id of ids) {
      const review = this.reviews.get(id);
      if (review && review.completedDay === undefined) pending.push(review);
    }
    return pending;
  }

  getById(prId: string): PullRequest | undefined {
    return this.prs.get(prId);
  }

  getState(prId: string): PRState | undefined {
    return this.prs.get(prId)?.state;
  }

  getReview(reviewId: string): CodeReview | undefined {
    return this.reviews.get(reviewId);
  }

  getByState(state: PRState): PullRequest[] {
    return this.getAll().filter((pr) => pr.state === state);
  }

  getAll(): PullRequest[] {
    return Array.from(this.prs.values());
  }

  getCreatedCount(): number {
    return this.prs.size;
  }

  /** open, in_review and approved */
  getOpenCount(): number {
    return this.getAll().filter((pr) => pr.state === "open" || pr.state === "in_review" || pr.state === "approved").length;
  }

  /** Cumulative: merged PRs that were later reverted still count. */
  getMergedCount(): number {
    return this.getAll().filter((pr) => pr.state === "merged" || pr.state === "reverted").length;
  }

  getAbandonedCount(): number {
    return this.getByState("abandoned").length;
  }

  getRevertedCount(): number {
    return this.getByState("reverted").length;
  }

  /**
   * Register a callback for status changes. `oldState` is null on creation.
   */
  onStatusChange(callback: StatusCallback): void {
    this.statusCallbacks.push(callback);
  }

  private require(prId: string): PullRequest {
    const pr = this.prs.get(prId);
    if (!pr) {
      throw new StateError(`PR ${prId} not found`);
    }
    return pr;
  }

  private transition(pr: PullRequest, newState: PRState, apply?: () => void): void {
    const oldState = pr.state;
    if (!VALID_TRANSITIONS[oldState].includes(newState)) {
      throw new StateError(`Invalid transition: ${oldState} → ${newState} for PR ${pr.id}`);
    }
    apply?.();
    pr.state = newState;
    this.fireStatusCallbacks(pr, oldState, newState);
  }

  private fireStatusCallbacks(pr: PullRequest, oldState: PRState | null, newState: PRState): void {
    for (const callback of this.statusCallbacks) {
      callback(pr, oldState, newState);
    }
  }
}
