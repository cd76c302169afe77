import type { AgentKind, AIModelId } from "@devteam-sim/core";
import type { AgentProfile } from "./agent.js";
import { BaseAgent, type BaseAgentParams } from "./base-agent.js";

export interface AIAgentParams extends Omit<BaseAgentParams, "availability" | "workingDaysPerWeek"> {
  model: AIModelId;
  costPerPr: number;
  supervisionRequirement: number;
  canReviewHumanPrs: boolean;
  canReviewAiPrs: boolean;
}

/**
 * AI coding agent: works every day at full availability with no ramp.
 * Its PRs cost money and take more human review time.
 */
export class AIAgent extends BaseAgent {
  readonly kind: AgentKind = "ai";
  readonly model: AIModelId;

  private readonly cost: number;
  private readonly supervisionRequirement: number;
  private readonly canReviewHumanPrs: boolean;
  private readonly canReviewAiPrs: boolean;

  constructor(params: AIAgentParams) {
    super({ ...params, availability: 1, workingDaysPerWeek: 7 });
    this.model = params.model;
    this.cost = params.costPerPr;
    this.supervisionRequirement = params.supervisionRequirement;
    this.canReviewHumanPrs = params.canReviewHumanPrs;
    this.canReviewAiPrs = params.canReviewAiPrs;
  }

  protected productionMultiplier(): number {
    return 1;
  }

  effectiveQuality(): number {
    return this.quality;
  }

  protected costPerPr(): number {
    return this.cost;
  }

  protected supervisionFactor(): number {
    return 1 + this.supervisionRequirement;
  }

  canReview(authorKind: AgentKind): boolean {
    if (this.reviewCapacity <= 0) return false;
    return authorKind === "ai" ? this.canReviewAiPrs : this.canReviewHumanPrs;
  }

  describe(): AgentProfile {
    return {
      id: this.id,
      name: this.name,
      kind: this.kind,
      model: this.model,
      specializations: [...this.specializations],
    };
  }
}
