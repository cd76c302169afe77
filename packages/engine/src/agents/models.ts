import type { AIModelId } from "@devteam-sim/core";

export interface AIModelProfile {
  productivityRate: number;      // PRs per week, 7-day operation
  quality: number;
  supervisionRequirement: number; // 0..1 extra human review effort
  costPerPr: number;             // USD
}

type KnownModel = Exclude<AIModelId, "custom">;

/** Default parameters per model. Cheaper models trade cost for quality. */
export const AI_MODEL_PROFILES: Record<KnownModel, AIModelProfile> = {
  "claude-sonnet": { productivityRate: 10, quality: 0.8, supervisionRequirement: 0.3, costPerPr: 2.5 },
  "claude-opus": { productivityRate: 8, quality: 0.88, supervisionRequirement: 0.2, costPerPr: 7.5 },
  "gpt-4": { productivityRate: 9, quality: 0.78, supervisionRequirement: 0.35, costPerPr: 4 },
  codellama: { productivityRate: 12, quality: 0.65, supervisionRequirement: 0.5, costPerPr: 0.5 },
};

export const AI_MODEL_IDS = ["claude-sonnet", "claude-opus", "gpt-4", "codellama", "custom"] as const;

export function getModelProfile(model: AIModelId): AIModelProfile | undefined {
  return model === "custom" ? undefined : AI_MODEL_PROFILES[model];
}
