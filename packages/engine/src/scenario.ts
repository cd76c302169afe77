import { z } from "zod";
import { ConfigurationError } from "@devteam-sim/core";
import type { ConfigIssue } from "@devteam-sim/core";
import { AI_MODEL_IDS, getModelProfile } from "./agents/models.js";
import type { AIAgentParams } from "./agents/ai-agent.js";
import type { DeveloperParams } from "./agents/developer.js";

const EXPERIENCE_LEVELS = ["junior", "mid", "senior", "staff", "principal"] as const;
const probability = () => z.number().min(0).max(1);

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const developerSchema = z
  .object({
    name: z.string().min(1).optional(),
    count: z.number().int().min(1).default(1),
    experienceLevel: z.enum(EXPERIENCE_LEVELS).default("mid"),
    productivityRate: z.number().positive().default(3.5),
    quality: probability().default(0.85),
    reviewCapacity: z.number().min(0).default(5),
    availability: probability().default(0.7),
    onboardingWeeks: z.number().min(0).default(10),
    tenureWeeks: z.number().min(0).default(0),
    meetingHoursPerWeek: z.number().min(0).max(40).default(5),
    specializations: z.array(z.string()).default([]),
  })
  .strict();

export const aiAgentSchema = z
  .object({
    name: z.string().min(1).optional(),
    count: z.number().int().min(1).default(1),
    model: z.enum(AI_MODEL_IDS).default("claude-sonnet"),
    productivityRate: z.number().positive().optional(),
    quality: probability().optional(),
    supervisionRequirement: probability().optional(),
    costPerPr: z.number().min(0).optional(),
    reviewCapacity: z.number().min(0).default(0),
    canReviewHumanPrs: z.boolean().default(false),
    canReviewAiPrs: z.boolean().default(false),
    specializations: z.array(z.string()).default([]),
  })
  .strict()
  .superRefine((agent, ctx) => {
    if (agent.model !== "custom") return;
    for (const key of ["productivityRate", "quality", "supervisionRequirement", "costPerPr"] as const) {
      if (agent[key] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `Required for model "custom"` });
      }
    }
  });

export const teamSchema = z
  .object({
    developers: z.array(developerSchema).default([]),
    aiAgents: z.array(aiAgentSchema).default([]),
    count: z.number().int().min(0).optional(),
    distribution: z.record(z.enum(EXPERIENCE_LEVELS), z.number().int().min(0)).optional(),
  })
  .strict();

export const reviewSchema = z
  .object({
    reviewersPerPr: z.number().int().min(1).default(1),
    requiredApprovals: z.number().int().min(1).default(1),
    defectDetectionRate: probability().default(0.5),
    falseRejectionRate: probability().default(0.02),
    baseReviewHours: z.number().positive().default(1),
  })
  .strict()
  .refine((r) => r.requiredApprovals <= r.reviewersPerPr, {
    path: ["requiredApprovals"],
    message: "Must not exceed reviewersPerPr",
  });

export const revertDiscoverySchema = z
  .object({
    initialProbability: probability().default(0.15),
    decay: z.number().gt(0).max(1).default(0.9),
    windowDays: z.number().int().min(1).default(30),
  })
  .strict();

export const techDebtSchema = z
  .object({
    enabled: z.boolean().default(false),
    accumulationRate: probability().default(0.15),
    paydownProbability: probability().default(0.05),
    maxImpact: probability().default(0.5),
  })
  .strict();

export const incidentsSchema = z
  .object({
    enabled: z.boolean().default(false),
    weeklyRatePerDeveloper: probability().default(0.05),
    hoursPerDay: z.number().positive().max(24).default(8),
  })
  .strict();

export const simulationSchema = z
  .object({
    durationWeeks: z.number().int().positive().default(12),
    seed: z.union([z.number().int(), z.string().min(1)]).optional(),
    communicationLossFactor: probability().default(0.3),
    overheadModel: z.enum(["linear", "quadratic", "hierarchical"]).default("quadratic"),
    overheadCountsAiAgents: z.boolean().default(false),
    onboardingQualityFloor: probability().default(0.5),
    review: reviewSchema.default({}),
    revertDiscovery: revertDiscoverySchema.default({}),
    techDebt: techDebtSchema.default({}),
    incidents: incidentsSchema.default({}),
  })
  .strict();

export const scenarioSchema = z
  .object({
    name: z.string().min(1).default("Unnamed Scenario"),
    description: z.string().optional(),
    tags: z.array(z.string()).default([]),
    team: teamSchema.default({}),
    simulation: simulationSchema.default({}),
  })
  .strict()
  .superRefine((scenario, ctx) => {
    if (countAgents(scenario.team) === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["team"], message: "Team has no agents" });
    }
  });

export type ScenarioInput = z.input<typeof scenarioSchema>;
export type ScenarioConfig = z.output<typeof scenarioSchema>;
export type TeamConfig = ScenarioConfig["team"];
export type DeveloperConfig = z.output<typeof developerSchema>;
export type DeveloperInput = z.input<typeof developerSchema>;
export type AIAgentConfig = z.output<typeof aiAgentSchema>;
export type AIAgentInput = z.input<typeof aiAgentSchema>;
export type SimulationSettings = ScenarioConfig["simulation"];
export type SimulationSettingsInput = z.input<typeof simulationSchema>;
export type ReviewPolicy = SimulationSettings["review"];
export type RevertDiscoveryPolicy = SimulationSettings["revertDiscovery"];

function countAgents(team: TeamConfig): number {
  const listed = team.developers.reduce((n, d) => n + d.count, 0) + team.aiAgents.reduce((n, a) => n + a.count, 0);
  const distributed = Object.values(team.distribution ?? {}).reduce((n, c) => n + (c ?? 0), 0);
  return listed + (team.count ?? 0) + distributed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function nameOf(input: unknown): string | undefined {
  if (typeof input === "object" && input !== null && "name" in input && typeof input.name === "string") {
    return input.name;
  }
  return undefined;
}

export function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/**
 * Validate a scenario descriptor and fill in defaults.
 * Throws ConfigurationError listing every invalid field, tagged with the
 * scenario name or, failing that, `source`.
 */
export function validateScenario(input: unknown, source?: string): ScenarioConfig {
  const result = scenarioSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(nameOf(input) ?? source, toConfigIssues(result.error));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Team expansion
// ---------------------------------------------------------------------------

export interface ExpandedTeam {
  developers: DeveloperParams[];
  aiAgents: AIAgentParams[];
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function developerParams(
  id: string,
  name: string,
  dev: DeveloperConfig,
  settings: SimulationSettings
): DeveloperParams {
  return {
    id,
    name,
    experienceLevel: dev.experienceLevel,
    productivityRate: dev.productivityRate,
    quality: dev.quality,
    reviewCapacity: dev.reviewCapacity,
    availability: dev.availability,
    onboardingWeeks: dev.onboardingWeeks,
    tenureWeeks: dev.tenureWeeks,
    meetingHoursPerWeek: dev.meetingHoursPerWeek,
    onboardingQualityFloor: settings.onboardingQualityFloor,
    specializations: dev.specializations,
  };
}

/**
 * Turn the team section into concrete agent parameters. Ids are stable:
 * humans are `dev-1…` in listing order (explicit, then count, then
 * distribution), AI agents `ai-1…`.
 */
export function expandTeam(config: ScenarioConfig): ExpandedTeam {
  const { team, simulation } = config;
  const developers: DeveloperParams[] = [];
  const nextDevId = () => `dev-${developers.length + 1}`;

  for (const dev of team.developers) {
    for (let i = 1; i <= dev.count; i++) {
      const base = dev.name ?? `Dev-${developers.length + 1}`;
      const name = dev.count > 1 && dev.name ? `${base}-${i}` : base;
      developers.push(developerParams(nextDevId(), name, dev, simulation));
    }
  }

  const defaults = developerSchema.parse({});
  for (let i = 1; i <= (team.count ?? 0); i++) {
    developers.push(developerParams(nextDevId(), `Dev-${developers.length + 1}`, defaults, simulation));
  }

  for (const level of EXPERIENCE_LEVELS) {
    const count = team.distribution?.[level] ?? 0;
    const dev: DeveloperConfig = { ...defaults, experienceLevel: level };
    for (let i = 1; i <= count; i++) {
      developers.push(developerParams(nextDevId(), `${capitalize(level)}-${i}`, dev, simulation));
    }
  }

  const aiAgents: AIAgentParams[] = [];
  for (const agent of team.aiAgents) {
    const profile = getModelProfile(agent.model);
    for (let i = 1; i <= agent.count; i++) {
      const index = aiAgents.length + 1;
      const base = agent.name ?? `${agent.model}-${index}`;
      aiAgents.push({
        id: `ai-${index}`,
        name: agent.count > 1 && agent.name ? `${base}-${i}` : base,
        model: agent.model,
        productivityRate: agent.productivityRate ?? profile?.productivityRate ?? 0,
        quality: agent.quality ?? profile?.quality ?? 0,
        supervisionRequirement: agent.supervisionRequirement ?? profile?.supervisionRequirement ?? 0,
        costPerPr: agent.costPerPr ?? profile?.costPerPr ?? 0,
        reviewCapacity: agent.reviewCapacity,
        canReviewHumanPrs: agent.canReviewHumanPrs,
        canReviewAiPrs: agent.canReviewAiPrs,
        specializations: agent.specializations,
      });
    }
  }

  return { developers, aiAgents };
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export interface CreateScenarioOptions {
  teamSize?: number;
  durationWeeks?: number;
  seed?: number | string;
  description?: string;
  tags?: string[];
  developers?: DeveloperInput[];
  aiAgents?: AIAgentInput[];
  simulation?: SimulationSettingsInput;
}

/**
 * Quick scenario with default developers. `developers`, when given, replaces
 * the `teamSize` generated ones.
 */
export function createScenario(name: string, options: CreateScenarioOptions = {}): ScenarioConfig {
  const { teamSize = 5, durationWeeks = 12, seed, description, tags, developers, aiAgents, simulation } = options;
  return validateScenario({
    name,
    description,
    tags,
    team: developers ? { developers, aiAgents } : { count: teamSize, aiAgents },
    simulation: { ...simulation, durationWeeks, ...(seed === undefined ? {} : { seed }) },
  });
}

/**
 * Same scenario at several team sizes, for diminishing-returns analysis.
 * The first developer entry (or the defaults) is the template for every
 * member; AI agents and settings carry over unchanged.
 */
export function teamSizeSweep(base: ScenarioConfig, sizes: readonly number[]): ScenarioConfig[] {
  const issues: ConfigIssue[] = [];
  sizes.forEach((size, i) => {
    if (!Number.isInteger(size) || size < 1) {
      issues.push({ path: `sizes.${i}`, message: `Team size must be a positive integer, got ${size}` });
    }
  });
  if (sizes.length === 0) issues.push({ path: "sizes", message: "At least one team size is required" });
  if (issues.length > 0) throw new ConfigurationError(base.name, issues);

  const template: DeveloperConfig = base.team.developers[0] ?? developerSchema.parse({});
  return sizes.map((size) => {
    const { name: _name, ...member } = template;
    return validateScenario({
      ...base,
      name: `${base.name} (${size} devs)`,
      team: { developers: [{ ...member, count: size }], aiAgents: base.team.aiAgents },
    });
  });
}
