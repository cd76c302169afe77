import { RandomSource } from "@devteam-sim/core";
import type { AgentRandom, SimulationContext } from "../agents/agent.js";
import type { DeveloperParams } from "../agents/developer.js";
import type { AIAgentParams } from "../agents/ai-agent.js";
import type { RuntimeConfig } from "../config.js";

export function makeContext(day: number, overrides: Partial<SimulationContext> = {}): SimulationContext {
  return {
    currentDay: day,
    currentWeek: Math.floor(day / 7),
    seed: "test",
    creationFactor: 1,
    reviewFactor: 1,
    incidentDuty: new Set<string>(),
    metadata: {},
    ...overrides,
  };
}

export function makeRandom(seed: string | number = 1): AgentRandom {
  const root = new RandomSource(seed);
  return { production: root.fork("production") };
}

export function developerParams(overrides: Partial<DeveloperParams> = {}): DeveloperParams {
  return {
    id: "dev-1",
    name: "Dev-1",
    experienceLevel: "mid",
    productivityRate: 5,
    quality: 0.8,
    reviewCapacity: 5,
    availability: 1,
    onboardingWeeks: 0,
    tenureWeeks: 0,
    meetingHoursPerWeek: 0,
    onboardingQualityFloor: 0.5,
    specializations: [],
    ...overrides,
  };
}

export function aiParams(overrides: Partial<AIAgentParams> = {}): AIAgentParams {
  return {
    id: "ai-1",
    name: "claude-sonnet-1",
    model: "claude-sonnet",
    productivityRate: 7,
    quality: 0.8,
    supervisionRequirement: 0.3,
    costPerPr: 2.5,
    reviewCapacity: 0,
    canReviewHumanPrs: false,
    canReviewAiPrs: false,
    specializations: [],
    ...overrides,
  };
}

export function runtimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    logLevel: "error",
    progressIntervalDays: 7,
    comparisonConcurrency: 1,
    outputDir: "./results",
    defaultSeed: undefined,
    ...overrides,
  };
}
