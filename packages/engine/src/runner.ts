import { createLogger } from "@devteam-sim/core";
import type { AgentStats, SimulationEvent, SimulationMetrics } from "@devteam-sim/core";
import { AIAgent } from "./agents/ai-agent.js";
import { HumanDeveloper } from "./agents/developer.js";
import { getConfig, type RuntimeConfig } from "./config.js";
import { expandTeam, type ScenarioConfig } from "./scenario.js";
import { Simulation, type ProgressHook, type SimulationOutcome } from "./simulation.js";

const logger = createLogger("runner", "simulation");

/** Seed used when neither the call, the scenario nor DEFAULT_SEED names one. */
export const FALLBACK_SEED = 42;

export interface RunScenarioOptions {
  seed?: number | string;
  signal?: AbortSignal;
  onProgress?: ProgressHook;
  progressIntervalDays?: number;
  metadata?: Record<string, unknown>;
}

export interface RunResult {
  scenario: string;
  config: ScenarioConfig;
  seed: string;
  metrics: SimulationMetrics;
  agentStats: AgentStats[];
  events: readonly SimulationEvent[];
  elapsedMs: number;
}

/**
 * Builds a Simulation from a validated scenario and runs it. Each call gets a
 * fresh Simulation, so one runner can serve concurrent runs.
 */
export class ScenarioRunner {
  constructor(private readonly runtime: RuntimeConfig = getConfig()) {}

  resolveSeed(config: ScenarioConfig, override?: number | string): number | string {
    return override ?? config.simulation.seed ?? this.runtime.defaultSeed ?? FALLBACK_SEED;
  }

  setup(config: ScenarioConfig, options: RunScenarioOptions = {}): Simulation {
    const simulation = new Simulation({
      scenario: config.name,
      settings: config.simulation,
      seed: this.resolveSeed(config, options.seed),
      progressIntervalDays: options.progressIntervalDays ?? this.runtime.progressIntervalDays,
      onProgress: options.onProgress,
      metadata: { ...options.metadata, tags: config.tags },
    });

    const team = expandTeam(config);
    for (const params of team.developers) {
      simulation.addAgent(new HumanDeveloper(params));
    }
    for (const params of team.aiAgents) {
      simulation.addAgent(new AIAgent(params));
    }
    return simulation;
  }

  run(config: ScenarioConfig, options: RunScenarioOptions = {}): RunResult {
    const started = performance.now();
    const outcome = this.setup(config, options).run();
    return this.toResult(config, outcome, started);
  }

  async runAsync(config: ScenarioConfig, options: RunScenarioOptions = {}): Promise<RunResult> {
    const started = performance.now();
    const outcome = await this.setup(config, options).runAsync({ signal: options.signal });
    return this.toResult(config, outcome, started);
  }

  private toResult(
    config: ScenarioConfig,
    outcome: SimulationOutcome,
    started: number
  ): RunResult {
    const elapsedMs = performance.now() - started;
    logger.debug("Scenario finished", { scenario: config.name, elapsedMs });
    return {
      scenario: config.name,
      config,
      seed: outcome.seed,
      metrics: outcome.metrics,
      agentStats: outcome.agentStats,
      events: outcome.events,
      elapsedMs,
    };
  }
}
