import {
  ConfigurationError,
  RunCancelledError,
  StateError,
  createLogger,
  errorCode,
  errorMessage,
} from "@devteam-sim/core";
import type { AgentStats, SimulationErrorCode, SimulationMetrics } from "@devteam-sim/core";
import { getConfig } from "./config.js";
import { writeComparisonCsv, writeComparisonJson } from "./export.js";
import { ScenarioRunner } from "./runner.js";
import { validateScenario, type ScenarioConfig, type ScenarioInput } from "./scenario.js";
import { loadScenarioFile } from "./scenario-loader.js";
import { ConcurrencyLimiter } from "./shared.js";

const logger = createLogger("comparison", "comparison");

export type Polarity = "higher" | "lower" | "none";

export interface ComparisonMetric {
  key: string;
  label: string;
  polarity: Polarity;
  /** Null when the metric is undefined for the run. */
  read: (metrics: SimulationMetrics) => number | null;
}

/** Rates over merged PRs mean nothing for a run that merged none. */
function overMerged(metrics: SimulationMetrics, value: number): number | null {
  return metrics.totalPrsMerged > 0 ? value : null;
}

/** Compared metrics, in table order. `none` rows are shown without a winner. */
export const COMPARISON_METRICS: readonly ComparisonMetric[] = [
  { key: "totalAgents", label: "Team Size", polarity: "none", read: (m) => m.totalAgents },
  { key: "humanDevelopers", label: "Humans", polarity: "none", read: (m) => m.humanDevelopers },
  { key: "aiAgents", label: "AI Agents", polarity: "none", read: (m) => m.aiAgents },
  { key: "prsPerWeek", label: "PRs/Week", polarity: "higher", read: (m) => m.prsPerWeek },
  { key: "totalPrsMerged", label: "PRs Merged", polarity: "higher", read: (m) => m.totalPrsMerged },
  { key: "changeFailureRate", label: "Failure Rate", polarity: "lower", read: (m) => overMerged(m, m.changeFailureRate) },
  { key: "avgCycleTimeDays", label: "Avg Cycle Time (days)", polarity: "lower", read: (m) => overMerged(m, m.avgCycleTimeDays) },
  { key: "defectsCaughtInReview", label: "Defects Caught", polarity: "none", read: (m) => m.defectsCaughtInReview },
  { key: "aiTotalCost", label: "AI Cost ($)", polarity: "lower", read: (m) => m.aiTotalCost },
  { key: "human.prsPerWeek", label: "Human PRs/Week", polarity: "higher", read: (m) => m.human.prsPerWeek },
  { key: "ai.prsPerWeek", label: "AI PRs/Week", polarity: "higher", read: (m) => m.ai.prsPerWeek },
];

export interface CompletedScenarioResult {
  status: "completed";
  name: string;
  description?: string;
  source?: string;
  config: ScenarioConfig;
  seed: string;
  metrics: SimulationMetrics;
  agentStats: AgentStats[];
  elapsedMs: number;
}

export interface FailedScenarioResult {
  status: "failed";
  name: string;
  source?: string;
  config?: ScenarioConfig;
  error: { code: SimulationErrorCode; message: string };
  elapsedMs: number;
}

export type ScenarioResult = CompletedScenarioResult | FailedScenarioResult;

export interface ComparisonRow {
  metric: string;
  label: string;
  polarity: Polarity;
  /** Aligned with `ComparisonTable.scenarios`; null where undefined. */
  values: (number | null)[];
  winner: string | null;
}

export interface ComparisonTable {
  scenarios: string[];
  rows: ComparisonRow[];
}

export interface RunAllOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

type ComparisonEntry =
  | { kind: "scenario"; config: ScenarioConfig; source?: string }
  | { kind: "unloadable"; name: string; source: string; error: { code: SimulationErrorCode; message: string } };

/**
 * Index of the single best value under `polarity`, or null when the best
 * value is shared (or the metric has no polarity). Null values never win.
 */
export function selectWinner(values: readonly (number | null)[], polarity: Polarity): number | null {
  const measured = values.flatMap((value, index) => (value === null ? [] : [{ value, index }]));
  if (polarity === "none" || measured.length === 0) return null;
  const numbers = measured.map((m) => m.value);
  const best = polarity === "higher" ? Math.max(...numbers) : Math.min(...numbers);
  const holders = measured.filter((m) => m.value === best);
  return holders.length === 1 ? holders[0].index : null;
}

function isCompleted(result: ScenarioResult): result is CompletedScenarioResult {
  return result.status === "completed";
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Runs several scenarios and ranks them metric by metric.
 *
 * Scenario files that fail to load are kept as failed results so the rest of
 * the batch still runs.
 */
export class ScenarioComparison {
  private entries: ComparisonEntry[] = [];
  private results: ScenarioResult[] | null = null;

  constructor(private readonly runner: ScenarioRunner = new ScenarioRunner()) {}

  /** Add a scenario object. Invalid input throws ConfigurationError right away. */
  addScenario(scenario: ScenarioConfig | ScenarioInput, source?: string): this {
    const config = validateScenario(scenario, source);
    this.entries.push({ kind: "scenario", config, source });
    logger.debug("Scenario added", { scenario: config.name });
    return this;
  }

  /**
   * Load and add a scenario file. Load or validation failures are recorded
   * against the file and reported in the results. Returns whether it loaded.
   */
  async addScenarioFile(filePath: string): Promise<boolean> {
    try {
      const config = await loadScenarioFile(filePath);
      this.entries.push({ kind: "scenario", config, source: filePath });
      logger.debug("Scenario file added", { scenario: config.name, file: filePath });
      return true;
    } catch (err) {
      const name = err instanceof ConfigurationError && err.scenario ? err.scenario : filePath;
      const error = { code: errorCode(err), message: errorMessage(err) };
      this.entries.push({ kind: "unloadable", name, source: filePath, error });
      logger.warn("Scenario file could not be loaded", { file: filePath, ...error });
      return false;
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Run every scenario. Results keep insertion order: each scenario owns
   * one slot, written once. A failing scenario does not stop the others;
   * an aborted signal rejects the whole batch with RunCancelledError.
   */
  async runAll(options: RunAllOptions = {}): Promise<ScenarioResult[]> {
    if (this.entries.length === 0) {
      throw new ConfigurationError(undefined, [{ path: "scenarios", message: "No scenarios to compare" }]);
    }
    const concurrency = options.concurrency ?? getConfig().comparisonConcurrency;
    const limiter = new ConcurrencyLimiter(concurrency);
    const slots: (ScenarioResult | undefined)[] = Array.from({ length: this.entries.length }, () => undefined);

    const write = (index: number, result: ScenarioResult): void => {
      if (slots[index] !== undefined) {
        throw new StateError(`Result slot ${index} was already written`);
      }
      slots[index] = result;
    };

    logger.info("Comparison started", { scenarios: this.entries.length, concurrency });

    await Promise.all(
      this.entries.map((entry, index) =>
        limiter.run(async () => write(index, await this.runEntry(entry, options.signal)))
      )
    );

    const results = slots.filter((r): r is ScenarioResult => r !== undefined);
    this.results = results;
    logger.info("Comparison completed", {
      completed: results.filter(isCompleted).length,
      failed: results.filter((r) => !isCompleted(r)).length,
    });
    return results;
  }

  private async runEntry(entry: ComparisonEntry, signal: AbortSignal | undefined): Promise<ScenarioResult> {
    if (entry.kind === "unloadable") {
      return { status: "failed", name: entry.name, source: entry.source, error: entry.error, elapsedMs: 0 };
    }

    const { config, source } = entry;
    const started = performance.now();
    try {
      const run = await this.runner.runAsync(config, { signal });
      return {
        status: "completed",
        name: config.name,
        description: config.description,
        source,
        config,
        seed: run.seed,
        metrics: run.metrics,
        agentStats: run.agentStats,
        elapsedMs: run.elapsedMs,
      };
    } catch (err) {
      if (err instanceof RunCancelledError) throw err;
      const error = { code: errorCode(err), message: errorMessage(err) };
      logger.error("Scenario failed", { scenario: config.name, ...error });
      return { status: "failed", name: config.name, source, config, error, elapsedMs: performance.now() - started };
    }
  }

  getResults(): ScenarioResult[] {
    return this.requireResults().slice();
  }

  /** One row per compared metric, one column per completed scenario. */
  getComparisonTable(): ComparisonTable {
    const completed = this.requireResults().filter(isCompleted);
    const scenarios = completed.map((r) => r.name);

    const rows = COMPARISON_METRICS.map((metric): ComparisonRow => {
      const values = completed.map((r) => metric.read(r.metrics));
      const winnerIndex = selectWinner(values, metric.polarity);
      return {
        metric: metric.key,
        label: metric.label,
        polarity: metric.polarity,
        values,
        winner: winnerIndex === null ? null : scenarios[winnerIndex],
      };
    });

    return { scenarios, rows };
  }

  getInsights(): string[] {
    const results = this.requireResults();
    const completed = results.filter(isCompleted);
    const table = this.getComparisonTable();
    const insights: string[] = [];

    const winnerOf = (key: string): { name: string; value: number } | null => {
      const row = table.rows.find((r) => r.metric === key);
      if (!row?.winner) return null;
      const value = row.values[table.scenarios.indexOf(row.winner)];
      return value === null ? null : { name: row.winner, value };
    };

    const throughput = winnerOf("prsPerWeek");
    if (throughput) {
      insights.push(`Highest throughput: ${throughput.name} with ${throughput.value.toFixed(1)} PRs/week`);
    }

    const quality = winnerOf("changeFailureRate");
    if (quality) {
      insights.push(`Best quality: ${quality.name} with ${formatPercent(quality.value)} failure rate`);
    }

    const withAi = completed.filter((r) => r.metrics.aiAgents > 0);
    const efficiency = withAi.map((r) => r.metrics.prsPerWeek / Math.max(r.metrics.aiTotalCost, 0.01));
    const efficient = selectWinner(efficiency, "higher");
    if (efficient !== null) {
      insights.push(`Most cost-efficient: ${withAi[efficient].name} with ${efficiency[efficient].toFixed(1)} PRs/week per $`);
    }

    const humanOnly = completed.filter((r) => r.metrics.aiAgents === 0);
    if (humanOnly.length > 0 && withAi.length > 0) {
      const avg = (rs: CompletedScenarioResult[]) => rs.reduce((s, r) => s + r.metrics.prsPerWeek, 0) / rs.length;
      const humanAvg = avg(humanOnly);
      const mixedAvg = avg(withAi);
      if (humanAvg > 0 && mixedAvg !== humanAvg) {
        const delta = Math.abs(mixedAvg / humanAvg - 1) * 100;
        const direction = mixedAvg > humanAvg ? "higher" : "lower";
        insights.push(`Mixed teams avg ${delta.toFixed(0)}% ${direction} throughput than human-only teams`);
      }
    }

    const failed = results.filter((r) => !isCompleted(r));
    if (failed.length > 0) {
      insights.push(`${failed.length} scenario(s) failed: ${failed.map((r) => r.name).join(", ")}`);
    }

    return insights;
  }

  /** Full nested results. StateError (and no file) before any run. */
  async exportJson(filePath: string): Promise<void> {
    const results = this.requireResults();
    await writeComparisonJson(filePath, {
      comparison: this.getComparisonTable(),
      insights: this.getInsights(),
      results,
    });
    logger.info("Comparison exported", { format: "json", file: filePath });
  }

  /** Flat metric table. StateError (and no file) before any run. */
  async exportCsv(filePath: string): Promise<void> {
    this.requireResults();
    await writeComparisonCsv(filePath, this.getComparisonTable());
    logger.info("Comparison exported", { format: "csv", file: filePath });
  }

  private requireResults(): ScenarioResult[] {
    if (!this.results) {
      throw new StateError("No comparison results yet; call runAll() first");
    }
    return this.results;
  }
}
