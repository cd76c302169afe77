import minimist from "minimist";
import { resolve } from "node:path";
import { closeFileLogging, createLogger, enableFileLogging, errorMessage } from "@devteam-sim/core";
import { ScenarioComparison } from "./comparison.js";
import { getConfig } from "./config.js";
import { writeRunResult } from "./export.js";
import { formatAgentTable, formatComparison, formatMetricsSummary } from "./format.js";
import { ScenarioRunner } from "./runner.js";
import { teamSizeSweep } from "./scenario.js";
import { loadScenarioFile } from "./scenario-loader.js";

const logger = createLogger("cli", "cli");

export const USAGE = [
  "Usage:",
  "  devteam-sim run <scenario-file> [--seed N] [--out file] [--events] [--agents] [--log-file]",
  "  devteam-sim compare <scenario-file...> [--json [file]] [--csv [file]] [--concurrency N] [--log-file]",
  "  devteam-sim sweep <scenario-file> --sizes 3,5,8 [--json [file]] [--csv [file]] [--log-file]",
].join("\n");

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  signal?: AbortSignal;
}

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

export interface CliArgs {
  command: string | undefined;
  files: string[];
  seed: number | undefined;
  out: string | undefined;
  json: string | undefined;
  csv: string | undefined;
  concurrency: number | undefined;
  sizes: number[];
  events: boolean;
  agents: boolean;
  logFile: boolean;
}

/** Arguments after a bare `--` win, so `npm run … -- args` works. */
export function getCliArgv(argv: string[] = process.argv.slice(2)): string[] {
  const separatorIndex = argv.indexOf("--");
  if (separatorIndex === -1) {
    return argv;
  }
  return argv.slice(separatorIndex + 1);
}

function optionalNumber(flag: string, raw: unknown): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${flag} must be a number, got "${String(raw)}"`);
  }
  return value;
}

function optionalPositiveInteger(flag: string, raw: unknown): number | undefined {
  const value = optionalNumber(flag, raw);
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new Error(`--${flag} must be a positive integer, got "${String(raw)}"`);
  }
  return value;
}

function optionalString(raw: unknown): string | undefined {
  return typeof raw === "string" ? raw : undefined;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args = minimist(argv, {
    string: ["seed", "out", "json", "csv", "concurrency", "sizes"],
    boolean: ["events", "agents", "log-file"],
  });
  const [command, ...files] = args._.map(String);
  const sizes = optionalString(args.sizes);

  return {
    command,
    files,
    seed: optionalNumber("seed", args.seed),
    out: optionalString(args.out),
    json: optionalString(args.json),
    csv: optionalString(args.csv),
    concurrency: optionalPositiveInteger("concurrency", args.concurrency),
    sizes: sizes ? sizes.split(",").map((s) => Number(s.trim())) : [],
    events: Boolean(args.events),
    agents: Boolean(args.agents),
    logFile: Boolean(args["log-file"]),
  };
}

/** A bare `--json`/`--csv` flag writes to OUTPUT_DIR under a default name. */
function outputPath(value: string | undefined, fallbackName: string): string | undefined {
  if (value === undefined) return undefined;
  return value === "" ? resolve(getConfig().outputDir, fallbackName) : value;
}

async function runCommand(args: CliArgs, io: CliIO): Promise<number> {
  const [file] = args.files;
  if (!file) {
    io.err(USAGE);
    return 2;
  }

  const config = await loadScenarioFile(file);
  const runner = new ScenarioRunner(getConfig());
  const result = await runner.runAsync(config, {
    seed: args.seed,
    signal: io.signal,
    onProgress: (snapshot) => {
      logger.info("Progress", {
        scenario: config.name,
        day: snapshot.day,
        fraction: snapshot.fraction,
        prsMerged: snapshot.metrics.totalPrsMerged,
      });
    },
  });

  for (const line of formatMetricsSummary(config.name, result.metrics)) io.out(line);
  io.out(`Seed: ${result.seed}`);
  if (args.agents) {
    io.out("");
    for (const line of formatAgentTable(result.agentStats)) io.out(line);
  }

  if (args.out) {
    await writeRunResult(args.out, result, { includeEvents: args.events });
    io.out(`Results written to ${args.out}`);
  }
  return 0;
}

async function reportComparison(comparison: ScenarioComparison, args: CliArgs, io: CliIO): Promise<number> {
  const results = await comparison.runAll({ concurrency: args.concurrency, signal: io.signal });
  for (const line of formatComparison(comparison.getComparisonTable(), comparison.getInsights(), results)) {
    io.out(line);
  }

  const jsonPath = outputPath(args.json, "comparison.json");
  if (jsonPath) {
    await comparison.exportJson(jsonPath);
    io.out(`JSON written to ${jsonPath}`);
  }
  const csvPath = outputPath(args.csv, "comparison.csv");
  if (csvPath) {
    await comparison.exportCsv(csvPath);
    io.out(`CSV written to ${csvPath}`);
  }

  return results.every((r) => r.status === "completed") ? 0 : 1;
}

async function compareCommand(args: CliArgs, io: CliIO): Promise<number> {
  if (args.files.length === 0) {
    io.err(USAGE);
    return 2;
  }
  const comparison = new ScenarioComparison(new ScenarioRunner(getConfig()));
  for (const file of args.files) {
    await comparison.addScenarioFile(file);
  }
  return reportComparison(comparison, args, io);
}

async function sweepCommand(args: CliArgs, io: CliIO): Promise<number> {
  const [file] = args.files;
  if (!file || args.sizes.length === 0) {
    io.err(USAGE);
    return 2;
  }
  const base = await loadScenarioFile(file);
  const comparison = new ScenarioComparison(new ScenarioRunner(getConfig()));
  for (const config of teamSizeSweep(base, args.sizes)) {
    comparison.addScenario(config, file);
  }
  return reportComparison(comparison, args, io);
}

/** Run one CLI invocation. Returns the process exit code. */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    io.err(errorMessage(err));
    io.err(USAGE);
    return 2;
  }

  if (args.logFile) {
    const logFile = enableFileLogging(process.cwd());
    logger.info("Logging to file", { logFile });
  }

  try {
    switch (args.command) {
      case "run":
        return await runCommand(args, io);
      case "compare":
        return await compareCommand(args, io);
      case "sweep":
        return await sweepCommand(args, io);
      default:
        io.err(USAGE);
        return 2;
    }
  } catch (err) {
    logger.error("Command failed", { command: args.command, error: errorMessage(err) });
    io.err(errorMessage(err));
    return 1;
  } finally {
    if (args.logFile) closeFileLogging();
  }
}
