export * from "./agents/agent.js";
export * from "./agents/base-agent.js";
export * from "./agents/developer.js";
export * from "./agents/ai-agent.js";
export * from "./agents/models.js";
export * from "./event-log.js";
export * from "./pr-workflow.js";
export * from "./overhead.js";
export * from "./tech-debt.js";
export * from "./incidents.js";
export * from "./metrics.js";
export * from "./simulation.js";
export * from "./scenario.js";
export * from "./scenario-loader.js";
export * from "./config.js";
export * from "./runner.js";
export * from "./comparison.js";
export * from "./export.js";
export * from "./format.js";
export * from "./shared.js";
export { runCli, parseCliArgs, USAGE } from "./cli.js";
export type { CliArgs, CliIO } from "./cli.js";
