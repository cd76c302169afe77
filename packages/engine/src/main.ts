#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { createLogger, errorMessage, setLogLevel } from "@devteam-sim/core";
import { getCliArgv, runCli } from "./cli.js";
import { getConfig } from "./config.js";

loadDotenv({ path: resolve(process.cwd(), ".env") });

const logger = createLogger("main", "cli");

async function main(): Promise<void> {
  // Re-resolve after dotenv: LOG_LEVEL may come from .env.
  setLogLevel(getConfig().logLevel);

  const controller = new AbortController();
  process.on("SIGINT", () => controller.abort());
  process.on("SIGTERM", () => controller.abort());

  process.exitCode = await runCli(getCliArgv(), {
    out: (line) => process.stdout.write(line + "\n"),
    err: (line) => process.stderr.write(line + "\n"),
    signal: controller.signal,
  });
}

main().catch((error: unknown) => {
  logger.error("Fatal error", { error: errorMessage(error) });
  process.exit(1);
});
