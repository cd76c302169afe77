export type SimulationErrorCode = "CONFIGURATION" | "STATE" | "LOAD" | "CANCELLED" | "INTERNAL";

/**
 * Base class for every error raised by the simulation core.
 * `code` is stable and safe to branch on; `message` is for operators.
 */
export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/** Invalid or missing scenario parameters. Raised before any step runs. */
export class ConfigurationError extends SimulationError {
  readonly scenario: string | undefined;
  readonly issues: ConfigIssue[];

  constructor(scenario: string | undefined, issues: ConfigIssue[]) {
    const where = scenario ? `Scenario "${scenario}"` : "Scenario";
    const details = issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ");
    super("CONFIGURATION", `${where} is invalid: ${details}`);
    this.scenario = scenario;
    this.issues = issues;
  }
}

/** An operation requested in a lifecycle state that does not allow it. */
export class StateError extends SimulationError {
  constructor(message: string) {
    super("STATE", message);
  }
}

/** A scenario file is missing, unreadable or unparsable. */
export class LoadError extends SimulationError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super("LOAD", `Failed to load scenario file ${filePath}: ${reason}`, options);
    this.filePath = filePath;
  }
}

/** A run was aborted between steps. Its partial state is discarded. */
export class RunCancelledError extends SimulationError {
  readonly day: number;

  constructor(scenario: string, day: number) {
    super("CANCELLED", `Run of "${scenario}" cancelled at day ${day}`);
    this.day = day;
  }
}

export function errorCode(error: unknown): SimulationErrorCode {
  return error instanceof SimulationError ? error.code : "INTERNAL";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
