import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { LoadError, errorMessage } from "@devteam-sim/core";
import { validateScenario, type ScenarioConfig } from "./scenario.js";

type ScenarioFormat = "yaml" | "json";

function formatOf(filePath: string): ScenarioFormat | null {
  switch (extname(filePath).toLowerCase()) {
    case ".yaml":
    case ".yml":
      return "yaml";
    case ".json":
      return "json";
    default:
      return null;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read and validate a scenario file (.yaml, .yml or .json).
 *
 * @throws LoadError when the file is missing, unreadable, unparsable or of an
 *   unsupported type
 * @throws ConfigurationError when the content is not a valid scenario
 */
export async function loadScenarioFile(filePath: string): Promise<ScenarioConfig> {
  const format = formatOf(filePath);
  if (!format) {
    throw new LoadError(filePath, `unsupported file type "${extname(filePath) || "(none)"}"`);
  }

  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new LoadError(filePath, isNotFound(err) ? "file not found" : errorMessage(err), { cause: err });
  }

  let data: unknown;
  try {
    data = format === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    throw new LoadError(filePath, `invalid ${format.toUpperCase()}: ${errorMessage(err)}`, { cause: err });
  }

  return validateScenario(data, filePath);
}

/** Write a scenario back out, in the format implied by the extension. */
export async function saveScenarioFile(config: ScenarioConfig, filePath: string): Promise<void> {
  const format = formatOf(filePath);
  if (!format) {
    throw new LoadError(filePath, `unsupported file type "${extname(filePath) || "(none)"}"`);
  }
  await mkdir(dirname(filePath), { recursive: true });
  const text = format === "yaml" ? stringifyYaml(config) : JSON.stringify(config, null, 2) + "\n";
  await writeFile(filePath, text, "utf8");
}
