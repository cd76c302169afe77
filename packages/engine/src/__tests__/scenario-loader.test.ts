import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError, LoadError } from "@devteam-sim/core";
import { loadScenarioFile, saveScenarioFile } from "../scenario-loader.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("loadScenarioFile", () => {
  it("loads and validates YAML", async () => {
    const config = await loadScenarioFile(fixture("valid.yaml"));
    assert.strictEqual(config.name, "Fixture Team");
    assert.deepStrictEqual(config.tags, ["fixture"]);
    assert.strictEqual(config.team.developers.length, 2);
    assert.strictEqual(config.team.developers[1].count, 2);
    assert.strictEqual(config.team.aiAgents[0].model, "claude-opus");
    assert.strictEqual(config.simulation.overheadModel, "linear");
    assert.strictEqual(config.simulation.seed, 17);
  });

  it("loads JSON", async () => {
    const config = await loadScenarioFile(fixture("valid.json"));
    assert.strictEqual(config.name, "Fixture JSON Team");
    assert.strictEqual(config.team.count, 3);
    assert.strictEqual(config.simulation.seed, "fixture");
  });

  it("reports a missing file", async () => {
    const path = fixture("missing.yaml");
    await assert.rejects(loadScenarioFile(path), (err: unknown) => {
      assert.ok(err instanceof LoadError);
      assert.strictEqual(err.filePath, path);
      assert.strictEqual(err.message, `Failed to load scenario file ${path}: file not found`);
      return true;
    });
  });

  it("reports unparsable YAML", async () => {
    await assert.rejects(loadScenarioFile(fixture("malformed.yaml")), (err: unknown) => {
      assert.ok(err instanceof LoadError);
      assert.match(err.message, /invalid YAML: /);
      return true;
    });
  });

  it("rejects unsupported extensions", async () => {
    await assert.rejects(loadScenarioFile(fixture("scenario.txt")), /unsupported file type "\.txt"/);
  });

  it("raises ConfigurationError for invalid values, naming the scenario", async () => {
    await assert.rejects(loadScenarioFile(fixture("invalid-values.yaml")), (err: unknown) => {
      assert.ok(err instanceof ConfigurationError);
      assert.strictEqual(err.scenario, "Invalid values");
      assert.deepStrictEqual(
        err.issues.map((i) => i.path),
        ["team.developers.0.quality", "team.developers.0.availability", "simulation.durationWeeks"]
      );
      return true;
    });
  });
});

describe("saveScenarioFile", () => {
  it("writes a file that loads back to the same scenario", async () => {
    const dir = await mkdtemp(join(tmpdir(), "devteam-sim-"));
    try {
      const config = await loadScenarioFile(fixture("valid.yaml"));
      for (const name of ["copy.yaml", "nested/copy.json"]) {
        const path = join(dir, name);
        await saveScenarioFile(config, path);
        assert.deepStrictEqual(await loadScenarioFile(path), config);
      }
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
