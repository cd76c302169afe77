import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "@devteam-sim/core";
import { createScenario, expandTeam, teamSizeSweep, validateScenario } from "../scenario.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    assert.ok(err instanceof ConfigurationError, String(err));
    return err.issues.map((i) => i.path);
  }
  assert.fail("expected a ConfigurationError");
}

describe("validateScenario", () => {
  it("fills in defaults", () => {
    const config = validateScenario({ team: { developers: [{}] } });

    assert.strictEqual(config.name, "Unnamed Scenario");
    assert.deepStrictEqual(config.tags, []);
    assert.strictEqual(config.simulation.durationWeeks, 12);
    assert.strictEqual(config.simulation.communicationLossFactor, 0.3);
    assert.strictEqual(config.simulation.overheadModel, "quadratic");
    assert.strictEqual(config.simulation.overheadCountsAiAgents, false);
    assert.strictEqual(config.simulation.review.reviewersPerPr, 1);
    assert.strictEqual(config.simulation.revertDiscovery.windowDays, 30);
    assert.strictEqual(config.simulation.techDebt.enabled, false);
    assert.strictEqual(config.simulation.incidents.enabled, false);
    assert.strictEqual(config.simulation.seed, undefined);

    const [dev] = config.team.developers;
    assert.strictEqual(dev.count, 1);
    assert.strictEqual(dev.experienceLevel, "mid");
    assert.strictEqual(dev.productivityRate, 3.5);
    assert.strictEqual(dev.quality, 0.85);
    assert.strictEqual(dev.availability, 0.7);
    assert.strictEqual(dev.onboardingWeeks, 10);
  });

  it("lists every invalid field", () => {
    const paths = issuesOf(() =>
      validateScenario({
        name: "Broken",
        team: { developers: [{ quality: 1.5, availability: -1, productivityRate: 0 }] },
        simulation: { durationWeeks: 0 },
      })
    );
    for (const expected of [
      "team.developers.0.quality",
      "team.developers.0.availability",
      "team.developers.0.productivityRate",
      "simulation.durationWeeks",
    ]) {
      assert.ok(paths.includes(expected), `missing ${expected} in ${paths.join(", ")}`);
    }
  });

  it("names the scenario, or the source when there is no name", () => {
    assert.throws(
      () => validateScenario({ name: "Broken", simulation: { durationWeeks: -1 } }),
      (err: unknown) => err instanceof ConfigurationError && err.scenario === "Broken"
    );
    assert.throws(
      () => validateScenario(42, "scenarios/odd.yaml"),
      (err: unknown) => err instanceof ConfigurationError && err.scenario === "scenarios/odd.yaml"
    );
  });

  it("rejects a team with no agents", () => {
    assert.deepStrictEqual(issuesOf(() => validateScenario({ name: "Empty" })), ["team"]);
  });

  it("rejects unknown keys", () => {
    assert.deepStrictEqual(issuesOf(() => validateScenario({ team: { count: 1 }, colour: "blue" })), [""]);
  });

  it("requires every parameter for custom AI models", () => {
    const paths = issuesOf(() => validateScenario({ team: { aiAgents: [{ model: "custom", quality: 0.9 }] } }));
    assert.deepStrictEqual(paths, [
      "team.aiAgents.0.productivityRate",
      "team.aiAgents.0.supervisionRequirement",
      "team.aiAgents.0.costPerPr",
    ]);
  });

  it("keeps required approvals within reviewers per PR", () => {
    const paths = issuesOf(() =>
      validateScenario({ team: { count: 3 }, simulation: { review: { reviewersPerPr: 1, requiredApprovals: 2 } } })
    );
    assert.deepStrictEqual(paths, ["simulation.review.requiredApprovals"]);
  });
});

describe("expandTeam", () => {
  it("assigns stable ids and names across every team source", () => {
    const config = validateScenario({
      team: {
        developers: [{ name: "Alice", count: 2 }, {}],
        count: 1,
        distribution: { senior: 2 },
        aiAgents: [{ count: 2 }, { model: "codellama", name: "Llama" }],
      },
    });
    const team = expandTeam(config);

    assert.deepStrictEqual(
      team.developers.map((d) => [d.id, d.name, d.experienceLevel]),
      [
        ["dev-1", "Alice-1", "mid"],
        ["dev-2", "Alice-2", "mid"],
        ["dev-3", "Dev-3", "mid"],
        ["dev-4", "Dev-4", "mid"],
        ["dev-5", "Senior-1", "senior"],
        ["dev-6", "Senior-2", "senior"],
      ]
    );
    assert.deepStrictEqual(
      team.aiAgents.map((a) => [a.id, a.name, a.model, a.productivityRate]),
      [
        ["ai-1", "claude-sonnet-1", "claude-sonnet", 10],
        ["ai-2", "claude-sonnet-2", "claude-sonnet", 10],
        ["ai-3", "Llama", "codellama", 12],
      ]
    );
  });

  it("lets explicit AI parameters override the model profile", () => {
    const config = validateScenario({ team: { aiAgents: [{ model: "claude-opus", costPerPr: 1 }] } });
    const [agent] = expandTeam(config).aiAgents;
    assert.strictEqual(agent.costPerPr, 1);
    assert.strictEqual(agent.quality, 0.88);
  });

  it("passes the onboarding quality floor to every developer", () => {
    const config = validateScenario({ team: { count: 2 }, simulation: { onboardingQualityFloor: 0.3 } });
    assert.deepStrictEqual(
      expandTeam(config).developers.map((d) => d.onboardingQualityFloor),
      [0.3, 0.3]
    );
  });
});

describe("createScenario", () => {
  it("builds a default team of the requested size", () => {
    const config = createScenario("Quick", { teamSize: 3, durationWeeks: 4, seed: 5, tags: ["baseline"] });
    assert.strictEqual(config.name, "Quick");
    assert.strictEqual(config.simulation.durationWeeks, 4);
    assert.strictEqual(config.simulation.seed, 5);
    assert.deepStrictEqual(config.tags, ["baseline"]);
    assert.strictEqual(expandTeam(config).developers.length, 3);
  });

  it("validates its input", () => {
    assert.throws(() => createScenario("Nobody", { teamSize: 0 }), ConfigurationError);
  });
});

describe("teamSizeSweep", () => {
  const base = createScenario("Base", {
    developers: [{ name: "Template", count: 4, quality: 0.9 }],
    aiAgents: [{ count: 1 }],
    seed: 8,
  });

  it("varies only the developer count", () => {
    const sweep = teamSizeSweep(base, [2, 6]);
    assert.deepStrictEqual(
      sweep.map((c) => c.name),
      ["Base (2 devs)", "Base (6 devs)"]
    );
    const [small] = sweep;
    assert.strictEqual(small.team.developers[0].count, 2);
    assert.strictEqual(small.team.developers[0].quality, 0.9);
    assert.strictEqual(small.team.developers[0].name, undefined);
    assert.strictEqual(small.team.aiAgents.length, 1);
    assert.strictEqual(small.simulation.seed, 8);
  });

  it("rejects invalid sizes", () => {
    assert.deepStrictEqual(issuesOf(() => teamSizeSweep(base, [0, 2.5, 3])), ["sizes.0", "sizes.1"]);
    assert.deepStrictEqual(issuesOf(() => teamSizeSweep(base, [])), ["sizes"]);
  });
});
