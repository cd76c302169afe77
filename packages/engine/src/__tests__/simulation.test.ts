import { describe, it, before } from "node:test";
import assert from "node:assert/strict";
import { RunCancelledError, StateError, isEventKind, setLogLevel } from "@devteam-sim/core";
import type { ProgressSnapshot } from "@devteam-sim/core";
import { HumanDeveloper } from "../agents/developer.js";
import { FALLBACK_SEED, ScenarioRunner } from "../runner.js";
import { createScenario, type ScenarioConfig } from "../scenario.js";
import { Simulation } from "../simulation.js";
import { developerParams, runtimeConfig } from "./helpers.js";

const runner = new ScenarioRunner(runtimeConfig());

function sevenDevs(extra: Parameters<typeof createScenario>[1] = {}): ScenarioConfig {
  return createScenario("Seven devs", {
    developers: [{ count: 7, quality: 0.85, productivityRate: 3.5, onboardingWeeks: 0 }],
    durationWeeks: 12,
    seed: 42,
    ...extra,
  });
}

describe("Simulation", () => {
  before(() => setLogLevel("error"));

  it("produces identical event logs for identical seeds", () => {
    const first = runner.run(sevenDevs());
    const second = runner.run(sevenDevs());
    assert.deepStrictEqual(first.events, second.events);
    assert.deepStrictEqual(first.metrics, second.metrics);
    assert.strictEqual(first.seed, "42");
  });

  it("diverges for a different seed", () => {
    const a = runner.run(sevenDevs());
    const b = runner.run(sevenDevs(), { seed: 43 });
    assert.notDeepStrictEqual(a.events, b.events);
  });

  it("keeps the change failure rate of a 0.85-quality team under 0.15", () => {
    const { metrics } = runner.run(sevenDevs());
    assert.strictEqual(metrics.humanDevelopers, 7);
    assert.strictEqual(metrics.daysElapsed, 84);
    assert.ok(metrics.totalPrsMerged > 0);
    assert.ok(metrics.changeFailureRate >= 0 && metrics.changeFailureRate <= 0.15, `${metrics.changeFailureRate}`);
  });

  it("adds capacity with AI agents without lowering any human metric", () => {
    for (let seed = 1; seed <= 8; seed++) {
      const baseline = runner.run(sevenDevs(), { seed });
      const mixed = runner.run(sevenDevs({ aiAgents: [{ model: "claude-sonnet", count: 2 }] }), { seed });

      assert.ok(mixed.metrics.totalPrsCreated > baseline.metrics.totalPrsCreated, `seed ${seed}`);
      assert.ok(mixed.metrics.human.prsMerged >= baseline.metrics.human.prsMerged, `seed ${seed}`);
      assert.ok(mixed.metrics.human.prsPerWeek >= baseline.metrics.human.prsPerWeek, `seed ${seed}`);
      assert.deepStrictEqual(mixed.metrics.human, baseline.metrics.human, `seed ${seed}`);
      assert.ok(mixed.metrics.aiTotalCost > 0);
    }
  });

  it("keeps human outcomes when AI agents also review AI PRs", () => {
    const baseline = runner.run(sevenDevs());
    const mixed = runner.run(
      sevenDevs({ aiAgents: [{ model: "claude-opus", count: 3, reviewCapacity: 10, canReviewAiPrs: true }] })
    );
    assert.deepStrictEqual(mixed.metrics.human, baseline.metrics.human);
  });

  it("holds PR and event invariants", () => {
    const simulation = runner.setup(sevenDevs({ aiAgents: [{ count: 1 }] }));
    const { metrics, events } = simulation.run();

    for (const pr of simulation.getPullRequests()) {
      if (pr.mergedDay !== undefined) assert.ok(pr.createdDay <= pr.mergedDay, pr.id);
      if (pr.revertedDay !== undefined) {
        assert.ok(pr.mergedDay !== undefined && pr.mergedDay < pr.revertedDay, pr.id);
      }
    }
    for (const event of events) {
      if (isEventKind(event, "review_assigned")) assert.notStrictEqual(event.agentId, event.payload.authorId);
    }
    events.forEach((event, i) => {
      assert.strictEqual(event.seq, i + 1);
      if (i > 0) assert.ok(event.day >= events[i - 1].day);
    });
    assert.strictEqual(metrics.totalPrsCreated, metrics.totalPrsMerged + metrics.totalPrsAbandoned + metrics.openPrs);
    assert.deepStrictEqual(simulation.getMetrics(), metrics);
  });

  it("reports progress at the configured cadence and survives a throwing hook", () => {
    const snapshots: ProgressSnapshot[] = [];
    const simulation = runner.setup(sevenDevs({ durationWeeks: 2 }), {
      progressIntervalDays: 7,
      onProgress: (snapshot) => {
        snapshots.push(snapshot);
        throw new Error("hook failed");
      },
    });
    const outcome = simulation.run();

    assert.deepStrictEqual(
      snapshots.map((s) => [s.day, s.fraction]),
      [
        [6, 0.5],
        [13, 1],
      ]
    );
    assert.strictEqual(snapshots[0].metrics.currentDay, 6);
    assert.strictEqual(outcome.daysElapsed, 14);
  });

  it("does not wait for an async hook", async () => {
    let settled = 0;
    const simulation = runner.setup(sevenDevs({ durationWeeks: 1 }), {
      onProgress: async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        settled++;
        throw new Error("late failure");
      },
    });
    simulation.run();
    assert.strictEqual(settled, 0);
    await new Promise((resolve) => setTimeout(resolve, 20));
    assert.strictEqual(settled, 1);
  });

  it("cancels between steps and discards partial results", async () => {
    const controller = new AbortController();
    const simulation = runner.setup(sevenDevs(), {
      onProgress: (snapshot) => {
        if (snapshot.day === 6) controller.abort();
      },
    });

    await assert.rejects(simulation.runAsync({ signal: controller.signal }), (err: unknown) => {
      assert.ok(err instanceof RunCancelledError);
      assert.strictEqual(err.day, 7);
      return true;
    });
    assert.throws(() => simulation.getEvents(), StateError);
    assert.throws(() => simulation.getMetrics(), StateError);
  });

  it("matches run() when run asynchronously", async () => {
    const sync = runner.run(sevenDevs({ durationWeeks: 3 }));
    const viaAsync = await runner.runAsync(sevenDevs({ durationWeeks: 3 }));
    assert.deepStrictEqual(viaAsync.events, sync.events);
  });

  it("enforces its lifecycle", () => {
    const simulation = runner.setup(sevenDevs({ durationWeeks: 1 }));
    assert.throws(() => simulation.addAgent(new HumanDeveloper(developerParams({ id: "dev-1" }))), /Duplicate agent id/);
    simulation.run();
    assert.throws(() => simulation.run(), StateError);
    assert.throws(() => simulation.addAgent(new HumanDeveloper(developerParams({ id: "dev-99" }))), StateError);

    const empty = new Simulation({ scenario: "empty", settings: sevenDevs().simulation, seed: 1 });
    assert.throws(() => empty.run(), /has no agents/);
  });

  it("reports tech debt and incidents only when enabled", () => {
    const plain = runner.run(sevenDevs({ durationWeeks: 4 }));
    assert.strictEqual(plain.metrics.techDebt, undefined);
    assert.strictEqual(plain.metrics.incidents, undefined);

    const busy = runner.run(
      sevenDevs({
        durationWeeks: 4,
        simulation: {
          techDebt: { enabled: true, accumulationRate: 1 },
          incidents: { enabled: true, weeklyRatePerDeveloper: 1 },
        },
      })
    );
    const { techDebt, incidents } = busy.metrics;
    assert.ok(techDebt);
    assert.ok(incidents);
    assert.strictEqual(techDebt.activeCount, techDebt.totalCreated - techDebt.totalPaid);
    assert.ok(incidents.total > 0);
    assert.strictEqual(incidents.total, incidents.active + incidents.resolved);
  });

  it("attaches onboarding state to human agent stats", () => {
    const result = runner.run(
      createScenario("Ramp", { developers: [{ count: 2, onboardingWeeks: 8 }], durationWeeks: 4, seed: 3 })
    );
    for (const stats of result.agentStats) {
      assert.strictEqual(stats.weeksInRole, 4);
      assert.strictEqual(stats.productivityMultiplier, 0.5);
    }
  });
});

describe("ScenarioRunner.resolveSeed", () => {
  const unseeded = createScenario("No seed", { teamSize: 2 });

  it("prefers the explicit override, then the scenario, then DEFAULT_SEED", () => {
    assert.strictEqual(runner.resolveSeed(sevenDevs(), 7), 7);
    assert.strictEqual(runner.resolveSeed(sevenDevs()), 42);
    assert.strictEqual(new ScenarioRunner(runtimeConfig({ defaultSeed: 11 })).resolveSeed(unseeded), 11);
  });

  it("falls back to a fixed seed", () => {
    assert.strictEqual(runner.resolveSeed(unseeded), FALLBACK_SEED);
  });
});
