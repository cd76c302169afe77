import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RandomSource } from "@devteam-sim/core";
import { techDebtSchema } from "../scenario.js";
import { TechDebtTracker } from "../tech-debt.js";

const defaults = techDebtSchema.parse({});

describe("TechDebtTracker", () => {
  it("derives severity from author quality", () => {
    assert.ok(Math.abs(TechDebtTracker.severityFor(0.85) - 1.15) < 1e-12);
    assert.strictEqual(TechDebtTracker.severityFor(1.8), 0.5);
    assert.strictEqual(TechDebtTracker.severityFor(-1), 2);
  });

  it("numbers items and sums their impact", () => {
    const tracker = new TechDebtTracker(defaults);
    const first = tracker.add(3, "pr-0001", 1);
    tracker.add(4, "pr-0002", 0.5);

    assert.strictEqual(first.id, "td-0001");
    assert.strictEqual(first.severity, 1);
    assert.ok(Math.abs(tracker.getTotalImpact() - 0.025) < 1e-12);
  });

  it("caps total impact", () => {
    const tracker = new TechDebtTracker({ ...defaults, maxImpact: 0.03 });
    for (let i = 0; i < 5; i++) tracker.add(0, `pr-${i}`, 0);
    assert.strictEqual(tracker.getTotalImpact(), 0.03);
  });

  it("pays items off once", () => {
    const tracker = new TechDebtTracker(defaults);
    const item = tracker.add(0, "pr-0001", 1);
    assert.deepStrictEqual(tracker.activeForPr("pr-0001"), [item]);

    assert.strictEqual(tracker.payOff(item, 7), true);
    assert.strictEqual(tracker.payOff(item, 8), false);
    assert.strictEqual(item.paidDay, 7);
    assert.deepStrictEqual(tracker.getActive(), []);
    assert.strictEqual(tracker.getTotalImpact(), 0);
  });

  it("pays everything down when the weekly probability is 1", () => {
    const tracker = new TechDebtTracker({ ...defaults, paydownProbability: 1 });
    tracker.add(0, "pr-0001", 1);
    tracker.add(1, "pr-0002", 1);

    const paid = tracker.paydown(new RandomSource(1), 7);
    assert.strictEqual(paid.length, 2);
    assert.strictEqual(tracker.getActive().length, 0);
  });

  it("accrues according to the accumulation rate", () => {
    const never = new TechDebtTracker({ ...defaults, accumulationRate: 0 });
    const always = new TechDebtTracker({ ...defaults, accumulationRate: 1 });
    const rng = new RandomSource("debt");
    assert.strictEqual(never.shouldAccrue(rng), false);
    assert.strictEqual(always.shouldAccrue(rng), true);
  });
});
