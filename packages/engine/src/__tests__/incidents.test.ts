import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RandomSource } from "@devteam-sim/core";
import { IncidentTracker, severityForRoll } from "../incidents.js";
import { incidentsSchema } from "../scenario.js";

const defaults = incidentsSchema.parse({});

describe("severityForRoll", () => {
  it("maps rolls onto severity bands", () => {
    assert.deepStrictEqual(severityForRoll(0.05), { severity: "critical", hours: 16 });
    assert.deepStrictEqual(severityForRoll(0.1), { severity: "high", hours: 12 });
    assert.deepStrictEqual(severityForRoll(0.5), { severity: "medium", hours: 8 });
    assert.deepStrictEqual(severityForRoll(0.99), { severity: "low", hours: 4 });
  });
});

describe("IncidentTracker", () => {
  it("raises the daily probability with debt and recent reverts", () => {
    const tracker = new IncidentTracker({ ...defaults, weeklyRatePerDeveloper: 0.07 });
    assert.ok(Math.abs(tracker.dailyProbability(0, 0) - 0.01) < 1e-12);
    assert.ok(Math.abs(tracker.dailyProbability(0.5, 2) - 0.018) < 1e-12);
  });

  it("opens nothing without responders", () => {
    const tracker = new IncidentTracker(defaults);
    assert.strictEqual(tracker.open(0, new RandomSource(1), []), null);
    assert.strictEqual(tracker.getActive().length, 0);
  });

  it("staffs critical incidents with two or three responders and others with one", () => {
    const tracker = new IncidentTracker(defaults);
    const rng = new RandomSource("staffing");
    const responders = ["dev-1", "dev-2", "dev-3", "dev-4"];

    const ids: string[] = [];
    for (let day = 0; day < 50; day++) {
      const incident = tracker.open(day, rng, responders);
      assert.ok(incident);
      const expected = incident.severity === "critical" ? [2, 3] : [1];
      assert.ok(expected.includes(incident.assignees.length), `${incident.severity}: ${incident.assignees.length}`);
      assert.strictEqual(new Set(incident.assignees).size, incident.assignees.length);
      for (const id of incident.assignees) assert.ok(responders.includes(id));
      ids.push(incident.id);
    }
    assert.strictEqual(ids[0], "inc-0001");
  });

  it("resolves once enough hours are booked", () => {
    const tracker = new IncidentTracker({ ...defaults, hoursPerDay: 16 });
    const incident = tracker.open(2, new RandomSource(3), ["dev-1"]);
    assert.ok(incident);
    assert.deepStrictEqual([...tracker.onDuty()], ["dev-1"]);

    assert.deepStrictEqual(tracker.work(2, () => 0), []);
    assert.strictEqual(incident.hoursInvested, 0);

    assert.deepStrictEqual(tracker.work(3, () => 1), [incident]);
    assert.strictEqual(incident.resolvedDay, 3);
    assert.strictEqual(tracker.onDuty().size, 0);
    assert.strictEqual(tracker.getActive().length, 0);
  });
});
