import type { AgentStats, SimulationMetrics } from "@devteam-sim/core";
import type { ComparisonRow, ComparisonTable, FailedScenarioResult, ScenarioResult } from "./comparison.js";

const RULE = "=".repeat(72);
const THIN_RULE = "-".repeat(72);

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function fixed(value: number, digits = 1): string {
  return value.toFixed(digits);
}

function pad(text: string, width: number, align: "left" | "right" = "left"): string {
  return align === "left" ? text.padEnd(width) : text.padStart(width);
}

/** Plain-text run summary, one line per entry. */
export function formatMetricsSummary(name: string, metrics: SimulationMetrics): string[] {
  const lines = [
    RULE,
    `Scenario: ${name}`,
    RULE,
    `Team: ${metrics.totalAgents} agents (${metrics.humanDevelopers} human, ${metrics.aiAgents} AI)`,
    `Duration: ${metrics.daysElapsed} days`,
    `Communication overhead: ${fixed(metrics.communicationOverhead, 3)}x`,
    "",
    `PRs created:   ${metrics.totalPrsCreated}`,
    `PRs merged:    ${metrics.totalPrsMerged}`,
    `PRs reverted:  ${metrics.totalPrsReverted}`,
    `PRs abandoned: ${metrics.totalPrsAbandoned} (${metrics.defectsCaughtInReview} defects caught in review)`,
    `PRs open:      ${metrics.openPrs}`,
    `Throughput:    ${fixed(metrics.prsPerWeek)} PRs/week`,
    `Cycle time:    ${fixed(metrics.avgCycleTimeDays)} days`,
    `Failure rate:  ${pct(metrics.changeFailureRate)}`,
    `Review hours:  ${fixed(metrics.reviewHours)} (${fixed(metrics.supervisionHours)} on AI PRs)`,
  ];

  if (metrics.aiAgents > 0) {
    lines.push(
      "",
      `Human: ${metrics.human.prsMerged} merged, ${fixed(metrics.human.prsPerWeek)} PRs/week, ${pct(metrics.human.failureRate)} failure`,
      `AI:    ${metrics.ai.prsMerged} merged, ${fixed(metrics.ai.prsPerWeek)} PRs/week, ${pct(metrics.ai.failureRate)} failure`,
      `AI cost: $${fixed(metrics.aiTotalCost, 2)} ($${fixed(metrics.aiAvgCostPerPr, 2)}/PR)`
    );
  }
  if (metrics.techDebt) {
    const d = metrics.techDebt;
    lines.push("", `Tech debt: ${d.activeCount} active, ${d.totalCreated} created, ${d.totalPaid} paid, impact ${pct(d.productivityImpact)}`);
  }
  if (metrics.incidents) {
    const i = metrics.incidents;
    lines.push(`Incidents: ${i.total} total, ${i.active} active, MTTR ${fixed(i.avgMttrDays)} days`);
  }
  return lines;
}

export function formatAgentTable(stats: AgentStats[]): string[] {
  const header = [
    pad("Agent", 20),
    pad("Kind", 6),
    pad("Created", 8, "right"),
    pad("Merged", 8, "right"),
    pad("Reverted", 9, "right"),
    pad("Reviews", 8, "right"),
    pad("Cost", 9, "right"),
  ].join(" ");
  const lines = [header, THIN_RULE];
  for (const s of stats) {
    lines.push(
      [
        pad(s.name.slice(0, 20), 20),
        pad(s.kind, 6),
        pad(String(s.prsCreated), 8, "right"),
        pad(String(s.prsMerged), 8, "right"),
        pad(String(s.prsReverted), 9, "right"),
        pad(String(s.reviewsCompleted), 8, "right"),
        pad(s.costUsd > 0 ? `$${fixed(s.costUsd, 2)}` : "-", 9, "right"),
      ].join(" ")
    );
  }
  return lines;
}

function formatValue(row: ComparisonRow, value: number | null): string {
  if (value === null) return "-";
  if (row.metric === "changeFailureRate") return pct(value);
  return Number.isInteger(value) ? String(value) : fixed(value);
}

/** Side-by-side table: scenarios are numbered columns, winners starred. */
export function formatComparison(table: ComparisonTable, insights: string[], results: ScenarioResult[]): string[] {
  const lines = [RULE, "SCENARIO COMPARISON", RULE, "Scenarios:"];
  table.scenarios.forEach((name, i) => lines.push(`  [${i + 1}] ${name}`));

  for (const failed of results.filter((r): r is FailedScenarioResult => r.status === "failed")) {
    lines.push(`  [x] ${failed.name}: ${failed.error.message}`);
  }

  lines.push("", [pad("Metric", 24), ...table.scenarios.map((_, i) => pad(`#${i + 1}`, 10, "right")), " Winner"].join(" "));
  lines.push(THIN_RULE);
  for (const row of table.rows) {
    const cells = row.values.map((v, i) => {
      const star = row.winner === table.scenarios[i] ? " *" : "";
      return pad(formatValue(row, v) + star, 10, "right");
    });
    const winner = row.winner === null ? "-" : `#${table.scenarios.indexOf(row.winner) + 1}`;
    lines.push([pad(row.label, 24), ...cells, ` ${winner}`].join(" "));
  }

  if (insights.length > 0) {
    lines.push("", "Key insights:");
    for (const insight of insights) lines.push(`  - ${insight}`);
  }
  return lines;
}
