import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ComparisonTable, ScenarioResult } from "./comparison.js";
import type { RunResult } from "./runner.js";

export interface ComparisonExport {
  comparison: ComparisonTable;
  insights: string[];
  results: ScenarioResult[];
}

/** Quote a CSV field when it contains a delimiter, quote or line break. */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatNumber(value: number | null): string {
  if (value === null) return "";
  return String(Number(value.toFixed(4)));
}

/**
 * Flat metrics table: `Metric,<scenario…>,Winner`, one row per metric in
 * table order. Undefined values are empty cells.
 */
export function comparisonToCsv(table: ComparisonTable): string {
  const lines = [["Metric", ...table.scenarios, "Winner"]];
  for (const row of table.rows) {
    lines.push([row.label, ...row.values.map(formatNumber), row.winner ?? ""]);
  }
  return lines.map((fields) => fields.map(escapeCsvField).join(",")).join("\n") + "\n";
}

export function comparisonToJson(data: ComparisonExport): string {
  return JSON.stringify(data, null, 2) + "\n";
}

async function writeText(filePath: string, text: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, text, "utf8");
}

export async function writeComparisonJson(filePath: string, data: ComparisonExport): Promise<void> {
  await writeText(filePath, comparisonToJson(data));
}

export async function writeComparisonCsv(filePath: string, table: ComparisonTable): Promise<void> {
  await writeText(filePath, comparisonToCsv(table));
}

export interface RunExportOptions {
  includeEvents?: boolean;
}

/** A single run as JSON. The event log is left out unless asked for. */
export function runResultToJson(result: RunResult, options: RunExportOptions = {}): string {
  const { events, ...rest } = result;
  const data = options.includeEvents ? { ...rest, events } : rest;
  return JSON.stringify(data, null, 2) + "\n";
}

export async function writeRunResult(filePath: string, result: RunResult, options: RunExportOptions = {}): Promise<void> {
  await writeText(filePath, runResultToJson(result, options));
}
