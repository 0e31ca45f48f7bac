import { TableNotFoundError, tableLabel } from "@tradestat/trade-contracts";
import type { TableFormat } from "./types";

// Derived workbooks and lock files that sit next to the raw exports.
const EXCLUDED_MARKERS = [
  "MASTER",
  "Matrix",
  "Combined",
  "Processed",
  "Graph",
  "Heatmap",
] as const;

export function tableFormat(name: string): TableFormat | undefined {
  const lower = name.toLowerCase();
  if (lower.endsWith(".csv")) return "csv";
  if (lower.endsWith(".json")) return "json";
  return undefined;
}

export function isEligibleTableName(name: string): boolean {
  const baseName = name.split("/").pop() ?? name;
  if (baseName.length === 0 || baseName.startsWith("~")) return false;
  if (EXCLUDED_MARKERS.some((marker) => baseName.includes(marker))) {
    return false;
  }
  return tableFormat(baseName) !== undefined;
}

/** Matches a requested table by full name or by its label without extension. */
export function resolveTableName(
  tables: readonly string[],
  requested: string,
): string {
  const match =
    tables.find((table) => table === requested) ??
    tables.find((table) => tableLabel(table) === requested);
  if (!match) throw new TableNotFoundError(requested);
  return match;
}
