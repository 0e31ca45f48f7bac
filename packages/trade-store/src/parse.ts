import { InvalidInputError } from "@tradestat/trade-contracts";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { TableFormat, TradeRow } from "./types";

const RowsSchema = z.array(z.record(z.string(), z.unknown()));
const JsonTableSchema = z.union([
  RowsSchema,
  z.object({ trades: RowsSchema }).transform((table) => table.trades),
]);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseCsv(content: string): TradeRow[] {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      columns: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new InvalidInputError(`Unreadable CSV table: ${errorMessage(error)}`);
  }
  return RowsSchema.parse(records);
}

function parseJson(content: string): TradeRow[] {
  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new InvalidInputError(
      `Unreadable JSON table: ${errorMessage(error)}`,
    );
  }

  const table = JsonTableSchema.safeParse(payload);
  if (!table.success) {
    throw new InvalidInputError(
      "JSON table must be an array of rows or an object with a trades array",
    );
  }
  return table.data;
}

/** Raw rows of a table, keyed by header. Values are not coerced here. */
export function parseTradeTable(
  content: string,
  format: TableFormat,
): TradeRow[] {
  return format === "csv" ? parseCsv(content) : parseJson(content);
}
