import {
  InvalidInputError,
  TradeSchema,
  type Trade,
} from "@tradestat/trade-contracts";
import type { TradeRow } from "./types";

export interface RejectedRow {
  /** Position of the row in the parsed table, header excluded. */
  index: number;
  issues: string[];
}

export interface NormalizedTrades {
  trades: Trade[];
  rejected: RejectedRow[];
}

export interface NormalizeOptions {
  /** Symbol used when the table has no symbol column. */
  symbol?: string;
}

const COLUMN_KEYS = [
  "exitTime",
  "profitLoss",
  "runUp",
  "type",
  "symbol",
  "entryPrice",
  "exitPrice",
  "size",
  "tradeNumber",
] as const;
type ColumnKey = (typeof COLUMN_KEYS)[number];

interface ColumnMatcher {
  exact: readonly string[];
  fuzzy: (header: string) => boolean;
}

const RUN_UP_KEYWORDS = [
  "run-up",
  "run up",
  "mfe",
  "max profit",
  "highest",
  "max favorable",
];

function isRunUpHeader(header: string): boolean {
  const lower = header.toLowerCase();
  return RUN_UP_KEYWORDS.some((keyword) => lower.includes(keyword));
}

const COLUMN_MATCHERS: Record<ColumnKey, ColumnMatcher> = {
  exitTime: {
    exact: ["exitTime", "exit_time"],
    fuzzy: (header) =>
      (header.includes("Date") || header.includes("Time")) &&
      !/entry/i.test(header),
  },
  profitLoss: {
    exact: ["profitLoss", "profit_loss", "pnl"],
    fuzzy: (header) =>
      (header.includes("Net P&L") || header.includes("Profit")) &&
      !isRunUpHeader(header) &&
      !/^cum/i.test(header),
  },
  runUp: {
    exact: ["runUp", "run_up"],
    fuzzy: isRunUpHeader,
  },
  type: {
    exact: ["type"],
    fuzzy: (header) => header.includes("Type"),
  },
  symbol: {
    exact: ["symbol"],
    fuzzy: (header) => /symbol|ticker|instrument/i.test(header),
  },
  entryPrice: {
    exact: ["entryPrice", "entry_price"],
    fuzzy: (header) => /entry.*price/i.test(header),
  },
  exitPrice: {
    exact: ["exitPrice", "exit_price"],
    fuzzy: (header) => /exit.*price/i.test(header) || /^price\b/i.test(header),
  },
  size: {
    exact: ["size"],
    fuzzy: (header) =>
      /^(contracts|qty|quantity|size|position size)\b/i.test(header),
  },
  tradeNumber: {
    exact: ["tradeId", "trade_id"],
    fuzzy: (header) => /^trade\s*(#|no\.?|number|id)/i.test(header),
  },
};

type ColumnMap = Partial<Record<ColumnKey, string>>;

function detectColumns(headers: readonly string[]): ColumnMap {
  const columns: ColumnMap = {};

  for (const key of COLUMN_KEYS) {
    const matcher = COLUMN_MATCHERS[key];
    columns[key] =
      headers.find((header) => matcher.exact.includes(header)) ??
      headers.find((header) => matcher.fuzzy(header));
  }

  return columns;
}

function trimKeys(row: TradeRow): TradeRow {
  return Object.fromEntries(
    Object.entries(row).map(([key, value]) => [key.trim(), value]),
  );
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value !== "string") return undefined;

  const cleaned = value
    .replace(/[\s,$€£]/g, "")
    .replace(/−/g, "-")
    .replace(/^\((.*)\)$/, "-$1");
  if (cleaned.length === 0) return undefined;

  const parsed = Number(cleaned);
  return Number.isNaN(parsed) ? undefined : parsed;
}

const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Epoch ms. Timestamps without a zone are read as UTC. */
function toTime(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value !== "string") return undefined;

  const text = value.trim();
  if (text.length === 0) return undefined;
  if (/^\d+$/.test(text)) return Number(text);

  const normalized = NAIVE_DATE_TIME.test(text)
    ? `${text.replace(" ", "T")}Z`
    : text;
  const parsed = Date.parse(normalized);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const text = value.trim();
    return text.length > 0 ? text : undefined;
  }
  if (typeof value === "number") return String(value);
  return undefined;
}

function read(row: TradeRow, column: string | undefined): unknown {
  return column === undefined ? undefined : row[column];
}

function rowType(row: TradeRow, columns: ColumnMap): string {
  return toText(read(row, columns.type))?.toLowerCase() ?? "";
}

/**
 * Entry prices keyed by trade number, taken from the `Entry` rows of exports
 * that list each trade as an entry row and an exit row.
 */
function pairedEntryPrices(
  rows: readonly TradeRow[],
  columns: ColumnMap,
): Map<string, number> {
  const prices = new Map<string, number>();
  if (!columns.type || !columns.tradeNumber || columns.entryPrice) {
    return prices;
  }

  for (const row of rows) {
    if (!rowType(row, columns).includes("entry")) continue;
    const tradeNumber = toText(read(row, columns.tradeNumber));
    const price = toNumber(read(row, columns.exitPrice));
    if (tradeNumber !== undefined && price !== undefined) {
      prices.set(tradeNumber, price);
    }
  }

  return prices;
}

/**
 * Maps loosely formatted rows onto `Trade` records. Columns are detected by
 * name, only exit rows are kept when the table has a type column, and every
 * candidate is validated with `TradeSchema`. Rows that fail validation are
 * reported in `rejected` rather than thrown.
 */
export function normalizeTradeRows(
  rawRows: readonly TradeRow[],
  options: NormalizeOptions = {},
): NormalizedTrades {
  const rows = rawRows.map(trimKeys);
  const headers = [...new Set(rows.flatMap((row) => Object.keys(row)))];
  const columns = detectColumns(headers);

  if (!columns.exitTime || !columns.profitLoss) {
    throw new InvalidInputError(
      "Trade table needs a date/time column and a profit/loss column",
      { headers },
    );
  }

  const entryPrices = pairedEntryPrices(rows, columns);
  const trades: Trade[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((row, index) => {
    if (columns.type && !rowType(row, columns).includes("exit")) return;

    const tradeNumber = toText(read(row, columns.tradeNumber));
    const candidate = {
      exitTime: toTime(read(row, columns.exitTime)),
      symbol: toText(read(row, columns.symbol)) ?? options.symbol,
      entryPrice:
        toNumber(read(row, columns.entryPrice)) ??
        (tradeNumber === undefined ? undefined : entryPrices.get(tradeNumber)),
      exitPrice: toNumber(read(row, columns.exitPrice)),
      size: toNumber(read(row, columns.size)),
      profitLoss: toNumber(read(row, columns.profitLoss)),
      runUp: toNumber(read(row, columns.runUp)),
    };

    const parsed = TradeSchema.safeParse(candidate);
    if (parsed.success) {
      trades.push(parsed.data);
      return;
    }

    rejected.push({
      index,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  });

  return { trades, rejected };
}
