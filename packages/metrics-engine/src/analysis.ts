import {
  InvalidInputError,
  metricValue,
  sortByExitTime,
  undefinedMetric,
  type MetricValue,
  type Trade,
} from "@tradestat/trade-contracts";
import { dailyPnl } from "./equity";
import { isEffectivelyZero } from "./statistics";

export interface RollingMetricPoint {
  time: number;
  value: MetricValue;
}

export interface RollingSortinoOptions {
  windowDays?: number;
  periodsPerYear?: number;
}

/**
 * Sortino over a trailing window of daily P&L. Gains are clipped to zero in
 * the downside term, so flat days still count toward the window length.
 */
export function rollingSortino(
  trades: readonly Trade[],
  options: RollingSortinoOptions = {},
): RollingMetricPoint[] {
  const windowDays = options.windowDays ?? 90;
  const periodsPerYear = options.periodsPerYear ?? 252;
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw new InvalidInputError("windowDays must be a positive integer", {
      windowDays,
    });
  }

  const series = dailyPnl(trades);
  const points: RollingMetricPoint[] = [];
  let windowSum = 0;
  let windowDownsideSquares = 0;

  series.forEach((point, index) => {
    windowSum += point.pnl;
    windowDownsideSquares += Math.min(point.pnl, 0) ** 2;

    const dropped = series[index - windowDays];
    if (dropped) {
      windowSum -= dropped.pnl;
      windowDownsideSquares -= Math.min(dropped.pnl, 0) ** 2;
    }

    if (index < windowDays - 1) {
      points.push({
        time: point.time,
        value: undefinedMetric("insufficient-data"),
      });
      return;
    }

    const downside = Math.sqrt(Math.max(windowDownsideSquares, 0) / windowDays);
    if (isEffectivelyZero(downside)) {
      points.push({ time: point.time, value: undefinedMetric("no-downside") });
      return;
    }

    points.push({
      time: point.time,
      value: metricValue(
        (windowSum / windowDays / downside) * Math.sqrt(periodsPerYear),
      ),
    });
  });

  return points;
}

/** Deducts a fixed cost from every trade's P&L. */
export function applySlippage(
  trades: readonly Trade[],
  costPerTrade: number,
): Trade[] {
  if (!Number.isFinite(costPerTrade)) {
    throw new InvalidInputError("costPerTrade must be a finite number", {
      costPerTrade,
    });
  }
  if (trades.length === 0 || costPerTrade === 0) return [...trades];
  return trades.map((trade) => ({
    ...trade,
    profitLoss: trade.profitLoss - costPerTrade,
  }));
}

export type YearlyScalingMode = "linear" | "proportional";

export interface YearlyCompoundingOptions {
  initialCapital: number;
  mode?: YearlyScalingMode;
  /** Fraction of each positive yearly profit withheld, e.g. 0.25. */
  taxRate?: number;
}

export interface YearlyCompoundingRow {
  year: number;
  startBalance: number;
  scalingFactor: number;
  rawProfit: number;
  tax: number;
  netProfit: number;
  endBalance: number;
  /** Net profit over the start balance; 0 once the balance is exhausted. */
  growth: number;
  linearEquity: number;
}

const MIN_PROPORTIONAL_SCALE = 0.1;

/**
 * Replays yearly P&L with position sizes scaled up over time: `linear` adds
 * one stake per elapsed year, `proportional` scales by the equity multiple.
 */
export function simulateYearlyCompounding(
  trades: readonly Trade[],
  options: YearlyCompoundingOptions,
): YearlyCompoundingRow[] {
  const { initialCapital } = options;
  const mode = options.mode ?? "linear";
  const taxRate = options.taxRate ?? 0;
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new InvalidInputError("initialCapital must be a positive number", {
      initialCapital,
    });
  }

  const byYear = new Map<number, number>();
  for (const trade of trades) {
    const year = new Date(trade.exitTime).getUTCFullYear();
    byYear.set(year, (byYear.get(year) ?? 0) + trade.profitLoss);
  }

  const rows: YearlyCompoundingRow[] = [];
  let equity = initialCapital;
  let linearEquity = initialCapital;

  [...byYear.keys()]
    .sort((a, b) => a - b)
    .forEach((year, index) => {
      const rawProfit = byYear.get(year) ?? 0;
      const scalingFactor =
        mode === "linear"
          ? 1 + index
          : Math.max(equity / initialCapital, MIN_PROPORTIONAL_SCALE);

      const gross = rawProfit * scalingFactor;
      const tax = gross > 0 ? gross * taxRate : 0;
      const netProfit = gross - tax;
      const startBalance = equity;
      const endBalance = startBalance + netProfit;
      linearEquity += rawProfit;

      rows.push({
        year,
        startBalance,
        scalingFactor,
        rawProfit,
        tax,
        netProfit,
        endBalance,
        growth: startBalance > 0 ? netProfit / startBalance : 0,
        linearEquity,
      });
      equity = endBalance;
    });

  return rows;
}

export interface RunUpBucket {
  label: string;
  min: number;
  max: number;
}

export const defaultRunUpBuckets: RunUpBucket[] = [
  { label: "3k - 5k", min: 3000, max: 5000 },
  { label: "5k - 8k", min: 5000, max: 8000 },
  { label: "8k - 12k", min: 8000, max: 12000 },
  { label: "12k - 20k", min: 12000, max: 20000 },
  { label: "> 20k", min: 20000, max: Number.POSITIVE_INFINITY },
];

export interface RunUpBucketSummary {
  label: string;
  count: number;
  averageLoss: number;
}

export interface RunUpAnalysis {
  buckets: RunUpBucketSummary[];
  losingTrades: Trade[];
}

/**
 * Losing trades grouped by how far they ran in profit before closing red.
 * Returns null when no losing trade carries run-up data.
 */
export function analyzeRunUps(
  trades: readonly Trade[],
  buckets: readonly RunUpBucket[] = defaultRunUpBuckets,
): RunUpAnalysis | null {
  const losingTrades = sortByExitTime(trades).filter(
    (trade) => trade.profitLoss < 0,
  );
  const totalRunUp = trades.reduce((acc, trade) => acc + (trade.runUp ?? 0), 0);
  if (losingTrades.length === 0 || totalRunUp === 0) return null;

  return {
    buckets: buckets.map((bucket) => {
      const subset = losingTrades.filter((trade) => {
        const runUp = trade.runUp ?? 0;
        return runUp >= bucket.min && runUp < bucket.max;
      });
      const total = subset.reduce((acc, trade) => acc + trade.profitLoss, 0);
      return {
        label: bucket.label,
        count: subset.length,
        averageLoss: subset.length > 0 ? total / subset.length : 0,
      };
    }),
    losingTrades,
  };
}

export interface LossSeverity {
  label: string;
  count: number;
  totalLoss: number;
}

const lossSeverities = [
  { label: "Small (0 - 3k)", lower: -3000, upper: 0 },
  { label: "Medium (3k - 5k)", lower: -5000, upper: -3000 },
  { label: "Large (5k - 10k)", lower: -10000, upper: -5000 },
  { label: "Massive (> 10k)", lower: Number.NEGATIVE_INFINITY, upper: -10000 },
];

export function breakdownLosses(trades: readonly Trade[]): LossSeverity[] {
  const losses = trades
    .map((trade) => trade.profitLoss)
    .filter((pnl) => pnl < 0);
  if (losses.length === 0) return [];

  return lossSeverities.map(({ label, lower, upper }) => {
    const inBucket = losses.filter((pnl) => pnl < upper && pnl >= lower);
    return {
      label,
      count: inBucket.length,
      totalLoss: inBucket.reduce((acc, pnl) => acc + pnl, 0),
    };
  });
}

export const monthNames = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export interface MonthlyMatrixRow {
  /** Calendar year, or `Grand Total` for the closing row. */
  label: string;
  /** P&L per month, January first. */
  months: number[];
  total: number;
  /** Total as a fraction of initial capital. */
  return: number;
}

export function buildMonthlyMatrix(
  trades: readonly Trade[],
  initialCapital: number,
): MonthlyMatrixRow[] {
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new InvalidInputError("initialCapital must be a positive number", {
      initialCapital,
    });
  }

  const byYear = new Map<number, number[]>();
  for (const trade of trades) {
    const date = new Date(trade.exitTime);
    const year = date.getUTCFullYear();
    const months = byYear.get(year) ?? new Array<number>(12).fill(0);
    months[date.getUTCMonth()] =
      (months[date.getUTCMonth()] ?? 0) + trade.profitLoss;
    byYear.set(year, months);
  }

  const toRow = (label: string, months: number[]): MonthlyMatrixRow => {
    const total = months.reduce((acc, value) => acc + value, 0);
    return { label, months, total, return: total / initialCapital };
  };

  const rows = [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, months]) => toRow(String(year), months));

  const grand = new Array<number>(12).fill(0);
  for (const row of rows) {
    row.months.forEach((value, index) => {
      grand[index] = (grand[index] ?? 0) + value;
    });
  }
  rows.push(toRow("Grand Total", grand));

  return rows;
}

export const weekdayNames = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export interface SeasonalityBucket {
  label: string;
  trades: number;
  /** Mean P&L of the trades that closed in the bucket, 0 when empty. */
  averagePnl: number;
}

export interface Seasonality {
  weekdays: SeasonalityBucket[];
  months: SeasonalityBucket[];
}

function averageBuckets(
  labels: readonly string[],
  keyed: ReadonlyArray<readonly [number, number]>,
): SeasonalityBucket[] {
  const sums = new Array<number>(labels.length).fill(0);
  const counts = new Array<number>(labels.length).fill(0);
  for (const [index, pnl] of keyed) {
    sums[index] = (sums[index] ?? 0) + pnl;
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return labels.map((label, index) => {
    const count = counts[index] ?? 0;
    return {
      label,
      trades: count,
      averagePnl: count > 0 ? (sums[index] ?? 0) / count : 0,
    };
  });
}

/** Mean trade P&L by UTC weekday (Monday first) and by calendar month. */
export function buildSeasonality(trades: readonly Trade[]): Seasonality {
  const dates = trades.map(
    (trade) => [new Date(trade.exitTime), trade.profitLoss] as const,
  );

  return {
    weekdays: averageBuckets(
      weekdayNames,
      dates.map(([date, pnl]) => [(date.getUTCDay() + 6) % 7, pnl] as const),
    ),
    months: averageBuckets(
      monthNames,
      dates.map(([date, pnl]) => [date.getUTCMonth(), pnl] as const),
    ),
  };
}
