import {
  InvalidInputError,
  sortByExitTime,
  type EquityMode,
  type EquityPoint,
  type ReturnBasis,
  type Trade,
} from "@tradestat/trade-contracts";

export const DAY_MS = 24 * 60 * 60_000;
export const YEAR_MS = 365.25 * DAY_MS;

export interface DailyPnlPoint {
  /** UTC midnight of the day, epoch ms. */
  time: number;
  pnl: number;
}

function assertCapital(initialCapital: number): void {
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new InvalidInputError("initialCapital must be a positive number", {
      initialCapital,
    });
  }
}

/**
 * Per-trade return series: each trade's P&L as a fraction of the capital it
 * was earned on. Both accumulation modes and the simulation consume it.
 */
export function tradeReturns(
  trades: readonly Trade[],
  initialCapital: number,
): number[] {
  assertCapital(initialCapital);
  return sortByExitTime(trades).map(
    (trade) => trade.profitLoss / initialCapital,
  );
}

/**
 * One step of an equity path. Compounding equity is floored at zero: a
 * return of -100% or worse ruins the account for good.
 */
export function accumulate(
  equity: number,
  periodReturn: number,
  initialCapital: number,
  mode: EquityMode,
): number {
  return mode === "compounding"
    ? Math.max(0, equity * (1 + periodReturn))
    : equity + periodReturn * initialCapital;
}

export function buildEquityCurve(
  trades: readonly Trade[],
  initialCapital: number,
  mode: EquityMode = "additive",
): EquityPoint[] {
  assertCapital(initialCapital);
  if (trades.length === 0) {
    throw new InvalidInputError("Cannot build an equity curve without trades");
  }

  const sorted = sortByExitTime(trades);
  const curve: EquityPoint[] = [
    { time: sorted[0]?.exitTime ?? 0, equity: initialCapital },
  ];

  let equity = initialCapital;
  for (const trade of sorted) {
    equity = accumulate(
      equity,
      trade.profitLoss / initialCapital,
      initialCapital,
      mode,
    );
    curve.push({ time: trade.exitTime, equity });
  }

  return curve;
}

function utcDay(time: number): number {
  return Math.floor(time / DAY_MS) * DAY_MS;
}

/**
 * P&L summed per UTC calendar day, with every day between the first and last
 * exit present (days without exits carry zero).
 */
export function dailyPnl(trades: readonly Trade[]): DailyPnlPoint[] {
  if (trades.length === 0) return [];

  const byDay = new Map<number, number>();
  for (const trade of trades) {
    const day = utcDay(trade.exitTime);
    byDay.set(day, (byDay.get(day) ?? 0) + trade.profitLoss);
  }

  const days = [...byDay.keys()].sort((a, b) => a - b);
  const first = days[0] ?? 0;
  const last = days[days.length - 1] ?? first;

  const series: DailyPnlPoint[] = [];
  for (let day = first; day <= last; day += DAY_MS) {
    series.push({ time: day, pnl: byDay.get(day) ?? 0 });
  }
  return series;
}

export function dailyReturns(
  trades: readonly Trade[],
  initialCapital: number,
): number[] {
  assertCapital(initialCapital);
  return dailyPnl(trades).map((point) => point.pnl / initialCapital);
}

export function buildReturnSeries(
  trades: readonly Trade[],
  initialCapital: number,
  basis: ReturnBasis,
): number[] {
  return basis === "daily"
    ? dailyReturns(trades, initialCapital)
    : tradeReturns(trades, initialCapital);
}

/** Span between the first and last exit, in years. */
export function activeYears(trades: readonly Trade[]): number {
  if (trades.length === 0) return 0;
  let first = Number.POSITIVE_INFINITY;
  let last = Number.NEGATIVE_INFINITY;
  for (const trade of trades) {
    first = Math.min(first, trade.exitTime);
    last = Math.max(last, trade.exitTime);
  }
  return (last - first) / YEAR_MS;
}
