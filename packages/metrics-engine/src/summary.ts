import {
  MetricsConfigSchema,
  metricValue,
  parseConfig,
  sortByExitTime,
  type DrawdownPoint,
  type EquityPoint,
  type MetricValue,
  type MetricsConfig,
  type MetricsConfigInput,
  type Trade,
} from "@tradestat/trade-contracts";
import {
  computeDrawdown,
  maxDrawdown,
  maxDrawdownDuration,
} from "./drawdown";
import { activeYears, buildEquityCurve, buildReturnSeries } from "./equity";
import {
  cagr,
  calmarRatio,
  omegaRatio,
  sharpeRatio,
  sortinoRatio,
  tailRatio,
} from "./ratios";
import { winLossStats } from "./win-loss";

export interface MetricsSummary {
  totalTrades: number;
  /** Non-finite sums surface as `numeric-anomaly`. */
  netProfit: MetricValue;
  /** Net profit as a fraction of initial capital. */
  roi: MetricValue;
  profitPerTrade: MetricValue;
  finalCapital: MetricValue;
  tradesPerYear: number;
  maxDrawdownDurationDays: number;
  sharpe: MetricValue;
  sortino: MetricValue;
  calmar: MetricValue;
  cagr: MetricValue;
  omega: MetricValue;
  tailRatio: MetricValue;
  profitFactor: MetricValue;
  riskReward: MetricValue;
  winRate: MetricValue;
  averageWin: MetricValue;
  averageLoss: MetricValue;
  maxDrawdown: MetricValue;
}

export interface TradeAnalysis {
  config: MetricsConfig;
  returns: number[];
  equityCurve: EquityPoint[];
  drawdown: DrawdownPoint[];
  summary: MetricsSummary;
}

function chainCalmar(growth: MetricValue, drawdown: MetricValue): MetricValue {
  if (growth.kind !== "value") return growth;
  if (drawdown.kind !== "value") return drawdown;
  return calmarRatio(growth.value, drawdown.value);
}

/**
 * Equity curve, drawdown series and the full metrics summary for one trade
 * table. Throws `InvalidInputError` for an empty table or invalid config;
 * every other edge case lands in the summary as a sentinel.
 */
export function analyzeTrades(
  trades: readonly Trade[],
  configInput: MetricsConfigInput,
): TradeAnalysis {
  const config = parseConfig(MetricsConfigSchema, configInput, "metrics config");
  const sorted = sortByExitTime(trades);

  const equityCurve = buildEquityCurve(
    sorted,
    config.initialCapital,
    config.mode,
  );
  const drawdown = computeDrawdown(equityCurve);
  const returns = buildReturnSeries(
    sorted,
    config.initialCapital,
    config.returnBasis,
  );

  const netProfit = sorted.reduce((acc, trade) => acc + trade.profitLoss, 0);
  const finalCapital =
    equityCurve[equityCurve.length - 1]?.equity ?? config.initialCapital;
  const years = activeYears(sorted);

  const deepest = maxDrawdown(equityCurve, drawdown);
  const growth = cagr(config.initialCapital, finalCapital, years);
  const outcomes = winLossStats(sorted);

  const summary: MetricsSummary = {
    totalTrades: sorted.length,
    netProfit: metricValue(netProfit),
    roi: metricValue(netProfit / config.initialCapital),
    profitPerTrade: metricValue(netProfit / sorted.length),
    finalCapital: metricValue(finalCapital),
    tradesPerYear: years > 0 ? sorted.length / years : sorted.length,
    maxDrawdownDurationDays: maxDrawdownDuration(drawdown),
    sharpe: sharpeRatio(returns, config.riskFreeRate, config.periodsPerYear),
    sortino: sortinoRatio(returns, config.riskFreeRate, config.periodsPerYear),
    calmar: chainCalmar(growth, deepest),
    cagr: growth,
    omega: omegaRatio(returns),
    tailRatio: tailRatio(returns),
    profitFactor: outcomes.profitFactor,
    riskReward: outcomes.riskReward,
    winRate: outcomes.winRate,
    averageWin: outcomes.averageWin,
    averageLoss: outcomes.averageLoss,
    maxDrawdown: deepest,
  };

  return { config, returns, equityCurve, drawdown, summary };
}

export function summarizeTrades(
  trades: readonly Trade[],
  configInput: MetricsConfigInput,
): MetricsSummary {
  return analyzeTrades(trades, configInput).summary;
}
