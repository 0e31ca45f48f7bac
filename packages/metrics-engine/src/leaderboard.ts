import {
  tableLabel,
  type MetricsConfigInput,
  type Trade,
} from "@tradestat/trade-contracts";
import { applySlippage } from "./analysis";
import { analyzeTrades, type MetricsSummary } from "./summary";

export interface StrategyTrades {
  name: string;
  trades: readonly Trade[];
}

export interface LeaderboardOptions extends MetricsConfigInput {
  fromMs?: number;
  toMs?: number;
  slippage?: number;
}

export interface LeaderboardEntry extends MetricsSummary {
  strategy: string;
}

/**
 * One summary per strategy over the `[fromMs, toMs]` exit window, after the
 * per-trade slippage cost. Strategies with no trades in the window are left
 * out.
 */
export function buildLeaderboard(
  strategies: readonly StrategyTrades[],
  options: LeaderboardOptions,
): LeaderboardEntry[] {
  const { fromMs, toMs, slippage = 0, ...config } = options;
  const entries: LeaderboardEntry[] = [];

  for (const strategy of strategies) {
    const inWindow = strategy.trades.filter(
      (trade) =>
        (fromMs === undefined || trade.exitTime >= fromMs) &&
        (toMs === undefined || trade.exitTime <= toMs),
    );
    if (inWindow.length === 0) continue;

    const { summary } = analyzeTrades(applySlippage(inWindow, slippage), config);
    entries.push({ strategy: tableLabel(strategy.name), ...summary });
  }

  return entries;
}
