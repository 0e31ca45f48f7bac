import {
  allFinite,
  metricValue,
  unboundedMetric,
  undefinedMetric,
  type MetricValue,
  type Trade,
} from "@tradestat/trade-contracts";

export interface WinLossStats {
  totalTrades: number;
  wins: number;
  losses: number;
  grossProfit: number;
  /** Magnitude of the summed losing P&L. */
  grossLoss: number;
  winRate: MetricValue;
  averageWin: MetricValue;
  /** Magnitude of the average losing trade. */
  averageLoss: MetricValue;
  profitFactor: MetricValue;
  riskReward: MetricValue;
}

const anomaly = undefinedMetric("numeric-anomaly");

export function winLossStats(trades: readonly Trade[]): WinLossStats {
  const pnl = trades.map((trade) => trade.profitLoss);
  const finite = pnl.filter((value) => Number.isFinite(value));

  const winning = finite.filter((value) => value > 0);
  const losing = finite.filter((value) => value < 0);
  const grossProfit = winning.reduce((acc, value) => acc + value, 0);
  const grossLoss = Math.abs(losing.reduce((acc, value) => acc + value, 0));

  const base = {
    totalTrades: trades.length,
    wins: winning.length,
    losses: losing.length,
    grossProfit,
    grossLoss,
  };

  if (!allFinite(pnl)) {
    return {
      ...base,
      winRate: anomaly,
      averageWin: anomaly,
      averageLoss: anomaly,
      profitFactor: anomaly,
      riskReward: anomaly,
    };
  }

  const averageWin =
    winning.length === 0
      ? undefinedMetric("insufficient-data")
      : metricValue(grossProfit / winning.length);
  const averageLoss =
    losing.length === 0
      ? undefinedMetric("no-losses")
      : metricValue(grossLoss / losing.length);

  let profitFactor: MetricValue;
  if (grossLoss === 0) {
    profitFactor =
      grossProfit > 0 ? unboundedMetric : undefinedMetric("insufficient-data");
  } else {
    profitFactor = metricValue(grossProfit / grossLoss);
  }

  let riskReward: MetricValue;
  if (averageWin.kind !== "value") {
    riskReward = averageWin;
  } else if (averageLoss.kind !== "value") {
    riskReward = unboundedMetric;
  } else {
    riskReward = metricValue(averageWin.value / averageLoss.value);
  }

  return {
    ...base,
    winRate:
      trades.length === 0
        ? undefinedMetric("insufficient-data")
        : metricValue(winning.length / trades.length),
    averageWin,
    averageLoss,
    profitFactor,
    riskReward,
  };
}
