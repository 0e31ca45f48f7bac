import {
  guardMetric,
  metricValue,
  unboundedMetric,
  undefinedMetric,
  type MetricValue,
} from "@tradestat/trade-contracts";
import {
  isEffectivelyZero,
  mean,
  quantile,
  sampleStdDev,
} from "./statistics";

function excessReturns(
  returns: readonly number[],
  riskFreeRate: number,
  periodsPerYear: number,
): number[] {
  const periodRate = riskFreeRate / periodsPerYear;
  return returns.map((value) => value - periodRate);
}

export function sharpeRatio(
  returns: readonly number[],
  riskFreeRate: number,
  periodsPerYear: number,
): MetricValue {
  return guardMetric([...returns, riskFreeRate, periodsPerYear], () => {
    if (periodsPerYear <= 0) return undefinedMetric("non-positive-period");
    if (returns.length < 2) return undefinedMetric("insufficient-data");

    const excess = excessReturns(returns, riskFreeRate, periodsPerYear);
    const deviation = sampleStdDev(excess);
    if (isEffectivelyZero(deviation)) return undefinedMetric("zero-variance");

    return metricValue((mean(excess) / deviation) * Math.sqrt(periodsPerYear));
  });
}

/**
 * Sharpe with the denominator replaced by the downside deviation: the root
 * mean square of the negative excess returns only.
 */
export function sortinoRatio(
  returns: readonly number[],
  riskFreeRate: number,
  periodsPerYear: number,
): MetricValue {
  return guardMetric([...returns, riskFreeRate, periodsPerYear], () => {
    if (periodsPerYear <= 0) return undefinedMetric("non-positive-period");
    if (returns.length < 2) return undefinedMetric("insufficient-data");

    const excess = excessReturns(returns, riskFreeRate, periodsPerYear);
    const downside = excess.filter((value) => value < 0);
    if (downside.length === 0) return undefinedMetric("no-downside");

    const downsideDeviation = Math.sqrt(
      mean(downside.map((value) => value * value)),
    );
    if (isEffectivelyZero(downsideDeviation)) {
      return undefinedMetric("no-downside");
    }

    return metricValue(
      (mean(excess) / downsideDeviation) * Math.sqrt(periodsPerYear),
    );
  });
}

export function calmarRatio(cagr: number, maxDrawdown: number): MetricValue {
  return guardMetric([cagr, maxDrawdown], () => {
    if (maxDrawdown === 0) return undefinedMetric("zero-drawdown");
    return metricValue(cagr / Math.abs(maxDrawdown));
  });
}

/**
 * Compound annual growth rate. A wiped-out account is exactly -100 %, whatever
 * the period.
 */
export function cagr(
  initialCapital: number,
  finalCapital: number,
  totalYears: number,
): MetricValue {
  return guardMetric([initialCapital, finalCapital, totalYears], () => {
    if (initialCapital <= 0) return undefinedMetric("insufficient-data");
    if (finalCapital <= 0) return metricValue(-1);
    if (totalYears <= 0) return undefinedMetric("non-positive-period");
    return metricValue((finalCapital / initialCapital) ** (1 / totalYears) - 1);
  });
}

/** Sum of gains over the magnitude of the sum of losses. */
export function omegaRatio(returns: readonly number[]): MetricValue {
  return guardMetric(returns, () => {
    if (returns.length === 0) return undefinedMetric("insufficient-data");

    let gains = 0;
    let losses = 0;
    for (const value of returns) {
      if (value > 0) gains += value;
      if (value < 0) losses -= value;
    }

    if (losses === 0) {
      return gains > 0 ? unboundedMetric : undefinedMetric("insufficient-data");
    }
    return metricValue(gains / losses);
  });
}

/** 95th percentile return over the magnitude of the 5th percentile. */
export function tailRatio(returns: readonly number[]): MetricValue {
  return guardMetric(returns, () => {
    if (returns.length === 0) return undefinedMetric("insufficient-data");

    const upper = quantile(returns, 0.95);
    const lower = Math.abs(quantile(returns, 0.05));
    if (lower === 0) return undefinedMetric("zero-variance");
    return metricValue(upper / lower);
  });
}
