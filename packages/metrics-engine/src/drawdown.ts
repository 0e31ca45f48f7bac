import {
  allFinite,
  metricValue,
  undefinedMetric,
  type DrawdownPoint,
  type EquityPoint,
  type MetricValue,
} from "@tradestat/trade-contracts";
import { DAY_MS } from "./equity";

/**
 * Decline from the running peak at every point of the curve, as a fraction
 * (values are <= 0). A peak at or below zero reports no drawdown, and
 * non-finite points neither move the peak nor report a drawdown.
 */
export function computeDrawdown(
  equityCurve: readonly EquityPoint[],
): DrawdownPoint[] {
  let runningMax = Number.NEGATIVE_INFINITY;

  return equityCurve.map((point) => {
    if (!Number.isFinite(point.equity)) {
      return { time: point.time, drawdown: 0 };
    }
    runningMax = Math.max(runningMax, point.equity);
    if (runningMax <= 0) {
      return { time: point.time, drawdown: 0 };
    }
    return {
      time: point.time,
      drawdown: Math.min(0, (point.equity - runningMax) / runningMax),
    };
  });
}

export function maxDrawdown(
  equityCurve: readonly EquityPoint[],
  drawdown: readonly DrawdownPoint[] = computeDrawdown(equityCurve),
): MetricValue {
  if (equityCurve.length === 0) return undefinedMetric("insufficient-data");
  if (!allFinite(equityCurve.map((point) => point.equity))) {
    return undefinedMetric("numeric-anomaly");
  }

  let deepest = 0;
  for (const point of drawdown) deepest = Math.min(deepest, point.drawdown);
  return metricValue(deepest);
}

/**
 * Longest continuous underwater stretch, in whole days between its first and
 * last underwater point.
 */
export function maxDrawdownDuration(
  drawdown: readonly DrawdownPoint[],
): number {
  let longest = 0;
  let stretchStart: number | null = null;

  for (const point of drawdown) {
    if (point.drawdown < 0) {
      stretchStart ??= point.time;
      longest = Math.max(
        longest,
        Math.floor((point.time - stretchStart) / DAY_MS),
      );
    } else {
      stretchStart = null;
    }
  }

  return longest;
}
