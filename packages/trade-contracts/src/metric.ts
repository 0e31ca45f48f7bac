/**
 * Why a ratio has no meaningful value. These are expected outcomes of the
 * data, not failures, and travel inside the summary next to computed values.
 */
export type UndefinedMetricReason =
  | "insufficient-data"
  | "zero-variance"
  | "no-downside"
  | "zero-drawdown"
  | "no-losses"
  | "non-positive-period"
  | "numeric-anomaly";

export type MetricValue =
  | { kind: "value"; value: number }
  | { kind: "undefined"; reason: UndefinedMetricReason }
  | { kind: "unbounded" };

export function metricValue(value: number): MetricValue {
  if (!Number.isFinite(value)) {
    return { kind: "undefined", reason: "numeric-anomaly" };
  }
  return { kind: "value", value };
}

export function undefinedMetric(reason: UndefinedMetricReason): MetricValue {
  return { kind: "undefined", reason };
}

export const unboundedMetric: MetricValue = { kind: "unbounded" };

export function allFinite(values: readonly number[]): boolean {
  return values.every((value) => Number.isFinite(value));
}

/**
 * Computes one metric only when every input is finite. A non-finite input or
 * result turns into `numeric-anomaly` for that metric alone.
 */
export function guardMetric(
  inputs: readonly number[],
  compute: () => MetricValue,
): MetricValue {
  if (!allFinite(inputs)) return undefinedMetric("numeric-anomaly");
  const result = compute();
  if (result.kind === "value" && !Number.isFinite(result.value)) {
    return undefinedMetric("numeric-anomaly");
  }
  return result;
}

export function formatMetric(metric: MetricValue, decimals = 2): string {
  switch (metric.kind) {
    case "value":
      return metric.value.toFixed(decimals);
    case "unbounded":
      return "∞";
    case "undefined":
      return "N/A";
  }
}
