import { describe, expect, it } from "vitest";
import type { MetricValue } from "@tradestat/trade-contracts";
import {
  cagr,
  calmarRatio,
  omegaRatio,
  sharpeRatio,
  sortinoRatio,
  tailRatio,
} from "../src/ratios";

function valueOf(metric: MetricValue): number {
  if (metric.kind !== "value") {
    throw new Error(`expected a computed value, got ${JSON.stringify(metric)}`);
  }
  return metric.value;
}

describe("sharpeRatio", () => {
  it("annualizes mean over sample deviation", () => {
    expect(valueOf(sharpeRatio([0.01, 0.02, 0.03], 0, 252))).toBeCloseTo(
      2 * Math.sqrt(252),
      10,
    );
  });

  it("subtracts the per-period risk-free rate", () => {
    expect(valueOf(sharpeRatio([0.01, 0.02, 0.03], 0.252, 252))).toBeCloseTo(
      1.9 * Math.sqrt(252),
      10,
    );
  });

  it("is undefined below two observations", () => {
    expect(sharpeRatio([0.05], 0, 252)).toEqual({
      kind: "undefined",
      reason: "insufficient-data",
    });
  });

  it("is undefined without variance", () => {
    expect(sharpeRatio([0.01, 0.01, 0.01], 0, 252)).toEqual({
      kind: "undefined",
      reason: "zero-variance",
    });
  });

  it("flags non-finite returns", () => {
    expect(sharpeRatio([0.01, Number.NaN, 0.02], 0, 252)).toEqual({
      kind: "undefined",
      reason: "numeric-anomaly",
    });
  });
});

describe("sortinoRatio", () => {
  it("divides by the downside deviation of negative excess returns", () => {
    expect(valueOf(sortinoRatio([0.02, -0.01, 0.03, -0.02], 0, 1))).toBeCloseTo(
      0.005 / Math.sqrt(0.00025),
      10,
    );
  });

  it("reports no downside instead of dividing by zero", () => {
    expect(sortinoRatio([0.01, 0.02, 0.04], 0, 252)).toEqual({
      kind: "undefined",
      reason: "no-downside",
    });
  });

  it("is undefined below two observations", () => {
    expect(sortinoRatio([-0.05], 0, 252)).toEqual({
      kind: "undefined",
      reason: "insufficient-data",
    });
  });
});

describe("calmarRatio", () => {
  it("divides growth by drawdown magnitude", () => {
    expect(calmarRatio(0.2, -0.1)).toEqual({ kind: "value", value: 2 });
  });

  it("is undefined without drawdown", () => {
    expect(calmarRatio(0.2, 0)).toEqual({
      kind: "undefined",
      reason: "zero-drawdown",
    });
  });
});

describe("cagr", () => {
  it("compounds the capital multiple over the period", () => {
    expect(valueOf(cagr(1000, 1210, 2))).toBeCloseTo(0.1, 12);
  });

  it("is exactly -100% after a total loss", () => {
    expect(cagr(1000, 0, 3)).toEqual({ kind: "value", value: -1 });
    expect(cagr(1000, -250, 0)).toEqual({ kind: "value", value: -1 });
  });

  it("is undefined over a non-positive period", () => {
    expect(cagr(1000, 1100, 0)).toEqual({
      kind: "undefined",
      reason: "non-positive-period",
    });
  });

  it("flags non-finite capital", () => {
    expect(cagr(1000, Number.NaN, 1)).toEqual({
      kind: "undefined",
      reason: "numeric-anomaly",
    });
  });
});

describe("omegaRatio", () => {
  it("compares summed gains with summed losses", () => {
    expect(valueOf(omegaRatio([0.02, -0.01, 0.03, -0.02]))).toBeCloseTo(
      0.05 / 0.03,
      10,
    );
  });

  it("is unbounded without losses", () => {
    expect(omegaRatio([0.01, 0.02])).toEqual({ kind: "unbounded" });
  });
});

describe("tailRatio", () => {
  it("compares the 95th and 5th percentiles", () => {
    expect(valueOf(tailRatio([-0.02, -0.01, 0, 0.01, 0.02]))).toBeCloseTo(
      1,
      10,
    );
  });

  it("is undefined when the left tail is flat at zero", () => {
    expect(tailRatio([0, 0, 0.01, 0.02])).toEqual({
      kind: "undefined",
      reason: "zero-variance",
    });
  });
});
