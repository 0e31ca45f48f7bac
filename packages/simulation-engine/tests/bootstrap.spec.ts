import { describe, expect, it } from "vitest";
import { InvalidInputError, type Trade } from "@tradestat/trade-contracts";
import { runBootstrapSimulation, simulateTrades } from "../src/bootstrap";

const historical = [
  -0.05, -0.03, -0.01, 0, 0.01, 0.02, 0.03, 0.04, 0.05, 0.06,
];

describe("runBootstrapSimulation", () => {
  it("reproduces the same result for the same seed", () => {
    const config = { paths: 1000, pathLength: 50, initialCapital: 1000, seed: 42 };

    const first = runBootstrapSimulation(historical, config);
    const second = runBootstrapSimulation(historical, config);

    expect(first.terminalValues).toHaveLength(1000);
    expect(second).toEqual(first);
  });

  it("diverges across seeds", () => {
    const base = { paths: 200, pathLength: 30, initialCapital: 1000 };

    const first = runBootstrapSimulation(historical, { ...base, seed: 1 });
    const second = runBootstrapSimulation(historical, { ...base, seed: 2 });

    expect(second.terminalValues).not.toEqual(first.terminalValues);
  });

  it("keeps the median terminal value within reachable outcomes", () => {
    const result = runBootstrapSimulation(historical, {
      paths: 1000,
      pathLength: 50,
      initialCapital: 1000,
      seed: 42,
    });
    const median = result.terminalPercentiles.find(
      (item) => item.percentile === 50,
    );

    expect(result.seed).toBe(42);
    expect(median?.value).toBeGreaterThanOrEqual(1000 + 50 * -0.05 * 1000);
    expect(median?.value).toBeLessThanOrEqual(1000 + 50 * 0.06 * 1000);
  });

  it("emits ordered percentile bands for every step", () => {
    const result = runBootstrapSimulation(historical, {
      paths: 300,
      pathLength: 20,
      initialCapital: 1000,
      seed: 7,
    });

    expect(result.bands.map((band) => band.percentile)).toEqual([5, 50, 95]);
    const [low, mid, high] = result.bands;
    expect(low?.values).toHaveLength(21);
    expect(low?.values[0]).toBe(1000);
    expect(high?.values[0]).toBe(1000);

    for (let step = 0; step <= 20; step += 1) {
      const lowValue = low?.values[step] ?? Number.NaN;
      const midValue = mid?.values[step] ?? Number.NaN;
      const highValue = high?.values[step] ?? Number.NaN;
      expect(lowValue).toBeLessThanOrEqual(midValue);
      expect(midValue).toBeLessThanOrEqual(highValue);
    }
  });

  it("accumulates additively from the initial capital", () => {
    const result = runBootstrapSimulation([-0.1], {
      paths: 4,
      pathLength: 2,
      initialCapital: 1000,
      seed: 3,
    });

    expect(result.terminalValues).toEqual([800, 800, 800, 800]);
    expect(result.meanTerminal).toBe(800);
    expect(result.probabilityOfRuin).toBe(1);
    expect(result.probabilityOfTarget).toBe(0);
    expect(result.maxDrawdownPercentiles.map((item) => item.value)).toEqual([
      -0.2, -0.2, -0.2,
    ]);
  });

  it("compounds returns in compounding mode", () => {
    const result = runBootstrapSimulation([0.1], {
      paths: 2,
      pathLength: 2,
      initialCapital: 1000,
      mode: "compounding",
      seed: 3,
      percentiles: [50],
    });

    expect(result.terminalValues).toEqual([1210, 1210]);
    expect(result.bands).toEqual([
      { percentile: 50, values: [1000, 1100, 1210] },
    ]);
    expect(result.probabilityOfRuin).toBe(0);
  });

  it("absorbs compounding paths at zero once ruined", () => {
    const result = runBootstrapSimulation([-1.5], {
      paths: 3,
      pathLength: 2,
      initialCapital: 1000,
      mode: "compounding",
      seed: 1,
      percentiles: [50],
    });

    expect(result.terminalValues).toEqual([0, 0, 0]);
    expect(result.bands).toEqual([{ percentile: 50, values: [1000, 0, 0] }]);
    expect(result.maxDrawdownPercentiles).toEqual([
      { percentile: 50, value: -1 },
    ]);
    expect(result.probabilityOfRuin).toBe(1);
  });

  it("counts paths reaching the target multiple", () => {
    const result = runBootstrapSimulation([0.5], {
      paths: 3,
      pathLength: 2,
      initialCapital: 1000,
      targetMultiple: 2,
      seed: 9,
    });

    expect(result.terminalValues).toEqual([2000, 2000, 2000]);
    expect(result.probabilityOfTarget).toBe(1);
  });

  it("picks and echoes a seed when none is given", () => {
    const result = runBootstrapSimulation(historical, {
      paths: 5,
      pathLength: 5,
      initialCapital: 1000,
    });

    expect(Number.isInteger(result.seed)).toBe(true);
    expect(result.seed).toBeGreaterThanOrEqual(0);
    expect(result.seed).toBeLessThan(2 ** 32);

    const replay = runBootstrapSimulation(historical, {
      paths: 5,
      pathLength: 5,
      initialCapital: 1000,
      seed: result.seed,
    });
    expect(replay.terminalValues).toEqual(result.terminalValues);
  });

  it("rejects inputs that cannot be resampled", () => {
    const config = { paths: 10, pathLength: 10, initialCapital: 1000 };

    expect(() => runBootstrapSimulation([], config)).toThrow(InvalidInputError);
    expect(() =>
      runBootstrapSimulation(historical, { ...config, paths: 0 }),
    ).toThrow(InvalidInputError);
    expect(() =>
      runBootstrapSimulation(historical, { ...config, pathLength: 0 }),
    ).toThrow(InvalidInputError);
    expect(() =>
      runBootstrapSimulation(historical, { ...config, initialCapital: 0 }),
    ).toThrow(InvalidInputError);
    expect(() => runBootstrapSimulation([0.01, Number.NaN], config)).toThrow(
      "Return series contains non-finite values",
    );
  });

  it("only takes seeds in the unsigned 32-bit range", () => {
    const config = { paths: 2, pathLength: 2, initialCapital: 1000 };

    expect(() =>
      runBootstrapSimulation(historical, { ...config, seed: -1 }),
    ).toThrow(InvalidInputError);
    expect(() =>
      runBootstrapSimulation(historical, { ...config, seed: 2 ** 32 }),
    ).toThrow(/seed/);
    expect(
      runBootstrapSimulation(historical, { ...config, seed: 2 ** 32 - 1 }).seed,
    ).toBe(2 ** 32 - 1);
  });

  it("refuses simulations too large to hold in memory", () => {
    expect(() =>
      runBootstrapSimulation(historical, {
        paths: 100_000,
        pathLength: 1_000,
        initialCapital: 1000,
      }),
    ).toThrow(InvalidInputError);
  });
});

describe("simulateTrades", () => {
  it("resamples each trade's P&L relative to the initial capital", () => {
    const trades: Trade[] = [
      {
        exitTime: 1,
        symbol: "NQZ4",
        entryPrice: 100,
        exitPrice: 110,
        size: 1,
        profitLoss: 250,
      },
    ];

    const result = simulateTrades(trades, {
      paths: 2,
      pathLength: 4,
      initialCapital: 5000,
      seed: 11,
    });

    expect(result.terminalValues).toEqual([6000, 6000]);
  });

  it("rejects an empty table", () => {
    expect(() =>
      simulateTrades([], { pathLength: 4, initialCapital: 5000 }),
    ).toThrow(InvalidInputError);
  });
});
