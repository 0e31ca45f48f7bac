import {
  accumulate,
  quantileSorted,
  tradeReturns,
} from "@tradestat/metrics-engine";
import {
  InvalidInputError,
  SimulationConfigSchema,
  allFinite,
  parseConfig,
  type EquityMode,
  type SimulationConfigInput,
  type Trade,
} from "@tradestat/trade-contracts";
import { createSeededRandom, randomSeed } from "./random";

export interface PercentileValue {
  percentile: number;
  value: number;
}

export interface PercentileBand {
  percentile: number;
  /** One value per step, starting with the initial capital. */
  values: number[];
}

export interface SimulationResult {
  seed: number;
  paths: number;
  pathLength: number;
  initialCapital: number;
  mode: EquityMode;
  /** Final equity of every path, in path order. */
  terminalValues: number[];
  bands: PercentileBand[];
  terminalPercentiles: PercentileValue[];
  meanTerminal: number;
  /** Share of paths that end below the initial capital. */
  probabilityOfRuin: number;
  /** Share of paths that end at or above `initialCapital * targetMultiple`. */
  probabilityOfTarget: number;
  targetMultiple: number;
  /** Distribution of each path's deepest drawdown (fractions, <= 0). */
  maxDrawdownPercentiles: PercentileValue[];
}

/**
 * Bootstrap projection: every path draws `pathLength` returns with
 * replacement from the historical series and accumulates them from the
 * initial capital with the same rule as the equity curve.
 *
 * A generator is created per call from `seed` (or a fresh one, echoed in the
 * result), so identical inputs and seed reproduce the result exactly.
 */
export function runBootstrapSimulation(
  returns: readonly number[],
  configInput: SimulationConfigInput,
): SimulationResult {
  const config = parseConfig(
    SimulationConfigSchema,
    configInput,
    "simulation config",
  );
  if (returns.length === 0) {
    throw new InvalidInputError("Cannot resample an empty return series");
  }
  if (!allFinite(returns)) {
    throw new InvalidInputError("Return series contains non-finite values");
  }

  const { paths, pathLength, initialCapital, mode, targetMultiple } = config;
  const random = createSeededRandom(config.seed ?? randomSeed());
  const source = Float64Array.from(returns);

  // row-major: equity of path p after t draws lives at t * paths + p
  const grid = new Float64Array((pathLength + 1) * paths);
  const terminal = new Float64Array(paths);
  const drawdowns = new Float64Array(paths);

  for (let path = 0; path < paths; path += 1) {
    let equity = initialCapital;
    let peak = initialCapital;
    let deepest = 0;
    grid[path] = equity;

    for (let step = 1; step <= pathLength; step += 1) {
      const draw = source[random.nextIndex(source.length)] ?? 0;
      equity = accumulate(equity, draw, initialCapital, mode);
      grid[step * paths + path] = equity;

      peak = Math.max(peak, equity);
      if (peak > 0) deepest = Math.min(deepest, (equity - peak) / peak);
    }

    terminal[path] = equity;
    drawdowns[path] = deepest;
  }

  const terminalValues = Array.from(terminal);
  const sortedTerminal = terminal.slice().sort();
  const sortedDrawdowns = drawdowns.slice().sort();

  const bands: PercentileBand[] = config.percentiles.map((percentile) => ({
    percentile,
    values: [],
  }));
  for (let step = 0; step <= pathLength; step += 1) {
    const column = grid.subarray(step * paths, (step + 1) * paths).sort();
    for (const band of bands) {
      band.values.push(quantileSorted(column, band.percentile / 100));
    }
  }

  const target = initialCapital * targetMultiple;
  let ruined = 0;
  let reached = 0;
  let total = 0;
  for (const value of terminalValues) {
    if (value < initialCapital) ruined += 1;
    if (value >= target) reached += 1;
    total += value;
  }

  return {
    seed: random.seed,
    paths,
    pathLength,
    initialCapital,
    mode,
    terminalValues,
    bands,
    terminalPercentiles: config.percentiles.map((percentile) => ({
      percentile,
      value: quantileSorted(sortedTerminal, percentile / 100),
    })),
    meanTerminal: total / paths,
    probabilityOfRuin: ruined / paths,
    probabilityOfTarget: reached / paths,
    targetMultiple,
    maxDrawdownPercentiles: config.percentiles.map((percentile) => ({
      percentile,
      value: quantileSorted(sortedDrawdowns, percentile / 100),
    })),
  };
}

/** Runs the projection on a trade table's per-trade return series. */
export function simulateTrades(
  trades: readonly Trade[],
  configInput: SimulationConfigInput,
): SimulationResult {
  return runBootstrapSimulation(
    tradeReturns(trades, configInput.initialCapital),
    configInput,
  );
}
