import type { DataMode, TradeSourceSettings } from "@tradestat/trade-store";

export interface RuntimeSettings extends TradeSourceSettings {
  tradesPrefix: string;
  port: number;
  corsOrigin: string;
  defaultInitialCapital: number;
  /** Annual rate as a fraction, e.g. 0.04. */
  defaultRiskFreeRate: number;
  defaultPeriodsPerYear: number;
  defaultSimulationPaths: number;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  dataMode: "LOCAL" as const,
  tradesDir: "./trades",
  tradesPrefix: "",
  port: 3000,
  corsOrigin: "*",
  defaultInitialCapital: 100_000,
  defaultRiskFreeRate: 0,
  defaultPeriodsPerYear: 252,
  defaultSimulationPaths: 1000,
};

let cachedSettings: RuntimeSettings | null = null;

function readString(envValue: string | undefined, fallback: string): string {
  if (typeof envValue === "string" && envValue.trim().length > 0) {
    return envValue.trim();
  }
  return fallback;
}

function readOptionalString(envValue: string | undefined): string | undefined {
  if (typeof envValue === "string" && envValue.trim().length > 0) {
    return envValue.trim();
  }
  return undefined;
}

function readNumber(envValue: string | undefined, fallback: number): number {
  const parsed = Number(envValue);
  if (envValue?.trim() && Number.isFinite(parsed) && parsed > 0) {
    return parsed;
  }
  return fallback;
}

function readRate(envValue: string | undefined, fallback: number): number {
  const parsed = Number(envValue);
  if (envValue?.trim() && Number.isFinite(parsed)) {
    return parsed;
  }
  return fallback;
}

function readDataMode(envValue: string | undefined): DataMode {
  return envValue?.trim().toUpperCase() === "S3" ? "S3" : DEFAULTS.dataMode;
}

export function readRuntimeSettings(env: Env): RuntimeSettings {
  return {
    dataMode: readDataMode(env.DATA_MODE),
    tradesDir: readString(env.TRADES_DIR, DEFAULTS.tradesDir),
    tradesBucket: readOptionalString(env.TRADES_BUCKET),
    tradesPrefix: readString(env.TRADES_PREFIX, DEFAULTS.tradesPrefix),
    port: Math.trunc(readNumber(env.PORT, DEFAULTS.port)),
    corsOrigin: readString(env.CORS_ORIGIN, DEFAULTS.corsOrigin),
    defaultInitialCapital: readNumber(
      env.DEFAULT_INITIAL_CAPITAL,
      DEFAULTS.defaultInitialCapital,
    ),
    defaultRiskFreeRate: readRate(
      env.DEFAULT_RISK_FREE_RATE,
      DEFAULTS.defaultRiskFreeRate,
    ),
    defaultPeriodsPerYear: Math.trunc(
      readNumber(env.DEFAULT_PERIODS_PER_YEAR, DEFAULTS.defaultPeriodsPerYear),
    ),
    defaultSimulationPaths: Math.trunc(
      readNumber(env.DEFAULT_SIMULATION_PATHS, DEFAULTS.defaultSimulationPaths),
    ),
  };
}

export function getRuntimeSettings(): RuntimeSettings {
  if (cachedSettings) {
    return cachedSettings;
  }

  cachedSettings = readRuntimeSettings(process.env);
  return cachedSettings;
}
