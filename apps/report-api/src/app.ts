import {
  analyzeRunUps,
  analyzeTrades,
  applySlippage,
  breakdownLosses,
  buildLeaderboard,
  buildMonthlyMatrix,
  buildSeasonality,
  rollingSortino,
  simulateYearlyCompounding,
  type StrategyTrades,
} from "@tradestat/metrics-engine";
import { simulateTrades } from "@tradestat/simulation-engine";
import {
  InvalidInputError,
  TableNotFoundError,
  consoleLogger,
  parseConfig,
  type Logger,
  type MetricsConfigInput,
  type Trade,
} from "@tradestat/trade-contracts";
import type { TradeSource } from "@tradestat/trade-store";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { z } from "zod";
import {
  AnalysisQuerySchema,
  LeaderboardQuerySchema,
  MetricsQuerySchema,
  SimulationQuerySchema,
  type MetricsQuery,
} from "./query";
import type { RuntimeSettings } from "./runtime-settings";

export type ReportDefaults = Pick<
  RuntimeSettings,
  | "corsOrigin"
  | "defaultInitialCapital"
  | "defaultRiskFreeRate"
  | "defaultPeriodsPerYear"
  | "defaultSimulationPaths"
>;

export interface ReportAppOptions {
  source: TradeSource;
  settings: ReportDefaults;
  logger?: Logger;
}

function readQuery<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: Record<string, string>,
): T {
  return parseConfig(schema, raw, "query");
}

export function createReportApp({
  source,
  settings,
  logger = consoleLogger,
}: ReportAppOptions) {
  const metricsConfig = (query: MetricsQuery): MetricsConfigInput => ({
    initialCapital: query.initialCapital ?? settings.defaultInitialCapital,
    riskFreeRate: query.riskFreeRate ?? settings.defaultRiskFreeRate,
    periodsPerYear: query.periodsPerYear ?? settings.defaultPeriodsPerYear,
    mode: query.mode,
    returnBasis: query.basis,
  });

  const loadTrades = async (
    table: string,
    slippage = 0,
  ): Promise<Trade[]> => applySlippage(await source.fetch(table), slippage);

  return new Hono()
    .use("*", cors({ origin: settings.corsOrigin, allowMethods: ["GET"] }))

    .onError((error, c) => {
      if (error instanceof InvalidInputError) {
        return c.json(
          {
            error: error.code,
            message: error.message,
            details: error.details ?? null,
          },
          400,
        );
      }
      if (error instanceof TableNotFoundError) {
        return c.json({ error: error.code, message: error.message }, 404);
      }

      logger.error("Report request failed", {
        path: c.req.path,
        error: error.message,
      });
      return c.json(
        { error: "internal", message: "Internal server error" },
        500,
      );
    })

    .get("/health", (c) => c.json({ status: "ok" }))

    .get("/tables", async (c) => {
      const tables = await source.listTables();
      return c.json({ tables });
    })

    // Equity curve, drawdown series and summary for one table
    .get("/tables/:name/metrics", async (c) => {
      const table = c.req.param("name");
      const query = readQuery(MetricsQuerySchema, c.req.query());
      const trades = await loadTrades(table, query.slippage);

      const { config, equityCurve, drawdown, summary } = analyzeTrades(
        trades,
        metricsConfig(query),
      );
      return c.json({ table, config, equityCurve, drawdown, summary });
    })

    .get("/tables/:name/analysis", async (c) => {
      const table = c.req.param("name");
      const query = readQuery(AnalysisQuerySchema, c.req.query());
      const trades = await loadTrades(table, query.slippage);

      const { config, summary } = analyzeTrades(trades, metricsConfig(query));
      return c.json({
        table,
        maxDrawdownDurationDays: summary.maxDrawdownDurationDays,
        rollingSortino: rollingSortino(trades, {
          windowDays: query.windowDays,
          periodsPerYear: config.periodsPerYear,
        }),
        monthlyMatrix: buildMonthlyMatrix(trades, config.initialCapital),
        lossBreakdown: breakdownLosses(trades),
        runUps: analyzeRunUps(trades),
        seasonality: buildSeasonality(trades),
        yearlyCompounding: simulateYearlyCompounding(trades, {
          initialCapital: config.initialCapital,
          mode: query.compoundingMode,
          taxRate: query.taxRate,
        }),
      });
    })

    .get("/tables/:name/simulation", async (c) => {
      const table = c.req.param("name");
      const query = readQuery(SimulationQuerySchema, c.req.query());
      const trades = await loadTrades(table, query.slippage);

      const result = simulateTrades(trades, {
        paths: query.paths ?? settings.defaultSimulationPaths,
        pathLength: query.pathLength ?? trades.length,
        initialCapital: query.initialCapital ?? settings.defaultInitialCapital,
        mode: query.mode,
        seed: query.seed,
        percentiles: query.percentiles,
        targetMultiple: query.targetMultiple,
      });
      return c.json({ table, ...result });
    })

    // Every readable table over an optional exit-time window
    .get("/leaderboard", async (c) => {
      const query = readQuery(LeaderboardQuerySchema, c.req.query());
      const strategies: StrategyTrades[] = [];

      for (const table of await source.listTables()) {
        try {
          strategies.push({ name: table, trades: await source.fetch(table) });
        } catch (error) {
          if (!(error instanceof InvalidInputError)) throw error;
          logger.warn("Skipping unreadable trade table", {
            table,
            message: error.message,
          });
        }
      }

      const entries = buildLeaderboard(strategies, {
        ...metricsConfig(query),
        fromMs: query.from,
        toMs: query.to,
        slippage: query.slippage,
      });
      return c.json({
        from: query.from ?? null,
        to: query.to ?? null,
        entries,
      });
    });
}

export type ReportApp = ReturnType<typeof createReportApp>;
