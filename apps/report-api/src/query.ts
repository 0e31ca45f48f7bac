import { EquityModeSchema, ReturnBasisSchema } from "@tradestat/trade-contracts";
import { z } from "zod";

const optionalNumber = z.coerce.number().optional();
const optionalInt = z.coerce.number().int().optional();

const timestamp = z.string().transform((value, ctx) => {
  const time = /^\d+$/.test(value) ? Number(value) : Date.parse(value);
  if (Number.isNaN(time)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Expected an ISO date or epoch milliseconds",
    });
    return z.NEVER;
  }
  return time;
});

const CapitalQuerySchema = z.object({
  initialCapital: optionalNumber,
  mode: EquityModeSchema.optional(),
  slippage: optionalNumber,
});

export const MetricsQuerySchema = CapitalQuerySchema.extend({
  riskFreeRate: optionalNumber,
  periodsPerYear: optionalInt,
  basis: ReturnBasisSchema.optional(),
});
export type MetricsQuery = z.infer<typeof MetricsQuerySchema>;

export const AnalysisQuerySchema = MetricsQuerySchema.extend({
  windowDays: optionalInt,
  compoundingMode: z.enum(["linear", "proportional"]).optional(),
  taxRate: optionalNumber,
});

/** Rejects ratio parameters the resampler has no use for. */
export const SimulationQuerySchema = CapitalQuerySchema.extend({
  paths: optionalInt,
  pathLength: optionalInt,
  seed: optionalInt,
  targetMultiple: optionalNumber,
  /** Comma separated, e.g. `5,50,95`. */
  percentiles: z
    .string()
    .transform((value) => value.split(",").map((part) => Number(part.trim())))
    .optional(),
}).strict();

export const LeaderboardQuerySchema = MetricsQuerySchema.extend({
  from: timestamp.optional(),
  to: timestamp.optional(),
}).refine(
  (query) =>
    query.from === undefined || query.to === undefined || query.from <= query.to,
  { message: "from must not be after to", path: ["from"] },
);
