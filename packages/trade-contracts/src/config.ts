import { z } from "zod";
import { InvalidInputError } from "./errors";
import { EquityModeSchema, ReturnBasisSchema } from "./trade";

export const MetricsConfigSchema = z.object({
  initialCapital: z.number().finite().positive(),
  /** Annual risk-free rate as a decimal, e.g. 0.04 for 4 %. */
  riskFreeRate: z.number().finite().default(0),
  periodsPerYear: z.number().int().positive().default(252),
  mode: EquityModeSchema.default("additive"),
  returnBasis: ReturnBasisSchema.default("trade"),
});
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type MetricsConfigInput = z.input<typeof MetricsConfigSchema>;

/** Upper bound on `paths * (pathLength + 1)` equity cells held in memory. */
export const MAX_SIMULATION_CELLS = 10_000_000;

export const SimulationConfigSchema = z
  .object({
    paths: z.number().int().min(1).default(1000),
    pathLength: z.number().int().min(1),
    initialCapital: z.number().finite().positive(),
    mode: EquityModeSchema.default("additive"),
    /** Unsigned 32-bit generator seed. */
    seed: z
      .number()
      .int()
      .min(0)
      .max(2 ** 32 - 1)
      .optional(),
    percentiles: z
      .array(z.number().min(0).max(100))
      .min(1)
      .default([5, 50, 95]),
    targetMultiple: z.number().finite().positive().default(2),
  })
  .refine(
    (config) => config.paths * (config.pathLength + 1) <= MAX_SIMULATION_CELLS,
    {
      message: `paths * (pathLength + 1) must not exceed ${MAX_SIMULATION_CELLS}`,
      path: ["paths"],
    },
  );
export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

/**
 * Parses configuration at an engine boundary. Schema failures surface as
 * `InvalidInputError` carrying the offending paths.
 */
export function parseConfig<TOutput>(
  schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
  raw: unknown,
  label: string,
): TOutput {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new InvalidInputError(`Invalid ${label}: ${issues.join("; ")}`, {
      issues,
    });
  }
  return result.data;
}
