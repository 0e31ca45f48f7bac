import { z } from "zod";

/**
 * One completed position as handed to the engines.
 *
 * `exitTime` is the close timestamp in epoch milliseconds. Engines sort by
 * this field before computing anything, so callers may pass trades in any
 * order.
 */
export const TradeSchema = z.object({
  exitTime: z.number().int(),
  symbol: z.string().min(1),
  entryPrice: z.number().finite().positive(),
  exitPrice: z.number().finite().positive(),
  size: z.number().finite(),
  profitLoss: z.number().finite(),
  /** Maximum favourable excursion reached while the position was open. */
  runUp: z.number().finite().nonnegative().optional(),
});
export type Trade = z.infer<typeof TradeSchema>;

export const EquityModeSchema = z.enum(["additive", "compounding"]);
export type EquityMode = z.infer<typeof EquityModeSchema>;

export const ReturnBasisSchema = z.enum(["trade", "daily"]);
export type ReturnBasis = z.infer<typeof ReturnBasisSchema>;

export interface EquityPoint {
  time: number;
  equity: number;
}

export interface DrawdownPoint {
  time: number;
  drawdown: number;
}

export function sortByExitTime(trades: readonly Trade[]): Trade[] {
  return [...trades].sort((a, b) => a.exitTime - b.exitTime);
}

/** Table name without its file extension, e.g. `breakout.csv` -> `breakout`. */
export function tableLabel(name: string): string {
  return name.replace(/\.(csv|json|xlsx?)$/i, "");
}
