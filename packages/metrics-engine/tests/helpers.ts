import type { Trade } from "@tradestat/trade-contracts";

export const DAY = 24 * 60 * 60_000;
export const T0 = Date.UTC(2024, 0, 1);

export function trade(
  exitTime: number,
  profitLoss: number,
  overrides: Partial<Trade> = {},
): Trade {
  return {
    exitTime,
    symbol: "ESZ4",
    entryPrice: 4500,
    exitPrice: 4510,
    size: 1,
    profitLoss,
    ...overrides,
  };
}

export function dailyTrades(pnl: number[], start = T0): Trade[] {
  return pnl.map((value, index) => trade(start + index * DAY, value));
}
