import type { Trade } from "@tradestat/trade-contracts";

/**
 * Where trade tables live. Implementations list the eligible tables and load
 * one of them as validated trades, throwing `TableNotFoundError` for names
 * they do not hold.
 */
export interface TradeSource {
  listTables(): Promise<string[]>;
  fetch(table: string): Promise<Trade[]>;
}

export type TableFormat = "csv" | "json";

export type TradeRow = Record<string, unknown>;
