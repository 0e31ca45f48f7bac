import {
  tableLabel,
  type Logger,
  type Trade,
} from "@tradestat/trade-contracts";
import { normalizeTradeRows } from "./normalize";
import { parseTradeTable } from "./parse";
import { tableFormat } from "./tables";

export function readTradeTable(
  table: string,
  content: string,
  logger: Logger,
): Trade[] {
  const rows = parseTradeTable(content, tableFormat(table) ?? "csv");
  const { trades, rejected } = normalizeTradeRows(rows, {
    symbol: tableLabel(table),
  });

  if (rejected.length > 0) {
    logger.warn("Skipped invalid trade rows", {
      table,
      rejected: rejected.length,
      firstIssues: rejected[0]?.issues,
    });
  }

  return trades;
}
