import {
  InvalidInputError,
  consoleLogger,
  type Logger,
} from "@tradestat/trade-contracts";
import { LocalTradeSource } from "./local-source";
import { S3TradeSource } from "./s3-source";
import type { TradeSource } from "./types";

export type DataMode = "LOCAL" | "S3";

export interface TradeSourceSettings {
  dataMode: DataMode;
  tradesDir: string;
  tradesBucket?: string;
  tradesPrefix?: string;
}

export function createTradeSource(
  settings: TradeSourceSettings,
  logger: Logger = consoleLogger,
): TradeSource {
  if (settings.dataMode === "LOCAL") {
    return new LocalTradeSource(settings.tradesDir, logger);
  }

  if (!settings.tradesBucket) {
    throw new InvalidInputError("S3 data mode requires a trades bucket");
  }

  return new S3TradeSource({
    bucket: settings.tradesBucket,
    prefix: settings.tradesPrefix,
    logger,
  });
}
