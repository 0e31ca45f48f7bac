import { serve } from "@hono/node-server";
import { consoleLogger } from "@tradestat/trade-contracts";
import { createTradeSource } from "@tradestat/trade-store";
import { createReportApp } from "./app";
import { getRuntimeSettings } from "./runtime-settings";

const settings = getRuntimeSettings();
const app = createReportApp({
  source: createTradeSource(settings, consoleLogger),
  settings,
  logger: consoleLogger,
});

serve({ fetch: app.fetch, port: settings.port }, (info) => {
  consoleLogger.info("Report API listening", {
    port: info.port,
    dataMode: settings.dataMode,
  });
});
