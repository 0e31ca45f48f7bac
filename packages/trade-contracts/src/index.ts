/**
 * `@tradestat/trade-contracts` holds the shared vocabulary of the engines:
 * trade schema, configuration, metric sentinels, errors and logging.
 */
export * from "./trade";
export * from "./metric";
export * from "./config";
export * from "./errors";
export * from "./logger";
