import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import {
  TableNotFoundError,
  consoleLogger,
  type Logger,
  type Trade,
} from "@tradestat/trade-contracts";
import { readTradeTable } from "./load-table";
import { isEligibleTableName, resolveTableName } from "./tables";
import type { TradeSource } from "./types";

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Trade tables stored as files directly under one directory. */
export class LocalTradeSource implements TradeSource {
  constructor(
    private readonly rootDir: string,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async listTables(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.rootDir);
    } catch (error) {
      if (!isMissingPath(error)) throw error;
      this.logger.warn("Trade directory does not exist", {
        rootDir: this.rootDir,
      });
      return [];
    }

    return entries.filter(isEligibleTableName).sort();
  }

  async fetch(table: string): Promise<Trade[]> {
    const name = resolveTableName(await this.listTables(), table);

    let content: string;
    try {
      content = await readFile(path.join(this.rootDir, name), "utf8");
    } catch (error) {
      if (isMissingPath(error)) throw new TableNotFoundError(table);
      throw error;
    }

    return readTradeTable(name, content, this.logger);
  }
}
