import {
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from "@aws-sdk/client-s3";
import {
  TableNotFoundError,
  consoleLogger,
  type Logger,
  type Trade,
} from "@tradestat/trade-contracts";
import { readTradeTable } from "./load-table";
import { isEligibleTableName, resolveTableName } from "./tables";
import type { TradeSource } from "./types";

export interface S3TradeSourceOptions {
  bucket: string;
  /** Key prefix of the tables, e.g. `exports/`. Table names exclude it. */
  prefix?: string;
  client?: S3Client;
  logger?: Logger;
}

function isMissingObject(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "NoSuchKey" || error.name === "NotFound")
  );
}

export class S3TradeSource implements TradeSource {
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly client: S3Client;
  private readonly logger: Logger;

  constructor(options: S3TradeSourceOptions) {
    this.bucket = options.bucket;
    this.prefix = options.prefix ?? "";
    this.client = options.client ?? new S3Client({});
    this.logger = options.logger ?? consoleLogger;
  }

  async listTables(): Promise<string[]> {
    const tables: string[] = [];
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.prefix || undefined,
          ContinuationToken: continuationToken,
        }),
      );

      for (const object of page.Contents ?? []) {
        const name = object.Key?.slice(this.prefix.length);
        // Nested keys belong to other datasets.
        if (!name || name.includes("/")) continue;
        if (isEligibleTableName(name)) tables.push(name);
      }

      continuationToken = page.IsTruncated
        ? page.NextContinuationToken
        : undefined;
    } while (continuationToken);

    return tables.sort();
  }

  async fetch(table: string): Promise<Trade[]> {
    const name = resolveTableName(await this.listTables(), table);

    let content: string | undefined;
    try {
      const result = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: `${this.prefix}${name}`,
        }),
      );
      content = await result.Body?.transformToString();
    } catch (error) {
      if (isMissingObject(error)) throw new TableNotFoundError(table);
      throw error;
    }

    if (content === undefined) throw new TableNotFoundError(table);
    return readTradeTable(name, content, this.logger);
  }
}
