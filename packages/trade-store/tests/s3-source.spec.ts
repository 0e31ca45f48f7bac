import { S3Client } from "@aws-sdk/client-s3";
import { TableNotFoundError, silentLogger } from "@tradestat/trade-contracts";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { S3TradeSource } from "../src/s3-source";
import { pairedExportCsv } from "./fixtures";

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

vi.mock("@aws-sdk/client-s3", () => ({
  S3Client: class {
    send = send;
  },
  ListObjectsV2Command: class {
    readonly kind = "list";
    constructor(readonly input: Record<string, unknown>) {}
  },
  GetObjectCommand: class {
    readonly kind = "get";
    constructor(readonly input: Record<string, unknown>) {}
  },
}));

interface SentCommand {
  kind: "list" | "get";
  input: Record<string, unknown>;
}

function listing(keys: string[], nextToken?: string) {
  return {
    Contents: keys.map((Key) => ({ Key })),
    IsTruncated: nextToken !== undefined,
    NextContinuationToken: nextToken,
  };
}

function createSource(): S3TradeSource {
  return new S3TradeSource({
    bucket: "trade-exports",
    prefix: "exports/",
    client: new S3Client({}),
    logger: silentLogger,
  });
}

describe("S3TradeSource", () => {
  beforeEach(() => {
    send.mockReset();
  });

  it("lists eligible tables across pages", async () => {
    send
      .mockResolvedValueOnce(
        listing(
          ["exports/alpha.csv", "exports/MASTER.csv", "exports/old/x.csv"],
          "page-2",
        ),
      )
      .mockResolvedValueOnce(
        listing(["exports/beta.json", "exports/~lock.csv", "exports/a.txt"]),
      );

    const tables = await createSource().listTables();

    expect(tables).toEqual(["alpha.csv", "beta.json"]);
    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[1]?.[0]).toMatchObject({
      kind: "list",
      input: {
        Bucket: "trade-exports",
        Prefix: "exports/",
        ContinuationToken: "page-2",
      },
    });
  });

  it("reads a table object and normalizes its rows", async () => {
    send.mockImplementation(async (command: SentCommand) => {
      if (command.kind === "list") return listing(["exports/alpha.csv"]);
      return { Body: { transformToString: async () => pairedExportCsv } };
    });

    const trades = await createSource().fetch("alpha");

    expect(trades.map((trade) => trade.profitLoss)).toEqual([1225, -500]);
    expect(send).toHaveBeenLastCalledWith(
      expect.objectContaining({
        kind: "get",
        input: { Bucket: "trade-exports", Key: "exports/alpha.csv" },
      }),
    );
  });

  it("maps a missing object to TableNotFoundError", async () => {
    send.mockImplementation(async (command: SentCommand) => {
      if (command.kind === "list") return listing(["exports/alpha.csv"]);
      throw Object.assign(new Error("The specified key does not exist."), {
        name: "NoSuchKey",
      });
    });

    await expect(createSource().fetch("alpha.csv")).rejects.toBeInstanceOf(
      TableNotFoundError,
    );
  });

  it("does not read tables it does not list", async () => {
    send.mockResolvedValue(listing(["exports/alpha.csv"]));

    await expect(createSource().fetch("gamma")).rejects.toBeInstanceOf(
      TableNotFoundError,
    );
    expect(send).toHaveBeenCalledTimes(1);
  });
});
