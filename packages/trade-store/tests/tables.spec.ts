import { TableNotFoundError } from "@tradestat/trade-contracts";
import { describe, expect, it } from "vitest";
import {
  isEligibleTableName,
  resolveTableName,
  tableFormat,
} from "../src/tables";

describe("table names", () => {
  it("skips lock files, derived workbooks and unsupported formats", () => {
    expect(isEligibleTableName("alpha.csv")).toBe(true);
    expect(isEligibleTableName("beta.JSON")).toBe(true);
    expect(isEligibleTableName("~$alpha.csv")).toBe(false);
    expect(isEligibleTableName("MASTER summary.csv")).toBe(false);
    expect(isEligibleTableName("alpha Heatmap.json")).toBe(false);
    expect(isEligibleTableName("alpha.xlsx")).toBe(false);
  });

  it("detects the format from the extension", () => {
    expect(tableFormat("a.csv")).toBe("csv");
    expect(tableFormat("a.json")).toBe("json");
    expect(tableFormat("a.txt")).toBeUndefined();
  });

  it("resolves a table by full name or label", () => {
    const tables = ["alpha.csv", "beta.json"];

    expect(resolveTableName(tables, "beta.json")).toBe("beta.json");
    expect(resolveTableName(tables, "alpha")).toBe("alpha.csv");
    expect(() => resolveTableName(tables, "gamma")).toThrow(
      TableNotFoundError,
    );
  });
});
