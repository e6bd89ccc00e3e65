import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RawTable } from "../lib/import/types";
import {
  classifyColumn,
  classifyColumns,
  INDICATOR_CATEGORIES
} from "../lib/profile/classifyColumns";
import { describeColumns, describeTable } from "../lib/profile/describeColumns";
import { partitionTables, requireIndicatorTable } from "../lib/profile/partitionTables";
import { profileTables } from "../lib/profile/profileTables";
import { captureError } from "./helpers";

const tableOf = (name: string, headers: string[], rows: RawTable["rows"] = []): RawTable => ({
  name,
  headers,
  rows
});

describe("column classification", () => {
  it("puts GDP columns in economic-development", () => {
    const { categories, uncategorized } = classifyColumns([
      "year",
      "city",
      "GDP_亿元",
      "数字经济占GDP比重_%"
    ]);
    const economic = categories.find((category) => category.name === "economic-development");

    expect(economic?.matchedColumns).toEqual(["GDP_亿元", "数字经济占GDP比重_%"]);
    expect(uncategorized).toEqual([]);
  });

  it("lets the first matching category win", () => {
    expect(classifyColumn("数据中心GDP贡献")).toBe("data-industry");

    const economicFirst = [INDICATOR_CATEGORIES[1], INDICATOR_CATEGORIES[0]];
    expect(classifyColumn("数据中心GDP贡献", economicFirst)).toBe("economic-development");
  });

  it("covers all four categories and reports unmatched columns", () => {
    const { categories, uncategorized } = classifyColumns([
      "数据产业规模_亿元",
      "专利授权量_件",
      "5G基站数_个",
      "常住人口_万人"
    ]);

    expect(categories.map((category) => [category.name, category.matchedColumns])).toEqual([
      ["data-industry", ["数据产业规模_亿元"]],
      ["economic-development", []],
      ["technology-innovation", ["专利授权量_件"]],
      ["infrastructure", ["5G基站数_个"]]
    ]);
    expect(uncategorized).toEqual(["常住人口_万人"]);
  });

  it("skips only the identity columns, not metrics named after cities", () => {
    const { categories, uncategorized } = classifyColumns([
      "year",
      "city",
      "城市化率_%",
      "城市数字化指数",
      "GDP"
    ]);

    expect(categories[1].matchedColumns).toEqual(["GDP"]);
    expect(uncategorized).toEqual(["城市化率_%", "城市数字化指数"]);
  });

  it("re-derives categories on every call", () => {
    const first = classifyColumns(["GDP"]);
    const second = classifyColumns(["GDP", "patent_count"]);

    expect(first.categories[2].matchedColumns).toEqual([]);
    expect(second.categories[2].matchedColumns).toEqual(["patent_count"]);
    expect(classifyColumns(["GDP"])).toEqual(first);
  });
});

describe("column description", () => {
  it("reports value kind and missing percentage", () => {
    const table = tableOf(
      "t.csv",
      ["year", "city", "gdp"],
      [
        [2020, "上海", 1],
        [2021, "杭州", null],
        [2022, null, "n/a"]
      ]
    );

    expect(describeColumns(table)).toEqual([
      { name: "year", valueKind: "numeric", missingCount: 0, missingPercent: 0, examples: ["2020", "2021", "2022"] },
      { name: "city", valueKind: "text", missingCount: 1, missingPercent: 33.33, examples: ["上海", "杭州"] },
      { name: "gdp", valueKind: "mixed", missingCount: 1, missingPercent: 33.33, examples: ["1", "n/a"] }
    ]);
  });

  it("handles tables without rows", () => {
    const profile = describeTable(tableOf("empty.csv", ["year"]));

    expect(profile).toEqual({
      name: "empty.csv",
      rowCount: 0,
      columnCount: 1,
      columns: [{ name: "year", valueKind: "empty", missingCount: 0, missingPercent: 0, examples: [] }]
    });
  });
});

describe("table partitioning", () => {
  it("separates flow tables from the indicator table", () => {
    const tables = new Map([
      ["notes.csv", tableOf("notes.csv", ["a"])],
      ["indicators.csv", tableOf("indicators.csv", ["year"])],
      ["flow_2019.csv", tableOf("flow_2019.csv", ["year"])],
      ["flow_indicators.csv", tableOf("flow_indicators.csv", ["year"])]
    ]);

    expect(partitionTables(tables)).toEqual({
      flowTables: ["flow_2019.csv", "flow_indicators.csv"],
      indicatorTable: "indicators.csv",
      unrecognized: ["notes.csv"]
    });
  });

  it("fails with MissingPrimaryTable when a stage needs the indicator table", () => {
    const tables = new Map([["flows.csv", tableOf("flows.csv", ["year"])]]);

    expect(captureError(() => requireIndicatorTable(tables))).toMatchObject({
      code: "MissingPrimaryTable"
    });
  });
});

describe("profileTables", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("skips category reporting without an indicator table", () => {
    const tables = new Map([["flows.csv", tableOf("flows.csv", ["year", "volume"], [[2020, 1]])]]);

    const profile = profileTables(tables);

    expect(profile.categories).toBeNull();
    expect(profile.tables.map((table) => table.name)).toEqual(["flows.csv"]);
  });

  it("does not modify the input tables", () => {
    const indicator = tableOf("指标.csv", ["year", "city", "GDP"], [[2023, "上海", 1]]);
    const snapshot = JSON.stringify(indicator);

    const profile = profileTables(new Map([["指标.csv", indicator]]));

    expect(JSON.stringify(indicator)).toBe(snapshot);
    expect(profile.partition.indicatorTable).toBe("指标.csv");
    expect(profile.categories?.[1].matchedColumns).toEqual(["GDP"]);
  });
});
