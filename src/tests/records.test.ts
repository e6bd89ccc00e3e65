import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { recognizeColumn } from "../lib/import/columns";
import type { RawTable } from "../lib/import/types";
import {
  extractFlowRecords,
  extractIndicatorRecords,
  indicatorMetricColumns
} from "../lib/records/extractRecords";
import { logicalDatasetName, selectFlowRecords } from "../lib/records/logicalDataset";
import type { FlowRecord } from "../types/analysis";
import { captureError } from "./helpers";

const flowTable = (name: string): RawTable => ({
  name,
  headers: ["year", "origin", "destination", "volume"],
  rows: []
});

const flow = (source: string, year: number, volume: number): FlowRecord => ({
  year,
  origin: "上海",
  destination: "杭州",
  volume,
  source
});

describe("column recognition", () => {
  it("maps headers onto roles", () => {
    expect(recognizeColumn("年份")).toBe("year");
    expect(recognizeColumn("流出城市")).toBe("origin");
    expect(recognizeColumn("to_city")).toBe("destination");
    expect(recognizeColumn("数据流量_TB")).toBe("volume");
    expect(recognizeColumn("城市")).toBe("city");
    expect(recognizeColumn("地区")).toBe("city");
    expect(recognizeColumn("地区生产总值_亿元")).toBeNull();
    expect(recognizeColumn("total")).toBeNull();
  });

  it("recognizes 年 and 年度 as year headers", () => {
    expect(recognizeColumn("年")).toBe("year");
    expect(recognizeColumn("年度")).toBe("year");
    expect(recognizeColumn("统计年度")).toBe("year");
    expect(recognizeColumn("年均增速_%")).toBeNull();
  });
});

describe("record extraction", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("extracts flow records, keeps duplicates and drops invalid rows", () => {
    const table: RawTable = {
      ...flowTable("flows.csv"),
      rows: [
        [2019, "A", "B", 100],
        [2019, "A", "B", 50],
        ["x", "A", "B", 1],
        [2020, "A", null, 5],
        [2020.5, "A", "B", 1]
      ]
    };

    const { records, droppedRows } = extractFlowRecords(table);

    expect(records).toEqual([
      { year: 2019, origin: "A", destination: "B", volume: 100, source: "flows.csv" },
      { year: 2019, origin: "A", destination: "B", volume: 50, source: "flows.csv" }
    ]);
    expect(droppedRows).toBe(3);
  });

  it("reads the year from a 年度 column", () => {
    const table: RawTable = {
      name: "flows.csv",
      headers: ["年度", "流出城市", "流入城市", "数据流量_TB"],
      rows: [[2022, "上海", "杭州", 12]]
    };

    expect(extractFlowRecords(table).records).toEqual([
      { year: 2022, origin: "上海", destination: "杭州", volume: 12, source: "flows.csv" }
    ]);
  });

  it("fails with MissingField when a flow column is absent", () => {
    const table: RawTable = { name: "flows.csv", headers: ["year", "from", "volume"], rows: [] };

    expect(captureError(() => extractFlowRecords(table))).toMatchObject({ code: "MissingField" });
  });

  it("discovers numeric indicator columns and extracts records", () => {
    const table: RawTable = {
      name: "indicators.csv",
      headers: ["year", "city", "GDP", "note"],
      rows: [
        [2023, "上海", 10, "x"],
        [2023, "杭州", null, "y"],
        [null, "合肥", 3, "z"]
      ]
    };

    expect(indicatorMetricColumns(table)).toEqual(["GDP"]);
    expect(extractIndicatorRecords(table)).toEqual({
      records: [
        { year: 2023, city: "上海", metrics: { GDP: 10 } },
        { year: 2023, city: "杭州", metrics: {} }
      ],
      droppedRows: 1
    });
  });

  it("fails with MissingField when the indicator table has no city column", () => {
    const table: RawTable = { name: "indicators.csv", headers: ["year", "GDP"], rows: [] };

    expect(captureError(() => extractIndicatorRecords(table))).toMatchObject({
      code: "MissingField"
    });
  });
});

describe("per-year flow variants", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("strips a trailing year from the file name", () => {
    expect(logicalDatasetName("城市间数据流动矩阵_2023.csv")).toBe("城市间数据流动矩阵");
    expect(logicalDatasetName("flows-2019.xlsx")).toBe("flows");
    expect(logicalDatasetName("flows.csv")).toBe("flows");
    expect(logicalDatasetName("2019.csv")).toBe("2019");
  });

  it("takes covered years from the combined file and the rest from per-year files", () => {
    const selected = selectFlowRecords([
      flow("flows.csv", 2019, 100),
      flow("flows.csv", 2020, 200),
      flow("flows_2020.csv", 2020, 200),
      flow("flows_2021.csv", 2021, 300),
      flow("other_2019.csv", 2019, 10),
      flow("other_2020.csv", 2020, 20)
    ]);

    expect(selected.map((record) => `${record.source}:${record.year}`)).toEqual([
      "flows.csv:2019",
      "flows.csv:2020",
      "flows_2021.csv:2021",
      "other_2019.csv:2019",
      "other_2020.csv:2020"
    ]);
    expect(console.info).toHaveBeenCalledWith(
      "[analytics] skipped per-year rows covered by a combined flow file",
      { skipped: { "flows_2020.csv": 1 } }
    );
  });

  it("keeps every record when no combined file exists", () => {
    const records = [flow("flows_2019.csv", 2019, 1), flow("flows_2020.csv", 2020, 2)];

    expect(selectFlowRecords(records)).toEqual(records);
    expect(console.info).not.toHaveBeenCalled();
  });
});
