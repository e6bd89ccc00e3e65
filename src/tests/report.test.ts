import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RawTable } from "../lib/import/types";
import { profileTables } from "../lib/profile/profileTables";
import { formatAnalysisReport, formatProfileReport } from "../lib/report/formatReport";
import type { AnalysisResult } from "../types/analysis";

describe("report formatting", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats the profile with skipped files and categories", () => {
    const indicator: RawTable = {
      name: "指标.csv",
      headers: ["year", "city", "GDP"],
      rows: [[2023, "上海", 1]]
    };
    const profile = profileTables(new Map([["指标.csv", indicator]]));

    expect(
      formatProfileReport(profile, [{ code: "FileParseFailure", file: "bad.csv", message: "oops" }])
    ).toEqual([
      "=== Data profile ===",
      "Flow tables (0): (none)",
      "Indicator table: 指标.csv",
      "Skipped bad.csv: oops",
      "-- 指标.csv: 1 rows x 3 columns",
      "   year    numeric  missing 0.00%",
      "   city    text     missing 0.00%",
      "   GDP     numeric  missing 0.00%",
      "Indicator categories:",
      "   data-industry: (none)",
      "   economic-development: GDP",
      "   technology-innovation: (none)",
      "   infrastructure: (none)",
      "Uncategorized: (none)"
    ]);
  });

  it("formats the analysis narrative", () => {
    const result: AnalysisResult = {
      yearlyTotals: [
        { year: 2019, total: 100 },
        { year: 2023, total: 300 }
      ],
      growthRate: 200,
      latestFlowYear: 2023,
      topPairs: [{ origin: "A", destination: "B", volume: 300, label: "A→B" }],
      latestIndicatorYear: 2023,
      filteredIndicators: {
        year: 2023,
        fields: ["GDP"],
        sortBy: "GDP",
        rows: [
          { year: 2023, city: "上海", values: { GDP: 47219.5 } },
          { year: 2023, city: "杭州", values: { GDP: null } }
        ]
      },
      crossSectionExtract: {
        year: 2023,
        xField: "GDP",
        yField: "数据",
        points: [{ city: "上海", x: 1, y: 2.5 }]
      },
      warnings: ["w"]
    };

    expect(formatAnalysisReport(result)).toEqual([
      "=== Analysis ===",
      "Yearly data-flow totals:",
      "   2019  100.00",
      "   2023  300.00",
      "Growth 2019-2023: 200.00%",
      "Top 1 flows in 2023:",
      "   1. A→B  300.00",
      "Core cities in 2023 (by GDP):",
      "   上海  GDP=47219.50",
      "   杭州  GDP=-",
      "GDP vs 数据 in 2023:",
      "   上海  1.00  2.50",
      "Warning: w"
    ]);
  });

  it("marks growth as not applicable for a single year", () => {
    const lines = formatAnalysisReport({
      yearlyTotals: [{ year: 2023, total: 5 }],
      growthRate: null,
      latestFlowYear: 2023,
      topPairs: [],
      latestIndicatorYear: 2023,
      filteredIndicators: { year: 2023, fields: ["GDP"], sortBy: "GDP", rows: [] },
      crossSectionExtract: { year: 2023, xField: "GDP", yField: "数据", points: [] },
      warnings: []
    });

    expect(lines[3]).toBe("Growth rate: n/a (single year)");
  });
});
