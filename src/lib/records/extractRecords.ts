import { z } from "zod";
import { AnalysisError } from "../errors/analysisError";
import { findColumnIndex, type ColumnRole } from "../import/columns";
import type { CellValue, RawTable } from "../import/types";
import { detectValueKind } from "../profile/describeColumns";
import type { FlowRecord, IndicatorRecord } from "../../types/analysis";

const flowRowSchema = z.object({
  year: z.number().int(),
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  volume: z.number().finite()
});

const indicatorRowSchema = z.object({
  year: z.number().int(),
  city: z.string().trim().min(1)
});

export type Extraction<T> = {
  records: T[];
  droppedRows: number;
};

const requireColumn = (table: RawTable, role: ColumnRole): number => {
  const index = findColumnIndex(table.headers, role);
  if (index === -1) {
    throw new AnalysisError(
      "MissingField",
      `Table "${table.name}" has no ${role} column.`,
      `Columns: ${table.headers.join(", ")}`
    );
  }
  return index;
};

const cellAt = (row: readonly CellValue[], index: number): CellValue => row[index] ?? null;

export const extractFlowRecords = (table: RawTable): Extraction<FlowRecord> => {
  const yearIndex = requireColumn(table, "year");
  const originIndex = requireColumn(table, "origin");
  const destinationIndex = requireColumn(table, "destination");
  const volumeIndex = requireColumn(table, "volume");

  const records: FlowRecord[] = [];
  let droppedRows = 0;
  table.rows.forEach((row) => {
    const parsed = flowRowSchema.safeParse({
      year: cellAt(row, yearIndex),
      origin: cellAt(row, originIndex),
      destination: cellAt(row, destinationIndex),
      volume: cellAt(row, volumeIndex)
    });
    if (!parsed.success) {
      droppedRows += 1;
      return;
    }
    records.push({ ...parsed.data, source: table.name });
  });

  if (droppedRows > 0) {
    console.warn("[analytics] dropped invalid flow rows", { table: table.name, droppedRows });
  }
  return { records, droppedRows };
};

export const extractAllFlowRecords = (tables: readonly RawTable[]): Extraction<FlowRecord> =>
  tables.reduce<Extraction<FlowRecord>>(
    (accumulator, table) => {
      const extraction = extractFlowRecords(table);
      return {
        records: [...accumulator.records, ...extraction.records],
        droppedRows: accumulator.droppedRows + extraction.droppedRows
      };
    },
    { records: [], droppedRows: 0 }
  );

/** Numeric columns other than the year and city fields. */
export const indicatorMetricColumns = (table: RawTable): string[] => {
  const yearIndex = findColumnIndex(table.headers, "year");
  const cityIndex = findColumnIndex(table.headers, "city");
  return table.headers.filter((_, index) => {
    if (index === yearIndex || index === cityIndex) {
      return false;
    }
    return detectValueKind(table.rows.map((row) => cellAt(row, index))) === "numeric";
  });
};

export const extractIndicatorRecords = (table: RawTable): Extraction<IndicatorRecord> => {
  const yearIndex = requireColumn(table, "year");
  const cityIndex = requireColumn(table, "city");
  const metricColumns = indicatorMetricColumns(table).map((name) => ({
    name,
    index: table.headers.indexOf(name)
  }));

  const records: IndicatorRecord[] = [];
  let droppedRows = 0;
  table.rows.forEach((row) => {
    const parsed = indicatorRowSchema.safeParse({
      year: cellAt(row, yearIndex),
      city: cellAt(row, cityIndex)
    });
    if (!parsed.success) {
      droppedRows += 1;
      return;
    }
    const metrics: Record<string, number> = {};
    metricColumns.forEach(({ name, index }) => {
      const value = cellAt(row, index);
      if (typeof value === "number" && Number.isFinite(value)) {
        metrics[name] = value;
      }
    });
    records.push({ ...parsed.data, metrics });
  });

  if (droppedRows > 0) {
    console.warn("[analytics] dropped invalid indicator rows", { table: table.name, droppedRows });
  }
  return { records, droppedRows };
};
