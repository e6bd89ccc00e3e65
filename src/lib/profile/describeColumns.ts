import type { CellValue, RawTable } from "../import/types";
import type { ColumnProfile, ColumnValueKind, TableProfile } from "../../types/profile";

const MAX_EXAMPLES = 5;
const MAX_EXAMPLE_LENGTH = 40;

const isAbsent = (value: CellValue): boolean => {
  if (value === null) {
    return true;
  }
  if (typeof value === "number") {
    return Number.isNaN(value);
  }
  return value.trim().length === 0;
};

const toExample = (value: string | number): string =>
  typeof value === "number" ? value.toString() : value.trim().slice(0, MAX_EXAMPLE_LENGTH);

export const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

export const missingPercent = (missingCount: number, rowCount: number): number =>
  rowCount === 0 ? 0 : roundTo2((missingCount / rowCount) * 100);

export const detectValueKind = (values: readonly CellValue[]): ColumnValueKind => {
  let numericCount = 0;
  let textCount = 0;

  values.forEach((value) => {
    if (value === null || isAbsent(value)) {
      return;
    }
    if (typeof value === "number") {
      numericCount += 1;
    } else {
      textCount += 1;
    }
  });

  if (numericCount > 0 && textCount > 0) {
    return "mixed";
  }
  if (numericCount > 0) {
    return "numeric";
  }
  return textCount > 0 ? "text" : "empty";
};

export const describeColumns = (table: RawTable): ColumnProfile[] =>
  table.headers.map((name, index) => {
    const values = table.rows.map((row) => row[index] ?? null);
    let missingCount = 0;
    const examples: string[] = [];

    values.forEach((value) => {
      if (value === null || isAbsent(value)) {
        missingCount += 1;
        return;
      }
      const example = toExample(value);
      if (examples.length < MAX_EXAMPLES && !examples.includes(example)) {
        examples.push(example);
      }
    });

    return {
      name,
      valueKind: detectValueKind(values),
      missingCount,
      missingPercent: missingPercent(missingCount, table.rows.length),
      examples
    };
  });

export const describeTable = (table: RawTable): TableProfile => ({
  name: table.name,
  rowCount: table.rows.length,
  columnCount: table.headers.length,
  columns: describeColumns(table)
});
