export type ColumnValueKind = "numeric" | "text" | "mixed" | "empty";

export type ColumnProfile = {
  name: string;
  valueKind: ColumnValueKind;
  missingCount: number;
  /** Absent values over row count, as a percentage rounded to two decimals. */
  missingPercent: number;
  examples: string[];
};

export type TableProfile = {
  name: string;
  rowCount: number;
  columnCount: number;
  columns: ColumnProfile[];
};

export type IndicatorCategoryName =
  | "data-industry"
  | "economic-development"
  | "technology-innovation"
  | "infrastructure";

export type IndicatorCategory = {
  name: IndicatorCategoryName;
  keywords: readonly string[];
  matchedColumns: string[];
};

export type TablePartition = {
  flowTables: string[];
  indicatorTable: string | null;
  unrecognized: string[];
};

export type SchemaProfile = {
  partition: TablePartition;
  tables: TableProfile[];
  categories: IndicatorCategory[] | null;
  uncategorizedColumns: string[];
};
