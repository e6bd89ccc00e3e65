import { AnalysisError } from "../errors/analysisError";
import type { RawTable } from "../import/types";
import type { TablePartition } from "../../types/profile";

export const FLOW_TABLE_PATTERN = /flow|matrix|流动|流量|矩阵/i;
export const INDICATOR_TABLE_PATTERN = /indicator|digital[_\s-]?economy|指标|数字经济/i;

export const isFlowTableName = (name: string): boolean => FLOW_TABLE_PATTERN.test(name);

export const isIndicatorTableName = (name: string): boolean =>
  !isFlowTableName(name) && INDICATOR_TABLE_PATTERN.test(name);

export const partitionTables = (tables: ReadonlyMap<string, RawTable>): TablePartition => {
  const names = [...tables.keys()].sort();
  const flowTables = names.filter(isFlowTableName);
  const indicatorTable = names.find(isIndicatorTableName) ?? null;
  const unrecognized = names.filter(
    (name) => !flowTables.includes(name) && name !== indicatorTable
  );
  return { flowTables, indicatorTable, unrecognized };
};

export const requireIndicatorTable = (
  tables: ReadonlyMap<string, RawTable>,
  partition: TablePartition = partitionTables(tables)
): RawTable => {
  const table = partition.indicatorTable ? tables.get(partition.indicatorTable) : undefined;
  if (!table) {
    throw new AnalysisError(
      "MissingPrimaryTable",
      "No indicator table found. Expected a file name containing \"indicator\", \"指标\" or \"数字经济\"."
    );
  }
  return table;
};

export const collectFlowTables = (
  tables: ReadonlyMap<string, RawTable>,
  partition: TablePartition = partitionTables(tables)
): RawTable[] =>
  partition.flowTables.flatMap((name) => {
    const table = tables.get(name);
    return table ? [table] : [];
  });
