import type { RawTable } from "../import/types";
import type { SchemaProfile } from "../../types/profile";
import { classifyColumns, INDICATOR_CATEGORIES, type CategoryKeywords } from "./classifyColumns";
import { describeTable } from "./describeColumns";
import { partitionTables } from "./partitionTables";

/**
 * Describes every loaded table and classifies the indicator table's columns.
 * Nothing is cached between calls.
 */
export const profileTables = (
  tables: ReadonlyMap<string, RawTable>,
  categories: readonly CategoryKeywords[] = INDICATOR_CATEGORIES
): SchemaProfile => {
  const partition = partitionTables(tables);
  const tableProfiles = [...tables.keys()].sort().flatMap((name) => {
    const table = tables.get(name);
    return table ? [describeTable(table)] : [];
  });

  const indicator = partition.indicatorTable ? tables.get(partition.indicatorTable) : undefined;
  if (!indicator) {
    console.warn("[profiler] no indicator table; skipping category report", {
      tables: [...tables.keys()]
    });
    return { partition, tables: tableProfiles, categories: null, uncategorizedColumns: [] };
  }

  const classification = classifyColumns(indicator.headers, categories);
  console.info("[profiler] classified indicator columns", {
    table: indicator.name,
    categorized: classification.categories.reduce(
      (sum, category) => sum + category.matchedColumns.length,
      0
    ),
    uncategorized: classification.uncategorized.length
  });

  return {
    partition,
    tables: tableProfiles,
    categories: classification.categories,
    uncategorizedColumns: classification.uncategorized
  };
};
