import type { FileLoadFailure } from "../import/types";
import type { AnalysisResult } from "../../types/analysis";
import type { SchemaProfile, TableProfile } from "../../types/profile";

const formatNumber = (value: number): string => value.toFixed(2);

const listOrNone = (values: readonly string[]): string =>
  values.length > 0 ? values.join(", ") : "(none)";

const formatTable = (table: TableProfile): string[] => {
  const nameWidth = Math.max(6, ...table.columns.map((column) => column.name.length));
  return [
    `-- ${table.name}: ${table.rowCount} rows x ${table.columnCount} columns`,
    ...table.columns.map(
      (column) =>
        `   ${column.name.padEnd(nameWidth)}  ${column.valueKind.padEnd(7)}  missing ${formatNumber(column.missingPercent)}%`
    )
  ];
};

export const formatProfileReport = (
  profile: SchemaProfile,
  failures: readonly FileLoadFailure[] = []
): string[] => {
  const lines = [
    "=== Data profile ===",
    `Flow tables (${profile.partition.flowTables.length}): ${listOrNone(profile.partition.flowTables)}`,
    `Indicator table: ${profile.partition.indicatorTable ?? "(none)"}`
  ];
  if (profile.partition.unrecognized.length > 0) {
    lines.push(`Other tables: ${listOrNone(profile.partition.unrecognized)}`);
  }
  failures.forEach((failure) => lines.push(`Skipped ${failure.file}: ${failure.message}`));

  profile.tables.forEach((table) => lines.push(...formatTable(table)));

  if (profile.categories) {
    lines.push("Indicator categories:");
    profile.categories.forEach((category) =>
      lines.push(`   ${category.name}: ${listOrNone(category.matchedColumns)}`)
    );
    lines.push(`Uncategorized: ${listOrNone(profile.uncategorizedColumns)}`);
  }
  return lines;
};

export const formatAnalysisReport = (result: AnalysisResult): string[] => {
  const lines = ["=== Analysis ===", "Yearly data-flow totals:"];
  result.yearlyTotals.forEach((entry) => lines.push(`   ${entry.year}  ${formatNumber(entry.total)}`));

  if (result.growthRate === null) {
    lines.push("Growth rate: n/a (single year)");
  } else {
    const first = result.yearlyTotals[0].year;
    const last = result.yearlyTotals[result.yearlyTotals.length - 1].year;
    lines.push(`Growth ${first}-${last}: ${formatNumber(result.growthRate)}%`);
  }

  lines.push(`Top ${result.topPairs.length} flows in ${result.latestFlowYear}:`);
  result.topPairs.forEach((pair, index) =>
    lines.push(`   ${index + 1}. ${pair.label}  ${formatNumber(pair.volume)}`)
  );

  const section = result.filteredIndicators;
  lines.push(`Core cities in ${section.year} (by ${section.sortBy}):`);
  section.rows.forEach((row) => {
    const values = section.fields
      .map((field) => {
        const value = row.values[field];
        return `${field}=${value === null || value === undefined ? "-" : formatNumber(value)}`;
      })
      .join("  ");
    lines.push(`   ${row.city}  ${values}`);
  });

  const extract = result.crossSectionExtract;
  lines.push(`${extract.xField} vs ${extract.yField} in ${extract.year}:`);
  extract.points.forEach((point) =>
    lines.push(`   ${point.city}  ${formatNumber(point.x)}  ${formatNumber(point.y)}`)
  );

  result.warnings.forEach((warning) => lines.push(`Warning: ${warning}`));
  return lines;
};
