import { AnalysisError } from "../errors/analysisError";
import { growthRate, latestYear, yearlyTotals } from "../analytics/aggregate";
import { crossSection, relationship } from "../analytics/crossSection";
import { labelPairs, topPairs } from "../analytics/ranking";
import type { AnalysisResult, FlowRecord, IndicatorDataset } from "../../types/analysis";
import type { IndicatorCategory, IndicatorCategoryName } from "../../types/profile";

export const DEFAULT_TOP_N = 10;
export const DEFAULT_CORE_CITIES: readonly string[] = ["上海", "南京", "杭州", "合肥"];

export type AssemblyOptions = {
  topN?: number;
  coreCities?: readonly string[];
  comparisonFields?: readonly string[];
  sortBy?: string;
  relationship?: { x: string; y: string };
};

export type AssemblyInput = {
  flows: readonly FlowRecord[];
  indicators: IndicatorDataset;
  categories: readonly IndicatorCategory[] | null;
};

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

const classifiedFields = (
  categories: readonly IndicatorCategory[] | null,
  available: readonly string[]
): Map<IndicatorCategoryName, string[]> =>
  new Map(
    (categories ?? []).map((category) => [
      category.name,
      category.matchedColumns.filter((column) => available.includes(column))
    ])
  );

/** First numeric column of each category, in category order. */
export const defaultComparisonFields = (
  categories: readonly IndicatorCategory[] | null,
  available: readonly string[]
): string[] => {
  const fields = [...classifiedFields(categories, available).values()].flatMap((columns) =>
    columns.length > 0 ? [columns[0]] : []
  );
  if (fields.length > 0) {
    return fields;
  }
  if (available.length > 0) {
    return [available[0]];
  }
  throw new AnalysisError("MissingField", "The indicator table has no numeric indicator columns.");
};

/** Economic output against data-industry size, falling back to any two numeric columns. */
export const defaultRelationshipFields = (
  categories: readonly IndicatorCategory[] | null,
  available: readonly string[]
): { x: string; y: string } => {
  const byCategory = classifiedFields(categories, available);
  const economic = byCategory.get("economic-development") ?? [];
  const dataIndustry = byCategory.get("data-industry") ?? [];
  if (economic.length > 0 && dataIndustry.length > 0) {
    return { x: economic[0], y: dataIndustry[0] };
  }

  const classified = [...byCategory.values()].flat();
  const candidates = [...new Set([...classified, ...available])];
  if (candidates.length < 2) {
    throw new AnalysisError(
      "MissingField",
      "The relationship extract needs two numeric indicator columns.",
      `Available: ${available.join(", ")}`
    );
  }
  return { x: candidates[0], y: candidates[1] };
};

/**
 * Builds the frozen result bundle. Every "latest year" is the maximum year
 * present in the relevant records.
 */
export const assembleResult = (
  input: AssemblyInput,
  options: AssemblyOptions = {}
): AnalysisResult => {
  const { flows, indicators, categories } = input;
  const warnings: string[] = [];

  const totals = yearlyTotals(flows);
  let rate: number | null = null;
  if (totals.length < 2) {
    warnings.push(`Growth rate not computed: flow data covers only ${totals[0].year}.`);
  } else {
    rate = growthRate(totals);
  }

  const latestFlowYear = latestYear(flows.map((record) => record.year));
  const ranked = labelPairs(topPairs(flows, latestFlowYear, options.topN ?? DEFAULT_TOP_N));

  const latestIndicatorYear = latestYear(indicators.records.map((record) => record.year));
  const fields = options.comparisonFields
    ? [...options.comparisonFields]
    : defaultComparisonFields(categories, indicators.fields);
  const section = crossSection(indicators, {
    year: latestIndicatorYear,
    cities: options.coreCities ?? DEFAULT_CORE_CITIES,
    fields,
    sortBy: options.sortBy ?? fields[0]
  });
  if (section.rows.length === 0) {
    warnings.push(`None of the core cities have indicator data for ${latestIndicatorYear}.`);
  }

  const axes = options.relationship ?? defaultRelationshipFields(categories, indicators.fields);
  const extract = relationship(indicators, { year: latestIndicatorYear, ...axes });

  warnings.forEach((warning) => console.warn("[analytics] warning", { warning }));

  return deepFreeze({
    yearlyTotals: totals,
    growthRate: rate,
    latestFlowYear,
    topPairs: ranked,
    latestIndicatorYear,
    filteredIndicators: section,
    crossSectionExtract: extract,
    warnings
  });
};
