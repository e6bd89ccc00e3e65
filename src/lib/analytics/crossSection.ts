import { AnalysisError } from "../errors/analysisError";
import type {
  CrossSection,
  IndicatorDataset,
  IndicatorRecord,
  RelationshipExtract
} from "../../types/analysis";

export type CrossSectionOptions = {
  year: number;
  cities: readonly string[];
  fields: readonly string[];
  sortBy: string;
};

export type RelationshipOptions = {
  year: number;
  x: string;
  y: string;
};

const requireFields = (dataset: IndicatorDataset, fields: readonly string[]) => {
  const missing = fields.filter((field) => !dataset.fields.includes(field));
  if (missing.length > 0) {
    throw new AnalysisError(
      "MissingField",
      `Unknown indicator field(s): ${missing.join(", ")}.`,
      `Available: ${dataset.fields.join(", ")}`
    );
  }
};

const recordsForYear = (dataset: IndicatorDataset, year: number): IndicatorRecord[] => {
  const records = dataset.records.filter((record) => record.year === year);
  if (records.length === 0) {
    throw new AnalysisError("MissingYear", `No indicator records for ${year}.`);
  }
  return records;
};

const compareDescending = (left: number | null, right: number | null): number => {
  if (left === null && right === null) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return right - left;
};

/**
 * Snapshot of the requested cities for one year. Cities with no data are left
 * out; rows with no value for `sortBy` sort last.
 */
export const crossSection = (dataset: IndicatorDataset, options: CrossSectionOptions): CrossSection => {
  const { year, cities, fields, sortBy } = options;
  if (fields.length === 0) {
    throw new AnalysisError("InvalidArgument", "Cross-section needs at least one field.");
  }
  if (!fields.includes(sortBy)) {
    throw new AnalysisError(
      "InvalidArgument",
      `Sort field "${sortBy}" is not one of the projected fields.`
    );
  }
  requireFields(dataset, fields);

  const wanted = new Set(cities);
  const rows = recordsForYear(dataset, year)
    .filter((record) => wanted.has(record.city))
    .map((record) => ({
      year: record.year,
      city: record.city,
      values: Object.fromEntries(
        fields.map((field): [string, number | null] => [field, record.metrics[field] ?? null])
      )
    }))
    .sort((left, right) => compareDescending(left.values[sortBy] ?? null, right.values[sortBy] ?? null));

  return { year, fields: [...fields], sortBy, rows };
};

/** (city, x, y) points for one year; cities missing either metric are omitted. */
export const relationship = (
  dataset: IndicatorDataset,
  options: RelationshipOptions
): RelationshipExtract => {
  const { year, x, y } = options;
  requireFields(dataset, [x, y]);

  const points = recordsForYear(dataset, year).flatMap((record) => {
    const xValue = record.metrics[x];
    const yValue = record.metrics[y];
    if (xValue === undefined || yValue === undefined) {
      return [];
    }
    return [{ city: record.city, x: xValue, y: yValue }];
  });

  return { year, xField: x, yField: y, points };
};
