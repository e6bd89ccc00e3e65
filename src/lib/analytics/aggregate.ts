import { AnalysisError } from "../errors/analysisError";
import type { FlowRecord, YearlyTotal } from "../../types/analysis";

export const latestYear = (years: readonly number[]): number => {
  if (years.length === 0) {
    throw new AnalysisError("EmptyDataset", "Cannot determine the latest year of an empty dataset.");
  }
  return years.reduce((max, year) => (year > max ? year : max), years[0]);
};

export const earliestYear = (years: readonly number[]): number => {
  if (years.length === 0) {
    throw new AnalysisError("EmptyDataset", "Cannot determine the earliest year of an empty dataset.");
  }
  return years.reduce((min, year) => (year < min ? year : min), years[0]);
};

/** Sums volume per year, ascending by year. */
export const yearlyTotals = (records: readonly FlowRecord[]): YearlyTotal[] => {
  if (records.length === 0) {
    throw new AnalysisError("EmptyDataset", "No flow records to aggregate.");
  }
  const totals = new Map<number, number>();
  records.forEach((record) => {
    totals.set(record.year, (totals.get(record.year) ?? 0) + record.volume);
  });
  return [...totals.entries()]
    .map(([year, total]) => ({ year, total }))
    .sort((left, right) => left.year - right.year);
};

/**
 * Percentage change from the earliest to the latest year. The endpoints are
 * found by min/max year, so the input order does not matter.
 */
export const growthRate = (totals: readonly YearlyTotal[]): number => {
  if (totals.length === 0) {
    throw new AnalysisError("EmptyDataset", "Growth rate needs at least one yearly total.");
  }
  const years = totals.map((entry) => entry.year);
  const firstYear = earliestYear(years);
  const lastYear = latestYear(years);
  if (firstYear === lastYear) {
    throw new AnalysisError(
      "InsufficientPeriods",
      `Growth rate needs at least two distinct years; only ${firstYear} is present.`
    );
  }

  const sumFor = (year: number) =>
    totals.filter((entry) => entry.year === year).reduce((sum, entry) => sum + entry.total, 0);
  const first = sumFor(firstYear);
  const last = sumFor(lastYear);
  if (first === 0) {
    throw new AnalysisError(
      "DivisionByZero",
      `Growth rate is undefined: the ${firstYear} total is zero.`
    );
  }
  return ((last - first) / first) * 100;
};
