import type { FlowRecord } from "../../types/analysis";

const extensionPattern = /\.[^.]+$/;
const yearSuffixPattern = /[_\-\s]?(?:19|20)\d{2}$/;

export const logicalDatasetName = (fileName: string): string => {
  const base = fileName.replace(extensionPattern, "");
  const stripped = base.replace(yearSuffixPattern, "");
  return stripped || base;
};

const isCombinedFile = (fileName: string): boolean =>
  logicalDatasetName(fileName) === fileName.replace(extensionPattern, "");

/**
 * Keeps each year of a logical dataset from one place. Years present in a
 * combined file come from it; per-year files only contribute years the
 * combined file lacks. Without a combined file, every record is kept.
 */
export const selectFlowRecords = (records: readonly FlowRecord[]): FlowRecord[] => {
  const combinedYears = new Map<string, Set<number>>();
  records.forEach((record) => {
    if (!isCombinedFile(record.source)) {
      return;
    }
    const dataset = logicalDatasetName(record.source);
    const years = combinedYears.get(dataset) ?? new Set<number>();
    years.add(record.year);
    combinedYears.set(dataset, years);
  });

  const skipped = new Map<string, number>();
  const selected = records.filter((record) => {
    if (isCombinedFile(record.source)) {
      return true;
    }
    const covered = combinedYears.get(logicalDatasetName(record.source));
    if (covered?.has(record.year)) {
      skipped.set(record.source, (skipped.get(record.source) ?? 0) + 1);
      return false;
    }
    return true;
  });

  if (skipped.size > 0) {
    console.info("[analytics] skipped per-year rows covered by a combined flow file", {
      skipped: Object.fromEntries(skipped)
    });
  }
  return selected;
};
