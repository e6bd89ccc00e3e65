import { AnalysisError } from "../errors/analysisError";
import type { FlowRecord, LabeledPair, RankedPair } from "../../types/analysis";

/**
 * The `n` largest flows of `year`. Equal volumes keep their input order;
 * there is no secondary key.
 */
export const topPairs = (records: readonly FlowRecord[], year: number, n: number): RankedPair[] => {
  if (!Number.isInteger(n) || n < 1) {
    throw new AnalysisError("InvalidArgument", `Top-N size must be a positive integer, got ${n}.`);
  }
  const matching = records.filter((record) => record.year === year);
  if (matching.length === 0) {
    throw new AnalysisError("MissingYear", `No flow records for ${year}.`);
  }
  return matching
    .map(({ origin, destination, volume }) => ({ origin, destination, volume }))
    .sort((left, right) => right.volume - left.volume)
    .slice(0, n);
};

export const pairLabel = (pair: RankedPair): string => `${pair.origin}→${pair.destination}`;

export const labelPairs = (pairs: readonly RankedPair[]): LabeledPair[] =>
  pairs.map((pair) => ({ ...pair, label: pairLabel(pair) }));
