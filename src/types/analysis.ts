export type FlowRecord = {
  year: number;
  origin: string;
  destination: string;
  volume: number;
  source: string;
};

export type IndicatorRecord = {
  year: number;
  city: string;
  metrics: Record<string, number>;
};

export type IndicatorDataset = {
  /** Numeric indicator columns of the source table, in column order. */
  fields: string[];
  records: IndicatorRecord[];
};

export type YearlyTotal = {
  year: number;
  total: number;
};

export type RankedPair = {
  origin: string;
  destination: string;
  volume: number;
};

export type LabeledPair = RankedPair & {
  label: string;
};

export type CrossSectionRow = {
  year: number;
  city: string;
  values: Record<string, number | null>;
};

export type RelationshipPoint = {
  city: string;
  x: number;
  y: number;
};

export type RelationshipExtract = {
  year: number;
  xField: string;
  yField: string;
  points: RelationshipPoint[];
};

export type CrossSection = {
  year: number;
  fields: string[];
  sortBy: string;
  rows: CrossSectionRow[];
};

export type AnalysisResult = {
  yearlyTotals: YearlyTotal[];
  /** Null when the flow data covers a single year. */
  growthRate: number | null;
  latestFlowYear: number;
  topPairs: LabeledPair[];
  latestIndicatorYear: number;
  filteredIndicators: CrossSection;
  crossSectionExtract: RelationshipExtract;
  warnings: string[];
};
