import { assembleResult, type AssemblyOptions } from "../assemble/assembleResult";
import type { PipelineConfig } from "../config/loadConfig";
import { describeError, type AnalysisErrorCode } from "../errors/analysisError";
import { loadTables } from "../import/loadTables";
import type { FileLoadFailure } from "../import/types";
import { nodeOutputSink, nodeTableSource, type OutputSink, type TableSource } from "../io/fileSystem";
import { collectFlowTables, requireIndicatorTable } from "../profile/partitionTables";
import { profileTables } from "../profile/profileTables";
import { extractAllFlowRecords, extractIndicatorRecords, indicatorMetricColumns } from "../records/extractRecords";
import { selectFlowRecords } from "../records/logicalDataset";
import { writeDashboard } from "../render/renderDashboard";
import { defaultTheme, type ChartTheme } from "../render/theme";
import { formatAnalysisReport, formatProfileReport } from "../report/formatReport";
import type { AnalysisResult } from "../../types/analysis";
import type { SchemaProfile } from "../../types/profile";

export type PipelineDependencies = {
  source?: TableSource;
  sink?: OutputSink;
  theme?: ChartTheme;
  assembly?: AssemblyOptions;
  print?: (line: string) => void;
};

export type PipelineOutcome =
  | {
      ok: true;
      result: AnalysisResult;
      profile: SchemaProfile;
      failures: FileLoadFailure[];
      reportLines: string[];
      outputPath: string;
    }
  | {
      ok: false;
      error: { code: AnalysisErrorCode | "Unexpected"; message: string };
      reportLines: string[];
    };

/**
 * Runs load, profile, analysis and rendering in sequence. Report lines are
 * printed as they are produced, so output from stages that completed before a
 * failure stays visible.
 */
export const runPipeline = (
  config: PipelineConfig,
  dependencies: PipelineDependencies = {}
): PipelineOutcome => {
  const {
    source = nodeTableSource,
    sink = nodeOutputSink,
    theme = defaultTheme,
    assembly = {},
    print = (line: string) => console.log(line)
  } = dependencies;
  const reportLines: string[] = [];
  const emit = (lines: string[]) => {
    lines.forEach((line) => {
      reportLines.push(line);
      print(line);
    });
  };

  try {
    console.info("[pipeline] start", { inputDir: config.inputDir, outputDir: config.outputDir });
    const { tables, failures } = loadTables(config.inputDir, source);

    const profile = profileTables(tables);
    emit(formatProfileReport(profile, failures));

    const flows = extractAllFlowRecords(collectFlowTables(tables, profile.partition));
    const flowRecords = selectFlowRecords(flows.records);

    const indicatorTable = requireIndicatorTable(tables, profile.partition);
    const indicators = extractIndicatorRecords(indicatorTable);

    const result = assembleResult(
      {
        flows: flowRecords,
        indicators: {
          fields: indicatorMetricColumns(indicatorTable),
          records: indicators.records
        },
        categories: profile.categories
      },
      assembly
    );
    emit(formatAnalysisReport(result));

    const outputPath = writeDashboard(result, config.outputDir, sink, theme);
    console.info("[pipeline] success", { outputPath, flowRecords: flowRecords.length });
    return { ok: true, result, profile, failures, reportLines, outputPath };
  } catch (error) {
    return { ok: false, error: describeError(error), reportLines };
  }
};
