import { renderToStaticMarkup } from "react-dom/server";
import { Dashboard } from "../../components/charts/Dashboard";
import type { OutputSink } from "../io/fileSystem";
import type { AnalysisResult } from "../../types/analysis";
import { defaultTheme, type ChartTheme } from "./theme";

export const DASHBOARD_FILE_NAME = "dashboard.svg";

export const renderDashboard = (result: AnalysisResult, theme: ChartTheme = defaultTheme): string =>
  `<?xml version="1.0" encoding="UTF-8"?>\n${renderToStaticMarkup(<Dashboard result={result} theme={theme} />)}`;

export const writeDashboard = (
  result: AnalysisResult,
  outputDir: string,
  sink: OutputSink,
  theme: ChartTheme = defaultTheme
): string => {
  const markup = renderDashboard(result, theme);
  const target = sink.writeFile(outputDir, DASHBOARD_FILE_NAME, markup);
  console.info("[renderer] wrote dashboard", { path: target, bytes: Buffer.byteLength(markup) });
  return target;
};
