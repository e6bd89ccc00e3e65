import type { AnalysisResult } from "../../types/analysis";
import type { ChartTheme } from "../../lib/render/theme";
import { ComparisonPanel } from "./ComparisonPanel";
import type { PanelBounds } from "./PanelFrame";
import { RankingPanel } from "./RankingPanel";
import { ScatterPanel } from "./ScatterPanel";
import { TrendPanel } from "./TrendPanel";

type DashboardProps = {
  result: AnalysisResult;
  theme: ChartTheme;
  title?: string;
};

const HEADER_HEIGHT = 48;

export const panelGrid = (theme: ChartTheme): [PanelBounds, PanelBounds, PanelBounds, PanelBounds] => {
  const gap = theme.padding / 4;
  const width = (theme.width - gap * 3) / 2;
  const height = (theme.height - HEADER_HEIGHT - gap * 3) / 2;
  const cell = (column: number, row: number): PanelBounds => ({
    x: gap + column * (width + gap),
    y: HEADER_HEIGHT + gap + row * (height + gap),
    width,
    height
  });
  return [cell(0, 0), cell(1, 0), cell(0, 1), cell(1, 1)];
};

export const Dashboard = ({ result, theme, title = "Metropolitan data-flow and digital economy" }: DashboardProps) => {
  const [trend, ranking, comparison, scatter] = panelGrid(theme);
  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={theme.width}
      height={theme.height}
      viewBox={`0 0 ${theme.width} ${theme.height}`}
      fontFamily={theme.fontFamily}
    >
      <rect width={theme.width} height={theme.height} fill={theme.background} />
      <text
        x={theme.width / 2}
        y={HEADER_HEIGHT / 2 + theme.titleSize / 2}
        textAnchor="middle"
        fontSize={theme.titleSize + 6}
        fontWeight="bold"
        fill={theme.textColor}
      >
        {title}
      </text>
      <TrendPanel bounds={trend} theme={theme} totals={result.yearlyTotals} growthRate={result.growthRate} />
      <RankingPanel bounds={ranking} theme={theme} year={result.latestFlowYear} pairs={result.topPairs} />
      <ComparisonPanel bounds={comparison} theme={theme} section={result.filteredIndicators} />
      <ScatterPanel bounds={scatter} theme={theme} extract={result.crossSectionExtract} />
    </svg>
  );
};
