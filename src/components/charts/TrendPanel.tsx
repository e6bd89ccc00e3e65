import { line, max, scalePoint, scaleLinear } from "d3";
import type { YearlyTotal } from "../../types/analysis";
import { paletteColor, type ChartTheme } from "../../lib/render/theme";
import { formatValue } from "./format";
import { PanelFrame, type PanelBounds } from "./PanelFrame";

type TrendPanelProps = {
  bounds: PanelBounds;
  theme: ChartTheme;
  totals: readonly YearlyTotal[];
  growthRate: number | null;
};

export const TrendPanel = ({ bounds, theme, totals, growthRate }: TrendPanelProps) => {
  const inner = {
    left: theme.padding,
    right: bounds.width - theme.padding / 2,
    top: theme.padding,
    bottom: bounds.height - theme.padding
  };
  const x = scalePoint<number>()
    .domain(totals.map((entry) => entry.year))
    .range([inner.left, inner.right])
    .padding(0.5);
  const y = scaleLinear()
    .domain([0, max(totals, (entry) => entry.total) ?? 0])
    .nice()
    .range([inner.bottom, inner.top]);
  const path = line<YearlyTotal>()
    .x((entry) => x(entry.year) ?? inner.left)
    .y((entry) => y(entry.total))(totals);
  const color = paletteColor(theme, 0);
  const subtitle =
    growthRate === null ? "Single year" : `Growth ${growthRate >= 0 ? "+" : ""}${formatValue(growthRate)}%`;

  return (
    <PanelFrame bounds={bounds} theme={theme} title="Data-flow volume by year" isEmpty={totals.length === 0}>
      <text x={bounds.width / 2} y={theme.titleSize + 26} textAnchor="middle" fontSize={theme.fontSize} fill={theme.axisColor}>
        {subtitle}
      </text>
      {y.ticks(5).map((tick) => (
        <g key={`grid-${tick}`}>
          <line x1={inner.left} x2={inner.right} y1={y(tick)} y2={y(tick)} stroke={theme.gridColor} />
          <text x={inner.left - 6} y={y(tick)} dy="0.32em" textAnchor="end" fontSize={theme.fontSize} fill={theme.axisColor}>
            {formatValue(tick)}
          </text>
        </g>
      ))}
      <path d={path ?? ""} fill="none" stroke={color} strokeWidth={2.5} />
      {totals.map((entry) => (
        <g key={entry.year} transform={`translate(${x(entry.year) ?? inner.left},${y(entry.total)})`}>
          <circle r={4} fill={color} />
          <text y={-10} textAnchor="middle" fontSize={theme.fontSize} fill={theme.textColor}>
            {formatValue(entry.total)}
          </text>
          <text y={inner.bottom - y(entry.total) + 18} textAnchor="middle" fontSize={theme.fontSize} fill={theme.axisColor}>
            {entry.year}
          </text>
        </g>
      ))}
    </PanelFrame>
  );
};
