import { max, scaleBand, scaleLinear } from "d3";
import type { LabeledPair } from "../../types/analysis";
import { paletteColor, type ChartTheme } from "../../lib/render/theme";
import { formatValue } from "./format";
import { PanelFrame, type PanelBounds } from "./PanelFrame";

type RankingPanelProps = {
  bounds: PanelBounds;
  theme: ChartTheme;
  year: number;
  pairs: readonly LabeledPair[];
};

const LABEL_WIDTH = 120;

export const RankingPanel = ({ bounds, theme, year, pairs }: RankingPanelProps) => {
  const left = theme.padding / 2 + LABEL_WIDTH;
  const right = bounds.width - theme.padding * 1.5;
  // Rank order top to bottom; the band key is the position so repeated labels stay distinct.
  const y = scaleBand<number>()
    .domain(pairs.map((_, index) => index))
    .range([theme.padding, bounds.height - theme.padding / 2])
    .padding(0.2);
  const x = scaleLinear()
    .domain([0, max(pairs, (pair) => pair.volume) ?? 0])
    .nice()
    .range([left, right]);
  const color = paletteColor(theme, 1);

  return (
    <PanelFrame bounds={bounds} theme={theme} title={`Top ${pairs.length} city pairs, ${year}`} isEmpty={pairs.length === 0}>
      {pairs.map((pair, index) => {
        const top = y(index) ?? 0;
        const middle = top + y.bandwidth() / 2;
        return (
          <g key={`${pair.label}-${index}`}>
            <text x={left - 8} y={middle} dy="0.32em" textAnchor="end" fontSize={theme.fontSize} fill={theme.textColor}>
              {pair.label}
            </text>
            <rect x={left} y={top} width={Math.max(0, x(pair.volume) - left)} height={y.bandwidth()} fill={color} />
            <text x={x(pair.volume) + 6} y={middle} dy="0.32em" fontSize={theme.fontSize} fill={theme.axisColor}>
              {formatValue(pair.volume)}
            </text>
          </g>
        );
      })}
    </PanelFrame>
  );
};
