import { extent, scaleLinear } from "d3";
import type { RelationshipExtract } from "../../types/analysis";
import { paletteColor, type ChartTheme } from "../../lib/render/theme";
import { formatValue } from "./format";
import { PanelFrame, type PanelBounds } from "./PanelFrame";

type ScatterPanelProps = {
  bounds: PanelBounds;
  theme: ChartTheme;
  extract: RelationshipExtract;
};

const domainOf = (values: number[]): [number, number] => {
  const [low, high] = extent(values);
  if (low === undefined || high === undefined) {
    return [0, 1];
  }
  return low === high ? [low - 1, high + 1] : [low, high];
};

export const ScatterPanel = ({ bounds, theme, extract }: ScatterPanelProps) => {
  const { points } = extract;
  const inner = {
    left: theme.padding * 1.2,
    right: bounds.width - theme.padding / 2,
    top: theme.padding,
    bottom: bounds.height - theme.padding
  };
  const x = scaleLinear()
    .domain(domainOf(points.map((point) => point.x)))
    .nice()
    .range([inner.left, inner.right]);
  const y = scaleLinear()
    .domain(domainOf(points.map((point) => point.y)))
    .nice()
    .range([inner.bottom, inner.top]);
  const color = paletteColor(theme, 2);

  return (
    <PanelFrame
      bounds={bounds}
      theme={theme}
      title={`${extract.xField} vs ${extract.yField}, ${extract.year}`}
      isEmpty={points.length === 0}
    >
      <line x1={inner.left} x2={inner.right} y1={inner.bottom} y2={inner.bottom} stroke={theme.axisColor} />
      <line x1={inner.left} x2={inner.left} y1={inner.top} y2={inner.bottom} stroke={theme.axisColor} />
      {x.ticks(5).map((tick) => (
        <text key={`x-${tick}`} x={x(tick)} y={inner.bottom + 16} textAnchor="middle" fontSize={theme.fontSize} fill={theme.axisColor}>
          {formatValue(tick)}
        </text>
      ))}
      {y.ticks(5).map((tick) => (
        <text key={`y-${tick}`} x={inner.left - 6} y={y(tick)} dy="0.32em" textAnchor="end" fontSize={theme.fontSize} fill={theme.axisColor}>
          {formatValue(tick)}
        </text>
      ))}
      <text x={(inner.left + inner.right) / 2} y={bounds.height - 12} textAnchor="middle" fontSize={theme.fontSize} fill={theme.textColor}>
        {extract.xField}
      </text>
      <text
        transform={`translate(16,${(inner.top + inner.bottom) / 2}) rotate(-90)`}
        textAnchor="middle"
        fontSize={theme.fontSize}
        fill={theme.textColor}
      >
        {extract.yField}
      </text>
      {points.map((point, index) => (
        <g key={`${point.city}-${index}`} transform={`translate(${x(point.x)},${y(point.y)})`}>
          <circle r={6} fill={color} fillOpacity={0.75} />
          <text x={8} y={-8} fontSize={theme.fontSize} fill={theme.textColor}>
            {point.city}
          </text>
        </g>
      ))}
    </PanelFrame>
  );
};
