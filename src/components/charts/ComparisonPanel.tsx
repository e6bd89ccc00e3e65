import { max, scaleBand, scaleLinear } from "d3";
import type { CrossSection } from "../../types/analysis";
import { paletteColor, type ChartTheme } from "../../lib/render/theme";
import { formatValue } from "./format";
import { PanelFrame, type PanelBounds } from "./PanelFrame";

type ComparisonPanelProps = {
  bounds: PanelBounds;
  theme: ChartTheme;
  section: CrossSection;
};

export const ComparisonPanel = ({ bounds, theme, section }: ComparisonPanelProps) => {
  const { rows, fields } = section;
  const inner = {
    left: theme.padding,
    right: bounds.width - theme.padding / 2,
    top: theme.padding + 24,
    bottom: bounds.height - theme.padding
  };
  const cityBand = scaleBand<string>()
    .domain(rows.map((row) => row.city))
    .range([inner.left, inner.right])
    .padding(0.2);
  const fieldBand = scaleBand<string>()
    .domain(fields)
    .range([0, cityBand.bandwidth()])
    .padding(0.05);
  const allValues = rows.flatMap((row) =>
    fields.flatMap((field) => {
      const value = row.values[field];
      return value === null || value === undefined ? [] : [value];
    })
  );
  const y = scaleLinear()
    .domain([0, max(allValues) ?? 0])
    .nice()
    .range([inner.bottom, inner.top]);

  return (
    <PanelFrame
      bounds={bounds}
      theme={theme}
      title={`Core cities, ${section.year}`}
      isEmpty={rows.length === 0}
    >
      {fields.map((field, index) => (
        <g key={`legend-${field}`} transform={`translate(${inner.left + index * 160},${theme.padding})`}>
          <rect width={10} height={10} fill={paletteColor(theme, index)} />
          <text x={14} y={9} fontSize={theme.fontSize} fill={theme.textColor}>
            {field}
          </text>
        </g>
      ))}
      <line x1={inner.left} x2={inner.right} y1={inner.bottom} y2={inner.bottom} stroke={theme.axisColor} />
      {rows.map((row, rowIndex) => (
        <g key={`${row.city}-${rowIndex}`} transform={`translate(${cityBand(row.city) ?? 0},0)`}>
          {fields.map((field, index) => {
            const value = row.values[field];
            if (value === null || value === undefined) {
              return null;
            }
            return (
              <rect
                key={field}
                x={fieldBand(field) ?? 0}
                y={y(value)}
                width={fieldBand.bandwidth()}
                height={Math.max(0, inner.bottom - y(value))}
                fill={paletteColor(theme, index)}
              >
                <title>{`${row.city} ${field}: ${formatValue(value)}`}</title>
              </rect>
            );
          })}
          <text
            x={cityBand.bandwidth() / 2}
            y={inner.bottom + 18}
            textAnchor="middle"
            fontSize={theme.fontSize}
            fill={theme.textColor}
          >
            {row.city}
          </text>
        </g>
      ))}
    </PanelFrame>
  );
};
