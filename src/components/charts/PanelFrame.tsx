import type { ReactNode } from "react";
import type { ChartTheme } from "../../lib/render/theme";

export type PanelBounds = {
  x: number;
  y: number;
  width: number;
  height: number;
};

type PanelFrameProps = {
  bounds: PanelBounds;
  title: string;
  theme: ChartTheme;
  isEmpty?: boolean;
  children?: ReactNode;
};

export const PanelFrame = ({ bounds, title, theme, isEmpty = false, children }: PanelFrameProps) => (
  <g className="panel" transform={`translate(${bounds.x},${bounds.y})`}>
    <rect width={bounds.width} height={bounds.height} fill="none" stroke={theme.gridColor} />
    <text
      x={bounds.width / 2}
      y={theme.titleSize + 8}
      textAnchor="middle"
      fontSize={theme.titleSize}
      fontWeight="bold"
      fill={theme.textColor}
    >
      {title}
    </text>
    {isEmpty ? (
      <text
        x={bounds.width / 2}
        y={bounds.height / 2}
        textAnchor="middle"
        fontSize={theme.fontSize}
        fill={theme.axisColor}
      >
        No data
      </text>
    ) : (
      children
    )}
  </g>
);
