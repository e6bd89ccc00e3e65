export type ChartTheme = Readonly<{
  width: number;
  height: number;
  padding: number;
  fontFamily: string;
  fontSize: number;
  titleSize: number;
  background: string;
  textColor: string;
  axisColor: string;
  gridColor: string;
  palette: readonly string[];
}>;

export const defaultTheme: ChartTheme = Object.freeze({
  width: 1600,
  height: 1200,
  padding: 56,
  fontFamily: "'Noto Sans CJK SC', 'Microsoft YaHei', 'PingFang SC', sans-serif",
  fontSize: 12,
  titleSize: 16,
  background: "#ffffff",
  textColor: "#1f2933",
  axisColor: "#52606d",
  gridColor: "#e4e7eb",
  palette: Object.freeze(["#2563eb", "#f97316", "#10b981", "#a855f7", "#ef4444", "#0ea5e9"])
});

export const createTheme = (overrides: Partial<ChartTheme> = {}): ChartTheme =>
  Object.freeze({ ...defaultTheme, ...overrides });

export const paletteColor = (theme: ChartTheme, index: number): string =>
  theme.palette[index % theme.palette.length] ?? theme.axisColor;
