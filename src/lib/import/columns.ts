export type ColumnRole = "year" | "origin" | "destination" | "volume" | "city";

type RoleKeywords = {
  role: ColumnRole;
  substrings: string[];
  tokens: string[];
  exact?: string[];
};

// Evaluated in order: "origin_city" is an origin column, not a city column.
const roleKeywords: readonly RoleKeywords[] = [
  { role: "year", substrings: ["year", "年份", "年度"], tokens: ["yr"], exact: ["年"] },
  {
    role: "origin",
    substrings: ["origin", "source", "流出", "源城市", "起点", "出发"],
    tokens: ["from", "src"]
  },
  {
    role: "destination",
    substrings: ["destination", "target", "流入", "目标城市", "终点", "到达"],
    tokens: ["to", "dest", "dst"]
  },
  {
    role: "volume",
    substrings: ["volume", "flow", "traffic", "流量", "数据量"],
    tokens: []
  },
  // "地区" alone is a region column, but "地区生产总值" is a GDP indicator.
  { role: "city", substrings: ["city", "城市"], tokens: [], exact: ["地区", "region", "area"] }
];

const tokenize = (header: string): string[] =>
  header.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);

export const recognizeColumn = (header: string): ColumnRole | null => {
  const lower = header.trim().toLowerCase();
  const tokens = tokenize(header);
  const match = roleKeywords.find(
    ({ substrings, tokens: roleTokens, exact = [] }) =>
      exact.includes(lower) ||
      substrings.some((keyword) => lower.includes(keyword)) ||
      roleTokens.some((token) => tokens.includes(token))
  );
  return match ? match.role : null;
};

export const findColumnIndex = (headers: readonly string[], role: ColumnRole): number =>
  headers.findIndex((header) => recognizeColumn(header) === role);

export const isCityColumn = (header: string): boolean => {
  const role = recognizeColumn(header);
  return role === "origin" || role === "destination" || role === "city";
};
