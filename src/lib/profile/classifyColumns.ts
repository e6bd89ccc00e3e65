import { findColumnIndex } from "../import/columns";
import type { IndicatorCategory, IndicatorCategoryName } from "../../types/profile";

export type CategoryKeywords = {
  name: IndicatorCategoryName;
  keywords: readonly string[];
};

// Order is significant: a column joins the first category whose keywords match.
export const INDICATOR_CATEGORIES: readonly CategoryKeywords[] = [
  {
    name: "data-industry",
    keywords: ["数据", "data", "数字产业", "软件", "software", "云计算", "cloud", "信息服务"]
  },
  {
    name: "economic-development",
    keywords: ["GDP", "经济", "economy", "economic", "收入", "income", "产值", "output", "人均"]
  },
  {
    name: "technology-innovation",
    keywords: ["专利", "patent", "研发", "R&D", "创新", "innovation", "高新", "科技", "tech"]
  },
  {
    name: "infrastructure",
    keywords: ["5G", "基站", "宽带", "broadband", "互联网", "internet", "基础设施", "infrastructure", "光缆", "fiber"]
  }
];

export const classifyColumn = (
  column: string,
  categories: readonly CategoryKeywords[] = INDICATOR_CATEGORIES
): IndicatorCategoryName | null => {
  const lower = column.toLowerCase();
  const match = categories.find(({ keywords }) =>
    keywords.some((keyword) => lower.includes(keyword.toLowerCase()))
  );
  return match ? match.name : null;
};

export type ColumnClassification = {
  categories: IndicatorCategory[];
  uncategorized: string[];
};

/**
 * Groups indicator columns by category. The table's year and city columns are
 * identity fields and are never classified; other columns whose names merely
 * mention a city or year are classified like any metric.
 */
export const classifyColumns = (
  columns: readonly string[],
  categories: readonly CategoryKeywords[] = INDICATOR_CATEGORIES
): ColumnClassification => {
  const result: IndicatorCategory[] = categories.map(({ name, keywords }) => ({
    name,
    keywords,
    matchedColumns: []
  }));
  const uncategorized: string[] = [];

  const yearIndex = findColumnIndex(columns, "year");
  const cityIndex = findColumnIndex(columns, "city");

  columns.forEach((column, index) => {
    if (index === yearIndex || index === cityIndex) {
      return;
    }
    const categoryName = classifyColumn(column, categories);
    const category = result.find((entry) => entry.name === categoryName);
    if (category) {
      category.matchedColumns.push(column);
    } else {
      uncategorized.push(column);
    }
  });

  return { categories: result, uncategorized };
};
