import { isCityColumn } from "./columns";
import type { CellValue, RawTable } from "./types";

export const normalizeCityName = (value: string): string => value.trim();

const normalizeCityCell = (cell: CellValue): CellValue => {
  if (typeof cell !== "string") {
    return cell;
  }
  const normalized = normalizeCityName(cell);
  return normalized ? normalized : null;
};

/** Returns a copy of the table with every city-like column trimmed. */
export const normalizeCityColumns = (table: RawTable): RawTable => {
  const cityIndices = table.headers
    .map((header, index) => (isCityColumn(header) ? index : -1))
    .filter((index) => index >= 0);

  if (cityIndices.length === 0) {
    return table;
  }

  const rows = table.rows.map((row) =>
    row.map((cell, index) => (cityIndices.includes(index) ? normalizeCityCell(cell) : cell))
  );
  return { ...table, rows };
};
