import * as XLSX from "xlsx";
import type { CellValue, RawTable } from "./types";

const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  const text = String(value);
  return text.trim() ? text : null;
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  rawHeaders.map((header, index) => {
    const label = normalizeCell(header);
    if (label === null) {
      return `Column ${index + 1}`;
    }
    return String(label).trim();
  });

export const parseXlsxBuffer = (buffer: Buffer, name: string): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      blankrows: false
    });

    const rawHeaders = rows[0] ?? [];
    const headers = buildHeaders(rawHeaders);
    const dataRows = rows.slice(1).map((row) => headers.map((_, index) => normalizeCell(row[index])));

    return {
      name,
      sheetName,
      headers,
      rows: dataRows
    };
  });
};
