import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable } from "./types";

export type ParseFileResult = {
  table: RawTable;
  fileType: "delimited" | "workbook";
  sheetNames: string[];
};

const delimitedExtensions = new Set(["csv", "tsv", "txt"]);
const workbookExtensions = new Set(["xlsx", "xls"]);

export const fileExtension = (name: string): string => {
  const dotIndex = name.lastIndexOf(".");
  return dotIndex <= 0 ? "" : name.slice(dotIndex + 1).toLowerCase();
};

export const isTabularFile = (name: string): boolean => {
  const extension = fileExtension(name);
  return delimitedExtensions.has(extension) || workbookExtensions.has(extension);
};

export const parseFile = (name: string, content: Buffer): ParseFileResult => {
  const extension = fileExtension(name);
  if (delimitedExtensions.has(extension)) {
    const table = parseCsvText(content.toString("utf8"), name);
    return {
      table,
      fileType: "delimited",
      sheetNames: []
    };
  }

  if (workbookExtensions.has(extension)) {
    const tables = parseXlsxBuffer(content, name);
    if (tables.length === 0) {
      throw new Error("No sheets detected in the workbook.");
    }
    return {
      table: tables[0],
      fileType: "workbook",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet")
    };
  }

  throw new Error(`Unsupported file type ".${extension}".`);
};
