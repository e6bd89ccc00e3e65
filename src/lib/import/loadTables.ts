import { AnalysisError } from "../errors/analysisError";
import type { TableSource } from "../io/fileSystem";
import { normalizeCityColumns } from "./normalize";
import { isTabularFile, parseFile } from "./parseFile";
import type { FileLoadFailure, LoadResult, RawTable } from "./types";

const listDirectory = (directory: string, source: TableSource): string[] => {
  try {
    return source.listFiles(directory);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new AnalysisError(
      "NoInputFilesFound",
      `Input directory "${directory}" could not be read.`,
      details
    );
  }
};

/**
 * Reads every tabular file of `directory`. Files are visited in name order;
 * a file that fails to parse is reported in `failures` and skipped.
 */
export const loadTables = (directory: string, source: TableSource): LoadResult => {
  const fileNames = listDirectory(directory, source)
    .filter(isTabularFile)
    .sort();

  if (fileNames.length === 0) {
    throw new AnalysisError(
      "NoInputFilesFound",
      `No tabular files (.csv, .tsv, .txt, .xlsx, .xls) found in "${directory}".`
    );
  }

  const tables = new Map<string, RawTable>();
  const failures: FileLoadFailure[] = [];

  fileNames.forEach((fileName) => {
    try {
      const { table, fileType, sheetNames } = parseFile(fileName, source.readFile(directory, fileName));
      tables.set(fileName, normalizeCityColumns(table));
      console.info("[loader] loaded", {
        file: fileName,
        fileType,
        sheetNames,
        rows: table.rows.length,
        columns: table.headers.length
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push({ code: "FileParseFailure", file: fileName, message });
      console.warn("[loader] skipped", { file: fileName, message });
    }
  });

  return { tables, failures };
};
