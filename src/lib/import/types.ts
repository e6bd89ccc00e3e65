export type CellValue = string | number | null;

export type RawTable = {
  readonly name: string;
  readonly sheetName?: string;
  readonly headers: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
};

export type FileLoadFailure = {
  code: "FileParseFailure";
  file: string;
  message: string;
};

export type LoadResult = {
  tables: ReadonlyMap<string, RawTable>;
  failures: FileLoadFailure[];
};
