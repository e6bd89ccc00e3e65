export type AnalysisErrorCode =
  | "NoInputFilesFound"
  | "FileParseFailure"
  | "MissingPrimaryTable"
  | "EmptyDataset"
  | "DivisionByZero"
  | "MissingField"
  | "MissingYear"
  | "InsufficientPeriods"
  | "InvalidArgument"
  | "InvalidConfig";

export class AnalysisError extends Error {
  code: AnalysisErrorCode;
  details?: string;

  constructor(code: AnalysisErrorCode, message: string, details?: string) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
    this.details = details;
  }
}

export const isAnalysisError = (error: unknown): error is AnalysisError =>
  error instanceof AnalysisError;

export const describeError = (error: unknown): { code: AnalysisErrorCode | "Unexpected"; message: string } => {
  if (isAnalysisError(error)) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "Unexpected", message: error.message };
  }
  return { code: "Unexpected", message: String(error) };
};
