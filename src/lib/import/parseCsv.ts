import type { CellValue, RawTable } from "./types";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const countOutsideQuotes = (line: string, delimiter: string): number => {
  let count = 0;
  let inQuotes = false;
  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      count += 1;
    }
  }
  return count;
};

export const detectDelimiter = (headerLine: string): string => {
  const candidates = [",", ";", "\t"];
  let best = ",";
  let bestCount = 0;
  candidates.forEach((candidate) => {
    const count = countOutsideQuotes(headerLine, candidate);
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  });
  return best;
};

// Splits on line breaks outside quotes; a quoted field may span lines.
const splitRecords = (text: string): string[] => {
  const records: string[] = [];
  let current = "";
  let inQuotes = false;
  for (const char of text) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === "\n" && !inQuotes) {
      records.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  records.push(current);
  return records;
};

const parseDelimitedLine = (line: string, delimiter: string): string[] => {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      const nextChar = line[index + 1];
      if (inQuotes && nextChar === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      result.push(current);
      current = "";
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw new Error("Unterminated quoted field.");
  }

  result.push(current);
  return result;
};

// Text cells keep their surrounding whitespace; city columns are trimmed later.
export const coerceCell = (value: string): CellValue => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return value;
};

const buildHeaders = (rawHeaders: string[]): string[] =>
  rawHeaders.map((header, index) => {
    const trimmed = header.trim();
    return trimmed ? trimmed : `Column ${index + 1}`;
  });

export const parseCsvText = (text: string, name: string): RawTable => {
  const sanitized = sanitizeText(text);
  const lines = splitRecords(sanitized).filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new Error("CSV appears to be empty.");
  }

  const delimiter = detectDelimiter(lines[0]);
  const headers = buildHeaders(parseDelimitedLine(lines[0], delimiter));
  const rows = lines.slice(1).map((line, lineIndex) => {
    const rawValues = parseDelimitedLine(line, delimiter);
    if (rawValues.length > headers.length) {
      throw new Error(
        `Row ${lineIndex + 2} has ${rawValues.length} fields, expected at most ${headers.length}.`
      );
    }
    const normalized = headers.map((_, index) => rawValues[index] ?? "");
    return normalized.map(coerceCell);
  });

  return {
    name,
    headers,
    rows
  };
};
