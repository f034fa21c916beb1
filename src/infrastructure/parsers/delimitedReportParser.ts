import type { RawRecord } from "../../core/records/record.types";
import type { ReportParser } from "../../ports/ReportParser";

export type ColumnMapping = {
  field: string;
  type?: "string" | "number";
  required?: boolean;   // header must be present
};

export type DelimitedParserOptions = {
  delimiter?: string;
  /** Upstream header -> record field. Columns not listed are dropped. */
  columns: Record<string, ColumnMapping>;
};

const decoder = new TextDecoder("utf-8");

export const decodeText = (bytes: Uint8Array): string => decoder.decode(bytes).replace(/^\uFEFF/, "");

const unquote = (cell: string): string => {
  const trimmed = cell.trim();
  return trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')
    ? trimmed.slice(1, -1).replace(/""/g, '"')
    : trimmed;
};

/** Header-keyed rows of a delimited document; blank lines are ignored. */
export const readDelimitedRows = (text: string, delimiter = "\t"): Array<Record<string, string>> => {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  const [headerLine, ...dataLines] = lines;
  if (headerLine == null) return [];

  const headers = headerLine.split(delimiter).map((header) => unquote(header).toLowerCase());
  return dataLines.map((line, index) => {
    const cells = line.split(delimiter);
    if (cells.length > headers.length) {
      throw new Error(`Row ${index + 2} has ${cells.length} columns, header has ${headers.length}`);
    }
    const row: Record<string, string> = {};
    headers.forEach((header, column) => {
      row[header] = unquote(cells[column] ?? "");
    });
    return row;
  });
};

export const toNumberOrNull = (value: string): number | null => {
  if (value === "") return null;
  const parsed = Number(value.replace(/,/g, ""));
  return Number.isFinite(parsed) ? parsed : null;
};

export const createDelimitedParser = (options: DelimitedParserOptions): ReportParser => {
  const delimiter = options.delimiter ?? "\t";
  const columns = Object.entries(options.columns).map(([header, mapping]) => ({ header: header.toLowerCase(), mapping }));

  return {
    parse: (bytes: Uint8Array): RawRecord[] => {
      const text = decodeText(bytes);
      if (text.trim() === "") return [];

      const headerLine = text.split(/\r?\n/, 1)[0] ?? "";
      const present = new Set(headerLine.split(delimiter).map((header) => unquote(header).toLowerCase()));
      const missing = columns.filter(({ header, mapping }) => mapping.required && !present.has(header));
      if (missing.length > 0) {
        throw new Error(`Report is missing required column(s): ${missing.map(({ header }) => header).join(", ")}`);
      }

      return readDelimitedRows(text, delimiter).map((row) => {
        const record: RawRecord = {};
        for (const { header, mapping } of columns) {
          const value = row[header];
          if (value === undefined) continue;
          record[mapping.field] = mapping.type === "number" ? toNumberOrNull(value) : value;
        }
        return record;
      });
    }
  };
};
