import type { RawRecord } from "../../core/records/record.types";
import type { ReportParser } from "../../ports/ReportParser";
import { decodeText } from "./delimitedReportParser";

export type JsonPathParserOptions = {
  /** Top-level property holding the row array, e.g. "salesAndTrafficByAsin". */
  rowsAt: string;
  /** Record field -> dotted path inside one row. */
  fields: Record<string, string>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readPath = (value: unknown, path: string): unknown => {
  let current: unknown = value;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
};

export const createJsonPathParser = (options: JsonPathParserOptions): ReportParser => ({
  parse: (bytes: Uint8Array): RawRecord[] => {
    const document: unknown = JSON.parse(decodeText(bytes));
    if (!isRecord(document)) throw new Error("Report document is not a JSON object");

    const rows = document[options.rowsAt];
    if (rows === undefined) return [];
    if (!Array.isArray(rows)) throw new Error(`Report property ${options.rowsAt} is not an array`);

    return rows.map((row: unknown) => {
      const record: RawRecord = {};
      for (const [field, path] of Object.entries(options.fields)) {
        const value = readPath(row, path);
        if (value !== undefined) record[field] = value;
      }
      return record;
    });
  }
});
