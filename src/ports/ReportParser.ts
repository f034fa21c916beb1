import type { RawRecord } from "../core/records/record.types";
import type { SourceType } from "../core/sync/workUnit";

export interface ReportParser {
  /** Throws on malformed input; the caller turns that into a ParseError for the batch. */
  parse(bytes: Uint8Array): RawRecord[];
}

export type ReportParsers = Readonly<Record<SourceType, ReportParser>>;
