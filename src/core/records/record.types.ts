import type { SourceType } from "../sync/workUnit";

/** One row as handed over by a report parser, before identity is assigned. */
export type RawRecord = Record<string, unknown>;

export type NaturalIdentityKey = {
  kind: "natural";
  entity: string;
  parts: string[];
};

export type ContentIdentityKey = {
  kind: "content";
  scheme: string;
  version: number;
  hash: string;
};

export type IdentityKey = NaturalIdentityKey | ContentIdentityKey;

export type SourceTag = {
  source: SourceType;
  authority: number;
};

export type CanonicalRecord = {
  key: string;            // rendered identity key, primary key in the store
  identity: IdentityKey;
  entity: string;         // collection the record lives in
  marketplace: string;
  source: SourceTag;
  fields: RawRecord;
  ingestedAt: Date;
};

/** What the store knows about a record when deciding precedence. */
export type StoredRecordHead = {
  key: string;
  source: SourceTag;
  revision: number;
};
