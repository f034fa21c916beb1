import { createHash } from "crypto";

export type Batch = {
  batchId: string;
  items: string[];
};

export type PartitionOptions = {
  maxBatchSize: number;
  /** Upper bound on `items.join(separator).length`, e.g. the 200-char ASIN parameter. */
  maxChars?: number;
  separator?: string;
};

/** Content-addressed: the same items always produce the same id, wherever the batch sits. */
export const batchIdFor = (items: readonly string[]): string =>
  `b_${createHash("sha256").update(items.join("\n")).digest("hex").slice(0, 20)}`;

/**
 * Splits a work unit's items into batches. Items are de-duplicated and sorted before
 * packing, so re-partitioning the same logical set after a crash reproduces the same
 * boundaries and ids regardless of the order the items were listed in.
 *
 * An item longer than `maxChars` on its own still gets a batch of its own; the request
 * for it is expected to fail and be recorded against that batch only.
 */
export const partition = (items: readonly string[], options: PartitionOptions): Batch[] => {
  const { maxBatchSize, maxChars, separator = " " } = options;
  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
    throw new Error("maxBatchSize must be an integer >= 1");
  }
  if (maxChars != null && (!Number.isInteger(maxChars) || maxChars < 1)) {
    throw new Error("maxChars must be an integer >= 1");
  }

  const ordered = Array.from(new Set(items.map((item) => item.trim()).filter((item) => item !== ""))).sort();

  const groups: string[][] = [];
  let current: string[] = [];
  let currentChars = 0;

  for (const item of ordered) {
    const additional = item.length + (current.length > 0 ? separator.length : 0);
    const overSize = current.length >= maxBatchSize;
    const overChars = maxChars != null && current.length > 0 && currentChars + additional > maxChars;

    if (overSize || overChars) {
      groups.push(current);
      current = [item];
      currentChars = item.length;
    } else {
      current.push(item);
      currentChars += additional;
    }
  }
  if (current.length > 0) groups.push(current);

  return groups.map((group) => ({ batchId: batchIdFor(group), items: group }));
};
