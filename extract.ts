import { open, writeFile } from "node:fs/promises";
import readline from "node:readline";

import { HASH_LENGTHS } from "./constants";
import { ExtractionError } from "./errors";
import { isHexChar, isWordChar } from "./helpers";
import type { HashRecord, HashType } from "./types";

export interface ExtractOpts {
  onHash?: (record: HashRecord) => void;
}

/**
 * Ordered, deduplicating collector fed by the token scanner. A token is a
 * maximal run of word characters; it is kept when it is exactly `length`
 * hex digits long.
 */
class HashCollector {
  private readonly seen = new Set<string>();
  readonly records: HashRecord[] = [];
  private readonly length: number;

  constructor(
    private readonly type: HashType,
    private readonly onHash?: (record: HashRecord) => void
  ) {
    this.length = HASH_LENGTHS[type];
  }

  scan(text: string) {
    let start = -1;
    let allHex = true;

    for (let i = 0; i <= text.length; i++) {
      const c = i < text.length ? text[i] : "";

      if (c && isWordChar(c)) {
        if (start < 0) {
          start = i;
          allHex = true;
        }
        allHex &&= isHexChar(c);
        continue;
      }

      if (start >= 0 && allHex && i - start === this.length) {
        this.add(text.slice(start, i));
      }
      start = -1;
    }
  }

  private add(token: string) {
    const hash = token.toLowerCase();
    if (this.seen.has(hash)) return;

    this.seen.add(hash);
    const record: HashRecord = { hash, type: this.type };
    this.records.push(record);
    this.onHash?.(record);
  }
}

export function extract(text: string, type: HashType, opts: ExtractOpts = {}) {
  const collector = new HashCollector(type, opts.onHash);
  collector.scan(text);
  return collector.records;
}

// Dumps can be gigabytes: read line by line, hashes never span lines
export async function extractFromFile(
  path: string,
  type: HashType,
  opts: ExtractOpts = {}
): Promise<HashRecord[]> {
  const handle = await open(path, "r").catch((error: unknown) => {
    throw new ExtractionError(path, error);
  });
  if (!(await handle.stat()).isFile()) {
    await handle.close();
    throw new ExtractionError(path, "not a regular file");
  }

  const collector = new HashCollector(type, opts.onHash);
  const lines = readline.createInterface({
    input: handle.createReadStream({ encoding: "utf-8" }),
    crlfDelay: Infinity,
  });

  try {
    for await (const line of lines) collector.scan(line);
  } catch (error) {
    throw new ExtractionError(path, error);
  } finally {
    lines.close();
  }

  return collector.records;
}

export const writeExtracted = (path: string, records: readonly HashRecord[]) =>
  writeFile(
    path,
    records.map((r) => r.hash + "\n").join(""),
    { encoding: "utf-8" }
  );
