import { createReadStream } from "node:fs";
import { access, constants, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";

import { chunk } from "./chunk";
import { SPLIT_LINES } from "./constants";
import { ExtractionError } from "./errors";
import { silentLogger, type Logger } from "./log";

export const splitFileName = (index: number) =>
  `raw-hash-${String(index + 1).padStart(2, "0")}`;

/**
 * Splits a hash file into `raw-hash-01`, `raw-hash-02`, ... of at most
 * `linesPerFile` non-blank lines each. Returns the written paths.
 */
export async function splitFile(
  input: string,
  outDir: string,
  linesPerFile: number = SPLIT_LINES,
  logger: Logger = silentLogger
): Promise<string[]> {
  const lines: string[] = [];
  try {
    await access(input, constants.R_OK);
    const reader = readline.createInterface({
      input: createReadStream(input, { encoding: "utf-8" }),
      crlfDelay: Infinity,
    });
    for await (const line of reader) {
      if (line.trim()) lines.push(line.trim());
    }
  } catch (error) {
    throw new ExtractionError(input, error);
  }

  await mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const [index, part] of chunk(lines, linesPerFile).entries()) {
    const file = path.join(outDir, splitFileName(index));
    await writeFile(file, part.join("\n") + "\n", { encoding: "utf-8" });
    logger.info(`[+] Wrote ${part.length} lines to ${file}`);
    written.push(file);
  }
  return written;
}
