import chalk from "chalk";

import { toChunks } from "./chunk";
import { LookupClient } from "./client";
import { OutputWriteError } from "./errors";
import { extractFromFile, writeExtracted } from "./extract";
import { silentLogger, type Logger } from "./log";
import { ResultSink, type Emit } from "./sink";
import type {
  FetchLike,
  HashRecord,
  HashType,
  LookupConfig,
  LookupSummary,
  ResultSet,
  Sleep,
} from "./types";

export interface LookupOpts {
  type: HashType;
  config: LookupConfig;
  output?: string;
  append?: boolean;
  signal?: AbortSignal;
  fetch?: FetchLike;
  sleep?: Sleep;
  emit?: Emit;
  logger?: Logger;
}

export interface BulkLookupOpts extends LookupOpts {
  file: string;
  // Also write the deduplicated hash list here
  extracted?: string;
}

export interface SingleLookupOpts extends LookupOpts {
  hash: string;
}

export async function bulkLookup(
  opts: BulkLookupOpts
): Promise<LookupSummary> {
  const { file, type, extracted } = opts;
  const logger = opts.logger ?? silentLogger;

  logger.info(`Extracting ${type} hashes from ${file}`);
  const records = await extractFromFile(file, type, {
    onHash: (record) => logger.info(`[+] ${record.hash}`),
  });
  logger.info(`Extracted ${records.length} unique ${type} hash(es)`);

  if (extracted) {
    try {
      await writeExtracted(extracted, records);
      logger.info(`Extracted hashes written to ${extracted}`);
    } catch (error) {
      logger.warn(new OutputWriteError(extracted, error).message);
    }
  }

  return lookupRecords(records, opts);
}

/**
 * Looks up already extracted records chunk by chunk, strictly in order.
 * The client's pacer spaces the requests; the abort signal is honoured
 * between chunks and during the pacing wait.
 */
export async function lookupRecords(
  records: readonly HashRecord[],
  opts: LookupOpts
): Promise<LookupSummary> {
  const { type, config, signal } = opts;
  const logger = opts.logger ?? silentLogger;

  const chunks = toChunks(records, config.chunkSize);
  const sink = new ResultSink({
    output: opts.output,
    append: opts.append,
    emit: opts.emit,
    logger,
  });
  const client = new LookupClient({
    config,
    fetch: opts.fetch,
    sleep: opts.sleep,
    signal,
    logger,
  });

  let chunksCompleted = 0;
  let interrupted = false;

  try {
    for (const chunk of chunks) {
      if (signal?.aborted) {
        interrupted = true;
        break;
      }

      const size = chunk.records.length;
      logger.info(
        `Chunk ${chunk.index + 1}/${chunks.length}: looking up ${size} hash(es)`
      );

      let results: ResultSet;
      try {
        results = await client.lookupChunk(chunk, type);
      } catch (error) {
        if (!signal?.aborted) throw error;
        interrupted = true;
        break;
      }

      for (const { hash } of chunk.records) {
        sink.record(results.get(hash) ?? { hash, status: "failed" });
      }
      chunksCompleted++;
    }
  } finally {
    sink.close();
  }

  if (interrupted) {
    const { total } = sink.counts();
    logger.warn(
      `Interrupted after ${chunksCompleted}/${chunks.length} chunk(s), ` +
        `${total} result(s) recorded`
    );
  }

  return {
    ...sink.counts(),
    chunksTotal: chunks.length,
    chunksCompleted,
    interrupted,
    outputPath: sink.outputPath,
  };
}

export async function singleLookup(
  opts: SingleLookupOpts
): Promise<LookupSummary> {
  const logger = opts.logger ?? silentLogger;
  const sink = new ResultSink({
    output: opts.output,
    append: opts.append,
    emit: opts.emit,
    logger,
  });
  const client = new LookupClient({
    config: opts.config,
    fetch: opts.fetch,
    logger,
  });

  try {
    sink.record(await client.lookupSingle(opts.hash, opts.type));
  } finally {
    sink.close();
  }

  return {
    ...sink.counts(),
    chunksTotal: 0,
    chunksCompleted: 0,
    interrupted: false,
    outputPath: sink.outputPath,
  };
}

export function summaryLines(summary: LookupSummary): string[] {
  const red = chalk.bold.red;
  const green = chalk.bold.green;
  const white = chalk.bold.white;

  const lines = [
    white(`\nTotal Hashes:\t${summary.total}`),
    (summary.found > 0 ? green : white)(`Found:\t\t${summary.found}`),
    white(`Not Found:\t${summary.notFound}`),
    (summary.failed > 0 ? red : white)(`Failed:\t\t${summary.failed}`),
  ];

  if (summary.chunksTotal > 0) {
    lines.push(
      (summary.interrupted ? red : white)(
        `Chunks:\t\t${summary.chunksCompleted}/${summary.chunksTotal}`
      )
    );
  }
  if (summary.outputPath) {
    lines.push(chalk.yellow(`\nResults written to ${summary.outputPath}`));
  }
  return lines;
}
