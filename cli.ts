import yargs, { type Arguments } from "yargs-parser";

import { resolveConfig } from "./config";
import { SPLIT_LINES } from "./constants";
import { AppError, UsageError } from "./errors";
import { parseHashType } from "./helpers";
import { createLogger, type Logger } from "./log";
import { bulkLookup, singleLookup, summaryLines } from "./lookup";
import { buildReport, reportLines } from "./report";
import type { Emit } from "./sink";
import { splitFile } from "./split";
import type { FetchLike, LookupSummary, Sleep } from "./types";

export const USAGE = `Usage:
  hashlook [lookup] -t <type> (-f <file> | -x <hash>) [-o <output>]
                    [-e <extracted>] [-a] [-v] [--chunk-size <n>]
  hashlook report -f <dump> -p <results> [-o <dir>] [--all]
  hashlook split -f <file> -o <dir> [-n <lines>]

Hash types: nt, lm, md5, sha1, sha256

Environment:
  HASHLOOK_API_URL     lookup endpoint (default https://ntlm.pw/api/lookup)
  HASHLOOK_PACING_MS   delay between bulk requests (default and minimum 5000)
  HASHLOOK_TIMEOUT_MS  per-request timeout (default 30000)
  HASHLOOK_RETRIES     retries per failed chunk (default 2)`;

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  fetch?: FetchLike;
  sleep?: Sleep;
  emit?: Emit;
  logger?: Logger;
  write?: (line: string) => void;
}

type Args = Arguments;

function str(args: Args, key: string): string | undefined {
  const value: unknown = args[key];
  return typeof value === "string" && value.trim() !== ""
    ? value.trim()
    : undefined;
}

function required(args: Args, key: string): string {
  const value = str(args, key);
  if (value === undefined) throw new UsageError(`--${key} is required`);
  return value;
}

async function runLookup(
  args: Args,
  deps: CliDeps,
  logger: Logger
): Promise<LookupSummary> {
  const type = parseHashType(required(args, "type"));
  const file = str(args, "file");
  const hash = str(args, "hash");
  if (file && hash) {
    throw new UsageError("--file and --hash cannot be used together");
  }

  const config = resolveConfig(deps.env ?? process.env, {
    chunkSize: str(args, "chunk-size"),
  });
  const common = {
    type,
    config,
    output: str(args, "output"),
    append: args.append === true,
    signal: deps.signal,
    fetch: deps.fetch,
    sleep: deps.sleep,
    emit: deps.emit,
    logger,
  };

  if (file) {
    return bulkLookup({ ...common, file, extracted: str(args, "extracted") });
  }
  if (hash) return singleLookup({ ...common, hash });
  throw new UsageError("One of --file or --hash is required");
}

function splitLines(args: Args): number {
  const value: unknown = args.lines;
  if (value === undefined) return SPLIT_LINES;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new UsageError("--lines must be a positive integer");
  }
  return value;
}

/**
 * Runs one command and resolves to the process exit code: 0 once a run
 * completes (not-found and failed lookups included), 1 on setup errors and
 * 130 when a lookup was interrupted.
 */
export async function main(
  argv: string[],
  deps: CliDeps = {}
): Promise<number> {
  const args = yargs(argv, {
    alias: {
      type: ["t"],
      file: ["f"],
      hash: ["x"],
      output: ["o"],
      extracted: ["e"],
      append: ["a"],
      verbose: ["v"],
      passwords: ["p"],
      lines: ["n"],
      help: ["h"],
    },
    string: [
      "type",
      "file",
      "hash",
      "output",
      "extracted",
      "passwords",
      "chunk-size",
    ],
    boolean: ["append", "verbose", "all", "help"],
    number: ["lines"],
  });

  const write =
    deps.write ?? ((line: string) => process.stderr.write(line + "\n"));
  const logger =
    deps.logger ?? createLogger({ verbose: args.verbose === true, write });
  const [command = "lookup"] = args._.map(String);

  if (args.help === true) {
    write(USAGE);
    return 0;
  }

  try {
    switch (command) {
      case "lookup": {
        const summary = await runLookup(args, deps, logger);
        summaryLines(summary).forEach((line) => write(line));
        return summary.interrupted ? 130 : 0;
      }
      case "report": {
        const result = await buildReport({
          dumpFile: required(args, "file"),
          crackedFile: required(args, "passwords"),
          outDir: str(args, "output") ?? ".",
          all: args.all === true,
          logger,
        });
        reportLines(result).forEach((line) => write(line));
        return 0;
      }
      case "split": {
        const files = await splitFile(
          required(args, "file"),
          required(args, "output"),
          splitLines(args),
          logger
        );
        logger.success(`Split into ${files.length} file(s)`);
        return 0;
      }
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (!(error instanceof AppError) || !error.fatal) throw error;

    logger.error(error.message);
    if (error instanceof UsageError) write(USAGE);
    return 1;
  }
}
