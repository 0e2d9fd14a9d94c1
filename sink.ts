import { closeSync, openSync, writeSync } from "node:fs";
import chalk from "chalk";

import { OutputWriteError } from "./errors";
import { formatResultLine } from "./helpers";
import { silentLogger, type Logger } from "./log";
import type { LookupResult, ResultCounts, ResultSet } from "./types";

export type Emit = (line: string, result: LookupResult) => void;

export interface ResultSinkOpts {
  output?: string;
  append?: boolean;
  emit?: Emit;
  logger?: Logger;
}

const colours = {
  found: chalk.green,
  "not-found": chalk.white,
  failed: chalk.red,
} as const;

export const printResult: Emit = (line, result) =>
  process.stdout.write(colours[result.status](line) + "\n");

/**
 * Receives every resolved hash once, in input order. Each line is printed
 * and, with an output file, written straight through with one write per
 * line, so an interrupted run leaves only whole lines on disk.
 */
export class ResultSink {
  private readonly set: ResultSet = new Map();
  private readonly tally: ResultCounts = {
    total: 0,
    found: 0,
    notFound: 0,
    failed: 0,
  };
  private readonly emit: Emit;
  private readonly logger: Logger;
  private fd: number | null = null;
  private broken = false;

  readonly output: string | undefined;

  constructor({
    output,
    append = false,
    emit = printResult,
    logger = silentLogger,
  }: ResultSinkOpts = {}) {
    this.output = output;
    this.emit = emit;
    this.logger = logger;

    if (!output) return;
    try {
      this.fd = openSync(output, append ? "a" : "w");
    } catch (error) {
      this.degrade(new OutputWriteError(output, error));
    }
  }

  get outputPath(): string | null {
    return this.output && !this.broken ? this.output : null;
  }

  record(result: LookupResult) {
    if (this.set.has(result.hash)) {
      this.logger.warn(
        `${result.hash} was already recorded, ignoring the repeat`
      );
      return;
    }

    this.set.set(result.hash, result);
    this.tally.total++;
    if (result.status === "found") this.tally.found++;
    else if (result.status === "not-found") this.tally.notFound++;
    else this.tally.failed++;

    const line = formatResultLine(result);
    this.emit(line, result);
    this.persist(line);
  }

  counts(): ResultCounts {
    return { ...this.tally };
  }

  results(): ResultSet {
    return new Map(this.set);
  }

  close() {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      if (this.output) {
        this.logger.warn(new OutputWriteError(this.output, error).message);
      }
    }
  }

  private persist(line: string) {
    if (this.fd === null || !this.output) return;
    try {
      writeSync(this.fd, line + "\n");
    } catch (error) {
      this.degrade(new OutputWriteError(this.output, error));
    }
  }

  private degrade(error: OutputWriteError) {
    this.broken = true;
    this.logger.warn(`${error.message}; continuing with terminal output only`);
    this.close();
  }
}
