import { NOT_FOUND } from "./constants";
import {
  errorMessage,
  IncompleteResponseError,
  TransportError,
} from "./errors";
import { looksLike, sleep as defaultSleep } from "./helpers";
import { silentLogger, type Logger } from "./log";
import { Pacer } from "./pacer";
import type {
  Chunk,
  FetchLike,
  HashType,
  LookupConfig,
  LookupResult,
  ResultSet,
  Sleep,
} from "./types";

export interface LookupClientOpts {
  config: LookupConfig;
  fetch?: FetchLike;
  sleep?: Sleep;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ParsedResponse {
  results: ResultSet;
  incomplete: IncompleteResponseError | null;
}

/**
 * Parses the service's line format (`hash:password` or `hash:[not found]`).
 * The password is everything after the first colon. Every requested hash
 * gets a result, in request order; hashes the response leaves out become
 * not-found sentinels and are listed in `incomplete`.
 */
export function parseResponse(
  body: string,
  requested: readonly string[]
): ParsedResponse {
  const wanted = new Set(requested);
  const answers = new Map<string, LookupResult>();

  for (const raw of body.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    const sep = line.indexOf(":");
    if (sep < 0) continue;

    const hash = line.slice(0, sep).trim().toLowerCase();
    if (!wanted.has(hash) || answers.has(hash)) continue;

    const value = line.slice(sep + 1);
    answers.set(
      hash,
      value.trim() === NOT_FOUND
        ? { hash, status: "not-found" }
        : { hash, status: "found", password: value }
    );
  }

  const results: ResultSet = new Map();
  const missing: string[] = [];
  for (const hash of requested) {
    const answer = answers.get(hash);
    if (!answer) missing.push(hash);
    results.set(hash, answer ?? { hash, status: "not-found" });
  }

  return {
    results,
    incomplete:
      missing.length > 0 ? new IncompleteResponseError(missing) : null,
  };
}

const resultsFor = (
  hashes: readonly string[],
  status: "not-found" | "failed"
): ResultSet =>
  new Map(
    hashes.map((hash): [string, LookupResult] => [hash, { hash, status }])
  );

export class LookupClient {
  private readonly config: LookupConfig;
  private readonly fetch: FetchLike;
  private readonly logger: Logger;
  private readonly pacer: Pacer;

  constructor({
    config,
    fetch = globalThis.fetch,
    sleep = defaultSleep,
    signal,
    logger = silentLogger,
  }: LookupClientOpts) {
    this.config = config;
    this.fetch = fetch;
    this.logger = logger;
    this.pacer = new Pacer(config.pacingMs, sleep, signal);
  }

  /**
   * One paced POST per attempt. Transport failures are retried up to
   * `config.retries` times; when they run out every hash in the chunk
   * resolves to `failed`.
   */
  async lookupChunk(chunk: Chunk, type: HashType): Promise<ResultSet> {
    const hashes = chunk.records.map((r) => r.hash);
    const url = `${this.config.apiBaseUrl}?hashtype=${type}`;
    const attempts = this.config.retries + 1;
    const label = `Chunk ${chunk.index + 1}`;

    for (let attempt = 1; ; attempt++) {
      try {
        const body = await this.pacer.run(() =>
          this.request(url, {
            method: "POST",
            headers: { "Content-Type": "text/plain" },
            body: hashes.join("\n"),
          })
        );

        if (body === null) return resultsFor(hashes, "not-found");

        const { results, incomplete } = parseResponse(body, hashes);
        if (incomplete) {
          this.logger.warn(
            `${label}: ${incomplete.message}, recorded as not found`
          );
        }
        return results;
      } catch (error) {
        if (!(error instanceof TransportError)) throw error;

        this.logger.warn(
          `${label}: attempt ${attempt}/${attempts} failed: ${error.message}`
        );
        if (!error.retryable || attempt >= attempts) {
          this.logger.error(
            `${label}: giving up, ${hashes.length} hash(es) marked as failed`
          );
          return resultsFor(hashes, "failed");
        }
      }
    }
  }

  // Single lookups skip the pacer and are not retried
  async lookupSingle(value: string, type: HashType): Promise<LookupResult> {
    const hash = value.trim().toLowerCase();
    if (!looksLike(hash, type)) {
      this.logger.warn(
        `${hash} does not look like a ${type} hash, querying anyway`
      );
    }

    const { apiBaseUrl } = this.config;
    const url = `${apiBaseUrl}/${type}/${encodeURIComponent(hash)}`;

    try {
      const body = await this.request(url, { method: "GET" });
      if (body === null) return { hash, status: "not-found" };

      const { results, incomplete } = parseResponse(body, [hash]);
      if (incomplete) this.logger.warn(incomplete.message);
      return results.get(hash) ?? { hash, status: "not-found" };
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;

      this.logger.error(`Lookup of ${hash} failed: ${error.message}`);
      return { hash, status: "failed" };
    }
  }

  // Resolves to the body text, or null on 204 No Content
  private async request(
    url: string,
    init: RequestInit
  ): Promise<string | null> {
    this.logger.debug(`${init.method ?? "GET"} ${url}`);

    let response: Response;
    try {
      response = await this.fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(
        `Request failed: ${errorMessage(error)}`,
        null,
        true
      );
    }

    if (response.status === 204) return null;

    if (!response.ok) {
      const { status } = response;
      throw new TransportError(
        `Unexpected status code ${status}`,
        status,
        status === 429 || status >= 500
      );
    }

    try {
      return await response.text();
    } catch (error) {
      throw new TransportError(
        `Reading response failed: ${errorMessage(error)}`,
        response.status,
        true
      );
    }
  }
}
