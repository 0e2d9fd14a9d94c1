import {
  API_BASE_URL,
  MAX_CHUNK_SIZE,
  MAX_RETRIES,
  PACING_MS,
  REQUEST_TIMEOUT_MS,
} from "./constants";
import { UsageError } from "./errors";
import type { LookupConfig } from "./types";

export const defaultConfig: LookupConfig = {
  apiBaseUrl: API_BASE_URL,
  chunkSize: MAX_CHUNK_SIZE,
  pacingMs: PACING_MS,
  timeoutMs: REQUEST_TIMEOUT_MS,
  retries: MAX_RETRIES,
};

function intSetting(
  name: string,
  raw: string | number | undefined,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  if (raw === undefined || raw === "") return fallback;

  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    const range =
      max === Number.MAX_SAFE_INTEGER
        ? `of at least ${min}`
        : `between ${min} and ${max}`;
    throw new UsageError(`${name} must be an integer ${range}, got "${raw}"`);
  }
  return value;
}

/**
 * Environment variables override the defaults, `--chunk-size` overrides
 * the environment. Pacing can be raised but never set below `PACING_MS`.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { chunkSize?: string | number } = {}
): LookupConfig {
  const apiBaseUrl = (env.HASHLOOK_API_URL ?? defaultConfig.apiBaseUrl).replace(
    /\/+$/,
    ""
  );
  if (!/^https?:\/\//.test(apiBaseUrl)) {
    throw new UsageError(
      `HASHLOOK_API_URL must be an http(s) URL, got "${apiBaseUrl}"`
    );
  }

  return {
    apiBaseUrl,
    chunkSize: intSetting(
      "--chunk-size",
      overrides.chunkSize,
      defaultConfig.chunkSize,
      1,
      MAX_CHUNK_SIZE
    ),
    pacingMs: intSetting(
      "HASHLOOK_PACING_MS",
      env.HASHLOOK_PACING_MS,
      defaultConfig.pacingMs,
      PACING_MS
    ),
    timeoutMs: intSetting(
      "HASHLOOK_TIMEOUT_MS",
      env.HASHLOOK_TIMEOUT_MS,
      defaultConfig.timeoutMs,
      1
    ),
    retries: intSetting(
      "HASHLOOK_RETRIES",
      env.HASHLOOK_RETRIES,
      defaultConfig.retries,
      0,
      10
    ),
  };
}
