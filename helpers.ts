import { setTimeout as delay } from "node:timers/promises";

import {
  HASH_LENGTHS,
  HASH_TYPES,
  LOOKUP_FAILED,
  NOT_FOUND,
} from "./constants";
import { InvalidHashType } from "./errors";
import type { HashType, LookupResult, Sleep } from "./types";

export const maskHash = (hash: string) =>
  hash.slice(0, 4) + "*".repeat(14) + hash.slice(28);

export const isHexChar = (c: string) =>
  (c >= "0" && c <= "9") || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");

export const isWordChar = (c: string) =>
  isHexChar(c) || (c >= "g" && c <= "z") || (c >= "G" && c <= "Z") || c === "_";

export function parseHashType(value: string): HashType {
  const type = HASH_TYPES.find((t) => t === value.trim().toLowerCase());
  if (!type) throw new InvalidHashType(value);
  return type;
}

export const looksLike = (hash: string, type: HashType) =>
  hash.length === HASH_LENGTHS[type] && [...hash].every(isHexChar);

export function formatResultLine(result: LookupResult): string {
  switch (result.status) {
    case "found":
      return `${result.hash}:${result.password ?? ""}`;
    case "not-found":
      return `${result.hash}:${NOT_FOUND}`;
    case "failed":
      return `${result.hash}:${LOOKUP_FAILED}`;
  }
}

export const sleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });
