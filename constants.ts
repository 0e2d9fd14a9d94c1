import type { HashType } from "./types";

export const API_BASE_URL = "https://ntlm.pw/api/lookup";

// The service rejects batches above this size
export const MAX_CHUNK_SIZE = 300;
export const PACING_MS = 5000;
export const REQUEST_TIMEOUT_MS = 30_000;
export const MAX_RETRIES = 2;

export const HASH_LENGTHS: Record<HashType, number> = {
  nt: 32,
  lm: 32,
  md5: 32,
  sha1: 40,
  sha256: 64,
};

export const HASH_TYPES: readonly HashType[] = [
  "nt",
  "lm",
  "md5",
  "sha1",
  "sha256",
];

export const NOT_FOUND = "[not found]";
export const LOOKUP_FAILED = "[lookup failed]";

export const BLANK_LM = "aad3b435b51404eeaad3b435b51404ee";
export const BLANK_NTLM = "31d6cfe0d16ae931b73c59d7e0c089c0";

export const SPLIT_LINES = 500;
