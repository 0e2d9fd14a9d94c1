export type HashType = "nt" | "lm" | "md5" | "sha1" | "sha256";

export interface HashRecord {
  readonly hash: string;
  readonly type: HashType;
}

export interface Chunk {
  readonly index: number;
  readonly records: readonly HashRecord[];
}

export type LookupStatus = "found" | "not-found" | "failed";

export interface LookupResult {
  hash: string;
  status: LookupStatus;
  password?: string;
}

export type ResultSet = Map<string, LookupResult>;

export interface ResultCounts {
  total: number;
  found: number;
  notFound: number;
  failed: number;
}

export interface LookupSummary extends ResultCounts {
  chunksTotal: number;
  chunksCompleted: number;
  interrupted: boolean;
  outputPath: string | null;
}

export interface LookupConfig {
  apiBaseUrl: string;
  chunkSize: number;
  pacingMs: number;
  timeoutMs: number;
  retries: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// One account line of a secretsdump / pwdump style dump
export interface Hash {
  domain: string | null;
  user: string;
  rid: string;
  lm: string;
  ntlm: string;
  enabled: boolean | null;
  isComputer: boolean;
}

export interface CrackedAccount {
  domain: string | null;
  user: string;
  password: string;
}

export interface ReportStats {
  accounts: number;
  enabledAccounts: number;
  disabledAccounts: number;
  computerAccounts: number;
  blankPasswords: number;
  lmHashes: number;
  cracked: number;
  // NT hash -> accounts sharing it, only hashes used more than once
  sharedHashes: Record<string, string[]>;
}

export interface WriteCsvOpts {
  records: string[][];
  columns: string[];
  filename: string;
}
