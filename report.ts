import { createReadStream } from "node:fs";
import {
  access,
  constants,
  mkdir,
  readFile,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { stringify } from "csv";
import chalk from "chalk";

import { BLANK_LM, BLANK_NTLM, HASH_LENGTHS } from "./constants";
import { ExtractionError } from "./errors";
import { looksLike, maskHash } from "./helpers";
import { silentLogger, type Logger } from "./log";
import type { CrackedAccount, Hash, ReportStats, WriteCsvOpts } from "./types";

export interface ReportOpts {
  dumpFile: string;
  crackedFile: string;
  outDir: string;
  // Include disabled accounts in the cracked sheet
  all?: boolean;
  logger?: Logger;
}

export interface ReportResult {
  stats: ReportStats;
  files: string[];
}

// domain\user:rid:lm:nt:::[ (status=Enabled)]
export function parseDumpLine(line: string): Hash | null {
  const s = line.trim().split(":");
  if (s.length < 4 || !s[0]) return null;

  const lm = s[2].toLowerCase();
  const ntlm = s[3].toLowerCase();
  if (!looksLike(ntlm, "nt") || (lm && lm.length !== HASH_LENGTHS.lm)) {
    return null;
  }

  const upn = s[0].split("\\");
  const domain = upn.length > 1 ? upn[0] : null;
  const user = upn.length > 1 ? upn.slice(1).join("\\") : upn[0];

  const status = s.slice(4).join(":");
  const enabled = status.includes("Enabled")
    ? true
    : status.includes("Disabled")
      ? false
      : null;

  return {
    domain,
    user,
    rid: s[1],
    lm,
    ntlm,
    enabled,
    isComputer: user.endsWith("$"),
  };
}

/**
 * Reads lookup output (`hash:password`, or `hash password`) into a map of
 * lowercase hash to password. Sentinel lines such as `[not found]` and empty
 * passwords are skipped.
 */
export function parseCrackedFile(text: string): Map<string, string> {
  const cracked = new Map<string, string>();

  for (const raw of text.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    const colon = line.indexOf(":");
    const sep = colon >= 0 ? colon : line.indexOf(" ");
    if (sep < 0) continue;

    const hash = line.slice(0, sep).trim().toLowerCase();
    const password = line.slice(sep + 1);
    const sentinel = password.startsWith("[") && password.endsWith("]");
    if (!hash || !password || sentinel) continue;

    cracked.set(hash, password);
  }

  return cracked;
}

const accountName = (h: Hash | CrackedAccount) =>
  h.domain ? `${h.domain}\\${h.user}` : h.user;

export function matchAccounts(
  accounts: readonly Hash[],
  cracked: ReadonlyMap<string, string>,
  all = false
): CrackedAccount[] {
  return accounts.reduce<CrackedAccount[]>((acc, account) => {
    if (!all && account.enabled === false) return acc;

    const password =
      cracked.get(account.ntlm) ??
      (account.lm && account.lm !== BLANK_LM
        ? cracked.get(account.lm)
        : undefined);

    if (password) {
      acc.push({ domain: account.domain, user: account.user, password });
    }
    return acc;
  }, []);
}

export function buildStats(
  accounts: readonly Hash[],
  cracked: readonly CrackedAccount[]
): ReportStats {
  const indexed = accounts.reduce<Record<string, string[]>>((rv, h) => {
    (rv[h.ntlm] = rv[h.ntlm] || []).push(accountName(h));
    return rv;
  }, {});

  const sharedHashes = Object.fromEntries(
    Object.entries(indexed)
      .filter(([, users]) => users.length > 1)
      .sort((a, b) => b[1].length - a[1].length)
  );

  return {
    accounts: accounts.length,
    enabledAccounts: accounts.filter((h) => h.enabled === true).length,
    disabledAccounts: accounts.filter((h) => h.enabled === false).length,
    computerAccounts: accounts.filter((h) => h.isComputer).length,
    blankPasswords: accounts.filter((h) => h.ntlm === BLANK_NTLM).length,
    lmHashes: accounts.filter((h) => h.lm && h.lm !== BLANK_LM).length,
    cracked: cracked.length,
    sharedHashes,
  };
}

const writeCSV = ({ records, columns, filename }: WriteCsvOpts) =>
  new Promise<void>((resolve, reject) =>
    stringify(records, { header: true, columns }, (err, output) => {
      if (err) return reject(err);
      writeFile(filename, output).then(resolve, reject);
    })
  );

async function readDump(file: string, logger: Logger): Promise<Hash[]> {
  const accounts: Hash[] = [];
  const dump = readline.createInterface({
    input: createReadStream(file, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });

  try {
    for await (const line of dump) {
      if (!line.trim()) continue;
      const hash = parseDumpLine(line);
      if (hash) accounts.push(hash);
      else logger.warn(`Malformed dump line skipped: ${line}`);
    }
  } finally {
    dump.close();
  }
  return accounts;
}

async function readInput<T>(file: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new ExtractionError(file, error);
  }
}

export async function buildReport({
  dumpFile,
  crackedFile,
  outDir,
  all = false,
  logger = silentLogger,
}: ReportOpts): Promise<ReportResult> {
  const crackedText = await readInput(crackedFile, () =>
    readFile(crackedFile, "utf-8")
  );
  // The stream would not report a missing file until it is iterated
  await readInput(dumpFile, () => access(dumpFile, constants.R_OK));

  logger.info(`Parsing hash file: ${dumpFile}`);
  const accounts = await readInput(dumpFile, () => readDump(dumpFile, logger));
  logger.info(`Found ${accounts.length} account(s)`);

  const cracked = parseCrackedFile(crackedText);
  logger.info(`Found ${cracked.size} cracked password(s) in ${crackedFile}`);

  const matched = matchAccounts(accounts, cracked, all);
  const stats = buildStats(accounts, matched);

  await mkdir(outDir, { recursive: true });
  const allHashes = path.join(outDir, "all_hashes.csv");
  const crackedCsv = path.join(outDir, "cracked_passwords.csv");

  await writeCSV({
    filename: allHashes,
    columns: ["Domain", "Username", "RID", "LM Hash", "NT Hash", "Enabled"],
    records: accounts.map((h) => [
      h.domain ?? "",
      h.user,
      h.rid,
      h.lm,
      h.ntlm,
      h.enabled === null ? "" : String(h.enabled),
    ]),
  });

  await writeCSV({
    filename: crackedCsv,
    columns: ["Domain", "Username", "Password"],
    records: matched.map((c) => [c.domain ?? "", c.user, c.password]),
  });

  return { stats, files: [allHashes, crackedCsv] };
}

export function reportLines({ stats, files }: ReportResult): string[] {
  const red = chalk.bold.red;
  const green = chalk.bold.green;
  const yellow = chalk.bold.yellow;
  const white = chalk.bold.white;
  const shared = Object.entries(stats.sharedHashes);

  return [
    white(`\nTotal Accounts:\t\t${stats.accounts}`),
    white(`Enabled Accounts:\t${stats.enabledAccounts}`),
    white(`Disabled Accounts:\t${stats.disabledAccounts}`),
    white(`Computer Accounts:\t${stats.computerAccounts}`),
    (stats.lmHashes > 0 ? red : green)(`\nLM Hashes:\t\t${stats.lmHashes}`),
    (stats.blankPasswords > 0 ? red : green)(
      `Blank Passwords:\t${stats.blankPasswords}`
    ),
    (stats.cracked > 0 ? red : green)(`Cracked Accounts:\t${stats.cracked}`),
    (shared.length > 0 ? red : green)(`Shared Hashes:\t\t${shared.length}`),
    ...shared.map(([hash, users]) =>
      white(`\t${maskHash(hash)}  ${users.length}`)
    ),
    ...files.map((f) => yellow(`\nCSV output to ${f}`)),
  ];
}
