import { readFileSync, writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ExtractionError } from "../errors";
import { bulkLookup, singleLookup, summaryLines } from "../lookup";
import type { LookupConfig, Sleep } from "../types";
import {
  collectLines,
  fakeService,
  makeHash,
  makeHashes,
  recordingLogger,
  tempDir,
} from "./fakes";

const config: LookupConfig = {
  apiBaseUrl: "https://lookup.test/api/lookup",
  chunkSize: 300,
  pacingMs: 5000,
  timeoutMs: 1000,
  retries: 2,
};

describe("bulkLookup", () => {
  let tmp: ReturnType<typeof tempDir>;
  beforeEach(() => {
    tmp = tempDir();
  });
  afterEach(() => tmp.cleanup());

  const writeDump = (hashes: string[]) => {
    const file = tmp.file("dump.txt");
    const lines = hashes.map((h, i) => `user${i}:${h}`);
    writeFileSync(file, lines.join("\n") + "\n");
    return file;
  };

  it("looks up 700 hashes in three paced chunks, in input order", async () => {
    const hashes = makeHashes(700);
    const service = fakeService(
      { [hashes[0]]: "alpha", [hashes[650]]: "omega" },
      { latency: 120 }
    );
    const live = collectLines();
    const output = tmp.file("results.txt");

    const summary = await bulkLookup({
      file: writeDump(hashes),
      type: "nt",
      config,
      output,
      fetch: service.fetch,
      sleep: service.sleep,
      emit: live.emit,
    });

    const { requests } = service;
    expect(requests.map((r) => r.hashes.length)).toEqual([300, 300, 100]);
    expect(service.sleeps).toEqual([5000, 5000]);
    for (let i = 1; i < requests.length; i++) {
      const gap = requests[i].startedAt - requests[i - 1].endedAt;
      expect(gap).toBeGreaterThanOrEqual(5000);
    }

    expect(live.results.map((r) => r.hash)).toEqual(hashes);
    expect(live.lines[0]).toBe(`${hashes[0]}:alpha`);
    expect(live.lines[650]).toBe(`${hashes[650]}:omega`);
    expect(live.lines[1]).toBe(`${hashes[1]}:[not found]`);
    expect(readFileSync(output, "utf-8")).toBe(live.lines.join("\n") + "\n");

    expect(summary).toEqual({
      total: 700,
      found: 2,
      notFound: 698,
      failed: 0,
      chunksTotal: 3,
      chunksCompleted: 3,
      interrupted: false,
      outputPath: output,
    });
  });

  it("marks a chunk failed after its retries and moves on", async () => {
    const hashes = makeHashes(7);
    const service = fakeService(
      { [hashes[0]]: "one", [hashes[6]]: "seven" },
      {
        override: (call) =>
          call >= 2 && call <= 4
            ? new Response("unavailable", { status: 503 })
            : undefined,
      }
    );
    const live = collectLines();

    const summary = await bulkLookup({
      file: writeDump(hashes),
      type: "nt",
      config: { ...config, chunkSize: 3 },
      fetch: service.fetch,
      sleep: service.sleep,
      emit: live.emit,
    });

    expect(service.requests.map((r) => r.hashes)).toEqual([
      hashes.slice(0, 3),
      hashes.slice(3, 6),
      hashes.slice(3, 6),
      hashes.slice(3, 6),
      hashes.slice(6),
    ]);
    expect(service.sleeps).toEqual([5000, 5000, 5000, 5000]);
    expect(live.lines).toEqual([
      `${hashes[0]}:one`,
      `${hashes[1]}:[not found]`,
      `${hashes[2]}:[not found]`,
      `${hashes[3]}:[lookup failed]`,
      `${hashes[4]}:[lookup failed]`,
      `${hashes[5]}:[lookup failed]`,
      `${hashes[6]}:seven`,
    ]);
    expect(summary).toMatchObject({
      total: 7,
      found: 2,
      notFound: 2,
      failed: 3,
      chunksCompleted: 3,
    });
  });

  it("deduplicates the dump and writes the extracted list", async () => {
    const a = makeHash(0xabcdef);
    const b = makeHash(0xfedcba);
    const file = tmp.file("dump.txt");
    writeFileSync(file, `${a}\n${b.toUpperCase()}\n${a}\n`);
    const extracted = tmp.file("extracted.txt");
    const service = fakeService({});

    const summary = await bulkLookup({
      file,
      type: "nt",
      config,
      extracted,
      fetch: service.fetch,
      sleep: service.sleep,
      emit: collectLines().emit,
    });

    expect(readFileSync(extracted, "utf-8")).toBe(`${a}\n${b}\n`);
    expect(service.requests).toHaveLength(1);
    expect(summary.total).toBe(2);
  });

  it("reports progress per extracted hash and per chunk", async () => {
    const [a, b] = makeHashes(2);
    const file = tmp.file("dump.txt");
    writeFileSync(file, `${a}\n${b}\n${a}\n`);
    const service = fakeService({});
    const { logger, messages } = recordingLogger();

    await bulkLookup({
      file,
      type: "nt",
      config: { ...config, chunkSize: 1 },
      fetch: service.fetch,
      sleep: service.sleep,
      emit: collectLines().emit,
      logger,
    });

    expect(
      messages.filter((m) => m.level === "info").map((m) => m.message)
    ).toEqual([
      `Extracting nt hashes from ${file}`,
      `[+] ${a}`,
      `[+] ${b}`,
      "Extracted 2 unique nt hash(es)",
      "Chunk 1/2: looking up 1 hash(es)",
      "Chunk 2/2: looking up 1 hash(es)",
    ]);
    expect(messages.filter((m) => m.level === "debug")).toEqual([
      {
        level: "debug",
        message: "POST https://lookup.test/api/lookup?hashtype=nt",
      },
      {
        level: "debug",
        message: "POST https://lookup.test/api/lookup?hashtype=nt",
      },
    ]);
  });

  it("makes no requests when the input holds no hashes", async () => {
    const file = tmp.file("empty.txt");
    writeFileSync(file, "nothing to see\n");
    const service = fakeService({});

    const summary = await bulkLookup({
      file,
      type: "sha1",
      config,
      fetch: service.fetch,
      sleep: service.sleep,
    });

    expect(service.requests).toEqual([]);
    expect(summary).toMatchObject({
      total: 0,
      chunksTotal: 0,
      chunksCompleted: 0,
      interrupted: false,
    });
  });

  it("fails before any request when the input is missing", async () => {
    const service = fakeService({});

    await expect(
      bulkLookup({
        file: tmp.file("nope.txt"),
        type: "nt",
        config,
        fetch: service.fetch,
      })
    ).rejects.toBeInstanceOf(ExtractionError);
    expect(service.requests).toEqual([]);
  });

  it("stops between chunks once interrupted, keeping results", async () => {
    const hashes = makeHashes(9);
    const controller = new AbortController();
    const service = fakeService({});
    const output = tmp.file("results.txt");
    const live = collectLines();

    const summary = await bulkLookup({
      file: writeDump(hashes),
      type: "nt",
      config: { ...config, chunkSize: 3 },
      output,
      signal: controller.signal,
      fetch: service.fetch,
      sleep: service.sleep,
      emit: (line, result) => {
        live.emit(line, result);
        controller.abort();
      },
    });

    expect(service.requests).toHaveLength(1);
    expect(live.lines).toHaveLength(3);
    const saved = readFileSync(output, "utf-8").split("\n").filter(Boolean);
    expect(saved).toHaveLength(3);
    expect(summary).toMatchObject({
      total: 3,
      chunksTotal: 3,
      chunksCompleted: 1,
      interrupted: true,
    });
  });

  it("stops when interrupted during the pacing wait", async () => {
    const hashes = makeHashes(6);
    const controller = new AbortController();
    const service = fakeService({});
    const sleep: Sleep = async () => {
      controller.abort();
      throw new Error("The operation was aborted");
    };

    const summary = await bulkLookup({
      file: writeDump(hashes),
      type: "nt",
      config: { ...config, chunkSize: 3 },
      signal: controller.signal,
      fetch: service.fetch,
      sleep,
      emit: collectLines().emit,
    });

    expect(service.requests).toHaveLength(1);
    expect(summary).toMatchObject({
      total: 3,
      chunksCompleted: 1,
      interrupted: true,
    });
  });
});

describe("singleLookup", () => {
  let tmp: ReturnType<typeof tempDir>;
  beforeEach(() => {
    tmp = tempDir();
  });
  afterEach(() => tmp.cleanup());

  it("prints and saves the result line for one hash", async () => {
    const hash = "66sd423103a39234df59ff82134ccfb20";
    const service = fakeService({ [hash]: "$ecureP@ssw112" });
    const live = collectLines();
    const output = tmp.file("single.txt");

    const summary = await singleLookup({
      hash,
      type: "nt",
      config,
      output,
      fetch: service.fetch,
      emit: live.emit,
    });

    const line = "66sd423103a39234df59ff82134ccfb20:$ecureP@ssw112";
    expect(live.lines).toEqual([line]);
    expect(readFileSync(output, "utf-8")).toBe(line + "\n");
    expect(service.sleeps).toEqual([]);
    expect(summary).toEqual({
      total: 1,
      found: 1,
      notFound: 0,
      failed: 0,
      chunksTotal: 0,
      chunksCompleted: 0,
      interrupted: false,
      outputPath: output,
    });
  });
});

describe("summaryLines", () => {
  it("lists counts and chunk progress", () => {
    const lines = summaryLines({
      total: 5,
      found: 2,
      notFound: 2,
      failed: 1,
      chunksTotal: 2,
      chunksCompleted: 1,
      interrupted: true,
      outputPath: null,
    });

    expect(lines).toHaveLength(5);
    expect(lines[4]).toContain("Chunks:\t\t1/2");
  });
});
