import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { CacheStore, type CacheCorruptionReason } from "../src/pipeline/cache_store.js";
import { FetchedDocumentListSchema, type FetchedDocument } from "../src/pipeline/schemas.js";

const doc: FetchedDocument = {
  url: "https://example.com/a",
  title: "A",
  content: "Alpha content.",
  fetchedAt: "2026-01-01T00:00:00.000Z"
};

let dir: string;
let corruptions: Array<[string, CacheCorruptionReason]>;
let store: CacheStore<FetchedDocument[]>;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "deepcite-cache-"));
  corruptions = [];
  store = new CacheStore(FetchedDocumentListSchema, {
    dir,
    onCorrupt: (key, reason) => corruptions.push([key, reason])
  });
});

afterEach(async () => {
  delete process.env.DEEPCITE_CACHE_DIR;
  await fs.rm(dir, { recursive: true, force: true });
});

describe("CacheStore", () => {
  it("stores a record that embeds its own key", async () => {
    const record = await store.put("run-1", [doc]);
    expect(record.key).toBe("run-1");
    expect(record.payload).toEqual([doc]);

    const onDisk = JSON.parse(await fs.readFile(path.join(dir, "run-1.json"), "utf8"));
    expect(onDisk).toEqual({ key: "run-1", cachedAt: record.cachedAt, payload: [doc] });
    expect(await store.get("run-1")).toEqual([doc]);
    expect(await store.has("run-1")).toBe(true);
  });

  it("returns null for a missing key without reporting corruption", async () => {
    expect(await store.get("absent")).toBeNull();
    expect(await store.has("absent")).toBe(false);
    expect(corruptions).toEqual([]);
  });

  it("treats an empty list as a stored value", async () => {
    await store.put("empty", []);
    expect(await store.get("empty")).toEqual([]);
  });

  it("reports a record stored under another key as corrupt and misses", async () => {
    await store.put("original", [doc]);
    await fs.copyFile(path.join(dir, "original.json"), path.join(dir, "copied.json"));

    expect(await store.get("copied")).toBeNull();
    expect(corruptions).toEqual([["copied", "key_mismatch"]]);
  });

  it("reports unparsable JSON and foreign envelopes as unreadable", async () => {
    await fs.writeFile(path.join(dir, "torn.json"), '{"key":"torn","cac', "utf8");
    await fs.writeFile(path.join(dir, "foreign.json"), '{"hello":"world"}', "utf8");

    expect(await store.get("torn")).toBeNull();
    expect(await store.get("foreign")).toBeNull();
    expect(corruptions).toEqual([
      ["torn", "unreadable"],
      ["foreign", "unreadable"]
    ]);
  });

  it("reports payloads that fail the schema", async () => {
    await fs.writeFile(
      path.join(dir, "bad.json"),
      JSON.stringify({ key: "bad", cachedAt: "2026-01-01T00:00:00.000Z", payload: [{ url: 1 }] }),
      "utf8"
    );
    expect(await store.get("bad")).toBeNull();
    expect(corruptions).toEqual([["bad", "invalid_payload"]]);
  });

  it("lists, describes, deletes and clears entries", async () => {
    await store.put("b-run", [doc, doc]);
    await store.put("a-run", [doc]);
    await fs.writeFile(path.join(dir, "notes.txt"), "ignored", "utf8");

    expect(await store.listKeys()).toEqual(["a-run", "b-run"]);
    expect(await store.info("b-run")).toMatchObject({ key: "b-run", entryCount: 2 });
    expect(await store.info("missing")).toBeNull();

    expect(await store.delete("a-run")).toBe(true);
    expect(await store.delete("a-run")).toBe(false);
    expect(await store.listKeys()).toEqual(["b-run"]);

    expect(await store.clear()).toBe(1);
    expect(await store.listKeys()).toEqual([]);
  });

  it("reports a null entry count for non-list payloads", async () => {
    const blobs = new CacheStore(z.object({ n: z.number() }), { dir });
    await blobs.put("blob", { n: 1 });
    expect(await blobs.info("blob")).toMatchObject({ key: "blob", entryCount: null });
  });

  it("rejects keys that are not safe file names", async () => {
    await expect(store.put("../escape", [doc])).rejects.toBeInstanceOf(RangeError);
    await expect(store.get("a/b")).rejects.toThrow("Invalid cache key: a/b");
  });

  it("defaults to DEEPCITE_CACHE_DIR, read at call time", async () => {
    const unconfigured = new CacheStore(FetchedDocumentListSchema);
    process.env.DEEPCITE_CACHE_DIR = dir;
    expect(unconfigured.dir()).toBe(dir);
    await unconfigured.put("env-run", [doc]);
    expect(await store.get("env-run")).toEqual([doc]);
  });
});
