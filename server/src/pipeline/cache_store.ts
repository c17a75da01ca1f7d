import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { atomicWrite, cacheRootAbs, ensureDir, isSafeArtifactName, nowIso } from "./utils.js";

const CACHE_FILE_EXT = ".json";

export type CacheRecord<T> = {
  key: string;
  cachedAt: string;
  payload: T;
};

export type CacheInfo = {
  key: string;
  cachedAt: string;
  entryCount: number | null;
};

export type CacheCorruptionReason = "unreadable" | "key_mismatch" | "invalid_payload";

export type CacheStoreOptions = {
  /** Defaults to `DEEPCITE_CACHE_DIR`, read at call time. */
  dir?: string;
  /** Called when a stored entry cannot be trusted; the read is then a miss. */
  onCorrupt?: (key: string, reason: CacheCorruptionReason) => void;
};

const EnvelopeSchema = z.object({
  key: z.string(),
  cachedAt: z.string(),
  payload: z.unknown()
});

/**
 * Keyed blob store on disk, one JSON file per key. Every record embeds its own
 * key so a file that was copied or renamed under the wrong name reads as a miss.
 */
export class CacheStore<T> {
  constructor(
    private readonly payloadSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: CacheStoreOptions = {}
  ) {}

  dir(): string {
    return this.options.dir ?? cacheRootAbs();
  }

  async put(key: string, payload: T): Promise<CacheRecord<T>> {
    const record: CacheRecord<T> = { key, cachedAt: nowIso(), payload };
    await atomicWrite(this.pathFor(key), `${JSON.stringify(record, null, 2)}\n`);
    return record;
  }

  async get(key: string): Promise<T | null> {
    const record = await this.getRecord(key);
    return record ? record.payload : null;
  }

  async getRecord(key: string): Promise<CacheRecord<T> | null> {
    const filePath = this.pathFor(key);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch {
      return null;
    }

    let envelope: z.infer<typeof EnvelopeSchema>;
    try {
      const parsed = EnvelopeSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) return this.corrupt(key, "unreadable");
      envelope = parsed.data;
    } catch {
      return this.corrupt(key, "unreadable");
    }

    if (envelope.key !== key) return this.corrupt(key, "key_mismatch");

    const payload = this.payloadSchema.safeParse(envelope.payload);
    if (!payload.success) return this.corrupt(key, "invalid_payload");

    return { key: envelope.key, cachedAt: envelope.cachedAt, payload: payload.data };
  }

  async has(key: string): Promise<boolean> {
    try {
      const st = await fs.stat(this.pathFor(key));
      return st.isFile();
    } catch {
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    const filePath = this.pathFor(key);
    if (!(await this.has(key))) return false;
    await fs.rm(filePath, { force: true });
    return true;
  }

  async listKeys(): Promise<string[]> {
    await ensureDir(this.dir());
    const entries = await fs.readdir(this.dir(), { withFileTypes: true });
    return entries
      .filter((ent) => ent.isFile() && ent.name.endsWith(CACHE_FILE_EXT))
      .map((ent) => ent.name.slice(0, -CACHE_FILE_EXT.length))
      .sort((a, b) => a.localeCompare(b));
  }

  async info(key: string): Promise<CacheInfo | null> {
    const record = await this.getRecord(key);
    if (!record) return null;
    return {
      key: record.key,
      cachedAt: record.cachedAt,
      entryCount: Array.isArray(record.payload) ? record.payload.length : null
    };
  }

  async clear(): Promise<number> {
    const keys = await this.listKeys();
    for (const key of keys) await fs.rm(this.pathFor(key), { force: true });
    return keys.length;
  }

  private pathFor(key: string): string {
    if (!isSafeArtifactName(key)) throw new RangeError(`Invalid cache key: ${key}`);
    return path.join(this.dir(), `${key}${CACHE_FILE_EXT}`);
  }

  private corrupt(key: string, reason: CacheCorruptionReason): null {
    this.options.onCorrupt?.(key, reason);
    return null;
  }
}
