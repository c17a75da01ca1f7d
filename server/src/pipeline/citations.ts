import { createHash } from "node:crypto";
import { nowIso } from "./utils.js";
import { CITATION_ID_RE, type Citation } from "./schemas.js";

export const CITATION_ID_MAX = 999;

// A parenthesised group of one or more ids: (C001) or (C001, C002).
const CITATION_GROUP_RE = /\(\s*(C\d{3}(?:\s*,\s*C\d{3})*)\s*\)/g;

export function formatCitationId(n: number): string {
  if (!Number.isInteger(n) || n < 1 || n > CITATION_ID_MAX) {
    throw new RangeError(`Citation number out of range: ${n}`);
  }
  return `C${String(n).padStart(3, "0")}`;
}

export function isCitationId(value: string): boolean {
  return CITATION_ID_RE.test(value);
}

export function quoteHash(quote: string): string {
  return createHash("md5").update(quote, "utf8").digest("hex").slice(0, 16);
}

export function formatCitationGroup(cids: readonly string[]): string {
  return `(${cids.join(", ")})`;
}

/** Every citation id found inside a parenthesised group, in order of appearance. */
export function findCitationReferences(text: string): string[] {
  const out: string[] = [];
  for (const match of text.matchAll(CITATION_GROUP_RE)) {
    const body = match[1] ?? "";
    for (const part of body.split(",")) out.push(part.trim());
  }
  return out;
}

export type RegisterCitationInput = {
  url: string;
  title: string;
  locator?: string;
  quote?: string;
  localPath?: string;
  fetchedAt?: string;
};

/**
 * Per-run citation registry. Ids are `C001`..`C999`; the allocator continues
 * from the highest id ever registered, so out-of-order registration never
 * leads to reuse.
 */
export class CitationRegistry {
  private readonly ordered: Citation[] = [];
  private readonly byId = new Map<string, Citation>();
  private highest = 0;

  static fromSnapshot(citations: readonly Citation[]): CitationRegistry {
    const registry = new CitationRegistry();
    for (const c of citations) registry.insert({ ...c });
    return registry;
  }

  get size(): number {
    return this.ordered.length;
  }

  reset(): void {
    this.ordered.length = 0;
    this.byId.clear();
    this.highest = 0;
  }

  nextId(): string {
    const cid = formatCitationId(this.highest + 1);
    this.highest += 1;
    return cid;
  }

  register(cid: string, input: RegisterCitationInput): Citation {
    const citation: Citation = {
      cid,
      url: input.url,
      title: input.title,
      locator: input.locator ?? "",
      fetchedAt: input.fetchedAt ?? nowIso()
    };
    if (input.quote) citation.quoteHash = quoteHash(input.quote);
    if (input.localPath) citation.localPath = input.localPath;
    this.insert(citation);
    return citation;
  }

  /** Allocates the next id and registers under it. */
  add(input: RegisterCitationInput): Citation {
    return this.register(this.nextId(), input);
  }

  lookup(cid: string): Citation | null {
    return this.byId.get(cid) ?? null;
  }

  has(cid: string): boolean {
    return this.byId.has(cid);
  }

  all(): Citation[] {
    return this.ordered.map((c) => ({ ...c }));
  }

  findReferences(text: string): string[] {
    return findCitationReferences(text);
  }

  countValid(text: string): { valid: number; invalid: number } {
    const found = this.findReferences(text);
    const valid = found.filter((cid) => this.byId.has(cid)).length;
    return { valid, invalid: found.length - valid };
  }

  toJSON(): Citation[] {
    return this.all();
  }

  private insert(citation: Citation): void {
    if (!isCitationId(citation.cid)) throw new RangeError(`Malformed citation id: ${citation.cid}`);
    if (this.byId.has(citation.cid)) throw new Error(`Citation id already registered: ${citation.cid}`);
    this.ordered.push(citation);
    this.byId.set(citation.cid, citation);
    const n = Number(citation.cid.slice(1));
    if (n > this.highest) this.highest = n;
  }
}
