import Fuse, { type IFuseOptions } from "fuse.js";
import type { Catalog } from "./catalog.js";
import { InvalidQueryError } from "./errors.js";
import type { SearchEntry, SearchIndexFile, Track } from "./types.js";

const EDGE_PUNCTUATION = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;

export function normalizeToken(token: string): string {
  return token.toLowerCase().replace(EDGE_PUNCTUATION, "");
}

/**
 * Split on whitespace, lowercase, and strip surrounding punctuation.
 */
export function tokenize(text: string): string[] {
  return text
    .split(/\s+/u)
    .map(normalizeToken)
    .filter((token) => token.length > 0);
}

function toEntry(track: Track): SearchEntry {
  return {
    title: track.title,
    artist: track.artist,
    album: track.album,
    genre: track.genre,
    year: track.year,
    length: track.length,
    url: track.url,
    searchContent: track.searchContent,
  };
}

const FUSE_OPTIONS: IFuseOptions<SearchEntry> = {
  keys: [
    { name: "title", weight: 2 },
    { name: "artist", weight: 1.5 },
    { name: "album", weight: 1 },
    { name: "genre", weight: 0.5 },
  ],
  threshold: 0.3,
  minMatchCharLength: 2,
};

export interface SearchIndexOptions {
  includeComments?: boolean;
}

/**
 * Inverted index from normalized token to track urls. It only holds
 * back-references; track data stays in the catalog.
 */
export class SearchIndex {
  private readonly postings = new Map<string, Set<string>>();
  private readonly entries = new Map<string, SearchEntry>();
  private fuse: Fuse<SearchEntry> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly options: SearchIndexOptions = {}) {}

  /**
   * Index every track of the catalog and follow its later changes until
   * `detach()` is called.
   */
  static build(catalog: Catalog, options: SearchIndexOptions = {}): SearchIndex {
    const index = new SearchIndex(options);
    for (const track of catalog.all()) index.add(track);
    index.unsubscribe = catalog.subscribe((change) => {
      if (change.type === "insert") index.add(change.track);
      else index.remove(change.url);
    });
    return index;
  }

  /** Stop following the catalog. The indexed content is kept. */
  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  get size(): number {
    return this.entries.size;
  }

  add(track: Track): void {
    this.remove(track.url);
    const text = this.options.includeComments
      ? `${track.searchContent} ${track.comments}`
      : track.searchContent;

    for (const token of tokenize(text)) {
      let refs = this.postings.get(token);
      if (!refs) {
        refs = new Set();
        this.postings.set(token, refs);
      }
      refs.add(track.url);
    }

    this.entries.set(track.url, toEntry(track));
    this.fuse = null;
  }

  remove(url: string): void {
    if (!this.entries.delete(url)) return;
    for (const [token, refs] of this.postings) {
      refs.delete(url);
      if (refs.size === 0) this.postings.delete(token);
    }
    this.fuse = null;
  }

  lookup(token: string): Set<string> {
    return new Set(this.postings.get(normalizeToken(token)));
  }

  prefixSearch(prefix: string): Set<string> {
    const trimmed = prefix.trim();
    if (trimmed === "") throw new InvalidQueryError(prefix, "empty prefix");
    if (/\s/u.test(trimmed)) throw new InvalidQueryError(prefix, "prefix must be a single token");
    const normalized = normalizeToken(trimmed);
    if (!normalized) throw new InvalidQueryError(prefix, "prefix has no searchable characters");

    const matched = new Set<string>();
    for (const [token, refs] of this.postings) {
      if (token.startsWith(normalized)) refs.forEach((url) => matched.add(url));
    }
    return this.inIndexOrder(matched);
  }

  /**
   * Typo-tolerant search over title, artist, album and genre.
   */
  fuzzySearch(query: string, limit = 30): string[] {
    const trimmed = query.trim();
    if (trimmed === "") throw new InvalidQueryError(query, "empty query");
    if (trimmed.length < 2) return [];

    if (!this.fuse) this.fuse = new Fuse([...this.entries.values()], FUSE_OPTIONS);
    return this.fuse.search(trimmed, { limit }).map((result) => result.item.url);
  }

  tokens(): string[] {
    return [...this.postings.keys()].sort();
  }

  toJSON(): SearchIndexFile {
    const tokens: Record<string, string[]> = {};
    for (const token of this.tokens()) {
      const refs = this.postings.get(token);
      if (refs) tokens[token] = [...this.inIndexOrder(refs)];
    }
    return { version: 1, tokens, entries: [...this.entries.values()] };
  }

  private inIndexOrder(urls: Set<string>): Set<string> {
    return new Set([...this.entries.keys()].filter((url) => urls.has(url)));
  }
}
