import { DuplicateUrlError, TrackNotFoundError } from "./errors.js";
import type { Track } from "./types.js";

export type CatalogChange = { type: "insert"; track: Track } | { type: "remove"; url: string };

export type CatalogListener = (change: CatalogChange) => void;

/**
 * Ordered, url-keyed collection of tracks for one build. Tracks are never
 * mutated in place; an update is a remove followed by an insert.
 */
export class Catalog {
  private readonly tracks = new Map<string, Track>();
  private readonly listeners = new Set<CatalogListener>();

  get size(): number {
    return this.tracks.size;
  }

  insert(track: Track): void {
    const existing = this.tracks.get(track.url);
    if (existing) throw new DuplicateUrlError(track.url, existing.source, track.source);
    this.tracks.set(track.url, track);
    this.listeners.forEach((listener) => listener({ type: "insert", track }));
  }

  has(url: string): boolean {
    return this.tracks.has(url);
  }

  find(url: string): Track | undefined {
    return this.tracks.get(url);
  }

  get(url: string): Track {
    const track = this.tracks.get(url);
    if (!track) throw new TrackNotFoundError(url);
    return track;
  }

  remove(url: string): Track {
    const track = this.get(url);
    this.tracks.delete(url);
    this.listeners.forEach((listener) => listener({ type: "remove", url }));
    return track;
  }

  /**
   * Swap in a new version of a track. The replacement goes to the end of the
   * iteration order, as any fresh insert would.
   */
  replace(url: string, track: Track): void {
    if (track.url !== url && this.tracks.has(track.url)) {
      const existing = this.get(track.url);
      throw new DuplicateUrlError(track.url, existing.source, track.source);
    }
    this.remove(url);
    this.insert(track);
  }

  all(): Iterable<Track> {
    return this.select(() => true);
  }

  byAlbum(album: string): Iterable<Track> {
    return this.select((track) => track.album === album);
  }

  byArtist(artist: string): Iterable<Track> {
    return this.select((track) => track.artist === artist);
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Each iteration walks the live map again, so results are never stale.
  private select(predicate: (track: Track) => boolean): Iterable<Track> {
    const tracks = this.tracks;
    return {
      *[Symbol.iterator]() {
        for (const track of tracks.values()) {
          if (predicate(track)) yield track;
        }
      },
    };
  }
}
