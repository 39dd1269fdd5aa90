import type { Catalog } from "./catalog.js";
import type { CatalogStats, Track, TrackFields, TrackSortKey } from "./types.js";

/** An album is one artist's release; the same name by two artists is two albums. */
export type AlbumRef = Pick<TrackFields, "artist" | "album">;

export function albumKey(ref: AlbumRef): string {
  return JSON.stringify([ref.artist, ref.album]);
}

/**
 * Distinct values of one track field in first-seen catalog order.
 */
function distinct(catalog: Catalog, pick: (track: Track) => string): string[] {
  const seen = new Set<string>();
  for (const track of catalog.all()) seen.add(pick(track));
  return [...seen];
}

export function distinctArtists(catalog: Catalog): string[] {
  return distinct(catalog, (track) => track.artist);
}

export function distinctAlbums(catalog: Catalog): AlbumRef[] {
  const seen = new Map<string, AlbumRef>();
  for (const track of catalog.all()) {
    const key = albumKey(track);
    if (!seen.has(key)) seen.set(key, { artist: track.artist, album: track.album });
  }
  return [...seen.values()];
}

export function albumTracks(catalog: Catalog, ref: AlbumRef): Track[] {
  return [...catalog.byArtist(ref.artist)].filter((track) => track.album === ref.album);
}

/**
 * Order an album's tracks by disc, then track number. Tracks without
 * numbers keep their catalog order after the numbered ones.
 */
export function albumTrackOrder(tracks: Iterable<Track>): Track[] {
  return [...tracks].sort(
    (a, b) =>
      (a.discNumber ?? 1) - (b.discNumber ?? 1) ||
      (a.trackNumber ?? Number.MAX_SAFE_INTEGER) - (b.trackNumber ?? Number.MAX_SAFE_INTEGER),
  );
}

const COMPARATORS: Record<TrackSortKey, (a: Track, b: Track) => number> = {
  title: (a, b) => a.title.localeCompare(b.title, "en"),
  year: (a, b) => a.year - b.year,
  duration: (a, b) => a.durationSeconds - b.durationSeconds,
  bitrate: (a, b) => a.bitrateKbps - b.bitrateKbps,
};

/** Stable sort; ties keep catalog order. */
export function sortTracks(
  tracks: Iterable<Track>,
  key: TrackSortKey,
  direction: "asc" | "desc" = "asc",
): Track[] {
  const compare = COMPARATORS[key];
  const sign = direction === "asc" ? 1 : -1;
  return [...tracks].sort((a, b) => sign * compare(a, b));
}

/**
 * Count tracks, artists and albums, and sum playing time.
 */
export function countStats(catalog: Catalog): CatalogStats {
  let totalSeconds = 0;
  for (const track of catalog.all()) totalSeconds += track.durationSeconds;

  return {
    totalTracks: catalog.size,
    totalArtists: distinctArtists(catalog).length,
    totalAlbums: distinctAlbums(catalog).length,
    totalSeconds,
  };
}
