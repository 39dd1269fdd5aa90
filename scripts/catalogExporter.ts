import fs from "node:fs";
import path from "node:path";
import { stringify } from "yaml";
import { uniqueSlug } from "../src/lib/slugify.js";
import type { Catalog } from "./catalog.js";
import { ExportIOFailureError } from "./errors.js";
import { searchContentFor, trackSlug, trackUrl } from "./fieldDeriver.js";
import type { SearchIndex } from "./searchIndex.js";
import { formatLength } from "./trackFields.js";
import {
  albumKey,
  albumTracks,
  albumTrackOrder,
  countStats,
  distinctAlbums,
  distinctArtists,
  sortTracks,
} from "./traversal.js";
import type { Track } from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────

export interface ExportFile {
  /** Relative to the content directory, always "/"-separated. */
  path: string;
  contents: string;
}

export interface ExportBundle {
  content: ExportFile[];
  searchIndex: string;
}

export interface ExportTarget {
  contentDir: string;
  searchIndexPath: string;
}

export interface ExportWriter {
  mkdir(dir: string): Promise<void>;
  writeFile(file: string, contents: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Removes a file or directory tree; missing targets are not an error. */
  remove(target: string): Promise<void>;
  exists(target: string): Promise<boolean>;
}

const SECTIONS = [
  { dir: "tracks", title: "Tracks" },
  { dir: "artists", title: "Artists" },
  { dir: "albums", title: "Albums" },
] as const;

// ─── Front matter pages ─────────────────────────────────────────────────

function page(frontMatter: Record<string, unknown>, body = ""): string {
  return `---\n${stringify(frontMatter, { lineWidth: 0 })}---\n${body}`;
}

function sectionPage(title: string): string {
  return page({ title, sort_by: "title", template: "section.html" });
}

/**
 * Render one track page. Derived fields are recomputed here so the exported
 * values always match the canonical ones.
 */
export function serializeTrack(track: Track): string {
  return page(
    {
      title: track.title,
      template: "track.html",
      extra: {
        artist: track.artist,
        album: track.album,
        year: track.year,
        format: track.format,
        bitrate: track.bitrate,
        length: track.length,
        genre: track.genre,
        comments: track.comments,
        track: track.trackNumber,
        disc: track.discNumber,
        url: trackUrl(track.title, track.source),
        search_content: searchContentFor(track),
      },
    },
    track.body,
  );
}

function trackLink(track: Track) {
  return { title: track.title, length: track.length, url: track.url };
}

// ─── Bundle ─────────────────────────────────────────────────────────────

/**
 * Lay out the catalog as content pages plus the client-side search index.
 * Pure; the same catalog always yields the same bundle.
 */
export function exportCatalog(catalog: Catalog, index: SearchIndex): ExportBundle {
  const artists = distinctArtists(catalog);
  const albums = distinctAlbums(catalog);

  const takenAlbumSlugs = new Set<string>();
  const albumPages = albums.map((ref) => ({ ref, slug: uniqueSlug(ref.album, takenAlbumSlugs, "album") }));
  const albumSlugs = new Map<string, string>(albumPages.map(({ ref, slug }) => [albumKey(ref), slug]));

  const takenArtistSlugs = new Set<string>();
  const artistPages = artists.map((name) => ({ name, slug: uniqueSlug(name, takenArtistSlugs, "artist") }));

  const stats = countStats(catalog);
  const content: ExportFile[] = [
    {
      path: "_index.md",
      contents: page({
        title: "Music Library",
        sort_by: "title",
        template: "index.html",
        extra: {
          artist_count: stats.totalArtists,
          album_count: stats.totalAlbums,
          track_count: stats.totalTracks,
          total_length: formatLength(stats.totalSeconds),
          artists: [...artistPages].sort((a, b) => a.name.localeCompare(b.name, "en")),
        },
      }),
    },
    ...SECTIONS.map(({ dir, title }) => ({ path: `${dir}/_index.md`, contents: sectionPage(title) })),
  ];

  for (const track of catalog.all()) {
    content.push({
      path: `tracks/${trackSlug(track.title, track.source)}.md`,
      contents: serializeTrack(track),
    });
  }

  for (const { name: artist, slug } of artistPages) {
    const tracks = [...catalog.byArtist(artist)];
    const albumSummaries = new Map<string, { title: string; slug?: string; year: number; tracks: number }>();
    for (const track of tracks) {
      const summary = albumSummaries.get(track.album);
      if (summary) summary.tracks++;
      else
        albumSummaries.set(track.album, {
          title: track.album,
          slug: albumSlugs.get(albumKey(track)),
          year: track.year,
          tracks: 1,
        });
    }

    content.push({
      path: `artists/${slug}.md`,
      contents: page({
        title: artist,
        template: "artist.html",
        extra: {
          artist,
          albums: [...albumSummaries.values()].sort((a, b) => a.year - b.year || a.title.localeCompare(b.title, "en")),
          tracks: sortTracks(tracks, "title").map(trackLink),
        },
      }),
    });
  }

  for (const { ref, slug } of albumPages) {
    const tracks = albumTrackOrder(albumTracks(catalog, ref));
    const [first] = tracks;
    if (!first) continue;

    content.push({
      path: `albums/${slug}.md`,
      contents: page({
        title: ref.album,
        template: "album.html",
        extra: {
          album: ref.album,
          artist: ref.artist,
          year: first.year,
          genre: first.genre,
          tracktotal: tracks.length,
          tracks: tracks.map(trackLink),
        },
      }),
    });
  }

  return { content, searchIndex: JSON.stringify(index.toJSON()) };
}

// ─── Writing ────────────────────────────────────────────────────────────

export const fsWriter: ExportWriter = {
  async mkdir(dir) {
    await fs.promises.mkdir(dir, { recursive: true });
  },
  writeFile(file, contents) {
    return fs.promises.writeFile(file, contents, "utf-8");
  },
  rename(from, to) {
    return fs.promises.rename(from, to);
  },
  remove(target) {
    return fs.promises.rm(target, { recursive: true, force: true });
  },
  exists(target) {
    return fs.promises.stat(target).then(
      () => true,
      () => false,
    );
  },
};

/**
 * Where a build is assembled before it replaces the live output. Both
 * directories sit beside the content directory.
 */
export function stagingPaths(target: ExportTarget): ExportTarget & { previousDir: string } {
  const parent = path.dirname(target.contentDir);
  const name = path.basename(target.contentDir);
  return {
    contentDir: path.join(parent, `.${name}.staging`),
    previousDir: path.join(parent, `.${name}.previous`),
    searchIndexPath: `${target.searchIndexPath}.staging`,
  };
}

async function attempt(file: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    throw new ExportIOFailureError(file, { cause: err });
  }
}

/**
 * Write the bundle so the live output is only ever the previous build or
 * the complete new one. Every file goes to a staging area first; the
 * content directory and search index are swapped in after all writes
 * succeed. On failure the staging area is discarded and the previous
 * output is left as it was. The content directory belongs to the export:
 * files in it that the bundle does not contain are dropped.
 */
export async function writeExport(
  bundle: ExportBundle,
  target: ExportTarget,
  writer: ExportWriter = fsWriter,
): Promise<string[]> {
  const staging = stagingPaths(target);
  const outputs = [
    ...bundle.content.map((file) => ({
      file: path.join(target.contentDir, ...file.path.split("/")),
      staged: path.join(staging.contentDir, ...file.path.split("/")),
      contents: file.contents,
    })),
    { file: target.searchIndexPath, staged: staging.searchIndexPath, contents: bundle.searchIndex },
  ];

  const discard = async () => {
    await attempt(staging.contentDir, () => writer.remove(staging.contentDir));
    await attempt(staging.searchIndexPath, () => writer.remove(staging.searchIndexPath));
  };

  // Leftovers of an interrupted run
  await discard();
  try {
    for (const { file, staged, contents } of outputs) {
      await attempt(file, async () => {
        await writer.mkdir(path.dirname(staged));
        await writer.writeFile(staged, contents);
      });
    }
  } catch (err) {
    await discard();
    throw err;
  }

  const hadPrevious = await writer.exists(target.contentDir);
  await attempt(staging.previousDir, () => writer.remove(staging.previousDir));
  if (hadPrevious) {
    await attempt(target.contentDir, () => writer.rename(target.contentDir, staging.previousDir));
  }
  try {
    await writer.rename(staging.contentDir, target.contentDir);
  } catch (err) {
    if (hadPrevious) {
      await attempt(target.contentDir, () => writer.rename(staging.previousDir, target.contentDir));
    }
    throw new ExportIOFailureError(target.contentDir, { cause: err });
  }
  await attempt(target.searchIndexPath, () => writer.rename(staging.searchIndexPath, target.searchIndexPath));
  await attempt(staging.previousDir, () => writer.remove(staging.previousDir));

  return outputs.map(({ file }) => file);
}
