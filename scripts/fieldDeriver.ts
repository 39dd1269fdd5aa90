import { slugify } from "../src/lib/slugify.js";
import { MalformedRecordError } from "./errors.js";
import type { BuildWarning, ParsedRecord, Track, TrackFields } from "./types.js";

export function trackSlug(title: string, source = "<unknown>"): string {
  const slug = slugify(title);
  if (!slug) throw new MalformedRecordError("unslugerizable title", "title", source);
  return slug;
}

export function trackUrl(title: string, source?: string): string {
  return `/tracks/${trackSlug(title, source)}`;
}

export function searchContentFor(
  fields: Pick<TrackFields, "title" | "artist" | "album" | "genre">,
): string {
  return [fields.title, fields.artist, fields.album, fields.genre].join(" ");
}

export interface DeriveResult {
  track: Track;
  warnings: BuildWarning[];
}

/**
 * Compute url and search content from the canonical fields. Stored values
 * are only cross-checked: a mismatch is reported and the recomputed value kept.
 */
export function deriveTrack(parsed: ParsedRecord): DeriveResult {
  const { fields, source, stored } = parsed;
  const url = trackUrl(fields.title, source);
  const searchContent = searchContentFor(fields);

  const warnings: BuildWarning[] = [];
  if (stored.url !== undefined && stored.url !== url) {
    warnings.push({
      type: "InconsistentDerivedField",
      source,
      field: "url",
      stored: stored.url,
      recomputed: url,
    });
  }
  if (stored.searchContent !== undefined && stored.searchContent !== searchContent) {
    warnings.push({
      type: "InconsistentDerivedField",
      source,
      field: "search_content",
      stored: stored.searchContent,
      recomputed: searchContent,
    });
  }

  const track: Track = Object.freeze({
    ...fields,
    url,
    searchContent,
    bitrateKbps: parsed.bitrateKbps,
    durationSeconds: parsed.durationSeconds,
    source,
  });

  return { track, warnings };
}
