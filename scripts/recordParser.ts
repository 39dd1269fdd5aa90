import { parse as parseToml } from "smol-toml";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { MalformedRecordError } from "./errors.js";
import { parseBitrate, parseLength } from "./trackFields.js";
import type { BuildWarning, ParsedRecord, RawRecord } from "./types.js";

// ─── Front matter ───────────────────────────────────────────────────────

// "---" fences YAML, "+++" fences TOML
const FRONT_MATTER_PATTERN = /^(---|\+\+\+)\r?\n(?:([\s\S]*?)\r?\n)?\1[ \t]*(?:\r?\n|$)([\s\S]*)$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Custom page fields live under `extra`; top-level keys take precedence.
 */
function flattenExtra(data: Record<string, unknown>): Record<string, unknown> {
  const { extra, ...topLevel } = data;
  return isPlainObject(extra) ? { ...extra, ...topLevel } : topLevel;
}

/**
 * Split a content file into its front matter and body.
 */
export function readMarkdownRecord(text: string, source: string): RawRecord {
  const match = text.match(FRONT_MATTER_PATTERN);
  if (!match) {
    throw new MalformedRecordError("unreadable record", "front matter", source);
  }

  const [, fence, frontMatter, body] = match;
  let data: unknown;
  try {
    if (!frontMatter) data = {};
    else data = fence === "+++" ? parseToml(frontMatter) : parseYaml(frontMatter);
  } catch (err) {
    throw new MalformedRecordError("unreadable record", "front matter", source, { cause: err });
  }

  // An empty YAML document parses to null
  if (data === null) data = {};
  if (!isPlainObject(data)) {
    throw new MalformedRecordError("unreadable record", "front matter", source);
  }

  return { source, fields: flattenExtra(data), body };
}

// ─── Library export ─────────────────────────────────────────────────────

const JsonExportSchema = z.array(z.record(z.string(), z.unknown()));

function hasText(value: unknown): boolean {
  return (typeof value === "string" && value.trim() !== "") || typeof value === "number";
}

/**
 * Read a library export: a JSON array with one object per track.
 * Entries with neither a title nor an artist are skipped.
 */
export function parseJsonExport(text: string, source: string): RawRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new MalformedRecordError("unreadable record", "export", source, { cause: err });
  }

  const result = JsonExportSchema.safeParse(data);
  if (!result.success) {
    throw new MalformedRecordError("unreadable record", "export", source);
  }

  return result.data.flatMap((fields, i) =>
    hasText(fields.title) || hasText(fields.artist)
      ? [{ source: `${source}#${i}`, fields, body: "" }]
      : [],
  );
}

// ─── Record validation ──────────────────────────────────────────────────

const scalar = z.union([z.string(), z.number(), z.null()]).optional();

const RawTrackSchema = z.object({
  title: scalar,
  artist: scalar,
  album: scalar,
  year: scalar,
  format: scalar,
  bitrate: scalar,
  length: scalar,
  genre: scalar,
  comments: scalar,
  track: scalar,
  disc: scalar,
  url: scalar,
  search_content: scalar,
});

type RawTrack = z.infer<typeof RawTrackSchema>;

const REQUIRED_FIELDS = [
  "title",
  "artist",
  "album",
  "year",
  "format",
  "bitrate",
  "length",
  "genre",
] as const;

type RequiredField = (typeof REQUIRED_FIELDS)[number];

// U+FFFD, or UTF-8 bytes decoded as Latin-1 / Windows-1252
const SUSPECT_ENCODING = /\uFFFD|\u00C3[\u0080-\u00BF]|\u00E2\u20AC/;

export interface ParseOptions {
  minYear?: number;
  maxYear?: number;
}

function text(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  return typeof value === "number" ? String(value) : value.trim();
}

// Stored derived fields are compared verbatim, blanks and padding included
function storedValue(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return String(value);
}

function optionalOrdinal(value: string | number | null | undefined): number | undefined {
  // "3/12" style values keep their leading number
  const match = text(value).match(/^(\d+)/);
  if (!match) return undefined;
  const n = Number.parseInt(match[1], 10);
  return n > 0 ? n : undefined;
}

/**
 * Validate a raw record into canonical track fields.
 * Pure: throws MalformedRecordError naming the first bad field.
 */
export function parseRecord(raw: RawRecord, options: ParseOptions = {}): ParsedRecord {
  const { source } = raw;
  const minYear = options.minYear ?? 1900;
  const maxYear = options.maxYear ?? new Date().getFullYear() + 1;

  const result = RawTrackSchema.safeParse(raw.fields);
  if (!result.success) {
    const field = result.error.issues[0]?.path[0];
    throw new MalformedRecordError("invalid field", String(field ?? "record"), source);
  }
  const record: RawTrack = result.data;

  for (const field of REQUIRED_FIELDS) {
    if (!text(record[field])) throw new MalformedRecordError("missing field", field, source);
  }
  const required = (field: RequiredField) => text(record[field]);

  const yearText = required("year");
  const year = /^\d{4}$/.test(yearText) ? Number.parseInt(yearText, 10) : Number.NaN;
  if (!(year >= minYear && year <= maxYear)) {
    throw new MalformedRecordError("invalid year", "year", source);
  }

  const bitrate = required("bitrate");
  const bitrateKbps = parseBitrate(bitrate);
  if (bitrateKbps === null) throw new MalformedRecordError("invalid bitrate", "bitrate", source);

  const length = required("length");
  const durationSeconds = parseLength(length);
  if (durationSeconds === null) throw new MalformedRecordError("invalid length", "length", source);

  const fields = {
    title: required("title"),
    artist: required("artist"),
    album: required("album"),
    year,
    format: required("format"),
    bitrate,
    length,
    genre: required("genre"),
    // Comments and body are passed through untouched
    comments: typeof record.comments === "number" ? String(record.comments) : (record.comments ?? ""),
    trackNumber: optionalOrdinal(record.track),
    discNumber: optionalOrdinal(record.disc),
    body: raw.body,
  };

  const warnings: BuildWarning[] = [];
  for (const field of ["title", "artist", "album", "genre", "comments"] as const) {
    if (SUSPECT_ENCODING.test(fields[field])) {
      warnings.push({ type: "SuspectEncoding", source, field });
    }
  }

  return {
    source,
    fields,
    bitrateKbps,
    durationSeconds,
    stored: {
      url: storedValue(record.url),
      searchContent: storedValue(record.search_content),
    },
    warnings,
  };
}
