export interface TrackFields {
  title: string;
  artist: string;
  album: string;
  year: number;
  format: string;
  bitrate: string;
  length: string;
  genre: string;
  comments: string;
  trackNumber?: number;
  discNumber?: number;
  body: string;
}

export interface Track extends Readonly<TrackFields> {
  readonly url: string;
  readonly searchContent: string;
  readonly bitrateKbps: number;
  readonly durationSeconds: number;
  readonly source: string;
}

/** A record as read from disk, before any field is checked. */
export interface RawRecord {
  source: string;
  fields: Record<string, unknown>;
  body: string;
}

export interface RecordFile {
  source: string;
  kind: "markdown" | "json";
  text: string;
}

export interface ParsedRecord {
  source: string;
  fields: TrackFields;
  bitrateKbps: number;
  durationSeconds: number;
  stored: {
    url?: string;
    searchContent?: string;
  };
  warnings: BuildWarning[];
}

export type BuildWarning =
  | {
      type: "InconsistentDerivedField";
      source: string;
      field: "url" | "search_content";
      stored: string;
      recomputed: string;
    }
  | {
      type: "SuspectEncoding";
      source: string;
      field: string;
    };

export type BuildMode = "strict" | "lenient";

export interface CatalogStats {
  totalTracks: number;
  totalArtists: number;
  totalAlbums: number;
  totalSeconds: number;
}

export type TrackSortKey = "title" | "year" | "duration" | "bitrate";

export interface SearchEntry {
  title: string;
  artist: string;
  album: string;
  genre: string;
  year: number;
  length: string;
  url: string;
  searchContent: string;
}

export interface SearchIndexFile {
  version: 1;
  tokens: Record<string, string[]>;
  entries: SearchEntry[];
}

export type Logger = Pick<Console, "log" | "warn">;
