import { stringify } from "yaml";
import { deriveTrack } from "./fieldDeriver.js";
import { parseRecord } from "./recordParser.js";
import type { RawRecord, RecordFile, Track } from "./types.js";

export const PONTCHARTRAIN = {
  title: "Pontchartrain",
  artist: "Vienna Teng",
  album: "Dreaming Through the Noise",
  year: 2006,
  format: "FLAC",
  bitrate: "746kbps",
  length: "6:15",
  genre: "Folk",
  comments: "",
};

export const RECESSIONAL = {
  ...PONTCHARTRAIN,
  title: "Recessional",
  bitrate: "812kbps",
  length: "4:05",
};

export function rawTrack(
  overrides: Record<string, unknown> = {},
  source = "test.md",
  body = "",
): RawRecord {
  return { source, fields: { ...PONTCHARTRAIN, ...overrides }, body };
}

export function makeTrack(overrides: Record<string, unknown> = {}, source = "test.md", body = ""): Track {
  return deriveTrack(parseRecord(rawTrack(overrides, source, body))).track;
}

export function markdownFile(source: string, fields: Record<string, unknown>, body = ""): RecordFile {
  return { source, kind: "markdown", text: `---\n${stringify(fields)}---\n${body}` };
}
