import fs from "node:fs";
import path from "node:path";
import { Catalog } from "./catalog.js";
import { MalformedRecordError, type MalformedReason } from "./errors.js";
import { deriveTrack } from "./fieldDeriver.js";
import { type ParseOptions, parseJsonExport, parseRecord, readMarkdownRecord } from "./recordParser.js";
import { SearchIndex } from "./searchIndex.js";
import type { BuildMode, BuildWarning, Logger, RawRecord, RecordFile } from "./types.js";

// ─── Reading ────────────────────────────────────────────────────────────

function recordKind(fileName: string): RecordFile["kind"] | null {
  if (fileName === "_index.md") return null;
  if (fileName.endsWith(".md")) return "markdown";
  if (fileName.endsWith(".json")) return "json";
  return null;
}

function listRecordFiles(dir: string): string[] {
  const files: string[] = [];

  function walk(current: string) {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile() && recordKind(entry.name)) files.push(full);
    }
  }

  walk(dir);
  return files;
}

/**
 * Read every record file under `dir`. Files are read in parallel batches but
 * returned sorted by relative path, so input order never depends on timing.
 */
export async function readRecordDirectory(
  dir: string,
  options: { concurrency?: number } = {},
): Promise<RecordFile[]> {
  const concurrency = options.concurrency ?? 8;
  const files = listRecordFiles(dir)
    .map((file) => ({ file, source: path.relative(dir, file).split(path.sep).join("/") }))
    .sort((a, b) => (a.source < b.source ? -1 : a.source > b.source ? 1 : 0));

  const records: RecordFile[] = [];
  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    const texts = await Promise.all(batch.map(({ file }) => fs.promises.readFile(file, "utf-8")));
    batch.forEach(({ file, source }, j) => {
      const kind = recordKind(path.basename(file));
      if (kind) records.push({ source, kind, text: texts[j] });
    });
  }
  return records;
}

// ─── Building ───────────────────────────────────────────────────────────

export interface BuildOptions {
  mode?: BuildMode;
  includeComments?: boolean;
  parse?: ParseOptions;
}

export interface RecordFailure {
  source: string;
  reason: MalformedReason;
  field: string;
  message: string;
}

export interface BuildReport {
  mode: BuildMode;
  recordsRead: number;
  tracksCataloged: number;
  failures: RecordFailure[];
  warnings: BuildWarning[];
}

export interface BuildResult {
  catalog: Catalog;
  index: SearchIndex;
  report: BuildReport;
}

/**
 * Parse, derive and catalog every record, then index the catalog.
 *
 * Malformed records stop the build in strict mode and are skipped and
 * reported in lenient mode. A duplicate url always stops the build.
 */
export function buildCatalog(files: RecordFile[], options: BuildOptions = {}): BuildResult {
  const mode = options.mode ?? "strict";
  const catalog = new Catalog();
  const failures: RecordFailure[] = [];
  const warnings: BuildWarning[] = [];
  let recordsRead = 0;

  function reject(err: unknown): void {
    if (!(err instanceof MalformedRecordError) || mode === "strict") throw err;
    failures.push({ source: err.source, reason: err.reason, field: err.field, message: err.message });
  }

  for (const file of files) {
    let records: RawRecord[];
    try {
      records =
        file.kind === "json"
          ? parseJsonExport(file.text, file.source)
          : [readMarkdownRecord(file.text, file.source)];
    } catch (err) {
      recordsRead++;
      reject(err);
      continue;
    }

    for (const record of records) {
      recordsRead++;
      try {
        const parsed = parseRecord(record, options.parse);
        const derived = deriveTrack(parsed);
        catalog.insert(derived.track);
        warnings.push(...parsed.warnings, ...derived.warnings);
      } catch (err) {
        reject(err);
      }
    }
  }

  const index = SearchIndex.build(catalog, { includeComments: options.includeComments });

  return {
    catalog,
    index,
    report: { mode, recordsRead, tracksCataloged: catalog.size, failures, warnings },
  };
}

export function describeWarning(warning: BuildWarning): string {
  switch (warning.type) {
    case "InconsistentDerivedField":
      return `InconsistentDerivedField: ${warning.source} stored ${warning.field} "${warning.stored}", using "${warning.recomputed}"`;
    case "SuspectEncoding":
      return `SuspectEncoding: ${warning.source} field '${warning.field}' looks mis-decoded`;
  }
}

/**
 * Print the end-of-build summary.
 */
export function printReport(report: BuildReport, log: Logger = console): void {
  for (const warning of report.warnings) log.warn(`  WARN ${describeWarning(warning)}`);
  for (const failure of report.failures) log.warn(`  SKIP ${failure.message}`);

  log.log("\n--- Build Report ---");
  log.log(`Mode:         ${report.mode}`);
  log.log(`Records:      ${report.recordsRead}`);
  log.log(`Cataloged:    ${report.tracksCataloged}`);
  log.log(`Skipped:      ${report.failures.length}`);
  log.log(`Warnings:     ${report.warnings.length}`);
}
