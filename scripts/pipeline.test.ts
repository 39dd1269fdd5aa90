import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DuplicateUrlError, MalformedRecordError } from "./errors.js";
import { buildCatalog, printReport, readRecordDirectory } from "./pipeline.js";
import { markdownFile, PONTCHARTRAIN, RECESSIONAL } from "./testFixtures.js";
import type { RecordFile } from "./types.js";

describe("readRecordDirectory", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "track-catalog-"));
    fs.mkdirSync(path.join(dir, "a"));
    fs.writeFileSync(path.join(dir, "b.md"), "---\ntitle: B\n---\n");
    fs.writeFileSync(path.join(dir, "a", "c.md"), "---\ntitle: C\n---\n");
    fs.writeFileSync(path.join(dir, "_index.md"), "---\ntitle: Tracks\n---\n");
    fs.writeFileSync(path.join(dir, "notes.txt"), "not a record");
    fs.writeFileSync(path.join(dir, "export.json"), "[]");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads record files sorted by relative path", async () => {
    const files = await readRecordDirectory(dir, { concurrency: 2 });

    expect(files).toEqual([
      { source: "a/c.md", kind: "markdown", text: "---\ntitle: C\n---\n" },
      { source: "b.md", kind: "markdown", text: "---\ntitle: B\n---\n" },
      { source: "export.json", kind: "json", text: "[]" },
    ]);
  });
});

describe("buildCatalog", () => {
  const good: RecordFile[] = [
    markdownFile("pontchartrain.md", PONTCHARTRAIN),
    markdownFile("recessional.md", RECESSIONAL),
  ];
  const bad = markdownFile("bad.md", { ...PONTCHARTRAIN, title: "Broken", length: "6:75" });

  it("catalogs and indexes every record", () => {
    const { catalog, index, report } = buildCatalog(good);

    expect([...catalog.all()].map((t) => t.url)).toEqual(["/tracks/pontchartrain", "/tracks/recessional"]);
    expect([...index.lookup("teng")]).toEqual(["/tracks/pontchartrain", "/tracks/recessional"]);
    expect([...index.prefixSearch("rec")]).toEqual(["/tracks/recessional"]);
    expect(report).toEqual({
      mode: "strict",
      recordsRead: 2,
      tracksCataloged: 2,
      failures: [],
      warnings: [],
    });
  });

  it("stops at the first malformed record in strict mode", () => {
    expect(() => buildCatalog([good[0], bad, good[1]], { mode: "strict" })).toThrow(MalformedRecordError);
  });

  it("skips and reports malformed records in lenient mode", () => {
    const unreadable: RecordFile = { source: "plain.md", kind: "markdown", text: "no front matter" };
    const { catalog, report } = buildCatalog([good[0], bad, unreadable, good[1]], { mode: "lenient" });

    expect(catalog.size).toBe(2);
    expect(report.recordsRead).toBe(4);
    expect(report.failures).toEqual([
      {
        source: "bad.md",
        reason: "invalid length",
        field: "length",
        message: "MalformedRecord: invalid length 'length' in bad.md",
      },
      {
        source: "plain.md",
        reason: "unreadable record",
        field: "front matter",
        message: "MalformedRecord: unreadable record 'front matter' in plain.md",
      },
    ]);
  });

  it("always halts on a duplicate url", () => {
    const twin = markdownFile("twin.md", { ...PONTCHARTRAIN, artist: "Someone Else" });
    expect(() => buildCatalog([good[0], twin], { mode: "lenient" })).toThrow(DuplicateUrlError);
  });

  it("reports stale derived fields and uses the recomputed ones", () => {
    const stale = markdownFile("pontchartrain.md", { ...PONTCHARTRAIN, search_content: "Pontchartrain" });
    const { catalog, report } = buildCatalog([stale]);

    expect(catalog.get("/tracks/pontchartrain").searchContent).toBe(
      "Pontchartrain Vienna Teng Dreaming Through the Noise Folk",
    );
    expect(report.warnings).toEqual([
      {
        type: "InconsistentDerivedField",
        source: "pontchartrain.md",
        field: "search_content",
        stored: "Pontchartrain",
        recomputed: "Pontchartrain Vienna Teng Dreaming Through the Noise Folk",
      },
    ]);
  });

  it("expands library export files into records", () => {
    const exportFile: RecordFile = {
      source: "library.json",
      kind: "json",
      text: JSON.stringify([PONTCHARTRAIN, { title: "", artist: "" }, RECESSIONAL]),
    };
    const { catalog, report } = buildCatalog([exportFile]);

    expect(report.recordsRead).toBe(2);
    expect(catalog.get("/tracks/recessional").source).toBe("library.json#2");
  });

  it("indexes comments when asked", () => {
    const commented = markdownFile("p.md", { ...PONTCHARTRAIN, comments: "Recorded live" });
    const { index } = buildCatalog([commented], { includeComments: true });
    expect([...index.lookup("recorded")]).toEqual(["/tracks/pontchartrain"]);
  });
});

describe("printReport", () => {
  it("prints skipped records, warnings and totals", () => {
    const log = { log: vi.fn(), warn: vi.fn() };
    printReport(
      {
        mode: "lenient",
        recordsRead: 3,
        tracksCataloged: 2,
        failures: [
          {
            source: "bad.md",
            reason: "invalid length",
            field: "length",
            message: "MalformedRecord: invalid length 'length' in bad.md",
          },
        ],
        warnings: [{ type: "SuspectEncoding", source: "odd.md", field: "comments" }],
      },
      log,
    );

    expect(log.warn.mock.calls).toEqual([
      ["  WARN SuspectEncoding: odd.md field 'comments' looks mis-decoded"],
      ["  SKIP MalformedRecord: invalid length 'length' in bad.md"],
    ]);
    expect(log.log).toHaveBeenCalledWith("Cataloged:    2");
    expect(log.log).toHaveBeenCalledWith("Skipped:      1");
  });
});
