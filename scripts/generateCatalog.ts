import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CATALOG_CONFIG, loadCatalogConfig } from "./catalogConfig.js";
import { exportCatalog, writeExport } from "./catalogExporter.js";
import { buildCatalog, printReport, readRecordDirectory } from "./pipeline.js";
import { formatLength } from "./trackFields.js";
import { countStats } from "./traversal.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.join(__dirname, "..");

async function main() {
  const config = loadCatalogConfig(ROOT);

  if (!fs.existsSync(config.inputDir)) {
    console.error(`Track records not found: ${config.inputDir}`);
    console.error("Set CATALOG_INPUT_DIR in .env or as an environment variable.");
    process.exit(1);
  }

  console.log(`Reading track records from ${config.inputDir}...`);
  const files = await readRecordDirectory(config.inputDir, { concurrency: config.concurrency });
  console.log(`Found ${files.length} record files.`);

  console.log(`Building catalog (${config.mode} mode)...`);
  const { catalog, index, report } = buildCatalog(files, {
    mode: config.mode,
    includeComments: config.indexComments,
    parse: { minYear: CATALOG_CONFIG.MIN_YEAR },
  });
  printReport(report);

  console.log("\nExporting...");
  const bundle = exportCatalog(catalog, index);
  const written = await writeExport(
    bundle,
    { contentDir: config.contentDir, searchIndexPath: config.searchIndexPath },
  );
  console.log(`Wrote ${written.length} files to ${config.contentDir}`);
  console.log(`Wrote ${config.searchIndexPath}`);

  const stats = countStats(catalog);
  console.log("\n--- Catalog Stats ---");
  console.log(`Artists:      ${stats.totalArtists}`);
  console.log(`Albums:       ${stats.totalAlbums}`);
  console.log(`Tracks:       ${stats.totalTracks}`);
  console.log(`Total length: ${formatLength(stats.totalSeconds)}`);
  console.log(`Index tokens: ${index.tokens().length}`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
