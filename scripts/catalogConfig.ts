import path from "node:path";
import { z } from "zod";
import { loadEnvVar } from "./env.js";
import { ConfigValidationError } from "./errors.js";
import type { BuildMode } from "./types.js";

const DEFAULT_MODE: BuildMode = "strict";

export const CATALOG_CONFIG = {
  // Directory of track records (relative to project root)
  INPUT_DIR: "data/tracks",

  // Generated site content (relative to project root)
  CONTENT_DIR: "content",

  // Client-side search index, served as a static file
  SEARCH_INDEX_PATH: "static/searchIndex.json",

  // strict: stop at the first malformed record; lenient: skip and report it
  MODE: DEFAULT_MODE,

  // Also index the free-text comments of each track
  INDEX_COMMENTS: false,

  // Record files read in parallel
  CONCURRENCY: 8,

  // Earliest plausible release year
  MIN_YEAR: 1900,
};

export interface CatalogConfig {
  inputDir: string;
  contentDir: string;
  searchIndexPath: string;
  mode: BuildMode;
  indexComments: boolean;
  concurrency: number;
}

const EnvSchema = z.object({
  CATALOG_INPUT_DIR: z.string().min(1).default(CATALOG_CONFIG.INPUT_DIR),
  CATALOG_CONTENT_DIR: z.string().min(1).default(CATALOG_CONFIG.CONTENT_DIR),
  CATALOG_SEARCH_INDEX_PATH: z.string().min(1).default(CATALOG_CONFIG.SEARCH_INDEX_PATH),
  CATALOG_MODE: z.enum(["strict", "lenient"]).default(CATALOG_CONFIG.MODE),
  CATALOG_INDEX_COMMENTS: z
    .enum(["true", "false"])
    .default(CATALOG_CONFIG.INDEX_COMMENTS ? "true" : "false")
    .transform((value) => value === "true"),
  CATALOG_CONCURRENCY: z.coerce.number().int().positive().default(CATALOG_CONFIG.CONCURRENCY),
});

const ENV_KEYS = EnvSchema.keyof().options;

/**
 * Resolve the build settings: environment and `.env` override the defaults,
 * relative paths are taken from `root`.
 */
export function loadCatalogConfig(
  root: string,
  lookup: (name: string) => string | undefined = (name) => loadEnvVar(name, root),
): CatalogConfig {
  const raw = Object.fromEntries(ENV_KEYS.map((key) => [key, lookup(key)]));
  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = String(issue?.path[0] ?? "env");
    throw new ConfigValidationError(issue?.message ?? "invalid value", key, raw[key]);
  }

  const env = result.data;
  return {
    inputDir: path.resolve(root, env.CATALOG_INPUT_DIR),
    contentDir: path.resolve(root, env.CATALOG_CONTENT_DIR),
    searchIndexPath: path.resolve(root, env.CATALOG_SEARCH_INDEX_PATH),
    mode: env.CATALOG_MODE,
    indexComments: env.CATALOG_INDEX_COMMENTS,
    concurrency: env.CATALOG_CONCURRENCY,
  };
}
