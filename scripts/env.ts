import fs from "node:fs";
import path from "node:path";

/**
 * Read a setting from the environment, falling back to a `.env` file in `root`.
 */
export function loadEnvVar(name: string, root: string): string | undefined {
  if (process.env[name]) return process.env[name];

  const envPath = path.join(root, ".env");
  if (fs.existsSync(envPath)) {
    const content = fs.readFileSync(envPath, "utf-8");
    const match = content.match(new RegExp(`^${name}=(.+)$`, "m"));
    if (match) return match[1].trim().replace(/^["']|["']$/g, "");
  }

  return undefined;
}
