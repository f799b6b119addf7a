import fs from "node:fs";
import path from "node:path";
import { log } from "./logger.js";

/**
 * Parse the contents of a .env file into a key→value map.
 *
 * Handles:
 *   KEY=value
 *   KEY="quoted value"     (\n inside double quotes becomes a newline)
 *   KEY='single quoted'    (taken literally)
 *   export KEY=value
 *   KEY=value  # inline comment
 *   # full-line comment
 *
 * Does NOT mutate process.env.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const stripped = line.startsWith("export ") ? line.slice(7).trim() : line;

    const eqIndex = stripped.indexOf("=");
    if (eqIndex === -1) continue;

    const key = stripped.slice(0, eqIndex).trim();
    if (!key) continue;

    result[key] = parseValue(stripped.slice(eqIndex + 1).trim());
  }

  return result;
}

function parseValue(raw: string): string {
  const quote = raw[0];
  if ((quote === '"' || quote === "'") && raw.indexOf(quote, 1) !== -1) {
    const inner = raw.slice(1, raw.indexOf(quote, 1));
    return quote === '"' ? inner.replace(/\\n/g, "\n") : inner;
  }

  const commentIdx = raw.indexOf(" #");
  return (commentIdx === -1 ? raw : raw.slice(0, commentIdx)).trim();
}

export interface LoadEnvFilesOptions {
  /** Project root, the default directory when dir is not set. */
  root: string;
  /** Current mode. Used to load .env.[mode] files. */
  mode: string;
  /** Directory containing .env files. Defaults to root. */
  dir?: string;
  /** Additional .env files to load (absolute or root-relative paths), highest priority. */
  files?: string[];
}

/**
 * Discover and load .env files into process.env.
 *
 * Lowest to highest priority:
 *   .env, .env.local, .env.[mode], .env.[mode].local, then `files`.
 *
 * A key already present in process.env when loading starts is never
 * overwritten; among files, later ones win.
 *
 * @returns root-relative paths of the files that were read
 */
export function loadEnvFiles(opts: LoadEnvFilesOptions): string[] {
  const envDir = opts.dir ? path.resolve(opts.root, opts.dir) : opts.root;

  const candidates = [
    path.join(envDir, ".env"),
    path.join(envDir, ".env.local"),
    path.join(envDir, `.env.${opts.mode}`),
    path.join(envDir, `.env.${opts.mode}.local`),
    ...(opts.files ?? []).map((f) => path.resolve(opts.root, f)),
  ];

  const shellKeys = new Set(Object.keys(process.env));
  const merged: Record<string, string> = {};
  const loadedFiles: string[] = [];

  for (const filePath of candidates) {
    if (!fs.existsSync(filePath)) continue;

    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      log.warn(`[env] Could not read ${path.relative(opts.root, filePath)}: ${error}`);
      continue;
    }

    Object.assign(merged, parseEnvFile(content));
    loadedFiles.push(path.relative(opts.root, filePath));
  }

  let applied = 0;
  for (const [key, value] of Object.entries(merged)) {
    if (shellKeys.has(key)) continue;
    process.env[key] = value;
    applied++;
  }

  if (loadedFiles.length > 0) {
    log.info(`[env] loaded ${loadedFiles.join(", ")} (${applied} var${applied === 1 ? "" : "s"})`);
  }

  return loadedFiles;
}

/**
 * Pick the variables starting with `prefix`, with the prefix stripped.
 */
export function pickPrefixedEnv(
  prefix: string,
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (key.startsWith(prefix) && value !== undefined) {
      result[key.slice(prefix.length)] = value;
    }
  }
  return result;
}
