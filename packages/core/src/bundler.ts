import * as esbuild from "esbuild";
import fs from "node:fs";
import path from "node:path";
import { gzipSync } from "node:zlib";
import { performance } from "node:perf_hooks";
import pc from "picocolors";
import { getOutDir, log } from "hearthjs-shared";
import type { ClientManifest, HearthConfig } from "hearthjs-shared";

const LOADERS: Record<string, esbuild.Loader> = {
  ".ts": "ts",
  ".tsx": "tsx",
  ".jsx": "jsx",
  ".js": "js",
};

export interface BuildClientOptions {
  /** Browser entry, relative to root. */
  entry: string;
  /** Absolute build output directory (client files land in `<outDir>/client`). */
  outDir: string;
  root: string;
  minify?: boolean;
  sourcemap?: boolean;
  target?: string | string[];
  /** Public path prefix recorded in the manifest (default: '/'). */
  base?: string;
}

export interface BuildClientResult {
  manifest: ClientManifest;
  /** Output files relative to the client directory, with their sizes. */
  files: { file: string; size: number }[];
}

/**
 * Bundle the browser entry into hashed files under `<outDir>/client/assets`
 * and write `<outDir>/manifest.json`.
 */
export async function buildClient(options: BuildClientOptions): Promise<BuildClientResult> {
  const clientDir = path.join(options.outDir, "client");
  const base = options.base ?? "/";

  const result = await esbuild.build({
    entryPoints: [path.resolve(options.root, options.entry)],
    bundle: true,
    minify: options.minify ?? true,
    sourcemap: options.sourcemap ?? false,
    outdir: path.join(clientDir, "assets"),
    format: "esm",
    platform: "browser",
    target: options.target ?? "es2020",
    metafile: true,
    entryNames: "[name]-[hash]",
    assetNames: "[name]-[hash]",
    jsx: "automatic",
    jsxImportSource: "react",
    define: { "process.env.NODE_ENV": JSON.stringify("production") },
    absWorkingDir: options.root,
    logLevel: "silent",
    loader: LOADERS,
  });

  let entry: string | null = null;
  const css: string[] = [];
  const files: { file: string; size: number }[] = [];

  for (const [outputPath, outputMeta] of Object.entries(result.metafile.outputs)) {
    const relative = toClientPath(clientDir, path.resolve(options.root, outputPath));
    if (!relative.endsWith(".map")) files.push({ file: relative, size: outputMeta.bytes });

    if (!outputMeta.entryPoint) continue;
    entry = relative;
    if (outputMeta.cssBundle) {
      css.push(toClientPath(clientDir, path.resolve(options.root, outputMeta.cssBundle)));
    }
  }

  if (!entry) {
    throw new Error(`Client build produced no entry for ${options.entry}`);
  }

  const manifest: ClientManifest = { version: 1, base, entry, css };
  fs.mkdirSync(options.outDir, { recursive: true });
  fs.writeFileSync(
    path.join(options.outDir, "manifest.json"),
    JSON.stringify(manifest, null, 2),
  );

  return { manifest, files };
}

function toClientPath(clientDir: string, absolute: string): string {
  return path.relative(clientDir, absolute).split(path.sep).join("/");
}

export interface BuildServerOptions {
  /** App module, relative to root. */
  entry: string;
  outDir: string;
  root: string;
  sourcemap?: boolean;
}

/**
 * Bundle the app module for Node into `<outDir>/server/app.mjs`.
 * Packages stay external and resolve from node_modules at run time.
 */
export async function buildServer(options: BuildServerOptions): Promise<string> {
  const outfile = path.join(options.outDir, "server", "app.mjs");

  await esbuild.build({
    entryPoints: [path.resolve(options.root, options.entry)],
    bundle: true,
    minify: false,
    sourcemap: options.sourcemap ? "inline" : false,
    outfile,
    format: "esm",
    platform: "node",
    target: "node20",
    packages: "external",
    jsx: "automatic",
    jsxImportSource: "react",
    absWorkingDir: options.root,
    logLevel: "silent",
    loader: LOADERS,
  });

  return outfile;
}

/**
 * Production build: client bundle + manifest, then the server bundle.
 * Expects a resolved config.
 */
export async function build(config: HearthConfig): Promise<ClientManifest> {
  const startTime = performance.now();
  const root = config.root ?? process.cwd();
  const outDir = path.resolve(root, getOutDir(config));

  log.info(`Building for production into ${path.relative(root, outDir) || "."}`);

  const client = await buildClient({
    entry: config.client ?? "src/client.tsx",
    outDir,
    root,
    minify: config.build?.minify,
    sourcemap: config.build?.sourcemap,
    target: config.build?.target,
    base: config.build?.base,
  });
  console.log(`  ${pc.green("✓")}  client`);

  const serverFile = await buildServer({
    entry: config.app ?? "src/app.tsx",
    outDir,
    root,
    sourcemap: config.build?.sourcemap,
  });
  console.log(`  ${pc.green("✓")}  server`);

  printBuildReport(client.files, path.join(outDir, "client"), serverFile, root);
  log.success(`Build finished in ${Math.round(performance.now() - startTime)}ms`);

  return client.manifest;
}

function printBuildReport(
  files: { file: string; size: number }[],
  clientDir: string,
  serverFile: string,
  root: string,
): void {
  console.log("");
  for (const { file, size } of files) {
    let gzipPart = "";
    if (file.endsWith(".js") || file.endsWith(".css")) {
      const gzipSize = gzipSync(fs.readFileSync(path.join(clientDir, file))).length;
      gzipPart = pc.dim(`   gzip ~${formatSize(gzipSize)}`);
    }
    console.log(`  ${pc.cyan(("client/" + file).padEnd(40))}${formatSize(size).padStart(10)}${gzipPart}`);
  }
  const serverSize = fs.statSync(serverFile).size;
  const serverRel = path.relative(root, serverFile).split(path.sep).join("/");
  console.log(`  ${pc.cyan(serverRel.padEnd(40))}${formatSize(serverSize).padStart(10)}`);
  console.log("");
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
