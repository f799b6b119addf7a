import { performance } from 'node:perf_hooks';
import { readFileSync } from 'node:fs';
import pc from 'picocolors';

/**
 * Start a high-precision timer. Returns a function that returns elapsed milliseconds.
 */
export function startTimer(): () => number {
  const start = performance.now();
  return () => performance.now() - start;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)} ms`;
  }
  return `${(ms / 1000).toFixed(2)} s`;
}

/**
 * Version of the CLI package, or '?' when its package.json can't be read.
 */
export function getVersion(): string {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '?';
  } catch {
    return '?';
  }
}

/**
 * Check if silent mode is enabled via flag or environment variable
 */
export function isSilent(argv: string[], env: NodeJS.ProcessEnv): boolean {
  return argv.includes('--silent') || env.HEARTH_SILENT === '1';
}

/**
 * Check if colors should be used
 */
export function useColor(argv: string[], env: NodeJS.ProcessEnv): boolean {
  if (argv.includes('--no-color')) {
    return false;
  }

  // https://no-color.org
  if (env.NO_COLOR !== undefined) {
    return false;
  }

  if (env.FORCE_COLOR !== undefined) {
    return true;
  }

  return pc.isColorSupported;
}

/**
 * Print the banner with package name, version and command
 */
export function printBanner(opts: {
  command: string;
  version?: string;
  color?: boolean;
  silent?: boolean;
}): void {
  if (opts.silent) return;

  const version = opts.version ?? getVersion();
  const color = opts.color ?? true;

  if (color) {
    console.log(`\n  ${pc.bold(pc.red('HEARTH'))} ${pc.red(`v${version}`)}  ${pc.dim(opts.command)}\n`);
  } else {
    console.log(`\n  HEARTH v${version}  ${opts.command}\n`);
  }
}

/**
 * Print completion message with elapsed time
 */
export function printDone(opts: {
  verb: 'built' | 'completed';
  elapsedMs: number;
  color?: boolean;
  silent?: boolean;
}): void {
  if (opts.silent) return;

  const message = `project ${opts.verb} in ${formatDuration(opts.elapsedMs)}`;
  console.log(opts.color ?? true ? pc.dim(message) : message);
}
