import os from 'node:os';
import pc from 'picocolors';
import type { ServerStartResult } from 'hearthjs-shared';
import { formatDuration } from './reporter.js';

/**
 * Detect console capabilities for rendering decisions.
 */
export function detectCapabilities(): {
  isTTY: boolean;
  isCI: boolean;
  supportsUnicode: boolean;
} {
  const isTTY = !!process.stdout.isTTY;

  const isCI =
    !isTTY ||
    process.env.CI === 'true' ||
    process.env.CI === '1' ||
    process.env.GITHUB_ACTIONS === 'true' ||
    process.env.GITLAB_CI === 'true';

  const supportsUnicode =
    process.platform !== 'win32' ||
    !!process.env.WT_SESSION ||
    process.env.TERM_PROGRAM === 'vscode';

  return { isTTY, isCI, supportsUnicode };
}

/**
 * Local and network URLs for a bound host. Wildcard hosts list every
 * external IPv4 interface.
 */
export function resolveUrls(host: string, port: number): { local: string; network: string[] } {
  const wildcard = host === '0.0.0.0' || host === '::';
  const local = `http://${wildcard ? 'localhost' : host}:${port}/`;
  if (!wildcard) return { local, network: [] };

  const network: string[] = [];
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        network.push(`http://${address.address}:${port}/`);
      }
    }
  }
  return { local, network };
}

/**
 * Format a URL with the port number highlighted in bold.
 */
function formatUrl(url: string, color: boolean): string {
  if (!color) return url;

  const portMatch = url.match(/:(\d+)/);
  if (portMatch?.index !== undefined) {
    const before = url.slice(0, portMatch.index + 1);
    const port = portMatch[1];
    const after = url.slice(portMatch.index + 1 + port.length);
    return pc.cyan(before) + pc.bold(pc.cyan(port)) + pc.cyan(after);
  }
  return pc.cyan(url);
}

export interface ServeBannerOptions {
  result: ServerStartResult;
  version: string;
  adapterName: string;
  routeCount: number;
  /** Shown after the banner, e.g. a missing client build. */
  warnings: string[];
  color: boolean;
  silent: boolean;
  ci: boolean;
}

/**
 * Print the `hearth start` banner: compact in CI, styled in a terminal.
 */
export function printServeBanner(opts: ServeBannerOptions): void {
  if (opts.silent) return;

  const { result, version, color } = opts;
  const urls = resolveUrls(result.host, result.port);
  const time = formatDuration(result.startupMs);
  const routes = `${opts.routeCount} route${opts.routeCount === 1 ? '' : 's'}`;

  if (opts.ci) {
    console.log(`HEARTH v${version} serving in ${time} -- ${urls.local}`);
    console.log(`  ${opts.adapterName} (${routes})`);
    for (const warning of opts.warnings) {
      console.warn(`  warn: ${warning}`);
    }
    return;
  }

  const arrow = detectCapabilities().supportsUnicode ? '➜' : '>';
  const a = color ? pc.green(arrow) : arrow;
  const label = (text: string) => (color ? pc.bold(text) : text);

  const lines: string[] = [];
  lines.push(
    color
      ? `  ${pc.bold(pc.red('HEARTH'))} ${pc.red(`v${version}`)}  ${pc.dim('serving in')} ${pc.bold(time)}`
      : `  HEARTH v${version}  serving in ${time}`,
  );
  lines.push('');
  lines.push(`  ${a}  ${label('Local:')}   ${formatUrl(urls.local, color)}`);
  if (urls.network.length > 0) {
    for (const networkUrl of urls.network) {
      lines.push(`  ${a}  ${label('Network:')} ${formatUrl(networkUrl, color)}`);
    }
  } else {
    const hint = color ? pc.dim('use ') + pc.bold('--host') + pc.dim(' to expose') : 'use --host to expose';
    lines.push(`  ${a}  ${label('Network:')} ${hint}`);
  }
  const detail = `${opts.adapterName} (${routes})`;
  lines.push(`  ${a}  ${label('SSR:')}     ${color ? pc.dim(detail) : detail}`);

  console.log('');
  console.log(lines.join('\n'));
  console.log('');

  for (const warning of opts.warnings) {
    console.warn(color ? `  ${pc.yellow('!')}  ${pc.dim(warning)}` : `  !  ${warning}`);
  }
}
