import path from 'node:path';
import { log, loadConfig, loadEnvFiles, getOutDir, getPort } from 'hearthjs-shared';
import type { HearthConfig } from 'hearthjs-shared';
import { HearthServer, createRequestHandler, readClientManifest } from 'hearthjs-core';
import { createReactAdapter } from 'hearthjs-adapter-react';
import { countRoutes, loadServerApp } from '../app-loader.js';
import { detectCapabilities, printServeBanner } from '../utils/banner.js';
import { getVersion } from '../utils/reporter.js';

export interface StartOptions {
  port?: string;
  host?: string;
  config?: string;
  trace?: boolean;
  silent: boolean;
  color: boolean;
}

/**
 * Flags given on the command line override the config file.
 */
export function applyStartOptions(config: HearthConfig, options: StartOptions): HearthConfig {
  const port = options.port !== undefined ? parsePort(options.port) : getPort(config);
  return {
    ...config,
    mode: 'production',
    server: {
      ...config.server,
      port,
      ...(options.host !== undefined && { host: options.host }),
      ...(options.trace !== undefined && { trace: options.trace }),
    },
  };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port "${value}": expected an integer between 0 and 65535.`);
  }
  return port;
}

export async function startCommand(options: StartOptions): Promise<void> {
  const caps = detectCapabilities();

  try {
    const loaded = await loadConfig({ mode: 'production', configFile: options.config });
    const config = applyStartOptions(loaded, options);
    const root = config.root ?? process.cwd();

    loadEnvFiles({ root, mode: 'production', dir: config.env?.dir, files: config.env?.files });

    const outDir = path.resolve(root, getOutDir(config));
    const app = await loadServerApp(path.join(outDir, 'server', 'app.mjs'));

    const warnings: string[] = [];
    const manifest = readClientManifest(outDir);
    if (!manifest) {
      warnings.push(`No client manifest in ${path.relative(root, outDir) || '.'}; pages are served without scripts.`);
    }

    const adapter = createReactAdapter();
    const server = new HearthServer({
      handler: createRequestHandler({ app, adapter, config, manifest }),
      config,
    });

    const result = await server.start();

    printServeBanner({
      result,
      version: getVersion(),
      adapterName: adapter.name,
      routeCount: countRoutes(app.routes),
      warnings,
      color: options.color,
      silent: options.silent,
      ci: caps.isCI,
    });

    let isShuttingDown = false;

    const shutdown = () => {
      if (isShuttingDown) return;
      isShuttingDown = true;

      console.log('');
      log.info('Graceful shutdown initiated, finishing in-flight requests...');

      server
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error(`Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
          process.exit(1);
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    log.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
