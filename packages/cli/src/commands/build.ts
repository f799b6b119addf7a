import { log, loadConfig, loadEnvFiles } from 'hearthjs-shared';
import type { HearthConfig } from 'hearthjs-shared';
import { build } from 'hearthjs-core';
import { printBanner, printDone, startTimer } from '../utils/reporter.js';

export interface BuildOptions {
  outDir?: string;
  minify?: boolean;
  sourcemap?: boolean;
  config?: string;
  silent: boolean;
  color: boolean;
}

/**
 * Flags given on the command line override the config file.
 */
export function applyBuildOptions(config: HearthConfig, options: BuildOptions): HearthConfig {
  return {
    ...config,
    build: {
      ...config.build,
      ...(options.outDir !== undefined && { outDir: options.outDir }),
      ...(options.minify !== undefined && { minify: options.minify }),
      ...(options.sourcemap !== undefined && { sourcemap: options.sourcemap }),
    },
  };
}

export async function buildCommand(options: BuildOptions): Promise<void> {
  printBanner({ command: 'build', color: options.color, silent: options.silent });
  const stop = startTimer();

  try {
    const config = await loadConfig({
      mode: 'production',
      configFile: options.config,
    });
    loadEnvFiles({
      root: config.root ?? process.cwd(),
      mode: 'production',
      dir: config.env?.dir,
      files: config.env?.files,
    });

    await build(applyBuildOptions(config, options));

    printDone({ verb: 'built', elapsedMs: stop(), color: options.color, silent: options.silent });
  } catch (error) {
    log.error(`Build failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
