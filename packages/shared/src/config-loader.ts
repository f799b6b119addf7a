import { existsSync } from 'node:fs';
import { unlink, writeFile } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { build } from 'esbuild';
import type { HearthConfig, HearthMode } from './types.js';
import { log } from './logger.js';

/**
 * Configuration file names in order of priority
 */
const CONFIG_FILES = [
  'hearth.config.ts',
  'hearth.config.js',
  'hearth.config.mjs',
] as const;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Required<
  Pick<HearthConfig, 'app' | 'client' | 'outDir' | 'publicDir' | 'port' | 'mode' | 'root' | 'containerId'>
> = {
  app: 'src/app.tsx',
  client: 'src/client.tsx',
  outDir: 'dist',
  publicDir: 'public',
  port: 3000,
  mode: 'development',
  root: process.cwd(),
  containerId: 'root',
};

/**
 * Find the configuration file in the project directory
 */
export function findConfigFile(root: string = process.cwd()): string | null {
  for (const fileName of CONFIG_FILES) {
    const filePath = join(root, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }
  return null;
}

/**
 * Load and parse the configuration file
 */
export async function loadConfigFile(
  configPath: string,
  mode: HearthMode = 'development'
): Promise<HearthConfig> {
  try {
    const configModule: { default?: unknown } = configPath.endsWith('.ts')
      ? await importTypeScript(configPath)
      : await import(pathToFileURL(configPath).href);

    let config: unknown = configModule.default ?? configModule;

    // A config function receives the mode
    if (typeof config === 'function') {
      config = await config(mode);
    }

    if (!config || typeof config !== 'object') {
      throw new Error(`${configPath} must export a config object or a function returning one`);
    }

    return config as HearthConfig;
  } catch (error) {
    log.error(`Failed to load config from ${configPath}: ${error}`);
    throw error;
  }
}

/**
 * Node cannot import .ts files: bundle the config to an .mjs beside it
 * (so bare imports resolve from the project), import that, then remove it.
 */
async function importTypeScript(configPath: string): Promise<{ default?: unknown }> {
  const result = await build({
    entryPoints: [configPath],
    bundle: true,
    platform: 'node',
    format: 'esm',
    target: 'node20',
    packages: 'external',
    write: false,
    logLevel: 'silent',
  });

  const tempFile = `${configPath}.timestamp-${Date.now()}.mjs`;
  await writeFile(tempFile, result.outputFiles[0].text);
  try {
    return await import(pathToFileURL(tempFile).href);
  } finally {
    await unlink(tempFile);
  }
}

/**
 * Resolve the final configuration by merging user config with defaults
 */
export function resolveConfig(
  userConfig: HearthConfig,
  mode: HearthMode = 'development'
): HearthConfig {
  const config: HearthConfig = {
    ...DEFAULT_CONFIG,
    ...userConfig,
    mode,
  };

  // Handle shorthand properties
  if (userConfig.outDir && !userConfig.build?.outDir) {
    config.build = {
      ...config.build,
      outDir: userConfig.outDir,
    };
  }

  if (userConfig.port && !userConfig.server?.port) {
    config.server = {
      ...config.server,
      port: userConfig.port,
    };
  }

  return config;
}

/**
 * Load Hearth configuration from the project
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ mode: 'production' });
 * const config = await loadConfig({ root: '/path/to/project' });
 * ```
 */
export async function loadConfig(options: {
  root?: string;
  mode?: HearthMode;
  configFile?: string;
  /** Suppress config loading log messages (default: true). */
  silent?: boolean;
} = {}): Promise<HearthConfig> {
  const root = options.root || process.cwd();
  const mode = options.mode || 'development';
  const silent = options.silent ?? true;

  const configPath = options.configFile
    ? resolve(root, options.configFile)
    : findConfigFile(root);

  let userConfig: HearthConfig = {};

  if (configPath) {
    if (!silent) log.info(`Loading config from ${configPath}`);
    userConfig = await loadConfigFile(configPath, mode);
  } else {
    if (!silent) log.info('No config file found, using defaults');
  }

  if (!userConfig.root) {
    userConfig.root = root;
  }

  const config = resolveConfig(userConfig, mode);
  validateConfig(config);
  return config;
}

/**
 * Validate that required configuration values are present
 */
export function validateConfig(config: HearthConfig): void {
  if (!config.app) {
    throw new Error('Config validation error: app is required');
  }

  const port = config.server?.port ?? config.port;
  if (port != null && (!Number.isInteger(port) || port < 0 || port > 65535)) {
    throw new Error(`Config validation error: port must be between 0 and 65535 (got ${port})`);
  }

  if (config.root && !existsSync(config.root)) {
    throw new Error(`Config validation error: root directory does not exist: ${config.root}`);
  }
}

/**
 * Get the effective port from configuration
 */
export function getPort(config: HearthConfig): number {
  return config.server?.port ?? config.port ?? DEFAULT_CONFIG.port;
}

/**
 * Get the effective output directory from configuration
 */
export function getOutDir(config: HearthConfig): string {
  return config.build?.outDir || config.outDir || DEFAULT_CONFIG.outDir;
}

export function getContainerId(config: HearthConfig): string {
  return config.containerId || DEFAULT_CONFIG.containerId;
}
