export * from './types.js';
export { log } from './logger.js';
export {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfigFile,
  resolveConfig,
  loadConfig,
  validateConfig,
  getPort,
  getOutDir,
  getContainerId,
} from './config-loader.js';
export { parseEnvFile, loadEnvFiles, pickPrefixedEnv } from './env-loader.js';
export type { LoadEnvFilesOptions } from './env-loader.js';
