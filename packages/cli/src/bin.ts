#!/usr/bin/env node
import { Command } from 'commander';
import { buildCommand } from './commands/build.js';
import { startCommand } from './commands/start.js';
import { getVersion, isSilent, useColor } from './utils/reporter.js';

const program = new Command();

const silent = isSilent(process.argv, process.env);
const color = useColor(process.argv, process.env);

program
  .name('hearth')
  .description('Build and serve server-rendered universal apps')
  .version(getVersion())
  .option('--silent', 'Suppress banner and timing output')
  .option('--no-color', 'Disable colored output');

program
  .command('build')
  .description('Bundle the client and server for production')
  .option('-o, --out-dir <path>', 'Output directory')
  .option('--minify', 'Minify the client bundle')
  .option('--no-minify', 'Do not minify the client bundle')
  .option('--sourcemap', 'Generate sourcemaps')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { outDir?: string; minify?: boolean; sourcemap?: boolean; config?: string }) => {
    await buildCommand({ ...options, silent, color });
  });

program
  .command('start')
  .description('Serve the production build')
  .option('-p, --port <number>', 'Port to listen on')
  .option('--host <host>', 'Host to bind to')
  .option('-c, --config <path>', 'Path to config file')
  .option('--trace', 'Log a timing line and send Server-Timing for every request')
  .option('--no-trace', 'Never trace requests')
  .action(async (options: { port?: string; host?: string; config?: string; trace?: boolean }) => {
    await startCommand({ ...options, silent, color });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
