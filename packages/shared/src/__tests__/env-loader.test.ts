import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseEnvFile, loadEnvFiles, pickPrefixedEnv } from '../env-loader.js';

// ─── parseEnvFile ────────────────────────────────────────────────────────────

describe('parseEnvFile', () => {
  it('parses plain KEY=value pairs', () => {
    expect(parseEnvFile('A=1\nB=two')).toEqual({ A: '1', B: 'two' });
  });

  it('skips comments and blank lines', () => {
    expect(parseEnvFile('# comment\n\nA=1\n   # indented')).toEqual({ A: '1' });
  });

  it('strips an export prefix', () => {
    expect(parseEnvFile('export API_URL=http://localhost')).toEqual({ API_URL: 'http://localhost' });
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseEnvFile('QUERY=a=b=c')).toEqual({ QUERY: 'a=b=c' });
  });

  it('expands \\n inside double quotes only', () => {
    const parsed = parseEnvFile('D="line1\\nline2"\nS=\'raw\\n\'');
    expect(parsed.D).toBe('line1\nline2');
    expect(parsed.S).toBe('raw\\n');
  });

  it('drops inline comments from unquoted values', () => {
    expect(parseEnvFile('PORT=3000 # dev port')).toEqual({ PORT: '3000' });
  });

  it('keeps a hash inside quotes', () => {
    expect(parseEnvFile('COLOR="#ff0000"')).toEqual({ COLOR: '#ff0000' });
  });

  it('handles CRLF line endings', () => {
    expect(parseEnvFile('A=1\r\nB=2\r\n')).toEqual({ A: '1', B: '2' });
  });

  it('ignores lines without a key', () => {
    expect(parseEnvFile('=value\nnoequals')).toEqual({});
  });
});

// ─── loadEnvFiles ────────────────────────────────────────────────────────────

describe('loadEnvFiles', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'hearth-env-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    delete process.env.HEARTH_TEST_BASE;
    delete process.env.HEARTH_TEST_MODE;
    delete process.env.HEARTH_TEST_SHELL;
  });

  it('lets later files override earlier ones', () => {
    fs.writeFileSync(path.join(root, '.env'), 'HEARTH_TEST_BASE=base\nHEARTH_TEST_MODE=base');
    fs.writeFileSync(path.join(root, '.env.production'), 'HEARTH_TEST_MODE=prod');

    const files = loadEnvFiles({ root, mode: 'production' });

    expect(files).toEqual(['.env', '.env.production']);
    expect(process.env.HEARTH_TEST_BASE).toBe('base');
    expect(process.env.HEARTH_TEST_MODE).toBe('prod');
  });

  it('never overwrites a variable set in the shell', () => {
    process.env.HEARTH_TEST_SHELL = 'from-shell';
    fs.writeFileSync(path.join(root, '.env'), 'HEARTH_TEST_SHELL=from-file');

    loadEnvFiles({ root, mode: 'development' });

    expect(process.env.HEARTH_TEST_SHELL).toBe('from-shell');
  });

  it('reads extra files last', () => {
    fs.writeFileSync(path.join(root, '.env'), 'HEARTH_TEST_BASE=base');
    fs.writeFileSync(path.join(root, 'extra.env'), 'HEARTH_TEST_BASE=extra');

    const files = loadEnvFiles({ root, mode: 'development', files: ['extra.env'] });

    expect(files).toEqual(['.env', 'extra.env']);
    expect(process.env.HEARTH_TEST_BASE).toBe('extra');
  });

  it('returns an empty list when no file exists', () => {
    expect(loadEnvFiles({ root, mode: 'development' })).toEqual([]);
  });
});

// ─── pickPrefixedEnv ─────────────────────────────────────────────────────────

describe('pickPrefixedEnv', () => {
  it('keeps prefixed keys and strips the prefix', () => {
    const env = { HEARTH_API: 'http://api.test', SECRET: 'test-secret', HEARTH_MODE: 'x' };
    expect(pickPrefixedEnv('HEARTH_', env)).toEqual({ API: 'http://api.test', MODE: 'x' });
  });

  it('skips undefined values', () => {
    expect(pickPrefixedEnv('HEARTH_', { HEARTH_EMPTY: undefined })).toEqual({});
  });
});
