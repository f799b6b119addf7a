import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadConfig,
  resolveConfig,
  getPort,
  getOutDir,
  getContainerId,
  validateConfig,
  DEFAULT_CONFIG,
} from '../config-loader.js';
import { defineConfig, defineConfigFn } from '../types.js';

// In ESM, module exports are non-configurable so vi.spyOn doesn't work.
// vi.hoisted ensures the variable exists before the hoisted vi.mock runs.
const { mockExistsSync } = vi.hoisted(() => ({
  mockExistsSync: vi.fn(() => true),
}));
vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return { ...actual, existsSync: mockExistsSync };
});

// ─── DEFAULT_CONFIG ──────────────────────────────────────────────────────────

describe('DEFAULT_CONFIG', () => {
  it('has the expected default port', () => {
    expect(DEFAULT_CONFIG.port).toBe(3000);
  });

  it('points at the conventional app and client entries', () => {
    expect(DEFAULT_CONFIG.app).toBe('src/app.tsx');
    expect(DEFAULT_CONFIG.client).toBe('src/client.tsx');
  });

  it('renders into #root by default', () => {
    expect(DEFAULT_CONFIG.containerId).toBe('root');
  });
});

// ─── resolveConfig ───────────────────────────────────────────────────────────

describe('resolveConfig', () => {
  it('merges user config over defaults', () => {
    const result = resolveConfig({ port: 4000 });
    expect(result.port).toBe(4000);
    expect(result.outDir).toBe('dist');
    expect(result.publicDir).toBe('public');
  });

  it('forces mode from parameter, overriding user config', () => {
    const result = resolveConfig({ mode: 'development' }, 'production');
    expect(result.mode).toBe('production');
  });

  it('propagates shorthand outDir to build.outDir when build.outDir is absent', () => {
    const result = resolveConfig({ outDir: 'out' });
    expect(result.build?.outDir).toBe('out');
  });

  it('does not overwrite build.outDir if already set', () => {
    const result = resolveConfig({ outDir: 'out', build: { outDir: 'explicit' } });
    expect(result.build?.outDir).toBe('explicit');
  });

  it('propagates shorthand port to server.port when server.port is absent', () => {
    const result = resolveConfig({ port: 8080 });
    expect(result.server?.port).toBe(8080);
  });

  it('keeps other server options when copying the port', () => {
    const result = resolveConfig({ port: 8080, server: { trace: true } });
    expect(result.server).toEqual({ trace: true, port: 8080 });
  });

  it('does not overwrite server.port if already set', () => {
    const result = resolveConfig({ port: 8080, server: { port: 9090 } });
    expect(result.server?.port).toBe(9090);
  });

  it('returns a new object and does not mutate the input', () => {
    const input = { port: 3000 };
    const result = resolveConfig(input);
    expect(result).not.toBe(input);
    expect(input).toEqual({ port: 3000 });
  });
});

// ─── getters ─────────────────────────────────────────────────────────────────

describe('getPort', () => {
  it('returns server.port when set', () => {
    expect(getPort({ server: { port: 4000 } })).toBe(4000);
  });

  it('falls back to top-level port', () => {
    expect(getPort({ port: 5000 })).toBe(5000);
  });

  it('keeps an explicit port 0 (pick a free port)', () => {
    expect(getPort({ port: 0 })).toBe(0);
  });

  it('falls back to DEFAULT_CONFIG.port when neither is set', () => {
    expect(getPort({})).toBe(DEFAULT_CONFIG.port);
  });
});

describe('getOutDir', () => {
  it('returns build.outDir when set', () => {
    expect(getOutDir({ build: { outDir: 'build' } })).toBe('build');
  });

  it('falls back to top-level outDir', () => {
    expect(getOutDir({ outDir: 'output' })).toBe('output');
  });

  it('falls back to DEFAULT_CONFIG.outDir when neither is set', () => {
    expect(getOutDir({})).toBe('dist');
  });
});

describe('getContainerId', () => {
  it('returns the configured id', () => {
    expect(getContainerId({ containerId: 'app' })).toBe('app');
  });

  it('falls back to root', () => {
    expect(getContainerId({})).toBe('root');
  });
});

// ─── validateConfig ──────────────────────────────────────────────────────────

describe('validateConfig', () => {
  it('does not throw for a valid config', () => {
    mockExistsSync.mockReturnValue(true);
    expect(() => validateConfig({ app: 'src/app.tsx', root: '/some/dir' })).not.toThrow();
  });

  it('throws when app is absent', () => {
    expect(() => validateConfig({})).toThrow('app is required');
  });

  it('throws when the port is negative', () => {
    expect(() => validateConfig({ app: 'x', port: -1 })).toThrow('port must be between 0 and 65535');
  });

  it('throws when the port is above 65535', () => {
    expect(() => validateConfig({ app: 'x', port: 99999 })).toThrow('port must be between 0 and 65535');
  });

  it('checks server.port before the shorthand', () => {
    expect(() => validateConfig({ app: 'x', port: 3000, server: { port: 70000 } })).toThrow(
      'port must be between 0 and 65535 (got 70000)',
    );
  });

  it('throws when root directory does not exist', () => {
    mockExistsSync.mockReturnValue(false);
    expect(() => validateConfig({ app: 'x', root: '/nonexistent' })).toThrow('root directory does not exist');
  });
});

// ─── loadConfig ──────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  async function projectWith(source: string): Promise<string> {
    const root = await mkdtemp(join(tmpdir(), 'hearth-config-'));
    await writeFile(join(root, 'hearth.config.mjs'), source);
    return root;
  }

  it('resolves the config file of the project', async () => {
    mockExistsSync.mockReturnValue(true);
    const root = await projectWith('export default { port: 4100 };');

    const config = await loadConfig({ root, mode: 'production', configFile: 'hearth.config.mjs' });

    expect(config.server?.port).toBe(4100);
    expect(config.root).toBe(root);
    expect(config.mode).toBe('production');
  });

  it('rejects a config that fails validation', async () => {
    mockExistsSync.mockReturnValue(true);
    const root = await projectWith('export default (mode) => ({ port: mode === "production" ? 70000 : 3000 });');

    await expect(loadConfig({ root, mode: 'production', configFile: 'hearth.config.mjs' })).rejects.toThrow(
      'Config validation error: port must be between 0 and 65535 (got 70000)',
    );
  });
});

// ─── define helpers ──────────────────────────────────────────────────────────

describe('defineConfig / defineConfigFn', () => {
  it('returns the config unchanged', () => {
    const config = { port: 4100 };
    expect(defineConfig(config)).toBe(config);
  });

  it('returns the function unchanged', () => {
    const fn = defineConfigFn((mode) => ({ server: { trace: mode === 'development' } }));
    expect(fn('development').server?.trace).toBe(true);
    expect(fn('production').server?.trace).toBe(false);
  });
});
