import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getCacheControl, getContentType, resolveStaticFile, serveStatic } from '../static.js';

let tmp: string;
let publicDir: string;
let clientDir: string;

beforeAll(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'hearth-static-'));
  publicDir = path.join(tmp, 'public');
  clientDir = path.join(tmp, 'dist', 'client');
  fs.mkdirSync(publicDir, { recursive: true });
  fs.mkdirSync(path.join(clientDir, 'assets'), { recursive: true });
  fs.writeFileSync(path.join(publicDir, 'robots.txt'), 'User-agent: *\n');
  fs.writeFileSync(path.join(publicDir, 'shared.css'), 'body{color:red}');
  fs.writeFileSync(path.join(clientDir, 'shared.css'), 'body{color:blue}');
  fs.writeFileSync(path.join(clientDir, 'assets', 'client-AbC123xy.js'), 'console.log(1)');
  fs.writeFileSync(path.join(tmp, 'secret.txt'), 'test-secret');
});

afterAll(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('getContentType', () => {
  it('maps known extensions and falls back to octet-stream', () => {
    expect(getContentType('.js')).toBe('application/javascript');
    expect(getContentType('.CSS')).toBe('text/css');
    expect(getContentType('.bin')).toBe('application/octet-stream');
  });
});

describe('getCacheControl', () => {
  it('caches hashed files under /assets/ forever', () => {
    expect(getCacheControl('/assets/client-AbC123xy.js')).toBe('public, max-age=31536000, immutable');
  });

  it('does not cache other files', () => {
    expect(getCacheControl('/assets/logo.png')).toBe('no-cache');
    expect(getCacheControl('/client-AbC123xy.js')).toBe('no-cache');
  });
});

describe('resolveStaticFile', () => {
  it('finds a file in the first directory that has it', () => {
    expect(resolveStaticFile([publicDir, clientDir], '/shared.css')).toBe(path.join(publicDir, 'shared.css'));
    expect(resolveStaticFile([publicDir, clientDir], '/assets/client-AbC123xy.js')).toBe(
      path.join(clientDir, 'assets', 'client-AbC123xy.js'),
    );
  });

  it('ignores directories and missing files', () => {
    expect(resolveStaticFile([publicDir, clientDir], '/')).toBeNull();
    expect(resolveStaticFile([publicDir, clientDir], '/assets')).toBeNull();
    expect(resolveStaticFile([publicDir, clientDir], '/missing.txt')).toBeNull();
  });

  it('refuses paths that leave the directory', () => {
    expect(resolveStaticFile([publicDir], '/../secret.txt')).toBeNull();
    expect(resolveStaticFile([publicDir], '/%2e%2e/secret.txt')).toBeNull();
    expect(resolveStaticFile([publicDir], '/%E0%A4%A')).toBeNull();
  });
});

describe('serveStatic', () => {
  it('answers GET with the file and its headers', async () => {
    const res = await serveStatic([publicDir, clientDir], new Request('http://localhost/assets/client-AbC123xy.js'));
    expect(res?.status).toBe(200);
    expect(res?.headers.get('content-type')).toBe('application/javascript');
    expect(res?.headers.get('cache-control')).toBe('public, max-age=31536000, immutable');
    expect(res?.headers.get('content-length')).toBe('14');
    expect(await res?.text()).toBe('console.log(1)');
  });

  it('answers HEAD without a body', async () => {
    const res = await serveStatic([publicDir], new Request('http://localhost/robots.txt', { method: 'HEAD' }));
    expect(res?.headers.get('content-type')).toBe('text/plain');
    expect(res?.body).toBeNull();
  });

  it('returns null when no file matches', async () => {
    expect(await serveStatic([publicDir], new Request('http://localhost/stories/1'))).toBeNull();
  });
});
