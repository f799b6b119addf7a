import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import type { HearthAdapter, HearthApp, HearthConfig } from 'hearthjs-shared';
import { HearthServer, createRequestHandler, readClientManifest } from '../server.js';
import type { RequestHandler } from '../server.js';

const adapter: HearthAdapter<string> = {
  name: 'fake',
  renderToHTML(_app, context) {
    return `<main>${context.branch.map((entry) => entry.route.component).join('/')}</main>`;
  },
};

const app: HearthApp<string, { ok: boolean }> = {
  reducer: (state = { ok: true }) => state,
  routes: [
    { path: '/', exact: true, component: 'Home' },
    {
      path: '/boom',
      component: 'Boom',
      loadData: () => {
        throw new Error('feed unavailable');
      },
    },
  ],
};

let root: string;

beforeAll(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'hearth-server-'));
  fs.mkdirSync(path.join(root, 'public'));
  fs.writeFileSync(path.join(root, 'public', 'robots.txt'), 'User-agent: *\n');
});

afterAll(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function handler(overrides: HearthConfig = {}) {
  return createRequestHandler({
    app,
    adapter,
    config: { root, mode: 'production', server: { trace: false }, ...overrides },
  });
}

describe('createRequestHandler', () => {
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('serves files from the public directory', async () => {
    const res = await handler()(new Request('http://localhost/robots.txt'));
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/plain');
    expect(await res.text()).toBe('User-agent: *\n');
  });

  it('renders pages that are not static files', async () => {
    const res = await handler()(new Request('http://localhost/'));
    expect(res.status).toBe(200);
    expect(await res.text()).toContain('<div id="root"><main>Home</main></div>');
  });

  it('answers HEAD with headers only', async () => {
    const res = await handler()(new Request('http://localhost/', { method: 'HEAD' }));
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(res.body).toBeNull();
  });

  it('refuses other methods with 405', async () => {
    const res = await handler()(new Request('http://localhost/', { method: 'POST', body: 'x=1' }));
    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET, HEAD');
  });

  it('renders a generic 500 page in production', async () => {
    const res = await handler()(new Request('http://localhost/boom'));
    expect(res.status).toBe(500);
    const html = await res.text();
    expect(html).toContain('<p>Internal Server Error</p>');
    expect(html).not.toContain('feed unavailable');
    expect(String(errorSpy.mock.calls[0][0])).toContain('Error rendering /boom: feed unavailable');
  });

  it('shows the error in development', async () => {
    const res = await handler({ mode: 'development' })(new Request('http://localhost/boom'));
    expect(res.status).toBe(500);
    expect(await res.text()).toContain('<pre>Error: feed unavailable');
  });

  it('adds Server-Timing and logs a line when tracing', async () => {
    const res = await handler({ server: { trace: true } })(new Request('http://localhost/'));
    const timing = res.headers.get('server-timing') ?? '';
    expect(timing.split(', ').map((entry) => entry.split(';')[0])).toEqual([
      'static-check',
      'route-match',
      'middleware',
      'prefetch',
      'render',
      'assemble',
    ]);
    expect(logSpy).toHaveBeenCalledOnce();
  });

  it('traces production requests carrying the trace header', async () => {
    const res = await handler({ server: {} })(
      new Request('http://localhost/', { headers: { 'x-hearth-trace': '1' } }),
    );
    expect(res.headers.get('server-timing')).not.toBeNull();
  });
});

describe('readClientManifest', () => {
  it('returns null when the build wrote no manifest', () => {
    expect(readClientManifest(path.join(root, 'missing'))).toBeNull();
  });

  it('reads a manifest', () => {
    const dir = path.join(root, 'dist-ok');
    fs.mkdirSync(dir);
    const manifest = { version: 1, base: '/', entry: 'assets/client-abc123.js', css: ['assets/client-def456.css'] };
    fs.writeFileSync(path.join(dir, 'manifest.json'), JSON.stringify(manifest));
    expect(readClientManifest(dir)).toEqual(manifest);
  });

  it('rejects a manifest of another version', () => {
    const dir = path.join(root, 'dist-old');
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, 'manifest.json'), JSON.stringify({ version: 2, base: '/', entry: 'a.js', css: [] }));
    expect(() => readClientManifest(dir)).toThrow(/^Unsupported client manifest at /);
  });
});

describe('HearthServer', () => {
  let seen: string[];
  let release: () => void;
  let gate: Promise<void>;

  const handler: RequestHandler = async (request) => {
    const { pathname } = new URL(request.url);
    seen.push(pathname);
    if (pathname === '/slow') await gate;
    return new Response(`done ${pathname}`);
  };

  function serve(server: HearthConfig['server'] = {}) {
    return new HearthServer({ handler, config: { server: { port: 0, host: '127.0.0.1', ...server } } });
  }

  function readAll(socket: net.Socket): Promise<string> {
    return new Promise((resolve, reject) => {
      let text = '';
      socket.setEncoding('utf-8');
      socket.on('data', (chunk: string) => {
        text += chunk;
      });
      socket.on('error', reject);
      socket.on('close', () => resolve(text));
    });
  }

  beforeEach(() => {
    seen = [];
    gate = new Promise((resolve) => {
      release = resolve;
    });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports the port the OS picked for port 0', async () => {
    const server = serve();
    const result = await server.start();

    expect(result.host).toBe('127.0.0.1');
    expect(result.port).toBeGreaterThan(0);
    const res = await fetch(`http://127.0.0.1:${result.port}/hello`);
    expect(await res.text()).toBe('done /hello');

    await server.stop();
  });

  it('answers 503 once stopping and waits for requests in flight', async () => {
    const server = serve();
    const { port } = await server.start();

    // A connection whose request is still arriving when shutdown begins
    const socket = net.connect(port, '127.0.0.1');
    await new Promise<void>((resolve) => socket.once('connect', () => resolve()));
    socket.write('GET /late HTTP/1.1\r\nHost: 127.0.0.1\r\n');

    const slow = fetch(`http://127.0.0.1:${port}/slow`);
    await vi.waitFor(() => expect(seen).toEqual(['/slow']));

    let stopped = false;
    const stopping = server.stop().then(() => {
      stopped = true;
    });

    const raw = readAll(socket);
    socket.write('\r\n');
    expect((await raw).split('\r\n')[0]).toBe('HTTP/1.1 503 Service Unavailable');
    expect(stopped).toBe(false);

    release();
    const res = await slow;
    expect(await res.text()).toBe('done /slow');
    await stopping;
    expect(stopped).toBe(true);
    expect(seen).toEqual(['/slow']);
  });

  it('drops requests still running after shutdownTimeoutMs', async () => {
    const server = serve({ shutdownTimeoutMs: 50 });
    const { port } = await server.start();

    const slow = fetch(`http://127.0.0.1:${port}/slow`).then(
      () => 'answered',
      () => 'dropped',
    );
    await vi.waitFor(() => expect(seen).toEqual(['/slow']));

    await server.stop();
    expect(await slow).toBe('dropped');
  });
});
