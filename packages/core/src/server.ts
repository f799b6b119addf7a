import http from "node:http";
import fs from "node:fs";
import path from "node:path";
import type { AddressInfo } from "node:net";
import { performance } from "node:perf_hooks";
import { getContainerId, getOutDir, getPort, log } from "hearthjs-shared";
import type {
  Action,
  AnyAction,
  ClientManifest,
  HearthAdapter,
  HearthApp,
  HearthConfig,
  ServerStartResult,
} from "hearthjs-shared";
import { renderPage } from "./render-pipeline.js";
import { serveStatic } from "./static.js";
import { getErrorHTML } from "./document.js";
import { toWebRequest } from "./request-context.js";
import { RequestTracer, shouldTrace } from "./tracer.js";

// ─── Request handler ──────────────────────────────────────────────────────────

export type RequestHandler = (request: Request) => Promise<Response>;

export interface RequestHandlerOptions<C, S, A extends Action> {
  app: HearthApp<C, S, A>;
  adapter: HearthAdapter<C>;
  /** Resolved config (see resolveConfig). */
  config: HearthConfig;
  /** Client build manifest, or null to render pages without scripts. */
  manifest?: ClientManifest | null;
}

/**
 * Create the Web-style handler behind HearthServer.
 *
 * Order: static files (public dir, then built client dir) → 405 for
 * non-GET/HEAD → renderPage. Thrown errors become the 500 page.
 */
export function createRequestHandler<C, S, A extends Action = AnyAction>(
  options: RequestHandlerOptions<C, S, A>,
): RequestHandler {
  const { app, adapter, config } = options;
  const mode = config.mode ?? "development";
  const root = config.root ?? process.cwd();
  const staticDirs = [
    path.resolve(root, config.publicDir ?? "public"),
    path.resolve(root, getOutDir(config), "client"),
  ];
  const containerId = getContainerId(config);
  const envPrefix = config.env?.prefix;

  async function handleInner(
    request: Request,
    pathname: string,
    tracer: RequestTracer | null,
  ): Promise<Response> {
    const method = request.method;

    if (method === "GET" || method === "HEAD") {
      tracer?.start("static-check");
      const asset = await serveStatic(staticDirs, request);
      tracer?.end();
      if (asset) return asset;
    } else {
      return new Response("Method Not Allowed", {
        status: 405,
        headers: { Allow: "GET, HEAD", "Content-Type": "text/plain; charset=utf-8" },
      });
    }

    try {
      return await renderPage({
        app,
        adapter,
        request,
        mode,
        containerId,
        manifest: options.manifest,
        envPrefix,
        tracer,
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      tracer?.endWithError(err.message);
      log.error(`Error rendering ${pathname}: ${err.message}`);

      const details = mode === "development"
        ? { message: err.message, stack: err.stack }
        : undefined;
      return new Response(getErrorHTML(details), {
        status: 500,
        headers: { "Content-Type": "text/html; charset=utf-8" },
      });
    }
  }

  return async function handle(request: Request): Promise<Response> {
    const pathname = new URL(request.url).pathname;
    const tracer = shouldTrace(request.headers, config.server?.trace, mode)
      ? new RequestTracer(request.method, pathname)
      : null;

    let response: Response;
    try {
      response = await handleInner(request, pathname, tracer);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      tracer?.endWithError(message);
      log.error(`Error serving ${pathname}: ${message}`);
      response = new Response("Internal Server Error", {
        status: 500,
        headers: { "Content-Type": "text/plain; charset=utf-8" },
      });
    }

    if (request.method === "HEAD" && response.body) {
      response = new Response(null, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      });
    }

    if (!tracer) return response;

    tracer.finalize();
    console.log(tracer.toLogLine(response.status));
    const headers = new Headers(response.headers);
    headers.set("Server-Timing", tracer.toServerTiming());
    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers,
    });
  };
}

// ─── Manifest ─────────────────────────────────────────────────────────────────

/**
 * Read the manifest the client build writes into `dir`.
 * Returns null when there is none; throws on an unsupported one.
 */
export function readClientManifest(dir: string): ClientManifest | null {
  const manifestPath = path.join(dir, "manifest.json");
  if (!fs.existsSync(manifestPath)) return null;

  const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  if (!isClientManifest(parsed)) {
    throw new Error(
      `Unsupported client manifest at ${manifestPath}. Run 'hearth build' again.`,
    );
  }
  return parsed;
}

function isClientManifest(value: unknown): value is ClientManifest {
  if (typeof value !== "object" || value === null) return false;
  return (
    "version" in value && value.version === 1 &&
    "base" in value && typeof value.base === "string" &&
    "entry" in value && typeof value.entry === "string" &&
    "css" in value && Array.isArray(value.css) &&
    value.css.every((file: unknown) => typeof file === "string")
  );
}

// ─── HearthServer ─────────────────────────────────────────────────────────────

export interface HearthServerOptions {
  handler: RequestHandler;
  /** Port, host and shutdown timeout are read from here. */
  config?: HearthConfig;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10000;

/**
 * node:http server around a RequestHandler, with graceful shutdown.
 */
export class HearthServer {
  private server: http.Server;
  private handler: RequestHandler;
  private port: number;
  private host: string;
  private shutdownTimeoutMs: number;
  private inflightCount = 0;
  private isShuttingDown = false;
  private shutdownResolve: (() => void) | null = null;

  constructor(options: HearthServerOptions) {
    const config = options.config ?? {};
    this.handler = options.handler;
    this.port = getPort(config);
    this.host = config.server?.host ?? "localhost";
    this.shutdownTimeoutMs = config.server?.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        log.error(`Failed to write response for ${req.url ?? "/"}: ${message}`);
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "text/plain" });
        }
        res.end();
      });
    });
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────────

  async start(): Promise<ServerStartResult> {
    const startTime = performance.now();

    return new Promise((resolve, reject) => {
      this.server.once("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          log.error(`Port ${this.port} is already in use.`);
        } else {
          log.error(`Server error: ${error.message}`);
        }
        reject(error);
      });

      this.server.listen(this.port, this.host, () => {
        const address = this.server.address();
        // Port 0 asks the OS for a free port; report the one it picked
        if (isAddressInfo(address)) this.port = address.port;

        resolve({
          port: this.port,
          host: this.host,
          startupMs: performance.now() - startTime,
        });
      });
    });
  }

  async stop(): Promise<void> {
    this.isShuttingDown = true;

    const closed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
    this.server.closeIdleConnections();

    if (this.inflightCount > 0) {
      log.info(
        `Waiting for ${this.inflightCount} in-flight request(s) to complete...`,
      );
      let timer: NodeJS.Timeout | undefined;
      const drained = await Promise.race([
        new Promise<boolean>((resolve) => {
          this.shutdownResolve = () => resolve(true);
        }),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
        }),
      ]);
      clearTimeout(timer);
      if (!drained) {
        log.warn(`Shutdown timed out after ${this.shutdownTimeoutMs}ms; closing open connections.`);
        this.server.closeAllConnections();
      }
    }

    await closed;
    log.info("Server stopped");
  }

  // ── Request handling ──────────────────────────────────────────────────────

  private async handleRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> {
    if (this.isShuttingDown) {
      res.writeHead(503, {
        "Content-Type": "text/plain",
        Connection: "close",
      });
      res.end("Service Unavailable - Shutting Down");
      return;
    }
    this.inflightCount++;

    try {
      const response = await this.handler(toWebRequest(req));
      // Once shutdown begins, connections close after their last response
      if (this.isShuttingDown) res.setHeader("Connection", "close");
      await sendWebResponse(res, response);
    } finally {
      this.inflightCount--;
      if (
        this.isShuttingDown &&
        this.inflightCount === 0 &&
        this.shutdownResolve
      ) {
        this.shutdownResolve();
      }
    }
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

/**
 * Write a Web standard Response to a Node ServerResponse.
 */
export async function sendWebResponse(
  res: http.ServerResponse,
  webResponse: Response,
): Promise<void> {
  res.statusCode = webResponse.status;
  webResponse.headers.forEach((value, key) => {
    if (key === "set-cookie") return;
    res.setHeader(key, value);
  });
  const cookies = webResponse.headers.getSetCookie();
  if (cookies.length > 0) res.setHeader("Set-Cookie", cookies);

  if (webResponse.body) {
    res.end(Buffer.from(await webResponse.arrayBuffer()));
  } else {
    res.end();
  }
}
