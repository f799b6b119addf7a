/**
 * Request tracer
 *
 * Times each stage a page request passes through (static check, route
 * match, middleware, prefetch, render, document assembly) and reports them
 * as a Server-Timing header and a one-line terminal log.
 */

import { performance } from 'node:perf_hooks';
import pc from 'picocolors';
import type { HearthMode, TraceStage } from 'hearthjs-shared';

export class RequestTracer {
  private readonly method: string;
  private readonly pathname: string;
  private readonly stages: TraceStage[] = [];
  private activeStage: { name: string; start: number; detail?: string } | null = null;
  private routeId: string | null = null;
  private traceError?: string;

  constructor(method: string, pathname: string) {
    this.method = method;
    this.pathname = pathname;
  }

  /** Mark the start of a named stage, closing any stage still open. */
  start(name: string, detail?: string): void {
    if (this.activeStage) {
      this.end();
    }
    this.activeStage = { name, start: performance.now(), detail };
  }

  /** Mark the end of the most recently started stage. */
  end(): void {
    if (!this.activeStage) return;
    this.stages.push({
      name: this.activeStage.name,
      durationMs: round(performance.now() - this.activeStage.start),
      detail: this.activeStage.detail,
    });
    this.activeStage = null;
  }

  /** End the current stage and mark it (and the trace) as errored. */
  endWithError(errorMessage: string): void {
    this.traceError = errorMessage;
    if (!this.activeStage) return;
    this.stages.push({
      name: this.activeStage.name,
      durationMs: round(performance.now() - this.activeStage.start),
      detail: this.activeStage.detail,
      error: errorMessage,
    });
    this.activeStage = null;
  }

  /** Record the pattern of the route that handled the request. */
  setRoute(routeId: string): void {
    this.routeId = routeId;
  }

  getStages(): readonly TraceStage[] {
    return this.stages;
  }

  /** Close the stage still open, if any, before reporting. */
  finalize(): void {
    if (this.activeStage) this.end();
  }

  /**
   * Format the stages as a Server-Timing header value.
   * 'prefetch;dur=12.5;desc="2 loaders", render;dur=3.1'
   */
  toServerTiming(): string {
    return this.stages
      .map((s) => {
        let entry = `${sanitizeTimingName(s.name)};dur=${s.durationMs}`;
        if (s.detail) entry += `;desc="${s.detail.replace(/["\\]/g, '')}"`;
        return entry;
      })
      .join(', ');
  }

  /** Format the trace as a compact terminal log line. */
  toLogLine(status: number): string {
    const statusColor =
      status >= 500 ? pc.red
        : status >= 400 ? pc.yellow
          : status >= 300 ? pc.cyan
            : pc.green;

    const method = pc.bold(this.method.padEnd(7));
    const total = pc.dim(`${this.totalMs()}ms`);
    const breakdown = this.stages
      .filter((s) => s.durationMs >= 0.1)
      .map((s) => `${s.name}:${s.durationMs}ms`)
      .join(' ');

    const route = this.routeId !== null && this.routeId !== this.pathname
      ? ` ${pc.dim(`[${this.routeId}]`)}`
      : '';
    const suffix = breakdown ? ` ${pc.dim(`(${breakdown})`)}` : '';
    const error = this.traceError ? ` ${pc.red(this.traceError)}` : '';
    return `  ${method} ${this.pathname}${route} ${statusColor(String(status))} ${total}${suffix}${error}`;
  }

  private totalMs(): number {
    return round(this.stages.reduce((sum, s) => sum + s.durationMs, 0));
  }
}

/** Round to 1 decimal place. */
function round(n: number): number {
  return Math.round(n * 10) / 10;
}

/** Server-Timing metric names must be tokens (no spaces, no special chars). */
function sanitizeTimingName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_');
}

/** Request header that opts a single request into tracing. */
export const TRACE_HEADER = 'x-hearth-trace';

/**
 * Determine whether a request should be traced. `server.trace` decides when
 * set; otherwise development traces everything and production traces only
 * requests carrying `x-hearth-trace: 1`.
 */
export function shouldTrace(
  headers: Headers,
  configured: boolean | undefined,
  mode: HearthMode,
): boolean {
  if (configured !== undefined) return configured;
  if (mode === 'development') return true;
  return headers.get(TRACE_HEADER) === '1';
}
