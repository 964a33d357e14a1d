// =====================================================
// HTTP Handler Instrumentation
// =====================================================
// Wraps Node request listeners and find-my-way route handlers so that any
// failure escaping the handler is reported through a per-request session.

import * as Sentry from '@sentry/node';
import type { IncomingMessage, ServerResponse } from 'http';
import type Router from 'find-my-way';
import { DEFAULT_FLUSH_TIMEOUT_MS } from '../config';
import type { ReportingSession } from '../reporter/session';
import type { SessionSource } from '../reporter/types';

// ===========================================
// Types
// ===========================================

export type HttpHandler = (req: IncomingMessage, res: ServerResponse) => void | Promise<void>;

export type RouteHandler = Router.Handler<Router.HTTPVersion.V1>;

export interface HttpHandlerOptions {
  /** Rethrow the failure after reporting it. Defaults to true. */
  repanic?: boolean;
  /** Flush the Sentry client before continuing after a failure. */
  waitForDelivery?: boolean;
  /** Flush timeout in milliseconds. */
  timeout?: number;
}

const BROKEN_PIPE_CODES = ['EPIPE', 'ECONNRESET'];

// The client went away mid-response; nothing worth reporting
function isBrokenPipe(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    BROKEN_PIPE_CODES.includes(error.code)
  );
}

// Answers 500 when nothing was written yet, otherwise drops the connection
function abort(res: ServerResponse): void {
  if (res.writableEnded) {
    return;
  }
  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.statusCode = 500;
  res.end();
}

// ===========================================
// Handler
// ===========================================

export class SentryHttpHandler {
  private readonly repanic: boolean;
  private readonly waitForDelivery: boolean;
  private readonly timeout: number;

  constructor(
    private readonly sessions: SessionSource,
    options: HttpHandlerOptions = {},
    private readonly tracing = false
  ) {
    this.repanic = options.repanic ?? true;
    this.waitForDelivery = options.waitForDelivery ?? false;
    this.timeout = options.timeout ?? DEFAULT_FLUSH_TIMEOUT_MS;
  }

  handleFunc(handler: HttpHandler): HttpHandler {
    return (req, res) => this.serve(req, res, () => handler(req, res));
  }

  handleRouter(handler: RouteHandler): RouteHandler {
    return (req, res, params, store, searchParams) =>
      this.serve(req, res, () => handler(req, res, params, store, searchParams));
  }

  private async serve(req: IncomingMessage, res: ServerResponse, invoke: () => unknown): Promise<void> {
    const session = this.sessions.ensureSession(req).setRequest(req);

    try {
      await Sentry.withScope(session.scope, () =>
        this.tracing
          ? Sentry.startSpan({ name: `${req.method ?? 'GET'} ${req.url ?? '/'}`, op: 'http.server' }, invoke)
          : invoke()
      );
    } catch (error) {
      await this.recover(session, error);
      // A rethrow out of a request listener is never answered by Node
      abort(res);

      if (this.repanic) {
        throw error;
      }
    }
  }

  private async recover(session: ReportingSession, error: unknown): Promise<void> {
    if (isBrokenPipe(error)) {
      return;
    }

    const eventId = session.recover(error);
    if (eventId && this.waitForDelivery) {
      await session.flush(this.timeout);
    }
  }
}
