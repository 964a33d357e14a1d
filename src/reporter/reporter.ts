// =====================================================
// Error Reporter
// =====================================================
// Sends application errors to Sentry with their tags and extras, and
// wraps HTTP handlers and gRPC handlers with failure reporting.
//
// Build one with initReporter() at startup and pass it to whatever needs
// it. When no DSN is configured, or Sentry rejects it, the reporter is
// disabled: errors are only logged and every wrapper is a passthrough.

import * as Sentry from '@sentry/node';
import type { NodeClient, NodeOptions, Scope } from '@sentry/node';
import { DEFAULT_FLUSH_TIMEOUT_MS, loadReporterConfig } from '../config';
import type { ReporterConfig } from '../config';
import { logger as defaultLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { describeError, extrasOf, isIgnorable, tagsOf } from '../utils/errors';
import { SentryHttpHandler } from '../middleware/http.middleware';
import type { HttpHandler, HttpHandlerOptions, RouteHandler } from '../middleware/http.middleware';
import { streamServerInterceptor, unaryServerInterceptor } from '../grpc/interceptors';
import type { InterceptorOptions } from '../grpc/interceptors';
import { ReportingSession } from './session';
import type { EventId, ReporterOptions, SessionSource } from './types';

export class Reporter implements SessionSource {
  private readonly rootScope: Scope;
  private readonly httpHandler?: SentryHttpHandler;
  private readonly sessions = new WeakMap<object, ReportingSession>();

  /** Error sampling, decided here so a dropped event yields no ID. */
  private readonly sample = (): boolean => Math.random() < this.config.sampleRate;

  constructor(
    public readonly config: ReporterConfig,
    private readonly log: Logger = defaultLogger,
    private readonly client?: NodeClient,
    httpOptions: HttpHandlerOptions = {}
  ) {
    this.rootScope = new Sentry.Scope();
    if (client) {
      this.rootScope.setClient(client);
      this.httpHandler = new SentryHttpHandler(this, httpOptions, config.tracingEnabled);
    }
  }

  get enabled(): boolean {
    return this.client !== undefined;
  }

  // ===========================================
  // Capture
  // ===========================================

  /**
   * Reports an error through the process-wide scope and logs it locally.
   * Ignorable errors and a disabled reporter only log.
   *
   * @param shouldThrow - Rethrow the error once reporting is done
   * @returns Sentry event ID, or '' when nothing was sent
   */
  capture(error: unknown, shouldThrow = false): EventId {
    if (error === null || error === undefined) {
      return '';
    }

    const eventId = this.enabled && !isIgnorable(error) ? this.send(this.rootScope, error) : this.logOnly(error);

    if (shouldThrow) {
      throw error;
    }
    return eventId;
  }

  /**
   * Like capture(), but the event carries the session's tags and context.
   * Without a session this is exactly capture().
   */
  captureWithSession(session: ReportingSession | undefined, error: unknown, shouldThrow = false): EventId {
    if (!session) {
      return this.capture(error, shouldThrow);
    }
    if (error === null || error === undefined) {
      return '';
    }

    const eventId = this.enabled && !isIgnorable(error) ? this.send(session.scope, error) : this.logOnly(error);

    if (shouldThrow) {
      throw error;
    }
    return eventId;
  }

  private send(scope: Scope, error: unknown): EventId {
    const session = new ReportingSession(scope, this.log, this.sample);
    const eventId = session.captureException(error, { tags: tagsOf(error), extras: extrasOf(error) });

    if (!eventId) {
      return this.logOnly(error);
    }
    this.log.error(`Error captured in Sentry with event ID ${eventId}: ${describeError(error)}`, error);
    return eventId;
  }

  private logOnly(error: unknown): EventId {
    this.log.error(describeError(error), error);
    return '';
  }

  // ===========================================
  // Sessions
  // ===========================================

  /** Fresh session isolated from every other request. */
  createSession(): ReportingSession {
    return new ReportingSession(this.rootScope.clone(), this.log, this.sample);
  }

  /** Session attached to a request or call object, if any. */
  sessionOf(carrier: object): ReportingSession | undefined {
    return this.sessions.get(carrier);
  }

  /** Returns the carrier's session, creating and attaching one if needed. */
  ensureSession(carrier: object): ReportingSession {
    const existing = this.sessions.get(carrier);
    if (existing) {
      return existing;
    }

    const session = this.createSession();
    this.sessions.set(carrier, session);
    return session;
  }

  // ===========================================
  // HTTP
  // ===========================================

  /** Reports failures escaping a request listener. Identity when disabled. */
  handleFunc(handler: HttpHandler): HttpHandler {
    return this.httpHandler ? this.httpHandler.handleFunc(handler) : handler;
  }

  /** Reports failures escaping a find-my-way route handler. Identity when disabled. */
  handleRouter(handler: RouteHandler): RouteHandler {
    return this.httpHandler ? this.httpHandler.handleRouter(handler) : handler;
  }

  /** handleFunc in wrap-the-next-handler form. */
  middleware(next: HttpHandler): HttpHandler {
    return this.handleFunc((req, res) => next(req, res));
  }

  // ===========================================
  // gRPC
  // ===========================================

  unaryServerInterceptor(options: InterceptorOptions = {}) {
    return unaryServerInterceptor(this, options);
  }

  streamServerInterceptor(options: InterceptorOptions = {}) {
    return streamServerInterceptor(this, options);
  }

  // ===========================================
  // Lifecycle
  // ===========================================

  async flush(timeout = DEFAULT_FLUSH_TIMEOUT_MS): Promise<boolean> {
    return this.client ? await this.client.flush(timeout) : true;
  }

  async close(timeout = DEFAULT_FLUSH_TIMEOUT_MS): Promise<boolean> {
    return this.client ? await this.client.close(timeout) : true;
  }
}

// ===========================================
// Initialization
// ===========================================

function buildSentryOptions(config: ReporterConfig, overrides: Partial<NodeOptions> = {}): NodeOptions {
  return {
    dsn: config.dsn,
    attachStacktrace: true,
    // Reporter.sample already dropped what the SDK would
    sampleRate: 1,
    ...(config.release ? { release: config.release } : {}),
    ...(config.environment ? { environment: config.environment } : {}),
    ...(config.tracingEnabled ? { tracesSampleRate: config.tracesSampleRate } : {}),
    ...overrides,
  };
}

/**
 * Builds the reporter from the environment. Never throws: a missing or
 * rejected DSN yields a disabled reporter and a warning.
 *
 * @param release - Release identifier; falls back to SENTRY_RELEASE
 */
export function initReporter(release = '', options: ReporterOptions = {}): Reporter {
  const config = options.config ?? loadReporterConfig(release, options.env);
  const log = options.logger ?? defaultLogger;

  if (!config.dsn) {
    log.warn('Could not initialize Sentry: SENTRY_DSN is not set, errors will only be logged');
    return new Reporter(config, log);
  }

  let client: NodeClient | undefined;
  try {
    client = Sentry.init(buildSentryOptions(config, options.sentry));
  } catch (error) {
    log.warn('Could not initialize Sentry, errors will only be logged', error);
    return new Reporter(config, log);
  }

  if (!client || !client.getDsn()) {
    log.warn('Could not initialize Sentry: DSN was rejected, errors will only be logged');
    return new Reporter(config, log);
  }

  log.info(`Sentry initialized${config.environment ? ` for ${config.environment}` : ''}`);
  return new Reporter(config, log, client, options.http);
}
