// =====================================================
// Reporting Session
// =====================================================
// An isolated Sentry scope for a single request or RPC call. Tags and
// extras set here only appear on events captured through this session.

import type { Scope } from '@sentry/node';
import type { IncomingMessage } from 'http';
import type { Extras, Tags } from '../utils/errors';
import { describeError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import type { EventId } from './types';

export class ReportingSession {
  constructor(
    public readonly scope: Scope,
    private readonly log: Logger,
    /** Decides per event whether it is sent; a sampled-out event returns ''. */
    private readonly sample: () => boolean = () => true
  ) {}

  /** True when events captured here can reach a Sentry client. */
  get enabled(): boolean {
    return this.scope.getClient() !== undefined;
  }

  setTag(key: string, value: string): this {
    this.scope.setTag(key, value);
    return this;
  }

  setTags(tags: Tags): this {
    this.scope.setTags(tags);
    return this;
  }

  setExtra(key: string, value: unknown): this {
    this.scope.setExtra(key, value);
    return this;
  }

  setContext(name: string, context: Record<string, unknown>): this {
    this.scope.setContext(name, context);
    return this;
  }

  /**
   * Records the request line on the session. The request ID comes from
   * the x-request-id header when the client sent one.
   */
  setRequest(req: IncomingMessage): this {
    const header = req.headers['x-request-id'];
    const requestId = Array.isArray(header) ? header[0] : header;

    return this.setContext('request', {
      method: req.method,
      url: req.url,
      ...(requestId ? { requestId } : {}),
    });
  }

  /**
   * Captures an error on a fork of this session's scope. The error's own
   * tags and extras go on the fork and never stick to the session.
   */
  captureException(error: unknown, metadata: { tags?: Tags; extras?: Extras } = {}): EventId {
    if (!this.enabled || !this.sample()) {
      return '';
    }

    const scope = this.scope.clone();
    if (metadata.extras) {
      scope.setContext('extras', metadata.extras);
      // Legacy location, still read by older dashboards
      scope.setExtras(metadata.extras);
    }
    if (metadata.tags) {
      scope.setTags(metadata.tags);
    }

    return scope.captureException(error);
  }

  /**
   * Reports a failure that escaped a handler. Sent at fatal level;
   * thrown strings become message events.
   */
  recover(value: unknown): EventId {
    this.log.error(`Recovered from unhandled failure: ${describeError(value)}`, value);
    if (!this.enabled || !this.sample()) {
      return '';
    }

    const scope = this.scope.clone();
    scope.setLevel('fatal');

    return typeof value === 'string'
      ? scope.captureMessage(value, 'fatal')
      : scope.captureException(value);
  }

  async flush(timeout: number): Promise<boolean> {
    const client = this.scope.getClient();
    return client ? await client.flush(timeout) : true;
  }
}
