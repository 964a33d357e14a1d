// =====================================================
// Reporter Types
// =====================================================

import type { NodeOptions } from '@sentry/node';
import type { ReporterConfig, EnvSource } from '../config';
import type { Logger } from '../utils/logger';
import type { HttpHandlerOptions } from '../middleware/http.middleware';
import type { ReportingSession } from './session';

/** Sentry event ID; empty when nothing was sent. */
export type EventId = string;

export interface ReporterOptions {
  /** Ready-made configuration; skips reading the environment. */
  config?: ReporterConfig;
  /** Environment to read instead of process.env. */
  env?: EnvSource;
  logger?: Logger;
  /** Passed to Sentry.init after the options derived from config. */
  sentry?: Partial<NodeOptions>;
  http?: HttpHandlerOptions;
}

/** Anything able to hand out the reporting session for a request or call. */
export interface SessionSource {
  ensureSession(carrier: object): ReportingSession;
}
