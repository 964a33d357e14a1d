// =====================================================
// Reporter Configuration
// =====================================================
// Read once from the environment at startup. Every field falls back to
// its default on missing or malformed input, so loading never throws.

import { z } from 'zod';

// ===========================================
// Constants
// ===========================================

const DEFAULT_SAMPLE_RATE = 1.0;
const DEFAULT_TRACES_SAMPLE_RATE = 0.0;

/** Default wait for pending events on flush, close and waitForDelivery. */
export const DEFAULT_FLUSH_TIMEOUT_MS = 2000;

const TRUE_VALUES = ['1', 't', 'true'];
const FALSE_VALUES = ['0', 'f', 'false'];

// ===========================================
// Field Parsers
// ===========================================

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return undefined;
}

const rate = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1)).catch(fallback);

const flag = (fallback: boolean) => z.preprocess(parseFlag, z.boolean()).catch(fallback);

const text = z.string().trim().catch('');

// ===========================================
// Environment Schema
// ===========================================

export const reporterEnvSchema = z.object({
  SENTRY_DSN: text,
  SENTRY_SAMPLING: rate(DEFAULT_SAMPLE_RATE),
  SENTRY_RELEASE: text,
  SENTRY_TRACING: flag(false),
  SENTRY_TRACES_SAMPLE_RATE: rate(DEFAULT_TRACES_SAMPLE_RATE),
  ENVIRONMENT: text,
});

export interface ReporterConfig {
  readonly dsn: string;
  readonly sampleRate: number;
  readonly release: string;
  readonly tracingEnabled: boolean;
  readonly tracesSampleRate: number;
  readonly environment: string;
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Builds the reporter configuration from the environment.
 *
 * @param release - Release identifier; when empty, SENTRY_RELEASE is used
 */
export function loadReporterConfig(release = '', env: EnvSource = process.env): ReporterConfig {
  const parsed = reporterEnvSchema.parse(env);

  return Object.freeze({
    dsn: parsed.SENTRY_DSN,
    sampleRate: parsed.SENTRY_SAMPLING,
    release: release.trim() || parsed.SENTRY_RELEASE,
    tracingEnabled: parsed.SENTRY_TRACING,
    tracesSampleRate: parsed.SENTRY_TRACES_SAMPLE_RATE,
    environment: parsed.ENVIRONMENT,
  });
}
