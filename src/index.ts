// =====================================================
// error-surveillance
// =====================================================

export { Reporter, initReporter } from './reporter/reporter';
export { ReportingSession } from './reporter/session';
export type { EventId, ReporterOptions, SessionSource } from './reporter/types';
export { loadReporterConfig, reporterEnvSchema } from './config';
export type { ReporterConfig, EnvSource } from './config';
export {
  ReportableError,
  IgnorableError,
  isIgnorable,
  tagsOf,
  extrasOf,
  describeError,
} from './utils/errors';
export type { Tags, Extras, ReportableErrorOptions } from './utils/errors';
export { logger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
export * from './middleware';
export * from './grpc';
