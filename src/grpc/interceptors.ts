// =====================================================
// gRPC Server Interceptors
// =====================================================
// Handler wrappers for @grpc/grpc-js services. Each call gets a reporting
// session (reused if an outer wrapper already attached one), which is
// handed to the handler explicitly. Fatal failures are reported and
// either rethrown or converted to INTERNAL; status failures are reported
// when the `reportOn` policy accepts them.

import { status } from '@grpc/grpc-js';
import type { sendUnaryData } from '@grpc/grpc-js';
import { DEFAULT_FLUSH_TIMEOUT_MS } from '../config';
import type { ReportingSession } from '../reporter/session';
import type { SessionSource } from '../reporter/types';
import type { RpcResult, RpcServiceError, StatusFailure } from './rpc-result';
import { failFatal, reportableFailure, toServiceError } from './rpc-result';

// ===========================================
// Options
// ===========================================

export interface InterceptorOptions {
  /** Rethrow fatal failures after reporting them. Defaults to false. */
  repanic?: boolean;
  /** Decides which status failures are reported. */
  reportOn?: (failure: StatusFailure) => boolean;
  /** Flush the Sentry client after reporting a fatal failure. */
  waitForDelivery?: boolean;
  /** Flush timeout in milliseconds. */
  timeout?: number;
}

/** Codes that point at a server-side fault rather than a caller mistake. */
export const DEFAULT_REPORTED_CODES: readonly status[] = [
  status.UNKNOWN,
  status.DEADLINE_EXCEEDED,
  status.RESOURCE_EXHAUSTED,
  status.ABORTED,
  status.UNIMPLEMENTED,
  status.INTERNAL,
  status.UNAVAILABLE,
  status.DATA_LOSS,
];

export function reportOnServerFaults(failure: StatusFailure): boolean {
  return DEFAULT_REPORTED_CODES.includes(failure.code);
}

type ResolvedOptions = Required<InterceptorOptions>;

function resolveOptions(options: InterceptorOptions): ResolvedOptions {
  return {
    repanic: options.repanic ?? false,
    reportOn: options.reportOn ?? reportOnServerFaults,
    waitForDelivery: options.waitForDelivery ?? false,
    timeout: options.timeout ?? DEFAULT_FLUSH_TIMEOUT_MS,
  };
}

// ===========================================
// Handler Types
// ===========================================

/** Unary or client-streaming handler: one response per call. */
export type SessionUnaryHandler<Call extends object, Res> = (
  call: Call,
  session: ReportingSession
) => Promise<RpcResult<Res>>;

/** Server-streaming or bidi handler: writes to the call, then resolves. */
export type SessionStreamHandler<Call extends ServerStreamCall> = (
  call: Call,
  session: ReportingSession
) => Promise<RpcResult<void>>;

/** The parts of a grpc-js writable server stream the interceptor drives. */
export interface ServerStreamCall {
  end(): unknown;
  emit(event: 'error', error: RpcServiceError): boolean;
}

// ===========================================
// Shared Call Handling
// ===========================================

async function runWithReporting<T>(
  session: ReportingSession,
  run: () => Promise<RpcResult<T>>,
  options: ResolvedOptions
): Promise<RpcResult<T>> {
  let result: RpcResult<T>;
  try {
    result = await run();
  } catch (thrown) {
    result = failFatal<T>(thrown);
  }

  if (result.ok) {
    return result;
  }

  const { failure } = result;
  if (failure.kind === 'fatal') {
    const eventId = session.recover(failure.value);
    if (eventId && options.waitForDelivery) {
      await session.flush(options.timeout);
    }
    if (options.repanic) {
      throw failure.value;
    }
  } else if (options.reportOn(failure)) {
    session.captureException(reportableFailure(failure));
  }

  return result;
}

// ===========================================
// Interceptor Factories
// ===========================================

export function unaryServerInterceptor(sessions: SessionSource, options: InterceptorOptions = {}) {
  const resolved = resolveOptions(options);

  return <Call extends object, Res>(handler: SessionUnaryHandler<Call, Res>) =>
    async (call: Call, callback: sendUnaryData<Res>): Promise<void> => {
      const session = sessions.ensureSession(call);
      const result = await runWithReporting(session, () => handler(call, session), resolved);

      if (result.ok) {
        callback(null, result.value);
      } else {
        callback(toServiceError(result.failure));
      }
    };
}

export function streamServerInterceptor(sessions: SessionSource, options: InterceptorOptions = {}) {
  const resolved = resolveOptions(options);

  return <Call extends ServerStreamCall>(handler: SessionStreamHandler<Call>) =>
    async (call: Call): Promise<void> => {
      const session = sessions.ensureSession(call);
      const result = await runWithReporting(session, () => handler(call, session), resolved);

      if (result.ok) {
        call.end();
      } else {
        call.emit('error', toServiceError(result.failure));
      }
    };
}
