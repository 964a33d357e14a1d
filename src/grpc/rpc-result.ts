// =====================================================
// RPC Handler Results
// =====================================================
// Handlers return a result instead of throwing. A `status` failure is an
// ordinary gRPC error; a `fatal` failure is an unhandled condition that
// the interceptor reports and converts to INTERNAL at the server boundary.

import { status } from '@grpc/grpc-js';
import type { Metadata } from '@grpc/grpc-js';
import { describeError } from '../utils/errors';

// ===========================================
// Types
// ===========================================

export interface StatusFailure {
  kind: 'status';
  code: status;
  details: string;
  /** Underlying error, reported instead of the status when present. */
  cause?: unknown;
}

export interface FatalFailure {
  kind: 'fatal';
  value: unknown;
}

export type RpcFailure = StatusFailure | FatalFailure;

export type RpcResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: RpcFailure };

/** Error shape grpc-js accepts from handlers (callback or stream 'error'). */
export interface RpcServiceError extends Error {
  code: status;
  details: string;
  metadata?: Metadata;
}

// ===========================================
// Constructors
// ===========================================

export function ok<T>(value: T): RpcResult<T> {
  return { ok: true, value };
}

export function failStatus<T = never>(code: status, details: string, cause?: unknown): RpcResult<T> {
  return { ok: false, failure: { kind: 'status', code, details, cause } };
}

export function failFatal<T = never>(value: unknown): RpcResult<T> {
  return { ok: false, failure: { kind: 'fatal', value } };
}

// ===========================================
// Wire Conversion
// ===========================================

export function toServiceError(failure: RpcFailure): RpcServiceError {
  const code = failure.kind === 'status' ? failure.code : status.INTERNAL;
  const details = failure.kind === 'status' ? failure.details : describeError(failure.value);

  const error = new Error(details);
  return Object.assign(error, { code, details });
}

/** Payload to report for a status failure: its cause, else the wire error. */
export function reportableFailure(failure: StatusFailure): unknown {
  return failure.cause ?? toServiceError(failure);
}
