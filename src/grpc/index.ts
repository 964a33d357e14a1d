export {
  unaryServerInterceptor,
  streamServerInterceptor,
  reportOnServerFaults,
  DEFAULT_REPORTED_CODES,
} from './interceptors';
export type {
  InterceptorOptions,
  SessionUnaryHandler,
  SessionStreamHandler,
  ServerStreamCall,
} from './interceptors';
export { ok, failStatus, failFatal, toServiceError } from './rpc-result';
export type { RpcResult, RpcFailure, StatusFailure, FatalFailure, RpcServiceError } from './rpc-result';
