// =====================================================
// Express Reporting Middleware
// =====================================================
// reportingSessionMiddleware goes first in the stack so every route can
// tag its session; errorReporterMiddleware goes after the routes and
// before the response-writing error handler.

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import type { Reporter } from '../reporter/reporter';

export function reportingSessionMiddleware(reporter: Reporter): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    reporter.ensureSession(req).setRequest(req);
    next();
  };
}

export function errorReporterMiddleware(reporter: Reporter): ErrorRequestHandler {
  return (err: unknown, req: Request, _res: Response, next: NextFunction) => {
    reporter.captureWithSession(reporter.sessionOf(req), err);
    next(err);
  };
}
