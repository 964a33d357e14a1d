// =====================================================
// HTTP Handler Instrumentation Test Suite
// =====================================================

import { describe, it, expect, vi } from 'vitest';
import { IncomingMessage, ServerResponse, createServer } from 'http';
import { Socket } from 'net';
import request from 'supertest';
import Router from 'find-my-way';
import type { HttpHandler, RouteHandler } from '../http.middleware';
import { IgnorableError } from '../../utils/errors';
import { createDisabledReporter, createEnabledReporter } from '../../../test/helpers/sentry.helper';

// ===========================================
// Helpers
// ===========================================

function createExchange(url: string, headers: Record<string, string> = {}) {
  const req = new IncomingMessage(new Socket());
  req.method = 'GET';
  req.url = url;
  req.headers = headers;
  return { req, res: new ServerResponse(req) };
}

const greet: HttpHandler = (req, res) => {
  res.setHeader('content-type', 'text/plain');
  res.end(`hello ${req.url}`);
};

function routerListener(path: string, handler: RouteHandler): HttpHandler {
  const router = Router();
  router.on('GET', path, handler);
  return (req, res) => {
    router.lookup(req, res);
  };
}

// ===========================================
// Test: disabled reporter
// ===========================================

describe('handler wrappers on a disabled reporter', () => {
  it('handleFunc returns the handler itself', () => {
    const { reporter } = createDisabledReporter();

    expect(reporter.handleFunc(greet)).toBe(greet);
  });

  it('handleRouter returns the handler itself', () => {
    const { reporter } = createDisabledReporter();
    const handler: RouteHandler = (_req, res, params) => {
      res.end(`user ${params.id}`);
    };

    expect(reporter.handleRouter(handler)).toBe(handler);
  });

  it('produces the same response as the unwrapped handler', async () => {
    const { reporter } = createDisabledReporter();

    const direct = await request(greet).get('/ping');
    const wrapped = await request(reporter.handleFunc(greet)).get('/ping');

    expect(wrapped.status).toBe(direct.status);
    expect(wrapped.text).toBe(direct.text);
    expect(wrapped.text).toBe('hello /ping');
  });

  it('middleware passes requests through to the next handler', async () => {
    const { reporter } = createDisabledReporter();

    const response = await request(reporter.middleware(greet)).get('/health');

    expect(response.status).toBe(200);
    expect(response.text).toBe('hello /health');
  });
});

// ===========================================
// Test: handleFunc()
// ===========================================

describe('handleFunc', () => {
  it('calls through on success', async () => {
    const { reporter, events } = createEnabledReporter();

    const response = await request(reporter.handleFunc(greet)).get('/ping');
    await reporter.flush();

    expect(response.status).toBe(200);
    expect(response.text).toBe('hello /ping');
    expect(events).toHaveLength(0);
  });

  it('reports a thrown error at fatal level and rethrows it', async () => {
    const { reporter, events } = createEnabledReporter();
    const error = new Error('template missing');
    const { req, res } = createExchange('/boom', { 'x-request-id': 'req-123' });
    const wrapped = reporter.handleFunc(() => {
      throw error;
    });

    await expect(Promise.resolve(wrapped(req, res))).rejects.toBe(error);
    await reporter.flush();

    expect(events).toHaveLength(1);
    expect(events[0].level).toBe('fatal');
    expect(events[0].contexts?.request).toEqual({ method: 'GET', url: '/boom', requestId: 'req-123' });
    expect(res.statusCode).toBe(500);
    expect(res.writableEnded).toBe(true);
  });

  it('answers the client before rethrowing with the default options', async () => {
    const { reporter, events } = createEnabledReporter();
    const error = new Error('boom');
    const rethrown: unknown[] = [];
    const wrapped = reporter.handleFunc(() => {
      throw error;
    });
    const server = createServer((req, res) => {
      Promise.resolve(wrapped(req, res)).catch((thrown: unknown) => {
        rethrown.push(thrown);
      });
    });

    const response = await request(server).get('/boom');
    await reporter.flush();

    expect(response.status).toBe(500);
    expect(rethrown).toEqual([error]);
    expect(events).toHaveLength(1);
  });

  it('drops the connection when the failure comes after the headers', async () => {
    const { reporter } = createEnabledReporter();
    const { req, res } = createExchange('/export');
    const wrapped = reporter.handleFunc((_incoming, response) => {
      response.writeHead(200, { 'content-type': 'text/csv' });
      throw new Error('export cursor closed');
    });

    await expect(Promise.resolve(wrapped(req, res))).rejects.toThrow('export cursor closed');

    expect(res.statusCode).toBe(200);
    expect(res.destroyed).toBe(true);
  });

  it('reports a rejected async handler', async () => {
    const { reporter, events } = createEnabledReporter();
    const error = new Error('upstream refused');
    const { req, res } = createExchange('/async');
    const wrapped = reporter.handleFunc(async () => {
      throw error;
    });

    await expect(Promise.resolve(wrapped(req, res))).rejects.toBe(error);
    await reporter.flush();

    expect(events).toHaveLength(1);
    expect(events[0].contexts?.request).toEqual({ method: 'GET', url: '/async' });
  });

  it('includes tags the handler set on its request session', async () => {
    const { reporter, events } = createEnabledReporter();
    const { req, res } = createExchange('/checkout');
    const wrapped = reporter.handleFunc((incoming) => {
      reporter.sessionOf(incoming)?.setTag('route', 'checkout');
      throw new Error('checkout failed');
    });

    await expect(Promise.resolve(wrapped(req, res))).rejects.toThrow('checkout failed');
    await reporter.flush();

    expect(events[0].tags).toEqual({ route: 'checkout' });
  });

  it('answers 500 instead of rethrowing when repanic is off', async () => {
    const { reporter, events } = createEnabledReporter({}, { http: { repanic: false } });
    const wrapped = reporter.handleFunc(() => {
      throw new Error('render failed');
    });

    const response = await request(wrapped).get('/render');
    await reporter.flush();

    expect(response.status).toBe(500);
    expect(events).toHaveLength(1);
  });

  it('does not report broken pipes', async () => {
    const { reporter, events } = createEnabledReporter();
    const error = Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });
    const { req, res } = createExchange('/download');
    const wrapped = reporter.handleFunc(() => {
      throw error;
    });

    await expect(Promise.resolve(wrapped(req, res))).rejects.toBe(error);
    await reporter.flush();

    expect(events).toHaveLength(0);
  });

  it('reports ignorable errors that escape a handler', async () => {
    const { reporter, events } = createEnabledReporter({}, { http: { repanic: false } });
    const { req, res } = createExchange('/missing');
    const wrapped = reporter.handleFunc(() => {
      throw new IgnorableError('not found');
    });

    await wrapped(req, res);
    await reporter.flush();

    expect(events).toHaveLength(1);
  });

  it('flushes before continuing when waitForDelivery is set', async () => {
    const { reporter } = createEnabledReporter({}, { http: { repanic: false, waitForDelivery: true, timeout: 500 } });
    const { req, res } = createExchange('/slow');
    const session = reporter.ensureSession(req);
    const flush = vi.spyOn(session, 'flush');
    const wrapped = reporter.handleFunc(() => {
      throw new Error('slow failure');
    });

    await wrapped(req, res);

    expect(flush).toHaveBeenCalledWith(500);
  });

  it('runs handlers inside a span when tracing is enabled', async () => {
    const { reporter } = createEnabledReporter({ SENTRY_TRACING: 'true', SENTRY_TRACES_SAMPLE_RATE: '1' });

    const response = await request(reporter.handleFunc(greet)).get('/traced');

    expect(response.text).toBe('hello /traced');
  });
});

// ===========================================
// Test: handleRouter()
// ===========================================

describe('handleRouter', () => {
  it('passes route params through on success', async () => {
    const { reporter } = createEnabledReporter();
    const handler = reporter.handleRouter((_req, res, params) => {
      res.end(`user ${params.id}`);
    });

    const response = await request(routerListener('/users/:id', handler)).get('/users/42');

    expect(response.status).toBe(200);
    expect(response.text).toBe('user 42');
  });

  it('reports failures with the request context', async () => {
    const { reporter, events } = createEnabledReporter({}, { http: { repanic: false } });
    const handler = reporter.handleRouter(() => {
      throw new Error('profile lookup failed');
    });

    const response = await request(routerListener('/users/:id', handler)).get('/users/7');
    await reporter.flush();

    expect(response.status).toBe(500);
    expect(events).toHaveLength(1);
    expect(events[0].contexts?.request).toEqual({ method: 'GET', url: '/users/7' });
  });
});

// ===========================================
// Test: middleware()
// ===========================================

describe('middleware', () => {
  it('reports failures of the next handler', async () => {
    const { reporter, events } = createEnabledReporter({}, { http: { repanic: false } });
    const next: HttpHandler = () => {
      throw new Error('downstream failed');
    };

    const response = await request(reporter.middleware(next)).get('/orders');
    await reporter.flush();

    expect(response.status).toBe(500);
    expect(events).toHaveLength(1);
  });
});
