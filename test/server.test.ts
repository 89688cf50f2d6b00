// This test suite verifies the HTTP server end to end through Fastify injection.

import { afterEach, describe, expect, it } from 'vitest';
import type { AppConfig } from '../src/config/config.js';
import type { CallContext } from '../src/endpoints/endpoint.js';
import { RpcCode, RpcStatusError } from '../src/errors/rpc-status.js';
import { CONCAT_PATH, SUM_PATH } from '../src/http/routes.js';
import { createServer, type ServerOverrides, type ServerResources } from '../src/server.js';
import { ENDPOINT_DURATION_METRIC } from '../src/tracing/metrics-tracer.js';
import type { AddService } from '../src/types/add.js';

const baseConfig: AppConfig = {
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
  authRequired: false,
  concatMaxLength: 10,
  bodyLimit: 1024 * 1024
};

const JSON_HEADERS = { 'content-type': 'application/json' };

let resources: ServerResources | undefined;

async function startServer(config: Partial<AppConfig> = {}, overrides: ServerOverrides = {}) {
  resources = createServer({ ...baseConfig, ...config }, overrides);
  await resources.app.ready();
  return resources.app;
}

// This helper records the call context handed to the service so tests can inspect propagation.
function recordingService(contexts: CallContext[]): AddService {
  return {
    async sum(context, a, b) {
      contexts.push(context);
      return a + b;
    },
    async concat(context, a, b) {
      contexts.push(context);
      return a + b;
    }
  };
}

afterEach(async () => {
  await resources?.app.close();
  resources = undefined;
});

describe('add routes', () => {
  it('sums two integers', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":2,"b":3}' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.body).toBe('{"res":5}');
  });

  it('concatenates two strings', async () => {
    const app = await startServer();

    const response = await app.inject({
      method: 'POST',
      url: CONCAT_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":"foo","b":"bar"}'
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ res: 'foobar' });
  });

  it('decodes the body regardless of the declared content type', async () => {
    const app = await startServer();

    const response = await app.inject({
      method: 'POST',
      url: SUM_PATH,
      headers: { 'content-type': 'text/plain' },
      payload: '{"a":-4,"b":1}'
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('{"res":-3}');
  });
});

describe('request decoding failures', () => {
  it('answers malformed JSON with 400', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: 'not-json' });
    const body = response.json<{ error: { code: number; message: string } }>();

    expect(response.statusCode).toBe(400);
    expect(response.headers['content-type']).toMatch(/^application\/json/);
    expect(body.error.code).toBe(400);
    expect(body.error.message.startsWith('invalid JSON body: ')).toBe(true);
  });

  it('answers type mismatches with 400 and the offending field', async () => {
    const app = await startServer();

    const response = await app.inject({
      method: 'POST',
      url: SUM_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":"2","b":3}'
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        code: 400,
        message: 'invalid body: a: Expected number, received string',
        errors: [{ message: 'invalid body: a: Expected number, received string' }]
      }
    });
  });

  it('answers operands outside the safe integer range with 400', async () => {
    const app = await startServer();

    const response = await app.inject({
      method: 'POST',
      url: SUM_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":9007199254740993,"b":-9007199254740990}'
    });
    const body = response.json<{ error: { code: number; message: string } }>();

    expect(response.statusCode).toBe(400);
    expect(body.error.code).toBe(400);
    expect(body.error.message.startsWith('invalid body: a: ')).toBe(true);
  });

  it('answers an empty body with 400', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'POST', url: SUM_PATH });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        code: 400,
        message: 'unexpected end of request body',
        errors: [{ message: 'unexpected end of request body' }]
      }
    });
  });

  it('keeps the framework status for oversized bodies', async () => {
    const app = await startServer({ bodyLimit: 16 });

    const response = await app.inject({
      method: 'POST',
      url: CONCAT_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":"0123456789","b":"0123456789"}'
    });

    expect(response.statusCode).toBe(413);
    expect(response.json()).toEqual({
      error: {
        code: 413,
        message: 'Request body is too large',
        errors: [{ message: 'Request body is too large' }]
      }
    });
  });
});

describe('bearer token handling', () => {
  it('rejects calls without a token when authentication is required', async () => {
    const app = await startServer({ authRequired: true });

    const response = await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":2,"b":3}' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      error: {
        code: 401,
        message: 'bearer token was not passed through the request context',
        errors: [{ message: 'bearer token was not passed through the request context' }]
      }
    });
  });

  it('passes the token through the call context', async () => {
    const contexts: CallContext[] = [];
    const app = await startServer({ authRequired: true }, { service: recordingService(contexts) });

    const response = await app.inject({
      method: 'POST',
      url: SUM_PATH,
      headers: { ...JSON_HEADERS, authorization: 'Bearer test-token' },
      payload: '{"a":2,"b":3}'
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('{"res":5}');
    expect(contexts).toHaveLength(1);
    expect(contexts[0]?.token).toBe('test-token');
    expect(contexts[0]?.signal).toBeInstanceOf(AbortSignal);
  });

  it('does not require a token by default', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":1,"b":1}' });

    expect(response.statusCode).toBe(200);
  });
});

describe('trace propagation', () => {
  it('continues a trace started by the caller', async () => {
    const contexts: CallContext[] = [];
    const app = await startServer({}, { service: recordingService(contexts) });
    const traceId = '0af7651916cd43dd8448eb211c80319c';
    const spanId = 'b7ad6b7169203331';

    await app.inject({
      method: 'POST',
      url: CONCAT_PATH,
      headers: { ...JSON_HEADERS, 'x-b3-traceid': traceId, 'x-b3-spanid': spanId },
      payload: '{"a":"a","b":"b"}'
    });

    const trace = contexts[0]?.trace;
    expect(trace?.traceId).toBe(traceId);
    expect(trace?.spanId).toMatch(/^[0-9a-f]{16}$/);
    expect(trace?.spanId).not.toBe(spanId);
  });

  it('starts a new trace when the caller sent none', async () => {
    const contexts: CallContext[] = [];
    const app = await startServer({}, { service: recordingService(contexts) });

    await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":1,"b":2}' });

    expect(contexts[0]?.trace?.traceId).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe('service failures', () => {
  it('maps RPC status errors to their HTTP status', async () => {
    const failing: AddService = {
      async sum() {
        throw new RpcStatusError(RpcCode.InvalidArgument, 'operand rejected');
      },
      async concat() {
        throw new RpcStatusError(RpcCode.Unavailable, 'backend down');
      }
    };
    const app = await startServer({}, { service: failing });

    const sum = await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":1,"b":2}' });
    const concat = await app.inject({
      method: 'POST',
      url: CONCAT_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":"x","b":"y"}'
    });

    expect(sum.statusCode).toBe(400);
    expect(sum.json()).toEqual({
      error: { code: 400, message: 'operand rejected', errors: [{ message: 'operand rejected' }] }
    });
    expect(concat.statusCode).toBe(503);
  });

  it('answers integer overflow with 500 and structured details', async () => {
    const app = await startServer();

    const response = await app.inject({
      method: 'POST',
      url: SUM_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":9007199254740991,"b":1}'
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: {
        code: 500,
        message: 'integer overflow',
        errors: [{ field: 'res', message: 'sum of 9007199254740991 and 1 exceeds the safe integer range' }]
      }
    });
  });

  it('applies domain status rules before the 500 default', async () => {
    const app = await startServer(
      {},
      { domainStatusRules: [(error) => (error.code === 'max_size_exceeded' ? 422 : undefined)] }
    );

    const response = await app.inject({
      method: 'POST',
      url: CONCAT_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":"hello","b":"world!"}'
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      error: {
        code: 422,
        message: 'result exceeds maximum size',
        errors: [{ field: 'res', message: 'concatenated length 11 exceeds 10' }]
      }
    });
  });
});

describe('unknown routes', () => {
  it('answers with the error envelope', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: { code: 404, message: 'route not found: GET /nope', errors: [{ message: 'route not found: GET /nope' }] }
    });
  });

  it('answers malformed percent-encoding in the path with the error envelope', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'POST', url: '/api/add/%E0%A4%A' });

    expect(response.statusCode).toBe(400);
    expect(response.headers['content-type']).toMatch(/^application\/json/);
    expect(response.json()).toEqual({
      error: {
        code: 400,
        message: "'/api/add/%E0%A4%A' is not a valid url component",
        errors: [{ message: "'/api/add/%E0%A4%A' is not a valid url component" }]
      }
    });
  });

  it('treats a wrong method on an operation path as unknown', async () => {
    const app = await startServer();

    const response = await app.inject({ method: 'GET', url: SUM_PATH });

    expect(response.statusCode).toBe(404);
    expect(response.json<{ error: { message: string } }>().error.message).toBe(`route not found: GET ${SUM_PATH}`);
  });
});

describe('error logging', () => {
  function failureRecords(lines: string[]): Array<Record<string, unknown>> {
    return lines
      .map((line): Record<string, unknown> => JSON.parse(line))
      .filter((record) => record.event === 'http_request_failed');
  }

  it('logs each translated client error once at warn with its status', async () => {
    const lines: string[] = [];
    const app = await startServer({ logLevel: 'info' }, { logStream: { write: (line) => void lines.push(line) } });

    await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: 'not-json' });

    const records = failureRecords(lines);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 40, statusCode: 400, method: 'POST', path: SUM_PATH });
  });

  it('logs each translated server error once at error with its status', async () => {
    const lines: string[] = [];
    const app = await startServer({ logLevel: 'info' }, { logStream: { write: (line) => void lines.push(line) } });

    await app.inject({
      method: 'POST',
      url: SUM_PATH,
      headers: JSON_HEADERS,
      payload: '{"a":9007199254740991,"b":1}'
    });

    const records = failureRecords(lines);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 50,
      statusCode: 500,
      errors: [{ field: 'res', message: 'sum of 9007199254740991 and 1 exceeds the safe integer range' }],
      error: { name: 'DomainError', message: 'integer overflow' }
    });
  });

  it('logs nothing for successful calls', async () => {
    const lines: string[] = [];
    const app = await startServer({ logLevel: 'info' }, { logStream: { write: (line) => void lines.push(line) } });

    await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":2,"b":3}' });

    expect(failureRecords(lines)).toEqual([]);
    expect(lines.length).toBeGreaterThan(0);
  });
});

describe('metrics endpoint', () => {
  it('exposes HTTP and endpoint metrics in Prometheus format', async () => {
    const app = await startServer();

    await app.inject({ method: 'POST', url: SUM_PATH, headers: JSON_HEADERS, payload: '{"a":2,"b":3}' });
    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.body).toContain('http_requests_total{method="POST",route="/api/add/sum",status_code="200"} 1');
    expect(response.body).toContain(
      `${ENDPOINT_DURATION_METRIC}_count{operation="Sum",kind="server",success="true"} 1`
    );
  });

  it('keeps registries separate between server instances', async () => {
    const first = createServer(baseConfig);
    const second = createServer(baseConfig);

    try {
      expect(first.registry).not.toBe(second.registry);
      expect(await first.registry.getSingleMetric(ENDPOINT_DURATION_METRIC)?.get()).toBeDefined();
    } finally {
      await first.app.close();
      await second.app.close();
    }
  });
});
