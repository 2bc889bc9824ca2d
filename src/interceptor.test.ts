import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { instrumentHandler, buildExecutionRecord, toolCallInterceptor } from './interceptor.js';
import { createTelemetry } from './telemetry.js';
import { ExecutionRecordSchema } from './schemas.js';
import type { ExecutionRecord, RecordTransport, Telemetry } from './types.js';

const T0 = Date.UTC(2025, 0, 15, 5, 30, 0, 0);
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function fakeTransport() {
  const records: ExecutionRecord[] = [];
  const transport: RecordTransport = { sendAsync: vi.fn((r: ExecutionRecord) => { records.push(r); }) };
  return { transport, records };
}

describe('instrumentHandler', () => {
  let telemetry: Telemetry;
  let records: ExecutionRecord[];
  let transport: RecordTransport;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    ({ transport, records } = fakeTransport());
    telemetry = createTelemetry({ serverHost: 'test-server', transport, timezone: 'UTC' });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('returns the handler result and reports SUCCESS', () => {
    function greet(name: string): string {
      vi.setSystemTime(T0 + 25);
      return `hello ${name}`;
    }
    const wrapped = instrumentHandler(greet, telemetry);

    expect(wrapped('world')).toBe('hello world');
    expect(records).toHaveLength(1);
    expect(records[0]).toEqual({
      execution_id: expect.stringMatching(UUID_RE),
      tool_name: 'greet',
      start_timestamp: '2025-01-15 05:30:00.000',
      end_timestamp: '2025-01-15 05:30:00.025',
      duration_ms: 25,
      server_host: 'test-server',
      status: 'SUCCESS',
      error_message: null,
      output_tokens: 2,
    });
  });

  it('counts 11 characters as 2 output tokens', () => {
    const wrapped = instrumentHandler(() => 'hello world', telemetry, 'say_hello');
    wrapped();
    expect(records[0].output_tokens).toBe(2);
    expect(records[0].status).toBe('SUCCESS');
  });

  it('rethrows the same error and reports FAILURE', () => {
    const boom = new TypeError('bad input');
    function validate(): never {
      vi.setSystemTime(T0 + 3);
      throw boom;
    }
    const wrapped = instrumentHandler(validate, telemetry);

    let caught: unknown;
    try {
      wrapped();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBe(boom);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      tool_name: 'validate',
      status: 'FAILURE',
      error_message: 'bad input',
      duration_ms: 3,
    });
    expect(records[0]).not.toHaveProperty('output_tokens');
  });

  it('stringifies non-Error throw values', () => {
    const wrapped = instrumentHandler(() => { throw 'plain string'; }, telemetry, 'thrower');
    let caught: unknown;
    try {
      wrapped();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBe('plain string');
    expect(records[0].error_message).toBe('plain string');
  });

  it('returns the original promise and reports once it resolves', async () => {
    const pending = (async () => {
      vi.setSystemTime(T0 + 40);
      return { content: [{ type: 'text', text: 'ok' }] };
    })();
    const handler = vi.fn(() => pending);
    const wrapped = instrumentHandler(handler, telemetry, 'fetch_page');

    const returned = wrapped();
    expect(returned).toBe(pending);
    await expect(returned).resolves.toEqual({ content: [{ type: 'text', text: 'ok' }] });

    expect(records).toHaveLength(1);
    // '{"content":[{"type":"text","text":"ok"}]}' is 41 characters
    expect(records[0]).toMatchObject({ tool_name: 'fetch_page', status: 'SUCCESS', output_tokens: 10, error_message: null });
  });

  it('reports a rejected promise as FAILURE and keeps the rejection', async () => {
    const wrapped = instrumentHandler(async (_q: string) => { throw new Error('upstream 503'); }, telemetry, 'search');

    await expect(wrapped('q')).rejects.toThrow('upstream 503');
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ status: 'FAILURE', error_message: 'upstream 503' });
  });

  it('reports a throw value that cannot be stringified', () => {
    const odd: unknown = Object.assign(Object.create(null), { code: 42 });
    const wrapped = instrumentHandler(() => { throw odd; }, telemetry, 'odd_throw');
    let caught: unknown;
    try {
      wrapped();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBe(odd);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ status: 'FAILURE', error_message: '[object Object]' });
  });

  it('calls then() on a non-native thenable only when the caller awaits it', async () => {
    class LazyQuery implements PromiseLike<string> {
      runs = 0;
      then<R1 = string, R2 = never>(
        onfulfilled?: ((value: string) => R1 | PromiseLike<R1>) | null,
        onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
      ): PromiseLike<R1 | R2> {
        this.runs += 1;
        return Promise.resolve('rows').then(onfulfilled, onrejected);
      }
    }
    const query = new LazyQuery();
    const wrapped = instrumentHandler(() => query, telemetry, 'lazy_query');

    const returned = wrapped();
    expect(returned).toBe(query);
    expect(query.runs).toBe(0);
    expect(records).toHaveLength(1);
    expect(records[0].status).toBe('SUCCESS');

    await expect(returned).resolves.toBe('rows');
    expect(query.runs).toBe(1);
    expect(records).toHaveLength(1);
  });

  it('passes arguments and this through unchanged', () => {
    const obj = {
      prefix: '>',
      render(a: string, b: number): string {
        return `${this.prefix}${a}${b}`;
      },
    };
    obj.render = instrumentHandler(obj.render, telemetry);
    expect(obj.render('x', 7)).toBe('>x7');
    expect(records[0].tool_name).toBe('render');
  });

  it('keeps the handler name', () => {
    function listFiles(): string[] { return []; }
    expect(instrumentHandler(listFiles, telemetry).name).toBe('listFiles');
  });

  it('falls back to "anonymous" for unnamed handlers', () => {
    const handlers = [() => 1];
    instrumentHandler(handlers[0], telemetry)();
    expect(records[0].tool_name).toBe('anonymous');
  });

  it('reports 0 output tokens for undefined results', () => {
    instrumentHandler(() => undefined, telemetry, 'noop')();
    expect(records[0].output_tokens).toBe(0);
  });

  it('creates a distinct record per call', () => {
    const wrapped = instrumentHandler((n: number) => n * 2, telemetry, 'double');
    expect([wrapped(1), wrapped(2), wrapped(3)]).toEqual([2, 4, 6]);
    expect(records).toHaveLength(3);
    expect(new Set(records.map((r) => r.execution_id)).size).toBe(3);
  });

  it('records are frozen and match the wire schema', () => {
    instrumentHandler(() => 'x', telemetry, 'freeze')();
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(ExecutionRecordSchema.safeParse(records[0]).success).toBe(true);
  });

  it('does not let a failing transport affect the call', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken: RecordTransport = { sendAsync: () => { throw new Error('queue broken'); } };
    const wrapped = instrumentHandler(() => 'still fine', createTelemetry({ serverHost: 'test-server', transport: broken }), 'resilient');

    expect(wrapped()).toBe('still fine');
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(vi.mocked(console.error).mock.calls[0][0]))).toMatchObject({
      event: 'interceptor.error',
      error: 'queue broken',
      tool: 'resilient',
    });
  });

  it('keeps the handler error when the transport also fails', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken: RecordTransport = { sendAsync: () => { throw new Error('queue broken'); } };
    const wrapped = instrumentHandler(() => { throw new Error('bad input'); }, createTelemetry({ serverHost: 'test-server', transport: broken }), 'double_fault');

    expect(() => wrapped()).toThrow('bad input');
  });

  it('still sends a record when the token estimator throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const t = createTelemetry({
      serverHost: 'test-server',
      transport,
      estimateTokens: () => { throw new Error('tokenizer offline'); },
    });
    expect(instrumentHandler(() => 'abc', t, 'estimated')()).toBe('abc');
    expect(records).toHaveLength(1);
    expect(records[0].status).toBe('SUCCESS');
    expect(records[0]).not.toHaveProperty('output_tokens');
  });
});

describe('buildExecutionRecord', () => {
  const telemetry = createTelemetry({ serverHost: 'edge-1', transport: { sendAsync: () => {} }, timezone: 'Asia/Tokyo' });

  it('formats timestamps in the configured zone', () => {
    const record = buildExecutionRecord(
      telemetry,
      { executionId: '6f1c2b1e-8d4a-4c2e-9b7a-1f2e3d4c5b6a', toolName: 'get_ticker', startMs: T0, endMs: T0 + 1500 },
      { status: 'SUCCESS', value: 'abcdefgh' },
    );
    expect(record.start_timestamp).toBe('2025-01-15 14:30:00.000');
    expect(record.end_timestamp).toBe('2025-01-15 14:30:01.500');
    expect(record.duration_ms).toBe(1500);
    expect(record.output_tokens).toBe(2);
  });

  it('clamps a backwards clock to 0ms', () => {
    const record = buildExecutionRecord(
      telemetry,
      { executionId: '6f1c2b1e-8d4a-4c2e-9b7a-1f2e3d4c5b6a', toolName: 'get_ticker', startMs: T0, endMs: T0 - 5 },
      { status: 'FAILURE', error: new Error('x') },
    );
    expect(record.duration_ms).toBe(0);
    expect(record.error_message).toBe('x');
  });
});

describe('toolCallInterceptor', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('posts a record for the wrapped handler to the endpoint in the background', async () => {
    const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200, statusText: 'OK' });
    globalThis.fetch = fetchMock;

    const wrapped = toolCallInterceptor(function lookup(id: number) { return `item-${id}`; }, 'edge-1', 'http://collector.test/logs');

    expect(wrapped(7)).toBe('item-7');
    expect(fetchMock).not.toHaveBeenCalled();

    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://collector.test/logs');
    expect(JSON.parse(init.body)).toMatchObject({
      tool_name: 'lookup',
      server_host: 'edge-1',
      status: 'SUCCESS',
      error_message: null,
      output_tokens: 1,
    });
  });
});
