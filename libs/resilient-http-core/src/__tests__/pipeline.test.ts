import { describe, expect, it } from 'vitest';

import type { ResilienceOptionsInput } from '../config';
import { decodeEnvelope } from '../envelope';
import { HttpClient } from '../HttpClient';
import type { HttpMethod, HttpTransport, PipelineOutcome, RawHttpResponse, RequestDescriptor } from '../types';
import {
  createLogger,
  createTestRuntime,
  createTransport,
  deferred,
  flush,
  jsonResponse,
  okResponse,
  textResponse,
} from './fakes';

function setup(resilience: ResilienceOptionsInput = {}, random = 0.5) {
  const transport = createTransport();
  const clock = createTestRuntime(random);
  const logger = createLogger();
  const client = new HttpClient({
    clientName: 'pipeline-test',
    baseUrl: 'https://api.test/client/v4',
    transport,
    logger,
    runtime: clock.runtime,
    resilience: { proactiveThrottlingEnabled: false, ...resilience },
  });
  return { client, transport, clock, logger };
}

const request = (method: HttpMethod = 'GET'): RequestDescriptor => ({ method, path: 'zones', operation: 'zones.test' });

const decode = (response: RawHttpResponse): PipelineOutcome<unknown> => decodeEnvelope(response);

/** Transport that never answers and rejects once the attempt is aborted. */
const hang: HttpTransport = (_req, signal) =>
  new Promise<RawHttpResponse>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('retry gating', () => {
  it.each<HttpMethod>(['POST', 'PATCH'])('invokes the transport once for %s on a transient status', async (method) => {
    const { client, transport } = setup();
    transport.mockResolvedValue(textResponse('unavailable', 503));

    const outcome = await client.execute(request(method), decode);

    expect(transport).toHaveBeenCalledTimes(1);
    expect(outcome.kind === 'transportFailure' && outcome.status).toBe(503);
  });

  it.each<[HttpMethod, number]>([
    ['GET', 503],
    ['PUT', 500],
    ['DELETE', 502],
    ['HEAD', 408],
  ])('retries %s once after %s and returns the success', async (method, status) => {
    const { client, transport } = setup();
    transport.mockResolvedValueOnce(textResponse('transient', status)).mockResolvedValueOnce(okResponse({ id: 'z1' }));

    const outcome = await client.execute(request(method), decode);

    expect(transport).toHaveBeenCalledTimes(2);
    expect(outcome.kind === 'success' && outcome.value).toEqual({ id: 'z1' });
  });

  it('does not retry 429 when rate-limit retry is disabled', async () => {
    const { client, transport } = setup({ rateLimitRetryEnabled: false });
    transport.mockResolvedValue(textResponse('slow down', 429, { 'retry-after': '1' }));

    const outcome = await client.execute(request(), decode);

    expect(transport).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ kind: 'transportFailure', reason: 'http_status', status: 429 });
  });

  it('retries 429 when enabled, waiting the server Retry-After', async () => {
    const { client, transport, clock } = setup({ rateLimitRetryEnabled: true });
    transport
      .mockResolvedValueOnce(textResponse('slow down', 429, { 'retry-after': '2' }))
      .mockResolvedValueOnce(okResponse(true));

    const outcome = await client.execute(request(), decode);

    expect(transport).toHaveBeenCalledTimes(2);
    expect(outcome.kind).toBe('success');
    expect(clock.sleeps).toEqual([2000]);
  });

  it('caps Retry-After at maxRetryAfterMs', async () => {
    const { client, transport, clock } = setup({ maxRetryAfterMs: 1500 });
    transport
      .mockResolvedValueOnce(textResponse('maintenance', 503, { 'retry-after': '120' }))
      .mockResolvedValueOnce(okResponse(true));

    await client.execute(request(), decode);

    expect(clock.sleeps).toEqual([1500]);
  });

  it('surfaces both errors of a success:false envelope and never retries it', async () => {
    const { client, transport } = setup();
    transport.mockResolvedValue(
      jsonResponse({
        success: false,
        errors: [
          { code: 1001, message: 'a' },
          { code: 1002, message: 'b' },
        ],
        messages: [],
        result: null,
      }),
    );

    const outcome = await client.execute(request(), decode);

    expect(transport).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({
      kind: 'applicationFailure',
      errors: [
        { code: 1001, message: 'a' },
        { code: 1002, message: 'b' },
      ],
      messages: [],
      status: 200,
      headers: { 'content-type': 'application/json' },
    });
  });

  it('returns the last outcome unchanged once retries are exhausted', async () => {
    const { client, transport } = setup({ maxRetries: 2, baseDelayMs: 10 });
    transport
      .mockResolvedValueOnce(textResponse('a', 500))
      .mockResolvedValueOnce(textResponse('b', 502))
      .mockResolvedValueOnce(textResponse('c', 504));
    const seen: PipelineOutcome<unknown>[] = [];

    const outcome = await client.execute(request(), (response) => {
      const decoded = decode(response);
      seen.push(decoded);
      return decoded;
    });

    expect(transport).toHaveBeenCalledTimes(3);
    expect(seen).toHaveLength(3);
    expect(outcome).toBe(seen[2]);
    expect(outcome).toMatchObject({ status: 504, body: 'c' });
  });
});

describe('backoff', () => {
  it('doubles the delay per retry with neutral jitter', async () => {
    const { client, transport, clock } = setup({ maxRetries: 3, baseDelayMs: 100 }, 0.5);
    transport.mockResolvedValue(textResponse('down', 503));

    await client.execute(request(), decode);

    expect(transport).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([100, 200, 400]);
    expect(clock.sleeps.reduce((sum, ms) => sum + ms, 0)).toBeGreaterThan(100);
  });

  it('applies jitter from the configured range and caps at maxDelayMs', async () => {
    const low = setup({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 1500 }, 0);
    low.transport.mockResolvedValue(textResponse('down', 500));
    await low.client.execute(request(), decode);
    expect(low.clock.sleeps).toEqual([800, 1200, 1200]);

    const high = setup({ maxRetries: 2, baseDelayMs: 100 }, 1);
    high.transport.mockResolvedValue(textResponse('down', 500));
    await high.client.execute(request(), decode);
    expect(high.clock.sleeps).toEqual([120, 240]);
  });
});

describe('circuit breaker', () => {
  it('opens after minimumThroughput failures and lets exactly one trial call through after the break', async () => {
    const { client, transport, clock } = setup({
      maxRetries: 0,
      circuitBreakerMinimumThroughput: 3,
      circuitBreakerBreakDurationMs: 5000,
    });
    transport.mockResolvedValue(textResponse('down', 500));

    for (let i = 0; i < 3; i += 1) {
      await client.execute(request(), decode);
    }
    expect(client.pipeline.circuitState).toBe('open');

    const shortCircuited = await client.execute(request(), decode);
    expect(shortCircuited).toEqual({ kind: 'rejected', reason: 'circuit_open', retryAfterMs: 5000 });
    expect(transport).toHaveBeenCalledTimes(3);

    clock.advance(5000);
    const trialResponse = deferred<RawHttpResponse>();
    transport.mockReset();
    transport.mockReturnValueOnce(trialResponse.promise);

    const trial = client.execute(request(), decode);
    const concurrent = client.execute(request(), decode);

    expect(await concurrent).toEqual({ kind: 'rejected', reason: 'circuit_open', retryAfterMs: 0 });
    await flush();
    expect(transport).toHaveBeenCalledTimes(1);

    trialResponse.resolve(okResponse(true));
    expect((await trial).kind).toBe('success');
    expect(client.pipeline.circuitState).toBe('closed');
  });

  it('reopens when the trial call fails', async () => {
    const { client, transport, clock } = setup({
      maxRetries: 0,
      circuitBreakerMinimumThroughput: 2,
      circuitBreakerBreakDurationMs: 1000,
    });
    transport.mockResolvedValue(textResponse('down', 503));

    await client.execute(request(), decode);
    await client.execute(request(), decode);
    clock.advance(1000);
    expect(client.pipeline.circuitState).toBe('halfOpen');

    await client.execute(request(), decode);

    expect(transport).toHaveBeenCalledTimes(3);
    expect(client.pipeline.circuitState).toBe('open');
  });

  it('does not count application failures or client errors', async () => {
    const { client, transport } = setup({ maxRetries: 0, circuitBreakerMinimumThroughput: 2 });
    transport
      .mockResolvedValueOnce(jsonResponse({ success: false, errors: [{ code: 1, message: 'bad' }], messages: [], result: null }))
      .mockResolvedValueOnce(textResponse('missing', 404))
      .mockResolvedValueOnce(okResponse(true));

    await client.execute(request(), decode);
    await client.execute(request(), decode);
    const third = await client.execute(request(), decode);

    expect(third.kind).toBe('success');
    expect(client.pipeline.circuitState).toBe('closed');
  });
});

describe('rate limiter', () => {
  it('rejects a second concurrent call with permitLimit=1 and queueLimit=0 without invoking the transport', async () => {
    const { client, transport } = setup({ permitLimit: 1, queueLimit: 0 });
    const first = deferred<RawHttpResponse>();
    transport.mockReturnValueOnce(first.promise);

    const inFlight = client.execute(request(), decode);
    await flush();
    const second = await client.execute(request(), decode);

    expect(second).toEqual({ kind: 'rejected', reason: 'rate_limiter_rejected' });
    expect(transport).toHaveBeenCalledTimes(1);

    first.resolve(okResponse(1));
    expect((await inFlight).kind).toBe('success');
  });

  it('admits one call, queues one and rejects a third with permitLimit=1 and queueLimit=1', async () => {
    const { client, transport } = setup({ permitLimit: 1, queueLimit: 1 });
    const first = deferred<RawHttpResponse>();
    transport.mockReturnValueOnce(first.promise).mockResolvedValueOnce(okResponse(2));

    const a = client.execute(request(), decode);
    await flush();
    const b = client.execute(request(), decode);
    const c = await client.execute(request(), decode);

    expect(c).toEqual({ kind: 'rejected', reason: 'rate_limiter_rejected' });
    expect(client.pipeline.rateLimiterStats).toEqual({ inFlight: 1, queued: 1 });

    first.resolve(okResponse(1));
    const [outcomeA, outcomeB] = await Promise.all([a, b]);

    expect(outcomeA.kind === 'success' && outcomeA.value).toBe(1);
    expect(outcomeB.kind === 'success' && outcomeB.value).toBe(2);
    expect(transport).toHaveBeenCalledTimes(2);
    expect(client.pipeline.rateLimiterStats).toEqual({ inFlight: 0, queued: 0 });
  });

  it('hands freed permits to queued calls in arrival order', async () => {
    const { client, transport } = setup({ permitLimit: 1, queueLimit: 3 });
    const first = deferred<RawHttpResponse>();
    transport.mockImplementation((req) =>
      req.url.endsWith('/a') ? first.promise : Promise.resolve(okResponse(req.url)),
    );
    const call = (name: string) => client.execute({ method: 'GET', path: `items/${name}` }, decode);

    const calls = [call('a')];
    await flush();
    for (const name of ['b', 'c', 'd']) {
      calls.push(call(name));
      await flush();
    }
    expect(client.pipeline.rateLimiterStats).toEqual({ inFlight: 1, queued: 3 });

    first.resolve(okResponse('a'));
    const outcomes = await Promise.all(calls);

    expect(outcomes.map((outcome) => outcome.kind)).toEqual(['success', 'success', 'success', 'success']);
    expect(transport.mock.calls.map(([req]) => req.url.slice(req.url.lastIndexOf('/') + 1))).toEqual([
      'a',
      'b',
      'c',
      'd',
    ]);
  });

  it('dequeues a waiter whose call is cancelled', async () => {
    const { client, transport } = setup({ permitLimit: 1, queueLimit: 1 });
    const first = deferred<RawHttpResponse>();
    transport.mockReturnValueOnce(first.promise);
    const controller = new AbortController();

    const a = client.execute(request(), decode);
    await flush();
    const b = client.execute(request(), decode, { signal: controller.signal });
    expect(client.pipeline.rateLimiterStats.queued).toBe(1);

    controller.abort();

    expect(await b).toEqual({ kind: 'rejected', reason: 'cancelled' });
    expect(client.pipeline.rateLimiterStats.queued).toBe(0);
    first.resolve(okResponse(1));
    await a;
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('paces admission when the server quota runs low', async () => {
    const { client, transport, clock, logger } = setup({ proactiveThrottlingEnabled: true, quotaLowThreshold: 0.1 });
    transport
      .mockResolvedValueOnce(
        okResponse(1, { 'ratelimit-limit': '100', 'ratelimit-remaining': '4', 'ratelimit-reset': '10' }),
      )
      .mockResolvedValueOnce(okResponse(2));

    await client.execute(request(), decode);
    expect(clock.sleeps).toEqual([]);

    await client.execute(request(), decode);

    expect(clock.sleeps).toEqual([2000]);
    expect(logger.info).toHaveBeenCalledWith('http.ratelimiter.throttled', expect.objectContaining({ delayMs: 2000 }));
  });
});

describe('timeouts and cancellation', () => {
  it('treats an attempt timeout as retryable', async () => {
    const { client, transport, logger } = setup({ attemptTimeoutMs: 20, maxRetries: 1, baseDelayMs: 0 });
    transport.mockImplementationOnce(hang).mockResolvedValueOnce(okResponse('late'));

    const outcome = await client.execute(request(), decode);

    expect(transport).toHaveBeenCalledTimes(2);
    expect(outcome.kind === 'success' && outcome.value).toBe('late');
    expect(logger.warn).toHaveBeenCalledWith('http.timeout.attempt', expect.objectContaining({ attempt: 1 }));
  });

  it('reports attempt_timeout once retries are exhausted', async () => {
    const { client, transport } = setup({ attemptTimeoutMs: 10, maxRetries: 0 });
    transport.mockImplementation(hang);

    const outcome = await client.execute(request(), decode);

    expect(outcome).toMatchObject({ kind: 'transportFailure', reason: 'attempt_timeout' });
  });

  it('ends the whole operation on total timeout and aborts the in-flight attempt', async () => {
    const { client, transport } = setup({ totalTimeoutMs: 30, maxRetries: 5 });
    transport.mockImplementation(hang);

    const outcome = await client.execute(request(), decode);

    expect(outcome).toEqual({ kind: 'rejected', reason: 'total_timeout' });
    expect(transport).toHaveBeenCalledTimes(1);
    const signal = transport.mock.calls[0]?.[1];
    expect(signal?.aborted).toBe(true);
  });

  it('reports caller cancellation as cancelled', async () => {
    const { client, transport } = setup();
    transport.mockImplementation(hang);
    const controller = new AbortController();

    const pending = client.execute(request(), decode, { signal: controller.signal });
    await flush();
    controller.abort();

    expect(await pending).toEqual({ kind: 'rejected', reason: 'cancelled' });
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('does not start a call whose signal is already aborted', async () => {
    const { client, transport } = setup();
    const controller = new AbortController();
    controller.abort();

    const outcome = await client.execute(request(), decode, { signal: controller.signal });

    expect(outcome).toEqual({ kind: 'rejected', reason: 'cancelled' });
    expect(transport).not.toHaveBeenCalled();
  });
});

describe('pipeline isolation', () => {
  it('keeps breaker state per client', async () => {
    const a = setup({ maxRetries: 0, circuitBreakerMinimumThroughput: 1 });
    const b = setup({ maxRetries: 0, circuitBreakerMinimumThroughput: 1 });
    a.transport.mockResolvedValue(textResponse('down', 500));
    b.transport.mockResolvedValue(okResponse(true));

    await a.client.execute(request(), decode);
    const fromB = await b.client.execute(request(), decode);

    expect(a.client.pipeline.circuitState).toBe('open');
    expect(b.client.pipeline.circuitState).toBe('closed');
    expect(fromB.kind).toBe('success');
  });
});
