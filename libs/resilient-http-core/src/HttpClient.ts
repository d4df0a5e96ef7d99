import { statusToCategory } from './classifier';
import type { ResilienceOptionsInput } from './config';
import { decodeEnvelope, type ResultSchema } from './envelope';
import { ConfigurationError } from './errors';
import { noopLogger } from './logger';
import { ResiliencePipeline } from './pipeline';
import type { StageContext } from './stages/stage';
import { fetchTransport } from './transport/fetchTransport';
import type {
  AfterResponseContext,
  BeforeSendContext,
  HttpHeaders,
  HttpRequestInterceptor,
  HttpTransport,
  Logger,
  LoggerMeta,
  OnErrorContext,
  PipelineOutcome,
  PipelineRuntime,
  QueryParams,
  RawHttpResponse,
  RequestDescriptor,
  ResponseDecoder,
  TransportRequest,
} from './types';

export interface HttpClientConfig {
  /** Used in log metadata; defaults to `http-client`. */
  clientName?: string;
  baseUrl: string;
  transport?: HttpTransport;
  /** Sent with every request; per-request headers win. */
  defaultHeaders?: HttpHeaders;
  interceptors?: HttpRequestInterceptor[];
  logger?: Logger;
  resilience?: ResilienceOptionsInput;
  /** Clock, sleep and randomness; tests replace these. */
  runtime?: Partial<PipelineRuntime>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

const textEncoder = new TextEncoder();

/**
 * Entry point for collaborator code. Every call runs through the client's single
 * {@link ResiliencePipeline}; the caller's decoder turns each raw response into an outcome.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({ baseUrl: 'https://api.example.com/v1/' });
 * const outcome = await client.execute(
 *   { method: 'GET', path: 'zones', operation: 'zones.list' },
 *   (response) => decodeListEnvelope(response, zoneSchema),
 * );
 * if (outcome.kind === 'success') console.log(outcome.value.length);
 * ```
 */
export class HttpClient {
  readonly pipeline: ResiliencePipeline;

  private readonly baseUrl: string;
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly interceptors: readonly HttpRequestInterceptor[];
  private readonly defaultHeaders: HttpHeaders;

  constructor(config: HttpClientConfig) {
    this.baseUrl = this.normalizeBaseUrl(config.baseUrl);
    this.clientName = config.clientName ?? 'http-client';
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger ?? noopLogger;
    this.interceptors = [...(config.interceptors ?? [])];
    this.defaultHeaders = { ...config.defaultHeaders };
    this.pipeline = new ResiliencePipeline(config.resilience, { logger: this.logger, runtime: config.runtime });
  }

  getClientName(): string {
    return this.clientName;
  }

  /**
   * Runs one logical operation through the full pipeline. Rejects with a
   * `ConfigurationError` when an absolute path points away from the base URL's origin.
   */
  async execute<T>(
    descriptor: RequestDescriptor,
    decode: ResponseDecoder<T>,
    options: ExecuteOptions = {},
  ): Promise<PipelineOutcome<T>> {
    this.assertSameOrigin(descriptor.path);
    return this.pipeline.execute(descriptor, (ctx) => this.runAttempt(descriptor, decode, ctx), {
      signal: options.signal,
      meta: { client: this.clientName },
    });
  }

  /** `execute` with the envelope decoder and a zod schema for `result`. */
  requestEnvelope<T>(
    descriptor: RequestDescriptor,
    resultSchema: ResultSchema<T>,
    options: ExecuteOptions = {},
  ): Promise<PipelineOutcome<T>> {
    return this.execute(descriptor, (response) => decodeEnvelope(response, resultSchema), options);
  }

  buildUrl(path: string, query?: Readonly<QueryParams>): string {
    let url: URL;
    if (this.isAbsoluteUrl(path)) {
      this.assertSameOrigin(path);
      url = new URL(path);
    } else {
      const normalizedPath = path.startsWith('/') ? path.slice(1) : path;
      url = new URL(normalizedPath, this.baseUrl);
    }
    this.applyQueryParameters(url, query);
    return url.toString();
  }

  private async runAttempt<T>(
    descriptor: RequestDescriptor,
    decode: ResponseDecoder<T>,
    ctx: StageContext,
  ): Promise<PipelineOutcome<T>> {
    const meta: LoggerMeta = { ...ctx.meta, attempt: ctx.attempt };
    const request = this.buildTransportRequest(descriptor);
    this.logger.debug('http.request.attempt', meta);

    try {
      await this.applyBeforeSendInterceptors({ descriptor, request, attempt: ctx.attempt, signal: ctx.signal });
    } catch (error) {
      await this.runErrorInterceptors({ descriptor, request, error, attempt: ctx.attempt });
      return { kind: 'transportFailure', reason: 'network', error };
    }

    let response: RawHttpResponse;
    try {
      response = await this.transport(request, ctx.signal);
    } catch (error) {
      if (!ctx.signal.aborted) {
        this.logger.warn('http.request.failed', {
          ...meta,
          reason: 'network',
          error: error instanceof Error ? error.message : String(error),
        });
      }
      await this.runErrorInterceptors({ descriptor, request, error, attempt: ctx.attempt });
      return { kind: 'transportFailure', reason: 'network', error };
    }

    await this.applyAfterResponseInterceptors({ descriptor, request, response, attempt: ctx.attempt });

    let outcome: PipelineOutcome<T>;
    try {
      outcome = decode(response);
    } catch (error) {
      outcome = {
        kind: 'transportFailure',
        reason: 'malformed_response',
        status: response.status,
        headers: response.headers,
        error,
      };
    }
    this.logOutcome(outcome, meta);
    return outcome;
  }

  private logOutcome(outcome: PipelineOutcome<unknown>, meta: LoggerMeta): void {
    switch (outcome.kind) {
      case 'success':
        this.logger.debug('http.request.success', { ...meta, status: outcome.status });
        return;
      case 'applicationFailure':
        this.logger.warn('http.request.failed', {
          ...meta,
          status: outcome.status,
          reason: 'application_failure',
          errors: outcome.errors,
        });
        return;
      case 'transportFailure':
        this.logger.warn('http.request.failed', {
          ...meta,
          status: outcome.status,
          reason: outcome.reason,
          category: outcome.status !== undefined ? statusToCategory(outcome.status) : 'network',
        });
        return;
      default:
        return;
    }
  }

  private buildTransportRequest(descriptor: RequestDescriptor): TransportRequest {
    const headers: HttpHeaders = { Accept: 'application/json', ...this.defaultHeaders, ...descriptor.headers };
    const request: TransportRequest = {
      method: descriptor.method,
      url: this.buildUrl(descriptor.path, descriptor.query),
      headers,
    };
    if (descriptor.body !== undefined) {
      request.body = this.serializeBody(descriptor.body, headers);
    }
    return request;
  }

  private serializeBody(body: unknown, headers: HttpHeaders): Uint8Array {
    if (typeof body === 'string') {
      return textEncoder.encode(body);
    }
    if (body instanceof Uint8Array) {
      return body;
    }
    if (body instanceof ArrayBuffer) {
      return new Uint8Array(body);
    }
    if (!this.hasHeader(headers, 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }
    return textEncoder.encode(JSON.stringify(body));
  }

  private applyQueryParameters(url: URL, query?: Readonly<QueryParams>): void {
    if (!query) return;
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const entry of value) {
          if (entry !== undefined) url.searchParams.append(key, String(entry));
        }
      } else {
        url.searchParams.set(key, String(value));
      }
    }
  }

  private async applyBeforeSendInterceptors(ctx: BeforeSendContext): Promise<void> {
    for (const interceptor of this.interceptors) {
      if (!interceptor.beforeSend) continue;
      try {
        await interceptor.beforeSend(ctx);
      } catch (error) {
        this.logger.warn('http.interceptor.beforeSend.failed', {
          client: this.clientName,
          operation: ctx.descriptor.operation,
          attempt: ctx.attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }
  }

  private async applyAfterResponseInterceptors(ctx: AfterResponseContext): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      try {
        await interceptor.afterResponse(ctx);
      } catch (error) {
        this.logger.warn('http.interceptor.afterResponse.failed', {
          client: this.clientName,
          operation: ctx.descriptor.operation,
          attempt: ctx.attempt,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private async runErrorInterceptors(ctx: OnErrorContext): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError(ctx);
      } catch (hookError) {
        this.logger.warn('http.interceptor.onError.failed', {
          client: this.clientName,
          operation: ctx.descriptor.operation,
          attempt: ctx.attempt,
          error: hookError instanceof Error ? hookError.message : String(hookError),
        });
      }
    }
  }

  private hasHeader(headers: HttpHeaders, name: string): boolean {
    const lower = name.toLowerCase();
    return Object.keys(headers).some((key) => key.toLowerCase() === lower);
  }

  /** Absolute paths must share the base URL's origin. */
  private assertSameOrigin(path: string): void {
    if (!this.isAbsoluteUrl(path)) return;
    const target = new URL(path).origin;
    const expected = new URL(this.baseUrl).origin;
    if (target !== expected) {
      throw new ConfigurationError('Request URL is outside the client base URL', [
        `path: origin ${target} does not match ${expected}`,
      ]);
    }
  }

  private isAbsoluteUrl(path: string): boolean {
    return /^https?:\/\//i.test(path);
  }

  private normalizeBaseUrl(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') {
      throw new Error('HttpClient requires a non-empty baseUrl');
    }
    return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
  }
}
