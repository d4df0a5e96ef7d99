import {
  ConfigurationError,
  createAuthInterceptor,
  createConsoleLogger,
  createRequestIdInterceptor,
  HttpClient,
  noopLogger,
  resilienceOptionsFromEnv,
  type HttpRequestInterceptor,
  type HttpTransport,
  type Logger,
  type PipelineRuntime,
  type ResilienceOptionsInput,
} from '@edgekit/resilient-http-core';
import { z } from 'zod';

import { DnsRecordsResource } from './resources/dnsRecords';
import { KvResource } from './resources/kv';
import { UserResource } from './resources/user';
import { ZonesResource } from './resources/zones';

export const DEFAULT_BASE_URL = 'https://api.cloudflare.com/client/v4';

export interface EdgeApiClientConfig {
  apiToken: string;
  /** Needed by account-scoped resources such as KV. */
  accountId?: string;
  baseUrl?: string;
  resilience?: ResilienceOptionsInput;
  transport?: HttpTransport;
  logger?: Logger;
  runtime?: Partial<PipelineRuntime>;
  /** Run after the built-in auth and request-id interceptors. */
  interceptors?: HttpRequestInterceptor[];
}

/**
 * Typed client for the edge platform REST API.
 *
 * All resources share one `HttpClient`, and with it one resilience pipeline: the
 * concurrency limit, circuit breaker and quota tracking apply across every call made
 * through this instance.
 */
export class EdgeApiClient {
  readonly http: HttpClient;
  readonly user: UserResource;
  readonly zones: ZonesResource;
  readonly dnsRecords: DnsRecordsResource;
  readonly kv: KvResource;

  constructor(config: EdgeApiClientConfig) {
    const apiToken = config.apiToken.trim();
    if (apiToken === '') {
      throw new ConfigurationError('Invalid edge API client configuration', ['apiToken: must not be empty']);
    }

    this.http = new HttpClient({
      clientName: 'edge-api',
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      transport: config.transport,
      logger: config.logger ?? noopLogger,
      resilience: config.resilience,
      runtime: config.runtime,
      interceptors: [
        createAuthInterceptor({ getToken: () => apiToken }),
        createRequestIdInterceptor(),
        ...(config.interceptors ?? []),
      ],
    });

    const settings = { accountId: config.accountId };
    this.user = new UserResource(this.http, settings);
    this.zones = new ZonesResource(this.http, settings);
    this.dnsRecords = new DnsRecordsResource(this.http, settings);
    this.kv = new KvResource(this.http, settings);
  }
}

const envSchema = z.object({
  EDGE_API_TOKEN: z.string().trim().min(1).optional(),
  EDGE_ACCOUNT_ID: z.string().trim().min(1).optional(),
  EDGE_API_BASE_URL: z.string().trim().url().default(DEFAULT_BASE_URL),
  EDGE_API_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Create a client from environment variables. Explicit overrides win over the environment.
 *
 * Variables:
 * - `EDGE_API_TOKEN` (required unless `overrides.apiToken` is given)
 * - `EDGE_ACCOUNT_ID`
 * - `EDGE_API_BASE_URL` (default: https://api.cloudflare.com/client/v4)
 * - `EDGE_API_LOG_LEVEL` (default: info)
 * - `EDGE_API_MAX_RETRIES`, `EDGE_API_PERMIT_LIMIT` and the other resilience variables
 */
export function createEdgeApiClient(
  overrides: Partial<EdgeApiClientConfig> = {},
  env: Record<string, string | undefined> = process.env,
): EdgeApiClient {
  const parsed = envSchema.safeParse({
    EDGE_API_TOKEN: env.EDGE_API_TOKEN || undefined,
    EDGE_ACCOUNT_ID: env.EDGE_ACCOUNT_ID || undefined,
    EDGE_API_BASE_URL: env.EDGE_API_BASE_URL || undefined,
    EDGE_API_LOG_LEVEL: env.EDGE_API_LOG_LEVEL || undefined,
  });
  if (!parsed.success) {
    throw ConfigurationError.fromZod('Invalid edge API environment', parsed.error);
  }

  const apiToken = overrides.apiToken ?? parsed.data.EDGE_API_TOKEN;
  if (!apiToken) {
    throw new ConfigurationError('Invalid edge API environment', ['EDGE_API_TOKEN: required']);
  }

  return new EdgeApiClient({
    ...overrides,
    apiToken,
    accountId: overrides.accountId ?? parsed.data.EDGE_ACCOUNT_ID,
    baseUrl: overrides.baseUrl ?? parsed.data.EDGE_API_BASE_URL,
    logger: overrides.logger ?? createConsoleLogger(parsed.data.EDGE_API_LOG_LEVEL),
    resilience: { ...resilienceOptionsFromEnv(env, 'EDGE_API'), ...overrides.resilience },
  });
}
