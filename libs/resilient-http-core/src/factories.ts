import { HttpClient, type HttpClientConfig } from './HttpClient';
import { createConsoleLogger } from './logger';
import { fetchTransport } from './transport/fetchTransport';

/**
 * Creates an HttpClient with the defaults most callers want.
 *
 * Defaults applied:
 * - Transport: global fetch (via fetchTransport)
 * - Logger: console logger at `info`
 * - Resilience: schema defaults (see `resilienceOptionsSchema`), overridable per field
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({
 *   clientName: 'edge-api',
 *   baseUrl: 'https://api.example.com/v1',
 *   resilience: { maxRetries: 3 },
 * });
 * ```
 */
export function createDefaultHttpClient(config: HttpClientConfig & { clientName: string }): HttpClient {
  return new HttpClient({
    ...config,
    transport: config.transport ?? fetchTransport,
    logger: config.logger ?? createConsoleLogger(),
    interceptors: config.interceptors ?? [],
  });
}
