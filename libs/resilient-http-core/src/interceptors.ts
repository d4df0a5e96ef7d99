// ============================================================================
// Standard Interceptors
// ============================================================================

import { randomUUID } from 'crypto';

import type { BeforeSendContext, HttpRequestInterceptor, RequestDescriptor } from './types';

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

// ============================================================================
// Auth Interceptor
// ============================================================================

export interface AuthInterceptorOptions {
  getToken: () => Promise<string | null> | string | null;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Creates an interceptor that adds an authorization header to each attempt.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({
 *   baseUrl: 'https://api.example.com/v1',
 *   interceptors: [createAuthInterceptor({ getToken: () => process.env.API_TOKEN ?? null })],
 * });
 * ```
 */
export function createAuthInterceptor(opts: AuthInterceptorOptions): HttpRequestInterceptor {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return {
    beforeSend: async (ctx: BeforeSendContext) => {
      const token = await opts.getToken();
      if (token) {
        ctx.request.headers[headerName] = formatToken(token);
      }
    },
  };
}

// ============================================================================
// JSON Body Interceptor
// ============================================================================

export interface JsonBodyInterceptorOptions {
  defaultContentType?: string; // default: "application/json"
}

/** Sets Content-Type on requests that carry a body and have none yet. */
export function createJsonBodyInterceptor(opts?: JsonBodyInterceptorOptions): HttpRequestInterceptor {
  const contentType = opts?.defaultContentType ?? 'application/json';

  return {
    beforeSend: (ctx: BeforeSendContext) => {
      if (ctx.request.body !== undefined && !hasHeader(ctx.request.headers, 'content-type')) {
        ctx.request.headers['Content-Type'] = contentType;
      }
    },
  };
}

// ============================================================================
// Request Id Interceptor
// ============================================================================

export interface RequestIdInterceptorOptions {
  headerName?: string; // default: "X-Request-Id"
  generate?: () => string;
}

/**
 * Tags every attempt with a request id. Retries of one logical call reuse the id, so
 * server logs can group them.
 */
export function createRequestIdInterceptor(opts?: RequestIdInterceptorOptions): HttpRequestInterceptor {
  const headerName = opts?.headerName ?? 'X-Request-Id';
  const generate = opts?.generate ?? randomUUID;
  const ids = new WeakMap<RequestDescriptor, string>();

  return {
    beforeSend: (ctx: BeforeSendContext) => {
      if (hasHeader(ctx.request.headers, headerName)) return;
      let id = ids.get(ctx.descriptor);
      if (id === undefined) {
        id = generate();
        ids.set(ctx.descriptor, id);
      }
      ctx.request.headers[headerName] = id;
    },
  };
}
