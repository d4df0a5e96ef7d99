import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Transport over a WHATWG `fetch`. Without `fetchFn` the global one is looked up on every
 * call. Response header names are lower-cased and the body is read into memory; `HEAD`
 * responses get an empty body.
 */
export function createFetchTransport(fetchFn?: FetchFn): HttpTransport {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const send: FetchFn = fetchFn ?? globalThis.fetch;
    const response = await send(req.url, {
      method: req.method,
      headers: { ...req.headers },
      body: req.body,
      signal,
    });

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    const body = req.method === 'HEAD' ? new ArrayBuffer(0) : await response.arrayBuffer();

    return { status: response.status, headers, body };
  };
}

export const fetchTransport: HttpTransport = createFetchTransport();
