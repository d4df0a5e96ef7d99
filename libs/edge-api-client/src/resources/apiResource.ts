import {
  ConfigurationError,
  decodeListEnvelope,
  outcomeToError,
  unwrapOutcome,
  type HttpClient,
  type RequestDescriptor,
  type ResultSchema,
} from '@edgekit/resilient-http-core';
import {
  cursorStrategy,
  pageNumberStrategy,
  paginate,
  type PaginationStrategy,
} from '@edgekit/resilient-http-pagination';

import type { CursorPage, ListPage, RequestOptions } from '../types';

export const DEFAULT_PER_PAGE = 50;

export interface ResourceSettings {
  accountId?: string;
}

export function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Base for the API resources. Successful results are returned as values; every other
 * outcome is thrown as the matching `ResilientHttpError` subclass.
 */
export abstract class ApiResource {
  constructor(
    protected readonly http: HttpClient,
    protected readonly settings: ResourceSettings,
  ) {}

  protected async request<T>(
    descriptor: RequestDescriptor,
    schema: ResultSchema<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    return unwrapOutcome(await this.http.requestEnvelope(descriptor, schema, options));
  }

  protected async requestPage<T>(
    descriptor: RequestDescriptor,
    itemSchema: ResultSchema<T>,
    options: RequestOptions = {},
  ): Promise<ListPage<T>> {
    const outcome = await this.http.execute(descriptor, (response) => decodeListEnvelope(response, itemSchema), options);
    if (outcome.kind !== 'success') {
      throw outcomeToError(outcome);
    }
    const info = outcome.pagination;
    if (info?.type === 'page') {
      return {
        items: outcome.value,
        page: info.page,
        perPage: info.perPage,
        totalCount: info.totalCount,
        totalPages: info.totalPages,
      };
    }
    return { items: outcome.value, page: 1, perPage: outcome.value.length, totalCount: outcome.value.length, totalPages: 0 };
  }

  protected async requestCursorPage<T>(
    descriptor: RequestDescriptor,
    itemSchema: ResultSchema<T>,
    options: RequestOptions = {},
  ): Promise<CursorPage<T>> {
    const outcome = await this.http.execute(descriptor, (response) => decodeListEnvelope(response, itemSchema), options);
    if (outcome.kind !== 'success') {
      throw outcomeToError(outcome);
    }
    return { items: outcome.value, cursor: outcome.pagination?.cursor ?? null };
  }

  /** Lazy page-number iteration; `query` is re-sent unchanged on every page. */
  protected listPaged<T>(
    descriptor: RequestDescriptor,
    itemSchema: ResultSchema<T>,
    perPage: number | undefined,
    options: RequestOptions,
  ): AsyncGenerator<T, void, undefined> {
    return this.iterate(descriptor, itemSchema, pageNumberStrategy({ perPage: perPage ?? DEFAULT_PER_PAGE }), options);
  }

  /** Lazy cursor iteration; `query` is re-sent unchanged on every page. */
  protected listCursor<T>(
    descriptor: RequestDescriptor,
    itemSchema: ResultSchema<T>,
    options: RequestOptions,
  ): AsyncGenerator<T, void, undefined> {
    return this.iterate(descriptor, itemSchema, cursorStrategy(), options);
  }

  protected requireAccountId(operation: string): string {
    const accountId = this.settings.accountId;
    if (!accountId) {
      throw new ConfigurationError('Missing account id', [`accountId: required for ${operation}`]);
    }
    return accountId;
  }

  private iterate<T, TState>(
    descriptor: RequestDescriptor,
    itemSchema: ResultSchema<T>,
    strategy: PaginationStrategy<TState>,
    options: RequestOptions,
  ): AsyncGenerator<T, void, undefined> {
    return paginate(this.http, {
      buildRequest: () => descriptor,
      strategy,
      decodeItem: itemSchema,
      signal: options.signal,
    });
  }
}

