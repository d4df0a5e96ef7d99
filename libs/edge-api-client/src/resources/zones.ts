import type { QueryParams } from '@edgekit/resilient-http-core';

import {
  deletedSchema,
  zoneSchema,
  type CreateZoneInput,
  type ListPage,
  type RequestOptions,
  type Zone,
  type ZoneFilters,
  type ZoneListOptions,
} from '../types';
import { ApiResource, encodeSegment } from './apiResource';

function zoneQuery(filters: ZoneFilters): QueryParams {
  return {
    name: filters.name,
    status: filters.status,
    'account.id': filters.accountId,
    order: filters.order,
    direction: filters.direction,
    match: filters.match,
  };
}

export class ZonesResource extends ApiResource {
  /** One page of zones. */
  list(options: ZoneListOptions = {}, requestOptions?: RequestOptions): Promise<ListPage<Zone>> {
    return this.requestPage(
      {
        method: 'GET',
        path: 'zones',
        operation: 'zones.list',
        query: { ...zoneQuery(options), page: options.page, per_page: options.perPage },
      },
      zoneSchema,
      requestOptions,
    );
  }

  /** Every zone matching `filters`, fetched page by page as the caller iterates. */
  async *listAll(filters: ZoneFilters & { perPage?: number } = {}, requestOptions: RequestOptions = {}): AsyncGenerator<Zone, void, undefined> {
    yield* this.listPaged(
      { method: 'GET', path: 'zones', operation: 'zones.list', query: zoneQuery(filters) },
      zoneSchema,
      filters.perPage,
      requestOptions,
    );
  }

  get(zoneId: string, options?: RequestOptions): Promise<Zone> {
    return this.request({ method: 'GET', path: `zones/${encodeSegment(zoneId)}`, operation: 'zones.get' }, zoneSchema, options);
  }

  async create(input: CreateZoneInput, options?: RequestOptions): Promise<Zone> {
    const accountId = input.accountId ?? this.requireAccountId('zones.create');
    return this.request(
      {
        method: 'POST',
        path: 'zones',
        operation: 'zones.create',
        body: { name: input.name, account: { id: accountId }, type: input.type ?? 'full' },
      },
      zoneSchema,
      options,
    );
  }

  /** Returns the id of the deleted zone. */
  delete(zoneId: string, options?: RequestOptions): Promise<string> {
    return this.request({ method: 'DELETE', path: `zones/${encodeSegment(zoneId)}`, operation: 'zones.delete' }, deletedSchema, options);
  }
}
