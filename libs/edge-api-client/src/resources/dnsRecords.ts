import type { QueryParams } from '@edgekit/resilient-http-core';

import {
  deletedSchema,
  dnsRecordSchema,
  type DnsRecord,
  type DnsRecordFilters,
  type DnsRecordInput,
  type DnsRecordListOptions,
  type ListPage,
  type RequestOptions,
} from '../types';
import { ApiResource, encodeSegment } from './apiResource';

function recordsPath(zoneId: string, recordId?: string): string {
  const base = `zones/${encodeSegment(zoneId)}/dns_records`;
  return recordId === undefined ? base : `${base}/${encodeSegment(recordId)}`;
}

function recordQuery(filters: DnsRecordFilters): QueryParams {
  return {
    type: filters.type,
    name: filters.name,
    content: filters.content,
    proxied: filters.proxied,
    match: filters.match,
  };
}

export class DnsRecordsResource extends ApiResource {
  list(zoneId: string, options: DnsRecordListOptions = {}, requestOptions?: RequestOptions): Promise<ListPage<DnsRecord>> {
    return this.requestPage(
      {
        method: 'GET',
        path: recordsPath(zoneId),
        operation: 'dnsRecords.list',
        query: { ...recordQuery(options), page: options.page, per_page: options.perPage },
      },
      dnsRecordSchema,
      requestOptions,
    );
  }

  /** Filters are re-sent unchanged with every page request. */
  async *listAll(
    zoneId: string,
    filters: DnsRecordFilters & { perPage?: number } = {},
    requestOptions: RequestOptions = {},
  ): AsyncGenerator<DnsRecord, void, undefined> {
    yield* this.listPaged(
      { method: 'GET', path: recordsPath(zoneId), operation: 'dnsRecords.list', query: recordQuery(filters) },
      dnsRecordSchema,
      filters.perPage,
      requestOptions,
    );
  }

  get(zoneId: string, recordId: string, options?: RequestOptions): Promise<DnsRecord> {
    return this.request({ method: 'GET', path: recordsPath(zoneId, recordId), operation: 'dnsRecords.get' }, dnsRecordSchema, options);
  }

  create(zoneId: string, input: DnsRecordInput, options?: RequestOptions): Promise<DnsRecord> {
    return this.request(
      { method: 'POST', path: recordsPath(zoneId), operation: 'dnsRecords.create', body: input },
      dnsRecordSchema,
      options,
    );
  }

  /** Replaces the whole record (PUT). */
  overwrite(zoneId: string, recordId: string, input: DnsRecordInput, options?: RequestOptions): Promise<DnsRecord> {
    return this.request(
      { method: 'PUT', path: recordsPath(zoneId, recordId), operation: 'dnsRecords.overwrite', body: input },
      dnsRecordSchema,
      options,
    );
  }

  /** Changes only the given fields (PATCH). */
  update(zoneId: string, recordId: string, patch: Partial<DnsRecordInput>, options?: RequestOptions): Promise<DnsRecord> {
    return this.request(
      { method: 'PATCH', path: recordsPath(zoneId, recordId), operation: 'dnsRecords.update', body: patch },
      dnsRecordSchema,
      options,
    );
  }

  delete(zoneId: string, recordId: string, options?: RequestOptions): Promise<string> {
    return this.request(
      { method: 'DELETE', path: recordsPath(zoneId, recordId), operation: 'dnsRecords.delete' },
      deletedSchema,
      options,
    );
  }
}
