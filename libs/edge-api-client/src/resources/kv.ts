import { decodeRaw, unwrapOutcome } from '@edgekit/resilient-http-core';
import { z } from 'zod';

import {
  kvKeySchema,
  kvNamespaceSchema,
  type CursorPage,
  type KvKey,
  type KvKeyListOptions,
  type KvNamespace,
  type KvNamespaceListOptions,
  type KvWriteOptions,
  type ListPage,
  type RequestOptions,
} from '../types';
import { ApiResource, encodeSegment } from './apiResource';

const ignoredResult = z.unknown();

/** Workers KV: namespaces, keys and raw values. Every call is scoped to the client's account. */
export class KvResource extends ApiResource {
  async listNamespaces(options: KvNamespaceListOptions = {}, requestOptions?: RequestOptions): Promise<ListPage<KvNamespace>> {
    return this.requestPage(
      {
        method: 'GET',
        path: this.namespacesPath('kv.listNamespaces'),
        operation: 'kv.listNamespaces',
        query: { page: options.page, per_page: options.perPage, order: options.order, direction: options.direction },
      },
      kvNamespaceSchema,
      requestOptions,
    );
  }

  async *listAllNamespaces(
    options: Omit<KvNamespaceListOptions, 'page'> = {},
    requestOptions: RequestOptions = {},
  ): AsyncGenerator<KvNamespace, void, undefined> {
    yield* this.listPaged(
      {
        method: 'GET',
        path: this.namespacesPath('kv.listAllNamespaces'),
        operation: 'kv.listNamespaces',
        query: { order: options.order, direction: options.direction },
      },
      kvNamespaceSchema,
      options.perPage,
      requestOptions,
    );
  }

  async createNamespace(title: string, options?: RequestOptions): Promise<KvNamespace> {
    return this.request(
      { method: 'POST', path: this.namespacesPath('kv.createNamespace'), operation: 'kv.createNamespace', body: { title } },
      kvNamespaceSchema,
      options,
    );
  }

  async deleteNamespace(namespaceId: string, options?: RequestOptions): Promise<void> {
    await this.request(
      {
        method: 'DELETE',
        path: this.namespacePath('kv.deleteNamespace', namespaceId),
        operation: 'kv.deleteNamespace',
      },
      ignoredResult,
      options,
    );
  }

  /** One page of keys; pass the returned cursor back for the next one. */
  async listKeys(namespaceId: string, options: KvKeyListOptions = {}, requestOptions?: RequestOptions): Promise<CursorPage<KvKey>> {
    return this.requestCursorPage(
      {
        method: 'GET',
        path: `${this.namespacePath('kv.listKeys', namespaceId)}/keys`,
        operation: 'kv.listKeys',
        query: { prefix: options.prefix, limit: options.limit, cursor: options.cursor },
      },
      kvKeySchema,
      requestOptions,
    );
  }

  async *listAllKeys(
    namespaceId: string,
    options: Omit<KvKeyListOptions, 'cursor'> = {},
    requestOptions: RequestOptions = {},
  ): AsyncGenerator<KvKey, void, undefined> {
    yield* this.listCursor(
      {
        method: 'GET',
        path: `${this.namespacePath('kv.listAllKeys', namespaceId)}/keys`,
        operation: 'kv.listKeys',
        query: { prefix: options.prefix, limit: options.limit },
      },
      kvKeySchema,
      requestOptions,
    );
  }

  /** The stored value as text, or null when the key does not exist. */
  async getValue(namespaceId: string, key: string, options: RequestOptions = {}): Promise<string | null> {
    const outcome = await this.http.execute(
      { method: 'GET', path: this.valuePath('kv.getValue', namespaceId, key), operation: 'kv.getValue' },
      (response) => decodeRaw(response, 'text'),
      options,
    );
    return unwrapOutcome(outcome);
  }

  async putValue(
    namespaceId: string,
    key: string,
    value: string,
    writeOptions: KvWriteOptions = {},
    options?: RequestOptions,
  ): Promise<void> {
    await this.request(
      {
        method: 'PUT',
        path: this.valuePath('kv.putValue', namespaceId, key),
        operation: 'kv.putValue',
        query: { expiration: writeOptions.expiration, expiration_ttl: writeOptions.expirationTtl },
        headers: { 'Content-Type': 'text/plain' },
        body: value,
      },
      ignoredResult,
      options,
    );
  }

  async deleteValue(namespaceId: string, key: string, options?: RequestOptions): Promise<void> {
    await this.request(
      { method: 'DELETE', path: this.valuePath('kv.deleteValue', namespaceId, key), operation: 'kv.deleteValue' },
      ignoredResult,
      options,
    );
  }

  private namespacesPath(operation: string): string {
    return `accounts/${encodeSegment(this.requireAccountId(operation))}/storage/kv/namespaces`;
  }

  private namespacePath(operation: string, namespaceId: string): string {
    return `${this.namespacesPath(operation)}/${encodeSegment(namespaceId)}`;
  }

  private valuePath(operation: string, namespaceId: string, key: string): string {
    return `${this.namespacePath(operation, namespaceId)}/values/${encodeSegment(key)}`;
  }
}
