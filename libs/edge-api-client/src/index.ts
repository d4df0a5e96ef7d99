/**
 * Edge platform API client.
 *
 * ## Usage
 *
 * ```typescript
 * import { createEdgeApiClient } from '@edgekit/edge-api-client';
 *
 * // Reads EDGE_API_TOKEN, EDGE_ACCOUNT_ID and EDGE_API_* resilience settings
 * const client = createEdgeApiClient();
 *
 * for await (const zone of client.zones.listAll({ status: 'active' })) {
 *   console.log(zone.name);
 * }
 *
 * await client.kv.putValue(namespaceId, 'greeting', 'hello', { expirationTtl: 3600 });
 * ```
 *
 * Failures are thrown as `ResilientHttpError` subclasses from `@edgekit/resilient-http-core`;
 * `client.http.execute` returns the raw outcomes instead.
 */

export { EdgeApiClient, createEdgeApiClient, DEFAULT_BASE_URL } from './edgeApiClient';
export type { EdgeApiClientConfig } from './edgeApiClient';

export { ApiResource, DEFAULT_PER_PAGE } from './resources/apiResource';
export type { ResourceSettings } from './resources/apiResource';
export { UserResource } from './resources/user';
export { ZonesResource } from './resources/zones';
export { DnsRecordsResource } from './resources/dnsRecords';
export { KvResource } from './resources/kv';

export {
  deletedSchema,
  dnsRecordSchema,
  kvKeySchema,
  kvNamespaceSchema,
  tokenVerificationSchema,
  userSchema,
  zoneSchema,
} from './types';
export type {
  CreateZoneInput,
  CursorPage,
  DnsRecord,
  DnsRecordFilters,
  DnsRecordInput,
  DnsRecordListOptions,
  DnsRecordType,
  KvKey,
  KvKeyListOptions,
  KvNamespace,
  KvNamespaceListOptions,
  KvWriteOptions,
  ListPage,
  RequestOptions,
  SortDirection,
  TokenVerification,
  User,
  Zone,
  ZoneFilters,
  ZoneListOptions,
  ZoneStatus,
  ZoneType,
} from './types';
