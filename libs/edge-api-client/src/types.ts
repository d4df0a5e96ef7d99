import { z } from 'zod';

// ============================================================================
// Shared
// ============================================================================

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ListPage<T> {
  items: T[];
  page: number;
  perPage: number;
  totalCount: number;
  /** 0 when the server did not compute it. */
  totalPages: number;
}

export interface CursorPage<T> {
  items: T[];
  /** Pass back to fetch the next page; null on the last page. */
  cursor: string | null;
}

export type SortDirection = 'asc' | 'desc';

/** Delete endpoints answer with the id of the removed resource. */
export const deletedSchema = z.object({ id: z.string() }).transform((value) => value.id);

// ============================================================================
// User
// ============================================================================

export const tokenVerificationSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    expires_on: z.string().nullish(),
    not_before: z.string().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    status: raw.status,
    expiresOn: raw.expires_on ?? null,
    notBefore: raw.not_before ?? null,
  }));

export type TokenVerification = z.output<typeof tokenVerificationSchema>;

export const userSchema = z
  .object({
    id: z.string(),
    email: z.string(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    country: z.string().nullish(),
    two_factor_authentication_enabled: z.boolean().nullish(),
    suspended: z.boolean().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    email: raw.email,
    firstName: raw.first_name ?? null,
    lastName: raw.last_name ?? null,
    country: raw.country ?? null,
    twoFactorAuthenticationEnabled: raw.two_factor_authentication_enabled ?? false,
    suspended: raw.suspended ?? false,
  }));

export type User = z.output<typeof userSchema>;

// ============================================================================
// Zones
// ============================================================================

export type ZoneStatus = 'initializing' | 'pending' | 'active' | 'moved';

export type ZoneType = 'full' | 'partial' | 'secondary' | 'internal';

export const zoneSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    status: z.string(),
    type: z.string().nullish(),
    paused: z.boolean().nullish(),
    account: z.object({ id: z.string(), name: z.string().nullish() }).nullish(),
    name_servers: z.array(z.string()).nullish(),
    original_name_servers: z.array(z.string()).nullish(),
    created_on: z.string().nullish(),
    modified_on: z.string().nullish(),
    activated_on: z.string().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    status: raw.status,
    type: raw.type ?? null,
    paused: raw.paused ?? false,
    account: raw.account ? { id: raw.account.id, name: raw.account.name ?? null } : null,
    nameServers: raw.name_servers ?? [],
    originalNameServers: raw.original_name_servers ?? [],
    createdOn: raw.created_on ?? null,
    modifiedOn: raw.modified_on ?? null,
    activatedOn: raw.activated_on ?? null,
  }));

export type Zone = z.output<typeof zoneSchema>;

export interface ZoneFilters {
  name?: string;
  status?: ZoneStatus;
  accountId?: string;
  order?: 'name' | 'status' | 'account.id' | 'account.name';
  direction?: SortDirection;
  match?: 'any' | 'all';
}

export interface ZoneListOptions extends ZoneFilters {
  page?: number;
  perPage?: number;
}

export interface CreateZoneInput {
  name: string;
  /** Falls back to the client's account id. */
  accountId?: string;
  type?: ZoneType;
}

// ============================================================================
// DNS records
// ============================================================================

export type DnsRecordType = 'A' | 'AAAA' | 'CNAME' | 'MX' | 'TXT' | 'NS' | 'SRV' | 'CAA' | 'PTR';

export const dnsRecordSchema = z
  .object({
    id: z.string(),
    zone_id: z.string().nullish(),
    zone_name: z.string().nullish(),
    name: z.string(),
    type: z.string(),
    content: z.string(),
    ttl: z.number(),
    proxied: z.boolean().nullish(),
    proxiable: z.boolean().nullish(),
    priority: z.number().nullish(),
    comment: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    created_on: z.string().nullish(),
    modified_on: z.string().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    zoneId: raw.zone_id ?? null,
    zoneName: raw.zone_name ?? null,
    name: raw.name,
    type: raw.type,
    content: raw.content,
    ttl: raw.ttl,
    proxied: raw.proxied ?? false,
    proxiable: raw.proxiable ?? false,
    priority: raw.priority ?? null,
    comment: raw.comment ?? null,
    tags: raw.tags ?? [],
    createdOn: raw.created_on ?? null,
    modifiedOn: raw.modified_on ?? null,
  }));

export type DnsRecord = z.output<typeof dnsRecordSchema>;

export interface DnsRecordInput {
  type: DnsRecordType;
  name: string;
  content: string;
  /** Seconds; 1 means automatic. */
  ttl?: number;
  proxied?: boolean;
  priority?: number;
  comment?: string;
  tags?: string[];
}

export interface DnsRecordFilters {
  type?: DnsRecordType;
  name?: string;
  content?: string;
  proxied?: boolean;
  match?: 'any' | 'all';
}

export interface DnsRecordListOptions extends DnsRecordFilters {
  page?: number;
  perPage?: number;
}

// ============================================================================
// KV
// ============================================================================

export const kvNamespaceSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    supports_url_encoding: z.boolean().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    title: raw.title,
    supportsUrlEncoding: raw.supports_url_encoding ?? null,
  }));

export type KvNamespace = z.output<typeof kvNamespaceSchema>;

export const kvKeySchema = z
  .object({
    name: z.string(),
    expiration: z.number().nullish(),
    metadata: z.unknown(),
  })
  .transform((raw) => ({
    name: raw.name,
    /** Epoch seconds. */
    expiration: raw.expiration ?? null,
    metadata: raw.metadata ?? null,
  }));

export type KvKey = z.output<typeof kvKeySchema>;

export interface KvNamespaceListOptions {
  page?: number;
  perPage?: number;
  order?: 'id' | 'title';
  direction?: SortDirection;
}

export interface KvKeyListOptions {
  prefix?: string;
  limit?: number;
  cursor?: string;
}

export interface KvWriteOptions {
  /** Absolute expiry, epoch seconds. */
  expiration?: number;
  /** Relative expiry in seconds; the server requires at least 60. */
  expirationTtl?: number;
}
