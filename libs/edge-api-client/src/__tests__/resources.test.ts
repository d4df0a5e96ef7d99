import { ConfigurationError } from '@edgekit/resilient-http-core';
import { describe, expect, it } from 'vitest';

import { bodyOf, createTestClient, drain, ok, rawResponse } from './fakes';

const rawZone = {
  id: 'z1',
  name: 'example.test',
  status: 'active',
  paused: false,
  account: { id: 'acc-1', name: 'Example Org' },
  name_servers: ['ns1.example.net'],
  created_on: '2024-01-01T00:00:00Z',
};

const rawRecord = (id: string, name = 'www.example.test') => ({
  id,
  zone_id: 'z1',
  name,
  type: 'A',
  content: '192.0.2.1',
  ttl: 1,
  proxied: true,
});

describe('zones', () => {
  it('lists one page with its pagination summary', async () => {
    const { client, transport, urls } = createTestClient();
    transport.mockResolvedValueOnce(ok([rawZone], { page: 2, per_page: 10, count: 1, total_count: 11, total_pages: 2 }));

    const page = await client.zones.list({ name: 'example.test', page: 2, perPage: 10 });

    expect(urls()).toEqual(['https://api.example.test/v4/zones?name=example.test&page=2&per_page=10']);
    expect(page).toEqual({
      items: [
        {
          id: 'z1',
          name: 'example.test',
          status: 'active',
          type: null,
          paused: false,
          account: { id: 'acc-1', name: 'Example Org' },
          nameServers: ['ns1.example.net'],
          originalNameServers: [],
          createdOn: '2024-01-01T00:00:00Z',
          modifiedOn: null,
          activatedOn: null,
        },
      ],
      page: 2,
      perPage: 10,
      totalCount: 11,
      totalPages: 2,
    });
  });

  it('walks every page lazily with listAll', async () => {
    const { client, transport, urls } = createTestClient();
    transport
      .mockResolvedValueOnce(ok([{ ...rawZone, id: 'z1' }], { page: 1, per_page: 1, total_pages: 2 }))
      .mockResolvedValueOnce(ok([{ ...rawZone, id: 'z2' }], { page: 2, per_page: 1, total_pages: 2 }));

    const zones = await drain(client.zones.listAll({ status: 'active', accountId: 'acc-1', perPage: 1 }));

    expect(zones.map((zone) => zone.id)).toEqual(['z1', 'z2']);
    expect(urls()).toEqual([
      'https://api.example.test/v4/zones?status=active&account.id=acc-1&page=1&per_page=1',
      'https://api.example.test/v4/zones?status=active&account.id=acc-1&page=2&per_page=1',
    ]);
  });

  it('stops requesting pages when the consumer stops', async () => {
    const { client, transport } = createTestClient();
    transport.mockResolvedValueOnce(ok([rawZone, { ...rawZone, id: 'z2' }], { page: 1, per_page: 2, total_pages: 9 }));

    for await (const zone of client.zones.listAll({ perPage: 2 })) {
      if (zone.id === 'z1') break;
    }

    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('creates a zone under the client account', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValueOnce(ok({ ...rawZone, name: 'new.example.test', status: 'pending' }));

    const zone = await client.zones.create({ name: 'new.example.test' });

    expect(zone.status).toBe('pending');
    expect(request().method).toBe('POST');
    expect(bodyOf(request())).toBe('{"name":"new.example.test","account":{"id":"acc-1"},"type":"full"}');
  });

  it('needs an account id to create a zone', async () => {
    const { client, transport } = createTestClient({ accountId: undefined });

    await expect(client.zones.create({ name: 'new.example.test' })).rejects.toBeInstanceOf(ConfigurationError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('returns the id of a deleted zone', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValueOnce(ok({ id: 'z1' }));

    await expect(client.zones.delete('z1')).resolves.toBe('z1');
    expect(request().method).toBe('DELETE');
    expect(request().url).toBe('https://api.example.test/v4/zones/z1');
  });
});

describe('dnsRecords', () => {
  it('re-sends the filters on every page and falls back to full pages when totalPages is 0', async () => {
    const { client, transport, urls } = createTestClient();
    transport
      .mockResolvedValueOnce(ok([rawRecord('r1'), rawRecord('r2')], { page: 1, per_page: 2, total_pages: 0 }))
      .mockResolvedValueOnce(ok([rawRecord('r3')], { page: 2, per_page: 2, total_pages: 0 }));

    const records = await drain(client.dnsRecords.listAll('z1', { type: 'A', proxied: true, perPage: 2 }));

    expect(records.map((record) => record.id)).toEqual(['r1', 'r2', 'r3']);
    expect(urls()).toEqual([
      'https://api.example.test/v4/zones/z1/dns_records?type=A&proxied=true&page=1&per_page=2',
      'https://api.example.test/v4/zones/z1/dns_records?type=A&proxied=true&page=2&per_page=2',
    ]);
  });

  it('maps a record to camelCase', async () => {
    const { client, transport } = createTestClient();
    transport.mockResolvedValueOnce(ok(rawRecord('r1')));

    await expect(client.dnsRecords.get('z1', 'r1')).resolves.toEqual({
      id: 'r1',
      zoneId: 'z1',
      zoneName: null,
      name: 'www.example.test',
      type: 'A',
      content: '192.0.2.1',
      ttl: 1,
      proxied: true,
      proxiable: false,
      priority: null,
      comment: null,
      tags: [],
      createdOn: null,
      modifiedOn: null,
    });
  });

  it('uses POST, PUT and PATCH for create, overwrite and update', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValue(ok(rawRecord('r1')));
    const input = { type: 'A' as const, name: 'www', content: '192.0.2.1' };

    await client.dnsRecords.create('z1', input);
    await client.dnsRecords.overwrite('z1', 'r1', input);
    await client.dnsRecords.update('z1', 'r1', { ttl: 300 });

    expect([0, 1, 2].map((i) => [request(i).method, request(i).url, bodyOf(request(i))])).toEqual([
      ['POST', 'https://api.example.test/v4/zones/z1/dns_records', '{"type":"A","name":"www","content":"192.0.2.1"}'],
      ['PUT', 'https://api.example.test/v4/zones/z1/dns_records/r1', '{"type":"A","name":"www","content":"192.0.2.1"}'],
      ['PATCH', 'https://api.example.test/v4/zones/z1/dns_records/r1', '{"ttl":300}'],
    ]);
  });

  it('deletes a record', async () => {
    const { client, transport } = createTestClient();
    transport.mockResolvedValueOnce(ok({ id: 'r1' }));

    await expect(client.dnsRecords.delete('z1', 'r1')).resolves.toBe('r1');
  });
});

describe('kv', () => {
  const keysUrl = 'https://api.example.test/v4/accounts/acc-1/storage/kv/namespaces/ns-1/keys';

  it('refuses account-scoped calls without an account id', async () => {
    const { client, transport } = createTestClient({ accountId: undefined });

    await expect(client.kv.listNamespaces()).rejects.toThrow(
      'Missing account id: accountId: required for kv.listNamespaces',
    );
    await expect(drain(client.kv.listAllKeys('ns-1'))).rejects.toBeInstanceOf(ConfigurationError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('creates and deletes namespaces', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValueOnce(ok({ id: 'ns-1', title: 'sessions' })).mockResolvedValueOnce(ok(null));

    await expect(client.kv.createNamespace('sessions')).resolves.toEqual({
      id: 'ns-1',
      title: 'sessions',
      supportsUrlEncoding: null,
    });
    await client.kv.deleteNamespace('ns-1');

    expect(bodyOf(request(0))).toBe('{"title":"sessions"}');
    expect(request(1).method).toBe('DELETE');
    expect(request(1).url).toBe('https://api.example.test/v4/accounts/acc-1/storage/kv/namespaces/ns-1');
  });

  it('returns one page of keys with the next cursor', async () => {
    const { client, transport, urls } = createTestClient();
    transport.mockResolvedValueOnce(
      ok([{ name: 'app:a', expiration: 1_700_000_000 }, { name: 'app:b', metadata: { v: 1 } }], {
        count: 2,
        cursor: 'next-1',
      }),
    );

    const page = await client.kv.listKeys('ns-1', { prefix: 'app', limit: 2 });

    expect(urls()).toEqual([`${keysUrl}?prefix=app&limit=2`]);
    expect(page).toEqual({
      items: [
        { name: 'app:a', expiration: 1_700_000_000, metadata: null },
        { name: 'app:b', expiration: null, metadata: { v: 1 } },
      ],
      cursor: 'next-1',
    });
  });

  it('follows cursors with listAllKeys and keeps the prefix and limit', async () => {
    const { client, transport, urls } = createTestClient();
    transport
      .mockResolvedValueOnce(ok([{ name: 'k1' }], { count: 1, cursor: 'c2' }))
      .mockResolvedValueOnce(ok([{ name: 'k2' }], { count: 1, cursor: '' }));

    const keys = await drain(client.kv.listAllKeys('ns-1', { prefix: 'app', limit: 1 }));

    expect(keys.map((key) => key.name)).toEqual(['k1', 'k2']);
    expect(urls()).toEqual([`${keysUrl}?prefix=app&limit=1`, `${keysUrl}?prefix=app&limit=1&cursor=c2`]);
  });

  it('reads a raw value and encodes the key', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValueOnce(rawResponse('hello'));

    await expect(client.kv.getValue('ns-1', 'a/b c')).resolves.toBe('hello');
    expect(request().url).toBe('https://api.example.test/v4/accounts/acc-1/storage/kv/namespaces/ns-1/values/a%2Fb%20c');
  });

  it('returns null for a missing key', async () => {
    const { client, transport } = createTestClient();
    transport.mockResolvedValueOnce(rawResponse('', 404));

    await expect(client.kv.getValue('ns-1', 'absent')).resolves.toBeNull();
  });

  it('writes a value as text with an expiry', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValueOnce(ok(null));

    await client.kv.putValue('ns-1', 'greeting', 'hello', { expirationTtl: 3600 });

    const sent = request();
    expect(sent.method).toBe('PUT');
    expect(sent.url).toBe(
      'https://api.example.test/v4/accounts/acc-1/storage/kv/namespaces/ns-1/values/greeting?expiration_ttl=3600',
    );
    expect(sent.headers['Content-Type']).toBe('text/plain');
    expect(bodyOf(sent)).toBe('hello');
  });

  it('deletes a value', async () => {
    const { client, transport, request } = createTestClient();
    transport.mockResolvedValueOnce(ok(null));

    await client.kv.deleteValue('ns-1', 'greeting');

    expect(request().method).toBe('DELETE');
    expect(request().url).toBe('https://api.example.test/v4/accounts/acc-1/storage/kv/namespaces/ns-1/values/greeting');
  });
});
