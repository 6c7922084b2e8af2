import type { FetchLike } from '../../src/transport.js';

export const TEST_ENDPOINT = 'https://api.test/api/json/v3';

export const TEST_CREDENTIALS = {
  apiKey: 'test-key',
  secretApiKey: 'test-secret',
  endpoint: TEST_ENDPOINT,
};

/** A record as the registrar serializes it */
export interface WireRecord {
  id: string;
  name: string;
  type: string;
  content: string;
  ttl: string;
  prio: string | null;
  notes: string | null;
}

export interface FakeCall {
  path: string;
  body: Record<string, unknown>;
}

export interface FakeRegistrarOptions {
  zone?: string;
  publicIp?: string;
  /** Paths starting with one of these answer `status: ERROR` */
  failPaths?: string[];
}

/**
 * In-process stand-in for the registrar's record store. Keeps records in
 * memory and records every request body it receives.
 */
export function createFakeRegistrar(
  initial: WireRecord[] = [],
  options: FakeRegistrarOptions = {}
) {
  const zone = options.zone ?? 'example.com';
  const records: WireRecord[] = initial.map((r) => ({ ...r }));
  const calls: FakeCall[] = [];
  let nextId = 1000;

  function handle(path: string, body: Record<string, unknown>): unknown {
    if (options.failPaths?.some((p) => path.startsWith(p))) {
      return { status: 'ERROR', message: 'Forced failure.' };
    }
    if (path === '/ping/') {
      return { status: 'SUCCESS', yourIp: options.publicIp ?? '203.0.113.7' };
    }

    let m = /^\/dns\/retrieve\/([^/]+)(?:\/([^/]+))?$/.exec(path);
    if (m) {
      if (m[1] !== zone) return { status: 'ERROR', message: 'Invalid domain.' };
      const id = m[2];
      return {
        status: 'SUCCESS',
        records: records.filter((r) => id === undefined || r.id === id).map((r) => ({ ...r })),
      };
    }

    m = /^\/dns\/create\/([^/]+)$/.exec(path);
    if (m) {
      if (m[1] !== zone) return { status: 'ERROR', message: 'Invalid domain.' };
      const id = nextId++;
      const name = String(body.name ?? '');
      records.push({
        id: String(id),
        name: name ? `${name}.${zone}` : zone,
        type: String(body.type),
        content: String(body.content),
        ttl: body.ttl === undefined ? '600' : String(body.ttl),
        prio: body.prio === undefined ? '0' : String(body.prio),
        notes: '',
      });
      return { status: 'SUCCESS', id };
    }

    m = /^\/dns\/delete\/([^/]+)\/([^/]+)$/.exec(path);
    if (m) {
      const index = records.findIndex((r) => r.id === m?.[2]);
      if (m[1] !== zone || index === -1) {
        return { status: 'ERROR', message: 'Invalid record ID.' };
      }
      records.splice(index, 1);
      return { status: 'SUCCESS' };
    }

    m = /^\/ssl\/retrieve\/([^/]+)$/.exec(path);
    if (m) {
      return {
        status: 'SUCCESS',
        certificatechain: 'test-chain',
        privatekey: 'test-private-key',
        publickey: 'test-public-key',
      };
    }

    return { status: 'ERROR', message: `Unknown path ${path}` };
  }

  const fetch: FetchLike = async (url, init) => {
    const path = url.slice(TEST_ENDPOINT.length);
    const body: Record<string, unknown> = JSON.parse(String(init.body));
    calls.push({ path, body });
    return new Response(JSON.stringify(handle(path, body)), { status: 200 });
  };

  return { fetch, records, calls };
}

/** Request body without the fields the transport injects */
export function withoutAuth(body: Record<string, unknown>): Record<string, unknown> {
  const { endpoint: _endpoint, apikey: _apikey, secretapikey: _secret, ...rest } = body;
  return rest;
}

export function wireRecord(
  id: string,
  type: string,
  name: string,
  content: string
): WireRecord {
  return { id, type, name, content, ttl: '600', prio: '0', notes: '' };
}
