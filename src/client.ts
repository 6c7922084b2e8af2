import { z } from 'zod';
import { ADDRESS_CONFLICT_TYPES, ADDRESS_RECORD_TTL } from './constants.js';
import { normalizeDomain, normalizeTarget, toFqdn, toRecordType } from './domain.js';
import { ApiDecodeError, RegistrarError } from './errors.js';
import { parseIpAddress, type IpAddress } from './ip.js';
import { createChildLogger, type Logger } from './logger.js';
import { requests, type ApiRequest } from './requests.js';
import type { Transport } from './transport.js';
import type {
  AddressUpsertResult,
  ApiResponse,
  DnsRecord,
  SslBundle,
  TargetSpec,
  UpsertResult,
} from './types.js';

const apiResponseSchema = z
  .object({
    status: z.string(),
    message: z.string().optional(),
  })
  .passthrough();

const wireRecordSchema = z.object({
  id: z.coerce.string(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.coerce.string().optional(),
  prio: z.coerce.string().nullish(),
  notes: z.string().nullish(),
});

const retrieveSchema = z.object({
  records: z.array(wireRecordSchema).default([]),
});

const pingSchema = z.object({ yourIp: z.string() });

const sslSchema = z.object({
  certificatechain: z.string(),
  privatekey: z.string(),
  publickey: z.string(),
});

type WireRecord = z.infer<typeof wireRecordSchema>;

function decode<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join(', ');
    throw new ApiDecodeError(`unexpected response from ${path}: ${details}`);
  }
  return result.data;
}

function toDnsRecord(r: WireRecord): DnsRecord {
  const record: DnsRecord = {
    id: r.id,
    name: r.name.toLowerCase(),
    type: r.type.toUpperCase(),
    content: r.content,
  };
  if (r.ttl !== undefined) record.ttl = r.ttl;
  if (r.prio != null) record.priority = r.prio;
  if (r.notes != null) record.notes = r.notes;
  return record;
}

/** Extra fields a match must share; unset fields are not compared */
export type RecordFilter = Partial<Pick<DnsRecord, 'content' | 'ttl' | 'priority' | 'notes'>>;

/**
 * Records named exactly `fqdn` with exactly `type`, optionally narrowed by
 * `filter`. No wildcard or suffix matching; both sides are compared as given,
 * so callers pass normalized values.
 */
export function findMatches(
  records: readonly DnsRecord[],
  fqdn: string,
  type: string,
  filter: RecordFilter = {}
): DnsRecord[] {
  const same = (wanted: string | undefined, actual: string | undefined) =>
    wanted === undefined || wanted === actual;
  return records.filter(
    (r) =>
      r.name === fqdn &&
      r.type === type &&
      same(filter.content, r.content) &&
      same(filter.ttl, r.ttl) &&
      same(filter.priority, r.priority) &&
      same(filter.notes, r.notes)
  );
}

export interface DnsClient {
  listRecords(domain: string): Promise<DnsRecord[]>;
  getRecord(domain: string, id: string): Promise<DnsRecord[]>;
  createRecord(
    domain: string,
    name: string,
    type: string,
    content: string,
    ttl?: string,
    priority?: string
  ): Promise<ApiResponse>;
  deleteRecord(domain: string, id: string): Promise<ApiResponse>;
  /** Delete the first record with the same FQDN and type, then create the target. */
  upsertRecord(target: TargetSpec): Promise<UpsertResult>;
  /** Delete every A/AAAA/ALIAS/CNAME at the FQDN, then create the address record. */
  upsertAddressRecord(
    domain: string,
    ip: IpAddress | string,
    subdomain?: string
  ): Promise<AddressUpsertResult>;
  resolvePublicIp(): Promise<IpAddress>;
  retrieveSsl(domain: string): Promise<SslBundle>;
}

export interface DnsClientOptions {
  logger?: Logger;
}

/**
 * Create the record reconciler on top of an authenticated transport.
 *
 * Composite operations run strictly in sequence (list → delete → create) and
 * stop at the first failure, so a failed delete is never followed by a create.
 */
export function createDnsClient(transport: Transport, options: DnsClientOptions = {}): DnsClient {
  const log = options.logger ?? createChildLogger('client');

  async function call(
    request: ApiRequest,
    domain: string | undefined,
    describeFailure: (message: string) => string
  ): Promise<ApiResponse> {
    const raw = await transport.send(request.path, request.payload);
    const response: ApiResponse = decode(apiResponseSchema, raw, request.path);

    if (response.status !== 'SUCCESS') {
      throw new RegistrarError(
        request.path,
        domain,
        describeFailure(response.message ?? `status ${response.status}`)
      );
    }
    return response;
  }

  function retrieveFailure(domain: string) {
    return (message: string) =>
      `Porkbun: failed to get records (${message}). ` +
      `Make sure the domain "${domain}" is spelled correctly, ` +
      'that API access has been enabled for it, and that it is a valid domain.';
  }

  async function retrieve(request: ApiRequest, domain: string): Promise<DnsRecord[]> {
    const response = await call(request, domain, retrieveFailure(domain));
    return decode(retrieveSchema, response, request.path).records.map(toDnsRecord);
  }

  const client: DnsClient = {
    listRecords(domain) {
      const d = normalizeDomain(domain);
      return retrieve(requests.retrieveRecords(d), d);
    },

    getRecord(domain, id) {
      const d = normalizeDomain(domain);
      return retrieve(requests.retrieveRecord(d, id), d);
    },

    async createRecord(domain, name, type, content, ttl, priority) {
      const d = normalizeDomain(domain);
      const n = normalizeDomain(name);
      const t = toRecordType(type);
      const request = requests.createRecord(d, { name: n, type: t, content, ttl, priority });
      return call(
        request,
        d,
        (message) => `Porkbun: failed to create ${t} record "${n}" in ${d} (${request.path}): ${message}`
      );
    },

    deleteRecord(domain, id) {
      const d = normalizeDomain(domain);
      const request = requests.deleteRecord(d, id);
      return call(
        request,
        d,
        (message) => `Porkbun: failed to delete record ${id} in ${d} (${request.path}): ${message}`
      );
    },

    async upsertRecord(target) {
      const t = normalizeTarget(target);
      const records = await client.listRecords(t.domain);

      // First match only: one slot per (FQDN, type)
      let deleted: ApiResponse | null = null;
      const [existing] = findMatches(records, t.fqdn, t.type);
      if (existing) {
        log.info(
          { id: existing.id, type: existing.type, name: existing.name },
          'deleting existing record'
        );
        deleted = await client.deleteRecord(t.domain, existing.id);
      }

      log.info({ type: t.type, name: t.fqdn }, 'creating record');
      const created = await client.createRecord(
        t.domain,
        t.name,
        t.type,
        t.content,
        t.ttl,
        t.priority
      );

      return { deleted, created };
    },

    async upsertAddressRecord(domain, ip, subdomain = '') {
      const address = typeof ip === 'string' ? parseIpAddress(ip) : ip;
      const d = normalizeDomain(domain);
      const name = normalizeDomain(subdomain);
      const fqdn = toFqdn(name, d);
      const type = address.version === 4 ? 'A' : 'AAAA';

      const records = await client.listRecords(d);
      const conflicts = records.filter(
        (r) => r.name === fqdn && ADDRESS_CONFLICT_TYPES.includes(r.type)
      );

      for (const record of conflicts) {
        log.info(
          { id: record.id, type: record.type, name: record.name },
          'deleting conflicting record'
        );
        await client.deleteRecord(d, record.id);
      }

      log.info({ type, name: fqdn }, 'creating address record');
      const created = await client.createRecord(
        d,
        name,
        type,
        address.exploded,
        ADDRESS_RECORD_TTL
      );

      return { deleted: conflicts, created };
    },

    async resolvePublicIp() {
      const request = requests.ping();
      const response = await call(
        request,
        undefined,
        (message) => `Porkbun: ping failed (${request.path}): ${message}`
      );
      const { yourIp } = decode(pingSchema, response, request.path);
      return parseIpAddress(yourIp);
    },

    async retrieveSsl(domain) {
      const d = normalizeDomain(domain);
      const request = requests.retrieveSsl(d);
      const response = await call(
        request,
        d,
        (message) => `Porkbun: failed to retrieve the SSL bundle for ${d} (${request.path}): ${message}`
      );
      const bundle = decode(sslSchema, response, request.path);
      return {
        certificateChain: bundle.certificatechain,
        privateKey: bundle.privatekey,
        publicKey: bundle.publickey,
      };
    },
  };

  return client;
}
