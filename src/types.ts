/** Record types the registrar accepts */
export const RECORD_TYPES = [
  'A',
  'AAAA',
  'CNAME',
  'ALIAS',
  'TXT',
  'MX',
  'NS',
  'SRV',
  'TLSA',
  'CAA',
  'HTTPS',
  'SVCB',
] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

/** API credentials plus the base URL they authenticate against */
export interface Credentials {
  readonly apiKey: string;
  readonly secretApiKey: string;
  /** Base URL without trailing slash, e.g. https://api-ipv4.porkbun.com/api/json/v3 */
  readonly endpoint: string;
}

/** A DNS record as the registrar reports it */
export interface DnsRecord {
  id: string;
  /** Fully-qualified, lowercase (e.g. www.example.com) */
  name: string;
  type: string;
  content: string;
  ttl?: string;
  priority?: string;
  notes?: string;
}

/** Desired end state for one record identity (FQDN + type) */
export interface TargetSpec {
  domain: string;
  /** Subdomain label(s); empty for the apex */
  name: string;
  /** Any case; checked against RECORD_TYPES once uppercased */
  type: RecordType | Lowercase<RecordType>;
  content: string;
  ttl?: string;
  priority?: string;
}

export type JsonObject = Record<string, unknown>;

/** Decoded registrar response; `status` is `SUCCESS` or `ERROR` */
export interface ApiResponse extends JsonObject {
  status: string;
  message?: string;
}

export interface UpsertResult {
  /** Response of the delete call, or null when nothing matched */
  deleted: ApiResponse | null;
  created: ApiResponse;
}

export interface AddressUpsertResult {
  /** Every conflicting record that was removed, in registrar order */
  deleted: DnsRecord[];
  created: ApiResponse;
}

export interface SslBundle {
  certificateChain: string;
  privateKey: string;
  publicKey: string;
}
