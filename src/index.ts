export { createTransport } from './transport.js';
export type { Transport, TransportOptions, FetchLike } from './transport.js';
export { createDnsClient, findMatches } from './client.js';
export type { DnsClient, DnsClientOptions, RecordFilter } from './client.js';
export { getLogger, createChildLogger } from './logger.js';
export type { Logger } from './logger.js';
export { acmeChallengeTarget, respondToChallenge, cleanupChallenge } from './acme.js';
export type { AcmeChallenge, RespondOptions } from './acme.js';
export { loadConfig, parseConfig, resolveCredentials, getConfigPath } from './config.js';
export type { ConfigFile, CredentialOverrides } from './config.js';
export { normalizeDomain, normalizeTarget, toFqdn, toRecordType } from './domain.js';
export type { NormalizedTarget } from './domain.js';
export { parseIpAddress, explodeIpv6 } from './ip.js';
export type { IpAddress } from './ip.js';
export { buildCreatePayload, requests } from './requests.js';
export {
  PorkbunDnsError,
  TransportError,
  ApiHttpError,
  ApiDecodeError,
  RegistrarError,
  ConfigError,
  InvalidInputError,
} from './errors.js';
export {
  DEFAULT_ENDPOINT,
  ADDRESS_RECORD_TTL,
  ADDRESS_CONFLICT_TYPES,
  ACME_CHALLENGE_LABEL,
  ACME_RECORD_TTL,
  ACME_PROPAGATION_SECONDS,
} from './constants.js';
export { RECORD_TYPES } from './types.js';
export type {
  RecordType,
  Credentials,
  DnsRecord,
  TargetSpec,
  JsonObject,
  ApiResponse,
  UpsertResult,
  AddressUpsertResult,
  SslBundle,
} from './types.js';
