import { InvalidInputError } from './errors.js';
import { RECORD_TYPES, type RecordType, type TargetSpec } from './types.js';

/**
 * Normalize a domain or subdomain input.
 *
 * Examples:
 * - `Example.COM` → `example.com`
 * - `example.com.` → `example.com`
 * - `  www  ` → `www`
 */
export function normalizeDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  // Remove trailing dot (FQDN notation)
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  return domain;
}

/**
 * Join a subdomain and its root domain into the name the registrar reports.
 *
 * E.g. ("www", "Example.com") → "www.example.com"
 *      ("", "example.com")    → "example.com"
 */
export function toFqdn(name: string, domain: string): string {
  return [name, domain]
    .map((part) => part.toLowerCase().replace(/^\.+|\.+$/g, ''))
    .filter((part) => part.length > 0)
    .join('.');
}

const KNOWN_TYPES: readonly string[] = RECORD_TYPES;

function isRecordType(value: string): value is RecordType {
  return KNOWN_TYPES.includes(value);
}

/** Uppercase a record type and check the registrar supports it. */
export function toRecordType(input: string): RecordType {
  const type = input.trim().toUpperCase();
  if (!isRecordType(type)) {
    throw new InvalidInputError(
      `unsupported record type "${input}" (expected one of ${RECORD_TYPES.join(', ')})`
    );
  }
  return type;
}

export interface NormalizedTarget extends TargetSpec {
  type: RecordType;
  fqdn: string;
}

/** Lowercase domain and name, uppercase type, and derive the FQDN. */
export function normalizeTarget(target: TargetSpec): NormalizedTarget {
  const domain = normalizeDomain(target.domain);
  const name = normalizeDomain(target.name);
  return {
    ...target,
    domain,
    name,
    type: toRecordType(target.type),
    fqdn: toFqdn(name, domain),
  };
}
