import { setTimeout as delay } from 'node:timers/promises';
import { findMatches, type DnsClient } from './client.js';
import {
  ACME_CHALLENGE_LABEL,
  ACME_PROPAGATION_SECONDS,
  ACME_RECORD_TTL,
} from './constants.js';
import { normalizeDomain, normalizeTarget } from './domain.js';
import { InvalidInputError } from './errors.js';
import { createChildLogger, type Logger } from './logger.js';
import type { DnsRecord, TargetSpec, UpsertResult } from './types.js';

export interface AcmeChallenge {
  /** Domain being validated (CERTBOT_DOMAIN), wildcard prefix already stripped */
  domain: string;
  /** Token to publish (CERTBOT_VALIDATION) */
  validation: string;
  /** Zone registered at Porkbun; defaults to `domain` */
  rootDomain?: string;
}

/**
 * Build the TXT record target for a DNS-01 challenge.
 *
 * E.g. domain "www.example.com" with root "example.com" →
 * name "_acme-challenge.www" in zone "example.com".
 */
export function acmeChallengeTarget(challenge: AcmeChallenge): TargetSpec {
  const domain = normalizeDomain(challenge.domain).replace(/^\*\./, '');
  const root = normalizeDomain(challenge.rootDomain ?? domain);

  let sub = '';
  if (domain !== root) {
    if (!domain.endsWith(`.${root}`)) {
      throw new InvalidInputError(`"${domain}" is not inside the zone "${root}"`);
    }
    sub = domain.slice(0, -(root.length + 1));
  }

  return {
    domain: root,
    name: sub ? `${ACME_CHALLENGE_LABEL}.${sub}` : ACME_CHALLENGE_LABEL,
    type: 'TXT',
    content: challenge.validation,
    ttl: ACME_RECORD_TTL,
  };
}

export interface RespondOptions {
  propagationSeconds?: number;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: Logger;
}

/**
 * Publish the challenge record, then wait for it to propagate before the
 * ACME client asks the CA to validate.
 */
export async function respondToChallenge(
  client: DnsClient,
  challenge: AcmeChallenge,
  options: RespondOptions = {}
): Promise<UpsertResult> {
  const log = options.logger ?? createChildLogger('acme');
  const sleep = options.sleep ?? delay;
  const seconds = options.propagationSeconds ?? ACME_PROPAGATION_SECONDS;

  const result = await client.upsertRecord(acmeChallengeTarget(challenge));

  log.info({ seconds }, 'waiting for challenge record to propagate');
  await sleep(seconds * 1000);
  return result;
}

/** Remove the TXT records holding this challenge's token. */
export async function cleanupChallenge(
  client: DnsClient,
  challenge: AcmeChallenge,
  options: { logger?: Logger } = {}
): Promise<DnsRecord[]> {
  const log = options.logger ?? createChildLogger('acme');
  const target = normalizeTarget(acmeChallengeTarget(challenge));

  const records = await client.listRecords(target.domain);
  const stale = findMatches(records, target.fqdn, 'TXT', { content: target.content });

  for (const record of stale) {
    log.info({ id: record.id, name: record.name }, 'removing challenge record');
    await client.deleteRecord(target.domain, record.id);
  }
  return stale;
}
