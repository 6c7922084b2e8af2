/** Production API base; the ipv4 host makes `/ping/` report the IPv4 address */
export const DEFAULT_ENDPOINT = 'https://api-ipv4.porkbun.com/api/json/v3';

/** TTL (seconds) for DDNS address records */
export const ADDRESS_RECORD_TTL = '300';

/** Record types that cannot coexist with a new A/AAAA record at the same name */
export const ADDRESS_CONFLICT_TYPES: readonly string[] = ['A', 'AAAA', 'ALIAS', 'CNAME'];

/** Label under which ACME DNS-01 challenge records live */
export const ACME_CHALLENGE_LABEL = '_acme-challenge';

/** TTL (seconds) for ACME challenge TXT records */
export const ACME_RECORD_TTL = '120';

/** How long to wait after publishing a challenge before handing back to the ACME client */
export const ACME_PROPAGATION_SECONDS = 120;
