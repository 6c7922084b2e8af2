import { existsSync } from 'node:fs';
import { cleanupChallenge, respondToChallenge, type AcmeChallenge } from '../acme.js';
import { createDnsClient, type DnsClient } from '../client.js';
import { getConfigPath, loadConfig, resolveCredentials } from '../config.js';
import { parseIpAddress } from '../ip.js';
import { getLogger, type Logger } from '../logger.js';
import { createTransport, type FetchLike } from '../transport.js';
import { getFlag, getPositionals, hasFlag } from './flags.js';

export const USAGE = `Usage: porkbun-dns [--config PATH] [--key KEY] [--seckey SECRET] [--endpoint URL] <mode>

Modes:
  ddns <domain> [--subdomain NAME] [--ip ADDRESS]
      Point the A/AAAA record of <domain> (or NAME.<domain>) at ADDRESS,
      or at the public IP reported by the API when --ip is omitted.
  get-ssl <domain>
      Print the SSL certificate bundle for <domain> as JSON.
  acme-respond [--root-domain DOMAIN] [--wait SECONDS]
      certbot --manual-auth-hook: publish CERTBOT_VALIDATION for CERTBOT_DOMAIN.
  acme-cleanup [--root-domain DOMAIN]
      certbot --manual-cleanup-hook: remove the challenge record again.
`;

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: Logger;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readChallenge(argv: readonly string[], env: NodeJS.ProcessEnv): AcmeChallenge {
  const domain = env.CERTBOT_DOMAIN;
  const validation = env.CERTBOT_VALIDATION;
  if (!domain || !validation) {
    throw new UsageError('CERTBOT_DOMAIN and CERTBOT_VALIDATION must be set');
  }
  const rootDomain = getFlag('root-domain', argv) || env.PORKBUN_ROOT_DOMAIN || undefined;
  return { domain, validation, rootDomain };
}

function createClient(argv: readonly string[], io: CliIo, log: Logger): DnsClient {
  const configFlag = getFlag('config', argv);
  const configPath = configFlag || getConfigPath(io.env);
  // An explicit --config must exist; the default location is optional
  const file = (configFlag || existsSync(configPath)) ? loadConfig(configPath) : undefined;

  const credentials = resolveCredentials(file, {
    apiKey: getFlag('key', argv),
    secretApiKey: getFlag('seckey', argv),
    endpoint: getFlag('endpoint', argv),
  });

  const transport = createTransport(credentials, {
    fetch: io.fetch,
    logger: log.child({ component: 'transport' }),
  });
  return createDnsClient(transport, { logger: log.child({ component: 'client' }) });
}

async function dispatch(argv: readonly string[], io: CliIo, log: Logger): Promise<void> {
  const [mode, ...args] = getPositionals(argv);

  switch (mode) {
    case 'ddns': {
      const domain = args[0];
      if (!domain) throw new UsageError('ddns: <domain> is required');
      const ipFlag = getFlag('ip', argv);
      const client = createClient(argv, io, log);

      const ip = ipFlag ? parseIpAddress(ipFlag) : await client.resolvePublicIp();
      const result = await client.upsertAddressRecord(domain, ip, getFlag('subdomain', argv));
      io.stdout(`${result.created.status}\n`);
      return;
    }

    case 'get-ssl': {
      const domain = args[0];
      if (!domain) throw new UsageError('get-ssl: <domain> is required');
      const bundle = await createClient(argv, io, log).retrieveSsl(domain);
      io.stdout(`${JSON.stringify(bundle, null, 2)}\n`);
      return;
    }

    case 'acme-respond': {
      const challenge = readChallenge(argv, io.env);
      const wait = getFlag('wait', argv);
      const propagationSeconds = wait ? Number(wait) : undefined;
      if (propagationSeconds !== undefined && !(propagationSeconds >= 0)) {
        throw new UsageError(`--wait must be a number of seconds, got "${wait}"`);
      }
      await respondToChallenge(createClient(argv, io, log), challenge, {
        propagationSeconds,
        sleep: io.sleep,
        logger: log.child({ component: 'acme' }),
      });
      return;
    }

    case 'acme-cleanup': {
      const challenge = readChallenge(argv, io.env);
      await cleanupChallenge(createClient(argv, io, log), challenge, {
        logger: log.child({ component: 'acme' }),
      });
      return;
    }

    default:
      throw new UsageError(mode ? `unknown mode '${mode}'` : 'a mode is required');
  }
}

/** Run the CLI; resolves to the process exit code. */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  if (hasFlag('help', argv)) {
    io.stdout(USAGE);
    return 0;
  }

  const log = io.logger ?? getLogger();
  try {
    await dispatch(argv, io, log);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.stderr(`Error: ${message}\n`);
    if (err instanceof UsageError) io.stderr(`\n${USAGE}`);
    return 1;
  }
}
