import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'smol-toml';
import { z } from 'zod';
import { DEFAULT_ENDPOINT } from './constants.js';
import { ConfigError } from './errors.js';
import type { Credentials } from './types.js';

/** Keys a config file must define */
export const REQUIRED_CONFIG_KEYS = ['api_key', 'secret_api_key'] as const;

export const configSchema = z.object({
  api_key: z.string().min(1, 'must not be empty'),
  secret_api_key: z.string().min(1, 'must not be empty'),
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
});

export type ConfigFile = z.infer<typeof configSchema>;

/** `$PORKBUN_DNS_CONFIG`, else `config.toml` in the working directory */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.PORKBUN_DNS_CONFIG || join(process.cwd(), 'config.toml');
}

export function parseConfig(text: string, path: string): ConfigFile {
  let raw: Record<string, unknown>;
  try {
    raw = parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`'${path}' is not valid TOML: ${reason}`);
  }

  const missing = REQUIRED_CONFIG_KEYS.filter((key) => raw[key] === undefined);
  if (missing.length > 0) {
    throw new ConfigError(
      `all of the following are required in '${path}': ${REQUIRED_CONFIG_KEYS.join(', ')} ` +
        `(missing: ${missing.join(', ')})`,
      missing
    );
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join(', ');
    throw new ConfigError(`invalid config in '${path}': ${details}`);
  }
  return result.data;
}

export function loadConfig(path: string = getConfigPath()): ConfigFile {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read config file '${path}': ${reason}`);
  }
  return parseConfig(text, path);
}

export interface CredentialOverrides {
  apiKey?: string;
  secretApiKey?: string;
  endpoint?: string;
}

/**
 * Layer explicit overrides (CLI flags) over a config file and check that
 * every credential ended up non-empty.
 */
export function resolveCredentials(
  file: ConfigFile | undefined,
  overrides: CredentialOverrides = {}
): Credentials {
  const apiKey = overrides.apiKey || file?.api_key;
  const secretApiKey = overrides.secretApiKey || file?.secret_api_key;
  const endpoint = overrides.endpoint || file?.endpoint || DEFAULT_ENDPOINT;

  if (!apiKey) throw new ConfigError('API key must be specified', ['api_key']);
  if (!secretApiKey) {
    throw new ConfigError('Secret API key must be specified', ['secret_api_key']);
  }

  return Object.freeze({ apiKey, secretApiKey, endpoint });
}
