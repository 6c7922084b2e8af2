import { DEFAULT_ENDPOINT } from './constants.js';
import { ApiDecodeError, ApiHttpError, ConfigError, TransportError } from './errors.js';
import { createChildLogger, type Logger } from './logger.js';
import type { Credentials, JsonObject } from './types.js';

/** Keys the transport owns; a payload can never override them */
const AUTH_KEYS: readonly string[] = ['endpoint', 'apikey', 'secretapikey'];

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
  /** Abort a request after this many milliseconds (no limit by default) */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface Transport {
  readonly endpoint: string;
  /** POST `payload` plus credentials to `endpoint + path`, return the decoded object */
  send(path: string, payload?: Readonly<JsonObject>): Promise<JsonObject>;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create the authenticated transport for the Porkbun JSON API.
 *
 * Every request is a POST whose body carries `apikey` and `secretapikey`
 * (and `endpoint`, as the registrar's own DDNS client sends it). No retries.
 */
export function createTransport(
  credentials: Credentials,
  options: TransportOptions = {}
): Transport {
  if (!credentials.apiKey) {
    throw new ConfigError('Porkbun: apiKey is required', ['api_key']);
  }
  if (!credentials.secretApiKey) {
    throw new ConfigError('Porkbun: secretApiKey is required', ['secret_api_key']);
  }

  const { apiKey, secretApiKey } = credentials;
  const endpoint = (credentials.endpoint || DEFAULT_ENDPOINT).replace(/\/+$/, '');
  const log = options.logger ?? createChildLogger('transport');
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  function authenticate(payload: Readonly<JsonObject>): JsonObject {
    const body: JsonObject = { endpoint, apikey: apiKey, secretapikey: secretApiKey };
    for (const [key, value] of Object.entries(payload)) {
      if (!AUTH_KEYS.includes(key)) body[key] = value;
    }
    return body;
  }

  return {
    endpoint,

    async send(path: string, payload: Readonly<JsonObject> = {}): Promise<JsonObject> {
      const url = `${endpoint}${path}`;
      const init: RequestInit = {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(authenticate(payload)),
      };
      if (options.timeoutMs !== undefined) {
        init.signal = AbortSignal.timeout(options.timeoutMs);
      }

      log.debug({ path }, 'sending request');

      let res: Response;
      let text: string;
      try {
        res = await doFetch(url, init);
        text = await res.text();
      } catch (err) {
        throw new TransportError(url, err);
      }

      log.debug({ path, status: res.status }, 'received response');

      if (res.status !== 200) {
        throw new ApiHttpError(res.status, text);
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(text);
      } catch (err) {
        throw new ApiDecodeError(`response from ${path} is not valid JSON`, { cause: err });
      }

      if (!isJsonObject(decoded)) {
        throw new ApiDecodeError(`response from ${path} is not a JSON object: ${text}`);
      }

      return decoded;
    },
  };
}
