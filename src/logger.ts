import { pino, destination, type Logger } from 'pino';

export type { Logger };

let root: Logger | undefined;

/**
 * Process-wide logger, created on first use. JSON lines on stderr so stdout
 * stays free for command output (e.g. `get-ssl`). Credential fields are
 * redacted wherever they appear.
 */
export function getLogger(): Logger {
  if (!root) {
    root = pino(
      {
        name: 'porkbun-dns',
        level: process.env.LOG_LEVEL ?? 'info',
        redact: {
          paths: ['apikey', 'secretapikey', '*.apikey', '*.secretapikey', 'credentials'],
          censor: '[redacted]',
        },
      },
      destination(2)
    );
  }
  return root;
}

export function createChildLogger(component: string): Logger {
  return getLogger().child({ component });
}
