/** Base class for every error this package throws */
export class PorkbunDnsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PorkbunDnsError';
  }
}

/** The request never produced a response (DNS failure, reset, timeout) */
export class TransportError extends PorkbunDnsError {
  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Porkbun: request to ${url} failed: ${reason}`, { cause });
    this.name = 'TransportError';
  }
}

/** The registrar answered with an HTTP status other than 200 */
export class ApiHttpError extends PorkbunDnsError {
  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`Porkbun API error ${statusCode}: ${body}`);
    this.name = 'ApiHttpError';
  }
}

/** A response body (or a value inside it) could not be decoded */
export class ApiDecodeError extends PorkbunDnsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Porkbun: ${message}`, options);
    this.name = 'ApiDecodeError';
  }
}

/** A well-formed response whose status is not SUCCESS */
export class RegistrarError extends PorkbunDnsError {
  constructor(
    public readonly path: string,
    public readonly domain: string | undefined,
    message: string
  ) {
    super(message);
    this.name = 'RegistrarError';
  }
}

export class ConfigError extends PorkbunDnsError {
  constructor(
    message: string,
    public readonly missing: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A caller-supplied value the registrar would reject (record type, zone mismatch) */
export class InvalidInputError extends PorkbunDnsError {
  constructor(message: string) {
    super(`Porkbun: ${message}`);
    this.name = 'InvalidInputError';
  }
}
