/** Invalid environment variable or command-line flag. Fatal before any work starts. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Unusable input file: unreadable, empty, or without a required column. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export type DiscoveryErrorKind = 'auth' | 'quota' | 'unknown_vertical' | 'response';

/** Raised by company discovery; `auth` and `quota` abort the whole run. */
export class DiscoveryError extends Error {
  readonly kind: DiscoveryErrorKind;
  readonly status?: number;

  constructor(kind: DiscoveryErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'DiscoveryError';
    this.kind = kind;
    this.status = status;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
