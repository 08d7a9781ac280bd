export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'SOURCE_FETCH_FAILED'
  | 'SOURCE_LIST_EMPTY'
  | 'CACHE_IO'
  | 'DOMAIN_FILE'
  | 'DEVICE_CONNECTION'
  | 'GATEWAY_COMMAND'
  | 'RULE_APPLICATION';

export abstract class AdblockError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AdblockError {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class SourceFetchError extends AdblockError {
  readonly code = 'SOURCE_FETCH_FAILED';

  constructor(
    readonly url: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch blocklist ${url}: ${reason}`, options);
  }
}

export class EmptySourceListError extends AdblockError {
  readonly code = 'SOURCE_LIST_EMPTY';

  constructor(readonly path: string) {
    super(`Source list ${path} has no blocklist URLs`);
  }
}

export class CacheIOError extends AdblockError {
  readonly code = 'CACHE_IO';

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Denied-domain cache ${path}: ${reason}`, options);
  }
}

export class DomainFileError extends AdblockError {
  readonly code = 'DOMAIN_FILE';

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot read ${path}: ${reason}`, options);
  }
}

export class DeviceConnectionError extends AdblockError {
  readonly code = 'DEVICE_CONNECTION';

  constructor(
    readonly device: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot connect to ${device}: ${reason}`, options);
  }
}

export class GatewayCommandError extends AdblockError {
  readonly code = 'GATEWAY_COMMAND';

  constructor(
    readonly command: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${command} failed: ${reason}`, options);
  }
}

export class RuleApplicationError extends AdblockError {
  readonly code = 'RULE_APPLICATION';

  constructor(
    readonly device: string,
    readonly domain: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to add redirect for ${domain} on ${device}: ${errorMessage(options?.cause)}`, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? 'unknown error');
}
