/**
 * Error kinds raised by the aggregator. Each carries a stable `code` so callers
 * and logs can tell them apart without string matching on messages.
 */
export class AggregatorError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A required local file (whitelist, custom list) is absent. */
export class MissingSourceFileError extends AggregatorError {
  constructor(readonly path: string, cause?: unknown) {
    super('E_MISSING_FILE', `source file not found: ${path}`, { cause });
  }
}

/** A payload could not be parsed into the shape its format declares. */
export class MalformedPayloadError extends AggregatorError {
  constructor(readonly sourceId: string, message: string, cause?: unknown) {
    super('E_MALFORMED_PAYLOAD', `${sourceId}: ${message}`, { cause });
  }
}

/** A domain has no ASCII-compatible encoding, so no content hash exists for it. */
export class IdnaEncodingError extends AggregatorError {
  constructor(readonly domain: string, cause?: unknown) {
    super('E_IDNA', `cannot IDNA-encode ${JSON.stringify(domain)}`, { cause });
  }
}

/** Strict mode: a source produced no usable result. */
export class SourceUnusableError extends AggregatorError {
  constructor(readonly sourceId: string, reason: string, cause?: unknown) {
    super('E_SOURCE_UNUSABLE', `${sourceId} yielded no usable result: ${reason}`, { cause });
  }
}

export class ConfigError extends AggregatorError {
  constructor(message: string, cause?: unknown) {
    super('E_CONFIG', message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
