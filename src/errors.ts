export type PipelineErrorKind =
  | 'config'
  | 'listing'
  | 'secret'
  | 'model_unavailable'
  | 'summarization'
  | 'malformed_key'
  | 'fetch'
  | 'decode'
  | 'write'
  | 'search';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('config', message);
  }
}

export class ListingError extends PipelineError {
  constructor(bucket: string, prefix: string, cause?: unknown) {
    super('listing', `Listing s3://${bucket}/${prefix} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class SecretAccessError extends PipelineError {
  constructor(secretId: string, cause?: unknown) {
    super('secret', `Could not read secret "${secretId}": ${errorMessage(cause)}`, { cause });
  }
}

/** The serving endpoint is down and must be relaunched before any further summaries. */
export class ModelUnavailableError extends PipelineError {
  constructor(endpoint: string, cause?: unknown) {
    super('model_unavailable', `Summarization endpoint "${endpoint}" is unavailable: ${errorMessage(cause)}`, { cause });
  }
}

export class SummarizationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('summarization', message, { cause });
  }
}

export class MalformedKeyError extends PipelineError {
  readonly key: string;

  constructor(key: string) {
    super('malformed_key', `Unexpected key format: "${key}" (expected "{date}/{topic}/{file}")`);
    this.key = key;
  }
}

export class NewsSearchError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, cause?: unknown) {
    super('search', message, { cause });
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}

/** Fatal errors abort the whole run; everything else is isolated to one object, chunk or topic. */
export function isFatal(error: unknown): boolean {
  return (
    error instanceof ListingError ||
    error instanceof SecretAccessError ||
    error instanceof ModelUnavailableError ||
    error instanceof ConfigError
  );
}
