/**
 * Error kinds surfaced to callers. Nothing here is retried: labeling is pure
 * and collection failures are reported per video.
 */

export type ErrorKind = 'InvalidInput' | 'YouTubeApi' | 'Storage' | 'Config';

export class CommentCoderError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * Raised before detection when the labeler receives something other than a
 * string. Carries the offending value for manual review.
 */
export class InvalidInputError extends CommentCoderError {
  readonly input: unknown;

  constructor(input: unknown) {
    super('InvalidInput', `Comment text must be a string, got ${describeValue(input)}`);
    this.input = input;
  }
}

export class YouTubeApiError extends CommentCoderError {
  readonly status: number | null;
  readonly endpoint: string;

  constructor(endpoint: string, status: number | null, message: string, options?: { cause?: unknown }) {
    super('YouTubeApi', `${endpoint}: ${message}`, options);
    this.status = status;
    this.endpoint = endpoint;
  }
}

export class StorageError extends CommentCoderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('Storage', message, options);
  }
}

export class ConfigError extends CommentCoderError {
  constructor(message: string) {
    super('Config', message);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
