export class SplitterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);

    this.name = new.target.name;
  }
}

export class ConfigError extends SplitterError {}

export class MalformedEventError extends SplitterError {}

/**
 * The source bytes could not be read as an image.
 */
export class DecodeError extends SplitterError {}

/**
 * The raster handed to the encoder was malformed or the encoder failed.
 */
export class EncodeError extends SplitterError {}

export class NotFoundError extends SplitterError {
  readonly bucket: string;
  readonly key: string;

  constructor(bucket: string, key: string, options?: { cause?: unknown }) {
    super(`Object ${key} was not found in bucket ${bucket}`, options);

    this.bucket = bucket;
    this.key = key;
  }
}

/**
 * The storage backend failed. Nothing is retried here, the platform decides.
 */
export class TransientError extends SplitterError {}

export class ProcessingError extends SplitterError {
  readonly objectKey: string;

  constructor(objectKey: string, cause: unknown) {
    super(`Error processing ${objectKey}: ${describeError(cause)}`, { cause });

    this.objectKey = objectKey;
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
