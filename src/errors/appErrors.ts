export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;
}

export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnsupportedFileTypeError extends AppError {
  readonly status = 400;
  readonly code = 'UNSUPPORTED_FILE_TYPE';

  constructor(
    public readonly extension: string,
    supported: readonly string[]
  ) {
    super(
      `File type '${extension ? `.${extension}` : '(none)'}' not supported. Supported types: ${supported
        .map((ext) => `.${ext}`)
        .join(', ')}`
    );
    this.name = 'UnsupportedFileTypeError';
  }
}

export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly resource: string,
    public readonly key: string | number
  ) {
    super(`${resource} '${key}' not found`);
    this.name = 'NotFoundError';
  }
}

export class FileTooLargeError extends AppError {
  readonly status = 413;
  readonly code = 'FILE_TOO_LARGE';

  constructor(public readonly maxBytes: number) {
    super(`File exceeds maximum allowed size of ${maxBytes} bytes`);
    this.name = 'FileTooLargeError';
  }
}

export class ExtractionFailedError extends AppError {
  readonly status = 422;
  readonly code = 'EXTRACTION_FAILED';

  constructor(
    public readonly fileName: string,
    reason: string
  ) {
    super(`Failed to extract text from '${fileName}': ${reason}`);
    this.name = 'ExtractionFailedError';
  }
}

export class RequestAbortedError extends AppError {
  readonly status = 499;
  readonly code = 'REQUEST_ABORTED';

  constructor(message = 'Request aborted by client') {
    super(message);
    this.name = 'RequestAbortedError';
  }
}

export class ModelGenerationError extends AppError {
  readonly status = 502;
  readonly code = 'MODEL_GENERATION_ERROR';

  constructor(
    message: string,
    public readonly model?: string
  ) {
    super(message);
    this.name = 'ModelGenerationError';
  }
}

export class IndexUnavailableError extends AppError {
  readonly status = 503;
  readonly code = 'INDEX_UNAVAILABLE';

  constructor(reason: string) {
    super(`Vector index is not available: ${reason}`);
    this.name = 'IndexUnavailableError';
  }
}

export class ModelServiceUnavailableError extends AppError {
  readonly status = 503;
  readonly code = 'MODEL_SERVICE_UNAVAILABLE';

  constructor(reason: string) {
    super(`Model service is not available: ${reason}`);
    this.name = 'ModelServiceUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
