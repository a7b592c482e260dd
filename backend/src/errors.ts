export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class DataSourceError extends HttpError {
  readonly source?: string;

  constructor(diagnostic: string, options: { source?: string; cause?: unknown } = {}) {
    super(500, diagnostic, undefined, options.cause);
    this.name = 'DataSourceError';
    this.source = options.source;
  }
}

export function notFound(message = 'not found', details?: unknown): HttpError {
  return new HttpError(404, message, details);
}

export function styleNotFound(styleCode: string): HttpError {
  return notFound('style not found', { style_code: styleCode });
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
