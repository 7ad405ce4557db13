export type HTTPErrorKind = 'parsingFailed' | 'invalidResponse' | 'timeout';

const MESSAGES: Record<HTTPErrorKind, string> = {
  parsingFailed: 'Invalid response.',
  invalidResponse: 'The server returned an error response.',
  timeout: 'The request timed out.',
};

export class HTTPError extends Error {
  readonly kind: HTTPErrorKind;
  /** HTTP status of the failed response, for `invalidResponse` */
  readonly statusCode?: number;

  constructor(kind: HTTPErrorKind, options?: { statusCode?: number; detail?: string; cause?: unknown }) {
    super(options?.detail ? `${MESSAGES[kind]} (${options.detail})` : MESSAGES[kind], { cause: options?.cause });
    this.name = 'HTTPError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
  }

  static parsingFailed(detail?: string, cause?: unknown): HTTPError {
    return new HTTPError('parsingFailed', { detail, cause });
  }
}

export function isHTTPError(error: unknown, kind?: HTTPErrorKind): error is HTTPError {
  return error instanceof HTTPError && (kind === undefined || error.kind === kind);
}
