export interface SDKErrorOptions {
  status?: number | undefined;
  code?: string | undefined;
  details?: Record<string, unknown> | undefined;
  requestId?: string | undefined;
  cause?: unknown;
}

export class SDKError extends Error {
  readonly status: number | undefined;
  readonly code: string | undefined;
  readonly details: Record<string, unknown>;
  readonly requestId: string | undefined;

  constructor(message: string, options: SDKErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
    this.code = options.code;
    this.details = options.details ?? {};
    this.requestId = options.requestId;
  }

  override toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.status !== undefined) {
      parts.push(`status=${this.status}`);
    }
    if (this.code) {
      parts.push(`code=${this.code}`);
    }
    if (this.requestId) {
      parts.push(`requestId=${this.requestId}`);
    }
    return parts.join(', ');
  }
}

export class ConfigurationError extends SDKError {
  constructor(message: string, options: SDKErrorOptions = {}) {
    super(message, { code: 'configuration_error', ...options });
  }
}

export class NetworkError extends SDKError {
  constructor(message: string, options: SDKErrorOptions = {}) {
    super(message, { code: 'network_error', ...options });
  }
}

export class TimeoutError extends SDKError {
  constructor(message: string, options: SDKErrorOptions = {}) {
    super(message, { code: 'timeout', ...options });
  }
}

export class ValidationError extends SDKError {
  readonly fields: Record<string, string[]> | undefined;

  constructor(message: string, options: SDKErrorOptions & { fields?: Record<string, string[]> | undefined } = {}) {
    super(message, options);
    this.fields = options.fields;
  }
}

export class AuthenticationError extends SDKError {}

export class PermissionError extends SDKError {}

export class NotFoundError extends SDKError {}

export class RateLimitError extends SDKError {
  readonly retryAfterMs: number | undefined;

  constructor(message: string, options: SDKErrorOptions & { retryAfterMs?: number | undefined } = {}) {
    super(message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class ServerError extends SDKError {}

export interface GraphQLErrorItem {
  message: string;
  path?: unknown[] | undefined;
  extensions?: Record<string, unknown> | undefined;
}

export class GraphQLError extends SDKError {
  readonly errors: GraphQLErrorItem[];

  constructor(errors: GraphQLErrorItem[], options: SDKErrorOptions = {}) {
    const first = errors[0]?.message ?? 'unknown error';
    super(`GraphQL query failed: ${first}`, { code: 'graphql_error', ...options });
    this.errors = errors;
  }
}

export class UnknownError extends SDKError {}

const STATUS_MESSAGES: Record<number, string> = {
  400: 'Bad Request - The request was invalid',
  401: 'Unauthorized - Invalid API key. Get a new key at https://cloud.specstory.com/api-keys',
  403: 'Forbidden - You do not have permission to access this resource',
  404: 'Not Found - The requested resource does not exist',
  429: 'Too Many Requests - Rate limit exceeded. Please retry after some time',
  500: 'Internal Server Error - Something went wrong on our end',
  502: 'Bad Gateway - The server received an invalid response',
  503: 'Service Unavailable - The service is temporarily unavailable',
  504: 'Gateway Timeout - The server did not respond in time',
};

export interface ErrorBody {
  code?: string | undefined;
  message?: string | undefined;
  fields?: Record<string, string[]> | undefined;
}

/**
 * Maps an HTTP failure to the matching error class. The message is the fixed text for the
 * status; whatever the server said about it lands in `details.serverMessage`.
 */
export function errorFromResponse(
  status: number,
  body: ErrorBody | undefined,
  requestId?: string,
  retryAfterMs?: number,
): SDKError {
  const message = STATUS_MESSAGES[status] ?? `HTTP Error ${status}`;
  const details: Record<string, unknown> = {};
  if (body?.message) {
    details.serverMessage = body.message;
  }
  const options: SDKErrorOptions = {
    status,
    code: body?.code ?? defaultCode(status),
    details,
    requestId,
  };

  if (status === 400 || status === 422) {
    return new ValidationError(message, { ...options, fields: body?.fields });
  }
  if (status === 401) {
    return new AuthenticationError(message, options);
  }
  if (status === 403) {
    return new PermissionError(message, options);
  }
  if (status === 404) {
    return new NotFoundError(message, options);
  }
  if (status === 408) {
    return new TimeoutError(message, options);
  }
  if (status === 429) {
    return new RateLimitError(message, { ...options, retryAfterMs });
  }
  if (status >= 500) {
    return new ServerError(message, options);
  }
  return new UnknownError(message, options);
}

function defaultCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'validation_error';
    case 401:
      return 'authentication_error';
    case 403:
      return 'permission_denied';
    case 404:
      return 'not_found';
    case 408:
      return 'timeout';
    case 429:
      return 'rate_limited';
    default:
      return status >= 500 ? 'server_error' : 'unknown_error';
  }
}
