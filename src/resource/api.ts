import { CancelledError, ErrorCode, InvocationError } from '../errors.js';
import { createLogger } from '../logging/index.js';
import { Resource } from './base.js';
import type { InvocationContext } from './context.js';
import type { Validator } from './validator.js';

const log = createLogger({ component: 'api-resource' });

/**
 * Status codes that indicate temporary failures (should retry).
 */
const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests (rate limit)
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Response wrapper for API calls.
 */
export class ApiResponse {
  public readonly statusCode: number;
  public readonly headers: Record<string, string>;
  public readonly body: unknown;

  constructor(response: Response, body?: unknown) {
    this.statusCode = response.status;
    this.headers = Object.fromEntries(response.headers.entries());
    this.body = body;
  }

  get ok(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  get isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode <= 499;
  }

  get isServerError(): boolean {
    return this.statusCode >= 500 && this.statusCode <= 599;
  }

  get isRetryable(): boolean {
    return RETRYABLE_STATUS_CODES.has(this.statusCode);
  }

  /**
   * Get the Retry-After header value in seconds, if present.
   */
  get retryAfter(): number | null {
    const retryAfter = this.headers['retry-after'];
    if (!retryAfter) {
      return null;
    }
    const parsed = Number.parseInt(retryAfter, 10);
    return Number.isNaN(parsed) ? 60 : parsed;
  }
}

export interface ApiErrorDetails {
  moduleName: string;
  url: string;
  statusCode: number | null;
  apiCode?: unknown;
  retryable: boolean;
  /** Seconds from a Retry-After header */
  retryAfter?: number | null;
  body?: unknown;
  cause?: unknown;
}

/**
 * Error thrown when a remote API call fails, either at the HTTP level or
 * with a business failure in a standard-format envelope.
 */
export class ApiError extends InvocationError {
  readonly moduleName: string;
  readonly url: string;
  readonly statusCode: number | null;
  readonly apiCode: unknown;
  readonly retryable: boolean;
  readonly retryAfter: number | null;
  readonly body: unknown;

  constructor(message: string, path: string, details: ApiErrorDetails) {
    super(message, { path, cause: details.cause }, ErrorCode.API_ERROR);
    this.name = 'ApiError';
    this.moduleName = details.moduleName;
    this.url = details.url;
    this.statusCode = details.statusCode;
    this.apiCode = details.apiCode;
    this.retryable = details.retryable;
    this.retryAfter = details.retryAfter ?? null;
    this.body = details.body;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      module: this.moduleName,
      url: this.url,
      status_code: this.statusCode,
      api_code: this.apiCode,
      retryable: this.retryable,
      retry_after: this.retryAfter,
    };
  }
}

/**
 * Envelope returned by standard-format APIs.
 */
interface StandardEnvelope {
  result?: unknown;
  code?: unknown;
  message?: unknown;
  data?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Base class for resources implemented by a remote HTTP API.
 *
 * GET and DELETE requests send the input as query parameters, the other
 * methods as a JSON body. With `isStandardFormat`, the response is expected to
 * be a `{ result, code, message, data }` envelope and `data` is returned.
 *
 * @example
 * ```typescript
 * class UserInfoAPI extends ApiResource<{ userId: number }, UserInfo> {
 *   static baseUrl = 'https://users.example.com';
 *   static moduleName = 'user_service';
 *   static action = '/api/v1/users/';
 *   static method = 'GET' as const;
 *
 *   protected responseValidator() {
 *     return fromZod(userInfoSchema);
 *   }
 * }
 * ```
 */
export abstract class ApiResource<
  TInput extends Record<string, unknown> = Record<string, unknown>,
  TOutput = unknown,
> extends Resource<TInput, TOutput> {
  /** Base URL for API calls. Classes without one are skipped by declarations. */
  static baseUrl = '';

  /** Endpoint path appended to the base URL. */
  static action = '';

  static method: HttpMethod = 'GET';

  /** Name of the remote system, used in errors and logs. */
  static moduleName = '';

  /** Request timeout in milliseconds. */
  static defaultTimeout = 60000;

  static defaultHeaders: Record<string, string> = {};

  /** Whether responses use the `{ result, code, message, data }` envelope. */
  static isStandardFormat = true;

  /**
   * Validator that turns the response data into the output type.
   */
  protected abstract responseValidator(): Validator<TOutput>;

  protected get config(): typeof ApiResource {
    return this.constructor as typeof ApiResource;
  }

  /**
   * Headers added to every request. Override for authentication.
   */
  protected headers(_context: InvocationContext): Record<string, string> {
    return {};
  }

  /**
   * Enrich the validated input before sending (credentials, common params).
   */
  protected fullRequestData(input: TInput): Record<string, unknown> {
    return { ...input };
  }

  /**
   * Build the request URL. Override to support path parameters.
   */
  protected requestUrl(_data: Record<string, unknown>): string {
    const { baseUrl, action } = this.config;
    if (!action) {
      return baseUrl;
    }
    return `${baseUrl.replace(/\/+$/, '')}/${action.replace(/^\/+/, '')}`;
  }

  /**
   * Post-process the response data before output validation.
   */
  protected renderResponseData(_input: TInput, data: unknown): unknown {
    return data;
  }

  async perform(input: TInput, context: InvocationContext): Promise<TOutput> {
    const data = this.fullRequestData(input);
    const method = this.config.method;
    const sendsQuery = method === 'GET' || method === 'DELETE';

    let url = this.requestUrl(data);
    if (sendsQuery) {
      url = this.appendQuery(url, data);
    }

    const response = await this.send(url, context, {
      method,
      headers: this.mergeHeaders(context, !sendsQuery),
      ...(sendsQuery ? {} : { body: JSON.stringify(data) }),
    });

    if (!response.ok) {
      throw this.httpError(response, url, context.path);
    }

    const payload = this.unwrapEnvelope(response, url, context.path);
    const rendered = this.renderResponseData(input, payload);
    const outcome = this.responseValidator()(rendered);
    if (!outcome.success) {
      const fields = outcome.issues.map((issue) => issue.field || '<root>').join(', ');
      throw new ApiError(`[${this.config.moduleName}] unexpected response shape (${fields})`, context.path, {
        moduleName: this.config.moduleName,
        url,
        statusCode: response.statusCode,
        retryable: false,
        body: response.body,
      });
    }
    return outcome.data;
  }

  private async send(url: string, context: InvocationContext, init: RequestInit): Promise<ApiResponse> {
    const timeoutSignal = AbortSignal.timeout(this.config.defaultTimeout);
    const signal = AbortSignal.any([context.signal, timeoutSignal]);
    const started = Date.now();

    let response: Response;
    try {
      response = await fetch(url, { ...init, signal });
    } catch (error) {
      if (context.signal.aborted) {
        throw new CancelledError(context.path, context.signal.reason);
      }
      const timedOut = timeoutSignal.aborted;
      const reason = error instanceof Error ? error.message : String(error);
      log.warn('API request failed before a response', {
        operation: 'send',
        path: context.path,
        url,
        timed_out: timedOut,
        error_message: reason,
      });
      throw new ApiError(
        timedOut
          ? `[${this.config.moduleName}] request timed out after ${this.config.defaultTimeout}ms`
          : `[${this.config.moduleName}] connection error: ${reason}`,
        context.path,
        { moduleName: this.config.moduleName, url, statusCode: null, retryable: true, cause: error }
      );
    }

    const body = await this.parseBody(response);
    log.debug('API request completed', {
      operation: 'send',
      path: context.path,
      url,
      status_code: response.status,
      duration_ms: Date.now() - started,
    });
    return new ApiResponse(response, body);
  }

  private async parseBody(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') || '';
    const text = await response.text();
    if (contentType.includes('application/json') && text.length > 0) {
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }
    return text;
  }

  private unwrapEnvelope(response: ApiResponse, url: string, path: string): unknown {
    const body = response.body;
    if (!this.config.isStandardFormat || !isRecord(body)) {
      return body;
    }

    const envelope: StandardEnvelope = body;
    const failed = envelope.result === false && envelope.code !== 0 && envelope.code !== undefined;
    if (failed) {
      const message = typeof envelope.message === 'string' ? envelope.message : 'request failed';
      throw new ApiError(`[${this.config.moduleName}] ${message}`, path, {
        moduleName: this.config.moduleName,
        url,
        statusCode: response.statusCode,
        apiCode: envelope.code,
        retryable: false,
        body,
      });
    }
    return envelope.data;
  }

  private httpError(response: ApiResponse, url: string, path: string): ApiError {
    const detail = this.extractBodyErrorMessage(response.body) ?? STATUS_MESSAGES[response.statusCode] ?? 'HTTP Error';
    const kind = response.isServerError ? 'server' : response.isClientError ? 'client' : 'unexpected';
    log.warn('API request returned an error status', {
      operation: 'send',
      path,
      url,
      status_code: response.statusCode,
      kind,
      retry_after: response.retryAfter,
    });
    return new ApiError(`[${this.config.moduleName}] HTTP ${response.statusCode}: ${detail}`, path, {
      moduleName: this.config.moduleName,
      url,
      statusCode: response.statusCode,
      retryable: response.isRetryable,
      retryAfter: response.retryAfter,
      body: response.body,
    });
  }

  private appendQuery(url: string, params: Record<string, unknown>): string {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== null && value !== undefined) {
        searchParams.append(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
      }
    }
    const queryString = searchParams.toString();
    if (!queryString) {
      return url;
    }
    return url + (url.includes('?') ? '&' : '?') + queryString;
  }

  private mergeHeaders(context: InvocationContext, isJson: boolean): Record<string, string> {
    const headers: Record<string, string> = { ...this.config.defaultHeaders };

    if (isJson && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/json';
    }

    return { ...headers, ...this.headers(context) };
  }

  private extractBodyErrorMessage(body: unknown): string | null {
    if (!isRecord(body)) {
      return null;
    }

    const errorKeys = ['error', 'message', 'detail', 'error_message', 'msg'];
    for (const key of errorKeys) {
      const errorDetail = body[key];
      if (typeof errorDetail === 'string') {
        return errorDetail;
      }
      if (isRecord(errorDetail) && typeof errorDetail.message === 'string') {
        return errorDetail.message;
      }
    }

    return null;
  }
}

/**
 * Standard HTTP status code messages.
 */
const STATUS_MESSAGES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  408: 'Request Timeout',
  409: 'Conflict',
  410: 'Gone',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

/**
 * Check if a class is an API resource without a base URL (an abstract
 * intermediate that declarations skip).
 */
export function isUnconfiguredApiResource(value: unknown): boolean {
  return typeof value === 'function' && value.prototype instanceof ApiResource && !Reflect.get(value, 'baseUrl');
}
