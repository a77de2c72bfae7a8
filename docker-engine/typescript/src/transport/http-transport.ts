/**
 * HTTP transport for the Docker Engine API.
 *
 * Requests go through an undici Pool, over the Engine's unix socket or TCP.
 * Every path is prefixed with the configured API version (`/v1.41/...`).
 *
 * @module transport/http-transport
 */

import { Pool, errors as undiciErrors, type Dispatcher } from 'undici';
import type { EngineConfig } from '../config.js';
import { resolveEndpoint } from '../config.js';
import { EngineError, isEngineError, toError } from '../errors.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';

/**
 * Options for HTTP requests
 */
export interface RequestOptions {
  /** Additional headers for this request */
  headers?: Record<string, string>;
  /** Query parameters; undefined values are skipped */
  query?: Record<string, string | number | boolean | undefined>;
  /** Signal for request cancellation */
  signal?: AbortSignal;
}

/**
 * Undecoded response. Callers must close it once done, whether or not the
 * body was read.
 */
export interface RawResponse {
  readonly statusCode: number;
  readonly headers: Record<string, string | string[] | undefined>;
  /** Reads the whole body as text. */
  text(): Promise<string>;
  /** Releases the connection; discards any unread body. */
  close(): Promise<void>;
}

/**
 * Interface for the Engine HTTP transport layer
 */
export interface HttpTransport {
  get(path: string, options?: RequestOptions): Promise<RawResponse>;
  post(path: string, body: unknown, options?: RequestOptions): Promise<RawResponse>;
}

class UndiciRawResponse implements RawResponse {
  private done = false;

  constructor(private readonly data: Dispatcher.ResponseData) {}

  get statusCode(): number {
    return this.data.statusCode;
  }

  get headers(): Record<string, string | string[] | undefined> {
    return this.data.headers;
  }

  async text(): Promise<string> {
    this.done = true;
    return this.data.body.text();
  }

  async close(): Promise<void> {
    if (this.done) {
      return;
    }
    this.done = true;
    await this.data.body.dump();
  }
}

export interface UndiciHttpTransportOptions {
  logger?: Logger;
  /** Dispatcher to send requests through instead of an owned Pool */
  dispatcher?: Dispatcher;
}

/**
 * HttpTransport implementation on undici
 */
export class UndiciHttpTransport implements HttpTransport {
  private readonly origin: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly config: EngineConfig,
    options: UndiciHttpTransportOptions = {}
  ) {
    const endpoint = resolveEndpoint(config.host);
    this.origin = endpoint.origin;
    this.logger = options.logger ?? new NoopLogger();

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Pool(endpoint.origin, {
        socketPath: endpoint.socketPath,
        keepAliveTimeout: 30000,
      });
      this.ownsDispatcher = true;
    }
  }

  async get(path: string, options?: RequestOptions): Promise<RawResponse> {
    return this.request('GET', path, undefined, options);
  }

  async post(path: string, body: unknown, options?: RequestOptions): Promise<RawResponse> {
    return this.request('POST', path, body, options);
  }

  /**
   * Closes the underlying pool, if this transport created it
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    options?: RequestOptions
  ): Promise<RawResponse> {
    const fullPath = this.buildPath(path, options?.query);
    const headers = this.buildHeaders(body !== undefined, options?.headers);
    const started = Date.now();

    this.logger.debug('Outgoing request', { method, path: fullPath });

    let data: Dispatcher.ResponseData;
    try {
      data = await this.dispatcher.request({
        origin: this.origin,
        method,
        path: fullPath,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: options?.signal,
        headersTimeout: this.config.timeout,
        bodyTimeout: this.config.timeout,
      });
    } catch (error) {
      throw this.mapRequestError(error, options?.signal);
    }

    this.logger.debug('Incoming response', {
      method,
      path: fullPath,
      status: data.statusCode,
      durationMs: Date.now() - started,
    });

    const response = new UndiciRawResponse(data);
    if (response.statusCode < 200 || response.statusCode >= 400) {
      throw await this.parseErrorResponse(response);
    }
    return response;
  }

  private buildPath(
    path: string,
    query?: Record<string, string | number | boolean | undefined>
  ): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    let fullPath = `/v${this.config.apiVersion}${normalizedPath}`;

    if (query) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          params.append(key, String(value));
        }
      }
      const qs = params.toString();
      if (qs) {
        fullPath += `?${qs}`;
      }
    }
    return fullPath;
  }

  private buildHeaders(
    hasBody: boolean,
    customHeaders?: Record<string, string>
  ): Record<string, string> {
    return {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
      ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
      ...this.config.headers,
      ...customHeaders,
    };
  }

  private mapRequestError(error: unknown, signal?: AbortSignal): EngineError {
    if (isEngineError(error)) {
      return error;
    }
    const cause = toError(error);

    if (signal?.aborted || cause instanceof undiciErrors.RequestAbortedError) {
      return EngineError.cancelled('Request cancelled', cause);
    }
    if (
      cause instanceof undiciErrors.HeadersTimeoutError ||
      cause instanceof undiciErrors.BodyTimeoutError ||
      cause instanceof undiciErrors.ConnectTimeoutError
    ) {
      return EngineError.timeout(`Request timeout after ${this.config.timeout}ms`, cause);
    }
    return EngineError.connectionFailed(
      `Cannot connect to the Docker daemon at ${this.config.host}: ${cause.message}`,
      cause
    );
  }

  /**
   * Reads an Engine error body ({"message": "..."}) and maps it by status.
   */
  private async parseErrorResponse(response: RawResponse): Promise<EngineError> {
    const status = response.statusCode;
    let text = '';
    try {
      text = await response.text();
    } catch (error) {
      this.logger.debug('Failed to read error body', { status, error: toError(error).message });
    } finally {
      await response.close();
    }

    let message = text.trim() || `HTTP ${status} error`;
    const parsed = parseJsonBody(text);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      message = parsed.message;
    }

    return EngineError.fromResponse(status, message);
  }
}

/**
 * Parses a JSON error body; undefined for plain-text bodies.
 */
function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Creates an HTTP transport instance
 */
export function createHttpTransport(
  config: EngineConfig,
  options?: UndiciHttpTransportOptions
): UndiciHttpTransport {
  return new UndiciHttpTransport(config, options);
}
