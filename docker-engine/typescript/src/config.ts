/**
 * Configuration types for the Docker Engine client.
 * @module config
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './observability/logging.js';

// ============================================================================
// Default Constants
// ============================================================================

/** Default Engine endpoint. */
export const DEFAULT_HOST = 'unix:///var/run/docker.sock';

/** Default Engine API version. */
export const DEFAULT_API_VERSION = '1.41';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 60000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'docker-engine-client-ts/0.1.0';

// ============================================================================
// Engine Configuration
// ============================================================================

/**
 * Docker Engine client configuration.
 */
export interface EngineConfig {
  /** Engine endpoint: unix://, tcp://, http:// or https:// */
  host: string;
  /** API version used in the path prefix and the version header. */
  apiVersion: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** User-Agent header. */
  userAgent: string;
  /** Extra headers sent with every request. */
  headers: Record<string, string>;
  /** Log level; logging is disabled when unset. */
  logLevel?: LogLevel;
}

/**
 * Where to connect for a given host.
 */
export interface EngineEndpoint {
  /** HTTP origin used for requests */
  origin: string;
  /** Unix socket path, for unix:// hosts */
  socketPath?: string;
}

// ============================================================================
// Zod Validation Schemas
// ============================================================================

const hostSchema = z
  .string()
  .min(1)
  .regex(/^(unix:\/\/\/.+|tcp:\/\/[^/]+|https?:\/\/.+)$/);

const apiVersionSchema = z.string().regex(/^\d+\.\d+$/);

const headersSchema = z.record(z.string());

const logLevelSchema = z.enum(LOG_LEVELS).optional();

// ============================================================================
// Error Types
// ============================================================================

export enum EngineConfigErrorKind {
  /** Invalid host. */
  InvalidHost = 'invalid_host',
  /** Invalid API version. */
  InvalidApiVersion = 'invalid_api_version',
  /** Invalid timeout value. */
  InvalidTimeout = 'invalid_timeout',
  /** Invalid configuration. */
  InvalidConfiguration = 'invalid_configuration',
}

/**
 * Engine configuration error.
 */
export class EngineConfigError extends Error {
  public readonly kind: EngineConfigErrorKind;

  constructor(kind: EngineConfigErrorKind, message: string) {
    super(message);
    this.name = 'EngineConfigError';
    this.kind = kind;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineConfigError);
    }
  }
}

// ============================================================================
// Configuration Factory
// ============================================================================

export function createDefaultConfig(): EngineConfig {
  return {
    host: DEFAULT_HOST,
    apiVersion: DEFAULT_API_VERSION,
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
    headers: {},
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validates an Engine configuration.
 * @throws {EngineConfigError} If the configuration is invalid.
 */
export function validateConfig(config: EngineConfig): void {
  if (!hostSchema.safeParse(config.host).success) {
    throw new EngineConfigError(
      EngineConfigErrorKind.InvalidHost,
      `Invalid host: ${config.host}. Expected unix:///path, tcp://host:port or http(s)://host`
    );
  }

  if (!apiVersionSchema.safeParse(config.apiVersion).success) {
    throw new EngineConfigError(
      EngineConfigErrorKind.InvalidApiVersion,
      `Invalid API version: ${config.apiVersion}`
    );
  }

  if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
    throw new EngineConfigError(
      EngineConfigErrorKind.InvalidTimeout,
      'Timeout must be a positive integer'
    );
  }

  const headersResult = headersSchema.safeParse(config.headers);
  if (!headersResult.success) {
    throw new EngineConfigError(
      EngineConfigErrorKind.InvalidConfiguration,
      `Invalid headers: ${headersResult.error.message}`
    );
  }

  const logLevelResult = logLevelSchema.safeParse(config.logLevel);
  if (!logLevelResult.success) {
    throw new EngineConfigError(
      EngineConfigErrorKind.InvalidConfiguration,
      `Invalid log level: ${String(config.logLevel)}`
    );
  }
}

/**
 * Resolves a host string into an HTTP origin and optional socket path.
 *
 * @example
 * ```typescript
 * resolveEndpoint('unix:///var/run/docker.sock');
 * // { origin: 'http://localhost', socketPath: '/var/run/docker.sock' }
 * resolveEndpoint('tcp://10.0.0.5:2375');
 * // { origin: 'http://10.0.0.5:2375' }
 * ```
 */
export function resolveEndpoint(host: string): EngineEndpoint {
  if (host.startsWith('unix://')) {
    const socketPath = host.slice('unix://'.length);
    if (!socketPath.startsWith('/')) {
      throw new EngineConfigError(
        EngineConfigErrorKind.InvalidHost,
        `Unix socket path must be absolute: ${host}`
      );
    }
    return { origin: 'http://localhost', socketPath };
  }

  if (host.startsWith('tcp://')) {
    return { origin: `http://${host.slice('tcp://'.length)}` };
  }

  if (host.startsWith('http://') || host.startsWith('https://')) {
    return { origin: new URL(host).origin };
  }

  throw new EngineConfigError(
    EngineConfigErrorKind.InvalidHost,
    `Unsupported host protocol: ${host}`
  );
}

/**
 * Loads configuration from environment variables over the defaults.
 *
 * Reads DOCKER_HOST, DOCKER_API_VERSION, DOCKER_CLIENT_TIMEOUT (ms) and DOCKER_LOG_LEVEL.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const config = createDefaultConfig();

  if (env.DOCKER_HOST) {
    config.host = env.DOCKER_HOST;
  }
  if (env.DOCKER_API_VERSION) {
    config.apiVersion = env.DOCKER_API_VERSION;
  }
  if (env.DOCKER_CLIENT_TIMEOUT) {
    config.timeout = Number(env.DOCKER_CLIENT_TIMEOUT);
  }
  if (env.DOCKER_LOG_LEVEL) {
    const level = logLevelSchema.safeParse(env.DOCKER_LOG_LEVEL);
    if (!level.success) {
      throw new EngineConfigError(
        EngineConfigErrorKind.InvalidConfiguration,
        `Invalid DOCKER_LOG_LEVEL: ${env.DOCKER_LOG_LEVEL}`
      );
    }
    config.logLevel = level.data;
  }

  validateConfig(config);
  return config;
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Builder for EngineConfig with fluent API.
 */
export class EngineConfigBuilder {
  private config: EngineConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  host(host: string): this {
    this.config.host = host;
    return this;
  }

  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a header sent with every request.
   */
  header(name: string, value: string): this {
    this.config.headers = { ...this.config.headers, [name]: value };
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {EngineConfigError} If the configuration is invalid.
   */
  build(): EngineConfig {
    validateConfig(this.config);
    return { ...this.config, headers: { ...this.config.headers } };
  }
}

// ============================================================================
// Namespace
// ============================================================================

export namespace EngineConfig {
  export function builder(): EngineConfigBuilder {
    return new EngineConfigBuilder();
  }

  export function defaultConfig(): EngineConfig {
    return createDefaultConfig();
  }

  export function fromEnv(env?: NodeJS.ProcessEnv): EngineConfig {
    return configFromEnv(env);
  }

  export function validate(config: EngineConfig): void {
    validateConfig(config);
  }
}
