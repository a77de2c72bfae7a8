/**
 * Docker Engine Integration Library
 *
 * Docker Engine API client for swarm services:
 * - Service creation with digest pinning of the image
 * - Registry inspection (manifest digest and supported platforms)
 * - Image reference parsing and normalization
 * - X-Registry-Auth credential encoding
 * - undici transport over unix socket or TCP
 *
 * @example
 * ```typescript
 * import { EngineConfig, createClient, encodeAuthConfig } from '@engine-kit/docker-engine';
 *
 * const client = createClient(EngineConfig.builder().host('unix:///var/run/docker.sock').build());
 *
 * const response = await client.services().create(
 *   { Name: 'web', TaskTemplate: { ContainerSpec: { Image: 'nginx:1.25' } } },
 *   { queryRegistry: true, encodedRegistryAuth: encodeAuthConfig({ username: 'ci', password: 'test-secret' }) }
 * );
 * console.log(response.ID, response.Warnings);
 *
 * await client.close();
 * ```
 *
 * @module @engine-kit/docker-engine
 */

// =============================================================================
// Error Exports
// =============================================================================

export {
  EngineError,
  EngineErrorKind,
  ResponseDecodeError,
  isEngineError,
} from './errors.js';

// =============================================================================
// Configuration Exports
// =============================================================================

export {
  EngineConfig,
  EngineConfigBuilder,
  EngineConfigError,
  EngineConfigErrorKind,
  type EngineEndpoint,
  DEFAULT_HOST,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  createDefaultConfig,
  validateConfig,
  resolveEndpoint,
  configFromEnv,
} from './config.js';

// =============================================================================
// Client Exports
// =============================================================================

export {
  type EngineClient,
  type EngineClientOptions,
  EngineClientImpl,
  createClient,
  createClientFromEnv,
} from './client.js';

// =============================================================================
// Transport, Auth and Logging Exports
// =============================================================================

export {
  type HttpTransport,
  type RawResponse,
  type RequestOptions,
  type UndiciHttpTransportOptions,
  UndiciHttpTransport,
  createHttpTransport,
} from './transport/http-transport.js';

export {
  type AuthConfig,
  AuthConfigSchema,
  REGISTRY_AUTH_HEADER,
  encodeAuthConfig,
  decodeAuthConfig,
} from './auth/registry-auth.js';

export {
  type Logger,
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  ConsoleLogger,
  NoopLogger,
  createLogger,
} from './observability/logging.js';

// =============================================================================
// Reference, Service and Type Exports
// =============================================================================

export * from './reference/reference.js';
export * from './services/index.js';
export * from './types/index.js';
