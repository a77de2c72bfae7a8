/**
 * Docker Engine API Client
 *
 * Wires the transport, logger and services together for one Engine endpoint.
 *
 * @module client
 */

import { configFromEnv, validateConfig, type EngineConfig } from './config.js';
import { createLogger, type Logger } from './observability/logging.js';
import {
  DistributionServiceImpl,
  type DistributionService,
} from './services/distribution.js';
import { ServicesServiceImpl, type ServicesService } from './services/service.js';
import {
  UndiciHttpTransport,
  type UndiciHttpTransportOptions,
} from './transport/http-transport.js';

export interface EngineClientOptions {
  /** Overrides the logger derived from `config.logLevel` */
  logger?: Logger;
  /** Dispatcher to send requests through (e.g. an undici MockAgent) */
  dispatcher?: UndiciHttpTransportOptions['dispatcher'];
}

/**
 * Main Docker Engine client interface
 */
export interface EngineClient {
  /** Swarm service operations */
  services(): ServicesService;
  /** Registry inspection */
  distribution(): DistributionService;
  getConfig(): Readonly<EngineConfig>;
  /** Closes pooled connections */
  close(): Promise<void>;
}

export class EngineClientImpl implements EngineClient {
  private readonly config: EngineConfig;
  private readonly transport: UndiciHttpTransport;
  private readonly distributionService: DistributionService;
  private readonly servicesService: ServicesService;

  constructor(config: EngineConfig, options: EngineClientOptions = {}) {
    validateConfig(config);
    this.config = { ...config, headers: { ...config.headers } };

    const logger = options.logger ?? createLogger(config.logLevel);
    this.transport = new UndiciHttpTransport(this.config, {
      logger,
      dispatcher: options.dispatcher,
    });
    this.distributionService = new DistributionServiceImpl(this.transport);
    this.servicesService = new ServicesServiceImpl(
      this.transport,
      this.distributionService,
      this.config.apiVersion,
      logger
    );
  }

  services(): ServicesService {
    return this.servicesService;
  }

  distribution(): DistributionService {
    return this.distributionService;
  }

  getConfig(): Readonly<EngineConfig> {
    return { ...this.config, headers: { ...this.config.headers } };
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}

/**
 * Create a new Engine client instance
 */
export function createClient(config: EngineConfig, options?: EngineClientOptions): EngineClient {
  return new EngineClientImpl(config, options);
}

/**
 * Create an Engine client from DOCKER_* environment variables
 */
export function createClientFromEnv(
  env?: NodeJS.ProcessEnv,
  options?: EngineClientOptions
): EngineClient {
  return createClient(configFromEnv(env), options);
}
