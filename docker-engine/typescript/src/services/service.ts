/**
 * Service Service for swarm services
 *
 * - POST /services/create - Create a service
 *
 * Before creating, the image can be resolved on its registry so that every
 * node runs the same image: the reference is pinned by digest and the
 * placement is restricted to the platforms the image supports.
 *
 * @module services/service
 */

import { REGISTRY_AUTH_HEADER } from '../auth/registry-auth.js';
import { EngineError, ResponseDecodeError, toError } from '../errors.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import {
  formatReference,
  parseAnyReference,
  withDigest,
  type ImageReference,
} from '../reference/reference.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { DistributionInspect } from '../types/registry.js';
import {
  ServiceCreateResponseSchema,
  type ServiceCreateOptions,
  type ServiceCreateResponse,
} from '../types/service.js';
import type { Placement, ServiceSpec } from '../types/swarm.js';
import type { DistributionService } from './distribution.js';

/** Header carrying the client's API version. */
export const VERSION_HEADER = 'version';

/**
 * Swarm service operations.
 */
export interface ServicesService {
  /**
   * Creates a service.
   *
   * With `queryRegistry`, the image is looked up on its registry first. A
   * failed lookup does not abort the creation: the service is created with
   * the image as given and a warning is added to the response.
   *
   * `spec` is updated in place when the image is pinned or platforms are added.
   *
   * @throws {EngineError} If the create request fails
   * @throws {ResponseDecodeError} If the response cannot be decoded
   */
  create(spec: ServiceSpec, options?: ServiceCreateOptions): Promise<ServiceCreateResponse>;
}

export class ServicesServiceImpl implements ServicesService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly distribution: DistributionService,
    private readonly apiVersion: string,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  async create(
    spec: ServiceSpec,
    options: ServiceCreateOptions = {}
  ): Promise<ServiceCreateResponse> {
    const headers: Record<string, string> = {
      [VERSION_HEADER]: this.apiVersion,
    };
    if (options.encodedRegistryAuth) {
      headers[REGISTRY_AUTH_HEADER] = options.encodedRegistryAuth;
    }

    let distributionError: Error | undefined;
    if (options.queryRegistry) {
      distributionError = await this.resolveImage(spec, options);
    }

    const response = await this.transport.post('/services/create', spec, {
      headers,
      signal: options.signal,
    });

    try {
      let result: ServiceCreateResponse = { ID: '', Warnings: [] };
      let decodeError: Error | undefined;
      try {
        result = decodeCreateResponse(await response.text());
      } catch (error) {
        if (options.signal?.aborted) {
          throw EngineError.cancelled('Request cancelled', toError(error));
        }
        decodeError = toError(error);
      }

      if (distributionError) {
        result.Warnings.push(digestWarning(spec.TaskTemplate.ContainerSpec.Image));
      }

      if (decodeError) {
        throw new ResponseDecodeError(
          `Failed to decode service create response: ${decodeError.message}`,
          result,
          decodeError
        );
      }

      this.logger.debug('Service created', {
        id: result.ID,
        warnings: result.Warnings.length,
      });
      return result;
    } finally {
      await response.close();
    }
  }

  /**
   * Pins the image by digest and adds its platforms to the placement.
   * Returns the lookup error instead of throwing it.
   */
  private async resolveImage(
    spec: ServiceSpec,
    options: ServiceCreateOptions
  ): Promise<Error | undefined> {
    const containerSpec = spec.TaskTemplate.ContainerSpec;

    let inspect: DistributionInspect;
    try {
      inspect = await this.distribution.inspect(containerSpec.Image, options.encodedRegistryAuth, {
        signal: options.signal,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.warn('Registry lookup failed, image will not be pinned by digest', {
        image: containerSpec.Image,
        error: cause.message,
      });
      return cause;
    }

    const pinned = imageWithDigestString(containerSpec.Image, inspect.Descriptor.digest);
    if (pinned !== '') {
      containerSpec.Image = pinned;
    }
    spec.TaskTemplate.Placement = updateServicePlatforms(spec.TaskTemplate.Placement, inspect);
    return undefined;
  }
}

function decodeCreateResponse(text: string): ServiceCreateResponse {
  const body: unknown = JSON.parse(text);
  const result = ServiceCreateResponseSchema.safeParse(body);
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return result.data;
}

/**
 * Binds an image reference to a digest unless it already names one.
 *
 * Returns an empty string when the image is left as is: it does not parse,
 * it is already canonical, it is a bare image ID, or the digest is malformed.
 *
 * @example
 * ```typescript
 * imageWithDigestString('nginx:1.25', 'sha256:4c0fdaa8...');
 * // 'docker.io/library/nginx:1.25@sha256:4c0fdaa8...'
 * ```
 */
export function imageWithDigestString(image: string, digest: string): string {
  let ref: ImageReference;
  try {
    ref = parseAnyReference(image);
  } catch {
    return '';
  }

  if (ref.kind === 'canonical' || ref.kind === 'digest') {
    return '';
  }

  try {
    return formatReference(withDigest(ref, digest));
  } catch {
    return '';
  }
}

/**
 * Appends every platform reported by the registry to the placement,
 * creating the placement if needed. Existing entries are kept in order.
 */
export function updateServicePlatforms(
  placement: Placement | undefined,
  inspect: DistributionInspect
): Placement {
  const result = placement ?? {};
  if (inspect.Platforms.length === 0) {
    return result;
  }

  const platforms = result.Platforms ?? [];
  for (const p of inspect.Platforms) {
    platforms.push({ Architecture: p.architecture, OS: p.os });
  }
  result.Platforms = platforms;
  return result;
}

/**
 * Warning added to the create response when the image could not be pinned.
 */
export function digestWarning(image: string): string {
  return `image ${image} could not be accessed on a registry to record\nits digest. Each node will access ${image} independently,\npossibly leading to different nodes running different\nversions of the image.\n`;
}

export function createServicesService(
  transport: HttpTransport,
  distribution: DistributionService,
  apiVersion: string,
  logger?: Logger
): ServicesService {
  return new ServicesServiceImpl(transport, distribution, apiVersion, logger);
}
