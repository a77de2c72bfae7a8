/**
 * Distribution Service
 *
 * Asks the Engine to contact the image's registry and return the manifest
 * descriptor and supported platforms:
 * - GET /distribution/{name}/json
 *
 * @module services/distribution
 */

import { REGISTRY_AUTH_HEADER } from '../auth/registry-auth.js';
import { EngineError, toError } from '../errors.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { DistributionInspectSchema, type DistributionInspect } from '../types/registry.js';

export interface DistributionInspectOptions {
  signal?: AbortSignal;
}

/**
 * Registry inspection through the Engine.
 */
export interface DistributionService {
  /**
   * Resolves an image on its registry.
   *
   * @param image - Image reference, e.g. "nginx:1.25"
   * @param encodedRegistryAuth - Value for the X-Registry-Auth header
   * @throws {EngineError} If the registry cannot be reached or the image is unknown
   */
  inspect(
    image: string,
    encodedRegistryAuth?: string,
    options?: DistributionInspectOptions
  ): Promise<DistributionInspect>;
}

export class DistributionServiceImpl implements DistributionService {
  constructor(private readonly transport: HttpTransport) {}

  async inspect(
    image: string,
    encodedRegistryAuth?: string,
    options?: DistributionInspectOptions
  ): Promise<DistributionInspect> {
    if (!image || image.trim() === '') {
      throw EngineError.invalidReference('Image reference cannot be empty');
    }

    const headers: Record<string, string> = {};
    if (encodedRegistryAuth) {
      headers[REGISTRY_AUTH_HEADER] = encodedRegistryAuth;
    }

    const response = await this.transport.get(`/distribution/${image}/json`, {
      headers,
      signal: options?.signal,
    });

    try {
      const text = await response.text();
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw EngineError.deserialization(
          `Failed to parse distribution response: ${toError(error).message}`,
          toError(error)
        );
      }

      const result = DistributionInspectSchema.safeParse(body);
      if (!result.success) {
        throw EngineError.deserialization(
          `Invalid distribution response: ${result.error.message}`
        );
      }
      return result.data;
    } finally {
      await response.close();
    }
  }
}

export function createDistributionService(transport: HttpTransport): DistributionService {
  return new DistributionServiceImpl(transport);
}
