/**
 * Service creation request options and response.
 */

import { z } from 'zod';

/**
 * Options for creating a service.
 */
export interface ServiceCreateOptions {
  /**
   * Base64url-encoded registry credentials, sent as `X-Registry-Auth`.
   * See `encodeAuthConfig`.
   */
  encodedRegistryAuth?: string;
  /** Resolve the image digest and platforms on the registry before creating. */
  queryRegistry?: boolean;
  /** Cancels both the registry lookup and the create request. */
  signal?: AbortSignal;
}

/**
 * Response of `POST /services/create`.
 */
export interface ServiceCreateResponse {
  /** ID of the created service */
  ID: string;
  /** Warnings from the Engine, plus client-side warnings */
  Warnings: string[];
}

export const ServiceCreateResponseSchema = z.object({
  ID: z.string(),
  Warnings: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []),
});
