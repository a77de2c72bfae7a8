/**
 * Registry credentials passed to the Engine in the `X-Registry-Auth` header.
 *
 * The Engine expects the JSON-serialized credentials encoded as URL-safe
 * base64 (padding kept).
 *
 * @module auth/registry-auth
 */

import { z } from 'zod';
import { EngineError, toError } from '../errors.js';

/** Header carrying encoded registry credentials. */
export const REGISTRY_AUTH_HEADER = 'X-Registry-Auth';

/**
 * Credentials for a registry.
 */
export interface AuthConfig {
  username?: string;
  password?: string;
  /** Pre-encoded "username:password" */
  auth?: string;
  email?: string;
  serveraddress?: string;
  /** Token used to obtain an access token for the registry */
  identitytoken?: string;
  /** Bearer token sent to the registry as-is */
  registrytoken?: string;
}

export const AuthConfigSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
  auth: z.string().optional(),
  email: z.string().optional(),
  serveraddress: z.string().optional(),
  identitytoken: z.string().optional(),
  registrytoken: z.string().optional(),
});

/**
 * Encodes credentials for the `X-Registry-Auth` header.
 *
 * @example
 * ```typescript
 * const encoded = encodeAuthConfig({ username: 'ci', password: 'test-secret' });
 * await client.services().create(spec, { encodedRegistryAuth: encoded, queryRegistry: true });
 * ```
 */
export function encodeAuthConfig(config: AuthConfig): string {
  const json = JSON.stringify(config);
  return Buffer.from(json, 'utf8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Decodes an `X-Registry-Auth` value. Standard base64 is accepted as well.
 *
 * @throws {EngineError} If the value is not base64-encoded JSON credentials
 */
export function decodeAuthConfig(encoded: string): AuthConfig {
  if (encoded.trim() === '') {
    throw EngineError.invalidCredentials('Encoded registry auth cannot be empty');
  }

  const normalized = encoded.trim().replace(/-/g, '+').replace(/_/g, '/');
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(normalized)) {
    throw EngineError.invalidCredentials('Encoded registry auth is not valid base64');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(normalized, 'base64').toString('utf8'));
  } catch (error) {
    throw EngineError.invalidCredentials('Encoded registry auth is not valid JSON', toError(error));
  }

  const result = AuthConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw EngineError.invalidCredentials(
      `Invalid registry auth payload: ${result.error.message}`
    );
  }
  return result.data;
}
