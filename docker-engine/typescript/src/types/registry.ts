/**
 * Registry distribution types returned by `GET /distribution/{name}/json`.
 */

import { z } from 'zod';

/**
 * OCI descriptor for the manifest (or manifest list) the tag resolves to.
 */
export interface Descriptor {
  mediaType?: string;
  digest: string;
  size: number;
  urls?: string[];
  annotations?: Record<string, string>;
}

export const DescriptorSchema = z.object({
  mediaType: z.string().optional(),
  digest: z.string().default(''),
  size: z.number().default(0),
  urls: z.array(z.string()).nullish().transform((v) => v ?? undefined),
  annotations: z.record(z.string()).nullish().transform((v) => v ?? undefined),
});

/**
 * OCI platform as reported by the registry.
 */
export interface RegistryPlatform {
  architecture: string;
  os: string;
  'os.version'?: string;
  'os.features'?: string[];
  variant?: string;
  features?: string[];
}

export const RegistryPlatformSchema = z.object({
  architecture: z.string(),
  os: z.string(),
  'os.version': z.string().optional(),
  'os.features': z.array(z.string()).optional(),
  variant: z.string().optional(),
  features: z.array(z.string()).optional(),
});

/**
 * Result of a registry lookup for an image.
 */
export interface DistributionInspect {
  Descriptor: Descriptor;
  Platforms: RegistryPlatform[];
}

export const DistributionInspectSchema = z.object({
  Descriptor: DescriptorSchema,
  Platforms: z
    .array(RegistryPlatformSchema)
    .nullish()
    .transform((v) => v ?? []),
});
