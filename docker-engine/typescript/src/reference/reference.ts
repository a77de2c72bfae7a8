/**
 * Image reference parsing.
 *
 * Supports formats:
 * - repository[:tag][@digest]
 * - namespace/repository[:tag][@digest]
 * - registry[:port]/namespace/repository[:tag][@digest]
 * - 64-hex image ID, or algorithm:hex digest
 *
 * Familiar names are normalized: `nginx` becomes `docker.io/library/nginx`.
 *
 * @module reference
 */

import { EngineError } from '../errors.js';

// ============================================================================
// Grammar
// ============================================================================

const ALPHA_NUMERIC = '[a-z0-9]+';
const SEPARATOR = '(?:[._]|__|[-]+)';
const NAME_COMPONENT = `${ALPHA_NUMERIC}(?:${SEPARATOR}${ALPHA_NUMERIC})*`;
const DOMAIN_COMPONENT = '(?:[a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])';
const DOMAIN = `${DOMAIN_COMPONENT}(?:\\.${DOMAIN_COMPONENT})*(?::[0-9]+)?`;
const TAG = '[\\w][\\w.-]{0,127}';
const DIGEST = '[A-Za-z][A-Za-z0-9]*(?:[-_+.][A-Za-z][A-Za-z0-9]*)*[:][0-9a-fA-F]{32,}';
const NAME = `(?:${DOMAIN}/)?${NAME_COMPONENT}(?:/${NAME_COMPONENT})*`;

const REFERENCE_REGEXP = new RegExp(`^(${NAME})(?::(${TAG}))?(?:@(${DIGEST}))?$`);
const ANCHORED_NAME_REGEXP = new RegExp(
  `^(?:(${DOMAIN})/)?(${NAME_COMPONENT}(?:/${NAME_COMPONENT})*)$`
);
const ANCHORED_DIGEST_REGEXP = new RegExp(`^${DIGEST}$`);
const ANCHORED_IDENTIFIER_REGEXP = /^[a-f0-9]{64}$/;

/** Maximum length of a repository name, domain included. */
export const NAME_TOTAL_LENGTH_MAX = 255;

export const DEFAULT_DOMAIN = 'docker.io';
const LEGACY_DEFAULT_DOMAIN = 'index.docker.io';
const OFFICIAL_REPO_NAME = 'library';

/**
 * Hex length required for each supported digest algorithm.
 */
const DIGEST_HEX_LENGTHS: Record<string, number> = {
  sha256: 64,
  sha384: 96,
  sha512: 128,
};

// ============================================================================
// Reference Types
// ============================================================================

/**
 * Repository name without tag or digest.
 */
export interface NamedReference {
  kind: 'named';
  domain: string;
  path: string;
}

/**
 * Repository name with a tag.
 */
export interface TaggedReference {
  kind: 'tagged';
  domain: string;
  path: string;
  tag: string;
}

/**
 * Repository name bound to a content digest, optionally still carrying a tag.
 */
export interface CanonicalReference {
  kind: 'canonical';
  domain: string;
  path: string;
  tag?: string;
  digest: string;
}

/**
 * Bare digest with no repository name (e.g. an image ID).
 */
export interface DigestReference {
  kind: 'digest';
  digest: string;
}

/** Any reference carrying a repository name. */
export type NamedImageReference = NamedReference | TaggedReference | CanonicalReference;

export type ImageReference = NamedImageReference | DigestReference;

// ============================================================================
// Digest Validation
// ============================================================================

/**
 * Validates a digest string (algorithm:hex).
 *
 * @throws {EngineError} If the algorithm is unsupported or the hex part has the wrong length
 */
export function validateDigest(digest: string): void {
  const sep = digest.indexOf(':');
  if (sep < 0 || sep + 1 === digest.length) {
    throw EngineError.invalidReference('invalid checksum digest format');
  }

  const algorithm = digest.slice(0, sep);
  const encoded = digest.slice(sep + 1);
  const expected = DIGEST_HEX_LENGTHS[algorithm];
  if (expected === undefined) {
    throw EngineError.invalidReference(`unsupported digest algorithm: ${algorithm}`);
  }
  if (encoded.length !== expected || !/^[a-f0-9]+$/.test(encoded)) {
    throw EngineError.invalidReference('invalid checksum digest length');
  }
}

/**
 * Checks if a digest string is valid.
 */
export function isValidDigest(digest: string): boolean {
  try {
    validateDigest(digest);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parses a fully-qualified reference. Familiar names are not normalized.
 *
 * @throws {EngineError} If the reference is malformed
 */
export function parseReference(input: string): NamedImageReference {
  const matches = REFERENCE_REGEXP.exec(input);
  if (!matches) {
    if (input === '') {
      throw EngineError.invalidReference('repository name must have at least one component');
    }
    if (REFERENCE_REGEXP.test(input.toLowerCase())) {
      throw EngineError.invalidReference('repository name must be lowercase');
    }
    throw EngineError.invalidReference('invalid reference format');
  }

  const name = matches[1];
  if (name.length > NAME_TOTAL_LENGTH_MAX) {
    throw EngineError.invalidReference(
      `repository name must not be more than ${NAME_TOTAL_LENGTH_MAX} characters`
    );
  }

  const nameMatch = ANCHORED_NAME_REGEXP.exec(name);
  if (!nameMatch) {
    throw EngineError.invalidReference('invalid reference format');
  }

  const domain = nameMatch[1] ?? '';
  const path = nameMatch[2];
  const tag = matches[2];
  const digest = matches[3];

  if (digest !== undefined) {
    validateDigest(digest);
    return tag !== undefined
      ? { kind: 'canonical', domain, path, tag, digest }
      : { kind: 'canonical', domain, path, digest };
  }
  if (tag !== undefined) {
    return { kind: 'tagged', domain, path, tag };
  }
  return { kind: 'named', domain, path };
}

/**
 * Splits a familiar name into its registry domain and remainder.
 */
function splitDockerDomain(name: string): { domain: string; remainder: string } {
  const i = name.indexOf('/');
  let domain: string;
  let remainder: string;

  if (i === -1 || (!/[.:]/.test(name.slice(0, i)) && name.slice(0, i) !== 'localhost')) {
    domain = DEFAULT_DOMAIN;
    remainder = name;
  } else {
    domain = name.slice(0, i);
    remainder = name.slice(i + 1);
  }

  if (domain === LEGACY_DEFAULT_DOMAIN) {
    domain = DEFAULT_DOMAIN;
  }
  if (domain === DEFAULT_DOMAIN && !remainder.includes('/')) {
    remainder = `${OFFICIAL_REPO_NAME}/${remainder}`;
  }
  return { domain, remainder };
}

/**
 * Parses a reference as the docker CLI does, normalizing familiar names.
 *
 * @example
 * ```typescript
 * parseNormalizedNamed('nginx:1.25');
 * // { kind: 'tagged', domain: 'docker.io', path: 'library/nginx', tag: '1.25' }
 * ```
 *
 * @throws {EngineError} If the reference is malformed or is a 64-hex identifier
 */
export function parseNormalizedNamed(input: string): NamedImageReference {
  if (ANCHORED_IDENTIFIER_REGEXP.test(input)) {
    throw EngineError.invalidReference(
      `invalid repository name (${input}), cannot specify 64-byte hexadecimal strings`
    );
  }

  const { domain, remainder } = splitDockerDomain(input);
  const tagSep = remainder.indexOf(':');
  const remoteName = tagSep > -1 ? remainder.slice(0, tagSep) : remainder;
  if (remoteName.toLowerCase() !== remoteName) {
    throw EngineError.invalidReference('invalid reference format: repository name must be lowercase');
  }

  return parseReference(`${domain}/${remainder}`);
}

/**
 * Parses any reference: a 64-hex image ID, a bare digest, or a (familiar) name.
 */
export function parseAnyReference(input: string): ImageReference {
  if (ANCHORED_IDENTIFIER_REGEXP.test(input)) {
    return { kind: 'digest', digest: `sha256:${input}` };
  }
  if (isValidDigest(input)) {
    return { kind: 'digest', digest: input };
  }
  return parseNormalizedNamed(input);
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Binds a named reference to a digest, keeping its tag.
 *
 * @throws {EngineError} If the digest does not match the digest grammar
 */
export function withDigest(ref: NamedImageReference, digest: string): CanonicalReference {
  if (!ANCHORED_DIGEST_REGEXP.test(digest)) {
    throw EngineError.invalidReference('invalid digest format');
  }

  const tag = ref.kind === 'named' ? undefined : ref.tag;
  return tag !== undefined
    ? { kind: 'canonical', domain: ref.domain, path: ref.path, tag, digest }
    : { kind: 'canonical', domain: ref.domain, path: ref.path, digest };
}

/**
 * Full repository name (domain/path).
 */
export function referenceName(ref: NamedImageReference): string {
  return ref.domain === '' ? ref.path : `${ref.domain}/${ref.path}`;
}

/**
 * Formats a reference back into its string form.
 */
export function formatReference(ref: ImageReference): string {
  switch (ref.kind) {
    case 'digest':
      return ref.digest;
    case 'named':
      return referenceName(ref);
    case 'tagged':
      return `${referenceName(ref)}:${ref.tag}`;
    case 'canonical':
      return ref.tag !== undefined
        ? `${referenceName(ref)}:${ref.tag}@${ref.digest}`
        : `${referenceName(ref)}@${ref.digest}`;
  }
}

/**
 * Shortened name as shown by the docker CLI (`docker.io/library/nginx` → `nginx`).
 */
export function familiarName(ref: NamedImageReference): string {
  if (ref.domain !== DEFAULT_DOMAIN) {
    return referenceName(ref);
  }
  const prefix = `${OFFICIAL_REPO_NAME}/`;
  if (ref.path.startsWith(prefix) && !ref.path.slice(prefix.length).includes('/')) {
    return ref.path.slice(prefix.length);
  }
  return ref.path;
}
