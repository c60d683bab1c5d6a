/**
 * Image reference parser
 *
 * Handles formats like:
 * - nginx                          -> docker.io/library/nginx:latest
 * - nginx:1.25                     -> docker.io/library/nginx:1.25
 * - bitnami/redis:7.2              -> docker.io/bitnami/redis:7.2
 * - quay.io/prometheus/node-exporter:v1.8.0
 * - registry.example.com:5000/team/app:v1 (port stripped on normalization)
 * - app@sha256:<64 hex>
 *
 * Two grammars run the same decomposition steps. The strict grammar is the
 * distribution reference grammar applied to the raw input; the lenient
 * grammar applies the component validators to the trimmed input and is only
 * consulted when the strict grammar rejects the string and the caller allows
 * it.
 */

import { ImageReferenceError } from './errors';
import { normalizeReference } from './normalizer';
import { createReference, type Reference } from './reference';
import {
  validDigest,
  validRegistryName,
  validRepositoryName,
  validTag,
} from './validation';

// ============================================================================
// Distribution reference grammar
// ============================================================================

const DOMAIN_COMPONENT = '(?:[a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])';
const DOMAIN = `(?:localhost|${DOMAIN_COMPONENT}(?:\\.${DOMAIN_COMPONENT})*)(?::[0-9]+)?`;
const PATH_COMPONENT = '[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*';
const PATH = `${PATH_COMPONENT}(?:/${PATH_COMPONENT})*`;
const TAG = '[\\w][\\w.-]{0,127}';
const DIGEST = 'sha256:[0-9a-fA-F]{64}';

const DOMAIN_PATTERN = new RegExp(`^${DOMAIN}$`);
const PATH_PATTERN = new RegExp(`^${PATH}$`);
const TAG_PATTERN = new RegExp(`^${TAG}$`);

/** Anchored full reference: name, optional tag, optional digest */
export const REFERENCE_PATTERN = new RegExp(
  `^((?:${DOMAIN}/)?${PATH})(?::(${TAG}))?(?:@(${DIGEST}))?$`,
);

// ============================================================================
// Decomposition
// ============================================================================

const DOUBLED_SEPARATORS = ['::', '///', '@@'] as const;
const DISALLOWED_CHARACTERS = /[\s$?#\\]/;
const HAS_LETTER = /[a-z]/i;

interface Grammar {
  readonly name: 'strict' | 'lenient';
  isRegistry(value: string): boolean;
  isRepository(value: string): boolean;
  isTag(value: string): boolean;
  isDigest(value: string): boolean;
}

const STRICT_GRAMMAR: Grammar = {
  name: 'strict',
  isRegistry: (value) => DOMAIN_PATTERN.test(value),
  isRepository: (value) => PATH_PATTERN.test(value) && validRepositoryName(value),
  isTag: (value) => TAG_PATTERN.test(value),
  isDigest: validDigest,
};

const LENIENT_GRAMMAR: Grammar = {
  name: 'lenient',
  isRegistry: validRegistryName,
  isRepository: validRepositoryName,
  isTag: validTag,
  isDigest: validDigest,
};

export function looksLikeRegistry(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/** True when the first `/`-segment of a name is a registry host */
export function hasRegistryPrefix(name: string): boolean {
  const slash = name.indexOf('/');
  return slash !== -1 && looksLikeRegistry(name.slice(0, slash));
}

function decompose(input: string, grammar: Grammar): Reference {
  const at = input.lastIndexOf('@');
  const body = at === -1 ? input : input.slice(0, at);

  const doubled = DOUBLED_SEPARATORS.find((separator) => input.includes(separator));
  if (doubled) {
    throw new ImageReferenceError('INVALID_IMAGE_REFERENCE', `doubled separator "${doubled}" in "${input}"`);
  }
  if (DISALLOWED_CHARACTERS.test(body)) {
    throw new ImageReferenceError('INVALID_IMAGE_REFERENCE', `disallowed character in "${input}"`);
  }

  let digest = '';
  if (at !== -1) {
    digest = input.slice(at + 1);
    if (!grammar.isDigest(digest)) {
      throw new ImageReferenceError('INVALID_DIGEST_FORMAT', `"${digest}"`);
    }
  }

  // A colon before the first slash belongs to a host:port prefix
  let name = body;
  let tag = '';
  const firstSlash = body.indexOf('/');
  const lastColon = body.lastIndexOf(':');
  if (lastColon !== -1 && lastColon > firstSlash) {
    tag = body.slice(lastColon + 1);
    name = body.slice(0, lastColon);
    if (!grammar.isTag(tag)) {
      throw new ImageReferenceError('INVALID_TAG_FORMAT', `"${tag}"`);
    }
  }

  if (tag !== '' && digest !== '') {
    throw new ImageReferenceError('TAG_AND_DIGEST_PRESENT', `"${input}"`);
  }

  let registry = '';
  let repository = name;
  const slash = name.indexOf('/');
  if (slash !== -1 && looksLikeRegistry(name.slice(0, slash))) {
    registry = name.slice(0, slash);
    repository = name.slice(slash + 1);
    if (!grammar.isRegistry(registry)) {
      throw new ImageReferenceError('INVALID_REGISTRY_NAME', `"${registry}"`);
    }
  }

  if (!grammar.isRepository(repository)) {
    throw new ImageReferenceError('INVALID_REPOSITORY_NAME', `"${repository}"`);
  }

  return createReference({
    registry,
    repository,
    tag,
    digest,
    detected: grammar.name === 'strict',
  });
}

// ============================================================================
// Public API
// ============================================================================

export interface ParseOptions {
  /** Reject instead of retrying with the lenient grammar */
  strict?: boolean;
  /** Registry used when the string names none (e.g. a global override) */
  fallbackRegistry?: string;
}

/**
 * Parse and normalize an image reference string.
 *
 * @throws {ImageReferenceError} with the code of the first failing step
 */
export function parseImageReference(raw: string, options: ParseOptions = {}): Reference {
  if (raw.trim() === '') {
    throw new ImageReferenceError('EMPTY_REFERENCE');
  }

  let ref: Reference;
  try {
    ref = decompose(raw, STRICT_GRAMMAR);
  } catch (strictError) {
    if (options.strict || !(strictError instanceof ImageReferenceError)) {
      throw strictError;
    }
    ref = decompose(raw.trim(), LENIENT_GRAMMAR);
  }

  ref.original = raw;
  if (ref.registry === '' && options.fallbackRegistry) {
    ref.registry = options.fallbackRegistry;
  }
  normalizeReference(ref);
  return ref;
}

/**
 * True when the string on its own is shaped like a tagged or digested
 * reference, e.g. `foo:bar` or `quay.io/org/app@sha256:...`.
 *
 * Numeric-only names (`8080:80`, `10:30`) are not considered image-shaped.
 */
export function looksLikeImageReference(value: string): boolean {
  const match = REFERENCE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, name = '', tag, digest] = match;
  if (tag === undefined && digest === undefined) {
    return false;
  }
  const lastComponent = name.slice(name.lastIndexOf('/') + 1);
  return HAS_LETTER.test(lastComponent);
}
