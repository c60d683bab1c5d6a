/**
 * Image reference error taxonomy
 *
 * Every failure the parser or detector raises carries a stable code. Callers
 * match on the code with `hasErrorCode`, which follows `cause` chains, so an
 * error wrapped with path context still matches the kind it started as.
 */

import { formatPath, type ValuePath } from '@/types/values';

export const IMAGE_ERROR_CODES = [
  // String parsing
  'EMPTY_REFERENCE',
  'INVALID_IMAGE_REFERENCE',
  'INVALID_REPOSITORY_NAME',
  'INVALID_TAG_FORMAT',
  'INVALID_DIGEST_FORMAT',
  'INVALID_REGISTRY_NAME',
  'TAG_AND_DIGEST_PRESENT',
  // Map structure
  'INVALID_IMAGE_MAP_REPO',
  'INVALID_IMAGE_MAP_REGISTRY_TYPE',
  'INVALID_IMAGE_MAP_TAG_TYPE',
  'INVALID_IMAGE_MAP_DIGEST_TYPE',
  // Classification causes
  'AMBIGUOUS_STRING_PATH',
  'NON_SOURCE_REGISTRY',
  'TEMPLATE_VARIABLE_DETECTED',
] as const;

export type ImageErrorCode = (typeof IMAGE_ERROR_CODES)[number];

const DEFAULT_MESSAGES: Record<ImageErrorCode, string> = {
  EMPTY_REFERENCE: 'image reference string cannot be empty',
  INVALID_IMAGE_REFERENCE: 'invalid image reference format',
  INVALID_REPOSITORY_NAME: 'invalid repository name',
  INVALID_TAG_FORMAT: 'invalid tag format',
  INVALID_DIGEST_FORMAT: 'invalid digest format',
  INVALID_REGISTRY_NAME: 'invalid registry name',
  TAG_AND_DIGEST_PRESENT: 'image cannot have both tag and digest specified',
  INVALID_IMAGE_MAP_REPO: 'image map has invalid repository type (must be string)',
  INVALID_IMAGE_MAP_REGISTRY_TYPE: 'image map has invalid registry type (must be string)',
  INVALID_IMAGE_MAP_TAG_TYPE: 'image map has invalid tag type (must be string)',
  INVALID_IMAGE_MAP_DIGEST_TYPE: 'image map has invalid digest type (must be string)',
  AMBIGUOUS_STRING_PATH:
    'string found at path not typically used for images, but resembles an image reference',
  NON_SOURCE_REGISTRY: 'image is not from a configured source registry',
  TEMPLATE_VARIABLE_DETECTED: 'template variable detected in image value',
};

/**
 * Error raised for a single reference or image-map failure.
 */
export class ImageReferenceError extends Error {
  readonly code: ImageErrorCode;

  constructor(code: ImageErrorCode, detail?: string, options?: { cause?: unknown }) {
    const base = DEFAULT_MESSAGES[code];
    super(detail ? `${base}: ${detail}` : base, options);
    this.name = 'ImageReferenceError';
    this.code = code;
  }
}

/**
 * Fatal traversal error: an image-shaped map at `path` is malformed.
 */
export class DetectionError extends Error {
  readonly path: ValuePath;

  constructor(path: ValuePath, cause: ImageReferenceError) {
    super(`error processing path "${formatPath(path)}": ${cause.message}`, { cause });
    this.name = 'DetectionError';
    this.path = path;
  }
}

/**
 * Walk the cause chain and return the first ImageReferenceError, if any.
 */
export function findImageError(error: unknown): ImageReferenceError | undefined {
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ImageReferenceError) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

/**
 * True when `error`, or anything in its cause chain, carries `code`.
 */
export function hasErrorCode(error: unknown, code: ImageErrorCode): boolean {
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ImageReferenceError && current.code === code) {
      return true;
    }
    seen.add(current);
    current = current.cause;
  }
  return false;
}
