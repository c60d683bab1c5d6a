/**
 * Container image reference model
 */

import type { PlainValue, ValuePath } from '@/types/values';

export const DEFAULT_REGISTRY = 'docker.io';
export const DEFAULT_TAG = 'latest';
export const LIBRARY_NAMESPACE = 'library';

/**
 * A parsed image reference.
 *
 * Built once by the parser, normalized once, then treated as read-only by
 * whichever detection record owns it. `tag` and `digest` are empty strings
 * when absent and never both set.
 */
export interface Reference {
  /** Registry host; may carry `host:port` before normalization */
  registry: string;
  /** Slash-separated repository path, e.g. `library/nginx` */
  repository: string;
  tag: string;
  /** `sha256:<64 hex>` */
  digest: string;
  /** Untouched source string */
  original: string;
  /** True when the strict grammar produced this reference */
  detected: boolean;
  /** Location in the source tree */
  path: ValuePath;
}

export type DetectionPattern = 'map' | 'string' | 'global';

export interface DetectedImage {
  reference: Reference;
  path: ValuePath;
  pattern: DetectionPattern;
  /** Raw value at `path`, kept for round-tripping */
  original: PlainValue;
  /** Value contains template markers and was only partially inferred */
  templated: boolean;
}

export type UnsupportedClassification =
  | 'malformed-map'
  | 'malformed-string'
  | 'ambiguous-path'
  | 'non-source-registry';

export interface UnsupportedImage {
  path: ValuePath;
  classification: UnsupportedClassification;
  cause: Error;
}

/**
 * Detection configuration supplied by the caller.
 */
export interface DetectionContext {
  sourceRegistries: readonly string[];
  excludeRegistries: readonly string[];
  /** Registry applied to references that specify none */
  globalRegistry?: string;
  /** Surface ambiguous candidates instead of dropping them */
  strict: boolean;
  /** Round-trip values containing template markers */
  templateMode: boolean;
}

export function createReference(fields: Partial<Reference> = {}): Reference {
  return {
    registry: '',
    repository: '',
    tag: '',
    digest: '',
    original: '',
    detected: false,
    path: [],
    ...fields,
  };
}

/**
 * Render `registry/repository:tag` or `registry/repository@digest`.
 * The registry prefix is omitted when empty, the suffix when neither is set.
 */
export function formatReference(ref: Pick<Reference, 'registry' | 'repository' | 'tag' | 'digest'>): string {
  const name = ref.registry ? `${ref.registry}/${ref.repository}` : ref.repository;
  if (ref.digest) {
    return `${name}@${ref.digest}`;
  }
  return ref.tag ? `${name}:${ref.tag}` : name;
}
