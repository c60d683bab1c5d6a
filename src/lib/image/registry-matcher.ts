/**
 * Registry scope matching
 */

import { normalizeRegistry } from './normalizer';
import type { Reference } from './reference';

/**
 * True when the reference's registry equals a source entry and no exclude
 * entry. All names are normalized first; comparison is exact, never prefix.
 */
export function isSourceRegistry(
  ref: Pick<Reference, 'registry'> | null | undefined,
  sources: readonly string[],
  excludes: readonly string[],
): boolean {
  if (!ref) {
    return false;
  }

  const registry = normalizeRegistry(ref.registry);

  if (excludes.some((exclude) => normalizeRegistry(exclude) === registry)) {
    return false;
  }
  return sources.some((source) => normalizeRegistry(source) === registry);
}

/**
 * Scope rule used during detection: an empty source list admits every
 * registry that is not excluded.
 */
export function isInScope(
  ref: Pick<Reference, 'registry'>,
  sources: readonly string[],
  excludes: readonly string[],
): boolean {
  if (sources.length === 0) {
    const registry = normalizeRegistry(ref.registry);
    return !excludes.some((exclude) => normalizeRegistry(exclude) === registry);
  }
  return isSourceRegistry(ref, sources, excludes);
}
