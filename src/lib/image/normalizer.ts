/**
 * Reference normalization
 *
 * Canonical form: explicit registry (lowercase, no port, `docker.io` for the
 * public registry), explicit tag or digest, and `library/` for official
 * single-component images on the default registry.
 */

import {
  DEFAULT_REGISTRY,
  DEFAULT_TAG,
  LIBRARY_NAMESPACE,
  formatReference,
  type Reference,
} from './reference';

const NUMERIC_PORT = /^\d+$/;

const DEFAULT_REGISTRY_ALIASES = new Set([DEFAULT_REGISTRY, `index.${DEFAULT_REGISTRY}`]);

/**
 * Standardize a registry name for storage and comparison.
 *
 * @example
 * normalizeRegistry('Index.Docker.IO')     // 'docker.io'
 * normalizeRegistry('registry:5000')       // 'registry'
 * normalizeRegistry('quay.io/prometheus/') // 'quay.io'
 * normalizeRegistry('')                    // 'docker.io'
 */
export function normalizeRegistry(registry: string): string {
  let host = registry.trim().toLowerCase();
  if (host === '') {
    return DEFAULT_REGISTRY;
  }

  const slash = host.indexOf('/');
  if (slash !== -1) {
    host = host.slice(0, slash);
  }

  const colon = host.lastIndexOf(':');
  if (colon !== -1 && NUMERIC_PORT.test(host.slice(colon + 1))) {
    host = host.slice(0, colon);
  }

  if (DEFAULT_REGISTRY_ALIASES.has(host)) {
    return DEFAULT_REGISTRY;
  }
  return host;
}

/**
 * Apply default registry, default tag and library namespace in place.
 * Running it again on its own output changes nothing.
 */
export function normalizeReference(ref: Reference): void {
  ref.registry = ref.registry === '' ? DEFAULT_REGISTRY : normalizeRegistry(ref.registry);

  if (ref.tag === '' && ref.digest === '') {
    ref.tag = DEFAULT_TAG;
  }

  if (ref.registry === DEFAULT_REGISTRY && !ref.repository.includes('/')) {
    ref.repository = `${LIBRARY_NAMESPACE}/${ref.repository}`;
  }

  if (ref.original === '') {
    ref.original = formatReference(ref);
  }
}
