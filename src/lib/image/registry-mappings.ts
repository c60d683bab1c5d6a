/**
 * Per-source target registries
 */

import { normalizeRegistry } from './normalizer';

export interface RegistryMapping {
  source: string;
  target: string;
}

/**
 * Target registry for `registry`, from the first mapping whose normalized
 * source equals it. Undefined when no mapping applies.
 *
 * @example
 * findTargetRegistry([{ source: 'index.docker.io', target: 'hub.example.com' }], 'docker.io')
 * // 'hub.example.com'
 */
export function findTargetRegistry(
  mappings: readonly RegistryMapping[],
  registry: string,
): string | undefined {
  const normalized = normalizeRegistry(registry);
  const match = mappings.find((mapping) => normalizeRegistry(mapping.source) === normalized);
  return match?.target.trim();
}
