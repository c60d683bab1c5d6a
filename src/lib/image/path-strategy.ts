/**
 * Target path strategies
 *
 * Compute the repository path an image would occupy in a target registry.
 *
 * - prefix-source-registry: docker.io/library/nginx -> dockerio/library/nginx
 * - flat:                   quay.io/org/app         -> quayio-org-app
 */

import { createErrorGuidance, ERROR_MESSAGES } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';
import { normalizeRegistry } from './normalizer';
import { DEFAULT_REGISTRY, LIBRARY_NAMESPACE, type Reference } from './reference';

export const PATH_STRATEGY_NAMES = ['prefix-source-registry', 'flat'] as const;

export type PathStrategyName = (typeof PATH_STRATEGY_NAMES)[number];

export interface PathStrategy {
  readonly name: PathStrategyName;
  /** Repository path (no registry, no tag) under the target registry */
  generatePath(ref: Pick<Reference, 'registry' | 'repository'>): string;
}

const NUMERIC_PORT = /^\d+$/;

/**
 * Make a registry name usable as a single path component: the public
 * registry becomes `dockerio`, a numeric port is dropped, dots are removed.
 *
 * @example
 * sanitizeRegistryForPath('quay.io')              // 'quayio'
 * sanitizeRegistryForPath('registry.local:5000')  // 'registrylocal'
 * sanitizeRegistryForPath('index.docker.io')      // 'dockerio'
 */
export function sanitizeRegistryForPath(registry: string): string {
  if (registry === '' || registry === DEFAULT_REGISTRY || registry === `index.${DEFAULT_REGISTRY}`) {
    return 'dockerio';
  }

  let host = registry;
  const colon = host.lastIndexOf(':');
  if (colon !== -1 && NUMERIC_PORT.test(host.slice(colon + 1))) {
    host = host.slice(0, colon);
  }
  return host.replace(/\./g, '');
}

export const prefixSourceRegistryStrategy: PathStrategy = {
  name: 'prefix-source-registry',
  generatePath(ref) {
    let repository = ref.repository;
    const redundantPrefix = `${ref.registry}/`;
    if (ref.registry !== '' && repository.startsWith(redundantPrefix)) {
      repository = repository.slice(redundantPrefix.length);
    }
    return `${sanitizeRegistryForPath(ref.registry)}/${repository}`;
  },
};

export const flatStrategy: PathStrategy = {
  name: 'flat',
  generatePath(ref) {
    const onDefaultRegistry = normalizeRegistry(ref.registry) === DEFAULT_REGISTRY;
    const repository =
      onDefaultRegistry && !ref.repository.includes('/')
        ? `${LIBRARY_NAMESPACE}-${ref.repository}`
        : ref.repository.replace(/\//g, '-');
    return `${sanitizeRegistryForPath(ref.registry)}-${repository}`;
  },
};

const STRATEGIES: Record<PathStrategyName, PathStrategy> = {
  'prefix-source-registry': prefixSourceRegistryStrategy,
  flat: flatStrategy,
};

export function isPathStrategyName(name: string): name is PathStrategyName {
  return PATH_STRATEGY_NAMES.some((known) => known === name);
}

export function getPathStrategy(name: string): Result<PathStrategy> {
  if (!isPathStrategyName(name)) {
    const message = ERROR_MESSAGES.UNKNOWN_PATH_STRATEGY(name, PATH_STRATEGY_NAMES);
    return Failure(
      message,
      createErrorGuidance(
        message,
        'Path strategies decide how source repositories are laid out in the target registry',
        `Use one of: ${PATH_STRATEGY_NAMES.join(', ')}`,
        { strategy: name },
      ),
    );
  }
  return Success(STRATEGIES[name]);
}
