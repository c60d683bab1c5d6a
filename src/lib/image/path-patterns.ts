/**
 * Path heuristics for string values
 *
 * Two ordered pattern sets evaluated against the formatted path
 * (`a.b.containers[0].image`). Non-image patterns are checked first and win
 * over any image pattern.
 */

import { formatPath, type ValuePath } from '@/types/values';

export type PathClassification = 'image' | 'non-image' | 'unknown';

export const IMAGE_PATH_PATTERNS: readonly RegExp[] = [
  /(?:^|\.)image$/, // key is exactly 'image'
  /(?:^|\.)[A-Za-z0-9_-]*[a-z0-9]Image$/, // camelCase keys: workerImage, sidecarImage
  /(?:^|\.)[A-Za-z0-9_-]*[_-]image$/, // snake/kebab keys: init_image, proxy-image
  /(?:^|\.)images\[\d+\]$/, // elements of an 'images' list
  /(?:^|\.)(?:containers|initContainers|ephemeralContainers)\[\d+\]\.image$/,
];

export const NON_IMAGE_PATH_PATTERNS: readonly RegExp[] = [
  /(?:^|\.)enabled$/,
  /(?:^|\.)[A-Za-z]*(?:annotations|Annotations)\./, // annotations, podAnnotations
  /(?:^|\.)[A-Za-z]*(?:labels|Labels)\./,
  /(?:^|\.)(?:port|containerPort|targetPort|hostPort)$/,
  /(?:^|\.)ports(?:\.|\[)/,
  /(?:^|\.)timeout$/,
  /(?:^|\.)serviceAccountName$/,
  /(?:^|\.)replicas$/,
  /(?:^|\.)resources\./,
  /(?:^|\.)env(?:\.|\[)/,
  /(?:^|\.)(?:command|args)\[\d+\]$/,
  /\[\d+\]\.name$/, // container and list item names
  /(?:^|\.)(?:tag|registry|repository|digest)$/, // parts of an image map
  /(?:^|\.)(?:pullPolicy|imagePullPolicy)$/,
  /(?:^|\.)(?:pullSecrets|imagePullSecrets)(?:\.|\[)/,
];

/**
 * Classify a path as image-bearing, non-image or unknown.
 */
export function classifyPath(path: ValuePath): PathClassification {
  const formatted = formatPath(path);

  if (NON_IMAGE_PATH_PATTERNS.some((pattern) => pattern.test(formatted))) {
    return 'non-image';
  }
  if (IMAGE_PATH_PATTERNS.some((pattern) => pattern.test(formatted))) {
    return 'image';
  }
  return 'unknown';
}

export function isKnownImagePath(path: ValuePath): boolean {
  return classifyPath(path) === 'image';
}

export function isNonImagePath(path: ValuePath): boolean {
  return classifyPath(path) === 'non-image';
}
