/**
 * Structural image detector
 *
 * Walks a ValueNode tree depth-first and collects image references expressed
 * either as a single string (`image: nginx:1.25`) or as a map
 * (`{ registry, repository, tag, digest }`). Candidates that cannot be
 * accepted are reported as unsupported in strict mode and dropped otherwise.
 *
 * Malformed image maps (a `repository` that is a number, a `tag` that is a
 * list, ...) abort the traversal with a DetectionError.
 */

import { createLogger, type Logger } from '@/lib/logger';
import {
  formatPath,
  getStringEntry,
  toPlainValue,
  type ValueNode,
  type ValuePath,
} from '@/types/values';
import { DetectionError, ImageReferenceError, type ImageErrorCode } from './errors';
import { normalizeRegistry } from './normalizer';
import { hasRegistryPrefix, looksLikeImageReference, looksLikeRegistry, parseImageReference } from './parser';
import { classifyPath } from './path-patterns';
import {
  createReference,
  formatReference,
  type DetectedImage,
  type DetectionContext,
  type DetectionPattern,
  type Reference,
  type UnsupportedClassification,
  type UnsupportedImage,
} from './reference';
import { isInScope } from './registry-matcher';
import { validDigest, validTag } from './validation';

export interface DetectionResult {
  detected: DetectedImage[];
  unsupported: UnsupportedImage[];
  /** Global registry in effect for this traversal, from the caller or `global.*registry*` */
  globalRegistry?: string;
}

export interface DetectOptions {
  logger?: Logger;
}

type MapNode = Extract<ValueNode, { kind: 'map' }>;

interface TraversalState {
  readonly context: DetectionContext;
  readonly log: Logger;
  readonly detected: DetectedImage[];
  readonly unsupported: UnsupportedImage[];
  globalRegistry: string | undefined;
}

interface ImageMapFields {
  registry: string;
  repository: string;
  tag: string;
  digest: string;
}

const GLOBAL_KEY = 'global';
const IMAGE_KEY = 'image';

// ===== TEMPLATES =====

export function containsTemplate(value: string): boolean {
  return value.includes('{{') && value.includes('}}');
}

/**
 * Infer what can be known about a templated reference from the text before
 * the first `{{`.
 *
 * @example
 * inferTemplatedReference('quay.io/org/app:{{ .Values.tag }}')
 * // { registry: 'quay.io', repository: 'org/app', complete: true }
 * inferTemplatedReference('quay.io/{{ .Values.repo }}:v1')
 * // { registry: 'quay.io', repository: '', complete: false }
 * inferTemplatedReference('localhost:{{ .Values.port }}/app:1')
 * // { registry: 'localhost', repository: '', complete: false }
 */
export function inferTemplatedReference(value: string): {
  registry: string;
  repository: string;
  complete: boolean;
} {
  const open = value.indexOf('{{');
  const prefix = open === -1 ? value : value.slice(0, open);

  // Template inside the host or port, e.g. `localhost:{{ .Values.port }}/app`
  if (open !== -1 && !prefix.includes('/') && value.includes('/', open)) {
    const colon = prefix.indexOf(':');
    const host = colon === -1 ? '' : prefix.slice(0, colon);
    return looksLikeRegistry(host)
      ? { registry: normalizeRegistry(host), repository: '', complete: false }
      : { registry: '', repository: '', complete: false };
  }

  const lastSlash = prefix.lastIndexOf('/');
  const tail = prefix.slice(lastSlash + 1);
  const at = tail.indexOf('@');
  const cut = at !== -1 ? at : tail.indexOf(':');

  if (cut !== -1) {
    const name = prefix.slice(0, lastSlash + 1 + cut);
    if (hasRegistryPrefix(name)) {
      const slash = name.indexOf('/');
      return {
        registry: normalizeRegistry(name.slice(0, slash)),
        repository: name.slice(slash + 1),
        complete: true,
      };
    }
    return { registry: '', repository: name, complete: name !== '' };
  }

  const firstSlash = prefix.indexOf('/');
  if (firstSlash !== -1 && looksLikeRegistry(prefix.slice(0, firstSlash))) {
    return { registry: normalizeRegistry(prefix.slice(0, firstSlash)), repository: '', complete: false };
  }
  return { registry: '', repository: '', complete: false };
}

// ===== RECORDING =====

function record(
  state: TraversalState,
  path: ValuePath,
  classification: UnsupportedClassification,
  cause: Error,
): void {
  state.log.debug({ path: formatPath(path), classification, reason: cause.message }, 'Unsupported image');
  state.unsupported.push({ path, classification, cause });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Shared out-of-scope rule: strict mode records it, lenient mode drops it.
 * Returns true when the reference may be emitted.
 */
function checkScope(state: TraversalState, path: ValuePath, ref: Pick<Reference, 'registry'>): boolean {
  const { sourceRegistries, excludeRegistries, strict } = state.context;
  if (isInScope(ref, sourceRegistries, excludeRegistries)) {
    return true;
  }
  if (strict) {
    record(state, path, 'non-source-registry', new ImageReferenceError('NON_SOURCE_REGISTRY', `"${ref.registry}"`));
  } else {
    state.log.debug({ path: formatPath(path), registry: ref.registry }, 'Skipping image outside source registries');
  }
  return false;
}

function emitTemplated(
  state: TraversalState,
  path: ValuePath,
  raw: string,
  original: DetectedImage['original'],
  basePattern: DetectionPattern,
): void {
  const inferred = inferTemplatedReference(raw);
  let { registry } = inferred;
  let pattern = basePattern;

  if (registry === '' && inferred.complete && state.globalRegistry) {
    registry = normalizeRegistry(state.globalRegistry);
    if (basePattern === 'map') {
      pattern = 'global';
    }
  }

  if (registry !== '' && !checkScope(state, path, { registry })) {
    return;
  }

  state.log.debug({ path: formatPath(path), value: raw }, 'Templated image detected');
  state.detected.push({
    reference: createReference({
      registry,
      repository: inferred.repository,
      original: raw,
      path,
    }),
    path,
    pattern,
    original,
    templated: true,
  });
}

// ===== STRINGS =====

function isStructurallyValid(ref: Reference): boolean {
  return ref.registry !== '' && ref.repository !== '' && (ref.tag === '') !== (ref.digest === '');
}

function visitString(state: TraversalState, value: string, path: ValuePath): void {
  const { strict, templateMode } = state.context;
  const classification = classifyPath(path);

  if (classification === 'non-image') {
    return;
  }
  const knownPath = classification === 'image';

  if (containsTemplate(value)) {
    if (!knownPath) {
      return;
    }
    if (templateMode) {
      emitTemplated(state, path, value, value, 'string');
    } else if (strict) {
      record(state, path, 'malformed-string', new ImageReferenceError('TEMPLATE_VARIABLE_DETECTED', `"${value}"`));
    }
    return;
  }

  if (!knownPath && !looksLikeImageReference(value)) {
    return;
  }

  let ref: Reference;
  try {
    ref = parseImageReference(value, { strict, fallbackRegistry: state.globalRegistry });
    if (!isStructurallyValid(ref)) {
      throw new ImageReferenceError('INVALID_IMAGE_REFERENCE', `incomplete reference "${value}"`);
    }
  } catch (error) {
    if (!strict) {
      state.log.debug({ path: formatPath(path), value }, 'Skipping unparseable string');
      return;
    }
    const cause = toError(error);
    record(
      state,
      path,
      'malformed-string',
      knownPath ? cause : new ImageReferenceError('AMBIGUOUS_STRING_PATH', `"${value}"`, { cause }),
    );
    return;
  }

  ref.path = path;

  if (!checkScope(state, path, ref)) {
    return;
  }
  if (strict && !knownPath) {
    record(state, path, 'ambiguous-path', new ImageReferenceError('AMBIGUOUS_STRING_PATH', `"${value}"`));
    return;
  }

  state.log.debug({ path: formatPath(path), image: formatReference(ref) }, 'Image string detected');
  state.detected.push({ reference: ref, path, pattern: 'string', original: value, templated: false });
}

// ===== MAPS =====

function isSourceControlUrl(repository: string): boolean {
  const lower = repository.toLowerCase();
  return (
    lower.startsWith('http') ||
    lower.startsWith('git@') ||
    lower.endsWith('.git') ||
    lower.includes('github.com')
  );
}

function readOptionalString(entries: MapNode['entries'], key: string, code: ImageErrorCode): string {
  const node = entries.get(key);
  if (node === undefined) {
    return '';
  }
  switch (node.kind) {
    case 'string':
      return node.value;
    case 'null':
      return '';
    default:
      throw new ImageReferenceError(code, `got ${node.kind}`);
  }
}

/**
 * Try to read `node` as an image map.
 *
 * Returns true when the node was handled as one (detected, recorded, or
 * dropped as templated) and must not be descended into.
 * @throws {ImageReferenceError} for malformed image maps
 */
function extractImageMap(state: TraversalState, node: MapNode, path: ValuePath): boolean {
  const { strict, templateMode } = state.context;
  const repositoryNode = node.entries.get('repository');
  if (repositoryNode === undefined) {
    return false;
  }
  if (repositoryNode.kind === 'number' || repositoryNode.kind === 'boolean') {
    throw new ImageReferenceError('INVALID_IMAGE_MAP_REPO', `got ${repositoryNode.kind}`);
  }
  if (repositoryNode.kind !== 'string') {
    return false;
  }

  const repository = repositoryNode.value;
  if (isSourceControlUrl(repository)) {
    return false;
  }
  if (repository.trim() === '') {
    if (strict) {
      record(state, path, 'malformed-map', new ImageReferenceError('EMPTY_REFERENCE', 'image map repository is empty'));
    }
    return false;
  }

  const fields: ImageMapFields = {
    registry: readOptionalString(node.entries, 'registry', 'INVALID_IMAGE_MAP_REGISTRY_TYPE'),
    repository,
    tag: readOptionalString(node.entries, 'tag', 'INVALID_IMAGE_MAP_TAG_TYPE'),
    digest: readOptionalString(node.entries, 'digest', 'INVALID_IMAGE_MAP_DIGEST_TYPE'),
  };

  if (Object.values(fields).some(containsTemplate)) {
    const raw = formatReference(fields);
    if (templateMode) {
      emitTemplated(state, path, raw, toPlainValue(node), 'map');
    } else if (strict) {
      record(state, path, 'malformed-map', new ImageReferenceError('TEMPLATE_VARIABLE_DETECTED', `"${raw}"`));
    }
    return true;
  }

  if (fields.tag && !validTag(fields.tag)) {
    throw new ImageReferenceError('INVALID_TAG_FORMAT', `"${fields.tag}"`);
  }
  if (fields.digest && !validDigest(fields.digest)) {
    throw new ImageReferenceError('INVALID_DIGEST_FORMAT', `"${fields.digest}"`);
  }
  if (fields.tag && fields.digest) {
    throw new ImageReferenceError('TAG_AND_DIGEST_PRESENT', `tag "${fields.tag}", digest "${fields.digest}"`);
  }

  const candidate = formatReference(fields);
  const ref = parseImageReference(candidate, { strict, fallbackRegistry: state.globalRegistry });
  ref.path = path;

  const fromGlobal = fields.registry === '' && !hasRegistryPrefix(repository) && Boolean(state.globalRegistry);

  if (!checkScope(state, path, ref)) {
    return true;
  }

  state.log.debug({ path: formatPath(path), image: formatReference(ref) }, 'Image map detected');
  state.detected.push({
    reference: ref,
    path,
    pattern: fromGlobal ? 'global' : 'map',
    original: toPlainValue(node),
    templated: false,
  });
  return true;
}

function imageKeyParses(state: TraversalState, node: MapNode): boolean {
  const image = getStringEntry(node.entries, IMAGE_KEY);
  if (image === undefined) {
    return false;
  }
  if (containsTemplate(image)) {
    return state.context.templateMode;
  }
  try {
    parseImageReference(image, { strict: state.context.strict });
    return true;
  } catch {
    return false;
  }
}

function seedGlobalRegistry(state: TraversalState, root: MapNode): void {
  const global = root.entries.get(GLOBAL_KEY);
  if (global?.kind !== 'map' || state.globalRegistry) {
    return;
  }
  for (const [key, value] of global.entries) {
    if (key.toLowerCase().includes('registry') && value.kind === 'string' && value.value.trim() !== '') {
      state.globalRegistry = value.value.trim();
      state.log.debug({ key: `${GLOBAL_KEY}.${key}`, registry: state.globalRegistry }, 'Global registry found');
      return;
    }
  }
}

function visitMap(state: TraversalState, node: MapNode, path: ValuePath): void {
  const isRoot = path.length === 0;
  if (isRoot) {
    seedGlobalRegistry(state, node);
  }

  if (!imageKeyParses(state, node)) {
    let handled: boolean;
    try {
      handled = extractImageMap(state, node, path);
    } catch (error) {
      if (error instanceof ImageReferenceError) {
        throw new DetectionError(path, error);
      }
      throw error;
    }
    if (handled) {
      return;
    }
  }

  for (const [key, child] of node.entries) {
    if (isRoot && key === GLOBAL_KEY && child.kind === 'map') {
      continue;
    }
    visit(state, child, [...path, key]);
  }
}

function visit(state: TraversalState, node: ValueNode, path: ValuePath): void {
  switch (node.kind) {
    case 'map':
      visitMap(state, node, path);
      return;
    case 'sequence':
      node.items.forEach((item, index) => visit(state, item, [...path, index]));
      return;
    case 'string':
      visitString(state, node.value, path);
      return;
    default:
      return;
  }
}

// ===== PUBLIC API =====

/**
 * Detect image references in a value tree.
 *
 * Results are in pre-order traversal order. The context is copied; the
 * caller's object is never modified.
 *
 * @throws {DetectionError} when an image map is malformed
 */
export function detectImages(
  tree: ValueNode,
  context: DetectionContext,
  options: DetectOptions = {},
): DetectionResult {
  const state: TraversalState = {
    context: { ...context },
    log: options.logger ?? createLogger().child({ module: 'image-detector' }),
    detected: [],
    unsupported: [],
    globalRegistry: context.globalRegistry || undefined,
  };

  visit(state, tree, []);

  state.log.debug(
    { detected: state.detected.length, unsupported: state.unsupported.length },
    'Image detection finished',
  );

  const result: DetectionResult = { detected: state.detected, unsupported: state.unsupported };
  if (state.globalRegistry) {
    result.globalRegistry = state.globalRegistry;
  }
  return result;
}
