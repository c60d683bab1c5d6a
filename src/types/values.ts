/**
 * Value tree model
 *
 * Decoded configuration documents (Helm values, JSON) are converted into a
 * closed tagged union before detection so traversal dispatches on `kind`
 * instead of inspecting runtime types.
 */

export type ValueNode =
  | { kind: 'map'; entries: ReadonlyMap<string, ValueNode> }
  | { kind: 'sequence'; items: readonly ValueNode[] }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' };

export type ValueKind = ValueNode['kind'];

/** Plain JSON-compatible value, the shape collaborators decode and re-encode */
export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

/** A map key or a sequence index */
export type PathSegment = string | number;

export type ValuePath = readonly PathSegment[];

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a decoded document into a ValueNode tree.
 *
 * `undefined` becomes null and YAML timestamps (Date) become ISO strings.
 * @throws {TypeError} for values a configuration document cannot contain
 */
export function toValueNode(input: unknown, path: ValuePath = []): ValueNode {
  if (input === null || input === undefined) {
    return { kind: 'null' };
  }
  if (typeof input === 'string') {
    return { kind: 'string', value: input };
  }
  if (typeof input === 'boolean') {
    return { kind: 'boolean', value: input };
  }
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new TypeError(`Unsupported non-finite number at "${formatPath(path)}"`);
    }
    return { kind: 'number', value: input };
  }
  if (input instanceof Date) {
    return { kind: 'string', value: input.toISOString() };
  }
  if (Array.isArray(input)) {
    return {
      kind: 'sequence',
      items: input.map((item: unknown, index) => toValueNode(item, [...path, index])),
    };
  }
  if (typeof input === 'object' && isPlainObject(input)) {
    const entries = new Map<string, ValueNode>();
    for (const [key, value] of Object.entries(input)) {
      entries.set(key, toValueNode(value, [...path, key]));
    }
    return { kind: 'map', entries };
  }
  throw new TypeError(`Unsupported ${typeof input} value at "${formatPath(path)}"`);
}

/**
 * Convert a ValueNode tree back into plain data.
 */
export function toPlainValue(node: ValueNode): PlainValue {
  switch (node.kind) {
    case 'map': {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, value] of node.entries) {
        out[key] = toPlainValue(value);
      }
      return out;
    }
    case 'sequence':
      return node.items.map(toPlainValue);
    case 'string':
    case 'number':
    case 'boolean':
      return node.value;
    case 'null':
      return null;
  }
}

/**
 * Render a path as `a.b.images[0].image`.
 */
export function formatPath(path: ValuePath): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

/**
 * Look up the node at `path`, or undefined when any step is missing.
 */
export function getValueAtPath(node: ValueNode, path: ValuePath): ValueNode | undefined {
  let current: ValueNode | undefined = node;
  for (const segment of path) {
    if (current === undefined) return undefined;
    if (typeof segment === 'number') {
      current = current.kind === 'sequence' ? current.items[segment] : undefined;
    } else {
      current = current.kind === 'map' ? current.entries.get(segment) : undefined;
    }
  }
  return current;
}

/** Read a string-valued entry, or undefined for any other kind */
export function getStringEntry(
  entries: ReadonlyMap<string, ValueNode>,
  key: string,
): string | undefined {
  const node = entries.get(key);
  return node?.kind === 'string' ? node.value : undefined;
}
