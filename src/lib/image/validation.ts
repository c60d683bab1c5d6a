/**
 * Syntax validators for image reference components
 *
 * Pure predicates with no mode flags: the parser's lenient grammar and the
 * detector's map extraction call the same functions and get the same answer.
 */

const HOST_LABEL = /^[A-Za-z0-9-]+$/;
const PORT = /^\d+$/;
const REPOSITORY_COMPONENT = /^[a-z0-9]+(?:[._-][a-z0-9]+)*$/;
const TAG = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const DIGEST = /^sha256:[0-9a-fA-F]{64}$/;

export const MAX_REPOSITORY_LENGTH = 255;
export const MAX_REPOSITORY_COMPONENTS = 5;
export const MAX_TAG_LENGTH = 128;

function isHostname(host: string): boolean {
  if (host === 'localhost') return true;
  const labels = host.split('.');
  return labels.every((label) => HOST_LABEL.test(label));
}

/**
 * Registry names: `localhost`, `host:port`, or a domain of 2-3 labels.
 */
export function validRegistryName(name: string): boolean {
  if (name === 'localhost') {
    return true;
  }

  const colon = name.lastIndexOf(':');
  if (colon !== -1) {
    const host = name.slice(0, colon);
    const port = name.slice(colon + 1);
    return host.length > 0 && PORT.test(port) && isHostname(host);
  }

  const labels = name.split('.');
  return labels.length >= 2 && labels.length <= 3 && labels.every((label) => HOST_LABEL.test(label));
}

/**
 * Repository names: lowercase, 1-5 components of `[a-z0-9]+([._-][a-z0-9]+)*`,
 * which also rules out `..` and `--`.
 */
export function validRepositoryName(name: string): boolean {
  if (name.length === 0 || name.length > MAX_REPOSITORY_LENGTH) {
    return false;
  }
  if (name !== name.toLowerCase()) {
    return false;
  }

  const components = name.split('/');
  if (components.length > MAX_REPOSITORY_COMPONENTS) {
    return false;
  }
  return components.every((component) => REPOSITORY_COMPONENT.test(component));
}

/**
 * Tags: up to 128 of `[A-Za-z0-9_.-]`, not starting with `.` or `-`.
 */
export function validTag(tag: string): boolean {
  return tag.length > 0 && tag.length <= MAX_TAG_LENGTH && TAG.test(tag);
}

export function validDigest(digest: string): boolean {
  return DIGEST.test(digest);
}
