/**
 * Environment Variable Parsing Utilities
 *
 * Standardized utilities for parsing environment variables with type safety
 * and consistent default handling.
 */

/**
 * True when the variable is set to a non-empty value
 */
export function hasEnv(key: string): boolean {
  const value = process.env[key];
  return value !== undefined && value !== '';
}

/**
 * Parse string from environment variable with default
 *
 * @example
 * parseStringEnv('LOG_LEVEL', 'info') // Returns 'info' if LOG_LEVEL not set
 */
export function parseStringEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined ? defaultValue : value;
}

/**
 * Parse boolean from environment variable with default
 *
 * Recognizes common boolean string representations:
 * - true: 'true', '1', 'yes'
 * - false: 'false', '0', 'no'
 *
 * @example
 * parseBoolEnv('IMAGE_STRICT', false) // Returns true for IMAGE_STRICT=yes
 */
export function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const lower = value.toLowerCase();
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  return defaultValue;
}

/**
 * Parse comma-separated list from environment variable
 *
 * Trims whitespace from each item and filters out empty strings.
 *
 * @example
 * parseListEnv('IMAGE_SOURCE_REGISTRIES') // ['docker.io', 'quay.io'] for 'docker.io, quay.io'
 */
export function parseListEnv(key: string, delimiter = ','): string[] {
  const value = process.env[key];
  if (!value) return [];
  return value
    .split(delimiter)
    .map((s) => s.trim())
    .filter(Boolean);
}
