/**
 * Core type definitions shared by the service and CLI layers.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** What went wrong, in operator terms */
  hint?: string;
  /** Steps that fix the problem */
  resolution?: string;
  /** Additional context (paths, error codes, offending values) */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling at the service boundary.
 *
 * The detection engine itself throws typed errors; everything that talks to
 * the filesystem, the configuration layer or the terminal returns a Result.
 *
 * @example
 * ```typescript
 * const result = await loadValuesFile('values.yaml');
 * if (result.ok) {
 *   inspect(result.value);
 * } else {
 *   console.error(result.error);
 *   if (result.guidance?.resolution) console.error(result.guidance.resolution);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance for operators
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  // Copy so the caller's guidance object is never mutated
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};
