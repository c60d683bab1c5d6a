/**
 * Error handling utilities and message templates
 *
 * Message templates and guidance builders shared by the service and CLI
 * layers. The detection engine raises typed errors (see `lib/image/errors`);
 * this module turns them into operator-facing text.
 */

import type { ErrorGuidance } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

export const ERROR_MESSAGES = {
  // Input
  FILE_READ_FAILED: (path: string, error: string) => `Failed to read ${path}: ${error}`,
  YAML_PARSE_FAILED: (path: string, error: string) => `Failed to parse YAML in ${path}: ${error}`,
  UNSUPPORTED_VALUE: (error: string) => `Unsupported value in document: ${error}`,

  // Configuration
  CONFIG_INVALID: (issues: string) => `Invalid configuration: ${issues}`,
  UNKNOWN_PATH_STRATEGY: (name: string, known: readonly string[]) =>
    `Unknown path strategy: ${name} (expected one of ${known.join(', ')})`,

  // Detection
  DETECTION_FAILED: (path: string, error: string) =>
    `Image detection failed at "${path}": ${error}`,

  // Generic templates
  OPERATION_FAILED: (operation: string, error: string) => `${operation} failed: ${error}`,
} as const;

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create error guidance with context
 */
export function createErrorGuidance(
  message: string,
  hint?: string,
  resolution?: string,
  details?: Record<string, unknown>,
): ErrorGuidance {
  const guidance: ErrorGuidance = { message };
  if (hint !== undefined) guidance.hint = hint;
  if (resolution !== undefined) guidance.resolution = resolution;
  if (details !== undefined) guidance.details = details;
  return guidance;
}
