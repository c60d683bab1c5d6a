/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages and exit behavior
 */

import type { Result } from '@/types/core';

/**
 * Standard error formatting for CLI commands
 */
export function formatError(message: string, error?: unknown): string {
  const prefix = '❌';
  const baseMessage = `${prefix} ${message}`;

  if (!error) {
    return baseMessage;
  }

  if (typeof error === 'string') {
    return `${baseMessage}: ${error}`;
  }

  if (error instanceof Error) {
    return `${baseMessage}: ${error.message}`;
  }

  return `${baseMessage}: ${String(error)}`;
}

/**
 * Lines describing a failed Result: the error, then hint and resolution
 * when the guidance carries them.
 */
export function formatResultError<T>(result: Result<T>, message: string): string[] {
  if (result.ok) {
    return [];
  }
  const lines = [formatError(message, result.error)];
  if (result.guidance?.hint) {
    lines.push(`   Hint: ${result.guidance.hint}`);
  }
  if (result.guidance?.resolution) {
    lines.push(`   Resolution: ${result.guidance.resolution}`);
  }
  return lines;
}
