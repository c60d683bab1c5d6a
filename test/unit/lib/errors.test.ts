/**
 * Tests for error handling utilities
 */

import { extractErrorMessage, createErrorGuidance, ERROR_MESSAGES } from '@/lib/errors';

describe('errors', () => {
  describe('extractErrorMessage', () => {
    it('should extract message from Error object', () => {
      const error = new Error('Test error message');
      expect(extractErrorMessage(error)).toBe('Test error message');
    });

    it('should extract message from custom Error subclass', () => {
      class CustomError extends Error {
        constructor(message: string) {
          super(message);
          this.name = 'CustomError';
        }
      }
      const error = new CustomError('Custom error');
      expect(extractErrorMessage(error)).toBe('Custom error');
    });

    it('should handle string errors', () => {
      expect(extractErrorMessage('String error')).toBe('String error');
    });

    it('should handle number values', () => {
      expect(extractErrorMessage(404)).toBe('404');
    });

    it('should handle boolean values', () => {
      expect(extractErrorMessage(false)).toBe('false');
    });

    it('should handle null', () => {
      expect(extractErrorMessage(null)).toBe('null');
    });

    it('should handle undefined', () => {
      expect(extractErrorMessage(undefined)).toBe('undefined');
    });

    it('should handle objects by converting to string', () => {
      const obj = { code: 'ERROR', message: 'Something went wrong' };
      const result = extractErrorMessage(obj);
      expect(result).toContain('object');
    });

    it('should handle arrays', () => {
      const arr = ['error1', 'error2'];
      expect(extractErrorMessage(arr)).toBe('error1,error2');
    });
  });

  describe('createErrorGuidance', () => {
    it('should create guidance with only message', () => {
      const guidance = createErrorGuidance('Error occurred');

      expect(guidance.message).toBe('Error occurred');
      expect(guidance.hint).toBeUndefined();
      expect(guidance.resolution).toBeUndefined();
      expect(guidance.details).toBeUndefined();
    });

    it('should create guidance with message and hint', () => {
      const guidance = createErrorGuidance('Config not found', 'Pass --config');

      expect(guidance.message).toBe('Config not found');
      expect(guidance.hint).toBe('Pass --config');
      expect(guidance.resolution).toBeUndefined();
      expect(guidance.details).toBeUndefined();
    });

    it('should create guidance with message, hint, and resolution', () => {
      const guidance = createErrorGuidance(
        'Values file unreadable',
        'The file must exist',
        'Check the path and permissions',
      );

      expect(guidance.message).toBe('Values file unreadable');
      expect(guidance.hint).toBe('The file must exist');
      expect(guidance.resolution).toBe('Check the path and permissions');
      expect(guidance.details).toBeUndefined();
    });

    it('should create guidance with all parameters including details', () => {
      const details = { path: 'app.image', code: 'INVALID_TAG_FORMAT' };
      const guidance = createErrorGuidance(
        'Detection failed',
        'An image map is malformed',
        'Fix the tag',
        details,
      );

      expect(guidance.message).toBe('Detection failed');
      expect(guidance.hint).toBe('An image map is malformed');
      expect(guidance.resolution).toBe('Fix the tag');
      expect(guidance.details).toEqual({ path: 'app.image', code: 'INVALID_TAG_FORMAT' });
    });

    it('should handle empty strings', () => {
      const guidance = createErrorGuidance('', '', '');

      expect(guidance.message).toBe('');
      expect(guidance.hint).toBe('');
      expect(guidance.resolution).toBe('');
    });
  });

  describe('ERROR_MESSAGES', () => {
    it('should format file read failures', () => {
      expect(ERROR_MESSAGES.FILE_READ_FAILED('values.yaml', 'ENOENT')).toBe(
        'Failed to read values.yaml: ENOENT',
      );
    });

    it('should format YAML parse failures', () => {
      expect(ERROR_MESSAGES.YAML_PARSE_FAILED('values.yaml', 'bad indentation')).toBe(
        'Failed to parse YAML in values.yaml: bad indentation',
      );
    });

    it('should list known strategies for an unknown path strategy', () => {
      expect(ERROR_MESSAGES.UNKNOWN_PATH_STRATEGY('nested', ['prefix-source-registry', 'flat'])).toBe(
        'Unknown path strategy: nested (expected one of prefix-source-registry, flat)',
      );
    });

    it('should format detection failures with the path', () => {
      expect(ERROR_MESSAGES.DETECTION_FAILED('app.image', 'invalid tag format')).toBe(
        'Image detection failed at "app.image": invalid tag format',
      );
    });

    it('should format generic operation failures', () => {
      expect(ERROR_MESSAGES.OPERATION_FAILED('file read', 'permission denied')).toBe(
        'file read failed: permission denied',
      );
    });
  });
});
