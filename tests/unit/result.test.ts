/**
 * Result Pattern Unit Tests
 * Tests for the core Result type utilities
 */

import { describe, it, expect } from 'vitest';

import { PipelineError } from '@/types/errors.js';
import {
  success,
  failure,
  isSuccess,
  isFailure,
  type Result,
} from '@/types/result.js';

describe('Result Pattern', () => {
  describe('success()', () => {
    it('should create a success result with data', () => {
      const result = success({ id: '123', name: 'Test' });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ id: '123', name: 'Test' });
    });

    it('should work with null', () => {
      expect(success(null).data).toBeNull();
    });
  });

  describe('failure()', () => {
    it('should create a failure result with error', () => {
      const result = failure('DOMAIN_NOT_FOUND', 'Unknown domain: retail');

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'DOMAIN_NOT_FOUND',
        message: 'Unknown domain: retail',
      });
    });

    it('should include optional details', () => {
      const result = failure('VALIDATION_ERROR', 'Invalid input', {
        field: 'message',
      });

      expect(result.error.details).toEqual({ field: 'message' });
    });
  });

  describe('type guards', () => {
    it('should narrow success and failure results', () => {
      const ok: Result<string> = success('test');
      const bad: Result<string> = failure('NOT_FOUND', 'missing');

      expect(isSuccess(ok)).toBe(true);
      expect(isFailure(ok)).toBe(false);
      expect(isSuccess(bad)).toBe(false);
      expect(isFailure(bad)).toBe(true);

      if (isSuccess(ok)) {
        expect(ok.data).toBe('test');
      }
    });
  });

  describe('PipelineError', () => {
    it('should carry its code', () => {
      const error = new PipelineError('SANDBOX_TIMEOUT', 'took too long');

      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe('SANDBOX_TIMEOUT');
      expect(error.message).toBe('took too long');
      expect(error.name).toBe('PipelineError');
    });
  });
});
