/**
 * Handler Registry Tests
 *
 * Tests for DefaultHandlerRegistry covering:
 * - Handler registration, override and retrieval
 * - resolve() for unknown steps
 * - Cleanup on override and unregister
 * - Metadata and category filtering
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DefaultHandlerRegistry } from '../impl/handler-registry';
import type { StepHandler, HandlerMetadata } from '../interfaces/step-handler';
import { Result } from '../types/result';
import { FlowRelayError, UnknownStepError } from '../types/errors';
import { silentLogger, type Logger } from '../utils/logger';

/**
 * Helper to create test handlers with configurable metadata.
 */
function createHandler(type: string, metadata?: Partial<HandlerMetadata>, cleanup?: () => Promise<void>): StepHandler {
  return {
    type,
    metadata: {
      type,
      name: metadata?.name ?? type,
      description: metadata?.description,
      category: metadata?.category,
    },
    async execute() {
      return Result.acknowledged();
    },
    cleanup,
  };
}

describe('DefaultHandlerRegistry', () => {
  let registry: DefaultHandlerRegistry;

  beforeEach(() => {
    registry = new DefaultHandlerRegistry({ logger: silentLogger });
  });

  describe('registration', () => {
    it('registers a handler', () => {
      const handler = createHandler('WEB_VIEW');
      registry.register(handler);

      expect(registry.has('WEB_VIEW')).toBe(true);
      expect(registry.get('WEB_VIEW')).toBe(handler);
    });

    it('throws on duplicate registration', () => {
      registry.register(createHandler('WEB_VIEW'));

      expect(() => registry.register(createHandler('WEB_VIEW'))).toThrow('Handler "WEB_VIEW" already registered');
    });

    it('throws on an empty type', () => {
      expect(() => registry.register(createHandler('  '))).toThrow(FlowRelayError);
    });

    it('replaces a handler with override and cleans up the old one', () => {
      const cleanup = vi.fn(async () => undefined);
      registry.register(createHandler('WEB_VIEW', {}, cleanup));
      const replacement = createHandler('WEB_VIEW', { name: 'Custom web view' });

      registry.register(replacement, { override: true });

      expect(registry.get('WEB_VIEW')).toBe(replacement);
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it('logs a failed cleanup instead of throwing', async () => {
      const warn = vi.fn();
      const log: Logger = { ...silentLogger, warn };
      const logged = new DefaultHandlerRegistry({ logger: log });
      logged.register(createHandler('WEB_VIEW', {}, async () => { throw new Error('still open'); }));

      logged.register(createHandler('WEB_VIEW'), { override: true });
      await vi.waitFor(() => expect(warn).toHaveBeenCalled());

      expect(warn).toHaveBeenCalledWith('Cleanup of handler "WEB_VIEW" failed', { error: 'still open' });
    });

    it('registers multiple handlers', () => {
      registry.registerAll([createHandler('A'), createHandler('B'), createHandler('C')]);

      expect(registry.types()).toEqual(['A', 'B', 'C']);
    });
  });

  describe('retrieval', () => {
    it('returns undefined for unregistered type', () => {
      expect(registry.get('unknown')).toBeUndefined();
      expect(registry.has('unknown')).toBe(false);
    });

    it('resolves a registered handler', () => {
      const handler = createHandler('SIGN');
      registry.register(handler);

      expect(registry.resolve('SIGN')).toEqual({ ok: true, value: handler });
    });

    it('resolves an unknown step to UnknownStepError', () => {
      const resolved = registry.resolve('NOPE');

      expect(resolved.ok).toBe(false);
      expect(resolved.ok ? undefined : resolved.error).toBeInstanceOf(UnknownStepError);
      expect(resolved.ok ? undefined : resolved.error.step).toBe('NOPE');
    });
  });

  describe('unregister', () => {
    it('removes the handler and runs its cleanup', () => {
      const cleanup = vi.fn(async () => undefined);
      registry.register(createHandler('WEB_VIEW', {}, cleanup));

      expect(registry.unregister('WEB_VIEW')).toBe(true);
      expect(registry.has('WEB_VIEW')).toBe(false);
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it('returns false for an unknown type', () => {
      expect(registry.unregister('WEB_VIEW')).toBe(false);
    });
  });

  describe('metadata', () => {
    it('returns metadata for registered handler', () => {
      registry.register(createHandler('IDENTITY_VERIFICATION', {
        name: 'Identity verification',
        description: 'Runs the verification UI',
        category: 'verification',
      }));

      expect(registry.getMetadata('IDENTITY_VERIFICATION')).toEqual({
        type: 'IDENTITY_VERIFICATION',
        name: 'Identity verification',
        description: 'Runs the verification UI',
        category: 'verification',
      });
    });

    it('returns undefined metadata for unregistered type', () => {
      expect(registry.getMetadata('unknown')).toBeUndefined();
    });

    it('getAllMetadata returns all handler metadata', () => {
      registry.register(createHandler('A', { name: 'Type A' }));
      registry.register(createHandler('B', { name: 'Type B' }));

      expect(registry.getAllMetadata().map(m => m.name)).toEqual(['Type A', 'Type B']);
    });
  });

  describe('category filtering', () => {
    beforeEach(() => {
      registry.register(createHandler('WEB_VIEW', { category: 'redirect' }));
      registry.register(createHandler('IDENTITY_VERIFICATION', { category: 'verification' }));
      registry.register(createHandler('LIVENESS', { category: 'verification' }));
      registry.register(createHandler('PLAIN', {}));
    });

    it('filters metadata by category', () => {
      expect(registry.listByCategory('verification').map(m => m.type)).toEqual(['IDENTITY_VERIFICATION', 'LIVENESS']);
    });

    it('returns everything without a category', () => {
      expect(registry.listByCategory()).toHaveLength(4);
    });

    it('returns empty array for non-existent category', () => {
      expect(registry.listByCategory('signing')).toEqual([]);
    });
  });
});
