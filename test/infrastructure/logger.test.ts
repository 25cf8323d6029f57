import { describe, it, expect } from 'vitest';
import { logger, createInvocationLogger } from '../../src/infrastructure/logger.js';

describe('logger', () => {
  it('has service name configured', () => {
    expect(logger.bindings().name).toBe('text-anomaly-detection');
  });
});

describe('createInvocationLogger', () => {
  it('creates child logger with invocationId', () => {
    const child = createInvocationLogger('inv-123');
    expect(child.bindings().invocationId).toBe('inv-123');
  });

  it('includes url when provided', () => {
    const child = createInvocationLogger('inv-123', 'https://cdn.example.com/photo.png');
    expect(child.bindings().url).toBe('https://cdn.example.com/photo.png');
  });

  it('omits url when not provided', () => {
    expect(createInvocationLogger('inv-123').bindings().url).toBeUndefined();
  });
});
