import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, TransportError } from '@seqctl/shared';
import { describeCommandError, exitCodeFor } from './context.js';

describe('exitCodeFor', () => {
  it('should map configuration problems to 2', () => {
    expect(exitCodeFor(new ConfigurationError('bad stack'))).toBe(2);
    expect(exitCodeFor(z.number().safeParse('x').error)).toBe(2);
  });

  it('should map everything else to 1', () => {
    expect(exitCodeFor(new TransportError('apiserver unavailable', 503))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('describeCommandError', () => {
  it('should prefix configuration errors', () => {
    expect(describeCommandError(new ConfigurationError('Resource group name must not be empty'))).toBe(
      'Configuration error: Resource group name must not be empty'
    );
  });

  it('should list zod issues by path', () => {
    const result = z.object({ sequencer: z.object({ pollIntervalMs: z.number().max(5000) }) }).safeParse({
      sequencer: { pollIntervalMs: 9000 },
    });

    expect(describeCommandError(result.error)).toBe(
      'Invalid configuration: sequencer.pollIntervalMs: Number must be less than or equal to 5000'
    );
  });

  it('should fall back to the error message', () => {
    expect(describeCommandError(new Error('socket hang up'))).toBe('Error: socket hang up');
  });
});
