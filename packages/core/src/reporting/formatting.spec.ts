import { describe, expect, it, vi } from 'vitest';

import {
  formatPercentage,
  formatUnknownError,
  serialiseError,
  writeLine,
  type WritableTarget,
} from './formatting.js';

describe('reporting formatting helpers', () => {
  it('formats percentages with two decimal places', () => {
    expect(formatPercentage(3, 15)).toBe('20.00');
    expect(formatPercentage(1, 3)).toBe('33.33');
  });

  it('reports zero percent when the total is zero', () => {
    expect(formatPercentage(4, 0)).toBe('0.00');
  });

  it('formats unknown errors', () => {
    const error = new Error('boom');
    expect(formatUnknownError(error)).toBe('Error: boom');
    expect(formatUnknownError('failure')).toBe('failure');
  });

  it('serialises error instances with stack traces when available', () => {
    const error = new Error('explode');
    error.stack = 'Error: explode\n    at here';
    expect(serialiseError(error)).toEqual({
      name: 'Error',
      message: 'explode',
      stack: error.stack,
    });
  });

  it('keeps string error codes', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
    delete error.stack;
    expect(serialiseError(error)).toEqual({
      name: 'Error',
      message: 'missing',
      code: 'ENOENT',
    });
  });

  it('serialises non-error values with a default name', () => {
    expect(serialiseError('nope')).toEqual({
      name: 'UnknownError',
      message: 'nope',
    });
  });

  it('writes text payloads with a newline terminator', () => {
    const target: WritableTarget = { write: vi.fn() };
    writeLine(target, 'status: ok');
    expect(target.write).toHaveBeenCalledWith('status: ok\n');
  });
});
