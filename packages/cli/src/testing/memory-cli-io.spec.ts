import { describe, expect, it } from 'vitest';

import { createMemoryCliIo } from './memory-cli-io.js';

describe('createMemoryCliIo', () => {
  it('captures output buffers and recorded exit codes', () => {
    const io = createMemoryCliIo();

    io.writeOut('report');
    io.writeErr('warning');

    expect(io.stdoutBuffer).toBe('report');
    expect(io.stderrBuffer).toBe('warning');
    expect(io.exitCodes).toEqual([]);

    expect(() => io.exit(2)).toThrow(/process exit called with code 2/);
    expect(io.exitCodes).toEqual([2]);
  });

  it('serves the configured stdin text', async () => {
    const io = createMemoryCliIo({ stdin: '{"type":"clearAll"}\n' });

    await expect(io.readStdin()).resolves.toBe('{"type":"clearAll"}\n');
  });

  it('ends stdin immediately when no text is configured', async () => {
    const io = createMemoryCliIo();

    await expect(io.readStdin()).resolves.toBe('');
  });
});
