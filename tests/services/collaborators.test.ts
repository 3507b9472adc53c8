import { describe, expect, it, vi } from 'vitest';
import { CollaboratorTimeoutError, withTimeout } from '../../src/services/collaborators.js';
import type { Logger } from '../../src/utils/logger.js';

function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe('withTimeout', () => {
  it('wraps a resolved value', async () => {
    const logger = recordingLogger();
    expect(await withTimeout('lookup', 100, async () => 42, logger)).toEqual({ success: true, data: 42 });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('maps a thrown error to a failure', async () => {
    const logger = recordingLogger();
    const result = await withTimeout(
      'lookup',
      100,
      async () => {
        throw new Error('connection reset');
      },
      logger
    );

    expect(result).toEqual({ success: false, error: 'connection reset' });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('gives up after the timeout', async () => {
    const logger = recordingLogger();
    const result = await withTimeout('lookup', 20, () => new Promise<number>(() => {}), logger);

    expect(result).toEqual({ success: false, error: 'lookup timed out after 20ms', timedOut: true });
    expect(logger.warn).toHaveBeenCalledWith('⏱️ lookup timed out after 20ms');
  });

  it('describes the timeout', () => {
    const error = new CollaboratorTimeoutError('findSlots', 1500);
    expect(error.name).toBe('CollaboratorTimeoutError');
    expect(error.message).toBe('findSlots timed out after 1500ms');
  });
});
