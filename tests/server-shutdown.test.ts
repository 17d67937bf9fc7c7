import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createShutdownHandler } from '../src/http/server-shutdown.js';
import type { ConversionRunner } from '../src/pipeline/runner.js';

function createFakes() {
  const closeRunner = vi.fn(() => Promise.resolve());
  const runner: ConversionRunner = {
    mode: 'thread',
    run: () => Promise.reject(new Error('not used')),
    close: closeRunner,
  };
  return {
    server: { close: vi.fn(), closeIdleConnections: vi.fn() },
    runner,
    closeRunner,
  };
}

describe('createShutdownHandler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('stops the server and the conversion workers once', async () => {
    const { server, runner, closeRunner } = createFakes();
    const shutdown = createShutdownHandler(server as never, runner, 10_000);

    await shutdown('SIGTERM');
    await shutdown('SIGINT');

    expect(server.close).toHaveBeenCalledOnce();
    expect(server.closeIdleConnections).toHaveBeenCalledOnce();
    expect(closeRunner).toHaveBeenCalledOnce();
  });

  it('keeps going when the workers fail to stop', async () => {
    const { server, runner } = createFakes();
    const failing: ConversionRunner = {
      ...runner,
      close: () => Promise.reject(new Error('terminate failed')),
    };
    const shutdown = createShutdownHandler(server as never, failing, 10_000);

    await expect(shutdown('SIGTERM')).resolves.toBeUndefined();
    expect(server.close).toHaveBeenCalledOnce();
  });
});
