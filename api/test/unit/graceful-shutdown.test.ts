import { describe, it, expect, vi } from 'vitest';
import { GracefulShutdownService, createGracefulShutdown } from '../../src/services/graceful-shutdown.service.js';
import { silentLogger } from '../helpers/fakes.js';

describe('Graceful Shutdown Service', () => {
  it('should stop intake, drain, clean up and exit 0 in that order', async () => {
    const steps: string[] = [];
    const exit = vi.fn((code: number) => {
      steps.push(`exit ${code}`);
    });
    const shutdown = createGracefulShutdown(silentLogger(), {
      onShutdownStart: () => {
        steps.push('start');
      },
      onWaitForQueue: async () => {
        steps.push('drain');
      },
      onCleanup: () => {
        steps.push('cleanup');
      },
      exit,
    });

    await shutdown.shutdown('SIGTERM');

    expect(steps).toEqual(['start', 'drain', 'cleanup', 'exit 0']);
    expect(shutdown.isShutdownInProgress()).toBe(true);
  });

  it('should run only once when signalled twice', async () => {
    const exit = vi.fn();
    const onShutdownStart = vi.fn();
    const shutdown = new GracefulShutdownService(
      { timeout: 1000, forceTimeout: 5000, onShutdownStart, exit },
      silentLogger()
    );

    await Promise.all([shutdown.shutdown('SIGTERM'), shutdown.shutdown('SIGINT')]);

    expect(onShutdownStart).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should clean up anyway when the queue does not drain in time', async () => {
    const exit = vi.fn();
    const onCleanup = vi.fn();
    const shutdown = new GracefulShutdownService(
      {
        timeout: 20,
        forceTimeout: 5000,
        onWaitForQueue: () => new Promise<void>(() => undefined),
        onCleanup,
        exit,
      },
      silentLogger()
    );

    await shutdown.shutdown('SIGTERM');

    expect(onCleanup).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should clean up when waiting for the queue fails', async () => {
    const exit = vi.fn();
    const onCleanup = vi.fn();
    const shutdown = new GracefulShutdownService(
      {
        timeout: 1000,
        forceTimeout: 5000,
        onWaitForQueue: async () => {
          throw new Error('queue broken');
        },
        onCleanup,
        exit,
      },
      silentLogger()
    );

    await shutdown.shutdown('SIGTERM');

    expect(onCleanup).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should exit 1 when cleanup throws', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdownService(
      {
        timeout: 1000,
        forceTimeout: 5000,
        onCleanup: () => {
          throw new Error('close failed');
        },
        exit,
      },
      silentLogger()
    );

    await shutdown.shutdown('SIGTERM');

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should pass through the exit code for a crash', async () => {
    const exit = vi.fn();
    const shutdown = createGracefulShutdown(silentLogger(), { exit });

    await shutdown.shutdown('UNCAUGHT_EXCEPTION', 1);

    expect(exit).toHaveBeenCalledWith(1);
  });
});
