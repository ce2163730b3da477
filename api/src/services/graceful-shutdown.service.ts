/**
 * Graceful Shutdown Service
 *
 * Handles application shutdown gracefully:
 * - Captures SIGTERM and SIGINT signals
 * - Stops accepting new send requests
 * - Waits for background dispatches to drain, with timeout
 * - Closes the recipient store and relay transport
 */

import type { StructuredLogger } from './logger.service.js';

export interface ShutdownConfig {
  /** Timeout in milliseconds to wait for queue to drain */
  timeout: number;
  /** Force shutdown timeout in milliseconds (safety net) */
  forceTimeout: number;
  /** Callback to stop accepting new work */
  onShutdownStart?: () => void | Promise<void>;
  /** Callback to wait for queue to drain */
  onWaitForQueue?: () => Promise<void>;
  /** Callback to release resources (store, transport) */
  onCleanup?: () => void | Promise<void>;
  /** Exits the process; replaced in tests */
  exit?: (code: number) => void;
}

export class GracefulShutdownService {
  private isShuttingDown = false;
  private shutdownConfig: ShutdownConfig;
  private logger: StructuredLogger;
  private exit: (code: number) => void;
  private shutdownTimeout?: NodeJS.Timeout;
  private forceShutdownTimeout?: NodeJS.Timeout;

  constructor(config: ShutdownConfig, logger: StructuredLogger) {
    this.shutdownConfig = config;
    this.logger = logger;
    this.exit = config.exit ?? ((code) => process.exit(code));
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    // Handle SIGTERM (e.g., docker stop)
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });

    // Handle SIGINT (e.g., Ctrl+C in terminal)
    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      this.logger.error('Uncaught exception', { error });
      void this.shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection', { error: reason });
      void this.shutdown('UNHANDLED_REJECTION', 1);
    });

    this.logger.debug('Shutdown handlers registered');
  }

  /**
   * Runs the shutdown sequence once; later calls are ignored
   */
  async shutdown(signal: string, exitCode = 0): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress', { signal });
      return;
    }

    this.isShuttingDown = true;
    this.setupForceShutdownTimeout(this.shutdownConfig.forceTimeout);
    this.logger.shutdownStarted({ signal });

    const startTime = Date.now();

    try {
      // Step 1: Stop accepting new work
      if (this.shutdownConfig.onShutdownStart) {
        await this.shutdownConfig.onShutdownStart();
      }

      // Step 2: Wait for background dispatches
      const queueDrained = await this.waitWithTimeout(
        this.shutdownConfig.onWaitForQueue,
        this.shutdownConfig.timeout
      );

      if (!queueDrained) {
        this.logger.warn(
          `Dispatch queue drain timeout (${this.formatDuration(this.shutdownConfig.timeout)}) expired, some dispatches may be interrupted`
        );
      }

      // Step 3: Release resources
      if (this.shutdownConfig.onCleanup) {
        await this.shutdownConfig.onCleanup();
      }

      this.logger.shutdownCompleted({ duration: Date.now() - startTime });
      this.clearTimers();
      this.exit(exitCode);
    } catch (error) {
      this.logger.error('Error during graceful shutdown', { error });
      this.clearTimers();
      this.exit(1);
    }
  }

  /**
   * Waits for a promise with timeout
   */
  private async waitWithTimeout(
    callback?: () => Promise<void>,
    timeoutMs: number = 30000
  ): Promise<boolean> {
    if (!callback) {
      return true;
    }

    return new Promise((resolve) => {
      let completed = false;

      this.shutdownTimeout = setTimeout(() => {
        if (!completed) {
          completed = true;
          resolve(false); // Timeout expired
        }
      }, timeoutMs);

      callback()
        .then(() => {
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(true);
          }
        })
        .catch((error: unknown) => {
          this.logger.error('Error waiting for dispatch queue', { error });
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(false);
          }
        });
    });
  }

  /**
   * If graceful shutdown takes too long, force exit
   */
  private setupForceShutdownTimeout(timeoutMs: number): void {
    this.forceShutdownTimeout = setTimeout(() => {
      this.logger.error('Force shutdown timeout expired, forcing immediate exit');
      this.exit(1);
    }, timeoutMs);
    this.forceShutdownTimeout.unref();
  }

  private clearTimers(): void {
    clearTimeout(this.shutdownTimeout);
    clearTimeout(this.forceShutdownTimeout);
  }

  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }

  /**
   * Formats duration in milliseconds to human-readable string
   */
  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);

    if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    } else {
      return `${seconds}s`;
    }
  }
}

/**
 * Creates a graceful shutdown service with default configuration
 */
export function createGracefulShutdown(
  logger: StructuredLogger,
  customConfig?: Partial<ShutdownConfig>
): GracefulShutdownService {
  const defaultConfig: ShutdownConfig = {
    timeout: 30000, // 30 seconds default
    forceTimeout: 60000, // 60 seconds default
    ...customConfig,
  };

  return new GracefulShutdownService(defaultConfig, logger);
}
