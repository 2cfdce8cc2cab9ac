/**
 * @module @pkbridge/script-runtime/lifecycle
 *
 * RuntimeLifecycle - the single owner of the process-wide embedded runtime.
 *
 * States:
 *
 * ```
 * uninitialized ──initialize()──▶ initialized ──destroy()──▶ destroyed
 *       │                                                       ▲
 *       └──initialize() fails──▶ failed ─────destroy()──────────┘
 * ```
 *
 * `failed` keeps the startup error; every `require()` reports it, so each
 * later job fails instead of the plugin crashing.
 */

import {
  BackendError,
  LifecycleError,
  RuntimeStartError,
  RuntimeUnavailableError,
  isErrorLike,
  noopLogger,
} from '@pkbridge/backend-contracts';
import type { BackendLogger } from '@pkbridge/backend-contracts';
import type { EmbeddedRuntime, RuntimeSetup } from './types.js';

export type RuntimeState =
  | { status: 'uninitialized' }
  | { status: 'initialized'; runtime: EmbeddedRuntime; moduleName: string }
  | { status: 'failed'; error: BackendError; runtime?: EmbeddedRuntime }
  | { status: 'destroyed' };

export type RuntimeStatus = RuntimeState['status'];

function toStartError(error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  return new RuntimeStartError(isErrorLike(error) ? error.message : String(error));
}

export class RuntimeLifecycle {
  private state: RuntimeState = { status: 'uninitialized' };
  private readonly logger: BackendLogger;

  constructor(logger: BackendLogger = noopLogger) {
    this.logger = logger.child({ layer: 'lifecycle' });
  }

  get status(): RuntimeStatus {
    return this.state.status;
  }

  /**
   * Startup error, when initialization failed.
   */
  get error(): BackendError | undefined {
    return this.state.status === 'failed' ? this.state.error : undefined;
  }

  /**
   * Register the bridge module, then start the interpreter.
   *
   * `prepare` builds the runtime; it may throw (bad configuration), which
   * counts as a startup failure. Never throws; a second call is ignored.
   */
  initialize(prepare: () => RuntimeSetup): void {
    if (this.state.status !== 'uninitialized') {
      this.logger.warn('Runtime already initialized, ignoring', { status: this.state.status });
      return;
    }

    let runtime: EmbeddedRuntime | undefined;
    try {
      const setup = prepare();
      runtime = setup.runtime;
      runtime.registerModule(setup.moduleName, setup.bridge);
      runtime.start();
      this.state = { status: 'initialized', runtime, moduleName: setup.moduleName };
      this.logger.info('Runtime initialized', { module: setup.moduleName });
    } catch (error) {
      const startError = toStartError(error);
      this.state = { status: 'failed', error: startError, runtime };
      this.logger.error('Runtime failed to start', {
        code: startError.code,
        error: startError.message,
      });
    }
  }

  /**
   * The live runtime, for the duration of one job.
   */
  require(): EmbeddedRuntime {
    switch (this.state.status) {
      case 'initialized':
        return this.state.runtime;
      case 'failed':
        throw new RuntimeUnavailableError(`Runtime failed to start: ${this.state.error.message}`, {
          cause: this.state.error.code,
        });
      case 'uninitialized':
        throw new RuntimeUnavailableError('Runtime is not initialized');
      case 'destroyed':
        throw new RuntimeUnavailableError('Runtime has been destroyed');
    }
  }

  /**
   * Tear the runtime down. Valid once, after `initialize()`.
   */
  destroy(): void {
    const state = this.state;
    if (state.status === 'uninitialized') {
      throw new LifecycleError('Cannot destroy a runtime that was never initialized');
    }
    if (state.status === 'destroyed') {
      throw new LifecycleError('Runtime already destroyed');
    }

    this.state = { status: 'destroyed' };
    const runtime = state.runtime;
    if (!runtime) {
      this.logger.info('Runtime destroyed (never started)');
      return;
    }

    try {
      runtime.stop();
      this.logger.info('Runtime destroyed');
    } catch (error) {
      this.logger.error('Runtime teardown failed', {
        error: isErrorLike(error) ? error.message : String(error),
      });
    }
  }
}
