/**
 * @module @pkbridge/backend/dispatch/dispatcher
 *
 * JobDispatcher - routes one role invocation to its handler.
 *
 * Dispatch is synchronous and single-flight. Whatever happens inside,
 * the job has received exactly one terminal signal when `dispatch` returns.
 */

import {
  ErrorCode,
  Role,
  bitfieldContains,
  enumValues,
  isThenable,
  noopLogger,
  normalizeError,
  roleToString,
} from '@pkbridge/backend-contracts';
import type { BackendJob, BackendLogger, Bitfield } from '@pkbridge/backend-contracts';
import type { EmbeddedRuntime, RuntimeLifecycle } from '@pkbridge/script-runtime';
import { getRoles } from '../capabilities.js';
import { createJobId } from '../utils.js';
import { TrackedJob } from './tracked-job.js';
import type { HandledRole, HandlerContext, HandlerRegistry, RoleArgsMap, RoleHandler } from './types.js';

/**
 * Roles whose handlers do no runtime work and run even when the runtime
 * is unavailable
 */
export const RUNTIME_FREE_ROLES: ReadonlySet<Role> = new Set([Role.REPAIR_SYSTEM]);

const KNOWN_ROLES: ReadonlySet<number> = new Set(enumValues(Role));

export interface JobDispatcherOptions {
  lifecycle: RuntimeLifecycle;
  handlers: HandlerRegistry;
  /**
   * Defaults to `getRoles()`
   */
  advertisedRoles?: Bitfield;
  logger?: BackendLogger;
}

export class JobDispatcher {
  private readonly lifecycle: RuntimeLifecycle;
  private readonly handlers: HandlerRegistry;
  private readonly advertisedRoles: Bitfield;
  private readonly logger: BackendLogger;
  private readonly seen = new WeakSet<BackendJob>();
  private active: TrackedJob | undefined;

  constructor(options: JobDispatcherOptions) {
    this.lifecycle = options.lifecycle;
    this.handlers = options.handlers;
    this.advertisedRoles = options.advertisedRoles ?? getRoles();
    this.logger = (options.logger ?? noopLogger).child({ layer: 'dispatch' });
  }

  /**
   * Roles with a registered handler
   */
  handledRoles(): Set<Role> {
    const registered = new Set(
      Object.entries(this.handlers)
        .filter(([, handler]) => handler !== undefined)
        .map(([key]) => Number(key))
    );
    return new Set(enumValues(Role).filter((role) => registered.has(role)));
  }

  /**
   * Job currently running, if any
   */
  get activeJob(): TrackedJob | undefined {
    return this.active;
  }

  dispatch<R extends HandledRole>(role: R, job: BackendJob, args: RoleArgsMap[R]): void {
    const roleName = roleToString(role);

    if (this.seen.has(job)) {
      this.logger.error('Job handle dispatched twice, ignoring', { role: roleName });
      return;
    }
    this.seen.add(job);

    const jobId = createJobId();
    const logger = this.logger.child({ role: roleName, jobId });
    const tracked = new TrackedJob(job, jobId, logger);
    tracked.start();

    if (this.active) {
      tracked.fail(
        ErrorCode.TRANSACTION_ERROR,
        `Cannot run ${roleName} while ${this.active.id} is still running`
      );
      return;
    }

    this.active = tracked;
    try {
      this.run(role, tracked, args, logger);
    } finally {
      this.active = undefined;
    }
  }

  private run<R extends HandledRole>(
    role: R,
    job: TrackedJob,
    args: RoleArgsMap[R],
    logger: BackendLogger
  ): void {
    const roleName = roleToString(role);

    if (!KNOWN_ROLES.has(role)) {
      job.fail(ErrorCode.NOT_SUPPORTED, `Role ${String(role)} is not supported`);
      return;
    }
    if (!bitfieldContains(this.advertisedRoles, role)) {
      job.fail(ErrorCode.NOT_SUPPORTED, `Role ${roleName} is not supported`);
      return;
    }

    const handler = this.lookup(role);
    if (!handler) {
      job.fail(ErrorCode.NOT_SUPPORTED, `Role ${roleName} has no handler`);
      return;
    }

    logger.debug('Dispatching job');

    try {
      let runtime: EmbeddedRuntime | undefined;
      if (!RUNTIME_FREE_ROLES.has(role)) {
        runtime = this.lifecycle.require();
      }
      const ctx: HandlerContext<R> = {
        role,
        job,
        args,
        runtime: () => runtime ?? this.lifecycle.require(),
        logger,
      };

      const result: unknown = handler(ctx);
      if (isThenable(result)) {
        void result.then(undefined, (error: unknown) => {
          logger.error('Asynchronous handler rejected after its job failed', {
            error: normalizeError(error).message,
          });
        });
        job.fail(ErrorCode.INTERNAL_ERROR, `Handler for ${roleName} returned a promise; handlers must be synchronous`);
        return;
      }

      if (!job.isFinal) {
        job.finish();
      }
    } catch (error) {
      const { code, message } = normalizeError(error);
      if (!job.fail(code, message)) {
        logger.error('Handler threw after finalizing its job', { code, error: message });
      }
    }
  }

  private lookup<R extends HandledRole>(role: R): RoleHandler<R> | undefined {
    return this.handlers[role];
  }
}
