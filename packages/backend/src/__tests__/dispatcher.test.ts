import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  EMPTY_BITFIELD,
  ErrorCode,
  Info,
  PackageIdInvalidError,
  Role,
  RuntimeStartError,
  bitfieldFromEnums,
} from '@pkbridge/backend-contracts';
import { FakeRuntime, MemoryLogger, RecordingJob } from '@pkbridge/backend-testing';
import { RuntimeLifecycle } from '@pkbridge/script-runtime';
import { JobDispatcher } from '../dispatch/dispatcher.js';
import type { HandlerRegistry } from '../dispatch/types.js';
import { defaultHandlers } from '../handlers/index.js';

const search = { filters: EMPTY_BITFIELD, values: ['nano'] };

function startedLifecycle(runtime = new FakeRuntime()): RuntimeLifecycle {
  const lifecycle = new RuntimeLifecycle();
  lifecycle.initialize(() => ({ runtime, moduleName: 'pkbridge', bridge: {} }));
  return lifecycle;
}

describe('JobDispatcher', () => {
  let lifecycle: RuntimeLifecycle;
  let job: RecordingJob;

  beforeEach(() => {
    lifecycle = startedLifecycle();
    job = new RecordingJob();
  });

  it('should finish a job whose handler returns without finalizing', () => {
    const handler = vi.fn();
    const dispatcher = new JobDispatcher({ lifecycle, handlers: { [Role.SEARCH_NAME]: handler } });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toMatchObject({ role: Role.SEARCH_NAME, args: search });
    expect(job.events).toEqual(['finished']);
  });

  it('should not finish twice when the handler finalized the job', () => {
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: {
        [Role.SEARCH_NAME]: (ctx) => {
          ctx.job.package(Info.AVAILABLE, 'nano;7.2;x86_64;core', 'Editor');
          ctx.job.finish();
        },
      },
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(job.events).toEqual(['package', 'finished']);
  });

  it('should fail the job with the code of a thrown backend error', () => {
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: {
        [Role.GET_DETAILS]: () => {
          throw new PackageIdInvalidError('nano', 'expected 4 sections, got 1');
        },
      },
    });

    dispatcher.dispatch(Role.GET_DETAILS, job, { packageIds: ['nano'] });

    expect(job.errors).toEqual([
      { code: ErrorCode.PACKAGE_ID_INVALID, message: "Invalid package id 'nano': expected 4 sections, got 1" },
    ]);
    expect(job.events).toEqual(['error-code', 'finished']);
  });

  it('should fail with internal-error for a plain exception', () => {
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: {
        [Role.SEARCH_NAME]: () => {
          throw new Error('boom');
        },
      },
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(job.errors).toEqual([{ code: ErrorCode.INTERNAL_ERROR, message: 'boom' }]);
    expect(job.finishedCount).toBe(1);
  });

  it('should keep the first terminal signal when a handler throws after finishing', () => {
    const logger = new MemoryLogger();
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: {
        [Role.SEARCH_NAME]: (ctx) => {
          ctx.job.finish();
          throw new Error('after the fact');
        },
      },
      logger,
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(job.events).toEqual(['finished']);
    expect(logger.at('error').map((entry) => entry.message)).toEqual([
      'Job already finalized',
      'Handler threw after finalizing its job',
    ]);
  });

  it('should fail roles without a handler as not supported', () => {
    const dispatcher = new JobDispatcher({ lifecycle, handlers: {} });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(job.errors).toEqual([{ code: ErrorCode.NOT_SUPPORTED, message: 'Role search-name has no handler' }]);
    expect(job.finishedCount).toBe(1);
  });

  it('should fail roles that are not advertised', () => {
    const handler = vi.fn();
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: { [Role.SEARCH_NAME]: handler },
      advertisedRoles: bitfieldFromEnums(Role.GET_PACKAGES),
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(handler).not.toHaveBeenCalled();
    expect(job.errors).toEqual([{ code: ErrorCode.NOT_SUPPORTED, message: 'Role search-name is not supported' }]);
  });

  it.each([64, -1, 2.5])('should fail an out-of-range role value %s as not supported', (value: number) => {
    const dispatcher = new JobDispatcher({ lifecycle, handlers: defaultHandlers });

    dispatcher.dispatch<Role.GET_PACKAGES>(value, job, { filters: EMPTY_BITFIELD });

    expect(job.errors).toEqual([{ code: ErrorCode.NOT_SUPPORTED, message: `Role ${value} is not supported` }]);
    expect(job.finishedCount).toBe(1);
    expect(dispatcher.activeJob).toBeUndefined();
  });

  it('should fail without calling the handler when the runtime is unavailable', () => {
    const handler = vi.fn();
    const dispatcher = new JobDispatcher({
      lifecycle: new RuntimeLifecycle(),
      handlers: { [Role.SEARCH_NAME]: handler },
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(handler).not.toHaveBeenCalled();
    expect(job.errors).toEqual([{ code: ErrorCode.INTERNAL_ERROR, message: 'Runtime is not initialized' }]);
    expect(job.finishedCount).toBe(1);
  });

  it('should report the startup error after a failed start', () => {
    const failed = new RuntimeLifecycle();
    failed.initialize(() => ({
      runtime: new FakeRuntime().failStartWith(new RuntimeStartError('No scripts found in /srv/empty')),
      moduleName: 'pkbridge',
      bridge: {},
    }));
    const dispatcher = new JobDispatcher({ lifecycle: failed, handlers: defaultHandlers });

    dispatcher.dispatch(Role.GET_PACKAGES, job, { filters: EMPTY_BITFIELD });

    expect(job.errors).toEqual([
      { code: ErrorCode.INTERNAL_ERROR, message: 'Runtime failed to start: No scripts found in /srv/empty' },
    ]);
  });

  it('should finish repair even when the runtime failed to start', () => {
    const failed = new RuntimeLifecycle();
    failed.initialize(() => {
      throw new Error('no configuration');
    });
    const dispatcher = new JobDispatcher({ lifecycle: failed, handlers: defaultHandlers });

    dispatcher.dispatch(Role.REPAIR_SYSTEM, job, { transactionFlags: EMPTY_BITFIELD });

    expect(job.events).toEqual(['finished']);
    expect(job.packages).toEqual([]);
  });

  it('should reject a job dispatched while another is running', () => {
    const inner = new RecordingJob();
    const handlers: HandlerRegistry = {
      [Role.SEARCH_NAME]: () => {
        dispatcher.dispatch(Role.GET_PACKAGES, inner, { filters: EMPTY_BITFIELD });
      },
      [Role.GET_PACKAGES]: vi.fn(),
    };
    const dispatcher = new JobDispatcher({ lifecycle, handlers });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(inner.errors).toHaveLength(1);
    expect(inner.errors[0].code).toBe(ErrorCode.TRANSACTION_ERROR);
    expect(inner.errors[0].message).toMatch(/^Cannot run get-packages while job_\d+_\d+_[0-9a-f]{8} is still running$/);
    expect(inner.finishedCount).toBe(1);
    expect(job.events).toEqual(['finished']);
    expect(dispatcher.activeJob).toBeUndefined();
  });

  it('should ignore a job handle that was already dispatched', () => {
    const handler = vi.fn();
    const logger = new MemoryLogger();
    const dispatcher = new JobDispatcher({ lifecycle, handlers: { [Role.SEARCH_NAME]: handler }, logger });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);
    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(job.events).toEqual(['finished']);
    expect(logger.at('error')).toEqual([
      {
        level: 'error',
        message: 'Job handle dispatched twice, ignoring',
        fields: { layer: 'dispatch', role: 'search-name' },
      },
    ]);
  });

  it('should fail a handler that returns a promise', () => {
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: {
        [Role.SEARCH_NAME]: async () => {
          throw new Error('late failure');
        },
      },
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(job.errors).toEqual([
      {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'Handler for search-name returned a promise; handlers must be synchronous',
      },
    ]);
    expect(job.finishedCount).toBe(1);
  });

  it('should expose the running job to handlers', () => {
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: {
        [Role.SEARCH_NAME]: (ctx) => {
          expect(dispatcher.activeJob).toBe(ctx.job);
          expect(ctx.job.state).toBe('running');
          expect(ctx.job.id).toMatch(/^job_/);
        },
      },
    });

    dispatcher.dispatch(Role.SEARCH_NAME, job, search);

    expect(job.outcome).toBe('finished');
  });

  it('should list the roles it has handlers for', () => {
    const dispatcher = new JobDispatcher({
      lifecycle,
      handlers: { [Role.SEARCH_NAME]: vi.fn(), [Role.REPAIR_SYSTEM]: vi.fn() },
    });

    expect([...dispatcher.handledRoles()]).toEqual([Role.SEARCH_NAME, Role.REPAIR_SYSTEM]);
    expect(new JobDispatcher({ lifecycle, handlers: defaultHandlers }).handledRoles().size).toBe(26);
  });
});
