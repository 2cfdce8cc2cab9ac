import { Status } from '@pkbridge/backend-contracts';
import type { Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';

/**
 * `refreshCache(force)`; the result is ignored
 */
export function refreshCache(ctx: HandlerContext<Role.REFRESH_CACHE>): void {
  ctx.job.setStatus(Status.REFRESH_CACHE);
  callRuntime(ctx.runtime(), 'refreshCache', [ctx.args.force], z.unknown());
  ctx.job.setPercentage(100);
}
