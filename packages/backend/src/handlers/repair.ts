import type { Role } from '@pkbridge/backend-contracts';
import type { HandlerContext } from '../dispatch/types.js';

/**
 * Nothing to repair. Finishes without touching the runtime.
 */
export function repairSystem(ctx: HandlerContext<Role.REPAIR_SYSTEM>): void {
  ctx.logger.debug('Repair requested, nothing to do');
  ctx.job.finish();
}
