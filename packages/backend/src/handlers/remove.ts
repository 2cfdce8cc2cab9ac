/**
 * @module @pkbridge/backend/handlers/remove
 */

import { Info, Status, packageRecordSchema } from '@pkbridge/backend-contracts';
import type { Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { emitPackages, parsePackageIds, transactionFlagNames } from './shared.js';

/**
 * `removePackages(packages, transactionFlags, { allowDeps, autoremove })`
 */
export function removePackages(ctx: HandlerContext<Role.REMOVE_PACKAGES>): void {
  const { job, args } = ctx;
  const packages = parsePackageIds(args.packageIds);

  job.setStatus(Status.REMOVE);
  job.setPercentage(0);
  const records = callRuntime(
    ctx.runtime(),
    'removePackages',
    [
      packages,
      transactionFlagNames(args.transactionFlags),
      { allowDeps: args.allowDeps, autoremove: args.autoremove },
    ],
    z.array(packageRecordSchema)
  );
  emitPackages(job, records, Info.REMOVING, true);
  job.setPercentage(100);
}
