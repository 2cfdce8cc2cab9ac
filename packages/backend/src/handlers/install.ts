/**
 * @module @pkbridge/backend/handlers/install
 */

import { Info, Status, packageRecordSchema } from '@pkbridge/backend-contracts';
import type { Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { packageQuery } from './info.js';
import { emitPackages, transactionFlagNames } from './shared.js';

export type InstallRole = Role.INSTALL_PACKAGES | Role.INSTALL_FILES;

/**
 * `installPackages(query, transactionFlags)` → packages touched
 */
export function installPackages(ctx: HandlerContext<InstallRole>): void {
  const { job, args } = ctx;
  const query = packageQuery(args);

  job.setStatus(Status.INSTALL);
  job.setPercentage(0);
  const records = callRuntime(
    ctx.runtime(),
    'installPackages',
    [query, transactionFlagNames(args.transactionFlags)],
    z.array(packageRecordSchema)
  );
  emitPackages(job, records, Info.INSTALLING, true);
  job.setPercentage(100);
}
