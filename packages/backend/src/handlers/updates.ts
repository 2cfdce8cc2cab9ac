/**
 * @module @pkbridge/backend/handlers/updates
 */

import { Info, Status, packageRecordSchema, updateDetailRecordSchema } from '@pkbridge/backend-contracts';
import type { Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { assertFilters, emitPackages, filterNames, packageIdOf, parsePackageIds, transactionFlagNames } from './shared.js';

/**
 * `getUpdates(filters)`. Records without an info are normal updates.
 */
export function listUpdates(ctx: HandlerContext<Role.GET_UPDATES>): void {
  const { job, args } = ctx;
  assertFilters(args.filters);

  job.setStatus(Status.QUERY);
  const records = callRuntime(
    ctx.runtime(),
    'getUpdates',
    [filterNames(args.filters)],
    z.array(packageRecordSchema)
  );
  emitPackages(job, records, Info.NORMAL);
}

/**
 * `getUpdateDetail(packages)`
 */
export function updateDetails(ctx: HandlerContext<Role.GET_UPDATE_DETAIL>): void {
  const { job, args } = ctx;
  const packages = parsePackageIds(args.packageIds);

  job.setStatus(Status.INFO);
  const records = callRuntime(
    ctx.runtime(),
    'getUpdateDetail',
    [packages],
    z.array(updateDetailRecordSchema)
  );
  for (const record of records) {
    job.updateDetail({
      packageId: packageIdOf(record),
      updates: record.updates,
      obsoletes: record.obsoletes,
      vendorUrls: record.vendorUrls,
      bugzillaUrls: record.bugzillaUrls,
      cveUrls: record.cveUrls,
      updateText: record.updateText,
      changelog: record.changelog,
      issued: record.issued,
      updated: record.updated,
    });
  }
}

/**
 * `updatePackages(packages, transactionFlags)`
 */
export function updatePackages(ctx: HandlerContext<Role.UPDATE_PACKAGES>): void {
  const { job, args } = ctx;
  const packages = parsePackageIds(args.packageIds);

  job.setStatus(Status.UPDATE);
  job.setPercentage(0);
  const records = callRuntime(
    ctx.runtime(),
    'updatePackages',
    [packages, transactionFlagNames(args.transactionFlags)],
    z.array(packageRecordSchema)
  );
  emitPackages(job, records, Info.UPDATING, true);
  job.setPercentage(100);
}
