/**
 * @module @pkbridge/backend/handlers/packages
 *
 * Package listing, name resolution and dependency queries.
 */

import { Info, Role, Status, packageRecordSchema } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { assertFilters, emitPackages, filterNames, parsePackageIds, requireValues } from './shared.js';

const packageListSchema = z.array(packageRecordSchema);

/**
 * `getPackages(filters)`
 */
export function listPackages(ctx: HandlerContext<Role.GET_PACKAGES>): void {
  const { job, args } = ctx;
  assertFilters(args.filters);

  job.setStatus(Status.QUERY);
  const records = callRuntime(ctx.runtime(), 'getPackages', [filterNames(args.filters)], packageListSchema);
  emitPackages(job, records, Info.AVAILABLE, true);
}

export type LookupRole = Role.RESOLVE | Role.WHAT_PROVIDES;

/**
 * `resolvePackages(kind, values, filters)`, with kind `name` for resolve
 * and `provides` for what-provides
 */
export function lookupPackages(ctx: HandlerContext<LookupRole>): void {
  const { job, args } = ctx;
  assertFilters(args.filters);

  let kind: string;
  let values: string[];
  if ('packages' in args) {
    kind = 'name';
    values = requireValues(args.packages, 'package names');
  } else {
    kind = 'provides';
    values = requireValues(args.values, 'provides');
  }

  job.setStatus(Status.QUERY);
  const records = callRuntime(
    ctx.runtime(),
    'resolvePackages',
    [kind, values, filterNames(args.filters)],
    packageListSchema
  );
  emitPackages(job, records, Info.AVAILABLE);
}

export type DependencyRole = Role.DEPENDS_ON | Role.REQUIRED_BY;

/**
 * `getDependencies(direction, packages, filters, recursive)`, with
 * direction `depends` or `required-by`
 */
export function packageDependencies(ctx: HandlerContext<DependencyRole>): void {
  const { job, args } = ctx;
  assertFilters(args.filters);
  const packages = parsePackageIds(args.packageIds);
  const direction = ctx.role === Role.DEPENDS_ON ? 'depends' : 'required-by';

  job.setStatus(Status.DEP_RESOLVE);
  const records = callRuntime(
    ctx.runtime(),
    'getDependencies',
    [direction, packages, filterNames(args.filters), args.recursive],
    packageListSchema
  );
  emitPackages(job, records, Info.AVAILABLE);
}
