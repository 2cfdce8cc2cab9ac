/**
 * @module @pkbridge/backend/handlers/search
 */

import { Info, Role, Status, packageRecordSchema } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { assertFilters, emitPackages, filterNames, requireValues } from './shared.js';

export type SearchRole = Role.SEARCH_NAME | Role.SEARCH_DETAILS | Role.SEARCH_FILE | Role.SEARCH_GROUP;

/**
 * First argument of `searchPackages`
 */
export const SEARCH_KINDS: Readonly<Record<SearchRole, string>> = {
  [Role.SEARCH_NAME]: 'name',
  [Role.SEARCH_DETAILS]: 'details',
  [Role.SEARCH_FILE]: 'file',
  [Role.SEARCH_GROUP]: 'group',
};

/**
 * `searchPackages(kind, values, filters)` → package records
 */
export function search(ctx: HandlerContext<SearchRole>): void {
  const { job, args } = ctx;
  assertFilters(args.filters);
  const values = requireValues(args.values, 'search terms');

  job.setStatus(Status.QUERY);
  const records = callRuntime(
    ctx.runtime(),
    'searchPackages',
    [SEARCH_KINDS[ctx.role], values, filterNames(args.filters)],
    z.array(packageRecordSchema)
  );
  emitPackages(job, records, Info.AVAILABLE);
}
