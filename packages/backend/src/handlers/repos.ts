/**
 * @module @pkbridge/backend/handlers/repos
 *
 * Repository listing and configuration. `setRepo` takes either
 * `{ enabled }` or `{ parameter, value }` as its change.
 */

import { InvalidArgumentError, Status, repoRecordSchema } from '@pkbridge/backend-contracts';
import type { Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { assertFilters, filterNames, transactionFlagNames } from './shared.js';

function requireRepoId(repoId: string): string {
  const trimmed = repoId.trim();
  if (trimmed.length === 0) {
    throw new InvalidArgumentError('No repository id given');
  }
  return trimmed;
}

/**
 * `getRepos(filters)`
 */
export function listRepos(ctx: HandlerContext<Role.GET_REPO_LIST>): void {
  const { job, args } = ctx;
  assertFilters(args.filters);

  job.setStatus(Status.QUERY);
  const repos = callRuntime(ctx.runtime(), 'getRepos', [filterNames(args.filters)], z.array(repoRecordSchema));
  for (const repo of repos) {
    job.repoDetail({ repoId: repo.id, description: repo.description, enabled: repo.enabled });
  }
}

export type RepoChangeRole = Role.REPO_ENABLE | Role.REPO_SET_DATA;

/**
 * `setRepo(repoId, change)`
 */
export function changeRepo(ctx: HandlerContext<RepoChangeRole>): void {
  const { job, args } = ctx;
  const repoId = requireRepoId(args.repoId);

  let change: Record<string, unknown>;
  if ('enabled' in args) {
    change = { enabled: args.enabled };
  } else {
    if (args.parameter.length === 0) {
      throw new InvalidArgumentError('No repository parameter given', { repoId });
    }
    change = { parameter: args.parameter, value: args.value };
  }

  job.setStatus(Status.SETUP);
  callRuntime(ctx.runtime(), 'setRepo', [repoId, change], z.unknown());
}

/**
 * `removeRepo(repoId, transactionFlags, autoremove)`
 */
export function removeRepo(ctx: HandlerContext<Role.REPO_REMOVE>): void {
  const { job, args } = ctx;
  const repoId = requireRepoId(args.repoId);

  job.setStatus(Status.SETUP);
  callRuntime(
    ctx.runtime(),
    'removeRepo',
    [repoId, transactionFlagNames(args.transactionFlags), args.autoremove],
    z.unknown()
  );
}
