/**
 * @module @pkbridge/backend/handlers/info
 *
 * Package details and file lists, for package ids or for local package
 * files. Scripts get either `{ packages }` or `{ files }`.
 */

import { Status, detailsRecordSchema, filesRecordSchema } from '@pkbridge/backend-contracts';
import type { PackageIdParts, Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext, LocalFilesArgs, PackageIdsArgs } from '../dispatch/types.js';
import { packageIdOf, parsePackageIds, requireValues } from './shared.js';

export type PackageQuery = { packages: PackageIdParts[] } | { files: string[] };

export function packageQuery(args: PackageIdsArgs | LocalFilesArgs): PackageQuery {
  if ('packageIds' in args) {
    return { packages: parsePackageIds(args.packageIds) };
  }
  return { files: requireValues(args.files, 'package files') };
}

export type DetailsRole = Role.GET_DETAILS | Role.GET_DETAILS_LOCAL;

/**
 * `getDetails(query)`
 */
export function packageDetails(ctx: HandlerContext<DetailsRole>): void {
  const { job } = ctx;
  const query = packageQuery(ctx.args);

  job.setStatus(Status.INFO);
  const records = callRuntime(ctx.runtime(), 'getDetails', [query], z.array(detailsRecordSchema));
  for (const record of records) {
    job.details({
      packageId: packageIdOf(record),
      summary: record.summary,
      description: record.description,
      url: record.url,
      license: record.license,
      group: record.group,
      size: record.size,
    });
  }
}

export type FilesRole = Role.GET_FILES | Role.GET_FILES_LOCAL;

/**
 * `getFiles(query)`
 */
export function packageFiles(ctx: HandlerContext<FilesRole>): void {
  const { job } = ctx;
  const query = packageQuery(ctx.args);

  job.setStatus(Status.INFO);
  const records = callRuntime(ctx.runtime(), 'getFiles', [query], z.array(filesRecordSchema));
  for (const record of records) {
    job.files(packageIdOf(record), record.files);
  }
}
