import { Info, InvalidArgumentError, Status, downloadRecordSchema } from '@pkbridge/backend-contracts';
import type { Role } from '@pkbridge/backend-contracts';
import { callRuntime } from '@pkbridge/script-runtime';
import { z } from 'zod';
import type { HandlerContext } from '../dispatch/types.js';
import { packageIdOf, parsePackageIds } from './shared.js';

/**
 * `downloadPackages(packages, directory)`. Each record names the files
 * written for one package.
 */
export function downloadPackages(ctx: HandlerContext<Role.DOWNLOAD_PACKAGES>): void {
  const { job, args } = ctx;
  const packages = parsePackageIds(args.packageIds);
  if (args.directory.length === 0) {
    throw new InvalidArgumentError('No download directory given');
  }

  job.setStatus(Status.DOWNLOAD);
  job.setPercentage(0);
  const records = callRuntime(
    ctx.runtime(),
    'downloadPackages',
    [packages, args.directory],
    z.array(downloadRecordSchema)
  );
  records.forEach((record, index) => {
    const packageId = packageIdOf(record);
    job.package(record.info ?? Info.DOWNLOADING, packageId, record.summary);
    job.files(packageId, record.files);
    job.setPercentage(((index + 1) * 100) / records.length);
  });
  job.setPercentage(100);
}
