/**
 * @module @pkbridge/backend/handlers/shared
 *
 * Argument checks and emit helpers used by every handler.
 */

import {
  Filter,
  FilterInvalidError,
  InvalidArgumentError,
  TransactionFlag,
  bitfieldContains,
  bitfieldToEnums,
  buildPackageId,
  filterBase,
  filterNegation,
  filterToString,
  parsePackageId,
  transactionFlagToString,
} from '@pkbridge/backend-contracts';
import type { Bitfield, Info, PackageIdParts, PackageRecord } from '@pkbridge/backend-contracts';
import { getFilters } from '../capabilities.js';
import type { TrackedJob } from '../dispatch/tracked-job.js';

/**
 * Reject filters the backend does not advertise, and any filter combined
 * with its own negation.
 *
 * @throws FilterInvalidError
 */
export function assertFilters(filters: Bitfield, supported: Bitfield = getFilters()): void {
  for (const filter of bitfieldToEnums(filters)) {
    if (filter === Filter.NONE) {
      continue;
    }
    if (filter === Filter.UNKNOWN || !bitfieldContains(supported, filterBase(filter))) {
      throw new FilterInvalidError(`Filter '${filterToString(filter)}' is not supported`, {
        filter: filterToString(filter),
      });
    }
    const negation = filterNegation(filter);
    if (negation !== undefined && negation > filter && bitfieldContains(filters, negation)) {
      throw new FilterInvalidError(
        `Filters '${filterToString(filter)}' and '${filterToString(negation)}' cannot be combined`
      );
    }
  }
}

/**
 * Filter names as passed to scripts, e.g. `['installed', '~devel']`
 */
export function filterNames(filters: Bitfield): string[] {
  return bitfieldToEnums(filters)
    .filter((filter) => filter !== Filter.NONE)
    .map(filterToString);
}

export function transactionFlagNames(flags: Bitfield): string[] {
  return bitfieldToEnums(flags)
    .filter((flag) => flag !== TransactionFlag.NONE)
    .map(transactionFlagToString);
}

/**
 * @throws InvalidArgumentError on an empty list
 * @throws PackageIdInvalidError on the first malformed id
 */
export function parsePackageIds(packageIds: readonly string[]): PackageIdParts[] {
  if (packageIds.length === 0) {
    throw new InvalidArgumentError('No package ids given');
  }
  return packageIds.map(parsePackageId);
}

/**
 * @throws InvalidArgumentError when `values` is empty or only blank entries
 */
export function requireValues(values: readonly string[], what: string): string[] {
  const kept = values.map((value) => value.trim()).filter((value) => value.length > 0);
  if (kept.length === 0) {
    throw new InvalidArgumentError(`No ${what} given`);
  }
  return kept;
}

export function packageIdOf(record: PackageRecord): string {
  return buildPackageId({
    name: record.name,
    version: record.version,
    arch: record.arch,
    data: record.data,
  });
}

/**
 * Emit one package item per record. Records without an `info` get `fallback`.
 * With `progress`, the percentage follows the item count.
 */
export function emitPackages(
  job: TrackedJob,
  records: readonly PackageRecord[],
  fallback: Info,
  progress = false
): void {
  records.forEach((record, index) => {
    job.package(record.info ?? fallback, packageIdOf(record), record.summary);
    if (progress) {
      job.setPercentage(((index + 1) * 100) / records.length);
    }
  });
}
