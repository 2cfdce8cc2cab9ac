/**
 * @module @pkbridge/backend-contracts/package-id
 *
 * Package ids have the form `name;version;arch;data`. `data` is the
 * repository the package comes from, or `installed`.
 */

import { PackageIdInvalidError } from './errors.js';

export interface PackageIdParts {
  name: string;
  version: string;
  arch: string;
  data: string;
}

const SEPARATOR = ';';

export function buildPackageId(parts: PackageIdParts): string {
  const sections = [parts.name, parts.version, parts.arch, parts.data];
  const joined = sections.join(SEPARATOR);
  if (parts.name.length === 0) {
    throw new PackageIdInvalidError(joined, 'name is empty');
  }
  if (sections.some((section) => section.includes(SEPARATOR))) {
    throw new PackageIdInvalidError(joined, `sections must not contain '${SEPARATOR}'`);
  }
  return joined;
}

export function parsePackageId(packageId: string): PackageIdParts {
  const sections = packageId.split(SEPARATOR);
  if (sections.length !== 4) {
    throw new PackageIdInvalidError(packageId, `expected 4 sections, got ${sections.length}`);
  }
  const [name, version, arch, data] = sections;
  if (name.length === 0) {
    throw new PackageIdInvalidError(packageId, 'name is empty');
  }
  return { name, version, arch, data };
}

export function isValidPackageId(packageId: string): boolean {
  const sections = packageId.split(SEPARATOR);
  return sections.length === 4 && sections[0].length > 0;
}
