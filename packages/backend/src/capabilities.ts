/**
 * @module @pkbridge/backend/capabilities
 *
 * What the backend advertises to the daemon at load time. Pure; callable
 * before `initialize()`.
 *
 * Roles are computed by exclusion (every role except a deny-list), so a
 * role added to the enumeration is advertised by default. Filters are an
 * explicit allow-list. Keep the two policies as they are.
 */

import {
  EMPTY_BITFIELD,
  Filter,
  Group,
  Role,
  bitfieldFromEnums,
  bitfieldToEnums,
  enumValues,
} from '@pkbridge/backend-contracts';
import type { Bitfield } from '@pkbridge/backend-contracts';

export const BACKEND_NAME = 'pkbridge';
export const BACKEND_AUTHOR = 'The pkbridge authors';
export const BACKEND_DESCRIPTION = 'Package manager scripts in an embedded runtime';

/**
 * Roles never advertised
 */
export const UNSUPPORTED_ROLES: ReadonlySet<Role> = new Set([
  Role.UNKNOWN,
  Role.ACCEPT_EULA,
  Role.CANCEL,
  Role.GET_OLD_TRANSACTIONS,
]);

export const SUPPORTED_FILTERS: readonly Filter[] = [Filter.DEVELOPMENT, Filter.GUI, Filter.INSTALLED];

const MIME_TYPES: ReadonlyArray<string | null> = [null];

export function getAuthor(): string {
  return BACKEND_AUTHOR;
}

export function getName(): string {
  return BACKEND_NAME;
}

export function getDescription(): string {
  return BACKEND_DESCRIPTION;
}

/**
 * Every group except the reserved `UNKNOWN`.
 */
export function getGroups(): Bitfield {
  return bitfieldFromEnums(...enumValues(Group).filter((group) => group !== Group.UNKNOWN));
}

export function getRoles(): Bitfield {
  return bitfieldFromEnums(...enumValues(Role).filter((role) => !UNSUPPORTED_ROLES.has(role)));
}

export function getFilters(): Bitfield {
  return bitfieldFromEnums(...SUPPORTED_FILTERS);
}

export function getProvides(): Bitfield {
  return EMPTY_BITFIELD;
}

/**
 * Null-terminated, and a fresh copy on every call.
 */
export function getMimeTypes(): Array<string | null> {
  return [...MIME_TYPES];
}

/**
 * Always false. Jobs run one at a time and the daemon relies on it.
 */
export function supportsParallelization(): false {
  return false;
}

/**
 * Roles that `getRoles()` advertises but that have no handler. These are
 * picked up automatically by the deny-list policy without anyone having
 * implemented them.
 */
export function unreviewedRoles(handled: ReadonlySet<Role>): Role[] {
  return bitfieldToEnums(getRoles()).filter((role) => !handled.has(role));
}
