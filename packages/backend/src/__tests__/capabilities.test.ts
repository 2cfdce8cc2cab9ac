import { describe, it, expect } from 'vitest';
import {
  Filter,
  Group,
  Role,
  bitfieldContains,
  bitfieldToEnums,
  filterBitfieldToString,
} from '@pkbridge/backend-contracts';
import {
  getAuthor,
  getDescription,
  getFilters,
  getGroups,
  getMimeTypes,
  getName,
  getProvides,
  getRoles,
  supportsParallelization,
  unreviewedRoles,
} from '../capabilities.js';

describe('capabilities', () => {
  it('should identify the backend', () => {
    expect(getName()).toBe('pkbridge');
    expect(getAuthor()).toBe('The pkbridge authors');
    expect(getDescription()).toBe('Package manager scripts in an embedded runtime');
  });

  it('should advertise every group except unknown', () => {
    const groups = bitfieldToEnums(getGroups());
    expect(groups).toHaveLength(34);
    expect(groups[0]).toBe(Group.ACCESSIBILITY);
    expect(bitfieldContains(getGroups(), Group.UNKNOWN)).toBe(false);
    expect(bitfieldContains(getGroups(), Group.NEWEST)).toBe(true);
  });

  it('should advertise every role outside the deny-list', () => {
    const roles = getRoles();
    for (const denied of [Role.UNKNOWN, Role.CANCEL, Role.ACCEPT_EULA, Role.GET_OLD_TRANSACTIONS]) {
      expect(bitfieldContains(roles, denied)).toBe(false);
    }
    expect(bitfieldContains(roles, Role.SEARCH_NAME)).toBe(true);
    expect(bitfieldContains(roles, Role.REPAIR_SYSTEM)).toBe(true);
    expect(bitfieldContains(roles, Role.REPO_REMOVE)).toBe(true);
    expect(bitfieldToEnums(roles)).toHaveLength(30);
  });

  it('should advertise only installed, development and gui filters', () => {
    expect(getFilters()).toBe(84n);
    expect(filterBitfieldToString(getFilters())).toBe('installed;devel;gui');
    expect(bitfieldContains(getFilters(), Filter.NOT_INSTALLED)).toBe(false);
  });

  it('should provide nothing', () => {
    expect(getProvides()).toBe(0n);
  });

  it('should return a fresh null-terminated mime type list', () => {
    const first = getMimeTypes();
    expect(first).toEqual([null]);

    first.push('application/x-test');
    expect(getMimeTypes()).toEqual([null]);
  });

  it('should never support parallelization', () => {
    expect(supportsParallelization()).toBe(false);
  });

  it('should list advertised roles without a handler', () => {
    const handled = new Set(bitfieldToEnums(getRoles()).filter((role) => role !== Role.INSTALL_SIGNATURE));

    expect(unreviewedRoles(handled)).toEqual([Role.INSTALL_SIGNATURE]);
    expect(unreviewedRoles(new Set())).toHaveLength(30);
  });
});
