import { describe, it, expect } from 'vitest';
import { buildPackageId, isValidPackageId, parsePackageId } from '../package-id.js';
import { PackageIdInvalidError } from '../errors.js';

describe('package ids', () => {
  it('should build name;version;arch;data', () => {
    expect(buildPackageId({ name: 'nano', version: '7.2-1', arch: 'x86_64', data: 'main' })).toBe(
      'nano;7.2-1;x86_64;main'
    );
  });

  it('should allow empty trailing sections', () => {
    expect(buildPackageId({ name: 'nano', version: '', arch: '', data: '' })).toBe('nano;;;');
  });

  it('should reject an empty name', () => {
    expect(() => buildPackageId({ name: '', version: '1', arch: 'noarch', data: '' })).toThrow(
      PackageIdInvalidError
    );
  });

  it('should reject separators inside sections', () => {
    expect(() => buildPackageId({ name: 'a;b', version: '1', arch: 'noarch', data: '' })).toThrow(
      "Invalid package id 'a;b;1;noarch;': sections must not contain ';'"
    );
  });

  it('should parse a valid id', () => {
    expect(parsePackageId('vim;9.0;x86_64;installed')).toEqual({
      name: 'vim',
      version: '9.0',
      arch: 'x86_64',
      data: 'installed',
    });
  });

  it('should reject the wrong number of sections', () => {
    try {
      parsePackageId('vim;9.0');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PackageIdInvalidError);
      expect(error).toMatchObject({ code: 'package-id-invalid', packageId: 'vim;9.0' });
    }
  });

  it('should validate without throwing', () => {
    expect(isValidPackageId('vim;9.0;x86_64;main')).toBe(true);
    expect(isValidPackageId(';9.0;x86_64;main')).toBe(false);
    expect(isValidPackageId('vim')).toBe(false);
  });
});
