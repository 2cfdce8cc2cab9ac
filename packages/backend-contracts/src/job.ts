/**
 * @module @pkbridge/backend-contracts/job
 *
 * Host-side job surface. A `BackendJob` is owned by the daemon and is valid
 * for exactly one role invocation.
 */

import type { ErrorCodeType } from './errors.js';
import type { Group, Info, Status } from './enums.js';

export interface PackageDetails {
  packageId: string;
  summary: string;
  description: string;
  url: string;
  license: string;
  group: Group;
  /** Bytes */
  size: number;
}

export interface RepoDetail {
  repoId: string;
  description: string;
  enabled: boolean;
}

export interface UpdateDetail {
  packageId: string;
  updates: string[];
  obsoletes: string[];
  vendorUrls: string[];
  bugzillaUrls: string[];
  cveUrls: string[];
  updateText: string;
  changelog: string;
  /** ISO 8601 */
  issued?: string;
  /** ISO 8601 */
  updated?: string;
}

/**
 * Callbacks the daemon exposes on a job handle.
 *
 * A failed job is reported as `errorCode()` followed by `finished()`.
 */
export interface BackendJob {
  package(info: Info, packageId: string, summary: string): void;
  details(details: PackageDetails): void;
  files(packageId: string, files: readonly string[]): void;
  repoDetail(detail: RepoDetail): void;
  updateDetail(detail: UpdateDetail): void;
  setStatus(status: Status): void;
  /**
   * 0-100, or 101 when progress is unknown
   */
  setPercentage(percentage: number): void;
  errorCode(code: ErrorCodeType, message: string): void;
  finished(): void;
}

/**
 * Opaque daemon configuration (a key file). Passed through unmodified.
 */
export interface KeyFile {
  getString(group: string, key: string): string | undefined;
}
