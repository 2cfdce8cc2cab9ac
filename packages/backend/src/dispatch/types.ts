/**
 * @module @pkbridge/backend/dispatch/types
 *
 * Per-role arguments and the handler contract.
 */

import { Role } from '@pkbridge/backend-contracts';
import type { BackendLogger, Bitfield } from '@pkbridge/backend-contracts';
import type { EmbeddedRuntime } from '@pkbridge/script-runtime';
import type { TrackedJob } from './tracked-job.js';

export interface FilteredArgs {
  filters: Bitfield;
}

export interface SearchArgs extends FilteredArgs {
  values: readonly string[];
}

export interface ResolveArgs extends FilteredArgs {
  packages: readonly string[];
}

export interface PackageIdsArgs {
  packageIds: readonly string[];
}

export interface LocalFilesArgs {
  files: readonly string[];
}

export interface DepsArgs extends FilteredArgs, PackageIdsArgs {
  recursive: boolean;
}

export interface TransactionArgs {
  transactionFlags: Bitfield;
}

export interface InstallArgs extends TransactionArgs, PackageIdsArgs {}

export interface InstallFilesArgs extends TransactionArgs, LocalFilesArgs {}

export interface RemoveArgs extends TransactionArgs, PackageIdsArgs {
  allowDeps: boolean;
  autoremove: boolean;
}

export interface RefreshArgs {
  force: boolean;
}

export interface RepoEnableArgs {
  repoId: string;
  enabled: boolean;
}

export interface RepoSetDataArgs {
  repoId: string;
  parameter: string;
  value: string;
}

export interface RepoRemoveArgs extends TransactionArgs {
  repoId: string;
  autoremove: boolean;
}

export interface DownloadArgs extends PackageIdsArgs {
  directory: string;
}

/**
 * Arguments of every role the backend has an entry point for
 */
export interface RoleArgsMap {
  [Role.SEARCH_NAME]: SearchArgs;
  [Role.SEARCH_DETAILS]: SearchArgs;
  [Role.SEARCH_FILE]: SearchArgs;
  [Role.SEARCH_GROUP]: SearchArgs;
  [Role.GET_PACKAGES]: FilteredArgs;
  [Role.RESOLVE]: ResolveArgs;
  [Role.WHAT_PROVIDES]: SearchArgs;
  [Role.GET_DETAILS]: PackageIdsArgs;
  [Role.GET_DETAILS_LOCAL]: LocalFilesArgs;
  [Role.GET_FILES]: PackageIdsArgs;
  [Role.GET_FILES_LOCAL]: LocalFilesArgs;
  [Role.DEPENDS_ON]: DepsArgs;
  [Role.REQUIRED_BY]: DepsArgs;
  [Role.INSTALL_PACKAGES]: InstallArgs;
  [Role.INSTALL_FILES]: InstallFilesArgs;
  [Role.REMOVE_PACKAGES]: RemoveArgs;
  [Role.REFRESH_CACHE]: RefreshArgs;
  [Role.GET_REPO_LIST]: FilteredArgs;
  [Role.REPO_ENABLE]: RepoEnableArgs;
  [Role.REPO_SET_DATA]: RepoSetDataArgs;
  [Role.REPO_REMOVE]: RepoRemoveArgs;
  [Role.GET_UPDATES]: FilteredArgs;
  [Role.GET_UPDATE_DETAIL]: PackageIdsArgs;
  [Role.UPDATE_PACKAGES]: InstallArgs;
  [Role.DOWNLOAD_PACKAGES]: DownloadArgs;
  [Role.REPAIR_SYSTEM]: TransactionArgs;
}

export type HandledRole = keyof RoleArgsMap;

/**
 * Everything a handler gets for one job.
 */
export interface HandlerContext<R extends HandledRole> {
  role: R;
  job: TrackedJob;
  args: RoleArgsMap[R];
  /**
   * The shared runtime. Throws when it is not usable (never started,
   * failed to start, destroyed); the dispatcher turns that into a failed job.
   */
  runtime(): EmbeddedRuntime;
  logger: BackendLogger;
}

/**
 * A role handler runs synchronously. It may finalize the job itself;
 * otherwise the dispatcher finishes it on return, or fails it on throw.
 */
export type RoleHandler<R extends HandledRole> = (ctx: HandlerContext<R>) => void;

export type HandlerRegistry = {
  [R in HandledRole]?: RoleHandler<R>;
};
