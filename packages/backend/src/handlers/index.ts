/**
 * @module @pkbridge/backend/handlers
 *
 * Handler for every role the backend implements.
 */

import { Role } from '@pkbridge/backend-contracts';
import type { HandlerRegistry } from '../dispatch/types.js';
import { downloadPackages } from './download.js';
import { packageDetails, packageFiles } from './info.js';
import { installPackages } from './install.js';
import { listPackages, lookupPackages, packageDependencies } from './packages.js';
import { refreshCache } from './refresh.js';
import { removePackages } from './remove.js';
import { repairSystem } from './repair.js';
import { changeRepo, listRepos, removeRepo } from './repos.js';
import { search } from './search.js';
import { listUpdates, updateDetails, updatePackages } from './updates.js';

export const defaultHandlers: HandlerRegistry = {
  [Role.SEARCH_NAME]: search,
  [Role.SEARCH_DETAILS]: search,
  [Role.SEARCH_FILE]: search,
  [Role.SEARCH_GROUP]: search,
  [Role.GET_PACKAGES]: listPackages,
  [Role.RESOLVE]: lookupPackages,
  [Role.WHAT_PROVIDES]: lookupPackages,
  [Role.GET_DETAILS]: packageDetails,
  [Role.GET_DETAILS_LOCAL]: packageDetails,
  [Role.GET_FILES]: packageFiles,
  [Role.GET_FILES_LOCAL]: packageFiles,
  [Role.DEPENDS_ON]: packageDependencies,
  [Role.REQUIRED_BY]: packageDependencies,
  [Role.INSTALL_PACKAGES]: installPackages,
  [Role.INSTALL_FILES]: installPackages,
  [Role.REMOVE_PACKAGES]: removePackages,
  [Role.REFRESH_CACHE]: refreshCache,
  [Role.GET_REPO_LIST]: listRepos,
  [Role.REPO_ENABLE]: changeRepo,
  [Role.REPO_SET_DATA]: changeRepo,
  [Role.REPO_REMOVE]: removeRepo,
  [Role.GET_UPDATES]: listUpdates,
  [Role.GET_UPDATE_DETAIL]: updateDetails,
  [Role.UPDATE_PACKAGES]: updatePackages,
  [Role.DOWNLOAD_PACKAGES]: downloadPackages,
  [Role.REPAIR_SYSTEM]: repairSystem,
};
