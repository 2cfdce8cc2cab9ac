/**
 * @pkbridge/backend
 *
 * Package-daemon backend that delegates package management to scripts
 * running in an embedded runtime.
 */

export { Backend, createBackend } from './backend.js';
export type { BackendOptions, RuntimeFactory } from './backend.js';

export {
  BACKEND_NAME,
  BACKEND_AUTHOR,
  BACKEND_DESCRIPTION,
  UNSUPPORTED_ROLES,
  SUPPORTED_FILTERS,
  getAuthor,
  getName,
  getDescription,
  getGroups,
  getRoles,
  getFilters,
  getProvides,
  getMimeTypes,
  supportsParallelization,
  unreviewedRoles,
} from './capabilities.js';

export { CONFIG_GROUP, backendConfigSchema, loadBackendConfig } from './config.js';
export type { BackendConfig } from './config.js';

export { createBackendLogger } from './logging.js';
export type { BackendLoggerOptions } from './logging.js';

export { createBridgeModule } from './bridge-module.js';
export type { ScriptBridge } from './bridge-module.js';

export { JobDispatcher, RUNTIME_FREE_ROLES } from './dispatch/dispatcher.js';
export type { JobDispatcherOptions } from './dispatch/dispatcher.js';
export { TrackedJob, PERCENTAGE_UNKNOWN } from './dispatch/tracked-job.js';
export type { JobState } from './dispatch/tracked-job.js';
export type {
  HandledRole,
  HandlerContext,
  HandlerRegistry,
  RoleArgsMap,
  RoleHandler,
} from './dispatch/types.js';

export { defaultHandlers } from './handlers/index.js';

export { createJobId } from './utils.js';
