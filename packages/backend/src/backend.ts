/**
 * @module @pkbridge/backend/backend
 *
 * Backend - the surface the package daemon loads.
 *
 * Capability queries are answered without the runtime. `initialize()` brings
 * the embedded runtime up once per process; every role entry point then
 * dispatches one job and returns after the job is finalized. No error
 * escapes a role entry point.
 *
 * @example
 * ```typescript
 * const backend = createBackend();
 * backend.initialize(keyFile);
 * backend.searchName(job, filters, ['vim']);
 * backend.destroy();
 * ```
 */

import { Role } from '@pkbridge/backend-contracts';
import type { BackendJob, BackendLogger, Bitfield, KeyFile } from '@pkbridge/backend-contracts';
import { RuntimeLifecycle, VmScriptRuntime } from '@pkbridge/script-runtime';
import type { EmbeddedRuntime, RuntimeStatus } from '@pkbridge/script-runtime';
import { createBridgeModule } from './bridge-module.js';
import * as capabilities from './capabilities.js';
import { loadBackendConfig } from './config.js';
import type { BackendConfig } from './config.js';
import { JobDispatcher } from './dispatch/dispatcher.js';
import type { HandlerRegistry } from './dispatch/types.js';
import { defaultHandlers } from './handlers/index.js';
import { createBackendLogger } from './logging.js';

export type RuntimeFactory = (config: BackendConfig, logger: BackendLogger) => EmbeddedRuntime;

export interface BackendOptions {
  /**
   * Environment consulted for `PKBRIDGE_*` overrides (default `process.env`)
   */
  env?: NodeJS.ProcessEnv;
  /**
   * Builds the embedded runtime from resolved settings.
   * Defaults to a `VmScriptRuntime` over `ScriptsDir`.
   */
  createRuntime?: RuntimeFactory;
  handlers?: HandlerRegistry;
  logger?: BackendLogger;
}

const createVmRuntime: RuntimeFactory = (config, logger) =>
  new VmScriptRuntime({
    scriptsDir: config.scriptsDir,
    timeoutMs: config.callTimeoutMs,
    logger,
  });

export class Backend {
  private readonly env: NodeJS.ProcessEnv;
  private readonly createRuntime: RuntimeFactory;
  private readonly logger: BackendLogger;
  private readonly lifecycle: RuntimeLifecycle;
  private readonly dispatcher: JobDispatcher;

  constructor(options: BackendOptions = {}) {
    this.env = options.env ?? process.env;
    this.createRuntime = options.createRuntime ?? createVmRuntime;
    this.logger = options.logger ?? createBackendLogger();
    this.lifecycle = new RuntimeLifecycle(this.logger);
    this.dispatcher = new JobDispatcher({
      lifecycle: this.lifecycle,
      handlers: options.handlers ?? defaultHandlers,
      logger: this.logger,
    });
  }

  // --- Identification and capabilities ---

  getAuthor(): string {
    return capabilities.getAuthor();
  }

  getName(): string {
    return capabilities.getName();
  }

  getDescription(): string {
    return capabilities.getDescription();
  }

  getGroups(): Bitfield {
    return capabilities.getGroups();
  }

  getRoles(): Bitfield {
    return capabilities.getRoles();
  }

  getFilters(): Bitfield {
    return capabilities.getFilters();
  }

  getProvides(): Bitfield {
    return capabilities.getProvides();
  }

  getMimeTypes(): Array<string | null> {
    return capabilities.getMimeTypes();
  }

  supportsParallelization(): boolean {
    return capabilities.supportsParallelization();
  }

  // --- Lifecycle ---

  get runtimeStatus(): RuntimeStatus {
    return this.lifecycle.status;
  }

  /**
   * Read settings from `keyFile` and start the runtime. Never throws; a
   * failed start is reported by every later job.
   */
  initialize(keyFile: KeyFile): void {
    const first = this.lifecycle.status === 'uninitialized';
    this.logger.info('Initializing backend', { name: capabilities.getName() });
    this.lifecycle.initialize(() => {
      const config = loadBackendConfig(keyFile, this.env);
      this.logger.debug('Backend configuration', { ...config });
      return {
        runtime: this.createRuntime(config, this.logger),
        moduleName: config.moduleName,
        bridge: createBridgeModule(this.logger),
      };
    });
    if (!first) {
      return;
    }

    const unreviewed = capabilities.unreviewedRoles(this.dispatcher.handledRoles());
    if (unreviewed.length > 0) {
      this.logger.warn('Advertised roles without a handler', {
        roles: unreviewed.map((role) => Role[role]),
      });
    }
  }

  /**
   * @throws LifecycleError before `initialize()` or on a second call
   */
  destroy(): void {
    this.logger.info('Destroying backend');
    this.lifecycle.destroy();
  }

  // --- Queries ---

  searchName(job: BackendJob, filters: Bitfield, values: readonly string[]): void {
    this.dispatcher.dispatch(Role.SEARCH_NAME, job, { filters, values });
  }

  searchDetails(job: BackendJob, filters: Bitfield, values: readonly string[]): void {
    this.dispatcher.dispatch(Role.SEARCH_DETAILS, job, { filters, values });
  }

  searchFile(job: BackendJob, filters: Bitfield, values: readonly string[]): void {
    this.dispatcher.dispatch(Role.SEARCH_FILE, job, { filters, values });
  }

  searchGroup(job: BackendJob, filters: Bitfield, values: readonly string[]): void {
    this.dispatcher.dispatch(Role.SEARCH_GROUP, job, { filters, values });
  }

  getPackages(job: BackendJob, filters: Bitfield): void {
    this.dispatcher.dispatch(Role.GET_PACKAGES, job, { filters });
  }

  resolve(job: BackendJob, filters: Bitfield, packages: readonly string[]): void {
    this.dispatcher.dispatch(Role.RESOLVE, job, { filters, packages });
  }

  whatProvides(job: BackendJob, filters: Bitfield, values: readonly string[]): void {
    this.dispatcher.dispatch(Role.WHAT_PROVIDES, job, { filters, values });
  }

  getDetails(job: BackendJob, packageIds: readonly string[]): void {
    this.dispatcher.dispatch(Role.GET_DETAILS, job, { packageIds });
  }

  getDetailsLocal(job: BackendJob, files: readonly string[]): void {
    this.dispatcher.dispatch(Role.GET_DETAILS_LOCAL, job, { files });
  }

  getFiles(job: BackendJob, packageIds: readonly string[]): void {
    this.dispatcher.dispatch(Role.GET_FILES, job, { packageIds });
  }

  getFilesLocal(job: BackendJob, files: readonly string[]): void {
    this.dispatcher.dispatch(Role.GET_FILES_LOCAL, job, { files });
  }

  dependsOn(job: BackendJob, filters: Bitfield, packageIds: readonly string[], recursive: boolean): void {
    this.dispatcher.dispatch(Role.DEPENDS_ON, job, { filters, packageIds, recursive });
  }

  requiredBy(job: BackendJob, filters: Bitfield, packageIds: readonly string[], recursive: boolean): void {
    this.dispatcher.dispatch(Role.REQUIRED_BY, job, { filters, packageIds, recursive });
  }

  getUpdates(job: BackendJob, filters: Bitfield): void {
    this.dispatcher.dispatch(Role.GET_UPDATES, job, { filters });
  }

  getUpdateDetail(job: BackendJob, packageIds: readonly string[]): void {
    this.dispatcher.dispatch(Role.GET_UPDATE_DETAIL, job, { packageIds });
  }

  // --- Transactions ---

  installPackages(job: BackendJob, transactionFlags: Bitfield, packageIds: readonly string[]): void {
    this.dispatcher.dispatch(Role.INSTALL_PACKAGES, job, { transactionFlags, packageIds });
  }

  installFiles(job: BackendJob, transactionFlags: Bitfield, files: readonly string[]): void {
    this.dispatcher.dispatch(Role.INSTALL_FILES, job, { transactionFlags, files });
  }

  removePackages(
    job: BackendJob,
    transactionFlags: Bitfield,
    packageIds: readonly string[],
    allowDeps: boolean,
    autoremove: boolean
  ): void {
    this.dispatcher.dispatch(Role.REMOVE_PACKAGES, job, { transactionFlags, packageIds, allowDeps, autoremove });
  }

  updatePackages(job: BackendJob, transactionFlags: Bitfield, packageIds: readonly string[]): void {
    this.dispatcher.dispatch(Role.UPDATE_PACKAGES, job, { transactionFlags, packageIds });
  }

  downloadPackages(job: BackendJob, packageIds: readonly string[], directory: string): void {
    this.dispatcher.dispatch(Role.DOWNLOAD_PACKAGES, job, { packageIds, directory });
  }

  refreshCache(job: BackendJob, force: boolean): void {
    this.dispatcher.dispatch(Role.REFRESH_CACHE, job, { force });
  }

  repairSystem(job: BackendJob, transactionFlags: Bitfield): void {
    this.dispatcher.dispatch(Role.REPAIR_SYSTEM, job, { transactionFlags });
  }

  // --- Repositories ---

  getRepoList(job: BackendJob, filters: Bitfield): void {
    this.dispatcher.dispatch(Role.GET_REPO_LIST, job, { filters });
  }

  repoEnable(job: BackendJob, repoId: string, enabled: boolean): void {
    this.dispatcher.dispatch(Role.REPO_ENABLE, job, { repoId, enabled });
  }

  repoSetData(job: BackendJob, repoId: string, parameter: string, value: string): void {
    this.dispatcher.dispatch(Role.REPO_SET_DATA, job, { repoId, parameter, value });
  }

  repoRemove(job: BackendJob, transactionFlags: Bitfield, repoId: string, autoremove: boolean): void {
    this.dispatcher.dispatch(Role.REPO_REMOVE, job, { transactionFlags, repoId, autoremove });
  }
}

export function createBackend(options: BackendOptions = {}): Backend {
  return new Backend(options);
}
