/**
 * @module @pkbridge/backend/bridge-module
 *
 * Plugin functions exposed to runtime scripts as `require('<module name>')`.
 * Arguments come from scripts and are checked before use.
 */

import { buildPackageId } from '@pkbridge/backend-contracts';
import type { BackendLogger } from '@pkbridge/backend-contracts';
import { BACKEND_NAME } from './capabilities.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

/**
 * Bridge module contents. A type alias, so that it stays assignable to
 * `BridgeModule`.
 */
export type ScriptBridge = {
  backendName: string;
  /**
   * `log(level, message)`; unknown levels log at info
   */
  log(level: unknown, message: unknown): void;
  /**
   * `packageId(name, version, arch, data)` → `name;version;arch;data`
   */
  packageId(name: unknown, version: unknown, arch: unknown, data: unknown): string;
};

export function createBridgeModule(logger: BackendLogger): ScriptBridge {
  const scriptLogger = logger.child({ layer: 'script' });

  return {
    backendName: BACKEND_NAME,

    log(level: unknown, message: unknown): void {
      scriptLogger[isLogLevel(level) ? level : 'info'](asText(message));
    },

    packageId(name: unknown, version: unknown, arch: unknown, data: unknown): string {
      return buildPackageId({
        name: asText(name),
        version: asText(version ?? ''),
        arch: asText(arch ?? ''),
        data: asText(data ?? ''),
      });
    },
  };
}
