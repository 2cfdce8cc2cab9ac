/**
 * @module @pkbridge/script-runtime/vm-runtime
 *
 * VmScriptRuntime - package manager scripts evaluated in one `node:vm`
 * context.
 *
 * ## Script contract
 *
 * Every `*.js` file in the scripts directory is evaluated once at start, in
 * file-name order, as a CommonJS-style module body:
 *
 * ```js
 * const bridge = require('pkbridge');
 * exports.getPackages = function (query) {
 *   bridge.log('debug', 'listing');
 *   return [{ name: 'nano', version: '7.2', arch: 'x86_64', data: 'main' }];
 * };
 * ```
 *
 * `require()` resolves registered bridge modules only. Exported functions
 * from all scripts share one namespace; a name exported twice fails start.
 *
 * Scripts, and every later call into them, run under the configured
 * timeout. Exported functions must be synchronous.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as vm from 'node:vm';
import {
  ErrorCode,
  LifecycleError,
  MalformedResultError,
  RuntimeCallError,
  RuntimeStartError,
  RuntimeUnavailableError,
  isErrorLike,
  isKnownErrorCode,
  isThenable,
  noopLogger,
} from '@pkbridge/backend-contracts';
import type { BackendLogger } from '@pkbridge/backend-contracts';
import type { BridgeModule, EmbeddedRuntime } from './types.js';

export interface VmScriptRuntimeOptions {
  scriptsDir: string;
  /**
   * Limit for loading one script and for each call (default 60000)
   */
  timeoutMs?: number;
  logger?: BackendLogger;
}

type RuntimeStatus = 'created' | 'running' | 'stopped';

interface RunningInstance {
  sandbox: Record<string, unknown>;
  context: vm.Context;
  invokeScript: vm.Script;
  functions: Map<string, Function>;
}

const SCRIPT_EXTENSION = '.js';
const MODULE_HOOK = '__pkbridgeModule';
const REQUIRE_HOOK = '__pkbridgeRequire';
const INVOKE_HOOK = '__pkbridgeInvoke';
const DEFAULT_TIMEOUT_MS = 60_000;

function describe(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

export class VmScriptRuntime implements EmbeddedRuntime {
  private readonly scriptsDir: string;
  private readonly timeoutMs: number;
  private readonly logger: BackendLogger;
  private readonly modules = new Map<string, BridgeModule>();
  private status: RuntimeStatus = 'created';
  private instance: RunningInstance | undefined;

  constructor(options: VmScriptRuntimeOptions) {
    this.scriptsDir = path.resolve(options.scriptsDir);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = (options.logger ?? noopLogger).child({ layer: 'script-runtime' });
  }

  /**
   * Names of the functions exported by the loaded scripts.
   */
  get functionNames(): string[] {
    return this.instance ? [...this.instance.functions.keys()].sort() : [];
  }

  registerModule(name: string, exports: BridgeModule): void {
    if (this.status !== 'created') {
      throw new LifecycleError(`Module '${name}' must be registered before the runtime starts`);
    }
    if (this.modules.has(name)) {
      throw new LifecycleError(`Module '${name}' is already registered`);
    }
    this.modules.set(name, Object.freeze({ ...exports }));
  }

  start(): void {
    if (this.status !== 'created') {
      throw new RuntimeStartError(`Runtime cannot start from state '${this.status}'`);
    }

    const files = this.listScripts();
    const sandbox: Record<string, unknown> = {};
    const context = vm.createContext(sandbox, { name: 'pkbridge-scripts' });
    const functions = new Map<string, Function>();

    for (const file of files) {
      this.loadScript(file, sandbox, context, functions);
    }

    this.instance = {
      sandbox,
      context,
      invokeScript: new vm.Script(`${INVOKE_HOOK}()`, { filename: 'pkbridge:invoke' }),
      functions,
    };
    this.status = 'running';
    this.logger.info('Script runtime started', {
      scriptsDir: this.scriptsDir,
      scripts: files.length,
      functions: functions.size,
    });
  }

  call(functionName: string, args: readonly unknown[]): unknown {
    const instance = this.instance;
    if (this.status !== 'running' || !instance) {
      throw new RuntimeUnavailableError(`Runtime is ${this.status}`, { functionName });
    }

    const fn = instance.functions.get(functionName);
    if (!fn) {
      throw new RuntimeCallError(
        functionName,
        `Runtime function '${functionName}' is not defined`,
        ErrorCode.NOT_SUPPORTED
      );
    }

    let result: unknown;
    instance.sandbox[INVOKE_HOOK] = () => {
      result = Reflect.apply(fn, undefined, [...args]);
    };

    try {
      instance.invokeScript.runInContext(instance.context, { timeout: this.timeoutMs });
    } catch (error) {
      throw new RuntimeCallError(
        functionName,
        describe(error),
        isErrorLike(error) && isKnownErrorCode(error.code) ? error.code : ErrorCode.INTERNAL_ERROR
      );
    } finally {
      delete instance.sandbox[INVOKE_HOOK];
    }

    if (isThenable(result)) {
      void result.then(undefined, (error: unknown) => {
        this.logger.warn('Asynchronous runtime function rejected', { functionName, error: describe(error) });
      });
      throw new MalformedResultError(functionName, 'returned a promise; runtime functions must be synchronous');
    }

    return result;
  }

  stop(): void {
    if (this.status === 'stopped') {
      return;
    }
    const wasRunning = this.status === 'running';
    this.instance = undefined;
    this.modules.clear();
    this.status = 'stopped';
    if (wasRunning) {
      this.logger.info('Script runtime stopped');
    }
  }

  private listScripts(): string[] {
    let entries: string[];
    try {
      entries = fs.readdirSync(this.scriptsDir);
    } catch (error) {
      throw new RuntimeStartError(`Cannot read scripts directory ${this.scriptsDir}: ${describe(error)}`, {
        scriptsDir: this.scriptsDir,
      });
    }

    const files = entries
      .filter((entry) => entry.endsWith(SCRIPT_EXTENSION))
      .sort()
      .map((entry) => path.join(this.scriptsDir, entry));

    if (files.length === 0) {
      throw new RuntimeStartError(`No scripts found in ${this.scriptsDir}`, { scriptsDir: this.scriptsDir });
    }
    return files;
  }

  private loadScript(
    file: string,
    sandbox: Record<string, unknown>,
    context: vm.Context,
    functions: Map<string, Function>
  ): void {
    const source = fs.readFileSync(file, 'utf8');
    const wrapped =
      `(function (exports, require, module) {\n${source}\n})` +
      `(${MODULE_HOOK}.exports, ${REQUIRE_HOOK}, ${MODULE_HOOK});`;
    const moduleObject: { exports: unknown } = { exports: {} };

    sandbox[MODULE_HOOK] = moduleObject;
    sandbox[REQUIRE_HOOK] = (name: unknown) => this.resolveModule(name);
    try {
      new vm.Script(wrapped, { filename: file, lineOffset: -1 }).runInContext(context, {
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new RuntimeStartError(`Failed to load ${path.basename(file)}: ${describe(error)}`, { file });
    } finally {
      delete sandbox[MODULE_HOOK];
      delete sandbox[REQUIRE_HOOK];
    }

    const exported = moduleObject.exports;
    if (typeof exported !== 'object' || exported === null) {
      throw new RuntimeStartError(`Script ${path.basename(file)} must export an object`, { file });
    }

    let count = 0;
    for (const [name, value] of Object.entries(exported)) {
      if (typeof value !== 'function') {
        continue;
      }
      if (functions.has(name)) {
        throw new RuntimeStartError(`Runtime function '${name}' is exported twice (again by ${path.basename(file)})`, {
          file,
          functionName: name,
        });
      }
      functions.set(name, value);
      count++;
    }
    this.logger.debug('Loaded script', { file: path.basename(file), functions: count });
  }

  private resolveModule(name: unknown): BridgeModule {
    const found = typeof name === 'string' ? this.modules.get(name) : undefined;
    if (!found) {
      throw new Error(`Cannot find module '${String(name)}'`);
    }
    return found;
  }
}
