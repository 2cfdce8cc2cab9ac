/**
 * @module @pkbridge/script-runtime/types
 */

/**
 * Functions and values the plugin exposes to runtime-side scripts.
 * Scripts reach it with `require(<module name>)`.
 */
export type BridgeModule = Readonly<Record<string, unknown>>;

/**
 * An embedded interpreter hosting the package manager logic.
 *
 * Calls are synchronous: `call()` returns once the script function has
 * returned or raised.
 */
export interface EmbeddedRuntime {
  /**
   * Register a bridge module. Only valid before `start()`.
   */
  registerModule(name: string, exports: BridgeModule): void;

  /**
   * Start the interpreter and load the package manager scripts.
   */
  start(): void;

  /**
   * Call a function exported by the loaded scripts.
   */
  call(functionName: string, args: readonly unknown[]): unknown;

  /**
   * Tear the interpreter down. Calls fail afterwards.
   */
  stop(): void;
}

/**
 * What the lifecycle manager needs to bring a runtime up.
 */
export interface RuntimeSetup {
  runtime: EmbeddedRuntime;
  moduleName: string;
  bridge: BridgeModule;
}
