/**
 * @pkbridge/script-runtime
 *
 * Embedded script runtime: the interpreter contract, the `node:vm`
 * implementation, its process-wide lifecycle, and typed calls into it.
 */

export type { BridgeModule, EmbeddedRuntime, RuntimeSetup } from './types.js';

export { VmScriptRuntime } from './vm-runtime.js';
export type { VmScriptRuntimeOptions } from './vm-runtime.js';

export { RuntimeLifecycle } from './lifecycle.js';
export type { RuntimeState, RuntimeStatus } from './lifecycle.js';

export { callRuntime } from './marshal.js';
