import { RuntimeCallError, RuntimeUnavailableError, ErrorCode } from '@pkbridge/backend-contracts';
import type { BridgeModule, EmbeddedRuntime } from '@pkbridge/script-runtime';

export type FakeFunction = (...args: unknown[]) => unknown;

export interface FakeCall {
  functionName: string;
  args: unknown[];
}

/**
 * In-process stand-in for an embedded runtime. Functions are plain
 * closures registered with `define()`.
 */
export class FakeRuntime implements EmbeddedRuntime {
  readonly modules = new Map<string, BridgeModule>();
  readonly calls: FakeCall[] = [];
  started = false;
  stopped = false;
  private readonly functions = new Map<string, FakeFunction>();
  private startError: Error | undefined;

  define(functionName: string, fn: FakeFunction): this {
    this.functions.set(functionName, fn);
    return this;
  }

  failStartWith(error: Error): this {
    this.startError = error;
    return this;
  }

  registerModule(name: string, exports: BridgeModule): void {
    this.modules.set(name, exports);
  }

  start(): void {
    if (this.startError) {
      throw this.startError;
    }
    this.started = true;
  }

  call(functionName: string, args: readonly unknown[]): unknown {
    if (!this.started || this.stopped) {
      throw new RuntimeUnavailableError('Fake runtime is not running');
    }
    this.calls.push({ functionName, args: [...args] });
    const fn = this.functions.get(functionName);
    if (!fn) {
      throw new RuntimeCallError(functionName, `Runtime function '${functionName}' is not defined`, ErrorCode.NOT_SUPPORTED);
    }
    return fn(...args);
  }

  stop(): void {
    this.stopped = true;
  }
}
