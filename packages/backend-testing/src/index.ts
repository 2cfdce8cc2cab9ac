/**
 * Testing utilities for the backend bridge
 * @module @pkbridge/backend-testing
 */

export { RecordingJob } from './recording-job.js';
export type { RecordedPackage, RecordedError, JobEvent } from './recording-job.js';

export { FakeRuntime } from './fake-runtime.js';
export type { FakeFunction, FakeCall } from './fake-runtime.js';

export { MemoryKeyFile } from './memory-key-file.js';

export { MemoryLogger } from './memory-logger.js';
export type { LogEntry, LogLevel } from './memory-logger.js';
