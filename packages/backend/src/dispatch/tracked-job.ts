/**
 * @module @pkbridge/backend/dispatch/tracked-job
 *
 * TrackedJob - wraps the daemon's job handle for one invocation and enforces
 * its state machine:
 *
 * ```
 * received ──start()──▶ running ──finish()──▶ finished
 *                          └─────fail()─────▶ failed
 * ```
 *
 * Exactly one terminal signal reaches the daemon. A second finalization is
 * dropped and logged; so is anything emitted after it.
 */

import { statusToString } from '@pkbridge/backend-contracts';
import type {
  BackendJob,
  BackendLogger,
  ErrorCodeType,
  Info,
  PackageDetails,
  RepoDetail,
  Status,
  UpdateDetail,
} from '@pkbridge/backend-contracts';

export type JobState = 'received' | 'running' | 'finished' | 'failed';

/**
 * Reported to the daemon when progress cannot be estimated
 */
export const PERCENTAGE_UNKNOWN = 101;

export class TrackedJob {
  private _state: JobState = 'received';
  private _emitted = 0;

  constructor(
    private readonly job: BackendJob,
    readonly id: string,
    private readonly logger: BackendLogger
  ) {}

  get state(): JobState {
    return this._state;
  }

  get isFinal(): boolean {
    return this._state === 'finished' || this._state === 'failed';
  }

  /**
   * Result items (packages, details, files, repos, update details) emitted
   */
  get emitted(): number {
    return this._emitted;
  }

  start(): void {
    if (this._state !== 'received') {
      throw new Error(`Job ${this.id} cannot start from state '${this._state}'`);
    }
    this._state = 'running';
  }

  package(info: Info, packageId: string, summary: string): void {
    if (this.accepts('package')) {
      this.job.package(info, packageId, summary);
      this._emitted++;
    }
  }

  details(details: PackageDetails): void {
    if (this.accepts('details')) {
      this.job.details(details);
      this._emitted++;
    }
  }

  files(packageId: string, files: readonly string[]): void {
    if (this.accepts('files')) {
      this.job.files(packageId, files);
      this._emitted++;
    }
  }

  repoDetail(detail: RepoDetail): void {
    if (this.accepts('repoDetail')) {
      this.job.repoDetail(detail);
      this._emitted++;
    }
  }

  updateDetail(detail: UpdateDetail): void {
    if (this.accepts('updateDetail')) {
      this.job.updateDetail(detail);
      this._emitted++;
    }
  }

  setStatus(status: Status): void {
    if (this.accepts('setStatus')) {
      this.logger.debug('Status', { status: statusToString(status) });
      this.job.setStatus(status);
    }
  }

  /**
   * Clamped to 0-100; `PERCENTAGE_UNKNOWN` passes through.
   */
  setPercentage(percentage: number): void {
    if (!this.accepts('setPercentage')) {
      return;
    }
    const value =
      percentage === PERCENTAGE_UNKNOWN ? percentage : Math.min(100, Math.max(0, Math.round(percentage)));
    this.job.setPercentage(value);
  }

  /**
   * @returns false when the job was already finalized
   */
  finish(): boolean {
    if (!this.finalizing('finished')) {
      return false;
    }
    this.job.finished();
    this.logger.debug('Job finished', { emitted: this._emitted });
    return true;
  }

  /**
   * Report `code` and finish. Counts as the single terminal signal.
   *
   * @returns false when the job was already finalized
   */
  fail(code: ErrorCodeType, message: string): boolean {
    if (!this.finalizing('failed')) {
      return false;
    }
    this.job.errorCode(code, message);
    this.job.finished();
    this.logger.warn('Job failed', { code, error: message });
    return true;
  }

  private accepts(signal: string): boolean {
    if (this.isFinal) {
      this.logger.warn('Dropped signal on finalized job', { signal, state: this._state });
      return false;
    }
    return true;
  }

  private finalizing(next: 'finished' | 'failed'): boolean {
    if (this.isFinal) {
      this.logger.error('Job already finalized', { state: this._state, attempted: next });
      return false;
    }
    this._state = next;
    return true;
  }
}
