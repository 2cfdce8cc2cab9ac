import type {
  BackendJob,
  ErrorCodeType,
  Info,
  PackageDetails,
  RepoDetail,
  Status,
  UpdateDetail,
} from '@pkbridge/backend-contracts';

export interface RecordedPackage {
  info: Info;
  packageId: string;
  summary: string;
}

export interface RecordedError {
  code: ErrorCodeType;
  message: string;
}

export type JobEvent =
  | 'package'
  | 'details'
  | 'files'
  | 'repo-detail'
  | 'update-detail'
  | 'status'
  | 'percentage'
  | 'error-code'
  | 'finished';

/**
 * Host job stand-in that records every callback, in order.
 */
export class RecordingJob implements BackendJob {
  readonly events: JobEvent[] = [];
  readonly packages: RecordedPackage[] = [];
  readonly detailItems: PackageDetails[] = [];
  readonly fileItems: Array<{ packageId: string; files: string[] }> = [];
  readonly repos: RepoDetail[] = [];
  readonly updateDetails: UpdateDetail[] = [];
  readonly statuses: Status[] = [];
  readonly percentages: number[] = [];
  readonly errors: RecordedError[] = [];
  finishedCount = 0;

  package(info: Info, packageId: string, summary: string): void {
    this.events.push('package');
    this.packages.push({ info, packageId, summary });
  }

  details(details: PackageDetails): void {
    this.events.push('details');
    this.detailItems.push(details);
  }

  files(packageId: string, files: readonly string[]): void {
    this.events.push('files');
    this.fileItems.push({ packageId, files: [...files] });
  }

  repoDetail(detail: RepoDetail): void {
    this.events.push('repo-detail');
    this.repos.push(detail);
  }

  updateDetail(detail: UpdateDetail): void {
    this.events.push('update-detail');
    this.updateDetails.push(detail);
  }

  setStatus(status: Status): void {
    this.events.push('status');
    this.statuses.push(status);
  }

  setPercentage(percentage: number): void {
    this.events.push('percentage');
    this.percentages.push(percentage);
  }

  errorCode(code: ErrorCodeType, message: string): void {
    this.events.push('error-code');
    this.errors.push({ code, message });
  }

  finished(): void {
    this.events.push('finished');
    this.finishedCount++;
  }

  /**
   * `finished` when the job ended cleanly, `failed` when an error code
   * preceded the finish, `pending` when the job was never finalized.
   */
  get outcome(): 'pending' | 'finished' | 'failed' {
    if (this.finishedCount === 0) {
      return 'pending';
    }
    return this.errors.length > 0 ? 'failed' : 'finished';
  }
}
