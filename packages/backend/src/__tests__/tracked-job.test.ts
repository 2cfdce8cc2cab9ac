import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode, Group, Info, Status, noopLogger } from '@pkbridge/backend-contracts';
import { RecordingJob } from '@pkbridge/backend-testing';
import { PERCENTAGE_UNKNOWN, TrackedJob } from '../dispatch/tracked-job.js';

describe('TrackedJob', () => {
  let host: RecordingJob;
  let job: TrackedJob;

  beforeEach(() => {
    host = new RecordingJob();
    job = new TrackedJob(host, 'job_1', noopLogger);
  });

  it('should move from received to running', () => {
    expect(job.state).toBe('received');
    job.start();
    expect(job.state).toBe('running');
    expect(() => job.start()).toThrow("Job job_1 cannot start from state 'running'");
  });

  it('should forward items and count them', () => {
    job.start();
    job.package(Info.INSTALLED, 'nano;7.2;x86_64;installed', 'Text editor');
    job.details({
      packageId: 'nano;7.2;x86_64;installed',
      summary: 'Text editor',
      description: 'Small editor',
      url: 'https://example.invalid/nano',
      license: 'GPL-3.0',
      group: Group.PUBLISHING,
      size: 2048,
    });
    job.files('nano;7.2;x86_64;installed', ['/usr/bin/nano']);
    job.repoDetail({ repoId: 'core', description: 'Core', enabled: true });

    expect(job.emitted).toBe(4);
    expect(host.events).toEqual(['package', 'details', 'files', 'repo-detail']);
  });

  it('should clamp percentages but pass the unknown marker through', () => {
    job.start();
    job.setPercentage(-3);
    job.setPercentage(33.4);
    job.setPercentage(250);
    job.setPercentage(PERCENTAGE_UNKNOWN);

    expect(host.percentages).toEqual([0, 33, 100, 101]);
  });

  it('should finish once', () => {
    job.start();

    expect(job.finish()).toBe(true);
    expect(job.finish()).toBe(false);
    expect(job.fail(ErrorCode.INTERNAL_ERROR, 'late')).toBe(false);

    expect(job.state).toBe('finished');
    expect(host.finishedCount).toBe(1);
    expect(host.errors).toEqual([]);
  });

  it('should report a failure as an error code followed by finished', () => {
    job.start();

    expect(job.fail(ErrorCode.PACKAGE_NOT_FOUND, 'no such package')).toBe(true);
    expect(job.finish()).toBe(false);

    expect(job.state).toBe('failed');
    expect(host.events).toEqual(['error-code', 'finished']);
    expect(host.errors).toEqual([{ code: 'package-not-found', message: 'no such package' }]);
    expect(host.outcome).toBe('failed');
  });

  it('should drop signals after finalization', () => {
    job.start();
    job.finish();

    job.package(Info.AVAILABLE, 'vim;9.1;x86_64;extra', 'Editor');
    job.setStatus(Status.QUERY);
    job.setPercentage(50);

    expect(host.events).toEqual(['finished']);
    expect(job.emitted).toBe(0);
  });
});
