/**
 * @module @pkbridge/backend/utils
 */

import { randomBytes } from 'node:crypto';

/**
 * Create a job ID for log correlation.
 * Format: job_{pid}_{timestamp}_{random}
 *
 * @example "job_12345_1703088000000_a1b2c3d4"
 */
export function createJobId(): string {
  const pid = process.pid;
  const timestamp = Date.now();
  const random = randomBytes(4).toString('hex');
  return `job_${pid}_${timestamp}_${random}`;
}

