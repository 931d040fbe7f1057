import type { Job } from '@metadata-writer/shared';
import { ApiError, type IApiService } from '../domain';

export interface PollOptions {
  intervalMs: number;
  onUpdate?: (job: Job) => void;
  sleep?: (ms: number) => Promise<void>;
  maxTransientFailures?: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Polls a job until the server marks it done.
 * Transient errors (server restarting, dropped connection) are retried;
 * anything else, such as an unknown job id, ends the wait.
 */
export async function waitForJob(api: IApiService, jobId: string, options: PollOptions): Promise<Job> {
  const sleep = options.sleep ?? defaultSleep;
  const maxFailures = options.maxTransientFailures ?? 5;
  let failures = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      const job = await api.getJobStatus(jobId);
      failures = 0;
      options.onUpdate?.(job);
      if (job.done) return job;
    } catch (error) {
      const transient = error instanceof ApiError && error.isTransient;
      failures++;
      if (!transient || failures > maxFailures) throw error;
    }
    await sleep(options.intervalMs);
  }
}
