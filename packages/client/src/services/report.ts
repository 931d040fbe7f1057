import { JobStage, type Job } from '@metadata-writer/shared';

export function formatProgress(job: Job): string {
  return `[${String(job.progress).padStart(3)}%] ${job.stageLabel}`;
}

export function formatQa(job: Job): string {
  if (job.qaPass === null) return 'QA: not run';
  if (job.qaPass) return 'QA: PASS';
  return ['QA: FAIL', ...job.qaIssues.map((issue) => `- ${issue}`)].join('\n');
}

/**
 * Final console report for a finished job.
 */
export function formatReport(job: Job): string {
  if (job.stage === JobStage.FAILED) {
    return `❌ Job failed:\n${job.error ?? 'Unknown error'}`;
  }

  const sections = [
    `=== Transcript ===\n${job.transcript || '(no transcript)'}`,
    `=== Metadata ===\n${job.metadata || '(no metadata)'}`,
    formatQa(job)
  ];
  return sections.join('\n\n');
}
