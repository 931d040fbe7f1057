import { describe, it, expect } from 'vitest';
import { JobStage } from '@metadata-writer/shared';
import { formatProgress, formatQa, formatReport } from '../../src/services';
import { makeJob } from '../helpers';

describe('formatProgress', () => {
  it('pads the percentage and shows the stage label', () => {
    expect(formatProgress(makeJob({ stage: JobStage.EXTRACTING_AUDIO, progress: 5 }))).toBe(
      '[  5%] Extracting audio…'
    );
    expect(formatProgress(makeJob({ stage: JobStage.COMPLETED, progress: 100 }))).toBe('[100%] Done.');
  });
});

describe('formatQa', () => {
  it('prints PASS when there are no issues', () => {
    expect(formatQa(makeJob({ qaPass: true }))).toBe('QA: PASS');
  });

  it('lists each issue under FAIL', () => {
    const job = makeJob({ qaPass: false, qaIssues: ['Missing title label: Option 2 (Parent High-Intent)', 'x'] });

    expect(formatQa(job)).toBe('QA: FAIL\n- Missing title label: Option 2 (Parent High-Intent)\n- x');
  });

  it('says when QA never ran', () => {
    expect(formatQa(makeJob())).toBe('QA: not run');
  });
});

describe('formatReport', () => {
  it('prints transcript, metadata and QA for a completed job', () => {
    const job = makeJob({
      stage: JobStage.COMPLETED,
      progress: 100,
      done: true,
      transcript: '00:00 Hello',
      metadata: 'Title',
      qaPass: true
    });

    expect(formatReport(job)).toBe('=== Transcript ===\n00:00 Hello\n\n=== Metadata ===\nTitle\n\nQA: PASS');
  });

  it('uses placeholders for a hard-stopped job without transcript', () => {
    const job = makeJob({ stage: JobStage.HARD_STOPPED, done: true, metadata: 'Stop.', qaPass: true });

    expect(formatReport(job)).toBe('=== Transcript ===\n(no transcript)\n\n=== Metadata ===\nStop.\n\nQA: PASS');
  });

  it('prints only the error for a failed job', () => {
    const job = makeJob({ stage: JobStage.FAILED, done: true, error: 'Transcript is empty.' });

    expect(formatReport(job)).toBe('❌ Job failed:\nTranscript is empty.');
  });
});
