import { vi } from 'vitest';
import { JobStage, STAGE_LABELS, type HealthResponse, type Job, type UploadResponse } from '@metadata-writer/shared';
import type { HealthStatus, IApiService } from '../src/domain';

export function makeJob(overrides: Partial<Job> = {}): Job {
  const stage = overrides.stage ?? JobStage.QUEUED;
  return {
    id: 'job-1',
    stage,
    stageLabel: STAGE_LABELS[stage],
    progress: 1,
    done: false,
    error: null,
    transcript: '',
    metadata: '',
    qaIssues: [],
    qaPass: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

export function fakeApi() {
  return {
    checkHealth: vi.fn(async (): Promise<HealthStatus> => ({ isOnline: true, latencyMs: 3 })),
    getDependencies: vi.fn(
      async (): Promise<HealthResponse> => ({ ffmpeg: true, apiKeyConfigured: true, transcriber: true })
    ),
    uploadMedia: vi.fn(
      async (_filePath: string, _linkMode: string, _linksText: string): Promise<UploadResponse> => ({
        success: true,
        jobId: 'job-1',
        message: 'File queued.'
      })
    ),
    getJobStatus: vi.fn(async (_jobId: string): Promise<Job> => makeJob())
  } satisfies IApiService;
}
