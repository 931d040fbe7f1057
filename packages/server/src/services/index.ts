import type { HealthResponse } from '@metadata-writer/shared';
import type { AppConfig } from '../config/env';
import { AudioExtractionService } from './audio-extractor';
import { WhisperTranscriptionEngine } from './transcriber';
import { LinkValidator } from './link-validator';
import { GenerationClient } from './generation';
import { GeminiBackend } from './gemini';
import { JobStore } from './job-store';
import { JobOrchestrator } from './queue';

export * from './audio-extractor';
export * from './transcriber';
export * from './transcript';
export * from './link-validator';
export * from './generation';
export * from './gemini';
export * from './qa-validator';
export * from './job-store';
export * from './queue';

export interface Services {
  orchestrator: JobOrchestrator;
  health: () => Promise<HealthResponse>;
}

/**
 * Wires the production collaborators. The store lives as long as the orchestrator.
 */
export function createServices(config: AppConfig): Services {
  const { generation } = config;
  const audio = new AudioExtractionService();
  const transcriber = new WhisperTranscriptionEngine(config.whisper);

  const orchestrator = new JobOrchestrator({
    store: new JobStore(),
    audio,
    transcriber,
    links: new LinkValidator(),
    generator: new GenerationClient(new GeminiBackend(generation.apiKey), generation),
    workDir: config.workDir,
    concurrency: config.maxConcurrentJobs
  });

  const health = async (): Promise<HealthResponse> => ({
    ffmpeg: await audio.isAvailable(),
    apiKeyConfigured: Boolean(generation.apiKey),
    transcriber: await transcriber.isAvailable()
  });

  return { orchestrator, health };
}
