import type { Job, LinkMode, ValidatedLink } from '@metadata-writer/shared';

// The data passed into the queue for each job
export interface QueueInput {
  jobId: string;
  filePath: string;
  linkMode: LinkMode;
  linksText: string;
}

// One timed utterance produced by the transcription engine
export interface SpeechSegment {
  start: number; // seconds
  end: number;   // seconds
  text: string;
}

export interface AudioExtractionResult {
  audioPath: string;
  duration?: number; // seconds, missing when ffprobe could not read it
}

export type JobPatch = Partial<Omit<Job, 'id' | 'createdAt'>>;

export interface GenerationRequest {
  transcript: string;
  linkMode: LinkMode;
  validatedLinks: ValidatedLink[];
}
