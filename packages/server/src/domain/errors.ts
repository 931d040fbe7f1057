/**
 * Bad input rejected at submission time, before any job exists.
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Unknown job id: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

/**
 * A fault inside one pipeline stage. Terminates the job as FAILED.
 */
export class StageFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StageFailure';
  }
}

// Silent audio: no speech segments came back
export class EmptyTranscriptError extends StageFailure {
  constructor() {
    super('Transcript is empty. Check the audio track in your file.');
    this.name = 'EmptyTranscriptError';
  }
}

export const PERMISSION_HINT =
  'If the error mentions missing permissions (PERMISSION_DENIED), create an API key with access to the ' +
  'Generative Language API for this project, or enable that API for the key you are using.';

export class GenerationFailedError extends StageFailure {
  constructor(public readonly lastError: string) {
    super(`Metadata generation failed.\n\nLast error: ${lastError}\n\n${PERMISSION_HINT}`);
    this.name = 'GenerationFailedError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
