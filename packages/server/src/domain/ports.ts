import type { Job, LinkMode, ValidatedLink } from '@metadata-writer/shared';
import type { ReasoningEffort } from '../config/env';
import type { AudioExtractionResult, GenerationRequest, SpeechSegment } from './models';

export interface IAudioExtractor {
  /**
   * Converts the source media to mono 16kHz PCM wav inside outputDir.
   */
  convertToWav(inputPath: string, outputDir: string): Promise<AudioExtractionResult>;
  isAvailable(): Promise<boolean>;
}

export interface ITranscriptionEngine {
  /**
   * Prepares the engine. Called once per job before transcribe().
   */
  load(): Promise<void>;
  /**
   * Lazily yields segments in audio order. Single pass, not restartable.
   */
  transcribe(audioPath: string): AsyncIterable<SpeechSegment>;
  isAvailable(): Promise<boolean>;
}

export interface ILinkValidator {
  validate(urls: string[]): Promise<ValidatedLink[]>;
}

export interface IMetadataGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export type GenerationProtocol = 'generate' | 'stream';

export interface GenerationCall {
  model: string;
  systemInstruction: string;
  userPayload: string;
  reasoningEffort: ReasoningEffort;
}

/**
 * The two call protocols a generation provider offers.
 */
export interface IGenerationBackend {
  generate(call: GenerationCall): Promise<string>;
  stream(call: GenerationCall): Promise<string>;
  /**
   * True when the error means the credential lacks a permission,
   * so trying other models with it is pointless.
   */
  isPermissionError(error: unknown): boolean;
}

export interface IJobService {
  submit(filePath: string, linkMode: LinkMode, linksText: string): string;
  poll(jobId: string): Job;
}
