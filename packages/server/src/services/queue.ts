import Queue from 'better-queue';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import { JobStage, LinkMode, type Job } from '@metadata-writer/shared';
import { HARD_STOP_MESSAGE } from '../config/prompts';
import type { QueueInput } from '../domain/models';
import type {
  IAudioExtractor,
  IJobService,
  ILinkValidator,
  IMetadataGenerator,
  ITranscriptionEngine
} from '../domain/ports';
import { EmptyTranscriptError, JobNotFoundError, errorMessage } from '../domain/errors';
import { JobStore } from './job-store';
import { TranscriptAssembler, TRANSCRIBE_START } from './transcript';
import { parseLinks } from './link-validator';
import { checkMetadata } from './qa-validator';

export interface OrchestratorDeps {
  store: JobStore;
  audio: IAudioExtractor;
  transcriber: ITranscriptionEngine;
  links: ILinkValidator;
  generator: IMetadataGenerator;
  workDir: string;     // parent of the per-job scratch directories
  concurrency: number; // jobs processed at the same time
}

export interface JobOutcome {
  jobId: string;
  stage: JobStage;
}

/**
 * Owns the per-job state machine. Each submitted job becomes one task on the
 * queue, and only that task writes the job's record.
 */
export class JobOrchestrator implements IJobService {
  private readonly queue: Queue<QueueInput, JobOutcome>;

  constructor(private readonly deps: OrchestratorDeps) {
    this.queue = new Queue<QueueInput, JobOutcome>(
      (input, cb) => {
        this.runJob(input).then(
          (outcome) => cb(null, outcome),
          (err: unknown) => cb(err)
        );
      },
      { concurrent: deps.concurrency, afterProcessDelay: 0 }
    );

    // Queue Events for global logging
    this.queue.on('task_finish', (_taskId: string, outcome: JobOutcome) => {
      console.log(`✅ [Job ${outcome.jobId}] Task finished: ${outcome.stage}`);
    });
    this.queue.on('task_failed', (_taskId: string, err: unknown) => {
      console.error(`💥 [Job] Task failed globally: ${errorMessage(err)}`);
    });
  }

  public submit(filePath: string, linkMode: LinkMode, linksText: string): string {
    const jobId = randomUUID();
    this.deps.store.create(jobId);
    this.queue.push({ jobId, filePath, linkMode, linksText });
    console.log(`📥 [Job ${jobId}] Queued ${path.basename(filePath)} (links: ${linkMode})`);
    return jobId;
  }

  public poll(jobId: string): Job {
    const job = this.deps.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /**
   * Drives one job to a terminal stage. Never rejects: faults end as FAILED.
   */
  public async runJob(input: QueueInput): Promise<JobOutcome> {
    const { jobId, filePath, linkMode } = input;
    const scratchDir = path.join(this.deps.workDir, jobId);

    try {
      if (linkMode === LinkMode.NOT_PROVIDED) {
        this.deps.store.update(jobId, {
          stage: JobStage.HARD_STOPPED,
          progress: 100,
          done: true,
          transcript: '',
          metadata: HARD_STOP_MESSAGE,
          qaIssues: [],
          qaPass: true
        });
        console.log(`🛑 [Job ${jobId}] Hard stop: links were not checked.`);
        return { jobId, stage: JobStage.HARD_STOPPED };
      }

      console.log(`\n⚙️  [Job ${jobId}] Processing started...`);
      await this.process(input, scratchDir);
      return { jobId, stage: JobStage.COMPLETED };
    } catch (error) {
      console.error(`❌ [Job ${jobId}] Failed:`, errorMessage(error));
      this.deps.store.update(jobId, {
        stage: JobStage.FAILED,
        progress: 100,
        done: true,
        error: errorMessage(error)
      });
      return { jobId, stage: JobStage.FAILED };
    } finally {
      await this.cleanup(jobId, filePath, scratchDir);
    }
  }

  private async process(input: QueueInput, scratchDir: string): Promise<void> {
    const { jobId, filePath, linkMode, linksText } = input;
    const { store } = this.deps;

    // --- STEP 1: EXTRACT AUDIO ---
    store.update(jobId, { stage: JobStage.EXTRACTING_AUDIO, progress: 5 });
    const { audioPath, duration } = await this.deps.audio.convertToWav(filePath, scratchDir);

    // --- STEP 2: LOAD THE SPEECH MODEL ---
    store.update(jobId, { stage: JobStage.LOADING_ENGINE, progress: 15 });
    await this.deps.transcriber.load();

    // --- STEP 3: TRANSCRIBE ---
    store.update(jobId, { stage: JobStage.TRANSCRIBING, progress: TRANSCRIBE_START });
    const assembler = new TranscriptAssembler(duration ?? 0);
    for await (const segment of this.deps.transcriber.transcribe(audioPath)) {
      const progress = assembler.append(segment);
      if (progress !== null) store.update(jobId, { progress });
    }

    const transcript = assembler.text;
    if (!transcript) throw new EmptyTranscriptError();
    store.update(jobId, { transcript });

    // --- STEP 4: VALIDATE LINKS ---
    store.update(jobId, { stage: JobStage.VALIDATING_LINKS, progress: 80 });
    const urls = parseLinks(linksText);
    const validatedLinks =
      linkMode === LinkMode.PROVIDED && urls.length > 0 ? await this.deps.links.validate(urls) : [];

    // --- STEP 5: GENERATE ---
    store.update(jobId, { stage: JobStage.GENERATING_METADATA, progress: 88 });
    const metadata = await this.deps.generator.generate({ transcript, linkMode, validatedLinks });

    // --- STEP 6: QA ---
    store.update(jobId, { stage: JobStage.CHECKING_QA, progress: 96 });
    const qaIssues = checkMetadata(metadata, linkMode, validatedLinks);
    store.update(jobId, { qaIssues, qaPass: qaIssues.length === 0 });

    // --- STEP 7: COMPLETE ---
    store.update(jobId, { stage: JobStage.COMPLETED, progress: 100, done: true, metadata });
  }

  // Best effort: a leftover upload is logged, never reported on the job
  private async cleanup(jobId: string, filePath: string, scratchDir: string): Promise<void> {
    try {
      await fs.promises.rm(filePath, { force: true });
      await fs.promises.rm(scratchDir, { recursive: true, force: true });
    } catch (err) {
      console.warn(`⚠️ [Job ${jobId}] Cleanup failed: ${errorMessage(err)}`);
    }
  }
}
