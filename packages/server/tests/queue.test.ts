import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JobStage, LinkMode } from '@metadata-writer/shared';
import { JobOrchestrator } from '../src/services/queue';
import { JobStore } from '../src/services/job-store';
import { HARD_STOP_MESSAGE } from '../src/config/prompts';
import { JobNotFoundError } from '../src/domain/errors';
import type { GenerationRequest, SpeechSegment } from '../src/domain/models';

async function* segmentsOf(segments: SpeechSegment[]): AsyncIterable<SpeechSegment> {
  for (const segment of segments) yield segment;
}

describe('JobOrchestrator', () => {
  let tmpDir: string;
  let uploadPath: string;
  let store: JobStore;

  const audio = {
    convertToWav: vi.fn(async (_input: string, outputDir: string) => {
      await fs.promises.mkdir(outputDir, { recursive: true });
      return { audioPath: path.join(outputDir, 'audio.wav'), duration: 100 };
    }),
    isAvailable: vi.fn(async () => true)
  };
  const transcriber = {
    load: vi.fn(async () => {}),
    transcribe: vi.fn((_audioPath: string) =>
      segmentsOf([
        { start: 0, end: 50, text: 'Today we look at limits.' },
        { start: 61.7, end: 100, text: 'Then continuity.' }
      ])
    ),
    isAvailable: vi.fn(async () => true)
  };
  const links = { validate: vi.fn(async (urls: string[]) => urls.map((url) => ({ url, ok: true, title: '', reason: '' }))) };
  const generator = { generate: vi.fn(async (_request: GenerationRequest) => 'short') };

  function createOrchestrator() {
    return new JobOrchestrator({
      store,
      audio,
      transcriber,
      links,
      generator,
      workDir: path.join(tmpDir, 'work'),
      concurrency: 2
    });
  }

  function input(jobId: string, linkMode: LinkMode, linksText = '') {
    store.create(jobId);
    return { jobId, filePath: uploadPath, linkMode, linksText };
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-'));
    uploadPath = path.join(tmpDir, 'lesson.mp4');
    fs.writeFileSync(uploadPath, 'fake media');
    store = new JobStore();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('hard stops without touching any collaborator when links were not checked', async () => {
    const orchestrator = createOrchestrator();
    const jobId = orchestrator.submit(uploadPath, LinkMode.NOT_PROVIDED, '');

    await vi.waitFor(() => expect(orchestrator.poll(jobId).done).toBe(true));

    expect(orchestrator.poll(jobId)).toMatchObject({
      stage: JobStage.HARD_STOPPED,
      progress: 100,
      qaPass: true,
      qaIssues: [],
      metadata: HARD_STOP_MESSAGE,
      transcript: '',
      error: null
    });
    expect(audio.convertToWav).not.toHaveBeenCalled();
    expect(transcriber.load).not.toHaveBeenCalled();
    expect(transcriber.transcribe).not.toHaveBeenCalled();
    expect(links.validate).not.toHaveBeenCalled();
    expect(generator.generate).not.toHaveBeenCalled();
    expect(fs.existsSync(uploadPath)).toBe(false);
  });

  it('uses the fixed hard-stop wording', () => {
    expect(HARD_STOP_MESSAGE).toBe(
      'I can see the uploaded video file.\n' +
        'Have you checked the sheet for uploaded video links?\n' +
        'Please check the reporting sheet. You can find the uploaded video links from the reporting sheet. ' +
        'Use YouTube channel filters. Then copy and paste all the YouTube links from the sheet.'
    );
  });

  it('runs submitted jobs through the queue to completion', async () => {
    const orchestrator = createOrchestrator();
    const jobId = orchestrator.submit(uploadPath, LinkMode.CHECKED_NO_LINKS, '');

    await vi.waitFor(() => expect(orchestrator.poll(jobId).done).toBe(true));

    expect(orchestrator.poll(jobId).stage).toBe(JobStage.COMPLETED);
  });

  it('throws JobNotFoundError for unknown ids', () => {
    expect(() => createOrchestrator().poll('nope')).toThrow(JobNotFoundError);
  });

  it('completes a job with transcript, metadata and the QA report', async () => {
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.runJob(input('job-1', LinkMode.CHECKED_NO_LINKS));

    expect(outcome).toEqual({ jobId: 'job-1', stage: JobStage.COMPLETED });
    expect(orchestrator.poll('job-1')).toMatchObject({
      stage: JobStage.COMPLETED,
      stageLabel: 'Done.',
      progress: 100,
      done: true,
      error: null,
      transcript: '00:00 Today we look at limits.\n01:01 Then continuity.',
      metadata: 'short',
      qaPass: false,
      qaIssues: [
        'Missing title label: Option 1 (Highest SEO Reach)',
        'Missing title label: Option 2 (Parent High-Intent)',
        'Missing title label: Option 3 (Authority Explainer)',
        'Tags line not detected (expected one comma-separated line at the end).'
      ]
    });
    expect(transcriber.transcribe).toHaveBeenCalledWith(path.join(tmpDir, 'work', 'job-1', 'audio.wav'));
  });

  it('advances progress with audio coverage while transcribing', async () => {
    const seen: Array<{ stage?: JobStage; progress?: number }> = [];
    transcriber.transcribe.mockImplementationOnce(async function* () {
      yield { start: 0, end: 50, text: 'first' };
      seen.push({ stage: store.get('job-1')?.stage, progress: store.get('job-1')?.progress });
      yield { start: 50, end: 100, text: 'second' };
      seen.push({ stage: store.get('job-1')?.stage, progress: store.get('job-1')?.progress });
    });

    await createOrchestrator().runJob(input('job-1', LinkMode.CHECKED_NO_LINKS));

    expect(seen).toEqual([
      { stage: JobStage.TRANSCRIBING, progress: 47 },
      { stage: JobStage.TRANSCRIBING, progress: 75 }
    ]);
  });

  it('validates links only when they were provided', async () => {
    const linksText = 'https://example.com/a\nnot a link\nhttps://example.com/b';
    const orchestrator = createOrchestrator();

    await orchestrator.runJob(input('job-1', LinkMode.PROVIDED, linksText));
    expect(links.validate).toHaveBeenCalledWith(['https://example.com/a', 'https://example.com/b']);
    expect(generator.generate.mock.calls[0][0].validatedLinks).toHaveLength(2);

    fs.writeFileSync(uploadPath, 'fake media');
    await orchestrator.runJob(input('job-2', LinkMode.CHECKED_NO_LINKS, linksText));
    fs.writeFileSync(uploadPath, 'fake media');
    await orchestrator.runJob(input('job-3', LinkMode.PROVIDED, 'no links here'));

    expect(links.validate).toHaveBeenCalledTimes(1);
    expect(generator.generate.mock.calls[1][0].validatedLinks).toEqual([]);
    expect(generator.generate.mock.calls[2][0].validatedLinks).toEqual([]);
  });

  it('fails silent audio with an empty transcript error', async () => {
    transcriber.transcribe.mockImplementationOnce(() => segmentsOf([]));
    const orchestrator = createOrchestrator();

    const outcome = await orchestrator.runJob(input('job-1', LinkMode.CHECKED_NO_LINKS));

    expect(outcome.stage).toBe(JobStage.FAILED);
    expect(orchestrator.poll('job-1')).toMatchObject({
      stage: JobStage.FAILED,
      progress: 100,
      done: true,
      error: 'Transcript is empty. Check the audio track in your file.',
      metadata: '',
      qaPass: null
    });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('records a stage fault and cleans up the upload and scratch directory', async () => {
    generator.generate.mockRejectedValueOnce(new Error('service down'));
    const orchestrator = createOrchestrator();

    await orchestrator.runJob(input('job-1', LinkMode.NOT_AVAILABLE));

    expect(orchestrator.poll('job-1')).toMatchObject({
      stage: JobStage.FAILED,
      error: 'service down',
      transcript: '00:00 Today we look at limits.\n01:01 Then continuity.',
      done: true
    });
    expect(fs.existsSync(uploadPath)).toBe(false);
    expect(fs.existsSync(path.join(tmpDir, 'work', 'job-1'))).toBe(false);
  });

  it('fails the job when audio extraction fails', async () => {
    audio.convertToWav.mockRejectedValueOnce(new Error('ffmpeg exited with code 1'));
    const orchestrator = createOrchestrator();

    await orchestrator.runJob(input('job-1', LinkMode.CHECKED_NO_LINKS));

    expect(orchestrator.poll('job-1')).toMatchObject({ stage: JobStage.FAILED, error: 'ffmpeg exited with code 1' });
    expect(transcriber.load).not.toHaveBeenCalled();
  });
});
