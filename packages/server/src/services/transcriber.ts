import { spawn } from 'child_process';
import readline from 'readline';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { SpeechSegment } from '../domain/models';
import type { ITranscriptionEngine } from '../domain/ports';
import { StageFailure } from '../domain/errors';

export interface WhisperOptions {
  pythonPath: string;
  scriptPath: string;
  model: string;
  language: string;
}

// One line of the helper script's stdout
const segmentSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string()
});

export function parseSegmentLine(line: string): SpeechSegment {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new StageFailure(`Transcriber emitted a non-JSON line: ${line.slice(0, 120)}`);
  }
  const parsed = segmentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StageFailure(`Transcriber emitted a malformed segment: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

/**
 * Runs faster-whisper in a helper process that prints one JSON segment per line.
 * Segments are handed out as they arrive so progress can follow the audio.
 */
export class WhisperTranscriptionEngine implements ITranscriptionEngine {
  private loaded = false;

  constructor(private readonly options: WhisperOptions) {}

  public async load(): Promise<void> {
    if (this.loaded) return;
    if (!fs.existsSync(this.options.scriptPath)) {
      throw new StageFailure(`Transcription script not found at: ${this.options.scriptPath}`);
    }
    if (!(await this.isAvailable())) {
      throw new StageFailure(`Python interpreter not usable: ${this.options.pythonPath}`);
    }
    this.loaded = true;
  }

  public isAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      const probe = spawn(this.options.pythonPath, ['--version']);
      probe.on('error', () => resolve(false));
      probe.on('close', (code) => resolve(code === 0));
    });
  }

  public async *transcribe(audioPath: string): AsyncIterable<SpeechSegment> {
    const args = [
      this.options.scriptPath,
      audioPath,
      '--model', this.options.model,
      '--language', this.options.language
    ];

    console.log(`🎙️  Spawning Whisper on: ${path.basename(audioPath)}`);

    const child = spawn(this.options.pythonPath, args);
    let stderrData = '';
    child.stderr.on('data', (data: Buffer) => { stderrData += data.toString(); });

    const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });

    // A spawn failure ends the stream; it is reported once the loop is done
    const failure: { error?: Error } = {};
    const exited = new Promise<number>((resolve) => {
      child.on('error', (err) => {
        failure.error = err;
        lines.close();
        resolve(-1);
      });
      child.on('close', (code) => resolve(code ?? 1));
    });

    try {
      for await (const line of lines) {
        if (!line.trim()) continue;
        yield parseSegmentLine(line);
      }
    } finally {
      lines.close();
      if (child.exitCode === null && !failure.error) child.kill();
    }

    const code = await exited;
    if (failure.error) {
      console.error(`❌ Could not start Whisper: ${failure.error.message}`);
      throw new StageFailure(`Could not start the transcriber: ${failure.error.message}`);
    }
    if (code !== 0) {
      console.error(`❌ Whisper exited with code ${code}`);
      console.error(`   Stderr: ${stderrData}`);
      throw new StageFailure(`Transcription failed with code ${code}: ${stderrData.trim().split('\n').pop() ?? ''}`);
    }
  }
}
