import ffmpeg from 'fluent-ffmpeg';
import path from 'path';
import fs from 'fs';
import type { AudioExtractionResult } from '../domain/models';
import type { IAudioExtractor } from '../domain/ports';

export class AudioExtractionService implements IAudioExtractor {
  /**
   * Extracts the audio track and converts it to a Whisper-friendly format.
   * Specs: 16kHz, Mono, PCM 16-bit (wav).
   * @param inputPath - Full path to the uploaded media file (e.g., .mp4)
   * @param outputDir - Per-job scratch directory for the generated .wav
   */
  public async convertToWav(inputPath: string, outputDir: string): Promise<AudioExtractionResult> {
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input file not found: ${inputPath}`);
    }
    await fs.promises.mkdir(outputDir, { recursive: true });

    const outputPath = path.join(outputDir, 'audio.wav');
    const filename = path.basename(inputPath);

    console.log(`🎵 Starting audio extraction: ${filename}`);

    await new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .noVideo()                // Strip video stream
        .audioCodec('pcm_s16le')  // 16-bit PCM (Standard for WAV)
        .audioChannels(1)         // Mono (Whisper processes mono)
        .audioFrequency(16000)    // 16kHz (Whisper's native sample rate)
        .outputOptions('-y')
        .output(outputPath)
        .on('start', (commandLine: string) => {
          console.log(`   Spawned FFmpeg with command: ${commandLine}`);
        })
        .on('error', (err: Error) => {
          console.error(`❌ FFmpeg Error:`, err.message);
          reject(err);
        })
        .on('end', () => resolve())
        .run();
    });

    console.log(`✅ Audio extracted successfully: ${outputPath}`);

    return { audioPath: outputPath, duration: await this.probeDuration(outputPath) };
  }

  /**
   * Resolves to true when the ffmpeg binary can be spawned.
   */
  public isAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      ffmpeg.getAvailableFormats((err) => resolve(!err));
    });
  }

  // Duration only drives progress reporting, so a probe failure is not fatal
  private probeDuration(audioPath: string): Promise<number | undefined> {
    return new Promise((resolve) => {
      ffmpeg.ffprobe(audioPath, (err, metadata) => {
        if (err) {
          console.warn(`⚠️ ffprobe could not read ${audioPath}: ${err.message}`);
          return resolve(undefined);
        }
        resolve(metadata.format.duration);
      });
    });
  }
}

