import type { SpeechSegment } from '../domain/models';

export const TRANSCRIBE_START = 20;
const TRANSCRIBE_SPAN = 55;

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * MM:SS from the integer part of a start time. Minutes are not wrapped into hours.
 */
export function formatTimestamp(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  return `${pad(Math.floor(whole / 60))}:${pad(whole % 60)}`;
}

export function formatTranscriptLine(segment: SpeechSegment): string {
  return `${formatTimestamp(segment.start)} ${segment.text.trim()}`;
}

/**
 * Collects transcript lines and maps audio coverage onto the 20..75 progress band.
 */
export class TranscriptAssembler {
  private readonly lines: string[] = [];
  private lastProgress = TRANSCRIBE_START;

  constructor(private readonly totalDuration: number) {}

  /**
   * Appends the segment and returns the new progress when it advanced, otherwise null.
   */
  public append(segment: SpeechSegment): number | null {
    this.lines.push(formatTranscriptLine(segment));
    if (!(this.totalDuration > 0)) return null;

    const covered = Math.min(1, segment.end / this.totalDuration);
    const progress = TRANSCRIBE_START + Math.floor(TRANSCRIBE_SPAN * covered);
    if (progress <= this.lastProgress) return null;

    this.lastProgress = progress;
    return progress;
  }

  public get progress(): number {
    return this.lastProgress;
  }

  public get text(): string {
    return this.lines.join('\n').trim();
  }
}
