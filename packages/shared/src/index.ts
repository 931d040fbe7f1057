export enum LinkMode {
  NOT_PROVIDED = 'not_provided',         // Links were never checked: hard stop
  CHECKED_NO_LINKS = 'checked_no_links', // Checked, nothing to recommend
  NOT_AVAILABLE = 'not_available',
  PROVIDED = 'provided'                  // Links pasted, Watch Next allowed
}

export enum JobStage {
  QUEUED = 'QUEUED',
  HARD_STOPPED = 'HARD_STOPPED',
  EXTRACTING_AUDIO = 'EXTRACTING_AUDIO',
  LOADING_ENGINE = 'LOADING_ENGINE',
  TRANSCRIBING = 'TRANSCRIBING',
  VALIDATING_LINKS = 'VALIDATING_LINKS',
  GENERATING_METADATA = 'GENERATING_METADATA',
  CHECKING_QA = 'CHECKING_QA',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED'
}

export const STAGE_LABELS: Record<JobStage, string> = {
  [JobStage.QUEUED]: 'Queued…',
  [JobStage.HARD_STOPPED]: 'Stopped (Hard Stop).',
  [JobStage.EXTRACTING_AUDIO]: 'Extracting audio…',
  [JobStage.LOADING_ENGINE]: 'Loading speech model… (first run may take time)',
  [JobStage.TRANSCRIBING]: 'Transcribing audio…',
  [JobStage.VALIDATING_LINKS]: 'Validating links…',
  [JobStage.GENERATING_METADATA]: 'Generating metadata…',
  [JobStage.CHECKING_QA]: 'Final process check…',
  [JobStage.COMPLETED]: 'Done.',
  [JobStage.FAILED]: 'Error'
};

export const ALLOWED_EXTENSIONS = ['.mp4', '.m4a', '.wav', '.webm'] as const;

export interface ValidatedLink {
  url: string;
  ok: boolean;
  title: string;  // og:title when one was found
  reason: string; // why the link is unusable, empty when ok
}

// The status snapshot sent to pollers
export interface Job {
  id: string;
  stage: JobStage;
  stageLabel: string;
  progress: number; // 0..100, never decreases
  done: boolean;
  error: string | null;
  transcript: string;
  metadata: string;
  qaIssues: string[];
  qaPass: boolean | null; // null until the QA check ran
  createdAt: string;
}

// Standardized API Responses
export interface UploadResponse {
  success: boolean;
  jobId: string;
  message: string;
}

export interface ErrorResponse {
  error: string;
}

export interface HealthResponse {
  ffmpeg: boolean;
  apiKeyConfigured: boolean;
  transcriber: boolean;
}

export function isLinkMode(value: unknown): value is LinkMode {
  return Object.values(LinkMode).some((mode) => mode === value);
}
