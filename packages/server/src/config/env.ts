import os from 'os';
import path from 'path';
import { z } from 'zod';

export type ReasoningEffort = 'low' | 'medium' | 'high';

const REASONING_EFFORTS: readonly ReasoningEffort[] = ['low', 'medium', 'high'];

const optionalString = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : fallback));

const positiveInt = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be a whole number`)
    .positive(`${name} must be greater than 0`)
    .default(fallback);

const envSchema = z.object({
  HOST: optionalString('127.0.0.1'),
  PORT: positiveInt('PORT', 8787),
  GEMINI_API_KEY: optionalString(''),
  GEMINI_MODEL: optionalString('gemini-2.5-pro'),
  GEMINI_FALLBACK_MODELS: optionalString('gemini-2.5-flash,gemini-2.0-flash'),
  // An unknown effort is not fatal, the strongest one is used instead
  REASONING_EFFORT: z
    .string()
    .optional()
    .transform((value): ReasoningEffort => {
      const normalized = (value || '').trim().toLowerCase();
      return REASONING_EFFORTS.find((effort) => effort === normalized) ?? 'high';
    }),
  MAX_CONCURRENT_JOBS: positiveInt('MAX_CONCURRENT_JOBS', 4),
  MAX_UPLOAD_MB: positiveInt('MAX_UPLOAD_MB', 2048),
  UPLOAD_DIR: optionalString(path.join(process.cwd(), 'uploads')),
  WORK_DIR: optionalString(path.join(os.tmpdir(), 'metadata-writer')),
  WHISPER_PYTHON: optionalString('python3'),
  WHISPER_SCRIPT: optionalString(path.join(process.cwd(), 'scripts', 'transcribe_segments.py')),
  WHISPER_MODEL: optionalString('small'),
  TRANSCRIPT_LANGUAGE: optionalString('en')
});

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Splits a comma separated model list, dropping blanks and repeats.
 */
export function parseModelList(value: string): string[] {
  const models = value
    .split(',')
    .map((model) => model.trim())
    .filter(Boolean);
  return [...new Set(models)];
}

export function loadConfig(customEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const parsed = envSchema.parse(customEnv);
    const megabyte = 1024 * 1024;

    return {
      host: parsed.HOST,
      port: parsed.PORT,
      generation: {
        apiKey: parsed.GEMINI_API_KEY,
        primaryModel: parsed.GEMINI_MODEL,
        fallbackModels: parseModelList(parsed.GEMINI_FALLBACK_MODELS),
        reasoningEffort: parsed.REASONING_EFFORT
      },
      maxConcurrentJobs: parsed.MAX_CONCURRENT_JOBS,
      maxUploadBytes: parsed.MAX_UPLOAD_MB * megabyte,
      uploadDir: parsed.UPLOAD_DIR,
      workDir: parsed.WORK_DIR,
      whisper: {
        pythonPath: parsed.WHISPER_PYTHON,
        scriptPath: parsed.WHISPER_SCRIPT,
        model: parsed.WHISPER_MODEL,
        language: parsed.TRANSCRIPT_LANGUAGE
      }
    } as const;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    }

    throw error;
  }
}
