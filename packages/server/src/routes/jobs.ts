import type { FastifyInstance } from 'fastify';
import type { Multipart } from '@fastify/multipart';
import path from 'path';
import fs from 'fs';
import { pipeline } from 'stream/promises';
import { randomUUID } from 'crypto';
import type { ErrorResponse, HealthResponse, Job, UploadResponse } from '@metadata-writer/shared';
import type { IJobService } from '../domain/ports';
import { JobNotFoundError, ValidationError, errorMessage } from '../domain/errors';
import { isAllowedMedia, parseLinkMode } from '../utils/helper';

export interface JobRouteDeps {
  jobs: IJobService;
  uploadDir: string;
  health: () => Promise<HealthResponse>;
}

interface ReceivedUpload {
  savePath: string;
  fields: Record<string, string>;
}

const isFileTooLarge = (err: unknown) =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 'FST_REQ_FILE_TOO_LARGE';

/**
 * Submission and status polling. Everything that can be rejected is rejected
 * here, before a job record exists.
 */
export function jobRoutes(server: FastifyInstance, deps: JobRouteDeps): void {

  async function assertReady(): Promise<void> {
    const health = await deps.health();
    if (!health.ffmpeg) {
      throw new ValidationError('ffmpeg/ffprobe not found. Install ffmpeg and restart the server.');
    }
    if (!health.apiKeyConfigured) {
      throw new ValidationError('GEMINI_API_KEY missing. Add it to the server environment.');
    }
  }

  /**
   * Streams the single media part to disk under a random name and collects the text fields.
   */
  async function receiveUpload(parts: AsyncIterableIterator<Multipart>): Promise<ReceivedUpload> {
    let savePath = '';
    let rejection: ValidationError | null = null;
    const fields: Record<string, string> = {};

    try {
      for await (const part of parts) {
        if (part.type !== 'file') {
          if (typeof part.value === 'string') fields[part.fieldname] = part.value;
          continue;
        }

        if (savePath || rejection) {
          part.file.resume(); // Only the first file is used
          continue;
        }
        if (!part.filename) {
          rejection = new ValidationError('Empty filename');
          part.file.resume();
          continue;
        }
        if (!isAllowedMedia(part.filename)) {
          const ext = path.extname(part.filename).toLowerCase() || '(none)';
          rejection = new ValidationError(`Unsupported file type: ${ext}. Use mp4, m4a, wav, webm.`);
          part.file.resume();
          continue;
        }

        savePath = path.join(deps.uploadDir, `${randomUUID()}${path.extname(part.filename).toLowerCase()}`);
        console.log(`📥 Starting Stream: ${part.filename}`);
        await pipeline(part.file, fs.createWriteStream(savePath));
      }
    } catch (err) {
      await discard(savePath);
      if (isFileTooLarge(err)) throw new ValidationError('File too large.', 413);
      throw err;
    }

    if (rejection) {
      await discard(savePath);
      throw rejection;
    }
    if (!savePath) throw new ValidationError('No file uploaded');

    return { savePath, fields };
  }

  server.post<{ Reply: UploadResponse | ErrorResponse }>('/api/jobs', async (req, reply) => {
    try {
      await assertReady();
      const { savePath, fields } = await receiveUpload(req.parts());

      const jobId = deps.jobs.submit(savePath, parseLinkMode(fields.linkMode), fields.links ?? '');
      return { success: true, jobId, message: 'File queued.' };
    } catch (err) {
      if (err instanceof ValidationError) {
        return reply.status(err.statusCode).send({ error: err.message });
      }
      console.error('❌ Upload Failed:', errorMessage(err));
      return reply.status(500).send({ error: 'Stream processing failed' });
    }
  });

  /**
   * ROUTE: GET /api/jobs/:id
   * Returns: Job snapshot
   */
  server.get<{ Params: { id: string }, Reply: Job | ErrorResponse }>('/api/jobs/:id', async (req, reply) => {
    try {
      return deps.jobs.poll(req.params.id);
    } catch (err) {
      if (err instanceof JobNotFoundError) {
        return reply.status(404).send({ error: 'Job not found' });
      }
      throw err;
    }
  });
}

async function discard(filePath: string): Promise<void> {
  if (!filePath) return;
  try {
    await fs.promises.unlink(filePath);
  } catch (err) {
    console.warn(`⚠️ Could not remove partial upload ${filePath}: ${errorMessage(err)}`);
  }
}
