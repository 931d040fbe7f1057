import fs from 'fs';
import path from 'path';
import { ALLOWED_EXTENSIONS, JobStage, LinkMode, isLinkMode } from '@metadata-writer/shared';
import { ApiError, type IApiService } from '../domain';
import { formatProgress, formatReport, waitForJob } from '../services';

export interface RunCommandOptions {
  linkMode: string;
  linksFile?: string;
  intervalMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Upload, poll, report.
 * Resolves to the process exit code: 0 when the job finished, 1 otherwise.
 */
export async function runCommand(api: IApiService, filePath: string, options: RunCommandOptions): Promise<number> {
  const { linkMode } = options;
  if (!isLinkMode(linkMode)) {
    console.error(`❌ Unknown link mode: ${linkMode}. Use one of: ${Object.values(LinkMode).join(', ')}.`);
    return 1;
  }

  const extension = path.extname(filePath).toLowerCase();
  if (!ALLOWED_EXTENSIONS.some((allowed) => allowed === extension)) {
    console.error(`❌ Unsupported file type: ${extension || '(none)'}. Use mp4, m4a, wav, webm.`);
    return 1;
  }

  let linksText = '';
  if (options.linksFile) {
    try {
      linksText = await fs.promises.readFile(options.linksFile, 'utf-8');
    } catch (error) {
      console.error(`❌ Could not read links file ${options.linksFile}: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  }

  if (linkMode === LinkMode.PROVIDED && !linksText.trim()) {
    console.error('❌ Link mode "provided" needs at least one link. Pass --links-file.');
    return 1;
  }

  const health = await api.checkHealth();
  if (!health.isOnline) {
    console.error('❌ Server is OFFLINE. Please start the server and try again.');
    return 1;
  }

  try {
    console.log(`📤 Uploading: ${path.basename(filePath)}`);
    const upload = await api.uploadMedia(filePath, linkMode, linksText, (percent) => {
      process.stdout.write(`\r   Upload: ${percent}%`);
    });
    console.log(`\n✅ Upload Complete. Job ID: ${upload.jobId}`);

    let lastLine = '';
    const job = await waitForJob(api, upload.jobId, {
      intervalMs: options.intervalMs,
      sleep: options.sleep,
      onUpdate: (update) => {
        const line = formatProgress(update);
        if (line !== lastLine) console.log(line);
        lastLine = line;
      }
    });

    console.log(`\n${formatReport(job)}`);
    return job.stage === JobStage.FAILED ? 1 : 0;
  } catch (error) {
    if (error instanceof ApiError) {
      console.error(`❌ Server rejected the request: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
