import { ApiError, type IApiService } from '../domain';
import { formatProgress, formatReport } from '../services';

export async function statusCommand(api: IApiService, jobId: string): Promise<number> {
  try {
    const job = await api.getJobStatus(jobId);
    console.log(formatProgress(job));
    if (job.done) console.log(`\n${formatReport(job)}`);
    return 0;
  } catch (error) {
    if (error instanceof ApiError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}
