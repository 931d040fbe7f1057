import type { HealthResponse, Job, LinkMode, UploadResponse } from "@metadata-writer/shared";
import type { HealthStatus } from "./models";

export interface IApiService {
  checkHealth(): Promise<HealthStatus>;

  /**
   * Fetches the server's dependency report (ffmpeg, API key, transcriber).
   */
  getDependencies(): Promise<HealthResponse>;

  /**
   * Uploads a media file via multipart/form-data and starts a job.
   * @param filePath The local path to the audio/video file.
   * @param onProgress Optional callback to track upload percentage.
   */
  uploadMedia(
    filePath: string,
    linkMode: LinkMode,
    linksText: string,
    onProgress?: (percentCompleted: number) => void
  ): Promise<UploadResponse>;

  /**
   * Fetches the current processing status and results for a specific job.
   */
  getJobStatus(jobId: string): Promise<Job>;
}
