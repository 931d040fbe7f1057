import axios, { type AxiosInstance } from 'axios';
import fs from 'fs';
import path from 'path';
import FormData from 'form-data';
import type {
  ErrorResponse,
  HealthResponse,
  Job,
  LinkMode,
  UploadResponse
} from '@metadata-writer/shared';
import { ApiError, type HealthStatus, type IApiService } from '../domain';

export class ApiService implements IApiService {
  private _client: AxiosInstance | null = null;

  constructor(private readonly baseURL: string) {}

  private get client(): AxiosInstance {
    if (!this._client) {
      this._client = axios.create({
        baseURL: this.baseURL,
        timeout: 10000,
        maxContentLength: Infinity,
        maxBodyLength: Infinity
      });
    }
    return this._client;
  }

  public async checkHealth(): Promise<HealthStatus> {
    const start = Date.now();
    try {
      const res = await this.client.get('/');
      return {
        isOnline: res.status === 200,
        latencyMs: Date.now() - start
      };
    } catch {
      return { isOnline: false, latencyMs: 0 };
    }
  }

  public async getDependencies(): Promise<HealthResponse> {
    try {
      const response = await this.client.get<HealthResponse>('/api/health');
      return response.data;
    } catch (error) {
      throw this.formatError(error);
    }
  }

  public async uploadMedia(
    filePath: string,
    linkMode: LinkMode,
    linksText: string,
    onProgress?: (percentCompleted: number) => void
  ): Promise<UploadResponse> {
    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }

    // Text fields first, so the server knows the mode before the file streams in
    const form = new FormData();
    form.append('linkMode', linkMode);
    form.append('links', linksText);
    form.append('file', fs.createReadStream(filePath), path.basename(filePath));

    try {
      const response = await this.client.post<UploadResponse>('/api/jobs', form, {
        headers: form.getHeaders(),
        timeout: 0, // Large videos take as long as they need
        onUploadProgress: (progressEvent) => {
          if (onProgress && progressEvent.total) {
            const percentCompleted = Math.round((progressEvent.loaded * 100) / progressEvent.total);
            onProgress(percentCompleted);
          }
        }
      });

      return response.data;
    } catch (error) {
      throw this.formatError(error);
    }
  }

  public async getJobStatus(jobId: string): Promise<Job> {
    try {
      const response = await this.client.get<Job>(`/api/jobs/${encodeURIComponent(jobId)}`);
      return response.data;
    } catch (error) {
      throw this.formatError(error);
    }
  }

  // Translates raw Axios errors into our domain ApiError
  private formatError(error: unknown): ApiError | Error {
    if (axios.isAxiosError<ErrorResponse>(error)) {
      const statusCode = error.response?.status;
      const msg = error.response?.data?.error || error.message;

      // Network trouble and server faults are worth retrying, a rejected request is not
      const isTransient = !statusCode || statusCode >= 500 || ['ECONNREFUSED', 'ECONNRESET'].includes(error.code || '');

      return new ApiError(msg, isTransient, statusCode);
    }

    if (error instanceof Error) return error;
    return new Error('Unknown API Error occurred');
  }
}
