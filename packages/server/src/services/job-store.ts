import { LowSync, MemorySync } from 'lowdb';
import { JobStage, STAGE_LABELS, type Job } from '@metadata-writer/shared';
import type { JobPatch } from '../domain/models';

interface Data {
  jobs: Record<string, Job>;
}

/**
 * In-memory job registry. Every method is one synchronous critical section,
 * so a poller never sees a half-applied update. Records are only written by
 * the task that owns them and are frozen once done.
 */
export class JobStore {
  private readonly db: LowSync<Data>;

  constructor() {
    this.db = new LowSync<Data>(new MemorySync<Data>(), { jobs: {} });
    this.db.read();
  }

  public create(id: string): Job {
    if (this.find(id)) {
      throw new Error(`Job ${id} already exists`);
    }
    const job: Job = {
      id,
      stage: JobStage.QUEUED,
      stageLabel: STAGE_LABELS[JobStage.QUEUED],
      progress: 1,
      done: false,
      error: null,
      transcript: '',
      metadata: '',
      qaIssues: [],
      qaPass: null,
      createdAt: new Date().toISOString()
    };
    this.db.data.jobs[id] = job;
    this.db.write();
    return structuredClone(job);
  }

  /**
   * Applies the patch unless the job already finished. Progress only moves forward.
   */
  public update(id: string, patch: JobPatch): void {
    const job = this.find(id);
    if (!job || job.done) return;

    const next: Job = { ...job, ...patch };
    if (patch.stage && !patch.stageLabel) next.stageLabel = STAGE_LABELS[patch.stage];
    next.progress = Math.min(100, Math.max(job.progress, patch.progress ?? job.progress));
    if (patch.qaIssues) next.qaIssues = [...patch.qaIssues];

    this.db.data.jobs[id] = next;
    this.db.write();
  }

  public get(id: string): Job | undefined {
    const job = this.find(id);
    return job ? structuredClone(job) : undefined;
  }

  private find(id: string): Job | undefined {
    return Object.hasOwn(this.db.data.jobs, id) ? this.db.data.jobs[id] : undefined;
  }

  public size(): number {
    return Object.keys(this.db.data.jobs).length;
  }
}
