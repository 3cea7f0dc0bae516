import { createLogger, NAMESPACES } from '../logging.js';

const effectsLog = createLogger(NAMESPACES.campaign.effects);

export type EffectStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type EffectType = 'speech' | 'image';

export interface EffectJob<T = unknown> {
  id: string;
  type: EffectType;
  sceneId: string;
  createdAt: number;
  updatedAt: number;
  status: EffectStatus;
  result?: T;
  error?: string;
}

export type EffectListener = (job: Readonly<EffectJob>) => void;

const MAX_FINISHED_JOBS = 50;

/**
 * Side effects (speech, images) run as jobs next to the turn loop. The core
 * only dispatches; subscribers hear about each job once it settles, and only
 * the latest job per type and scene is reported as ready.
 */
export class EffectChannel {
  private readonly jobs = new Map<string, EffectJob>();
  private readonly latest = new Map<string, string>();
  private readonly listeners = new Set<EffectListener>();
  private readonly inFlight = new Set<Promise<void>>();
  private counter = 0;

  constructor(private readonly now: () => number = () => Date.now()) {}

  subscribe(listener: EffectListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Start `task` without waiting for it; returns the job record immediately. */
  dispatch<T>(type: EffectType, sceneId: string, task: () => Promise<T>): EffectJob<T> {
    const id = `${type}-${this.now()}-${++this.counter}`;
    const job: EffectJob<T> = { id, type, sceneId, createdAt: this.now(), updatedAt: this.now(), status: 'pending' };
    this.jobs.set(id, job);
    this.latest.set(`${type}:${sceneId}`, id);

    const run = this.runJob(job, task);
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
    return job;
  }

  private async runJob<T>(job: EffectJob<T>, task: () => Promise<T>): Promise<void> {
    this.setStatus(job, 'running');
    try {
      job.result = await task();
      if (job.status === 'running') this.setStatus(job, 'completed');
    } catch (error) {
      job.error = error instanceof Error ? error.message : String(error);
      if (job.status === 'running') this.setStatus(job, 'failed');
      effectsLog('%s job %s failed: %s', job.type, job.id, job.error);
    }
    this.prune();
  }

  private setStatus(job: EffectJob, status: EffectStatus): void {
    job.status = status;
    job.updatedAt = this.now();
    if (status === 'completed' || status === 'failed') this.notify(job);
  }

  private notify(job: EffectJob): void {
    if (this.latest.get(`${job.type}:${job.sceneId}`) !== job.id) {
      effectsLog('%s job %s settled after a newer one was dispatched; not reported', job.type, job.id);
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener({ ...job });
      } catch (error) {
        effectsLog('effect listener threw: %s', error instanceof Error ? error.message : String(error));
      }
    }
  }

  /** Mark unfinished jobs of a scene as cancelled; their results are dropped. */
  cancelScene(sceneId: string): void {
    for (const job of this.jobs.values()) {
      if (job.sceneId === sceneId && (job.status === 'pending' || job.status === 'running')) {
        job.status = 'cancelled';
        job.updatedAt = this.now();
      }
    }
  }

  getJob(id: string): EffectJob | undefined {
    return this.jobs.get(id);
  }

  listJobs(): EffectJob[] {
    return Array.from(this.jobs.values()).sort((a, b) => b.createdAt - a.createdAt);
  }

  /** Wait for every dispatched job to settle. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private prune(): void {
    const finished = this.listJobs().filter((job) => job.status !== 'pending' && job.status !== 'running');
    for (const job of finished.slice(MAX_FINISHED_JOBS)) this.jobs.delete(job.id);
  }
}
