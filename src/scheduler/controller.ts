import type { ContentGenerator } from '../content/generator.js';
import type { Publisher } from '../publishing/publisher.js';
import type { RunHistory, RunResult } from '../services/run-history.service.js';
import type { JobSpec } from '../types.js';
import { errorMessage } from '../errors.js';
import { sleep } from '../utils/sleep.js';

export const DEFAULT_INTERVAL_MS = 30 * 60 * 1000;

export type SchedulerState = 'idle' | 'running' | 'stop_requested';

export type StartResult = 'started' | 'already_running' | 'restart_queued';

export interface SchedulerDependencies {
  generator: Pick<ContentGenerator, 'generateTitle' | 'generateBody'>;
  publisher: Publisher;
  history?: RunHistory;
}

export interface SchedulerOptions {
  intervalMs?: number;
}

export interface SchedulerStatus {
  state: SchedulerState;
  job: JobSpec | null;
  iterations: number;
  lastRunAt: string | null;
  nextRunAt: string | null;
}

/**
 * Owns the single recurring posting loop.
 *
 * The loop runs one iteration as soon as it starts and then one per interval:
 * title, then body, then publish when a body was generated. Stopping aborts
 * the wait between iterations at once, but an iteration already in progress
 * is allowed to finish. At most one loop is alive at any time.
 */
export class ScheduledJobController {
  private state: SchedulerState = 'idle';
  private job: JobSpec | null = null;
  private queuedJob: JobSpec | null = null;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private iterations = 0;
  private lastRunAt: Date | null = null;
  private nextRunAt: Date | null = null;
  private readonly intervalMs: number;

  constructor(
    private readonly deps: SchedulerDependencies,
    options: SchedulerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  }

  /**
   * While running, the new job replaces the old one from the next iteration
   * on. While a stop is still draining, the job is queued and a fresh loop
   * starts once the old one has exited.
   */
  start(spec: JobSpec): StartResult {
    const snapshot = snapshotJob(spec);

    switch (this.state) {
      case 'idle':
        this.spawn(snapshot);
        return 'started';

      case 'running':
        this.job = snapshot;
        console.log(`[Scheduler] Already running; topic "${snapshot.topic}" applies from the next run`);
        return 'already_running';

      case 'stop_requested':
        this.queuedJob = snapshot;
        console.log(`[Scheduler] Stop in progress; restart with topic "${snapshot.topic}" queued`);
        return 'restart_queued';
    }
  }

  /** Returns false when there was nothing to stop. Never waits for the loop. */
  stop(): boolean {
    if (this.state === 'idle') {
      return false;
    }

    this.queuedJob = null;

    if (this.state === 'running') {
      this.state = 'stop_requested';
      this.abortController?.abort();
      console.log('[Scheduler] Stop requested');
    }
    return true;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      job: this.job ? snapshotJob(this.job) : null,
      iterations: this.iterations,
      lastRunAt: this.lastRunAt?.toISOString() ?? null,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    };
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /** Resolves once no loop is alive, including any restart queued during a stop. */
  async whenIdle(): Promise<void> {
    while (this.loop) {
      await this.loop;
    }
  }

  private spawn(spec: JobSpec): void {
    const abortController = new AbortController();

    this.job = spec;
    this.abortController = abortController;
    this.state = 'running';
    console.log(`[Scheduler] Started: posting about "${spec.topic}" every ${this.intervalMs / 60_000} minutes`);

    this.loop = this.runLoop(abortController.signal)
      .catch(error => {
        console.error('[Scheduler] Loop terminated unexpectedly:', error);
      })
      .finally(() => this.onLoopExit());
  }

  private onLoopExit(): void {
    this.loop = null;
    this.abortController = null;
    this.nextRunAt = null;
    this.state = 'idle';
    console.log('[Scheduler] Stopped');

    const queued = this.queuedJob;
    this.queuedJob = null;
    if (queued) {
      this.spawn(queued);
    }
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const job = this.job;
      if (!job) return;

      try {
        await this.runIteration(job);
      } catch (error) {
        // One bad iteration never ends the loop
        console.error(`[Scheduler] Run failed: ${errorMessage(error)}`);
      }

      if (signal.aborted) return;

      this.nextRunAt = new Date(Date.now() + this.intervalMs);
      console.log(`[Scheduler] Next run at ${this.nextRunAt.toISOString()}`);

      const elapsed = await sleep(this.intervalMs, signal);
      if (!elapsed) return;
    }
  }

  private async runIteration(job: JobSpec): Promise<void> {
    const { generator, publisher, history } = this.deps;

    this.iterations++;
    this.lastRunAt = new Date();
    this.nextRunAt = null;
    console.log(`[Scheduler] Run #${this.iterations} started for topic "${job.topic}"`);

    const runId = history?.recordStart(job);
    let result: RunResult = { status: 'crashed', title: null, error: null };

    try {
      const title = await generator.generateTitle(job.topic, job.keywords);
      result = { ...result, title };

      const body = await generator.generateBody(title, job.topic, job.keywords);

      if (body.outcome === 'failed') {
        console.error(`[Scheduler] Failed to generate blog content, skipping publish: ${body.error}`);
        result = { ...result, status: 'generation_failed', error: body.error };
        return;
      }

      console.log(`[Scheduler] Publishing blog post: ${title}`);
      const published = await publisher.publish(title, body.body);
      result = published
        ? { ...result, status: 'published' }
        : { ...result, status: 'publish_failed', error: 'CMS did not accept the post' };
    } catch (error) {
      result = { ...result, status: 'crashed', error: errorMessage(error) };
      throw error;
    } finally {
      if (runId !== undefined) {
        history?.recordFinish(runId, result);
      }
      console.log(`[Scheduler] Run #${this.iterations} finished: ${result.status}`);
    }
  }
}

function snapshotJob(spec: JobSpec): JobSpec {
  return { topic: spec.topic, keywords: [...spec.keywords] };
}
