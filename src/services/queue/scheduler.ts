import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import { ProcessRunner } from '../process/runner.js';
import type { JobRunner, RunnerConfig, RunnerHooks } from '../process/runner.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type {
  JobError,
  JobSnapshot,
  JobSpec,
  JobStatus,
  ProgressEvent,
  ProgressSnapshot,
  RunOutcome,
} from '../../types/index.js';

export type SchedulerEvent =
  | { type: 'status'; job: JobSnapshot; previous: JobStatus | null }
  | { type: 'progress'; jobId: string; event: ProgressEvent }
  | { type: 'output'; jobId: string; line: string }
  | { type: 'idle' };

export type RunnerFactory = (spec: JobSpec, hooks: RunnerHooks) => JobRunner;

export interface SchedulerOptions {
  config: RunnerConfig;
  concurrency?: number;
  createRunner?: RunnerFactory;
}

interface JobRecord {
  id: string;
  spec: JobSpec;
  status: JobStatus;
  progress: ProgressSnapshot;
  error?: JobError;
  log: string[];
  createdAt: number;
  startedAt?: number;
  finishedAt?: number;
  runner?: JobRunner;
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'cancelled'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
};

const TERMINAL: ReadonlySet<JobStatus> = new Set<JobStatus>(['succeeded', 'failed', 'cancelled']);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

function toSnapshot(job: JobRecord): JobSnapshot {
  return Object.freeze({
    id: job.id,
    spec: job.spec,
    status: job.status,
    progress: Object.freeze({ ...job.progress }),
    ...(job.error ? { error: Object.freeze({ ...job.error }) } : {}),
    createdAt: job.createdAt,
    ...(job.startedAt !== undefined ? { startedAt: job.startedAt } : {}),
    ...(job.finishedAt !== undefined ? { finishedAt: job.finishedAt } : {}),
  });
}

/**
 * Ordered download queue. All job state lives here and is only mutated from
 * the event loop; callers get frozen snapshots.
 *
 * Each p-queue task is a worker slot that claims the earliest pending job at
 * the moment it starts, so reordering and cancelling pending jobs never has
 * to touch p-queue itself.
 */
export class QueueScheduler {
  private readonly jobs: JobRecord[] = [];
  private readonly queue: PQueue;
  private readonly events = new EventEmitter();
  private readonly createRunner: RunnerFactory;

  constructor(options: SchedulerOptions) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    this.queue = new PQueue({ concurrency, autoStart: false });
    this.queue.on('idle', () => this.emit({ type: 'idle' }));

    this.createRunner =
      options.createRunner ?? ((spec, hooks) => new ProcessRunner(spec, options.config, hooks));
  }

  get isRunning(): boolean {
    return !this.queue.isPaused;
  }

  get concurrency(): number {
    return this.queue.concurrency;
  }

  subscribe(listener: (event: SchedulerEvent) => void): () => void {
    this.events.on('event', listener);
    return () => {
      this.events.off('event', listener);
    };
  }

  enqueue(spec: JobSpec): string {
    const job: JobRecord = {
      id: uuidv4(),
      spec,
      status: 'pending',
      progress: {},
      log: [],
      createdAt: Date.now(),
    };
    this.jobs.push(job);
    logger.debug(`Queued ${job.id}: ${spec.title ?? spec.url} [${spec.formatLabel}]`);
    this.emit({ type: 'status', job: toSnapshot(job), previous: null });
    this.addWorkerSlot();
    return job.id;
  }

  enqueueAll(specs: readonly JobSpec[]): string[] {
    return specs.map((spec) => this.enqueue(spec));
  }

  start() {
    // Slots dropped by stop() are put back for the jobs still pending
    const missing = this.count('pending') - this.queue.size;
    for (let i = 0; i < missing; i++) this.addWorkerSlot();
    this.queue.start();
  }

  // In-flight jobs finish; nothing new starts
  pause() {
    this.queue.pause();
  }

  // Pause and cancel whatever is running; pending jobs stay queued
  stop() {
    this.queue.pause();
    this.queue.clear();
    for (const job of this.jobs) {
      if (job.status === 'running') job.runner?.cancel();
    }
  }

  /**
   * Pending jobs are dropped without ever spawning; running jobs are asked to
   * stop and turn `cancelled` once their process is gone.
   */
  cancelJob(id: string): boolean {
    const job = this.find(id);
    if (!job) return false;

    if (job.status === 'pending') {
      job.finishedAt = Date.now();
      this.transition(job, 'cancelled');
      this.jobs.splice(this.jobs.indexOf(job), 1);
      return true;
    }

    if (job.status === 'running') {
      return job.runner?.cancel() ?? false;
    }

    return false;
  }

  reorder(id: string, newIndex: number): boolean {
    const job = this.find(id);
    if (!job || job.status !== 'pending') return false;

    const from = this.jobs.indexOf(job);
    this.jobs.splice(from, 1);

    // Only pending rows are reordered: running and finished jobs keep their places
    let first = -1;
    let last = -1;
    this.jobs.forEach((other, i) => {
      if (other.status !== 'pending') return;
      if (first === -1) first = i;
      last = i;
    });
    const to = first === -1 ? from : Math.max(first, Math.min(last + 1, Math.trunc(newIndex)));
    this.jobs.splice(to, 0, job);
    return true;
  }

  // Pending jobs are cancelled on the way out; running ones must be cancelled first
  remove(id: string): boolean {
    const job = this.find(id);
    if (!job || job.status === 'running') return false;
    if (job.status === 'pending') return this.cancelJob(id);
    this.jobs.splice(this.jobs.indexOf(job), 1);
    return true;
  }

  clearFinished(): number {
    const before = this.jobs.length;
    for (let i = this.jobs.length - 1; i >= 0; i--) {
      const job = this.jobs[i];
      if (job && isTerminal(job.status)) this.jobs.splice(i, 1);
    }
    return before - this.jobs.length;
  }

  snapshot(): JobSnapshot[] {
    return this.jobs.map(toSnapshot);
  }

  getJob(id: string): JobSnapshot | undefined {
    const job = this.find(id);
    return job ? toSnapshot(job) : undefined;
  }

  getLog(id: string): readonly string[] {
    return [...(this.find(id)?.log ?? [])];
  }

  counts(): Record<JobStatus, number> {
    return {
      pending: this.count('pending'),
      running: this.count('running'),
      succeeded: this.count('succeeded'),
      failed: this.count('failed'),
      cancelled: this.count('cancelled'),
    };
  }

  // Resolves once no worker slot is queued or in flight
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private count(status: JobStatus): number {
    return this.jobs.filter((job) => job.status === status).length;
  }

  private find(id: string): JobRecord | undefined {
    return this.jobs.find((job) => job.id === id);
  }

  private emit(event: SchedulerEvent) {
    this.events.emit('event', event);
  }

  private addWorkerSlot() {
    this.queue.add(() => this.runNextPending()).catch((error: unknown) => {
      logger.error(`Queue worker crashed: ${errorMessage(error)}`);
    });
  }

  private transition(job: JobRecord, next: JobStatus) {
    const previous = job.status;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Illegal job transition ${previous} -> ${next} for ${job.id}`);
    }
    job.status = next;
    this.emit({ type: 'status', job: toSnapshot(job), previous });
  }

  private async runNextPending(): Promise<void> {
    const job = this.jobs.find((j) => j.status === 'pending');
    if (!job) return;

    const runner = this.createRunner(job.spec, {
      onEvent: (event) => this.handleEvent(job, event),
      onLine: (line) => this.handleLine(job, line),
    });
    job.runner = runner;
    job.startedAt = Date.now();
    this.transition(job, 'running');

    let outcome: RunOutcome;
    try {
      outcome = await runner.run();
    } catch (error) {
      outcome = { status: 'failed', error: { kind: 'runtime', message: errorMessage(error) } };
    }

    job.runner = undefined;
    job.finishedAt = Date.now();
    if (outcome.status === 'failed') {
      job.error = outcome.error;
      logger.debug(`Job ${job.id} failed: ${outcome.error.message}`);
    }
    this.transition(job, outcome.status);
  }

  private handleLine(job: JobRecord, line: string) {
    if (job.status !== 'running') return;
    job.log.push(line);
    this.emit({ type: 'output', jobId: job.id, line });
  }

  private handleEvent(job: JobRecord, event: ProgressEvent) {
    if (job.status !== 'running') return;
    switch (event.kind) {
      case 'progress':
        job.progress = {
          ...job.progress,
          percent: event.percent,
          rate: event.rate,
          eta: event.eta,
          ...(event.totalSize ? { totalSize: event.totalSize } : {}),
        };
        break;
      case 'stage':
        job.progress = { ...job.progress, stage: event.label };
        break;
      default:
        // Warnings and errors only surface through the log and the failure detail
        break;
    }
    this.emit({ type: 'progress', jobId: job.id, event });
  }
}
