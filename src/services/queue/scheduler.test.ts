import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { QueueScheduler, isTerminal } from './scheduler.js';
import type { RunnerFactory, SchedulerEvent } from './scheduler.js';
import { ProcessRunner } from '../process/runner.js';
import type { JobRunner, RunnerConfig, RunnerHooks, SpawnFn } from '../process/runner.js';
import { createJobSpec, resolveFormat } from '../format/resolver.js';
import { fakeSpawn, flushIo, waitUntil } from '../../test/fakeProcess.js';
import type { JobSpec, JobStatus, RunOutcome } from '../../types/index.js';

const config: RunnerConfig = {
  ytdlpPath: 'yt-dlp',
  customOptions: [],
  gracePeriodMs: 3000,
};

let outputDir: string;

beforeEach(() => {
  outputDir = mkdtempSync(path.join(os.tmpdir(), 'tubequeue-queue-'));
});

afterEach(() => {
  vi.useRealTimers();
  rmSync(outputDir, { recursive: true, force: true });
});

function job(title: string, override = 'bestaudio'): JobSpec {
  return createJobSpec({
    url: `https://example.com/watch?v=${title}`,
    outputDir,
    format: resolveFormat([], { override }),
    title,
  });
}

// Runner whose outcome the test decides
class ControlledRunner implements JobRunner {
  readonly spec: JobSpec;
  readonly hooks: RunnerHooks;
  cancelCalls = 0;
  private resolve?: (outcome: RunOutcome) => void;

  constructor(spec: JobSpec, hooks: RunnerHooks) {
    this.spec = spec;
    this.hooks = hooks;
  }

  run(): Promise<RunOutcome> {
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  finish(outcome: RunOutcome) {
    const resolve = this.resolve;
    this.resolve = undefined;
    resolve?.(outcome);
  }

  cancel(): boolean {
    this.cancelCalls++;
    if (!this.resolve) return false;
    this.finish({ status: 'cancelled' });
    return true;
  }
}

function controlled() {
  const runners: ControlledRunner[] = [];
  const createRunner: RunnerFactory = (spec, hooks) => {
    const runner = new ControlledRunner(spec, hooks);
    runners.push(runner);
    return runner;
  };
  return { runners, createRunner };
}

function runnerAt(runners: ControlledRunner[], index: number): ControlledRunner {
  const runner = runners[index];
  if (!runner) throw new Error(`No runner at ${index}`);
  return runner;
}

// Status history per job title, starting with the initial pending
function recordStatuses(scheduler: QueueScheduler) {
  const history = new Map<string, JobStatus[]>();
  scheduler.subscribe((event: SchedulerEvent) => {
    if (event.type !== 'status') return;
    const key = event.job.spec.title ?? event.job.id;
    history.set(key, [...(history.get(key) ?? []), event.job.status]);
  });
  return history;
}

const VALID_PATHS: JobStatus[][] = [
  ['pending'],
  ['pending', 'cancelled'],
  ['pending', 'running'],
  ['pending', 'running', 'succeeded'],
  ['pending', 'running', 'failed'],
  ['pending', 'running', 'cancelled'],
];

describe('QueueScheduler', () => {
  it('processes every job in enqueue order and ends with nothing pending or running', async () => {
    const started: string[] = [];
    const scheduler = new QueueScheduler({
      config,
      createRunner: (spec) => ({
        run: async () => {
          started.push(spec.title ?? '');
          return { status: 'succeeded' };
        },
        cancel: () => false,
      }),
    });
    const history = recordStatuses(scheduler);

    scheduler.enqueueAll([job('A'), job('B'), job('C'), job('D')]);
    expect(scheduler.counts().pending).toBe(4);

    scheduler.start();
    await scheduler.onIdle();

    expect(started).toEqual(['A', 'B', 'C', 'D']);
    expect(scheduler.counts()).toEqual({ pending: 0, running: 0, succeeded: 4, failed: 0, cancelled: 0 });
    for (const statuses of history.values()) {
      expect(statuses).toEqual(['pending', 'running', 'succeeded']);
    }
  });

  it('runs one job at a time by default', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    scheduler.enqueueAll([job('A'), job('B')]);
    scheduler.start();

    await waitUntil(() => runners.length === 1);
    await flushIo();
    expect(runners).toHaveLength(1);
    expect(scheduler.counts().running).toBe(1);

    runnerAt(runners, 0).finish({ status: 'succeeded' });
    await waitUntil(() => runners.length === 2);
    expect(runnerAt(runners, 1).spec.title).toBe('B');

    runnerAt(runners, 1).finish({ status: 'succeeded' });
    await scheduler.onIdle();
  });

  it('starts the earliest pending job on each idle worker', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner, concurrency: 2 });
    scheduler.enqueueAll([job('A'), job('B'), job('C')]);
    scheduler.start();

    await waitUntil(() => runners.length === 2);
    expect(runners.map((r) => r.spec.title)).toEqual(['A', 'B']);

    runnerAt(runners, 1).finish({ status: 'succeeded' });
    await waitUntil(() => runners.length === 3);
    expect(runnerAt(runners, 2).spec.title).toBe('C');

    runnerAt(runners, 0).finish({ status: 'succeeded' });
    runnerAt(runners, 2).finish({ status: 'succeeded' });
    await scheduler.onIdle();
    expect(scheduler.counts().succeeded).toBe(3);
  });

  it('keeps going after a failed job', async () => {
    const scheduler = new QueueScheduler({
      config,
      createRunner: (spec) => ({
        run: async (): Promise<RunOutcome> =>
          spec.title === 'A'
            ? { status: 'failed', error: { kind: 'runtime', message: 'exited with code 1', exitCode: 1 } }
            : { status: 'succeeded' },
        cancel: () => false,
      }),
    });
    const [a, b] = scheduler.enqueueAll([job('A'), job('B')]);
    scheduler.start();
    await scheduler.onIdle();

    expect(scheduler.getJob(a ?? '')?.status).toBe('failed');
    expect(scheduler.getJob(a ?? '')?.error).toEqual({ kind: 'runtime', message: 'exited with code 1', exitCode: 1 });
    expect(scheduler.getJob(b ?? '')?.status).toBe('succeeded');
    expect(scheduler.getJob(b ?? '')?.error).toBeUndefined();
  });

  it('records a throwing runner as a failure', async () => {
    const scheduler = new QueueScheduler({
      config,
      createRunner: () => ({
        run: () => Promise.reject(new Error('boom')),
        cancel: () => false,
      }),
    });
    const id = scheduler.enqueue(job('A'));
    scheduler.start();
    await scheduler.onIdle();

    expect(scheduler.getJob(id)?.error).toEqual({ kind: 'runtime', message: 'boom' });
  });

  it('drops a cancelled pending job without ever creating a runner for it', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const history = recordStatuses(scheduler);
    const [, b] = scheduler.enqueueAll([job('A'), job('B')]);

    scheduler.start();
    await waitUntil(() => runners.length === 1);
    expect(scheduler.cancelJob(b ?? '')).toBe(true);
    expect(scheduler.snapshot().map((j) => j.spec.title)).toEqual(['A']);
    expect(scheduler.getJob(b ?? '')).toBeUndefined();

    runnerAt(runners, 0).finish({ status: 'succeeded' });
    await scheduler.onIdle();

    expect(runners).toHaveLength(1);
    expect(history.get('B')).toEqual(['pending', 'cancelled']);
    expect(scheduler.cancelJob(b ?? '')).toBe(false);
  });

  it('delegates cancelling a running job to its runner', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const id = scheduler.enqueue(job('A'));
    scheduler.start();
    await waitUntil(() => runners.length === 1);

    expect(scheduler.cancelJob(id)).toBe(true);
    await scheduler.onIdle();

    expect(runnerAt(runners, 0).cancelCalls).toBe(1);
    expect(scheduler.getJob(id)?.status).toBe('cancelled');
    expect(scheduler.getJob(id)?.error).toBeUndefined();
    expect(scheduler.cancelJob(id)).toBe(false);
  });

  it('finishes the in-flight job on pause and resumes on start', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const [a, b] = scheduler.enqueueAll([job('A'), job('B')]);
    scheduler.start();
    await waitUntil(() => runners.length === 1);

    scheduler.pause();
    expect(scheduler.isRunning).toBe(false);
    runnerAt(runners, 0).finish({ status: 'succeeded' });
    await waitUntil(() => scheduler.getJob(a ?? '')?.status === 'succeeded');
    await flushIo();

    expect(runners).toHaveLength(1);
    expect(scheduler.getJob(b ?? '')?.status).toBe('pending');

    scheduler.start();
    await waitUntil(() => runners.length === 2);
    runnerAt(runners, 1).finish({ status: 'succeeded' });
    await scheduler.onIdle();
    expect(scheduler.getJob(b ?? '')?.status).toBe('succeeded');
  });

  it('cancels running work on stop and picks up the pending jobs on the next start', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const [a, b] = scheduler.enqueueAll([job('A'), job('B')]);
    scheduler.start();
    await waitUntil(() => runners.length === 1);

    scheduler.stop();
    await waitUntil(() => scheduler.getJob(a ?? '')?.status === 'cancelled');
    await flushIo();
    expect(runners).toHaveLength(1);
    expect(scheduler.getJob(b ?? '')?.status).toBe('pending');

    scheduler.start();
    await waitUntil(() => runners.length === 2);
    expect(runnerAt(runners, 1).spec.title).toBe('B');
    runnerAt(runners, 1).finish({ status: 'succeeded' });
    await scheduler.onIdle();
  });

  it('reorders pending jobs only', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const [, b, c] = scheduler.enqueueAll([job('A'), job('B'), job('C')]);

    expect(scheduler.reorder(c ?? '', 0)).toBe(true);
    expect(scheduler.snapshot().map((j) => j.spec.title)).toEqual(['C', 'A', 'B']);

    scheduler.start();
    await waitUntil(() => runners.length === 1);
    expect(runnerAt(runners, 0).spec.title).toBe('C');
    expect(scheduler.reorder(c ?? '', 2)).toBe(false);

    // Targets are clamped to the pending rows, never ahead of the running job
    expect(scheduler.reorder(b ?? '', -5)).toBe(true);
    expect(scheduler.snapshot().map((j) => j.spec.title)).toEqual(['C', 'B', 'A']);
    expect(scheduler.reorder(b ?? '', 99)).toBe(true);
    expect(scheduler.snapshot().map((j) => j.spec.title)).toEqual(['C', 'A', 'B']);
    expect(scheduler.reorder(b ?? '', 0)).toBe(true);
    expect(scheduler.snapshot().map((j) => j.spec.title)).toEqual(['C', 'B', 'A']);

    runnerAt(runners, 0).finish({ status: 'succeeded' });
    await waitUntil(() => runners.length === 2);
    expect(runnerAt(runners, 1).spec.title).toBe('B');
    expect(scheduler.reorder(c ?? '', 2)).toBe(false);

    runnerAt(runners, 1).finish({ status: 'succeeded' });
    await waitUntil(() => runners.length === 3);
    runnerAt(runners, 2).finish({ status: 'succeeded' });
    await scheduler.onIdle();
  });

  it('removes pending and finished jobs but not running ones', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const [a, b, c] = scheduler.enqueueAll([job('A'), job('B'), job('C')]);
    scheduler.start();
    await waitUntil(() => runners.length === 1);

    expect(scheduler.remove(a ?? '')).toBe(false);
    expect(scheduler.remove(b ?? '')).toBe(true);

    runnerAt(runners, 0).finish({ status: 'failed', error: { kind: 'runtime', message: 'x' } });
    await waitUntil(() => runners.length === 2);
    expect(runnerAt(runners, 1).spec.title).toBe('C');
    expect(scheduler.remove(a ?? '')).toBe(true);

    runnerAt(runners, 1).finish({ status: 'succeeded' });
    await scheduler.onIdle();
    expect(scheduler.clearFinished()).toBe(1);
    expect(scheduler.getJob(c ?? '')).toBeUndefined();
    expect(scheduler.snapshot()).toEqual([]);
  });

  it('only ever moves a job along the allowed status path', async () => {
    const { runners, createRunner } = controlled();
    const scheduler = new QueueScheduler({ config, createRunner });
    const history = recordStatuses(scheduler);
    const ids = scheduler.enqueueAll([job('A'), job('B'), job('C'), job('D'), job('E')]);

    scheduler.cancelJob(ids[3] ?? '');
    scheduler.start();

    await waitUntil(() => runners.length === 1);
    runnerAt(runners, 0).finish({ status: 'succeeded' });
    await waitUntil(() => runners.length === 2);
    runnerAt(runners, 1).finish({ status: 'failed', error: { kind: 'spawn', message: 'missing' } });
    await waitUntil(() => runners.length === 3);
    scheduler.cancelJob(ids[2] ?? '');
    await waitUntil(() => runners.length === 4);
    scheduler.pause();
    runnerAt(runners, 3).finish({ status: 'succeeded' });
    await waitUntil(() => scheduler.counts().running === 0);

    expect([...history.entries()]).toEqual([
      ['A', ['pending', 'running', 'succeeded']],
      ['B', ['pending', 'running', 'failed']],
      ['C', ['pending', 'running', 'cancelled']],
      ['D', ['pending', 'cancelled']],
      ['E', ['pending', 'running', 'succeeded']],
    ]);
    for (const statuses of history.values()) {
      expect(VALID_PATHS).toContainEqual(statuses);
      expect(statuses.filter(isTerminal).length).toBeLessThanOrEqual(1);
    }
  });

  it('rejects a worker count below one', () => {
    expect(() => new QueueScheduler({ config, concurrency: 0 })).toThrow(RangeError);
  });
});

describe('QueueScheduler with the process runner', () => {
  function withSpawn(spawn: SpawnFn): RunnerFactory {
    return (spec, hooks) => new ProcessRunner(spec, config, hooks, spawn);
  }

  it('completes a bestaudio download at 100 percent', async () => {
    const { spawn, calls } = fakeSpawn((child) => {
      child.out('[download] 100% of 3.2MiB\n');
      child.exit(0);
    });
    const scheduler = new QueueScheduler({ config, createRunner: withSpawn(spawn) });
    const id = scheduler.enqueue(job('song', 'bestaudio'));

    scheduler.start();
    await scheduler.onIdle();

    const snapshot = scheduler.getJob(id);
    expect(snapshot?.status).toBe('succeeded');
    expect(snapshot?.progress.percent).toBe(100);
    expect(snapshot?.progress.totalSize).toBe('3.2MiB');
    expect(scheduler.getLog(id)).toEqual(['[download] 100% of 3.2MiB']);
    expect(calls[0]?.args.slice(2, 4)).toEqual(['-f', 'bestaudio']);
  });

  it('fails with the tool error text on exit 1', async () => {
    const { spawn } = fakeSpawn((child) => {
      child.err('ERROR: Video unavailable\n');
      child.exit(1);
    });
    const scheduler = new QueueScheduler({ config, createRunner: withSpawn(spawn) });
    const id = scheduler.enqueue(job('gone'));

    scheduler.start();
    await scheduler.onIdle();

    expect(scheduler.getJob(id)?.status).toBe('failed');
    expect(scheduler.getJob(id)?.error).toEqual({ kind: 'runtime', message: 'Video unavailable', exitCode: 1 });
    expect(scheduler.getLog(id)).toEqual(['ERROR: Video unavailable']);
  });

  it('publishes stage labels and progress in read order', async () => {
    const { spawn } = fakeSpawn((child) => {
      child.out('[download] Destination: clip.mp4\n[download]  50.0% of 4.00MiB at 1.00MiB/s ETA 00:02\n');
      child.out('[Merger] Merging formats into "clip.mp4"\n');
      child.exit(0);
    });
    const scheduler = new QueueScheduler({ config, createRunner: withSpawn(spawn) });
    const kinds: string[] = [];
    scheduler.subscribe((event) => {
      if (event.type === 'progress') kinds.push(event.event.kind);
    });
    const id = scheduler.enqueue(job('clip'));

    scheduler.start();
    await scheduler.onIdle();

    expect(kinds).toEqual(['stage', 'progress', 'stage', 'exit']);
    expect(scheduler.getJob(id)?.progress).toEqual({
      percent: 50,
      rate: '1.00MiB/s',
      eta: '00:02',
      totalSize: '4.00MiB',
      stage: 'Merging video and audio...',
    });
  });

  it('cancels a running job that ignores SIGTERM once the grace period runs out', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const { spawn, calls } = fakeSpawn((child) => {
      child.ignoreTerm = true;
      child.out('[download]   1.0% of 9.00MiB\n');
    });
    const scheduler = new QueueScheduler({ config, createRunner: withSpawn(spawn) });
    const id = scheduler.enqueue(job('stubborn'));
    scheduler.start();

    await waitUntil(() => scheduler.getLog(id).length === 1);
    expect(scheduler.cancelJob(id)).toBe(true);
    expect(scheduler.getJob(id)?.status).toBe('running');

    vi.advanceTimersByTime(3000);
    await waitUntil(() => scheduler.getJob(id)?.status === 'cancelled');
    expect(calls[0]?.child.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(scheduler.getJob(id)?.error).toBeUndefined();
  });

  it('leaves a cancelled job untouched by output its killed process still prints', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const { spawn, calls } = fakeSpawn((child) => {
      child.ignoreTerm = true;
      child.ignoreKill = true;
      child.out('[download]   1.0% of 1.00MiB\n');
    });
    const scheduler = new QueueScheduler({ config, createRunner: withSpawn(spawn) });
    const id = scheduler.enqueue(job('lingering'));
    scheduler.start();

    await waitUntil(() => scheduler.getLog(id).length === 1);
    scheduler.cancelJob(id);
    vi.advanceTimersByTime(3000);
    await waitUntil(() => scheduler.getJob(id)?.status === 'cancelled');

    const late: string[] = [];
    scheduler.subscribe((event) => late.push(event.type));
    calls[0]?.child.out('[download]  60.0% of 1.00MiB\n');
    calls[0]?.child.exit(null, 'SIGKILL');
    await flushIo();
    await flushIo();

    expect(late).toEqual([]);
    expect(scheduler.getLog(id)).toEqual(['[download]   1.0% of 1.00MiB']);
    expect(scheduler.getJob(id)?.progress.percent).toBe(1);
  });
});
