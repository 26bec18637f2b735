import { spawn } from 'child_process';
import { mkdir } from 'fs/promises';
import type { SpawnOptions } from 'child_process';
import type { Readable } from 'stream';
import { ProgressParser } from '../progress/parser.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { sanitizeFilename } from '../../utils/validator.js';
import type { DownloaderConfig, JobError, JobSpec, ProgressEvent, RunOutcome } from '../../types/index.js';

// The slice of ChildProcess the runner relies on
export interface ToolProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ToolProcess;

export const spawnTool: SpawnFn = (command, args, options) => spawn(command, args, options);

export type RunnerConfig = Pick<
  DownloaderConfig,
  | 'ytdlpPath'
  | 'ffmpegPath'
  | 'cookiesFile'
  | 'limitRate'
  | 'throttledRate'
  | 'customOptions'
  | 'gracePeriodMs'
>;

export interface RunnerHooks {
  onEvent?: (event: ProgressEvent) => void;
  onLine?: (line: string, stream: 'stdout' | 'stderr') => void;
}

export interface JobRunner {
  run(): Promise<RunOutcome>;
  cancel(): boolean;
}

/**
 * Full argument vector for one job, URL last.
 */
export function buildInvocation(spec: JobSpec, config: RunnerConfig): string[] {
  const args: string[] = [];

  if (config.ffmpegPath) {
    args.push('--ffmpeg-location', config.ffmpegPath);
  }
  args.push('-P', spec.outputDir);
  args.push(...config.customOptions);
  if (config.cookiesFile) {
    args.push('--cookies', config.cookiesFile);
  }

  args.push(...spec.formatArgs, ...spec.subtitleArgs, ...spec.itemArgs);

  // Raw argument jobs may bring their own template
  if (!spec.formatArgs.some((arg) => arg === '-o' || arg === '--output')) {
    const label = sanitizeFilename(spec.formatLabel);
    args.push('-o', label ? `%(title)s [${label}].%(ext)s` : '%(title)s [%(format_id)s].%(ext)s');
  }

  if (config.limitRate) {
    args.push('--limit-rate', config.limitRate);
  }
  if (config.throttledRate) {
    args.push('--throttled-rate', config.throttledRate);
  }

  // One progress update per line instead of carriage-return redraws
  args.push('--newline');
  args.push(spec.url);
  return args;
}

function spawnFailure(message: string): RunOutcome {
  return { status: 'failed', error: { kind: 'spawn', message } };
}

/**
 * Supervises a single yt-dlp invocation. A runner is good for exactly one run.
 */
export class ProcessRunner implements JobRunner {
  private readonly spec: JobSpec;
  private readonly config: RunnerConfig;
  private readonly hooks: RunnerHooks;
  private readonly spawnFn: SpawnFn;

  private started = false;
  private settled = false;
  private cancelRequested = false;
  private sawOutput = false;
  private child?: ToolProcess;
  private killTimer?: NodeJS.Timeout;
  private settle?: (outcome: RunOutcome) => void;
  private lastError?: string;
  private lastWarning?: string;

  constructor(spec: JobSpec, config: RunnerConfig, hooks: RunnerHooks = {}, spawnFn: SpawnFn = spawnTool) {
    this.spec = spec;
    this.config = config;
    this.hooks = hooks;
    this.spawnFn = spawnFn;
  }

  async run(): Promise<RunOutcome> {
    if (this.started) {
      throw new Error('ProcessRunner.run() called twice');
    }
    this.started = true;

    const args = buildInvocation(this.spec, this.config);

    try {
      await mkdir(this.spec.outputDir, { recursive: true });
    } catch (error) {
      return this.finishEarly(
        spawnFailure(`Cannot create output directory ${this.spec.outputDir}: ${errorMessage(error)}`)
      );
    }

    if (this.cancelRequested) {
      return this.finishEarly({ status: 'cancelled' });
    }

    logger.debug(`Running: ${this.config.ytdlpPath} ${args.join(' ')}`);

    return new Promise<RunOutcome>((resolve) => {
      this.settle = (outcome) => {
        if (this.settled) return;
        this.settled = true;
        if (this.killTimer) clearTimeout(this.killTimer);
        this.killTimer = undefined;
        this.child = undefined;
        resolve(outcome);
      };

      let child: ToolProcess;
      try {
        child = this.spawnFn(this.config.ytdlpPath, args, {
          cwd: this.spec.outputDir,
          env: { ...process.env, PYTHONIOENCODING: 'utf-8' },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        this.settle(spawnFailure(`Failed to start ${this.config.ytdlpPath}: ${errorMessage(error)}`));
        return;
      }
      this.child = child;

      const stdout = new ProgressParser((line) => this.handleLine(line, 'stdout'));
      const stderr = new ProgressParser((line) => this.handleLine(line, 'stderr'));

      // Output from a process that outlived its run (killed, not yet reaped) is dropped
      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        if (!this.settled) this.dispatch(stdout.push(chunk));
      });
      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        if (!this.settled) this.dispatch(stderr.push(chunk));
      });

      child.once('error', (error) => {
        if (this.cancelRequested) {
          // Kill failures land here; the grace timer still settles the run
          logger.debug(`Error while stopping ${this.config.ytdlpPath}: ${error.message}`);
          return;
        }
        const failure: JobError = {
          kind: this.sawOutput ? 'runtime' : 'spawn',
          message: `Failed to run ${this.config.ytdlpPath}: ${error.message}`,
        };
        this.settle?.({ status: 'failed', error: failure });
      });

      child.once('close', (code, signal) => {
        if (this.settled) return;
        this.dispatch(stdout.flush());
        this.dispatch(stderr.flush());
        this.dispatch([{ kind: 'exit', code, signal }]);
        this.settle?.(this.outcomeFor(code, signal));
      });
    });
  }

  /**
   * SIGTERM first, SIGKILL once the grace period runs out. Returns false when
   * the run has already finished or the process has exited and only its
   * `close` is still outstanding.
   */
  cancel(): boolean {
    if (this.settled) return false;
    if (this.cancelRequested) return true;

    const child = this.child;
    if (!child) {
      // Not spawned yet: run() checks the flag before spawning
      this.cancelRequested = true;
      return true;
    }

    logger.debug(`Stopping ${this.config.ytdlpPath} (pid ${child.pid ?? 'unknown'})`);
    if (!child.kill('SIGTERM')) {
      logger.debug(`${this.config.ytdlpPath} already exited, nothing to cancel`);
      return false;
    }
    this.cancelRequested = true;

    this.killTimer = setTimeout(() => {
      if (this.settled) return;
      logger.debug(`No exit after ${this.config.gracePeriodMs}ms, sending SIGKILL`);
      child.kill('SIGKILL');
      this.settle?.({ status: 'cancelled' });
    }, this.config.gracePeriodMs);

    return true;
  }

  private finishEarly(outcome: RunOutcome): RunOutcome {
    this.settled = true;
    return outcome;
  }

  private handleLine(line: string, stream: 'stdout' | 'stderr') {
    this.sawOutput = true;
    this.hooks.onLine?.(line, stream);
  }

  private dispatch(events: ProgressEvent[]) {
    for (const event of events) {
      if (event.kind === 'error') this.lastError = event.text;
      if (event.kind === 'warning') this.lastWarning = event.text;
      this.hooks.onEvent?.(event);
    }
  }

  private outcomeFor(code: number | null, signal: NodeJS.Signals | null): RunOutcome {
    if (this.cancelRequested) return { status: 'cancelled' };
    if (code === 0) return { status: 'succeeded' };

    const fallback = code !== null ? `exited with code ${code}` : `terminated by ${signal ?? 'unknown signal'}`;
    const message = this.lastError || this.lastWarning || fallback;
    return {
      status: 'failed',
      error: {
        kind: 'runtime',
        message,
        ...(code !== null ? { exitCode: code } : {}),
      },
    };
  }
}
