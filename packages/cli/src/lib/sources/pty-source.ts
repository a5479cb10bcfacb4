/**
 * Interactive-mode input: a child process on a pseudo-terminal.
 *
 * One reader (the producer, through `chunks`) and one writer (the screen,
 * through `write`). Output the producer has not taken yet is buffered; past
 * the high-water mark the PTY is paused until the buffer drains.
 */

import * as pty from 'node-pty';
import type { IDisposable, IPty, IPtyForkOptions } from 'node-pty';
import type { ChunkSource, ExitStatus, Logger } from '@tfscope/core';
import { CliError, errorMessage } from '../cli-error.js';
import type { KillableProcess, TerminationSignal } from '../process-lifecycle.js';

export type PtyProcess = Pick<IPty, 'pid' | 'onData' | 'onExit' | 'write' | 'resize' | 'kill' | 'pause' | 'resume'>;

export type SpawnPty = (file: string, args: string[], options: IPtyForkOptions) => PtyProcess;

export interface PtySourceOptions {
  command: string;
  args: string[];
  cols: number;
  rows: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger: Logger;
  /** Buffered chunks before the PTY is paused */
  highWaterMark?: number;
  spawn?: SpawnPty;
}

const DEFAULT_HIGH_WATER_MARK = 64;

function childEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  out.TERM = 'xterm-256color';
  return out;
}

export class PtySource implements ChunkSource, KillableProcess {
  private readonly child: PtyProcess;
  private readonly logger: Logger;
  private readonly highWaterMark: number;
  private readonly subscriptions: IDisposable[] = [];

  private readonly pending: string[] = [];
  private wakeReader: (() => void) | null = null;
  private paused = false;
  private disposed = false;
  private exitStatus: ExitStatus | null = null;
  private readonly exitWaiters: Array<(status: ExitStatus) => void> = [];

  constructor(opts: PtySourceOptions) {
    this.logger = opts.logger;
    this.highWaterMark = opts.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    const spawn: SpawnPty = opts.spawn ?? pty.spawn;

    try {
      this.child = spawn(opts.command, opts.args, {
        name: 'xterm-256color',
        cols: Math.max(1, opts.cols),
        rows: Math.max(1, opts.rows),
        cwd: opts.cwd ?? process.cwd(),
        env: childEnv(opts.env ?? process.env),
      });
    } catch (error) {
      throw new CliError(`Cannot start ${opts.command}`, { details: [errorMessage(error)], cause: error });
    }
    this.logger.info('Started child on a pseudo-terminal', { command: opts.command, args: opts.args, pid: this.child.pid });

    this.subscriptions.push(
      this.child.onData((data) => {
        this.pending.push(data);
        if (!this.paused && this.pending.length >= this.highWaterMark) {
          this.paused = true;
          this.child.pause();
        }
        this.wake();
      }),
      this.child.onExit(({ exitCode, signal }) => {
        this.exitStatus = signal ? { exitCode, signal } : { exitCode };
        this.logger.info('Child exited', { exitCode, signal });
        for (const waiter of this.exitWaiters.splice(0)) waiter(this.exitStatus);
        this.wake();
      }),
    );
  }

  get exited(): boolean {
    return this.exitStatus !== null;
  }

  async *chunks(signal: AbortSignal): AsyncIterable<string> {
    const onAbort = (): void => this.wake();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      for (;;) {
        if (signal.aborted) return;
        const chunk = this.pending.shift();
        if (chunk !== undefined) {
          if (this.paused && this.pending.length === 0) {
            this.paused = false;
            this.child.resume();
          }
          yield chunk;
          continue;
        }
        if (this.exitStatus !== null || this.disposed) return;
        await new Promise<void>((resolve) => {
          this.wakeReader = resolve;
        });
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  waitForExit(): Promise<ExitStatus> {
    if (this.exitStatus !== null) return Promise.resolve(this.exitStatus);
    return new Promise((resolve) => {
      this.exitWaiters.push(resolve);
    });
  }

  /** Forward keystrokes. Writes after the child is gone are dropped. */
  write(data: string): void {
    if (this.exited) return;
    try {
      this.child.write(data);
    } catch (error) {
      this.logger.debug('Write to pseudo-terminal failed', { error: errorMessage(error) });
    }
  }

  resize(cols: number, rows: number): void {
    if (this.exited) return;
    try {
      this.child.resize(Math.max(1, cols), Math.max(1, rows));
    } catch (error) {
      this.logger.debug('Pseudo-terminal resize failed', { error: errorMessage(error) });
    }
  }

  kill(signal: TerminationSignal): void {
    if (this.exited) return;
    this.child.kill(signal);
  }

  /** Drop the data and exit listeners and end `chunks`. */
  dispose(): void {
    this.disposed = true;
    for (const subscription of this.subscriptions.splice(0)) subscription.dispose();
    this.wake();
  }

  private wake(): void {
    const wake = this.wakeReader;
    this.wakeReader = null;
    wake?.();
  }
}
