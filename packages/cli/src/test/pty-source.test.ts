import { describe, it, expect, vi } from 'vitest';
import type { IDisposable, IPtyForkOptions } from 'node-pty';
import type { Logger } from '@tfscope/core';
import { CliError } from '../lib/cli-error.js';
import { PtySource, type PtyProcess, type PtySourceOptions } from '../lib/sources/pty-source.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface ExitEvent {
  exitCode: number;
  signal?: number;
}

class FakePty implements PtyProcess {
  readonly pid = 4242;
  readonly written: string[] = [];
  readonly resizes: Array<[number, number]> = [];
  readonly killed: Array<string | undefined> = [];
  pauses = 0;
  resumes = 0;
  failWrites = false;
  dataListeners: Array<(data: string) => void> = [];
  exitListeners: Array<(event: ExitEvent) => void> = [];

  onData = (listener: (data: string) => void): IDisposable => {
    this.dataListeners.push(listener);
    return { dispose: () => { this.dataListeners = this.dataListeners.filter((l) => l !== listener); } };
  };

  onExit = (listener: (event: ExitEvent) => void): IDisposable => {
    this.exitListeners.push(listener);
    return { dispose: () => { this.exitListeners = this.exitListeners.filter((l) => l !== listener); } };
  };

  write(data: string): void {
    if (this.failWrites) throw new Error('EIO');
    this.written.push(data);
  }

  resize(cols: number, rows: number): void {
    this.resizes.push([cols, rows]);
  }

  kill(signal?: string): void {
    this.killed.push(signal);
  }

  pause(): void {
    this.pauses++;
  }

  resume(): void {
    this.resumes++;
  }

  emitData(data: string): void {
    for (const listener of this.dataListeners) listener(data);
  }

  emitExit(event: ExitEvent): void {
    for (const listener of this.exitListeners) listener(event);
  }
}

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function start(overrides: Partial<PtySourceOptions> = {}) {
  const fake = new FakePty();
  const spawned: Array<{ file: string; args: string[]; options: IPtyForkOptions }> = [];
  const logger = fakeLogger();
  const source = new PtySource({
    command: 'terraform',
    args: ['apply'],
    cols: 100,
    rows: 40,
    logger,
    env: { HOME: '/home/test', UNSET: undefined },
    spawn: (file, args, options) => {
      spawned.push({ file, args, options });
      return fake;
    },
    ...overrides,
  });
  return { fake, source, spawned, logger };
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of iterable) out.push(chunk);
  return out;
}

// ---------------------------------------------------------------------------
// PtySource
// ---------------------------------------------------------------------------

describe('PtySource', () => {
  it('spawns on an xterm pseudo-terminal of the given size', () => {
    const { spawned } = start();
    expect(spawned).toHaveLength(1);
    expect(spawned[0].file).toBe('terraform');
    expect(spawned[0].args).toEqual(['apply']);
    expect(spawned[0].options).toMatchObject({
      name: 'xterm-256color',
      cols: 100,
      rows: 40,
      env: { HOME: '/home/test', TERM: 'xterm-256color' },
    });
    expect(spawned[0].options.env).not.toHaveProperty('UNSET');
  });

  it('reports a spawn failure as a CliError', () => {
    expect(() => start({
      spawn: () => {
        throw new Error('ENOENT');
      },
    })).toThrow(CliError);
  });

  it('yields buffered output and ends when the child exits', async () => {
    const { fake, source } = start();
    fake.emitData('Plan: 1 to add\n');
    fake.emitData('Enter a value: ');
    fake.emitExit({ exitCode: 0 });

    expect(await collect(source.chunks(new AbortController().signal))).toEqual([
      'Plan: 1 to add\n',
      'Enter a value: ',
    ]);
    expect(await source.waitForExit()).toEqual({ exitCode: 0 });
    expect(source.exited).toBe(true);
  });

  it('wakes a waiting reader when data arrives', async () => {
    const { fake, source } = start();
    const iterator = source.chunks(new AbortController().signal)[Symbol.asyncIterator]();
    const next = iterator.next();
    fake.emitData('x');
    expect(await next).toEqual({ value: 'x', done: false });
  });

  it('carries the terminating signal in the exit status', async () => {
    const { fake, source } = start();
    const exit = source.waitForExit();
    fake.emitExit({ exitCode: 0, signal: 15 });
    expect(await exit).toEqual({ exitCode: 0, signal: 15 });
  });

  it('pauses the terminal past the high-water mark and resumes once drained', async () => {
    const { fake, source } = start({ highWaterMark: 2 });
    fake.emitData('a');
    fake.emitData('b');
    expect(fake.pauses).toBe(1);

    const iterator = source.chunks(new AbortController().signal)[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 'a', done: false });
    expect(fake.resumes).toBe(0);
    expect(await iterator.next()).toEqual({ value: 'b', done: false });
    expect(fake.resumes).toBe(1);
  });

  it('ends a waiting reader on abort', async () => {
    const { source } = start();
    const controller = new AbortController();
    const iterator = source.chunks(controller.signal)[Symbol.asyncIterator]();
    const next = iterator.next();
    controller.abort();
    expect(await next).toEqual({ value: undefined, done: true });
  });

  it('ends a waiting reader on dispose and drops its listeners', async () => {
    const { fake, source } = start();
    const iterator = source.chunks(new AbortController().signal)[Symbol.asyncIterator]();
    const next = iterator.next();
    source.dispose();
    expect(await next).toEqual({ value: undefined, done: true });
    expect(fake.dataListeners).toEqual([]);
    expect(fake.exitListeners).toEqual([]);
  });

  it('forwards keystrokes and resizes while the child runs', () => {
    const { fake, source } = start();
    source.write('yes\n');
    source.resize(0, 30);
    expect(fake.written).toEqual(['yes\n']);
    expect(fake.resizes).toEqual([[1, 30]]);
  });

  it('drops writes and signals after exit', () => {
    const { fake, source } = start();
    fake.emitExit({ exitCode: 1 });
    source.write('late');
    source.kill('SIGTERM');
    expect(fake.written).toEqual([]);
    expect(fake.killed).toEqual([]);
  });

  it('swallows a failed write with a debug log', () => {
    const { fake, source, logger } = start();
    fake.failWrites = true;
    source.write('\x03');
    expect(logger.debug).toHaveBeenCalledWith('Write to pseudo-terminal failed', { error: 'EIO' });
  });

  it('passes signals to the child', () => {
    const { fake, source } = start();
    source.kill('SIGTERM');
    expect(fake.killed).toEqual(['SIGTERM']);
  });
});
