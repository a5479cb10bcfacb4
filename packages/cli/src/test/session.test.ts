import { describe, it, expect, vi } from 'vitest';
import { ViewerModel, type ChunkSource, type ExitStatus } from '@tfscope/core';
import { silentLogger } from '../lib/logger.js';
import { ViewerSession } from '../lib/session.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONFIG = { tickMs: 5, queueCapacity: 4, promptPatterns: ['Enter a value:\\s*$'] };

function scriptedSource(chunks: readonly string[]): ChunkSource {
  return {
    async *chunks() {
      for (const chunk of chunks) yield chunk;
    },
  };
}

/** Yields `chunk` every few milliseconds until aborted. */
function endlessSource(chunk: string): ChunkSource {
  return {
    async *chunks(signal: AbortSignal) {
      while (!signal.aborted) {
        yield chunk;
        await new Promise((resolve) => setTimeout(resolve, 2));
      }
    },
  };
}

// ---------------------------------------------------------------------------
// ViewerSession
// ---------------------------------------------------------------------------

describe('ViewerSession', () => {
  it('applies the whole stream and renders the final state', async () => {
    const model = new ViewerModel('pipe');
    model.resize(80, 30);
    const onUpdate = vi.fn();
    const session = new ViewerSession({
      source: scriptedSource([
        'Refreshing state...\n',
        '# aws_instance.web will be created\n  + resource "aws_instance" "web" {\n      + ami = "x"\n    }\n',
      ]),
      model,
      config: CONFIG,
      logger: silentLogger,
      onUpdate,
    });

    await session.start();

    expect(model.done).toBe(true);
    expect(model.view).toBe('plan');
    expect(model.logs).toEqual(['Refreshing state...']);
    expect(model.lines.map((line) => line.content)).toEqual(['aws_instance.web will be created']);
    expect(onUpdate).toHaveBeenCalled();
  });

  it('warns about an empty pipe', async () => {
    const model = new ViewerModel('pipe');
    const session = new ViewerSession({
      source: scriptedSource([]),
      model,
      config: CONFIG,
      logger: silentLogger,
      onUpdate: () => {},
    });
    await session.start();
    expect(model.diagnostics.map((d) => d.summary)).toEqual(['No input received']);
  });

  it('finishes from the messages it consumed when the producer fails', async () => {
    const model = new ViewerModel('pipe');
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const source: ChunkSource = {
      async *chunks() {
        yield 'Refreshing state...\n';
      },
      waitForExit(): Promise<ExitStatus | null> {
        throw new Error('status lost');
      },
    };
    const session = new ViewerSession({ source, model, config: CONFIG, logger, onUpdate: () => {} });

    await session.start();

    expect(logger.error).toHaveBeenCalledWith('Stream session failed', { error: 'status lost' });
    expect(model.done).toBe(true);
    expect(model.logs).toEqual(['Refreshing state...']);
    expect(model.diagnostics).toEqual([]);
  });

  it('warns about empty input when the producer fails before any content', async () => {
    const model = new ViewerModel('pipe');
    const source: ChunkSource = {
      async *chunks() {},
      waitForExit(): Promise<ExitStatus | null> {
        throw new Error('status lost');
      },
    };
    const session = new ViewerSession({ source, model, config: CONFIG, logger: silentLogger, onUpdate: () => {} });

    await session.start();

    expect(model.done).toBe(true);
    expect(model.diagnostics.map((d) => d.summary)).toEqual(['No input received']);
  });

  it('pins a prompt matching the configured patterns', async () => {
    const model = new ViewerModel('interactive');
    const source: ChunkSource = {
      async *chunks(signal: AbortSignal) {
        yield 'Password: ';
        yield* endlessSource('').chunks(signal);
      },
    };
    const session = new ViewerSession({
      source,
      model,
      config: { ...CONFIG, promptPatterns: ['Password:\\s*$'] },
      logger: silentLogger,
      onUpdate: () => {},
    });

    const running = session.start();
    await vi.waitFor(() => expect(model.prompt).toBe('Password:'));
    session.stop();
    await running;
    expect(model.status).toBe('waiting');
  });

  it('stops reading when cancelled without finishing the stream', async () => {
    const model = new ViewerModel('pipe');
    const session = new ViewerSession({
      source: endlessSource('line\n'),
      model,
      config: CONFIG,
      logger: silentLogger,
      onUpdate: () => {},
    });

    const running = session.start();
    expect(session.start()).toBe(running);
    await vi.waitFor(() => expect(model.logs.length).toBeGreaterThan(3));
    session.stop();
    await running;

    expect(session.signal.aborted).toBe(true);
    expect(model.done).toBe(false);
    expect(model.diagnostics).toEqual([]);
  });
});
