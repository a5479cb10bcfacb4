/**
 * Wires one viewing session: the producer reading the source, the consumer
 * applying messages to the model, and the batching timer that rebuilds the
 * projection and asks for a redraw.
 */

import {
  BoundedQueue,
  PlanStreamClassifier,
  compilePromptPatterns,
  runProducer,
  type ChunkSource,
  type Logger,
  type StreamMessage,
  type ViewerModel,
} from '@tfscope/core';
import { errorMessage } from './cli-error.js';
import type { ViewerConfig } from './config.js';

export interface SessionOptions {
  source: ChunkSource;
  model: ViewerModel;
  config: Pick<ViewerConfig, 'tickMs' | 'queueCapacity' | 'promptPatterns'>;
  logger: Logger;
  /** Called after a tick changed the model */
  onUpdate: () => void;
}

export class ViewerSession {
  private readonly controller = new AbortController();
  private readonly queue: BoundedQueue<StreamMessage>;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly opts: SessionOptions) {
    this.queue = new BoundedQueue<StreamMessage>(opts.config.queueCapacity);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Start reading. Resolves once the stream has ended (or was cancelled) and
   * the final state has been rendered.
   */
  start(): Promise<void> {
    if (this.running) return this.running;

    this.timer = setInterval(() => this.tick(), this.opts.config.tickMs);
    // The classifier belongs to the producer from here on.
    const producing = runProducer({
      source: this.opts.source,
      queue: this.queue,
      signal: this.controller.signal,
      classifier: new PlanStreamClassifier({
        promptPatterns: compilePromptPatterns(this.opts.config.promptPatterns),
      }),
      logger: this.opts.logger,
    });
    this.running = Promise.allSettled([producing, this.consume()]).then((results) => {
      for (const result of results) {
        if (result.status === 'rejected') {
          this.opts.logger.error('Stream session failed', { error: errorMessage(result.reason) });
        }
      }
      this.settle();
    });
    return this.running;
  }

  /** Cancel reading; the producer stops within one read iteration. */
  stop(): void {
    this.controller.abort();
    this.clearTimer();
  }

  tick(): void {
    if (this.opts.model.tick()) this.opts.onUpdate();
  }

  private async consume(): Promise<void> {
    let receivedContent = false;
    for await (const message of this.queue) {
      if (message.kind !== 'exit' && message.kind !== 'done') receivedContent = true;
      this.opts.model.apply(message);
    }
    // A queue closed without `done` still ends the stream.
    if (!this.controller.signal.aborted) {
      this.opts.model.finish(receivedContent);
    }
  }

  private settle(): void {
    this.clearTimer();
    if (!this.controller.signal.aborted) this.tick();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
