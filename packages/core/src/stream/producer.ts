/**
 * Producer side of the stream pipeline: owns the input source, runs the
 * classifier, and pushes messages into the bounded queue in classification
 * order. Always closes the queue on the way out.
 */

import type { Logger } from '../logger.js';
import { PlanStreamClassifier } from '../parser/classifier.js';
import type { StreamMessage } from '../parser/types.js';
import type { BoundedQueue } from './queue.js';

export interface ExitStatus {
  exitCode: number;
  signal?: number;
}

/** A blocking input: standard input, or the master side of a PTY. */
export interface ChunkSource {
  /** Decoded text chunks of arbitrary size, ending at end of input. */
  chunks(signal: AbortSignal): AsyncIterable<string>;
  /** Exit status of the wrapped child, for sources that have one. */
  waitForExit?(): Promise<ExitStatus | null>;
}

export interface ProducerOptions {
  source: ChunkSource;
  queue: BoundedQueue<StreamMessage>;
  signal: AbortSignal;
  classifier?: PlanStreamClassifier;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the source to its end (or until cancelled). Cancellation is observed
 * once per read-loop iteration; after it nothing more is sent.
 */
export async function runProducer(opts: ProducerOptions): Promise<void> {
  const { source, queue, signal, logger } = opts;
  const classifier = opts.classifier ?? new PlanStreamClassifier();

  const sendAll = async (messages: StreamMessage[]): Promise<boolean> => {
    for (const message of messages) {
      if (!(await queue.send(message, signal))) return false;
    }
    return true;
  };

  try {
    try {
      for await (const chunk of source.chunks(signal)) {
        if (signal.aborted) return;
        if (!(await sendAll(classifier.push(chunk)))) return;
      }
    } catch (error) {
      if (signal.aborted) return;
      logger?.warn('Input read failed; flushing buffered content', { error: errorMessage(error) });
    }

    if (signal.aborted) return;
    if (!(await sendAll(classifier.flush()))) return;

    if (source.waitForExit) {
      const status = await source.waitForExit().catch((error: unknown) => {
        logger?.warn('Could not read child exit status', { error: errorMessage(error) });
        return null;
      });
      if (signal.aborted) return;
      if (status) {
        logger?.info('Child process exited', { exitCode: status.exitCode, signal: status.signal });
        const exit: StreamMessage = status.signal === undefined
          ? { kind: 'exit', exitCode: status.exitCode }
          : { kind: 'exit', exitCode: status.exitCode, signal: status.signal };
        if (!(await queue.send(exit, signal))) return;
      }
    }

    await queue.send({ kind: 'done', receivedContent: classifier.receivedContent }, signal);
  } finally {
    queue.close();
  }
}
