import type { Logger } from '@tfscope/core';
import { errorMessage } from './cli-error.js';

export type TerminationSignal = 'SIGTERM' | 'SIGKILL';

/** What the lifecycle controller needs from a child process. */
export interface KillableProcess {
  readonly exited: boolean;
  kill(signal: TerminationSignal): void;
  /** Resolves once the process has exited. */
  waitForExit(): Promise<unknown>;
}

export type ShutdownOutcome = 'already-exited' | 'terminated' | 'killed';

export interface ProcessLifecycleOptions {
  child: KillableProcess;
  /** Wait after SIGTERM before escalating to SIGKILL */
  killGraceMs: number;
  /** Upper bound on the wait for exit after SIGKILL */
  killWaitMs?: number;
  logger: Logger;
}

const DEFAULT_KILL_WAIT_MS = 1000;

export interface ProcessLifecycleController {
  /** SIGTERM, then SIGKILL after the grace period. Repeated calls share one shutdown. */
  terminate(): Promise<ShutdownOutcome>;
  cleanup(): void;
}

export function createProcessLifecycleController(
  opts: ProcessLifecycleOptions
): ProcessLifecycleController {
  const { child, logger } = opts;
  const killWaitMs = opts.killWaitMs ?? DEFAULT_KILL_WAIT_MS;
  let forceKillTimer: NodeJS.Timeout | null = null;
  let terminating: Promise<ShutdownOutcome> | null = null;

  const cleanup = (): void => {
    if (forceKillTimer) {
      clearTimeout(forceKillTimer);
      forceKillTimer = null;
    }
  };

  const sendSignal = (signal: TerminationSignal): void => {
    try {
      child.kill(signal);
    } catch (error) {
      logger.debug('Signal delivery failed', { signal, error: errorMessage(error) });
    }
  };

  const terminate = (): Promise<ShutdownOutcome> => {
    if (terminating) return terminating;
    if (child.exited) {
      terminating = Promise.resolve('already-exited');
      return terminating;
    }

    terminating = new Promise<ShutdownOutcome>((resolve) => {
      let settled = false;
      let killed = false;
      const settleOnce = (outcome: ShutdownOutcome): void => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(outcome);
      };

      forceKillTimer = setTimeout(() => {
        forceKillTimer = null;
        if (child.exited) {
          settleOnce('terminated');
          return;
        }
        logger.warn('Child still running after SIGTERM; sending SIGKILL', { graceMs: opts.killGraceMs });
        killed = true;
        sendSignal('SIGKILL');
        forceKillTimer = setTimeout(() => {
          forceKillTimer = null;
          logger.warn('Child did not report exit after SIGKILL', { waitMs: killWaitMs });
          settleOnce('killed');
        }, killWaitMs);
      }, opts.killGraceMs);

      const exited = (): void => settleOnce(killed ? 'killed' : 'terminated');
      void child.waitForExit().then(exited, (error: unknown) => {
        logger.debug('Waiting for child exit failed', { error: errorMessage(error) });
        exited();
      });

      logger.debug('Sending SIGTERM to child');
      sendSignal('SIGTERM');
    });
    return terminating;
  };

  return { terminate, cleanup };
}

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/** The part of `process` that signal handling needs. */
export interface SignalTarget {
  on(event: ShutdownSignal, listener: () => void): unknown;
  removeListener(event: ShutdownSignal, listener: () => void): unknown;
}

export interface ShutdownSignalOptions {
  onSignal: (signal: ShutdownSignal) => void;
  logger: Logger;
  target?: SignalTarget;
}

export interface ShutdownSignalBinding {
  /** First signal received, or null */
  readonly received: ShutdownSignal | null;
  dispose(): void;
}

/**
 * Route SIGINT and SIGTERM to `onSignal`. While bound, Node's default exit on
 * these signals does not happen; the caller shuts down through its own path.
 */
export function bindShutdownSignals(opts: ShutdownSignalOptions): ShutdownSignalBinding {
  const target = opts.target ?? process;
  let received: ShutdownSignal | null = null;

  const handlers = (['SIGINT', 'SIGTERM'] as const).map((signal) => {
    const handler = (): void => {
      opts.logger.info('Received signal; shutting down', { signal });
      received ??= signal;
      opts.onSignal(signal);
    };
    target.on(signal, handler);
    return { signal, handler };
  });

  return {
    get received() {
      return received;
    },
    dispose() {
      for (const { signal, handler } of handlers) target.removeListener(signal, handler);
    },
  };
}
