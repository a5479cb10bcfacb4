/**
 * One viewer run: resolve config, open the input, drive the screen until the
 * user quits, then shut the child down.
 */

import * as fs from 'node:fs';
import * as tty from 'node:tty';
import { ViewerModel, type ChunkSource, type Logger } from '@tfscope/core';
import { ViewerScreen } from '../tui/index.js';
import { CliError, errorMessage } from './cli-error.js';
import { resolveConfig, type ConfigFlags, type ViewerConfig } from './config.js';
import { createFileLogger, silentLogger } from './logger.js';
import { bindShutdownSignals, createProcessLifecycleController } from './process-lifecycle.js';
import { ViewerSession } from './session.js';
import { PtySource } from './sources/pty-source.js';
import { createStreamSource } from './sources/stream-source.js';

const TERMINAL_DEVICE = '/dev/tty';

/** Keyboard input while stdin carries the plan. */
function openTerminalInput(): tty.ReadStream {
  try {
    return new tty.ReadStream(fs.openSync(TERMINAL_DEVICE, 'r'));
  } catch (error) {
    throw new CliError('Cannot open the terminal for keyboard input', {
      details: [errorMessage(error)],
      cause: error,
    });
  }
}

async function view(command: string[], config: ViewerConfig, logger: Logger): Promise<number> {
  const interactive = command.length > 0;
  if (!interactive && process.stdin.isTTY) {
    throw new CliError('Nothing to view', {
      exitCode: 2,
      details: [
        'Pipe plan output in:   terraform plan 2>&1 | tfscope',
        'or run a command:      tfscope terraform plan',
      ],
    });
  }

  const model = new ViewerModel(interactive ? 'interactive' : 'pipe');
  let child: PtySource | null = null;
  let keyboard: tty.ReadStream | undefined;
  let source: ChunkSource;
  if (interactive) {
    const [file, ...args] = command;
    child = new PtySource({
      command: file,
      args,
      cols: process.stdout.columns ?? 80,
      rows: process.stdout.rows ?? 24,
      logger,
    });
    source = child;
  } else {
    keyboard = openTerminalInput();
    source = createStreamSource(process.stdin);
  }
  logger.info('Session starting', { mode: model.inputMode, command: command.join(' ') });

  let requestQuit: () => void = () => {};
  const quitRequested = new Promise<void>((resolve) => {
    requestQuit = resolve;
  });

  const screen = new ViewerScreen({
    model,
    source: interactive ? command.join(' ') : 'stdin',
    mouseScrollLines: config.mouseScrollLines,
    input: keyboard,
    onInput: (data) => child?.write(data),
    onResize: (cols, rows) => child?.resize(cols, rows),
    onQuit: () => requestQuit(),
  });

  const signals = bindShutdownSignals({ onSignal: () => requestQuit(), logger });

  try {
    const session = new ViewerSession({ source, model, config, logger, onUpdate: () => screen.render() });
    const streaming = session.start();
    await quitRequested;
    session.stop();

    if (child) {
      const lifecycle = createProcessLifecycleController({
        child,
        killGraceMs: config.shutdownTimeoutMs,
        logger,
      });
      const outcome = await lifecycle.terminate();
      logger.debug('Child shut down', { outcome });
      child.dispose();
    }
    await streaming;
  } finally {
    signals.dispose();
    screen.destroy();
    keyboard?.destroy();
  }

  return model.exitCode ?? 0;
}

/** Returns the exit code for the process. */
export async function runViewer(command: string[], flags: ConfigFlags): Promise<number> {
  const config = resolveConfig(flags);
  const fileLogger = config.logFile ? createFileLogger(config.logFile, { verbose: config.verbose }) : null;
  const logger = fileLogger?.logger ?? silentLogger;
  try {
    return await view(command, config, logger);
  } catch (error) {
    logger.error('Viewer failed', { error: errorMessage(error) });
    throw error;
  } finally {
    await fileLogger?.close();
  }
}
