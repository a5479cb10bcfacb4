/**
 * @tfscope/cli
 *
 * The tfscope command-line viewer. Use it via the command line:
 *
 *   terraform plan 2>&1 | tfscope
 *   tfscope terraform apply
 *
 * The entry point is src/bin/tfscope.ts; the exports below are for embedding
 * the viewer in other tools.
 */

export { runViewer } from './lib/app.js';
export { CliError, isCliError, renderCliError } from './lib/cli-error.js';
export { DEFAULT_VIEWER_CONFIG, resolveConfig, type ConfigFlags, type ViewerConfig } from './lib/config.js';
export { createFileLogger, createLogger, silentLogger, type LoggerOptions } from './lib/logger.js';
