/**
 * @tfscope/core
 *
 * Everything the viewer does without a terminal or a process: the streaming
 * plan classifier, the producer/queue pipeline, the viewer state model and
 * the virtual line projection it renders from.
 */

// Text
export { EMPHASIS_RESET, sanitizeEmphasis, stripAnsi } from './text/ansi.js';
export { hangingIndentFor, wrapText } from './text/wrap.js';

// Parser
export type {
  Diagnostic,
  DiagnosticLine,
  ResourceAction,
  ResourceChange,
  Severity,
  StreamMessage,
} from './parser/types.js';
export { DEFAULT_PROMPT_PATTERNS, compilePromptPatterns, parseAction } from './parser/grammar.js';
export { decodeDiagnosticBlock } from './parser/diagnostic.js';
export { PlanStreamClassifier, classifyText } from './parser/classifier.js';
export type { ClassifierOptions, ClassifierState } from './parser/classifier.js';

// Stream
export { BoundedQueue } from './stream/queue.js';
export { runProducer } from './stream/producer.js';
export type { ChunkSource, ExitStatus, ProducerOptions } from './stream/producer.js';

// View
export {
  DETAIL_GUTTER,
  HEADER_GUTTER,
  LOG_GUTTER,
  isHeaderLine,
  projectLines,
} from './view/projection.js';
export type { Line, LineType, ProjectionInput, ViewMode } from './view/projection.js';
export { clampCursor, clampOffset, ensureCursorVisible } from './view/viewport.js';
export type { ViewportPosition } from './view/viewport.js';
export {
  ACTION_SYMBOLS,
  SEVERITY_SYMBOLS,
  formatSummary,
  summarize,
  summaryParts,
} from './view/summary.js';
export type { PlanSummary, SummaryKey, SummaryPart } from './view/summary.js';

// State
export { CHROME_HEIGHT, EMPTY_INPUT_SUMMARY, PROMPT_HEIGHT, ViewerModel } from './state/viewer-model.js';
export type { InputMode, StreamStatus, ViewerFrame } from './state/viewer-model.js';

// Logging
export type { Logger } from './logger.js';
