/**
 * Streaming line classifier.
 *
 * Consumes decoded text in arbitrary chunks, assembles lines, and classifies
 * each one with a forward-only state machine:
 *
 *   normal ──╷──▶ diagnostic ──╵──▶ normal
 *   normal ──# addr action──▶ normal (resource pending)
 *   normal ──resource "…" {──▶ resource ──depth 0──▶ normal
 *
 * Anything else that is not blank becomes a log line. The unterminated tail
 * is checked against the prompt sentinels after every chunk, since
 * interactive prompts never end in a newline.
 */

import { sanitizeEmphasis, stripAnsi } from '../text/ansi.js';
import { decodeDiagnosticBlock } from './diagnostic.js';
import {
  BLOCK_CLOSE,
  BLOCK_OPEN,
  DEFAULT_PROMPT_PATTERNS,
  RESOURCE_BODY_TOKEN,
  RESOURCE_HEADER_PATTERN,
  compilePromptPatterns,
  netBraces,
  parseAction,
  stripBlockLinePrefix,
} from './grammar.js';
import type { ResourceChange, StreamMessage } from './types.js';

export type ClassifierState = 'normal' | 'diagnostic' | 'resource';

export interface ClassifierOptions {
  /** Prompt sentinels tested against the ANSI-stripped unterminated tail */
  promptPatterns?: readonly RegExp[];
}

const NON_BLANK = /\S/;

export class PlanStreamClassifier {
  private readonly promptPatterns: readonly RegExp[];

  private mode: ClassifierState = 'normal';
  private tail = '';
  private diagnosticLines: string[] = [];
  private resource: ResourceChange | null = null;
  private braceDepth = 0;
  private promptedTail: string | null = null;
  private sawContent = false;
  private finished = false;

  constructor(options: ClassifierOptions = {}) {
    this.promptPatterns = options.promptPatterns ?? compilePromptPatterns(DEFAULT_PROMPT_PATTERNS);
  }

  get state(): ClassifierState {
    return this.mode;
  }

  get receivedContent(): boolean {
    return this.sawContent;
  }

  /** Feed a chunk; returns the messages it completed, in input order. */
  push(chunk: string): StreamMessage[] {
    const out: StreamMessage[] = [];
    if (this.finished || chunk.length === 0) return out;
    if (!this.sawContent && NON_BLANK.test(chunk)) this.sawContent = true;

    const buffer = this.tail + chunk;
    let pos = 0;
    let newline = buffer.indexOf('\n', pos);
    while (newline !== -1) {
      this.classify(trimCarriageReturn(buffer.slice(pos, newline)), out);
      pos = newline + 1;
      newline = buffer.indexOf('\n', pos);
    }
    this.tail = buffer.slice(pos);
    if (pos > 0) this.promptedTail = null;

    this.checkPrompt(out);
    return out;
  }

  /**
   * Classify the unterminated tail as a final line, then flush any open
   * diagnostic block and the pending resource. Idempotent.
   */
  flush(): StreamMessage[] {
    const out: StreamMessage[] = [];
    if (this.finished) return out;
    this.finished = true;

    if (this.tail !== '') {
      const last = trimCarriageReturn(this.tail);
      this.tail = '';
      this.classify(last, out);
    }
    if (this.mode === 'diagnostic') this.flushDiagnostic(out);
    this.flushResource(out);
    this.mode = 'normal';
    return out;
  }

  /** End of stream: `flush()` followed by the `done` message. */
  end(): StreamMessage[] {
    if (this.finished) return [];
    const out = this.flush();
    out.push({ kind: 'done', receivedContent: this.sawContent });
    return out;
  }

  private classify(raw: string, out: StreamMessage[]): void {
    const plain = stripAnsi(raw);

    if (this.mode === 'resource') {
      this.consumeResourceLine(plain, out);
      return;
    }

    if (plain.startsWith(BLOCK_OPEN)) {
      // A second open before the close: emit what the first one holds.
      if (this.mode === 'diagnostic') this.flushDiagnostic(out);
      this.diagnosticLines = [];
      this.mode = 'diagnostic';
      return;
    }

    if (this.mode === 'diagnostic') {
      if (plain.startsWith(BLOCK_CLOSE)) {
        this.flushDiagnostic(out);
        return;
      }
      this.diagnosticLines.push(stripBlockLinePrefix(sanitizeEmphasis(raw)));
      return;
    }

    if (plain.startsWith(BLOCK_CLOSE) && !NON_BLANK.test(plain.slice(BLOCK_CLOSE.length))) {
      return;
    }

    const header = RESOURCE_HEADER_PATTERN.exec(plain);
    if (header) {
      this.flushResource(out);
      this.resource = {
        address: header[1],
        action: parseAction(header[2]),
        actionText: header[2],
        attributes: [],
        expanded: false,
      };
      return;
    }

    if (this.resource && plain.includes(RESOURCE_BODY_TOKEN)) {
      this.braceDepth = netBraces(plain);
      if (this.braceDepth <= 0 && plain.includes('}')) {
        this.flushResource(out);
        return;
      }
      this.mode = 'resource';
      return;
    }

    if (NON_BLANK.test(plain)) {
      out.push({ kind: 'log', line: plain });
    }
  }

  private consumeResourceLine(plain: string, out: StreamMessage[]): void {
    this.braceDepth += netBraces(plain);
    if (this.braceDepth <= 0 && plain.includes('}')) {
      this.flushResource(out);
      this.mode = 'normal';
      return;
    }
    this.resource?.attributes.push(plain);
  }

  private flushDiagnostic(out: StreamMessage[]): void {
    const lines = this.diagnosticLines;
    this.diagnosticLines = [];
    this.mode = 'normal';
    const diagnostic = decodeDiagnosticBlock(lines);
    if (diagnostic) out.push({ kind: 'diagnostic', diagnostic });
  }

  private flushResource(out: StreamMessage[]): void {
    if (!this.resource) return;
    out.push({ kind: 'resource', resource: this.resource });
    // Ownership passes to the receiver; never touched again here.
    this.resource = null;
  }

  private checkPrompt(out: StreamMessage[]): void {
    if (this.tail === '' || this.tail === this.promptedTail) return;
    const plain = stripAnsi(this.tail);
    if (this.promptPatterns.some((pattern) => pattern.test(plain))) {
      this.promptedTail = this.tail;
      out.push({ kind: 'prompt', prompt: plain.trim() });
    }
  }
}

function trimCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/** Classify a complete input in one call. */
export function classifyText(text: string, options?: ClassifierOptions): StreamMessage[] {
  const classifier = new PlanStreamClassifier(options);
  return [...classifier.push(text), ...classifier.end()];
}
