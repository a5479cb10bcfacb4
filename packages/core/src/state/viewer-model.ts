/**
 * Consumer-side state: accumulates stream messages, owns expand flags and the
 * view mode, and keeps cursor/offset valid against the projected lines.
 *
 * Single-threaded by construction; the producer only reaches it through
 * messages. Rebuilding lines is deferred to `tick()` so bursts of messages
 * cost one projection.
 */

import type { Diagnostic, ResourceChange, StreamMessage } from '../parser/types.js';
import { isHeaderLine, projectLines, type Line, type ViewMode } from '../view/projection.js';
import { summarize, type PlanSummary } from '../view/summary.js';
import { clampCursor, clampOffset, ensureCursorVisible } from '../view/viewport.js';

export type InputMode = 'pipe' | 'interactive';

export type StreamStatus = 'live' | 'waiting' | 'done';

/** Rows taken by header, footer and margins. */
export const CHROME_HEIGHT = 6;
export const MIN_VISIBLE_HEIGHT = 5;
/** Rows taken by the pinned prompt. */
export const PROMPT_HEIGHT = 2;

export const EMPTY_INPUT_SUMMARY = 'No input received';
export const EMPTY_INPUT_DETAIL = [
  'Nothing arrived on standard input. Terraform writes errors to standard error;',
  'redirect it into the pipe as well, e.g. `terraform plan 2>&1 | tfscope`.',
];

export interface ViewerFrame {
  /** Rows currently on screen */
  lines: Line[];
  totalLines: number;
  cursor: number;
  offset: number;
  visibleHeight: number;
  hiddenAbove: number;
  hiddenBelow: number;
  view: ViewMode;
  status: StreamStatus;
  summary: PlanSummary;
  prompt: string;
  typing: boolean;
  userInput: string;
  hasError: boolean;
  exitCode: number | null;
}

export class ViewerModel {
  readonly resources: ResourceChange[] = [];
  readonly diagnostics: Diagnostic[] = [];
  readonly logs: string[] = [];

  private projected: Line[] = [];
  private viewMode: ViewMode = 'log';
  private viewPinned = false;

  cursor = 0;
  offset = 0;
  width = 0;
  height = 0;

  autoScroll = true;
  ready = false;
  done = false;
  needsSync = false;
  hasError = false;
  exitCode: number | null = null;

  prompt = '';
  typing = false;
  userInput = '';

  constructor(readonly inputMode: InputMode) {}

  get lines(): readonly Line[] {
    return this.projected;
  }

  get view(): ViewMode {
    return this.viewMode;
  }

  get visibleHeight(): number {
    let height = this.height - CHROME_HEIGHT;
    if (this.prompt !== '') height -= PROMPT_HEIGHT;
    return Math.max(MIN_VISIBLE_HEIGHT, height);
  }

  get status(): StreamStatus {
    if (this.prompt !== '') return 'waiting';
    return this.done ? 'done' : 'live';
  }

  // ── Stream messages ──────────────────────────────────────────────────────

  apply(message: StreamMessage): void {
    switch (message.kind) {
      case 'resource':
        this.resources.push(message.resource);
        if (!this.viewPinned && !this.hasError && !this.hasErrorDiagnostic()) {
          this.viewMode = 'plan';
        }
        break;
      case 'diagnostic':
        this.diagnostics.push(message.diagnostic);
        if (message.diagnostic.severity === 'error' && !this.viewPinned) {
          this.viewMode = 'log';
        }
        break;
      case 'log':
        this.logs.push(message.line);
        break;
      case 'prompt':
        this.prompt = message.prompt;
        break;
      case 'exit':
        this.exitCode = message.exitCode;
        this.hasError = message.exitCode !== 0;
        if (this.hasError) this.viewMode = 'log';
        break;
      case 'done':
        this.finish(message.receivedContent);
        break;
    }
    this.needsSync = true;
  }

  /** Stream ended, by `done` message or by the queue closing. */
  finish(receivedContent: boolean): void {
    if (this.done) return;
    this.done = true;
    this.needsSync = true;
    // Nothing is left to answer a pinned prompt.
    this.prompt = '';
    this.typing = false;
    if (!receivedContent && this.inputMode === 'pipe') {
      this.diagnostics.push({
        severity: 'warning',
        summary: EMPTY_INPUT_SUMMARY,
        detail: EMPTY_INPUT_DETAIL.map((content) => ({ content, isMarker: false })),
        expanded: true,
      });
    }
  }

  /** Batched rebuild; returns true when the lines changed. */
  tick(): boolean {
    if (!this.needsSync) return false;
    this.rebuild();
    if (this.autoScroll || !this.ready) {
      this.cursor = this.projected.length - 1;
    }
    this.revealCursor();
    this.needsSync = false;
    return true;
  }

  rebuild(): void {
    this.projected = projectLines({
      resources: this.resources,
      diagnostics: this.diagnostics,
      logs: this.logs,
      width: this.width,
      mode: this.viewMode,
    });
  }

  // ── Navigation ───────────────────────────────────────────────────────────

  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.ready = true;
    this.rebuild();
    this.revealCursor();
  }

  moveCursor(delta: number): void {
    this.autoScroll = false;
    this.cursor += delta;
    this.revealCursor();
  }

  pageUp(): void {
    this.moveCursor(-this.halfPage());
  }

  pageDown(): void {
    this.moveCursor(this.halfPage());
  }

  goHome(): void {
    this.autoScroll = false;
    this.cursor = 0;
    this.offset = 0;
  }

  goEnd(): void {
    this.autoScroll = false;
    this.cursor = this.projected.length - 1;
    this.revealCursor();
  }

  /** Resume following new output. */
  follow(): void {
    this.autoScroll = true;
    this.cursor = this.projected.length - 1;
    this.revealCursor();
  }

  toggleView(): void {
    this.viewMode = this.viewMode === 'log' ? 'plan' : 'log';
    this.viewPinned = true;
    this.rebuild();
    this.cursor = 0;
    this.offset = 0;
    this.autoScroll = false;
  }

  /** Flip the expand flag of the item whose header row is at `index`. */
  toggleExpandAt(index: number): boolean {
    const line = this.projected[index];
    if (line === undefined || !isHeaderLine(line)) return false;

    if (line.type === 'resource-header') {
      const resource = this.resources[line.resourceIndex];
      if (resource === undefined) return false;
      resource.expanded = !resource.expanded;
    } else {
      const diagnostic = this.diagnostics[line.diagnosticIndex];
      if (diagnostic === undefined) return false;
      diagnostic.expanded = !diagnostic.expanded;
    }
    this.rebuild();
    this.clamp();
    return true;
  }

  toggleExpandAtCursor(): boolean {
    return this.toggleExpandAt(this.cursor);
  }

  expandAll(expanded: boolean): void {
    for (const resource of this.resources) resource.expanded = expanded;
    for (const diagnostic of this.diagnostics) diagnostic.expanded = expanded;
    this.rebuild();
    this.clamp();
  }

  /** Select the row at `row` on screen; a second click on it toggles it. */
  clickRow(row: number): void {
    this.autoScroll = false;
    const index = this.offset + row;
    if (row < 0 || index >= this.projected.length) return;
    if (index === this.cursor) {
      this.toggleExpandAt(index);
    } else {
      this.cursor = index;
    }
  }

  // ── Interactive typing ───────────────────────────────────────────────────

  beginTyping(): boolean {
    if (this.inputMode !== 'interactive') return false;
    this.typing = true;
    return true;
  }

  cancelTyping(): void {
    this.typing = false;
  }

  typeText(text: string): void {
    if (this.typing) this.userInput += text;
  }

  backspace(): void {
    if (!this.typing) return;
    const chars = Array.from(this.userInput);
    chars.pop();
    this.userInput = chars.join('');
  }

  /**
   * Take the typed answer for the child process. Clears the prompt, leaves
   * typing state and follows the log view for the child's response.
   */
  submitInput(): string {
    const payload = `${this.userInput}\n`;
    this.userInput = '';
    this.prompt = '';
    this.typing = false;
    this.viewMode = 'log';
    this.autoScroll = true;
    this.rebuild();
    this.revealCursor();
    return payload;
  }

  // ── Frame ────────────────────────────────────────────────────────────────

  frame(): ViewerFrame {
    const height = this.visibleHeight;
    const start = Math.min(this.offset, this.projected.length);
    const end = Math.min(start + height, this.projected.length);
    return {
      lines: this.projected.slice(start, end),
      totalLines: this.projected.length,
      cursor: this.cursor,
      offset: this.offset,
      visibleHeight: height,
      hiddenAbove: start,
      hiddenBelow: this.projected.length - end,
      view: this.viewMode,
      status: this.status,
      summary: summarize(this.resources, this.diagnostics),
      prompt: this.prompt,
      typing: this.typing,
      userInput: this.userInput,
      hasError: this.hasError,
      exitCode: this.exitCode,
    };
  }

  private halfPage(): number {
    return Math.max(1, Math.floor(this.visibleHeight / 2));
  }

  private hasErrorDiagnostic(): boolean {
    return this.diagnostics.some((diagnostic) => diagnostic.severity === 'error');
  }

  private clamp(): void {
    this.cursor = clampCursor(this.cursor, this.projected.length);
    this.offset = clampOffset(this.offset, this.projected.length, this.visibleHeight);
  }

  private revealCursor(): void {
    const next = ensureCursorVisible(
      { cursor: this.cursor, offset: this.offset },
      this.projected.length,
      this.visibleHeight,
    );
    this.cursor = next.cursor;
    this.offset = next.offset;
  }
}
