/**
 * TUI viewer screen.
 *
 * Layout:
 * ┌──────────────────────────────────────────────────────────────┐
 * │ tfscope │ Plan view │ terraform plan │ ● live                 │  header
 * ├──────────────────────────────────────────────────────────────┤
 * │ › ▾ + aws_instance.web will be created                        │
 * │       + ami = "ami-123"                                       │  body
 * │   ▸ ~ aws_s3_bucket.logs will be updated in-place             │
 * ├──────────────────────────────────────────────────────────────┤
 * │ Enter a value:                                                │  prompt (when pinned)
 * │ > yes█                                                        │
 * │ ⚠1 warning  +1 create  ~1 update  1/3                         │  footer
 * │ ↑↓ move  space toggle  ...  q quit                            │  hints
 * └──────────────────────────────────────────────────────────────┘
 *
 * Key handlers only mutate the model and redraw; stream updates arrive
 * through `render()` from the session's batching timer.
 */

import blessed from 'neo-blessed';
import type { Widgets } from 'neo-blessed';
import type { ViewerModel } from '@tfscope/core';
import { renderBody, renderFooter, renderHeader, renderHints, renderPromptBar } from '../render.js';

export interface ViewerScreenOptions {
  model: ViewerModel;
  /** Shown in the header: the wrapped command, or "stdin" */
  source: string;
  mouseScrollLines: number;
  /** Keyboard input when stdin carries the plan */
  input?: NodeJS.ReadableStream;
  /** Keystrokes for the child process */
  onInput?: (data: string) => void;
  onResize?: (cols: number, rows: number) => void;
  onQuit: () => void;
}

/** Rows between the body's bottom border and the screen bottom, besides the prompt. */
const FOOTER_ROWS = 2;
const BORDER_ROWS = 2;

export class ViewerScreen {
  private readonly screen: Widgets.Screen;
  private readonly header: Widgets.BoxElement;
  private readonly body: Widgets.BoxElement;
  private readonly promptBar: Widgets.BoxElement;
  private readonly footer: Widgets.BoxElement;
  private readonly hints: Widgets.BoxElement;
  private readonly model: ViewerModel;
  private destroyed = false;

  constructor(private readonly opts: ViewerScreenOptions) {
    this.model = opts.model;

    this.screen = blessed.screen({
      smartCSR: true,
      title: `tfscope: ${opts.source}`,
      fullUnicode: true,
      ...(opts.input ? { input: opts.input, output: process.stdout } : {}),
    });

    this.header = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: 1,
      style: { fg: 'white', bg: 'blue', bold: true },
    });

    this.body = blessed.box({
      parent: this.screen,
      top: 1,
      left: 0,
      width: '100%',
      height: 3,
      border: { type: 'line' },
      tags: false,
      wrap: false,
      mouse: true,
      style: { border: { fg: 'gray' } },
    });

    this.promptBar = blessed.box({
      parent: this.screen,
      left: 0,
      width: '100%',
      height: 2,
      hidden: true,
    });

    this.footer = blessed.box({
      parent: this.screen,
      bottom: 1,
      left: 0,
      width: '100%',
      height: 1,
    });

    this.hints = blessed.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: '100%',
      height: 1,
      style: { fg: 'gray' },
    });

    this.setupKeys();
    this.setupMouse();

    this.screen.on('resize', () => this.handleResize());
    this.handleResize();
  }

  /** Redraw from the model. */
  render(): void {
    if (this.destroyed) return;
    const frame = this.model.frame();
    const interactive = this.model.inputMode === 'interactive';

    this.header.setContent(renderHeader(frame, this.opts.source));
    this.body.height = frame.visibleHeight + BORDER_ROWS;
    this.body.setContent(
      renderBody(frame, { resources: this.model.resources, diagnostics: this.model.diagnostics }).join('\n'),
    );

    if (frame.prompt !== '') {
      this.promptBar.top = 1 + frame.visibleHeight + BORDER_ROWS;
      this.promptBar.setContent(renderPromptBar(frame).join('\n'));
      this.promptBar.show();
    } else {
      this.promptBar.hide();
    }

    this.footer.setContent(renderFooter(frame));
    this.hints.setContent(renderHints(frame, interactive));
    this.screen.render();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.screen.destroy();
  }

  private handleResize(): void {
    // The model's height counts every row of chrome around the body.
    this.model.resize(this.screen.width - BORDER_ROWS, this.screen.height);
    this.opts.onResize?.(this.screen.width, this.screen.height - FOOTER_ROWS);
    this.render();
  }

  private update(action: () => void): void {
    if (this.model.typing) return;
    action();
    this.render();
  }

  private setupKeys(): void {
    const bindings: Record<string, () => void> = {
      up: () => this.model.moveCursor(-1),
      k: () => this.model.moveCursor(-1),
      down: () => this.model.moveCursor(1),
      j: () => this.model.moveCursor(1),
      pageup: () => this.model.pageUp(),
      'C-u': () => this.model.pageUp(),
      pagedown: () => this.model.pageDown(),
      'C-d': () => this.model.pageDown(),
      home: () => this.model.goHome(),
      g: () => this.model.goHome(),
      end: () => this.model.goEnd(),
      'S-g': () => this.model.goEnd(),
      space: () => {
        this.model.toggleExpandAtCursor();
      },
      return: () => {
        this.model.toggleExpandAtCursor();
      },
      e: () => this.model.expandAll(true),
      c: () => this.model.expandAll(false),
      tab: () => this.model.toggleView(),
      v: () => this.model.toggleView(),
      f: () => this.model.follow(),
      i: () => {
        this.model.beginTyping();
      },
    };

    // One listener for both states, so a key that ends typing is not
    // handled again as a viewer key.
    this.screen.on('keypress', (ch, key) => {
      if (this.model.typing) {
        this.handleTypingKey(ch, key);
        return;
      }
      if (key.full === 'q' || key.full === 'C-c') {
        this.opts.onQuit();
        return;
      }
      const action = bindings[key.full];
      if (action === undefined) return;
      action();
      this.render();
    });
  }

  private handleTypingKey(ch: string | undefined, key: Widgets.KeyEvent): void {
    if (key.full === 'C-c') {
      this.opts.onInput?.('\x03');
      this.opts.onQuit();
      return;
    }
    switch (key.name) {
      case 'escape':
        this.model.cancelTyping();
        break;
      case 'return':
        this.opts.onInput?.(this.model.submitInput());
        break;
      case 'backspace':
        this.model.backspace();
        break;
      default:
        if (ch !== undefined && !key.ctrl && !key.meta && /^[^\x00-\x1f\x7f]+$/u.test(ch)) {
          this.model.typeText(ch);
        }
        break;
    }
    this.render();
  }

  private setupMouse(): void {
    this.body.on('wheelup', () => this.update(() => this.model.moveCursor(-this.opts.mouseScrollLines)));
    this.body.on('wheeldown', () => this.update(() => this.model.moveCursor(this.opts.mouseScrollLines)));
    this.body.on('click', (data) => this.update(() => {
      // One row of border above the first body row.
      this.model.clickRow(data.y - this.body.atop - 1);
    }));
  }
}
