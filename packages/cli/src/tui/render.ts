/**
 * Frame to text. Pure functions over a `ViewerFrame`; the screen only places
 * the strings. Row prefixes match the projection gutters.
 */

import chalk, { type ChalkInstance } from 'chalk';
import {
  ACTION_SYMBOLS,
  EMPHASIS_RESET,
  SEVERITY_SYMBOLS,
  summaryParts,
  type Diagnostic,
  type Line,
  type ResourceChange,
  type SummaryKey,
  type ViewerFrame,
} from '@tfscope/core';

export interface RenderContext {
  resources: readonly ResourceChange[];
  diagnostics: readonly Diagnostic[];
  paint?: ChalkInstance;
}

const KEY_COLORS: Record<SummaryKey, 'red' | 'yellow' | 'green' | 'magenta' | 'cyan'> = {
  error: 'red',
  warning: 'yellow',
  create: 'green',
  update: 'yellow',
  destroy: 'red',
  replace: 'magenta',
  import: 'cyan',
};

function colorDiff(paint: ChalkInstance, source: string, text: string): string {
  const marker = source.trimStart().charAt(0);
  if (marker === '+') return paint.green(text);
  if (marker === '-') return paint.red(text);
  if (marker === '~') return paint.yellow(text);
  return text;
}

function selection(paint: ChalkInstance, selected: boolean): string {
  return selected ? `${paint.cyan('›')} ` : '  ';
}

export function renderLine(line: Line, selected: boolean, ctx: RenderContext): string {
  const paint = ctx.paint ?? chalk;
  const sel = selection(paint, selected);

  switch (line.type) {
    case 'resource-header': {
      const resource = ctx.resources[line.resourceIndex];
      if (resource === undefined || resource.action === 'unknown') {
        return line.continuation ? `${sel}    ${line.content}` : `${sel}${resource?.expanded ? '▾' : '▸'} ? ${line.content}`;
      }
      const color = KEY_COLORS[resource.action];
      if (line.continuation) return `${sel}    ${paint[color](line.content)}`;
      const icon = resource.expanded ? '▾' : '▸';
      return `${sel}${icon} ${paint[color](`${ACTION_SYMBOLS[resource.action]} ${line.content}`)}`;
    }
    case 'resource-attribute': {
      const source = ctx.resources[line.resourceIndex]?.attributes[line.itemIndex] ?? line.content;
      return `${sel}  ${colorDiff(paint, source, line.content)}`;
    }
    case 'diagnostic-header': {
      const diagnostic = ctx.diagnostics[line.diagnosticIndex];
      const severity = diagnostic?.severity ?? 'error';
      const color = KEY_COLORS[severity];
      if (line.continuation) return `${sel}    ${paint.bold[color](line.content)}`;
      const icon = diagnostic?.expanded ? '▾' : '▸';
      return `${sel}${icon} ${paint.bold[color](`${SEVERITY_SYMBOLS[severity]} ${line.content}`)}`;
    }
    case 'diagnostic-detail': {
      const detail = ctx.diagnostics[line.diagnosticIndex]?.detail[line.itemIndex];
      const content = detail?.isMarker ? paint.bold(line.content) : line.content;
      // Detail content may carry the tool's own emphasis codes.
      return `${sel}  ${content}${EMPHASIS_RESET}`;
    }
    case 'log':
      return `${sel}${line.content}`;
  }
}

export function renderBody(frame: ViewerFrame, ctx: RenderContext): string[] {
  return frame.lines.map((line, i) => renderLine(line, frame.offset + i === frame.cursor, ctx));
}

function renderStatus(frame: ViewerFrame, paint: ChalkInstance): string {
  switch (frame.status) {
    case 'live':
      return paint.green('● live');
    case 'waiting':
      return paint.yellow('? waiting for input');
    case 'done':
      return frame.hasError ? paint.red(`✗ exited ${frame.exitCode ?? ''}`.trimEnd()) : paint.gray('✓ done');
  }
}

export function renderHeader(frame: ViewerFrame, source: string, paint: ChalkInstance = chalk): string {
  const view = frame.view === 'plan' ? 'Plan' : 'Log';
  return ` tfscope │ ${view} view │ ${source} │ ${renderStatus(frame, paint)}`;
}

export function renderFooter(frame: ViewerFrame, paint: ChalkInstance = chalk): string {
  let left: string;
  if (frame.view === 'log') {
    left = `${frame.totalLines} lines`;
  } else {
    const parts = summaryParts(frame.summary);
    left = parts.length > 0
      ? parts.map((part) => paint[KEY_COLORS[part.key]](part.text)).join('  ')
      : 'No changes';
  }
  const position = frame.totalLines > 0 ? `${frame.cursor + 1}/${frame.totalLines}` : '0/0';
  const scroll = [
    frame.hiddenAbove > 0 ? `↑${frame.hiddenAbove}` : '',
    frame.hiddenBelow > 0 ? `↓${frame.hiddenBelow}` : '',
  ].filter(Boolean).join(' ');
  return ` ${left}  ${paint.gray([position, scroll].filter(Boolean).join(' '))}`;
}

export function renderPromptBar(frame: ViewerFrame, paint: ChalkInstance = chalk): string[] {
  const answer = frame.typing ? `> ${frame.userInput}█` : paint.gray('press i to answer');
  return [` ${paint.yellow(frame.prompt)}`, ` ${answer}`];
}

export function renderHints(frame: ViewerFrame, interactive: boolean): string {
  if (frame.typing) return ' enter send  esc cancel  ctrl+c interrupt';
  const hints = ['↑↓ move', 'space toggle', 'e/c expand/collapse all', 'tab view', 'f follow'];
  if (interactive) hints.push('i answer');
  hints.push('q quit');
  return ` ${hints.join('  ')}`;
}
