/**
 * Virtual line projection: flattens resources, diagnostics and log lines plus
 * their expand flags into the list of rows the viewport scrolls over.
 *
 * The list is always rebuilt wholesale; rows are never patched in place.
 */

import type { Diagnostic, ResourceChange } from '../parser/types.js';
import { stripAnsi } from '../text/ansi.js';
import { hangingIndentFor, wrapText } from '../text/wrap.js';

export type LineType =
  | 'resource-header'
  | 'resource-attribute'
  | 'diagnostic-header'
  | 'diagnostic-detail'
  | 'log';

export type ViewMode = 'log' | 'plan';

export interface Line {
  type: LineType;
  /** Index into resources, or -1 */
  resourceIndex: number;
  /** Index into diagnostics, or -1 */
  diagnosticIndex: number;
  /** Attribute, detail or log index; -1 for headers */
  itemIndex: number;
  /** Wrapped content for this row */
  content: string;
  /** True for the second and later rows of a wrapped item */
  continuation: boolean;
}

export interface ProjectionInput {
  resources: readonly ResourceChange[];
  diagnostics: readonly Diagnostic[];
  logs: readonly string[];
  width: number;
  mode: ViewMode;
}

/** Columns the renderer spends before a row's content. */
export const LOG_GUTTER = 2;
export const HEADER_GUTTER = 6;
export const DETAIL_GUTTER = 4;

function contentWidth(width: number, gutter: number): number {
  // 0: width not known yet, rows stay unwrapped.
  if (width <= 0) return 0;
  return Math.max(1, width - gutter);
}

function pushWrapped(
  lines: Line[],
  base: Omit<Line, 'content' | 'continuation'>,
  text: string,
  width: number,
  indent: number,
): void {
  wrapText(text, width, indent).forEach((content, i) => {
    lines.push({ ...base, content, continuation: i > 0 });
  });
}

function projectDiagnostics(lines: Line[], diagnostics: readonly Diagnostic[], width: number): void {
  const headerWidth = contentWidth(width, HEADER_GUTTER);
  const detailWidth = contentWidth(width, DETAIL_GUTTER);

  diagnostics.forEach((diagnostic, d) => {
    pushWrapped(
      lines,
      { type: 'diagnostic-header', resourceIndex: -1, diagnosticIndex: d, itemIndex: -1 },
      diagnostic.summary,
      headerWidth,
      0,
    );
    if (!diagnostic.expanded) return;
    diagnostic.detail.forEach((detail, j) => {
      pushWrapped(
        lines,
        { type: 'diagnostic-detail', resourceIndex: -1, diagnosticIndex: d, itemIndex: j },
        detail.content,
        detailWidth,
        hangingIndentFor(stripAnsi(detail.content)),
      );
    });
  });
}

function projectResources(lines: Line[], resources: readonly ResourceChange[], width: number): void {
  const headerWidth = contentWidth(width, HEADER_GUTTER);
  const attributeWidth = contentWidth(width, DETAIL_GUTTER);

  resources.forEach((resource, r) => {
    const header = resource.actionText ? `${resource.address} ${resource.actionText}` : resource.address;
    pushWrapped(
      lines,
      { type: 'resource-header', resourceIndex: r, diagnosticIndex: -1, itemIndex: -1 },
      header,
      headerWidth,
      0,
    );
    if (!resource.expanded) return;
    resource.attributes.forEach((attribute, j) => {
      pushWrapped(
        lines,
        { type: 'resource-attribute', resourceIndex: r, diagnosticIndex: -1, itemIndex: j },
        attribute,
        attributeWidth,
        hangingIndentFor(attribute),
      );
    });
  });
}

/**
 * Build the display rows.
 *
 * - log view: every log line, then every diagnostic
 * - plan view: diagnostics first, then resources
 */
export function projectLines(input: ProjectionInput): Line[] {
  const lines: Line[] = [];

  if (input.mode === 'log') {
    const logWidth = contentWidth(input.width, LOG_GUTTER);
    input.logs.forEach((log, i) => {
      pushWrapped(
        lines,
        { type: 'log', resourceIndex: -1, diagnosticIndex: -1, itemIndex: i },
        log,
        logWidth,
        0,
      );
    });
    projectDiagnostics(lines, input.diagnostics, input.width);
    return lines;
  }

  projectDiagnostics(lines, input.diagnostics, input.width);
  projectResources(lines, input.resources, input.width);
  return lines;
}

export function isHeaderLine(line: Line): boolean {
  return line.type === 'resource-header' || line.type === 'diagnostic-header';
}
