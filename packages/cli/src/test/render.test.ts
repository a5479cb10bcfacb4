import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { EMPHASIS_RESET, ViewerModel, type Diagnostic, type Line, type ResourceChange } from '@tfscope/core';
import {
  renderBody,
  renderFooter,
  renderHeader,
  renderHints,
  renderLine,
  renderPromptBar,
} from '../tui/render.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const plain = new Chalk({ level: 0 });

const resource: ResourceChange = {
  address: 'aws_instance.web',
  action: 'create',
  actionText: 'will be created',
  attributes: ['      + ami = "x"'],
  expanded: false,
};

const warning: Diagnostic = {
  severity: 'warning',
  summary: 'careful',
  detail: [
    { content: 'preamble', isMarker: false },
    { content: '  on main.tf line 3:', isMarker: true },
  ],
  expanded: true,
};

const ctx = { resources: [resource], diagnostics: [warning], paint: plain };

function line(overrides: Partial<Line>): Line {
  return {
    type: 'log',
    resourceIndex: -1,
    diagnosticIndex: -1,
    itemIndex: -1,
    content: '',
    continuation: false,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// renderLine
// ---------------------------------------------------------------------------

describe('renderLine', () => {
  it('draws a selected resource header with icon and action symbol', () => {
    const header = line({ type: 'resource-header', resourceIndex: 0, content: 'aws_instance.web will be created' });
    expect(renderLine(header, true, ctx)).toBe('› ▸ + aws_instance.web will be created');
    expect(renderLine({ ...header, continuation: true, content: 'rest' }, false, ctx)).toBe('      rest');
  });

  it('indents attribute rows by the detail gutter', () => {
    const attribute = line({ type: 'resource-attribute', resourceIndex: 0, itemIndex: 0, content: '      + ami = "x"' });
    expect(renderLine(attribute, false, ctx)).toBe('    ' + '      + ami = "x"');
  });

  it('draws an expanded diagnostic header with its severity symbol', () => {
    const header = line({ type: 'diagnostic-header', diagnosticIndex: 0, content: 'careful' });
    expect(renderLine(header, false, ctx)).toBe('  ▾ ⚠ careful');
  });

  it('ends detail rows with an emphasis reset', () => {
    const detail = line({ type: 'diagnostic-detail', diagnosticIndex: 0, itemIndex: 1, content: '  on main.tf line 3:' });
    expect(renderLine(detail, false, ctx)).toBe(`      on main.tf line 3:${EMPHASIS_RESET}`);
  });

  it('prefixes log rows with the selection gutter', () => {
    expect(renderLine(line({ content: 'hello' }), false, ctx)).toBe('  hello');
  });
});

// ---------------------------------------------------------------------------
// Frame chrome
// ---------------------------------------------------------------------------

describe('frame chrome', () => {
  function planModel(): ViewerModel {
    const model = new ViewerModel('pipe');
    model.resize(80, 30);
    model.apply({ kind: 'resource', resource: { ...resource, attributes: [...resource.attributes] } });
    model.apply({ kind: 'diagnostic', diagnostic: { ...warning, expanded: false } });
    model.tick();
    return model;
  }

  it('marks the cursor row in the body', () => {
    const model = planModel();
    expect(renderBody(model.frame(), { ...ctx, resources: model.resources, diagnostics: model.diagnostics })).toEqual([
      '  ▸ ⚠ careful',
      '› ▸ + aws_instance.web will be created',
    ]);
  });

  it('summarises the plan in the footer', () => {
    expect(renderFooter(planModel().frame(), plain)).toBe(' ⚠1 warning  +1 create  2/2');
  });

  it('counts lines in the log view footer', () => {
    const model = new ViewerModel('pipe');
    model.resize(80, 30);
    for (const text of ['a', 'b', 'c']) model.apply({ kind: 'log', line: text });
    model.tick();
    expect(renderFooter(model.frame(), plain)).toBe(' 3 lines  3/3');
  });

  it('shows the view, source and status in the header', () => {
    const model = new ViewerModel('pipe');
    expect(renderHeader(model.frame(), 'stdin', plain)).toBe(' tfscope │ Log view │ stdin │ ● live');
    model.apply({ kind: 'exit', exitCode: 3 });
    model.apply({ kind: 'done', receivedContent: true });
    expect(renderHeader(model.frame(), 'stdin', plain)).toBe(' tfscope │ Log view │ stdin │ ✗ exited 3');
  });

  it('shows the pinned prompt and the typed answer', () => {
    const model = new ViewerModel('interactive');
    model.apply({ kind: 'prompt', prompt: 'Enter a value:' });
    expect(renderPromptBar(model.frame(), plain)).toEqual([' Enter a value:', ' press i to answer']);
    model.beginTyping();
    model.typeText('yes');
    expect(renderPromptBar(model.frame(), plain)).toEqual([' Enter a value:', ' > yes█']);
  });

  it('lists the keys for the current state', () => {
    const model = new ViewerModel('interactive');
    expect(renderHints(model.frame(), false)).toBe(
      ' ↑↓ move  space toggle  e/c expand/collapse all  tab view  f follow  q quit',
    );
    expect(renderHints(model.frame(), true)).toContain('i answer');
    model.beginTyping();
    expect(renderHints(model.frame(), true)).toBe(' enter send  esc cancel  ctrl+c interrupt');
  });
});
