/**
 * Footer summary: change counts per action and diagnostic counts per severity.
 */

import type { Diagnostic, ResourceAction, ResourceChange, Severity } from '../parser/types.js';

export interface PlanSummary {
  actions: Record<ResourceAction, number>;
  severities: Record<Severity, number>;
}

export type SummaryKey = ResourceAction | Severity;

export interface SummaryPart {
  key: SummaryKey;
  text: string;
}

const ACTION_ORDER: readonly ResourceAction[] = ['create', 'update', 'destroy', 'replace', 'import'];

export const ACTION_SYMBOLS: Readonly<Record<ResourceAction, string>> = {
  create: '+',
  update: '~',
  destroy: '-',
  replace: '±',
  import: '←',
};

export const SEVERITY_SYMBOLS: Readonly<Record<Severity, string>> = {
  error: '✗',
  warning: '⚠',
};

export function summarize(
  resources: readonly ResourceChange[],
  diagnostics: readonly Diagnostic[],
): PlanSummary {
  const summary: PlanSummary = {
    actions: { create: 0, update: 0, destroy: 0, replace: 0, import: 0 },
    severities: { error: 0, warning: 0 },
  };
  for (const resource of resources) {
    if (resource.action !== 'unknown') summary.actions[resource.action]++;
  }
  for (const diagnostic of diagnostics) {
    summary.severities[diagnostic.severity]++;
  }
  return summary;
}

/** Non-zero counts in display order: errors, warnings, then actions. */
export function summaryParts(summary: PlanSummary): SummaryPart[] {
  const parts: SummaryPart[] = [];
  for (const severity of ['error', 'warning'] as const) {
    const count = summary.severities[severity];
    if (count > 0) parts.push({ key: severity, text: `${SEVERITY_SYMBOLS[severity]}${count} ${severity}` });
  }
  for (const action of ACTION_ORDER) {
    const count = summary.actions[action];
    if (count > 0) parts.push({ key: action, text: `${ACTION_SYMBOLS[action]}${count} ${action}` });
  }
  return parts;
}

export function formatSummary(summary: PlanSummary): string {
  const parts = summaryParts(summary);
  return parts.length > 0 ? parts.map((part) => part.text).join('  ') : 'No changes';
}
