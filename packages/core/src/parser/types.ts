/**
 * Plan output model types shared by the classifier, the reducer and the
 * projection.
 */

export type ResourceAction = 'create' | 'update' | 'destroy' | 'replace' | 'import';

export type Severity = 'error' | 'warning';

/** One planned change to one managed object. */
export interface ResourceChange {
  /** e.g. `aws_instance.web` */
  address: string;
  action: ResourceAction | 'unknown';
  /** Phrase as printed, e.g. `will be updated in-place` */
  actionText: string;
  /** Diff lines with their original indentation and braces */
  attributes: string[];
  expanded: boolean;
}

export interface DiagnosticLine {
  /** May contain emphasis (bold/underline) SGR codes */
  content: string;
  /** `on <file> line <n>` source-location line */
  isMarker: boolean;
}

/** One error or warning block. */
export interface Diagnostic {
  severity: Severity;
  summary: string;
  detail: DiagnosticLine[];
  expanded: boolean;
}

/**
 * Unit of communication from the stream producer to the reducer. Payloads are
 * owned by the receiver once sent.
 */
export type StreamMessage =
  | { kind: 'resource'; resource: ResourceChange }
  | { kind: 'diagnostic'; diagnostic: Diagnostic }
  | { kind: 'log'; line: string }
  | { kind: 'prompt'; prompt: string }
  | { kind: 'exit'; exitCode: number; signal?: number }
  | { kind: 'done'; receivedContent: boolean };
