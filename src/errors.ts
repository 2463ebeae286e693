/** Typed failures raised by the diagram core */

export type DiagramErrorKind =
  | 'MalformedXML'
  | 'MalformedCompression'
  | 'MalformedStyle'
  | 'DuplicateId'
  | 'UnresolvableReference'
  | 'InvariantViolation'
  | 'NothingToUndo'
  | 'NothingToRedo'
  | 'ReentrantMutation';

export class DiagramError<K extends DiagramErrorKind = DiagramErrorKind> extends Error {
  readonly kind: K;

  constructor(kind: K, message: string) {
    super(message);
    this.name = 'DiagramError';
    this.kind = kind;
  }
}

export function isDiagramError(err: unknown): err is DiagramError {
  return err instanceof DiagramError;
}

// ── Codec ───────────────────────────────────────────────────────────────

export type FormatErrorKind = 'MalformedXML' | 'MalformedCompression' | 'UnresolvableReference' | 'DuplicateId';

export interface FormatErrorContext {
  /** Node path such as `mxfile/diagram[2]/mxGraphModel/root/mxCell[4]` */
  path?: string;
  /** Raw text of the offending node or payload, truncated */
  fragment?: string;
  line?: number;
  column?: number;
}

const MAX_FRAGMENT = 160;

export class FormatError extends DiagramError<FormatErrorKind> {
  readonly path: string | undefined;
  readonly fragment: string | undefined;
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(kind: FormatErrorKind, message: string, context: FormatErrorContext = {}) {
    super(kind, formatMessage(message, context));
    this.name = 'FormatError';
    this.path = context.path;
    this.fragment = context.fragment !== undefined ? truncate(context.fragment) : undefined;
    this.line = context.line;
    this.column = context.column;
  }
}

function formatMessage(message: string, context: FormatErrorContext): string {
  const where: string[] = [];
  if (context.path) where.push(`at ${context.path}`);
  if (context.line !== undefined) where.push(`line ${context.line}${context.column !== undefined ? `:${context.column}` : ''}`);
  return where.length > 0 ? `${message} (${where.join(', ')})` : message;
}

function truncate(fragment: string): string {
  return fragment.length > MAX_FRAGMENT ? `${fragment.slice(0, MAX_FRAGMENT)}…` : fragment;
}

// ── Style ───────────────────────────────────────────────────────────────

export class MalformedStyleError extends DiagramError<'MalformedStyle'> {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super('MalformedStyle', message);
    this.name = 'MalformedStyleError';
    this.raw = raw;
  }
}

// ── Model ───────────────────────────────────────────────────────────────

export type InvariantReason =
  | 'id-collision'
  | 'group-cycle'
  | 'detached-reference'
  | 'unknown-id'
  | 'scope'
  | 'invalid-value';

export class InvariantViolationError extends DiagramError<'InvariantViolation'> {
  readonly reason: InvariantReason;
  readonly ids: string[];

  constructor(reason: InvariantReason, message: string, ids: string[] = []) {
    super('InvariantViolation', message);
    this.name = 'InvariantViolationError';
    this.reason = reason;
    this.ids = ids;
  }
}

export class ReentrantMutationError extends DiagramError<'ReentrantMutation'> {
  constructor(message = 'The diagram cannot be mutated while change observers are being notified') {
    super('ReentrantMutation', message);
    this.name = 'ReentrantMutationError';
  }
}

// ── History ─────────────────────────────────────────────────────────────

export class HistoryError extends DiagramError<'NothingToUndo' | 'NothingToRedo'> {
  constructor(kind: 'NothingToUndo' | 'NothingToRedo', message?: string) {
    super(kind, message ?? (kind === 'NothingToUndo' ? 'Nothing to undo' : 'Nothing to redo'));
    this.name = 'HistoryError';
  }
}
