import { HistoryError, ReentrantMutationError } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import type { Command } from './commands.js';
import type { DiagramDocument } from './document.js';
import type { ChangeEvent } from './events.js';
import type { Diagram } from './model.js';

export const DEFAULT_MAX_HISTORY = 100;

interface HistoryEntry {
  readonly label: string;
  /** Whole-diagram snapshots around the command; records are immutable so these are shared, not copied */
  readonly before: Diagram;
  readonly after: Diagram;
  readonly events: readonly Omit<ChangeEvent, 'origin'>[];
}

export interface CommandManagerOptions {
  maxHistory?: number;
  logger?: Logger;
}

/**
 * Undo/redo history over a document. Undo and redo restore the exact
 * snapshots captured when the command ran.
 */
export class CommandManager {
  readonly maxHistory: number;
  private readonly logger: Logger;
  private entries: HistoryEntry[] = [];
  /** Number of entries currently applied */
  private cursor = 0;

  constructor(
    readonly document: DiagramDocument,
    options: CommandManagerOptions = {},
  ) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.logger = options.logger ?? silentLogger;
    if (!Number.isInteger(this.maxHistory) || this.maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${this.maxHistory}`);
    }
  }

  /**
   * Run a command as one history step. On failure the document is put back
   * as it was, nothing is recorded and the error is rethrown.
   */
  execute<T>(command: Command<T>): T {
    this.guard();
    this.syncWithDocument();
    const before = this.document.diagram;
    let outcome: { result: T; events: Omit<ChangeEvent, 'origin'>[] };
    try {
      outcome = this.document.deferEvents(() => command.execute(this.document));
    } catch (err) {
      this.document.restore(before);
      throw err;
    }

    this.entries.splice(this.cursor);
    this.entries.push({ label: command.label, before, after: this.document.diagram, events: outcome.events });
    if (this.entries.length > this.maxHistory) {
      this.entries.splice(0, this.entries.length - this.maxHistory);
    }
    this.cursor = this.entries.length;
    this.logger.debug(`executed "${command.label}" (${this.cursor}/${this.entries.length})`);
    this.document.publish(outcome.events, 'execute');
    return outcome.result;
  }

  /** Revert the last applied command; returns its label */
  undo(): string {
    this.guard();
    this.syncWithDocument();
    if (this.cursor === 0) throw new HistoryError('NothingToUndo');
    const entry = this.entries[this.cursor - 1];
    this.document.restore(entry.before);
    this.cursor--;
    this.document.publish([...entry.events].reverse(), 'undo');
    return entry.label;
  }

  /** Re-apply the next undone command; returns its label */
  redo(): string {
    this.guard();
    this.syncWithDocument();
    if (this.cursor === this.entries.length) throw new HistoryError('NothingToRedo');
    const entry = this.entries[this.cursor];
    this.document.restore(entry.after);
    this.cursor++;
    this.document.publish(entry.events, 'redo');
    return entry.label;
  }

  canUndo(): boolean {
    return !this.isStale() && this.cursor > 0;
  }

  canRedo(): boolean {
    return !this.isStale() && this.cursor < this.entries.length;
  }

  undoLabel(): string | null {
    return this.canUndo() ? this.entries[this.cursor - 1].label : null;
  }

  redoLabel(): string | null {
    return this.canRedo() ? this.entries[this.cursor].label : null;
  }

  /** Whether the command would succeed now; the document is left untouched */
  canExecute(command: Command): boolean {
    if (this.document.dispatching) return false;
    return this.document.preview(() => command.execute(this.document)) === null;
  }

  clear(): void {
    this.entries = [];
    this.cursor = 0;
  }

  get size(): number {
    return this.entries.length;
  }

  get position(): number {
    return this.cursor;
  }

  private guard(): void {
    if (this.document.dispatching) throw new ReentrantMutationError();
  }

  /** The state the document must be in for the recorded snapshots to apply */
  private isStale(): boolean {
    if (this.entries.length === 0) return false;
    const expected = this.cursor > 0 ? this.entries[this.cursor - 1].after : this.entries[0].before;
    return expected !== this.document.diagram;
  }

  private syncWithDocument(): void {
    if (!this.isStale()) return;
    this.logger.info('Document changed outside the command history; history cleared');
    this.clear();
  }
}
