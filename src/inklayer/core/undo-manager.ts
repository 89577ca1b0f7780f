import type { TextValue } from "./types";

const DEFAULT_CAPACITY = 100;
const HISTORY_GROUPING_INTERVAL_MS = 500;

export type EditKind = "insert" | "delete" | "replace";

export type UndoManagerOptions = {
  /** Maximum number of snapshots held across both stacks. */
  capacity?: number;
  groupingIntervalMs?: number;
  now?: () => number;
};

type HistoryEntry = {
  value: TextValue;
  kind: EditKind;
};

/**
 * Classifies an edit by diffing the texts around their common prefix and
 * suffix. Anything that both removes and inserts is a structural replace.
 */
export function classifyEdit(before: string, after: string): EditKind {
  let prefix = 0;
  const maxPrefix = Math.min(before.length, after.length);
  while (prefix < maxPrefix && before[prefix] === after[prefix]) {
    prefix += 1;
  }
  let suffix = 0;
  const maxSuffix = maxPrefix - prefix;
  while (
    suffix < maxSuffix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix += 1;
  }
  const removed = before.length - prefix - suffix;
  const inserted = after.length - prefix - suffix;
  if (removed === 0 && inserted > 0) {
    return "insert";
  }
  if (inserted === 0 && removed > 0) {
    return "delete";
  }
  return "replace";
}

export class UndoManager {
  private readonly capacity: number;
  private readonly groupingIntervalMs: number;
  private readonly now: () => number;
  private undoStack: HistoryEntry[] = [];
  private redoStack: TextValue[] = [];
  private lastRecorded: TextValue | null = null;
  private lastKind: EditKind | null = null;
  private lastEditAt = 0;
  private restoring = false;

  constructor(options: UndoManagerOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CAPACITY);
    this.groupingIntervalMs =
      options.groupingIntervalMs ?? HISTORY_GROUPING_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get size(): number {
    return this.undoStack.length + this.redoStack.length;
  }

  /**
   * Records the transition `oldValue -> newValue`. Selection-only changes are
   * ignored. With `allowMerge`, a simple insert or delete that directly
   * continues the previous one of the same kind extends that undo step
   * instead of adding a new one. Returns whether history changed.
   */
  recordChange(
    oldValue: TextValue,
    newValue: TextValue,
    allowMerge = true,
  ): boolean {
    if (this.restoring) {
      return false;
    }
    if (oldValue.text === newValue.text) {
      return false;
    }

    const now = this.now();
    const kind = classifyEdit(oldValue.text, newValue.text);
    const last = this.lastRecorded;
    const continuesRun =
      last !== null &&
      last.text === oldValue.text &&
      last.selection.start === oldValue.selection.start &&
      last.selection.end === oldValue.selection.end;
    const shouldGroup =
      allowMerge &&
      kind !== "replace" &&
      kind === this.lastKind &&
      continuesRun &&
      this.undoStack.length > 0 &&
      now - this.lastEditAt < this.groupingIntervalMs;

    this.redoStack = [];
    if (!shouldGroup) {
      while (this.size > this.capacity - 1 && this.undoStack.length > 0) {
        this.undoStack.shift();
      }
      this.undoStack.push({ value: oldValue, kind });
    }

    this.lastRecorded = newValue;
    this.lastKind = allowMerge ? kind : null;
    this.lastEditAt = now;
    return true;
  }

  /**
   * Pops the most recent snapshot, stashing `currentValue` for redo. `apply`
   * runs while restoring, so any change it triggers is not recorded.
   */
  undo(
    currentValue: TextValue,
    apply?: (value: TextValue) => void,
  ): TextValue | null {
    const entry = this.undoStack.pop();
    if (!entry) {
      return null;
    }
    this.redoStack.push(currentValue);
    return this.restore(entry.value, apply);
  }

  redo(
    currentValue: TextValue,
    apply?: (value: TextValue) => void,
  ): TextValue | null {
    const value = this.redoStack.pop();
    if (!value) {
      return null;
    }
    this.undoStack.push({
      value: currentValue,
      kind: classifyEdit(currentValue.text, value.text),
    });
    return this.restore(value, apply);
  }

  clear() {
    this.undoStack = [];
    this.redoStack = [];
    this.lastRecorded = null;
    this.lastKind = null;
    this.lastEditAt = 0;
  }

  private restore(
    value: TextValue,
    apply?: (value: TextValue) => void,
  ): TextValue {
    this.lastRecorded = value;
    this.lastKind = null;
    this.restoring = true;
    try {
      apply?.(value);
    } finally {
      this.restoring = false;
    }
    return value;
  }
}
