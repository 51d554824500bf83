import { areEqual, clone } from "@mongez/reinforcements";
import { isPlainObject } from "@mongez/supportive-is";

/**
 * Previous and current value of a changed attribute.
 */
export type DirtyColumnValues = {
  oldValue: unknown;
  newValue: unknown;
};

/**
 * Tracks attribute changes of a model against the snapshot taken when it was
 * constructed, loaded or last saved.
 *
 * Tracking is done on top-level attributes; a nested object counts as one
 * attribute and is compared deeply.
 *
 * @example
 * ```typescript
 * const tracker = new DatabaseDirtyTracker({ title: "Draft", authorId: 1 });
 * tracker.mergeChanges({ authorId: 2 });
 * tracker.getDirtyColumns(); // ["authorId"]
 * tracker.original("authorId"); // 1
 * ```
 */
export class DatabaseDirtyTracker {
  private initial: Record<string, unknown>;
  private current: Record<string, unknown>;

  private readonly dirtyColumns = new Set<string>();
  private readonly removedColumns = new Set<string>();

  public constructor(data: Record<string, unknown>) {
    this.initial = this.snapshot(data);
    this.current = this.snapshot(data);
  }

  /**
   * Attributes whose value differs from the snapshot
   */
  public getDirtyColumns(): string[] {
    return Array.from(this.dirtyColumns);
  }

  /**
   * Attributes present in the snapshot that have since been unset
   */
  public getRemovedColumns(): string[] {
    return Array.from(this.removedColumns);
  }

  public hasChanges(): boolean {
    return this.dirtyColumns.size > 0 || this.removedColumns.size > 0;
  }

  public isDirty(column: string): boolean {
    return this.dirtyColumns.has(column);
  }

  /**
   * Value of the attribute as of the last snapshot.
   */
  public original(column: string): unknown {
    return this.initial[column];
  }

  /**
   * Copy of the snapshot changes are tracked against.
   */
  public originalData(): Record<string, unknown> {
    return this.snapshot(this.initial);
  }

  public getDirtyColumnsWithValues(): Record<string, DirtyColumnValues> {
    const result: Record<string, DirtyColumnValues> = {};

    for (const column of this.dirtyColumns) {
      result[column] = {
        oldValue: this.initial[column],
        newValue: this.current[column],
      };
    }

    return result;
  }

  /**
   * Record new values for the given attributes.
   */
  public mergeChanges(partial: Record<string, unknown>): void {
    for (const [column, value] of Object.entries(partial)) {
      this.current[column] = this.copy(value);
      this.refreshColumn(column);
    }
  }

  /**
   * Accept the given values as both original and current, e.g. after they
   * were re-read from storage.
   */
  public syncOriginal(values: Record<string, unknown>): void {
    for (const [column, value] of Object.entries(values)) {
      this.initial[column] = this.copy(value);
      this.current[column] = this.copy(value);
      this.refreshColumn(column);
    }
  }

  /**
   * Replace every current value at once, keeping the snapshot.
   */
  public replaceCurrentData(data: Record<string, unknown>): void {
    const columns = new Set([...Object.keys(this.current), ...Object.keys(data)]);

    this.current = this.snapshot(data);

    for (const column of columns) {
      this.refreshColumn(column);
    }
  }

  /**
   * Record removal of one or more attributes.
   */
  public unset(columns: string | string[]): void {
    for (const column of Array.isArray(columns) ? columns : [columns]) {
      delete this.current[column];
      this.refreshColumn(column);
    }
  }

  /**
   * Take a new snapshot, from the given data or the current values, and
   * forget every tracked change.
   */
  public reset(data?: Record<string, unknown>): void {
    const source = data ?? this.current;

    this.initial = this.snapshot(source);
    this.current = this.snapshot(source);

    this.dirtyColumns.clear();
    this.removedColumns.clear();
  }

  private refreshColumn(column: string): void {
    const inInitial = column in this.initial;
    const inCurrent = column in this.current;

    if (inInitial && !inCurrent) {
      this.removedColumns.add(column);
    } else {
      this.removedColumns.delete(column);
    }

    if (inInitial === inCurrent && areEqual(this.initial[column], this.current[column])) {
      this.dirtyColumns.delete(column);
    } else if (inCurrent || inInitial) {
      this.dirtyColumns.add(column);
    }
  }

  private snapshot(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [column, value] of Object.entries(data)) {
      result[column] = this.copy(value);
    }

    return result;
  }

  /**
   * Plain objects and arrays are deep-copied; anything else (ids, dates,
   * driver values) is kept by reference.
   */
  private copy<TValue>(value: TValue): TValue {
    if (Array.isArray(value) || isPlainObject(value)) {
      return clone(value);
    }

    return value;
  }
}
