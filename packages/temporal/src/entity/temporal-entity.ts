/**
 * Temporal Entity
 *
 * In-memory state of one entity: the values last flushed (the baseline the
 * change set detector compares against) and the pending values set since.
 * Mutations go through `set()`, which records the field and notifies the
 * owning session so it can apply scope rules.
 */

import {
  ScopeMisuseError,
  cloneValue,
  isTrackedField,
  validateTemporalValue,
  valuesEqual,
  type EntityId,
  type EntityRef,
  type FieldValues,
  type TemporalPolicy,
  type TemporalValue,
} from '@strata/core';

// ============================================================================
// Types
// ============================================================================

/**
 * Receives every attribute write on an entity
 */
export interface ChangeListener {
  entityChanged(entity: TemporalEntity, field: string): void;
}

/**
 * Pending state of an entity, captured so a rolled-back nested transaction
 * can put it back
 */
export interface PendingState {
  readonly values: ReadonlyMap<string, TemporalValue>;
  readonly touched: ReadonlySet<string>;
  readonly unscoped: ReadonlySet<string>;
  readonly activityId: string | null;
}

/**
 * Construction parameters
 */
export interface TemporalEntityInit {
  policy: TemporalPolicy;
  id: EntityId;
  /** Last flushed values; empty for an entity not yet persisted */
  baseline?: FieldValues;
  /** Committed version; 0 for an entity not yet persisted */
  vclock?: number;
  /** Pending values at creation; not reported to the listener */
  initial?: FieldValues;
  listener?: ChangeListener;
}

// ============================================================================
// Temporal Entity
// ============================================================================

export class TemporalEntity implements EntityRef {
  readonly policy: TemporalPolicy;
  readonly id: EntityId;

  private baseline: Map<string, TemporalValue>;
  private values: Map<string, TemporalValue>;
  private touched = new Set<string>();
  private unscoped = new Set<string>();
  private committedVclock: number;
  private pendingActivity: string | null = null;
  private readonly listener: ChangeListener | undefined;

  constructor(init: TemporalEntityInit) {
    this.policy = init.policy;
    this.id = init.id;
    this.baseline = new Map(Object.entries(init.baseline ?? {}));
    this.values = new Map(this.baseline);
    for (const [field, value] of Object.entries(init.initial ?? {})) {
      this.values.set(field, cloneValue(validateTemporalValue(value, field)));
      this.touched.add(field);
    }
    this.committedVclock = init.vclock ?? 0;
    this.listener = init.listener;
  }

  get entityType(): string {
    return this.policy.entityType;
  }

  /** Committed version; 0 until the first flush */
  get vclock(): number {
    return this.committedVclock;
  }

  /** True until the creating transaction commits */
  get isNew(): boolean {
    return this.committedVclock === 0;
  }

  /** Whether the next flush has anything to write for this entity */
  get isDirty(): boolean {
    return this.isNew || this.touched.size > 0;
  }

  /** Whether any field was written at scope depth 0 */
  get unscopedDirty(): boolean {
    return this.unscoped.size > 0;
  }

  /** Fields written at scope depth 0, in write order */
  get unscopedFields(): string[] {
    return [...this.unscoped];
  }

  /** Activity the next version will carry */
  get activityId(): string | null {
    return this.pendingActivity;
  }

  // --------------------------------------------------------------------------
  // Attribute access
  // --------------------------------------------------------------------------

  /** Pending value of a field; undefined if never assigned */
  get(field: string): TemporalValue | undefined {
    const value = this.values.get(field);
    return value === undefined ? undefined : cloneValue(value);
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  /**
   * Assigns a field. The value is validated and copied; `null` is a value
   * like any other.
   *
   * @throws ValidationError if the value cannot be stored
   * @throws ScopeMisuseError if the active scope names a different activity
   *   than the one already pending; the field is left unchanged
   */
  set(field: string, value: TemporalValue): this {
    const stored = cloneValue(validateTemporalValue(value, field));
    this.listener?.entityChanged(this, field);
    this.values.set(field, stored);
    this.touched.add(field);
    return this;
  }

  /**
   * Assigns several fields, notifying the listener once per field
   */
  assign(values: FieldValues): this {
    for (const [field, value] of Object.entries(values)) {
      this.set(field, value);
    }
    return this;
  }

  /** Last flushed values */
  snapshot(): FieldValues {
    return toRecord(this.baseline);
  }

  /** Current values, flushed or not */
  pending(): FieldValues {
    return toRecord(this.values);
  }

  /**
   * Whether untracked fields differ from the baseline. Untracked fields are
   * persisted with the entity row but never versioned.
   */
  hasUntrackedChanges(): boolean {
    for (const field of this.touched) {
      if (isTrackedField(this.policy, field)) continue;
      if (!this.baseline.has(field) || !valuesEqual(this.baseline.get(field), this.values.get(field))) {
        return true;
      }
    }
    return false;
  }

  // --------------------------------------------------------------------------
  // Session bookkeeping
  // --------------------------------------------------------------------------

  /** Flags a field written outside a recording scope */
  markUnscoped(field: string): void {
    this.unscoped.add(field);
  }

  /**
   * Attaches an activity to the next version. Repeating the pending
   * activity is a no-op.
   *
   * @throws ScopeMisuseError if a different activity is already pending
   */
  attachActivity(activityId: string): void {
    if (this.pendingActivity === null) {
      this.pendingActivity = activityId;
      return;
    }
    if (this.pendingActivity !== activityId) {
      throw new ScopeMisuseError(
        `${this.entityType}/${this.id} already has pending activity ${this.pendingActivity}; cannot attach ${activityId} before commit`,
        { entityType: this.entityType, entityId: this.id, expected: this.pendingActivity, actual: activityId }
      );
    }
  }

  capture(): PendingState {
    return {
      values: new Map(this.values),
      touched: new Set(this.touched),
      unscoped: new Set(this.unscoped),
      activityId: this.pendingActivity,
    };
  }

  restore(state: PendingState): void {
    this.values = new Map(state.values);
    this.touched = new Set(state.touched);
    this.unscoped = new Set(state.unscoped);
    this.pendingActivity = state.activityId;
  }

  /** Drops pending changes, returning to the baseline */
  revert(): void {
    this.values = new Map(this.baseline);
    this.touched.clear();
    this.unscoped.clear();
    this.pendingActivity = null;
  }

  /**
   * Makes the pending values the new baseline once the transaction that
   * wrote them has committed
   */
  markFlushed(vclock: number): void {
    this.baseline = new Map(this.values);
    this.touched.clear();
    this.unscoped.clear();
    this.pendingActivity = null;
    this.committedVclock = vclock;
  }
}

function toRecord(map: ReadonlyMap<string, TemporalValue>): FieldValues {
  const result: Record<string, TemporalValue> = {};
  for (const [field, value] of map) {
    result[field] = cloneValue(value);
  }
  return result;
}
