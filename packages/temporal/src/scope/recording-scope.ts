/**
 * Recording Scope
 *
 * Brackets a batch of mutations into one version bump. Scopes nest: only
 * the outermost exit marks the batch ready, and persistence still waits for
 * the flush at commit, so a scope may be smaller than its transaction.
 * Successive scopes add to the same batch until the flush takes it.
 *
 * Idle --enter()--> Active --exit() at depth 1--> Idle (batch ready)
 */

import { ScopeMisuseError } from '@strata/core';
import type { TemporalEntity } from '../entity/temporal-entity.js';

// ============================================================================
// Types
// ============================================================================

export const ScopeState = {
  IDLE: 'idle',
  ACTIVE: 'active',
} as const;

export type ScopeState = (typeof ScopeState)[keyof typeof ScopeState];

export interface ScopeOptions {
  /** Activity recorded on the clock record of every entity versioned by this batch */
  activity?: string;
}

// ============================================================================
// Recording Scope
// ============================================================================

export class RecordingScope {
  private currentDepth = 0;
  private currentActivity: string | null = null;
  private buffer = new Set<TemporalEntity>();
  private ready = false;

  get depth(): number {
    return this.currentDepth;
  }

  get state(): ScopeState {
    return this.currentDepth > 0 ? ScopeState.ACTIVE : ScopeState.IDLE;
  }

  get isActive(): boolean {
    return this.currentDepth > 0;
  }

  /** True once the outermost scope has exited with entities buffered */
  get isReady(): boolean {
    return this.ready;
  }

  /** Activity of the outermost active scope */
  get activity(): string | null {
    return this.currentActivity;
  }

  /** Entities touched since the batch started */
  get entities(): TemporalEntity[] {
    return [...this.buffer];
  }

  /**
   * Enters a scope. The outermost entry sets the batch activity; a nested
   * entry may only repeat that activity.
   *
   * @throws ScopeMisuseError if a nested entry names a different activity
   */
  enter(options: ScopeOptions = {}): void {
    if (this.currentDepth === 0) {
      this.ready = false;
      this.currentActivity = options.activity ?? null;
    } else if (options.activity !== undefined && options.activity !== this.currentActivity) {
      throw new ScopeMisuseError(
        `Nested recording scope cannot change the activity from ${String(this.currentActivity)} to ${options.activity}`,
        { expected: this.currentActivity, actual: options.activity, depth: this.currentDepth }
      );
    }
    this.currentDepth++;
  }

  /**
   * Leaves a scope. Leaving the outermost scope marks the batch ready.
   *
   * @throws ScopeMisuseError if no scope is active
   */
  exit(): void {
    if (this.currentDepth === 0) {
      throw new ScopeMisuseError('Recording scope exited without a matching enter()', { depth: 0 });
    }
    this.currentDepth--;
    if (this.currentDepth === 0) {
      this.ready = this.buffer.size > 0;
      this.currentActivity = null;
    }
  }

  /**
   * Runs `fn` inside a scope, exiting on every path
   */
  run<T>(fn: () => T, options: ScopeOptions = {}): T {
    this.enter(options);
    try {
      return fn();
    } finally {
      this.exit();
    }
  }

  /**
   * Records an entity touched while active, attaching the batch activity
   *
   * @returns false when no scope is active
   * @throws ScopeMisuseError if the entity already carries another activity
   */
  touch(entity: TemporalEntity): boolean {
    if (!this.isActive) {
      return false;
    }
    if (this.currentActivity !== null) {
      entity.attachActivity(this.currentActivity);
    }
    this.buffer.add(entity);
    return true;
  }

  /**
   * Hands the ready batch to the caller and clears it. Returns nothing
   * while a scope is still active.
   */
  takeBatch(): TemporalEntity[] {
    if (this.isActive) {
      return [];
    }
    const batch = [...this.buffer];
    this.buffer = new Set();
    this.ready = false;
    return batch;
  }

  /**
   * Puts a batch back after a flush that did not commit, or after a rolled
   * back transaction
   */
  restoreBatch(entities: Iterable<TemporalEntity>): void {
    this.buffer = new Set(entities);
    this.ready = !this.isActive && this.buffer.size > 0;
  }

  /** Drops all scope state, as after a rollback */
  reset(): void {
    this.currentDepth = 0;
    this.currentActivity = null;
    this.buffer = new Set();
    this.ready = false;
  }
}
