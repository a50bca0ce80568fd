/**
 * Recording Scope Tests
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, ScopeMisuseError, asEntityId } from '@strata/core';
import { RecordingScope, ScopeState } from './recording-scope.js';
import { TemporalEntity } from '../entity/temporal-entity.js';
import { memoPolicy } from '../testing/index.js';

function memo(id: string): TemporalEntity {
  return new TemporalEntity({ policy: memoPolicy, id: asEntityId(id) });
}

describe('RecordingScope', () => {
  it('moves from idle to active and back', () => {
    const scope = new RecordingScope();
    expect(scope.state).toBe(ScopeState.IDLE);
    scope.enter();
    expect(scope.state).toBe(ScopeState.ACTIVE);
    expect(scope.depth).toBe(1);
    scope.exit();
    expect(scope.state).toBe(ScopeState.IDLE);
    expect(scope.depth).toBe(0);
  });

  it('marks the batch ready only at the outermost exit', () => {
    const scope = new RecordingScope();
    const entity = memo('m-1');
    scope.enter();
    scope.enter();
    scope.touch(entity);
    scope.exit();
    expect(scope.isReady).toBe(false);
    expect(scope.isActive).toBe(true);
    scope.exit();
    expect(scope.isReady).toBe(true);
    expect(scope.entities).toEqual([entity]);
  });

  it('is not ready when nothing was touched', () => {
    const scope = new RecordingScope();
    scope.run(() => undefined);
    expect(scope.isReady).toBe(false);
  });

  it('raises ScopeMisuseError on exit without enter', () => {
    const scope = new RecordingScope();
    let caught: unknown;
    try {
      scope.exit();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ScopeMisuseError);
    expect(caught).toMatchObject({
      code: ErrorCode.SCOPE_MISUSE,
      message: 'Recording scope exited without a matching enter()',
    });
  });

  it('raises on the extra exit after balanced use', () => {
    const scope = new RecordingScope();
    scope.enter();
    scope.exit();
    expect(() => scope.exit()).toThrow(ScopeMisuseError);
  });

  it('does not buffer entities while idle', () => {
    const scope = new RecordingScope();
    expect(scope.touch(memo('m-1'))).toBe(false);
    expect(scope.entities).toEqual([]);
  });

  it('attaches the outermost activity to touched entities', () => {
    const scope = new RecordingScope();
    const entity = memo('m-1');
    scope.run(
      () => {
        expect(scope.activity).toBe('import-7');
        scope.run(() => scope.touch(entity));
      },
      { activity: 'import-7' }
    );
    expect(entity.activityId).toBe('import-7');
    expect(scope.activity).toBeNull();
  });

  it('rejects a nested scope naming a different activity', () => {
    const scope = new RecordingScope();
    scope.enter({ activity: 'a' });
    expect(() => scope.enter({ activity: 'b' })).toThrow(ScopeMisuseError);
    expect(scope.depth).toBe(1);
    scope.enter({ activity: 'a' });
    expect(scope.depth).toBe(2);
  });

  it('exits on every path out of run()', () => {
    const scope = new RecordingScope();
    expect(() =>
      scope.run(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(scope.depth).toBe(0);
  });

  it('returns the value of the wrapped function', () => {
    const scope = new RecordingScope();
    expect(scope.run(() => 42)).toBe(42);
  });

  it('hands over the batch once and starts fresh on the next entry', () => {
    const scope = new RecordingScope();
    const first = memo('m-1');
    scope.run(() => scope.touch(first));
    expect(scope.takeBatch()).toEqual([first]);
    expect(scope.takeBatch()).toEqual([]);
    expect(scope.isReady).toBe(false);

    scope.enter();
    expect(scope.takeBatch()).toEqual([]);
    scope.exit();
  });

  it('adds successive scopes to the batch until it is taken', () => {
    const scope = new RecordingScope();
    const first = memo('m-1');
    const second = memo('m-2');
    scope.run(() => scope.touch(first));
    scope.run(() => scope.touch(second));
    expect(scope.isReady).toBe(true);
    expect(scope.takeBatch()).toEqual([first, second]);
  });

  it('puts a batch back for a later flush', () => {
    const scope = new RecordingScope();
    const entity = memo('m-1');
    scope.run(() => scope.touch(entity));
    const batch = scope.takeBatch();
    scope.restoreBatch(batch);
    expect(scope.isReady).toBe(true);
    expect(scope.entities).toEqual([entity]);

    scope.enter();
    scope.restoreBatch([]);
    expect(scope.isReady).toBe(false);
    scope.exit();
    expect(scope.isReady).toBe(false);
  });

  it('leaves an entity carrying another activity out of the batch', () => {
    const scope = new RecordingScope();
    const entity = memo('m-1');
    entity.attachActivity('import-1');
    let caught: unknown;
    scope.enter({ activity: 'import-2' });
    try {
      scope.touch(entity);
    } catch (error) {
      caught = error;
    }
    scope.exit();
    expect(caught).toBeInstanceOf(ScopeMisuseError);
    expect(caught).toMatchObject({
      message: 'memo/m-1 already has pending activity import-1; cannot attach import-2 before commit',
      details: { expected: 'import-1', actual: 'import-2' },
    });
    expect(scope.entities).toEqual([]);
    expect(entity.activityId).toBe('import-1');
  });

  it('resets all state', () => {
    const scope = new RecordingScope();
    scope.enter({ activity: 'a' });
    scope.touch(memo('m-1'));
    scope.reset();
    expect(scope.depth).toBe(0);
    expect(scope.activity).toBeNull();
    expect(scope.entities).toEqual([]);
  });
});
