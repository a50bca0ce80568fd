/**
 * Temporal Entity Tests
 */

import { describe, it, expect } from 'vitest';
import { ScopeMisuseError, ValidationError, asEntityId } from '@strata/core';
import { TemporalEntity, type ChangeListener } from './temporal-entity.js';
import { notePolicy } from '../testing/index.js';

function recordingListener(): ChangeListener & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    entityChanged: (entity, field) => {
      calls.push(`${entity.id}.${field}`);
    },
  };
}

describe('TemporalEntity', () => {
  it('starts new with vclock 0 and initial values pending', () => {
    const entity = new TemporalEntity({
      policy: notePolicy,
      id: asEntityId('n-1'),
      initial: { title: 'hello' },
    });
    expect(entity.isNew).toBe(true);
    expect(entity.vclock).toBe(0);
    expect(entity.isDirty).toBe(true);
    expect(entity.entityType).toBe('note');
    expect(entity.snapshot()).toEqual({});
    expect(entity.pending()).toEqual({ title: 'hello' });
  });

  it('does not report initial values to the listener', () => {
    const listener = recordingListener();
    new TemporalEntity({ policy: notePolicy, id: asEntityId('n-1'), initial: { title: 'a' }, listener });
    expect(listener.calls).toEqual([]);
  });

  it('records writes and notifies the listener', () => {
    const listener = recordingListener();
    const entity = new TemporalEntity({
      policy: notePolicy,
      id: asEntityId('n-1'),
      baseline: { title: 'a' },
      vclock: 3,
      listener,
    });
    expect(entity.isDirty).toBe(false);

    entity.set('title', 'b').set('description', null);

    expect(listener.calls).toEqual(['n-1.title', 'n-1.description']);
    expect(entity.isDirty).toBe(true);
    expect(entity.get('title')).toBe('b');
    expect(entity.get('description')).toBeNull();
    expect(entity.has('description')).toBe(true);
    expect(entity.get('priority')).toBeUndefined();
    expect(entity.snapshot()).toEqual({ title: 'a' });
  });

  it('copies structured values on the way in and out', () => {
    const entity = new TemporalEntity({ policy: notePolicy, id: asEntityId('n-1') });
    const tags = ['a'];
    entity.set('title', tags);
    tags.push('b');
    expect(entity.get('title')).toEqual(['a']);

    const read = entity.get('title');
    if (Array.isArray(read)) read.push('c');
    expect(entity.get('title')).toEqual(['a']);
  });

  it('rejects values that cannot be stored', () => {
    const entity = new TemporalEntity({ policy: notePolicy, id: asEntityId('n-1') });
    expect(() => entity.set('title', Number.NaN)).toThrow(ValidationError);
    expect(entity.has('title')).toBe(false);
  });

  it('detects untracked changes only', () => {
    const entity = new TemporalEntity({
      policy: notePolicy,
      id: asEntityId('n-1'),
      baseline: { title: 'a', color: 'red' },
      vclock: 1,
    });
    entity.set('title', 'b');
    expect(entity.hasUntrackedChanges()).toBe(false);
    entity.set('color', 'red');
    expect(entity.hasUntrackedChanges()).toBe(false);
    entity.set('color', 'blue');
    expect(entity.hasUntrackedChanges()).toBe(true);
  });

  it('rejects a second activity before the first is flushed', () => {
    const entity = new TemporalEntity({ policy: notePolicy, id: asEntityId('n-1') });
    entity.attachActivity('act-1');
    entity.attachActivity('act-1');
    expect(() => entity.attachActivity('act-2')).toThrow(ScopeMisuseError);
    expect(entity.activityId).toBe('act-1');

    entity.markFlushed(1);
    entity.attachActivity('act-2');
    expect(entity.activityId).toBe('act-2');
  });

  it('leaves the field unchanged when the listener rejects the write', () => {
    const entity = new TemporalEntity({
      policy: notePolicy,
      id: asEntityId('n-1'),
      baseline: { title: 'a' },
      vclock: 1,
      listener: {
        entityChanged: () => {
          throw new ScopeMisuseError('rejected');
        },
      },
    });
    expect(() => entity.set('title', 'b')).toThrow('rejected');
    expect(entity.get('title')).toBe('a');
    expect(entity.isDirty).toBe(false);
  });

  it('captures and restores pending state', () => {
    const entity = new TemporalEntity({
      policy: notePolicy,
      id: asEntityId('n-1'),
      baseline: { title: 'a' },
      vclock: 1,
    });
    entity.set('title', 'b');
    const saved = entity.capture();

    entity.set('title', 'c');
    entity.markUnscoped('title');
    entity.attachActivity('act-1');
    entity.restore(saved);

    expect(entity.get('title')).toBe('b');
    expect(entity.unscopedDirty).toBe(false);
    expect(entity.activityId).toBeNull();
    expect(entity.isDirty).toBe(true);
  });

  it('reverts to the baseline', () => {
    const entity = new TemporalEntity({
      policy: notePolicy,
      id: asEntityId('n-1'),
      baseline: { title: 'a' },
      vclock: 2,
    });
    entity.set('title', 'b');
    entity.markUnscoped('title');
    entity.revert();
    expect(entity.pending()).toEqual({ title: 'a' });
    expect(entity.isDirty).toBe(false);
    expect(entity.unscopedFields).toEqual([]);
  });

  it('makes pending values the baseline once flushed', () => {
    const entity = new TemporalEntity({ policy: notePolicy, id: asEntityId('n-1'), initial: { title: 'a' } });
    entity.markUnscoped('title');
    entity.attachActivity('act-1');
    entity.markFlushed(1);

    expect(entity.isNew).toBe(false);
    expect(entity.vclock).toBe(1);
    expect(entity.isDirty).toBe(false);
    expect(entity.snapshot()).toEqual({ title: 'a' });
    expect(entity.unscopedDirty).toBe(false);
    expect(entity.activityId).toBeNull();
  });
});
