import { describe, it, expect } from 'vitest';
import {
  defineTemporalPolicy,
  getTrackedUnits,
  getTrackedUnit,
  findUnitForField,
  isTrackedField,
  resolveDefault,
  TrackedUnitKind,
} from './policy.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

const notePolicy = defineTemporalPolicy({
  entityType: 'note',
  track: ['title', 'body'],
  composites: { span: ['startsAt', 'endsAt'] },
  defaults: { body: '' },
});

function policyError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('defineTemporalPolicy', () => {
  it('should apply flag defaults', () => {
    expect(notePolicy.scopeRequired).toBe(false);
    expect(notePolicy.activityRequired).toBe(false);
  });

  it('should return a frozen policy', () => {
    expect(Object.isFrozen(notePolicy)).toBe(true);
    expect(Object.isFrozen(notePolicy.trackedAttributes)).toBe(true);
    expect(Object.isFrozen(notePolicy.compositeGroups.span)).toBe(true);
  });

  it('should not share arrays with the declaration', () => {
    const track = ['title'];
    const policy = defineTemporalPolicy({ entityType: 'memo', track });
    track.push('body');
    expect(policy.trackedAttributes).toEqual(['title']);
  });

  it('should reject entity types that are not identifiers', () => {
    const error = policyError(() => defineTemporalPolicy({ entityType: 'my-note', track: ['a'] }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      code: ErrorCode.INVALID_POLICY,
      message: 'Invalid temporal policy for my-note: entity type must be an identifier',
    });
  });

  it('should reject a policy that tracks nothing', () => {
    expect(() => defineTemporalPolicy({ entityType: 'empty' })).toThrow(
      'Invalid temporal policy for empty: at least one field must be tracked'
    );
  });

  it('should reject duplicate tracked fields', () => {
    expect(() => defineTemporalPolicy({ entityType: 'note', track: ['title', 'title'] })).toThrow(
      'field title is tracked twice'
    );
  });

  it('should reject reserved field names', () => {
    expect(() => defineTemporalPolicy({ entityType: 'note', track: ['vclock'] })).toThrow(
      'field name vclock is reserved'
    );
    expect(() =>
      defineTemporalPolicy({ entityType: 'note', composites: { span: ['Tick_Start', 'endsAt'] } })
    ).toThrow('field name Tick_Start is reserved');
  });

  it('should reject composites with fewer than two fields', () => {
    expect(() =>
      defineTemporalPolicy({ entityType: 'note', composites: { span: ['startsAt'] } })
    ).toThrow('composite span needs at least 2 fields');
  });

  it('should reject a field tracked both alone and in a composite', () => {
    expect(() =>
      defineTemporalPolicy({
        entityType: 'note',
        track: ['startsAt'],
        composites: { span: ['startsAt', 'endsAt'] },
      })
    ).toThrow('field startsAt belongs to more than one tracked unit');
  });

  it('should reject a field shared by two composites', () => {
    expect(() =>
      defineTemporalPolicy({
        entityType: 'note',
        composites: { span: ['startsAt', 'endsAt'], window: ['endsAt', 'timezone'] },
      })
    ).toThrow('field endsAt belongs to more than one tracked unit');
  });

  it('should reject a composite named like a tracked field', () => {
    expect(() =>
      defineTemporalPolicy({
        entityType: 'note',
        track: ['span'],
        composites: { span: ['startsAt', 'endsAt'] },
      })
    ).toThrow('composite span has the same name as a tracked field');
  });

  it('should reject defaults for untracked fields', () => {
    expect(() =>
      defineTemporalPolicy({ entityType: 'note', track: ['title'], defaults: { color: 'red' } })
    ).toThrow('default given for untracked field color');
  });
});

describe('getTrackedUnits', () => {
  it('should list single fields before composites', () => {
    expect(getTrackedUnits(notePolicy)).toEqual([
      { name: 'title', kind: TrackedUnitKind.FIELD, fields: ['title'] },
      { name: 'body', kind: TrackedUnitKind.FIELD, fields: ['body'] },
      { name: 'span', kind: TrackedUnitKind.COMPOSITE, fields: ['startsAt', 'endsAt'] },
    ]);
  });
});

describe('unit lookup', () => {
  it('should find units by name', () => {
    expect(getTrackedUnit(notePolicy, 'span')?.kind).toBe('composite');
    expect(getTrackedUnit(notePolicy, 'startsAt')).toBeUndefined();
  });

  it('should find the unit owning a field', () => {
    expect(findUnitForField(notePolicy, 'endsAt')?.name).toBe('span');
    expect(findUnitForField(notePolicy, 'title')?.name).toBe('title');
    expect(findUnitForField(notePolicy, 'color')).toBeUndefined();
  });

  it('should report tracked fields', () => {
    expect(isTrackedField(notePolicy, 'startsAt')).toBe(true);
    expect(isTrackedField(notePolicy, 'span')).toBe(false);
  });
});

describe('resolveDefault', () => {
  it('should return declared values', () => {
    expect(resolveDefault(notePolicy, 'body')).toBe('');
    expect(resolveDefault(notePolicy, 'title')).toBeUndefined();
  });

  it('should call factory defaults each time', () => {
    let calls = 0;
    const policy = defineTemporalPolicy({
      entityType: 'counter',
      track: ['seed'],
      defaults: { seed: () => ++calls },
    });
    expect(resolveDefault(policy, 'seed')).toBe(1);
    expect(resolveDefault(policy, 'seed')).toBe(2);
  });

  it('should keep null as a declared default', () => {
    const policy = defineTemporalPolicy({
      entityType: 'memo',
      track: ['archivedAt'],
      defaults: { archivedAt: null },
    });
    expect(resolveDefault(policy, 'archivedAt')).toBeNull();
  });
});
