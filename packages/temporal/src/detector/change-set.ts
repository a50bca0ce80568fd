/**
 * Change Set Detector
 *
 * Compares an entity's pending values with its last flushed snapshot and
 * reports the tracked units that changed. Pure: no I/O, no mutation of its
 * inputs.
 *
 * A composite group is compared as one unit. If any member differs, the
 * whole group is reported with every member's old and new value, so the
 * history row written from it is self-contained.
 */

import {
  compositeIntegrity,
  getTrackedUnits,
  valuesEqual,
  type FieldValues,
  type TemporalPolicy,
  type TemporalValue,
  type TrackedUnit,
  type TrackedUnitKind,
} from '@strata/core';

// ============================================================================
// Types
// ============================================================================

/**
 * One changed tracked unit
 */
export interface AttributeChange {
  /** Field name, or composite group name */
  readonly attribute: string;
  readonly kind: TrackedUnitKind;
  /** Values before the change; null if the unit had never been recorded */
  readonly oldValues: FieldValues | null;
  readonly newValues: FieldValues;
}

/**
 * Identifies the entity being diffed, for error reporting
 */
export interface DiffContext {
  readonly entityType: string;
  readonly entityId: string;
}

type Resolution =
  | { readonly state: 'unset' }
  | { readonly state: 'complete'; readonly values: FieldValues }
  | { readonly state: 'partial'; readonly missing: readonly string[] };

// ============================================================================
// Detection
// ============================================================================

function hasField(values: FieldValues, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(values, field);
}

/**
 * Reads a unit's member values. A unit with no member assigned is unset;
 * one with only some members assigned cannot be recorded.
 */
function resolveUnit(unit: TrackedUnit, values: FieldValues): Resolution {
  const resolved: Record<string, TemporalValue> = {};
  const missing: string[] = [];
  for (const field of unit.fields) {
    if (hasField(values, field)) {
      resolved[field] = values[field];
    } else {
      missing.push(field);
    }
  }
  if (missing.length === unit.fields.length) {
    return { state: 'unset' };
  }
  if (missing.length > 0) {
    return { state: 'partial', missing };
  }
  return { state: 'complete', values: resolved };
}

function sameValues(unit: TrackedUnit, a: FieldValues, b: FieldValues): boolean {
  return unit.fields.every((field) => valuesEqual(a[field], b[field]));
}

/**
 * Computes the tracked units whose pending values differ from the baseline
 *
 * @param policy - Policy of the entity's type
 * @param baseline - Values as of the last flush (empty for a new entity)
 * @param pending - Current values
 * @returns Changes in tracked-unit order; empty when nothing tracked changed
 * @throws CompositeIntegrityError if a composite has only some members assigned
 */
export function diff(
  policy: TemporalPolicy,
  baseline: FieldValues,
  pending: FieldValues,
  context: DiffContext
): AttributeChange[] {
  const changes: AttributeChange[] = [];

  for (const unit of getTrackedUnits(policy)) {
    const next = resolveUnit(unit, pending);
    if (next.state === 'unset') {
      continue;
    }
    if (next.state === 'partial') {
      throw compositeIntegrity(context.entityType, context.entityId, unit.name, next.missing);
    }

    const previous = resolveUnit(unit, baseline);
    if (previous.state === 'partial') {
      throw compositeIntegrity(context.entityType, context.entityId, unit.name, previous.missing);
    }
    if (previous.state === 'complete' && sameValues(unit, previous.values, next.values)) {
      continue;
    }

    changes.push({
      attribute: unit.name,
      kind: unit.kind,
      oldValues: previous.state === 'complete' ? previous.values : null,
      newValues: next.values,
    });
  }

  return changes;
}

/**
 * Names of the units in a change set
 */
export function changedAttributes(changes: readonly AttributeChange[]): string[] {
  return changes.map((change) => change.attribute);
}
