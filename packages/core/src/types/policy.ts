/**
 * Temporal Policy
 *
 * Describes which attributes of an entity type are versioned. A policy is a
 * plain value: the temporal machinery works over any entity type that
 * supplies one, and the storage layer derives its tables from it.
 *
 * - Individually tracked fields get one history table each
 * - Composite groups (2+ fields) get one history table recording all
 *   members together, so partial group states never appear in history
 */

import { invalidPolicy } from '../errors/factories.js';
import { isTemporalValue, type TemporalValue } from './value.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Default for a tracked field: a value, or a function producing one each
 * time an entity is created without that field
 */
export type DefaultValue = TemporalValue | (() => TemporalValue);

/**
 * Declaration accepted by defineTemporalPolicy
 */
export interface TemporalPolicyInput {
  /** Entity type name; also the prefix of every table derived from it */
  entityType: string;
  /** Fields versioned individually */
  track?: readonly string[];
  /** Composite groups keyed by group name */
  composites?: Readonly<Record<string, readonly string[]>>;
  /** Reject mutations made outside a recording scope (default: false) */
  scopeRequired?: boolean;
  /** Every version must name the activity that caused it (default: false) */
  activityRequired?: boolean;
  /** Values applied at creation to tracked fields the caller left unset */
  defaults?: Readonly<Record<string, DefaultValue>>;
}

/**
 * Validated, immutable temporal policy
 */
export interface TemporalPolicy {
  readonly entityType: string;
  readonly trackedAttributes: readonly string[];
  readonly compositeGroups: Readonly<Record<string, readonly string[]>>;
  readonly scopeRequired: boolean;
  readonly activityRequired: boolean;
  readonly defaults: Readonly<Record<string, DefaultValue>>;
}

/**
 * Kind of tracked unit
 */
export const TrackedUnitKind = {
  FIELD: 'field',
  COMPOSITE: 'composite',
} as const;

export type TrackedUnitKind = (typeof TrackedUnitKind)[keyof typeof TrackedUnitKind];

/**
 * One versioned unit: a single field, or a composite group of fields.
 * Each unit owns exactly one history table.
 */
export interface TrackedUnit {
  /** Field name, or composite group name */
  readonly name: string;
  readonly kind: TrackedUnitKind;
  /** Member fields; a single-field unit lists only itself */
  readonly fields: readonly string[];
}

// ============================================================================
// Constants
// ============================================================================

/** Names usable as entity types, fields and groups (they become SQL identifiers) */
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Column names used by history tables; tracked fields cannot reuse them (SQLite compares column names case-insensitively) */
export const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set([
  'id',
  'entity_id',
  'vclock',
  'vclock_end',
  'tick_start',
  'tick_end',
]);

/** Minimum members of a composite group */
export const MIN_COMPOSITE_FIELDS = 2;

// ============================================================================
// Construction
// ============================================================================

/**
 * Validates a policy declaration and returns a frozen TemporalPolicy
 *
 * @example
 * ```typescript
 * const notePolicy = defineTemporalPolicy({
 *   entityType: 'note',
 *   track: ['title', 'body'],
 *   composites: { span: ['startsAt', 'endsAt'] },
 *   scopeRequired: true,
 * });
 * ```
 */
export function defineTemporalPolicy(input: TemporalPolicyInput): TemporalPolicy {
  const { entityType } = input;
  if (typeof entityType !== 'string' || !NAME_PATTERN.test(entityType)) {
    throw invalidPolicy(String(entityType), 'entity type must be an identifier', {
      field: 'entityType',
      value: entityType,
    });
  }

  const tracked = [...(input.track ?? [])];
  const composites = input.composites ?? {};
  const seenFields = new Set<string>();

  for (const field of tracked) {
    validateFieldName(entityType, field);
    if (seenFields.has(field)) {
      throw invalidPolicy(entityType, `field ${field} is tracked twice`, { field });
    }
    seenFields.add(field);
  }

  const compositeGroups: Record<string, readonly string[]> = {};
  for (const [group, members] of Object.entries(composites)) {
    if (!NAME_PATTERN.test(group)) {
      throw invalidPolicy(entityType, `composite name ${group} must be an identifier`, { field: group });
    }
    if (seenFields.has(group)) {
      throw invalidPolicy(entityType, `composite ${group} has the same name as a tracked field`, {
        field: group,
      });
    }
    if (members.length < MIN_COMPOSITE_FIELDS) {
      throw invalidPolicy(
        entityType,
        `composite ${group} needs at least ${MIN_COMPOSITE_FIELDS} fields`,
        { field: group, actual: members.length }
      );
    }
    for (const member of members) {
      validateFieldName(entityType, member);
      if (seenFields.has(member)) {
        throw invalidPolicy(entityType, `field ${member} belongs to more than one tracked unit`, {
          field: member,
        });
      }
      seenFields.add(member);
    }
    compositeGroups[group] = Object.freeze([...members]);
  }

  if (seenFields.size === 0) {
    throw invalidPolicy(entityType, 'at least one field must be tracked');
  }

  const defaults: Record<string, DefaultValue> = {};
  for (const [field, value] of Object.entries(input.defaults ?? {})) {
    if (!seenFields.has(field)) {
      throw invalidPolicy(entityType, `default given for untracked field ${field}`, { field });
    }
    if (typeof value !== 'function' && !isTemporalValue(value)) {
      throw invalidPolicy(entityType, `default for ${field} is not a storable value`, { field });
    }
    defaults[field] = value;
  }

  return Object.freeze({
    entityType,
    trackedAttributes: Object.freeze(tracked),
    compositeGroups: Object.freeze(compositeGroups),
    scopeRequired: input.scopeRequired ?? false,
    activityRequired: input.activityRequired ?? false,
    defaults: Object.freeze(defaults),
  });
}

function validateFieldName(entityType: string, field: string): void {
  if (typeof field !== 'string' || !NAME_PATTERN.test(field)) {
    throw invalidPolicy(entityType, `field name ${String(field)} must be an identifier`, {
      field: String(field),
    });
  }
  if (RESERVED_FIELD_NAMES.has(field.toLowerCase())) {
    throw invalidPolicy(entityType, `field name ${field} is reserved`, { field });
  }
}

// ============================================================================
// Introspection
// ============================================================================

/**
 * Lists the policy's tracked units: single fields first, then composites,
 * each in declaration order
 */
export function getTrackedUnits(policy: TemporalPolicy): TrackedUnit[] {
  const units: TrackedUnit[] = policy.trackedAttributes.map((field) => ({
    name: field,
    kind: TrackedUnitKind.FIELD,
    fields: [field],
  }));
  for (const [group, members] of Object.entries(policy.compositeGroups)) {
    units.push({ name: group, kind: TrackedUnitKind.COMPOSITE, fields: members });
  }
  return units;
}

/**
 * Finds a tracked unit by its name (field name or composite group name)
 */
export function getTrackedUnit(policy: TemporalPolicy, name: string): TrackedUnit | undefined {
  return getTrackedUnits(policy).find((unit) => unit.name === name);
}

/**
 * Finds the unit a field is versioned under
 */
export function findUnitForField(policy: TemporalPolicy, field: string): TrackedUnit | undefined {
  return getTrackedUnits(policy).find((unit) => unit.fields.includes(field));
}

/**
 * Whether a field is versioned, alone or as part of a composite
 */
export function isTrackedField(policy: TemporalPolicy, field: string): boolean {
  return findUnitForField(policy, field) !== undefined;
}

/**
 * Resolves the default for a field, if the policy declares one
 */
export function resolveDefault(policy: TemporalPolicy, field: string): TemporalValue | undefined {
  if (!Object.prototype.hasOwnProperty.call(policy.defaults, field)) {
    return undefined;
  }
  const declared = policy.defaults[field];
  return typeof declared === 'function' ? declared() : declared;
}
