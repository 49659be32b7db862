import type { FieldTable } from './schema-introspection.js';
import { SPEC_FIELD_TABLE } from './spec-schema.js';
import { isPlainObject } from './utils.js';

export const DEFAULT_TIME_RANGE = { from: 'now-6h', to: 'now' } as const;
export const DEFAULT_VERSION = 1;
export const DEFAULT_WEEK_START = '';

function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Replaces `null` sequences with `[]`, top level and one level into objects
 * the table knows sequence fields for. Only fields present in `data` are touched.
 */
export function applyFieldDefaults(data: Record<string, unknown>, table: FieldTable): Record<string, unknown> {
  const result: Record<string, unknown> = { ...data };

  for (const [field, declared] of Object.entries(table)) {
    if (!(field in result)) continue;
    const value = result[field];

    if (declared.kind === 'sequence') {
      if (isMissing(value)) result[field] = [];
      continue;
    }

    if (declared.kind !== 'object' || !declared.sequenceFields.length) continue;

    if (isMissing(value)) {
      result[field] = Object.fromEntries(declared.sequenceFields.map((name) => [name, []]));
    } else if (isPlainObject(value)) {
      const next: Record<string, unknown> = { ...value };
      for (const name of declared.sequenceFields) {
        if (isMissing(next[name])) next[name] = [];
      }
      result[field] = next;
    }
  }

  return result;
}

function correctTimeRange(value: unknown): unknown {
  if (isMissing(value)) return { ...DEFAULT_TIME_RANGE };
  if (!isPlainObject(value) || !('from_' in value)) return value;

  const { from_: aliased, ...rest } = value;
  return 'from' in rest ? rest : { from: aliased, ...rest };
}

/** Fields the server requires on every dashboard regardless of declared optionality. */
export function applyWireDefaults(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...data };

  result.time = correctTimeRange(result.time);
  if (isMissing(result.timepicker)) result.timepicker = {};
  if (isMissing(result.version)) result.version = DEFAULT_VERSION;
  if (isMissing(result.weekStart)) result.weekStart = DEFAULT_WEEK_START;

  return result;
}

export function normalizeSpecPayload(
  data: Record<string, unknown>,
  table: FieldTable = SPEC_FIELD_TABLE
): Record<string, unknown> {
  return applyWireDefaults(applyFieldDefaults(data, table));
}
