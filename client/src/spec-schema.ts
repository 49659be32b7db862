import specSchema from '../schema/dashboard-spec.schema.json' with { type: 'json' };
import { buildFieldTable, collectDeclaredDefaults, type FieldTable } from './schema-introspection.js';
import type { Spec } from './types.js';

export const DEFAULT_SCHEMA_VERSION = 39;

export const SPEC_FIELD_TABLE: FieldTable = buildFieldTable(specSchema);

const SPEC_DECLARED_DEFAULTS: Readonly<Record<string, unknown>> = Object.freeze(collectDeclaredDefaults(specSchema));

/**
 * Every declared Spec field, explicit values over declared defaults. Keys the
 * schema does not declare are kept after the declared ones.
 */
export function dumpSpec(spec: Spec): Record<string, unknown> {
  const explicit: Record<string, unknown> = { ...spec };
  const output: Record<string, unknown> = {};
  for (const [name, fallback] of Object.entries(SPEC_DECLARED_DEFAULTS)) {
    output[name] = name in explicit ? explicit[name] : fallback;
  }
  for (const [name, value] of Object.entries(explicit)) {
    if (!(name in output)) output[name] = value;
  }
  return output;
}
