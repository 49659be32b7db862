export { DashboardClient, NOOP_LOGGER, apiKeyPreview } from './client.js';
export type { ClientDeps, FetchLike } from './client.js';
export { configFromEnv, resolveConfig } from './config.js';
export {
  DashboardDocument,
  formatDashboard,
  parseDashboardJson,
  toLocalRepresentation,
  toPublishedSpecView
} from './document.js';
export { applyFieldDefaults, applyWireDefaults, normalizeSpecPayload } from './defaults.js';
export {
  buildFieldTable,
  collectArrayFields,
  collectNestedArrayFields,
  isArrayType,
  isObjectType
} from './schema-introspection.js';
export type { FieldKind, FieldTable } from './schema-introspection.js';
export { DEFAULT_SCHEMA_VERSION, SPEC_FIELD_TABLE, dumpSpec } from './spec-schema.js';
export {
  DocumentValidationError,
  parseDatasource,
  parseMetadata,
  parseSpec,
  parseStatus,
  validateSpecShape
} from './schema-validation.js';
export type * from './types.js';
