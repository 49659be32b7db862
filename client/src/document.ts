import type {
  DashboardInput,
  LocalRepresentation,
  Metadata,
  MetadataEntry,
  PublishedSpecView,
  Spec,
  Status
} from './types.js';
import { DocumentValidationError, parseMetadata, parseSpec, parseStatus, validateMetadataShape } from './schema-validation.js';
import { DEFAULT_SCHEMA_VERSION, dumpSpec } from './spec-schema.js';
import { normalizeSpecPayload } from './defaults.js';
import { isPlainObject } from './utils.js';

const ENVELOPE_KEYS = new Set(['spec', 'metadata', 'status']);

function resolveMetadata(value: unknown): MetadataEntry {
  if (value === undefined || value === null) {
    return { kind: 'resolved', value: {} };
  }
  if (isPlainObject(value) && !validateMetadataShape(value).length) {
    return { kind: 'resolved', value: parseMetadata(value) };
  }
  return { kind: 'raw', value };
}

function resolveStatus(value: unknown): Status {
  if (value === undefined || value === null) {
    return {};
  }
  return parseStatus(value);
}

function mergeSpecContent(input: Record<string, unknown>): Record<string, unknown> {
  const content: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (!ENVELOPE_KEYS.has(key)) content[key] = value;
  }

  const nested = isPlainObject(input.spec) ? input.spec : {};
  const merged: Record<string, unknown> = { ...nested, ...content };
  if (!('schemaVersion' in merged)) {
    merged.schemaVersion = DEFAULT_SCHEMA_VERSION;
  }
  return merged;
}

/**
 * Canonical in-memory dashboard. `spec` is what gets published; `metadata`
 * and `status` only travel in the local representation.
 */
export class DashboardDocument {
  private constructor(
    public metadata: MetadataEntry,
    public spec: Spec,
    public status: Status
  ) {}

  /**
   * Flat keys and a nested `spec` merge into one Spec, flat keys winning.
   * An existing document is returned as is.
   */
  static from(
    input: DashboardInput | DashboardDocument | LocalRepresentation | Record<string, unknown>
  ): DashboardDocument {
    if (input instanceof DashboardDocument) {
      return input;
    }
    if (!isPlainObject(input)) {
      throw new DocumentValidationError('spec', ['/ must be object']);
    }

    const spec = parseSpec(mergeSpecContent(input));
    return new DashboardDocument(resolveMetadata(input.metadata), spec, resolveStatus(input.status));
  }

  /** Resolves deferred metadata and re-checks every part after caller edits. */
  validate(): this {
    this.spec = parseSpec(this.spec);
    this.status = parseStatus(this.status);
    if (this.metadata.kind === 'raw') {
      this.metadata = { kind: 'resolved', value: parseMetadata(this.metadata.value) };
    }
    return this;
  }

  /** Validated metadata; throws while it is still held raw and invalid. */
  resolvedMetadata(): Metadata {
    if (this.metadata.kind === 'resolved') return this.metadata.value;
    return parseMetadata(this.metadata.value);
  }
}

export function toPublishedSpecView(document: DashboardDocument): PublishedSpecView {
  return normalizeSpecPayload(dumpSpec(document.spec));
}

export function toLocalRepresentation(document: DashboardDocument): LocalRepresentation {
  return {
    metadata: document.metadata.value,
    spec: dumpSpec(document.spec),
    status: document.status
  };
}

export function parseDashboardJson(text: string): DashboardDocument {
  const parsed: unknown = JSON.parse(text);
  if (!isPlainObject(parsed)) {
    throw new DocumentValidationError('spec', ['/ must be object']);
  }
  return DashboardDocument.from(parsed);
}

export function formatDashboard(document: DashboardDocument): string {
  return JSON.stringify(toPublishedSpecView(document), null, 4);
}
