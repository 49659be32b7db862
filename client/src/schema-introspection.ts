type SchemaNode = Record<string, unknown>;

export type FieldKind =
  | { kind: 'scalar' }
  | { kind: 'sequence' }
  | { kind: 'object'; sequenceFields: string[] };

export type FieldTable = Readonly<Record<string, FieldKind>>;

function asNode(value: unknown): SchemaNode | null {
  return value && typeof value === 'object' && !Array.isArray(value)
    ? (value as SchemaNode)
    : null;
}

function branches(schema: SchemaNode): SchemaNode[] | null {
  const union = Array.isArray(schema.anyOf) ? schema.anyOf : Array.isArray(schema.oneOf) ? schema.oneOf : null;
  if (!union) return null;
  return union.map(asNode).filter((item): item is SchemaNode => item !== null);
}

function properties(schema: SchemaNode): Record<string, SchemaNode> {
  const props = asNode(schema.properties);
  if (!props) return {};
  const output: Record<string, SchemaNode> = {};
  for (const [name, value] of Object.entries(props)) {
    const node = asNode(value);
    if (node) output[name] = node;
  }
  return output;
}

export function isArrayType(schema: SchemaNode): boolean {
  const union = branches(schema);
  if (union) {
    return union.some((item) => item.type === 'array');
  }
  return schema.type === 'array';
}

export function isObjectType(schema: SchemaNode): boolean {
  const union = branches(schema);
  if (union) {
    return union.some((item) => item.type === 'object' || typeof item.$ref === 'string');
  }
  return schema.type === 'object' || typeof schema.$ref === 'string';
}

function refName(schema: SchemaNode): string | null {
  if (typeof schema.$ref === 'string') {
    return schema.$ref.split('/').pop() ?? null;
  }
  for (const item of branches(schema) ?? []) {
    if (typeof item.$ref === 'string') {
      return item.$ref.split('/').pop() ?? null;
    }
  }
  return null;
}

export function collectArrayFields(schema: SchemaNode): string[] {
  return Object.entries(properties(schema))
    .filter(([, fieldSchema]) => isArrayType(fieldSchema))
    .map(([name]) => name);
}

/**
 * Object-typed fields whose `$ref` target declares array-typed properties.
 * Only one level deep; references missing from `$defs` are skipped.
 */
export function collectNestedArrayFields(schema: SchemaNode): Record<string, string[]> {
  const defs = asNode(schema.$defs) ?? {};
  const nested: Record<string, string[]> = {};

  for (const [name, fieldSchema] of Object.entries(properties(schema))) {
    if (!isObjectType(fieldSchema)) continue;
    const ref = refName(fieldSchema);
    if (!ref) continue;
    const target = asNode(defs[ref]);
    if (!target) continue;

    const arrays = collectArrayFields(target);
    if (arrays.length) {
      nested[name] = arrays;
    }
  }

  return nested;
}

export function buildFieldTable(schema: SchemaNode): FieldTable {
  const nested = collectNestedArrayFields(schema);
  const table: Record<string, FieldKind> = {};

  for (const [name, fieldSchema] of Object.entries(properties(schema))) {
    if (isArrayType(fieldSchema)) {
      table[name] = { kind: 'sequence' };
    } else if (isObjectType(fieldSchema)) {
      table[name] = { kind: 'object', sequenceFields: nested[name] ?? [] };
    } else {
      table[name] = { kind: 'scalar' };
    }
  }

  return Object.freeze(table);
}

/** Declared `default` of every property; properties without one default to `null`. */
export function collectDeclaredDefaults(schema: SchemaNode): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const [name, fieldSchema] of Object.entries(properties(schema))) {
    defaults[name] = 'default' in fieldSchema ? fieldSchema.default : null;
  }
  return defaults;
}
