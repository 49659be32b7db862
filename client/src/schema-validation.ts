import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, ValidateFunction } from 'ajv';
import specSchema from '../schema/dashboard-spec.schema.json' with { type: 'json' };
import metadataSchema from '../schema/metadata.schema.json' with { type: 'json' };
import statusSchema from '../schema/status.schema.json' with { type: 'json' };
import datasourceSchema from '../schema/datasource.schema.json' with { type: 'json' };
import type { Datasource, Metadata, Spec, Status } from './types.js';

const ajv = new Ajv2020({ allErrors: true, strict: false });

const validateSpecSchema: ValidateFunction<Spec> = ajv.compile<Spec>(specSchema);
const validateMetadataSchema: ValidateFunction<Metadata> = ajv.compile<Metadata>(metadataSchema);
const validateStatusSchema: ValidateFunction<Status> = ajv.compile<Status>(statusSchema);
const validateDatasourceSchema: ValidateFunction<Datasource> = ajv.compile<Datasource>(datasourceSchema);

export type DocumentPart = 'spec' | 'metadata' | 'status' | 'datasource';

export class DocumentValidationError extends Error {
  constructor(
    readonly part: DocumentPart,
    readonly errors: string[]
  ) {
    super(`invalid ${part}: ${errors.join('; ')}`);
    this.name = 'DocumentValidationError';
  }
}

function errorsToStrings(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || !errors.length) return ['schema validation failed'];
  return errors.map((item) => `${item.instancePath || '/'} ${item.message || 'invalid'}`.trim());
}

function check<T>(validate: ValidateFunction<T>, value: unknown): string[] {
  if (validate(value)) {
    return [];
  }
  return errorsToStrings(validate.errors);
}

function assertShape<T>(validate: ValidateFunction<T>, part: DocumentPart, value: unknown): T {
  if (validate(value)) {
    return value;
  }
  throw new DocumentValidationError(part, errorsToStrings(validate.errors));
}

export function validateSpecShape(value: unknown): string[] {
  return check(validateSpecSchema, value);
}

export function validateMetadataShape(value: unknown): string[] {
  return check(validateMetadataSchema, value);
}

export function parseSpec(value: unknown): Spec {
  return assertShape(validateSpecSchema, 'spec', value);
}

export function parseMetadata(value: unknown): Metadata {
  return assertShape(validateMetadataSchema, 'metadata', value);
}

export function parseStatus(value: unknown): Status {
  return assertShape(validateStatusSchema, 'status', value);
}

export function parseDatasource(value: unknown): Datasource {
  return assertShape(validateDatasourceSchema, 'datasource', value);
}
