import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import type { RawFieldShape } from '../common/types';
import type { TimePattern } from '../classifier/time-patterns';
import { parseTypeExpression } from '../schema/type-expression';
import { ShapeResolver, splitTypeName } from '../schema/shape-resolver';
import type { TypeDeclaration } from '../schema/shape-resolver';
import { buildFieldSettings } from '../schema/tags';
import { DEFAULT_SCHEMA_PATH } from './generator.config';
import type { RecordDefinition, SchemaDefinition, YamlFieldConfig } from './schema.types';

const logger = new Logger('SchemaConfig');

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Loads record definitions from the YAML schema file
 * Resolves all type expressions at load time and fails fast on invalid input
 */
export default registerAs('schema', (): SchemaDefinition => {
  return loadSchema(process.env.SCHEMA_PATH || DEFAULT_SCHEMA_PATH);
});

export function loadSchema(schemaPath: string): SchemaDefinition {
  try {
    logger.log(`Loading record definitions from: ${schemaPath}`);

    const yamlContent = readFileSync(schemaPath, 'utf-8');
    const schema = parseSchema(load(yamlContent), schemaPath);

    logger.log(`Loaded ${schema.records.length} record definitions: ${schema.records.map(record => record.name).join(', ')}`);
    return schema;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      logger.error(`Schema file not found at ${schemaPath}`);
      throw new Error(`Schema file not found: ${schemaPath}. Please ensure the file exists or set SCHEMA_PATH environment variable.`);
    }
    logger.error('Failed to load record definitions');
    throw error;
  }
}

/**
 * Validate parsed YAML and resolve it into a SchemaDefinition
 */
export function parseSchema(data: unknown, source: string): SchemaDefinition {
  if (!isPlainObject(data) || !isPlainObject(data.records)) {
    throw new Error('Invalid schema file: must contain a "records" section');
  }

  const namespace = optionalString(data.namespace, 'namespace') ?? '';
  const modulePath = optionalString(data.module, 'module');
  const imports = parseStringMap(data.imports, 'imports');
  const timePatterns = parseTimeTypes(data.timeTypes);
  const resolver = new ShapeResolver(parseDeclarations(data.types, namespace), namespace);

  const records: RecordDefinition[] = [];
  for (const [recordName, recordConfig] of Object.entries(data.records)) {
    if (!IDENTIFIER.test(recordName)) {
      throw new Error(`Invalid record name '${recordName}': must be an identifier`);
    }
    if (!isPlainObject(recordConfig) || !isPlainObject(recordConfig.fields) || Object.keys(recordConfig.fields).length === 0) {
      throw new Error(`Record '${recordName}' must have at least one field defined`);
    }

    const fields = Object.entries(recordConfig.fields).map(([fieldName, fieldConfig]) =>
      parseField(recordName, fieldName, fieldConfig, resolver),
    );

    records.push({
      name: recordName,
      annotations: parseAnnotations(recordName, recordConfig.annotations),
      fields,
    });
  }

  return { source, namespace, modulePath, imports, timePatterns, records };
}

function parseField(recordName: string, fieldName: string, config: unknown, resolver: ShapeResolver): RawFieldShape {
  if (!IDENTIFIER.test(fieldName)) {
    throw new Error(`Invalid field name '${fieldName}' in record '${recordName}': must be an identifier`);
  }

  const fieldConfig = toFieldConfig(config);
  if (!fieldConfig) {
    throw new Error(`Field '${fieldName}' in record '${recordName}' must be a type string or a mapping with a "type" key`);
  }

  try {
    return {
      name: fieldName,
      type: resolver.resolve(parseTypeExpression(fieldConfig.type)),
      settings: buildFieldSettings(fieldConfig),
    };
  } catch (error) {
    // Provide better error context
    throw new Error(`Invalid type '${fieldConfig.type}' for field '${fieldName}' in record '${recordName}': ${errorMessage(error)}`);
  }
}

function toFieldConfig(config: unknown): YamlFieldConfig | undefined {
  if (typeof config === 'string') {
    return { type: config };
  }
  if (!isPlainObject(config) || typeof config.type !== 'string') {
    return undefined;
  }
  return {
    type: config.type,
    column: typeof config.column === 'string' ? config.column : undefined,
    exclude: config.exclude === true,
    tag: typeof config.tag === 'string' ? config.tag : undefined,
  };
}

/**
 * Declarations are keyed by their written name, e.g. "datatypes.JSONSlice<T>"
 */
function parseDeclarations(types: unknown, namespace: string): TypeDeclaration[] {
  const declarations: TypeDeclaration[] = [];

  for (const [key, definition] of Object.entries(parseStringMap(types, 'types'))) {
    const head = parseTypeExpression(key);
    if (head.kind !== 'reference') {
      throw new Error(`Invalid type declaration '${key}': expected a name with optional type parameters`);
    }

    const params = head.args.map(arg => {
      if (arg.kind !== 'reference' || arg.args.length > 0 || arg.name.includes('.')) {
        throw new Error(`Invalid type declaration '${key}': type parameters must be plain names`);
      }
      return arg.name;
    });

    const { namespace: declaredNamespace, bareName } = splitTypeName(head.name, namespace);
    try {
      declarations.push({
        name: bareName,
        namespace: declaredNamespace,
        params,
        definition: parseTypeExpression(definition),
      });
    } catch (error) {
      throw new Error(`Invalid definition for type '${key}': ${errorMessage(error)}`);
    }
  }

  return declarations;
}

function parseTimeTypes(timeTypes: unknown): TimePattern[] {
  if (timeTypes === undefined || timeTypes === null) {
    return [];
  }
  if (!Array.isArray(timeTypes)) {
    throw new Error('Invalid schema file: "timeTypes" must be a list');
  }

  return timeTypes.map((entry: unknown) => {
    if (typeof entry === 'string' && entry !== '') {
      return { exactTypeName: entry, isOrderable: true };
    }
    if (isPlainObject(entry) && typeof entry.type === 'string' && entry.type !== '') {
      return { exactTypeName: entry.type, isOrderable: entry.orderable !== false };
    }
    throw new Error(`Invalid time type entry: ${JSON.stringify(entry)}`);
  });
}

function parseAnnotations(recordName: string, annotations: unknown): string[] {
  if (annotations === undefined || annotations === null) {
    return [];
  }
  if (!Array.isArray(annotations) || !annotations.every((annotation: unknown) => typeof annotation === 'string')) {
    throw new Error(`Annotations of record '${recordName}' must be a list of strings`);
  }
  return annotations;
}

function parseStringMap(value: unknown, section: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isPlainObject(value)) {
    throw new Error(`Invalid schema file: "${section}" must be a mapping`);
  }

  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`Invalid schema file: "${section}.${key}" must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`Invalid schema file: "${key}" must be a string`);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
