// Types for record schemas loaded from YAML

import type { RawFieldShape } from '../common/types';
import type { TimePattern } from '../classifier/time-patterns';

/**
 * One record as declared in the schema file, fields in declaration order
 */
export interface RecordDefinition {
  name: string;
  annotations: string[];
  fields: RawFieldShape[];
}

/**
 * Complete schema handed to the generator
 * Type expressions are already resolved into raw shapes
 */
export interface SchemaDefinition {
  source: string;                      // path the schema was loaded from
  namespace: string;                   // logical namespace of the records
  modulePath?: string;                 // module exporting same-namespace named types
  imports: Record<string, string>;     // namespace -> module for qualified named types
  timePatterns: TimePattern[];         // additions to the built-in time patterns
  records: RecordDefinition[];
}

/**
 * Structure of a field entry when written as a mapping
 * A plain string is shorthand for { type }
 */
export interface YamlFieldConfig {
  type: string;
  column?: string;
  exclude?: boolean;
  tag?: string;
}
