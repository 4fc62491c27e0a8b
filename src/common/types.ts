/**
 * Our internal type system for record fields
 * Raw shapes come from schema ingestion, classified fields go to synthesis
 */

/**
 * Semantic categories a field type resolves to
 * Drives filterability and the operator set of a field
 */
export enum FieldCategory {
  Unknown = 'unknown',
  String = 'string',
  Numeric = 'numeric',
  Time = 'time',
  Boolean = 'boolean',
  Pointer = 'pointer',
  Slice = 'slice',
  Map = 'map',
  Aggregate = 'aggregate',
}

export interface PrimitiveShape {
  kind: 'primitive';
  name: string;
  isString: boolean;
  isNumeric: boolean;
}

export interface PointerShape {
  kind: 'pointer';
  element: RawTypeShape;
}

export interface SliceShape {
  kind: 'slice';
  element: RawTypeShape;
  collection?: 'Set' | 'ReadonlyArray';   // plain array when absent
}

export interface MapShape {
  kind: 'map';
  key: RawTypeShape;
  value: RawTypeShape;
  collection?: 'Map';   // Record when absent
}

export interface AggregateMember {
  name: string;
  type: string;
}

export interface AggregateShape {
  kind: 'aggregate';
  members: AggregateMember[];
}

/**
 * A declared type, possibly instantiated with type arguments
 * namespace is undefined for globals such as Date
 */
export interface NamedShape {
  kind: 'named';
  name: string;
  namespace: string | undefined;
  underlying: RawTypeShape;
  typeArguments: RawTypeShape[];
}

/**
 * Anything outside the supported set (literal unions, functions, tuples)
 */
export interface OpaqueShape {
  kind: 'opaque';
  text: string;
}

export type RawTypeShape =
  | PrimitiveShape
  | PointerShape
  | SliceShape
  | MapShape
  | AggregateShape
  | NamedShape
  | OpaqueShape;

/**
 * Tag-derived field settings, keys upper-cased
 */
export type FieldSettings = Readonly<Record<string, string>>;

export const COLUMN_SETTING = 'COLUMN';
export const EXCLUDE_SETTING = '-';

/**
 * One field of a record as handed over by schema ingestion
 */
export interface RawFieldShape {
  name: string;
  type: RawTypeShape;
  settings: FieldSettings;
}

/**
 * Result of classifying a raw field
 * Immutable; safe to share between synthesis passes
 */
export interface ClassifiedField {
  readonly name: string;
  readonly columnName: string;
  readonly displayTypeName: string;
  readonly typeExpression: string;   // TypeScript rendering used in generated signatures
  readonly category: FieldCategory;
  readonly isOrderableTime: boolean;
  readonly isPointer: boolean;
  readonly pointedCategory?: FieldCategory;
  readonly isGenericInstantiation: boolean;
  readonly typeArguments: readonly string[];
  readonly typeReferences: readonly string[];   // named types the rendering must import
}

/**
 * A record ready for synthesis
 */
export interface ClassifiedRecord {
  name: string;
  fields: ClassifiedField[];
}
