export { FieldCategory, COLUMN_SETTING, EXCLUDE_SETTING } from './common/types';
export type {
  RawFieldShape,
  RawTypeShape,
  FieldSettings,
  ClassifiedField,
  ClassifiedRecord,
} from './common/types';
export { SynthesisContractError, NoRecordsDefinedError, NoEligibleRecordsError } from './common/errors';
export { classify, isExcluded } from './classifier/classifier';
export { toColumnName } from './classifier/column-name';
export { isFilterable, operatorsFor, supportedCategories, unsupportedCategories } from './classifier/field-model';
export { TimePatternTable, DEFAULT_TIME_PATTERNS } from './classifier/time-patterns';
export type { TimePattern } from './classifier/time-patterns';
export { toParameterName } from './synthesis/identifiers';
export { createFilterMethod, createUpdaterMethod, createOrderMethod } from './synthesis/method-synthesizer';
export { synthesizeRecord } from './synthesis/record-synthesizer';
export { BodyKind } from './synthesis/method.types';
export type { MethodSpec, Parameter, MethodBody, ColumnMapping, RecordMethods } from './synthesis/method.types';
export { assembleFile } from './codegen/assembler';
export type { AssembleOptions, AssembledFile } from './codegen/assembler';
export { loadSchema, parseSchema } from './config/schema.config';
export type { SchemaDefinition, RecordDefinition } from './config/schema.types';
export { GeneratorService } from './generator/generator.service';
export type { GenerationResult, FieldTypeListing } from './generator/generator.service';
export { GeneratorModule } from './generator/generator.module';
