import type { Operator, SortDirection } from '../runtime/types';

/**
 * Call shape of a generated method
 * Unary methods take no parameters at all
 */
export enum BodyKind {
  Binary = 'binary',
  Unary = 'unary',
  Variadic = 'variadic',
}

export interface Parameter {
  readonly name: string;
  readonly type: string;       // element type for variadic parameters
  readonly variadic: boolean;
}

/**
 * Structured method bodies, rendered by the assembler
 */
export type MethodBody =
  | {
      readonly template: 'filter';
      readonly columnRef: string;          // e.g. ProductDbSchema.Name
      readonly operator: Operator;
      readonly value: string | null;       // parameter name, null sentinel for nullary checks
    }
  | {
      readonly template: 'update';
      readonly fieldName: string;
      readonly value: string;
    }
  | {
      readonly template: 'order';
      readonly columnRef: string;
      readonly direction: SortDirection;
    };

export interface MethodSpec {
  readonly name: string;
  readonly receiverExpr: string;
  readonly parameterList: readonly Parameter[];
  readonly returnType: string;
  readonly bodyKind: BodyKind;
  readonly body: MethodBody;
  readonly documentation: string;
}

export interface ColumnMapping {
  readonly logicalName: string;
  readonly columnName: string;
}

/**
 * Everything synthesized for one record, in field order
 */
export interface RecordMethods {
  readonly recordName: string;
  readonly filterMethods: readonly MethodSpec[];
  readonly updateMethods: readonly MethodSpec[];
  readonly sortMethods: readonly MethodSpec[];
  readonly columns: readonly ColumnMapping[];
  readonly typeReferences: readonly string[];
}
