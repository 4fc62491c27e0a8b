import type { ClassifiedField } from '../common/types';
import { SynthesisContractError } from '../common/errors';
import { isFilterable, operatorsFor } from '../classifier/field-model';
import { Operator, SortDirection } from '../runtime/types';
import { toParameterName } from './identifiers';
import { BodyKind } from './method.types';
import type { MethodSpec } from './method.types';

/**
 * Method name suffix per operator
 */
export const OPERATOR_SUFFIXES: Record<Operator, string> = {
  [Operator.Equal]: 'Eq',
  [Operator.NotEqual]: 'Ne',
  [Operator.LessThan]: 'Lt',
  [Operator.LessOrEqual]: 'Lte',
  [Operator.GreaterThan]: 'Gt',
  [Operator.GreaterOrEqual]: 'Gte',
  [Operator.Like]: 'Like',
  [Operator.NotLike]: 'NotLike',
  [Operator.IsNull]: 'IsNull',
  [Operator.IsNotNull]: 'IsNotNull',
  [Operator.In]: 'In',
  [Operator.NotIn]: 'NotIn',
};

export function filtersTypeName(recordName: string): string {
  return `${recordName}Filters`;
}

export function updaterTypeName(recordName: string): string {
  return `${recordName}Updater`;
}

export function optionsTypeName(recordName: string): string {
  return `${recordName}Options`;
}

export function schemaConstName(recordName: string): string {
  return `${recordName}DbSchema`;
}

export function bodyKindFor(operator: Operator): BodyKind {
  switch (operator) {
    case Operator.IsNull:
    case Operator.IsNotNull:
      return BodyKind.Unary;
    case Operator.In:
    case Operator.NotIn:
      return BodyKind.Variadic;
    default:
      return BodyKind.Binary;
  }
}

/**
 * Filter predicate method for one field and operator
 * Throws SynthesisContractError when the field cannot be filtered with this operator
 */
export function createFilterMethod(recordName: string, field: ClassifiedField, operator: Operator): MethodSpec {
  assertFilterable(recordName, field, 'filter');
  if (!operatorsFor(field.category).includes(operator)) {
    throw new SynthesisContractError(
      `Operator ${operator} is not supported by ${recordName}.${field.name} (${field.category})`,
    );
  }

  const name = field.name + OPERATOR_SUFFIXES[operator];
  const receiver = filtersTypeName(recordName);
  const columnRef = `${schemaConstName(recordName)}.${field.name}`;
  const bodyKind = bodyKindFor(operator);

  switch (bodyKind) {
    case BodyKind.Unary:
      return {
        name,
        receiverExpr: receiver,
        parameterList: [],
        returnType: receiver,
        bodyKind,
        body: { template: 'filter', columnRef, operator, value: null },
        documentation: `${name} filters by ${field.name} ${operator === Operator.IsNull ? 'is null' : 'is not null'} check`,
      };

    case BodyKind.Variadic: {
      const parameter = toParameterName(field.name, true);
      return {
        name,
        receiverExpr: receiver,
        parameterList: [{ name: parameter, type: field.typeExpression, variadic: true }],
        returnType: receiver,
        bodyKind,
        body: { template: 'filter', columnRef, operator, value: parameter },
        documentation: `${name} filters by ${field.name} ${operator === Operator.In ? 'in' : 'not in'} list`,
      };
    }

    case BodyKind.Binary: {
      const parameter = toParameterName(field.name);
      return {
        name,
        receiverExpr: receiver,
        parameterList: [{ name: parameter, type: field.typeExpression, variadic: false }],
        returnType: receiver,
        bodyKind,
        body: { template: 'filter', columnRef, operator, value: parameter },
        documentation: `${name} filters by ${field.name} ${OPERATOR_SUFFIXES[operator].toLowerCase()}`,
      };
    }
  }
}

/**
 * Setter recording a new value for the field in the change set
 * Every field gets one, filterable or not
 */
export function createUpdaterMethod(recordName: string, field: ClassifiedField): MethodSpec {
  const name = `Set${field.name}`;
  const receiver = updaterTypeName(recordName);
  const parameter = toParameterName(field.name);

  return {
    name,
    receiverExpr: receiver,
    parameterList: [{ name: parameter, type: field.typeExpression, variadic: false }],
    returnType: receiver,
    bodyKind: BodyKind.Binary,
    body: { template: 'update', fieldName: field.name, value: parameter },
    documentation: `${name} sets the ${field.name} field for update`,
  };
}

export function createOrderMethod(recordName: string, field: ClassifiedField, direction: SortDirection): MethodSpec {
  assertFilterable(recordName, field, 'sort');

  const name = `OrderBy${field.name}${direction === SortDirection.Asc ? 'Asc' : 'Desc'}`;
  const receiver = optionsTypeName(recordName);

  return {
    name,
    receiverExpr: receiver,
    parameterList: [],
    returnType: receiver,
    bodyKind: BodyKind.Unary,
    body: { template: 'order', columnRef: `${schemaConstName(recordName)}.${field.name}`, direction },
    documentation: `${name} orders results by ${field.name} ${direction}`,
  };
}

function assertFilterable(recordName: string, field: ClassifiedField, purpose: 'filter' | 'sort'): void {
  if (!isFilterable(field.category)) {
    throw new SynthesisContractError(
      `Cannot synthesize ${purpose} methods for ${recordName}.${field.name}: ${field.category} fields are not filterable`,
    );
  }
}
