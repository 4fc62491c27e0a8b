import {
  COLUMN_SETTING,
  EXCLUDE_SETTING,
  FieldCategory,
} from '../common/types';
import type {
  ClassifiedField,
  NamedShape,
  RawFieldShape,
  RawTypeShape,
} from '../common/types';
import { groupForPostfix, groupForUnion } from '../common/type-text';
import { toColumnName } from './column-name';
import type { TimePattern, TimePatternTable } from './time-patterns';

/**
 * Everything learned about a type while descending into it
 * Flags are resolved into one category only at the end
 */
interface TypeFacts {
  displayTypeName: string;
  typeExpression: string;
  isString: boolean;
  isNumeric: boolean;
  isTime: boolean;
  isOrderableTime: boolean;
  isSlice: boolean;
  isMap: boolean;
  isAggregate: boolean;
  isPointer: boolean;
  pointed?: TypeFacts;
  isGenericInstantiation: boolean;
  typeArguments: string[];
  typeReferences: string[];
}

interface ClassifierContext {
  patterns: TimePatternTable;
  namespace: string;
}

/**
 * Classify a raw field into a semantic category
 * Returns undefined when the field carries the exclusion marker; never throws otherwise
 *
 * @param namespace logical namespace of the schema the field belongs to, used to decide
 *   whether named types are written qualified
 */
export function classify(
  field: RawFieldShape,
  patterns: TimePatternTable,
  namespace = '',
): ClassifiedField | undefined {
  if (isExcluded(field)) {
    return undefined;
  }

  const facts = describe(field.type, { patterns, namespace });
  const category = resolveCategory(facts);

  return {
    name: field.name,
    columnName: field.settings[COLUMN_SETTING] || toColumnName(field.name),
    displayTypeName: facts.displayTypeName,
    typeExpression: facts.typeExpression,
    category,
    isOrderableTime: category === FieldCategory.Time && facts.isOrderableTime,
    isPointer: category === FieldCategory.Pointer,
    pointedCategory: category === FieldCategory.Pointer && facts.pointed ? resolveCategory(facts.pointed) : undefined,
    isGenericInstantiation: facts.isGenericInstantiation,
    typeArguments: facts.typeArguments,
    typeReferences: unique(facts.typeReferences),
  };
}

export function isExcluded(field: RawFieldShape): boolean {
  return Boolean(field.settings[EXCLUDE_SETTING]);
}

/**
 * Category priority, highest first:
 * time > slice/map > aggregate > pointer > string/numeric > bool name heuristic > unknown
 */
function resolveCategory(facts: TypeFacts): FieldCategory {
  if (facts.isTime) {
    return FieldCategory.Time;
  }
  if (facts.isSlice) {
    return FieldCategory.Slice;
  }
  if (facts.isMap) {
    return FieldCategory.Map;
  }
  if (facts.isAggregate) {
    return FieldCategory.Aggregate;
  }
  if (facts.isPointer) {
    return FieldCategory.Pointer;
  }
  if (facts.isString) {
    return FieldCategory.String;
  }
  if (facts.isNumeric) {
    return FieldCategory.Numeric;
  }
  if (facts.displayTypeName.toLowerCase().includes('bool')) {
    return FieldCategory.Boolean;
  }
  return FieldCategory.Unknown;
}

/**
 * Describe a shape, giving an exact time-pattern match on its display name the last word
 */
function describe(shape: RawTypeShape, context: ClassifierContext): TypeFacts {
  const facts = describeShape(shape, context);
  const pattern = context.patterns.match(facts.displayTypeName);
  return pattern ? asTime(blank(facts.displayTypeName, facts.typeExpression, facts.typeReferences), pattern) : facts;
}

function describeShape(shape: RawTypeShape, context: ClassifierContext): TypeFacts {
  switch (shape.kind) {
    case 'primitive':
      return {
        ...blank(shape.name, shape.name, []),
        isString: shape.isString,
        isNumeric: shape.isNumeric,
      };

    case 'pointer': {
      // Exactly one level: a pointer-to-pointer keeps the inner pointer as its pointee
      const pointed = describe(shape.element, context);
      const typeExpression = pointed.isPointer ? pointed.typeExpression : `${groupForUnion(pointed.typeExpression)} | null`;
      return {
        ...blank(`*${pointed.displayTypeName}`, typeExpression, pointed.typeReferences),
        isPointer: true,
        pointed,
      };
    }

    case 'slice': {
      // Element is described for rendering only; containers are never filterable
      const element = describe(shape.element, context);
      return {
        ...blank(
          sliceName(element.displayTypeName, shape.collection),
          sliceName(element.typeExpression, shape.collection),
          element.typeReferences,
        ),
        isSlice: true,
      };
    }

    case 'map': {
      const key = describe(shape.key, context);
      const value = describe(shape.value, context);
      const container = shape.collection ?? 'Record';
      return {
        ...blank(
          `${container}<${key.displayTypeName}, ${value.displayTypeName}>`,
          `${container}<${key.typeExpression}, ${value.typeExpression}>`,
          [...key.typeReferences, ...value.typeReferences],
        ),
        isMap: true,
      };
    }

    case 'aggregate': {
      const text = shape.members.length === 0
        ? '{}'
        : `{ ${shape.members.map(member => `${member.name}: ${member.type}`).join('; ')} }`;
      return { ...blank(text, text, []), isAggregate: true };
    }

    case 'named':
      return describeNamed(shape, context);

    case 'opaque':
      return blank(shape.text, shape.text, []);
  }
}

/**
 * Named types take the behaviour of their underlying shape under their own name
 * A named type matching a time pattern is an opaque time value, even when record-shaped
 * Only type arguments written on this name make it a generic instantiation; an alias of one is not
 */
function describeNamed(shape: NamedShape, context: ClassifierContext): TypeFacts {
  const underlying = describe(shape.underlying, context);
  const baseName = qualifiedName(shape, context.namespace);

  let facts: TypeFacts = {
    ...underlying,
    displayTypeName: baseName,
    typeExpression: baseName,
    typeReferences: shape.namespace === undefined ? [] : [baseName],
    isGenericInstantiation: false,
    typeArguments: [],
  };

  const pattern = context.patterns.match(baseName);
  if (pattern) {
    facts = asTime(facts, pattern);
  }

  if (shape.typeArguments.length > 0) {
    const args = shape.typeArguments.map(argument => describe(argument, context));
    facts = {
      ...facts,
      displayTypeName: `${baseName}<${args.map(arg => arg.displayTypeName).join(', ')}>`,
      typeExpression: `${baseName}<${args.map(arg => arg.typeExpression).join(', ')}>`,
      isGenericInstantiation: true,
      typeArguments: args.map(arg => arg.displayTypeName),
      typeReferences: [...facts.typeReferences, ...args.flatMap(arg => arg.typeReferences)],
    };
  }

  return facts;
}

/**
 * Unqualified for globals and for types declared in the consuming namespace
 */
function qualifiedName(shape: NamedShape, namespace: string): string {
  if (shape.namespace === undefined || shape.namespace === namespace) {
    return shape.name;
  }
  return `${shape.namespace}.${shape.name}`;
}

function asTime(facts: TypeFacts, pattern: TimePattern): TypeFacts {
  return {
    ...facts,
    isTime: true,
    isOrderableTime: pattern.isOrderable,
    isAggregate: false,
  };
}

function sliceName(element: string, collection: 'Set' | 'ReadonlyArray' | undefined): string {
  if (collection === 'Set') {
    return `Set<${element}>`;
  }
  const wrapped = groupForPostfix(element);
  return collection === 'ReadonlyArray' ? `readonly ${wrapped}[]` : `${wrapped}[]`;
}

function blank(displayTypeName: string, typeExpression: string, typeReferences: string[]): TypeFacts {
  return {
    displayTypeName,
    typeExpression,
    isString: false,
    isNumeric: false,
    isTime: false,
    isOrderableTime: false,
    isSlice: false,
    isMap: false,
    isAggregate: false,
    isPointer: false,
    isGenericInstantiation: false,
    typeArguments: [],
    typeReferences,
  };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
