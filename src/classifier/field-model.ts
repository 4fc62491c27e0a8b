import { FieldCategory } from '../common/types';
import { Operator } from '../runtime/types';

const BASE_OPERATORS: readonly Operator[] = [Operator.Equal, Operator.NotEqual];

const ORDERED_OPERATORS: readonly Operator[] = [
  ...BASE_OPERATORS,
  Operator.LessThan,
  Operator.GreaterThan,
  Operator.LessOrEqual,
  Operator.GreaterOrEqual,
  Operator.In,
  Operator.NotIn,
];

/**
 * Operator set per category, in emission order
 * Pointers get nullability checks only, whatever they point to
 */
const OPERATORS: Record<FieldCategory, readonly Operator[]> = {
  [FieldCategory.String]: [
    ...BASE_OPERATORS,
    Operator.Like,
    Operator.NotLike,
    Operator.In,
    Operator.NotIn,
    Operator.LessThan,
    Operator.GreaterThan,
    Operator.LessOrEqual,
    Operator.GreaterOrEqual,
  ],
  [FieldCategory.Numeric]: ORDERED_OPERATORS,
  [FieldCategory.Time]: ORDERED_OPERATORS,
  [FieldCategory.Boolean]: BASE_OPERATORS,
  [FieldCategory.Pointer]: [...BASE_OPERATORS, Operator.IsNull, Operator.IsNotNull],
  [FieldCategory.Unknown]: BASE_OPERATORS,
  [FieldCategory.Slice]: [],
  [FieldCategory.Map]: [],
  [FieldCategory.Aggregate]: [],
};

const NON_FILTERABLE = new Set<FieldCategory>([FieldCategory.Slice, FieldCategory.Map, FieldCategory.Aggregate]);

export function isFilterable(category: FieldCategory): boolean {
  return !NON_FILTERABLE.has(category);
}

export function operatorsFor(category: FieldCategory): readonly Operator[] {
  return OPERATORS[category];
}

/**
 * Categories that yield filter and sort methods
 */
export function supportedCategories(): FieldCategory[] {
  return Object.values(FieldCategory).filter(category => isFilterable(category));
}

/**
 * Categories that only ever yield an update method
 */
export function unsupportedCategories(): FieldCategory[] {
  return Object.values(FieldCategory).filter(category => !isFilterable(category));
}
