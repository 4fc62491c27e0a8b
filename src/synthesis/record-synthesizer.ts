import type { ClassifiedRecord } from '../common/types';
import { isFilterable, operatorsFor } from '../classifier/field-model';
import { SortDirection } from '../runtime/types';
import { createFilterMethod, createOrderMethod, createUpdaterMethod } from './method-synthesizer';
import type { MethodSpec, RecordMethods } from './method.types';

/**
 * Synthesize every method of a record, preserving field order
 * Filter and sort methods only for filterable fields, an updater for every field
 */
export function synthesizeRecord(record: ClassifiedRecord): RecordMethods {
  const filterMethods: MethodSpec[] = [];
  const updateMethods: MethodSpec[] = [];
  const sortMethods: MethodSpec[] = [];

  for (const field of record.fields) {
    if (isFilterable(field.category)) {
      for (const operator of operatorsFor(field.category)) {
        filterMethods.push(createFilterMethod(record.name, field, operator));
      }
      sortMethods.push(
        createOrderMethod(record.name, field, SortDirection.Asc),
        createOrderMethod(record.name, field, SortDirection.Desc),
      );
    }
    updateMethods.push(createUpdaterMethod(record.name, field));
  }

  return {
    recordName: record.name,
    filterMethods,
    updateMethods,
    sortMethods,
    columns: record.fields.map(field => ({ logicalName: field.name, columnName: field.columnName })),
    typeReferences: Array.from(new Set(record.fields.flatMap(field => field.typeReferences))),
  };
}
