import { Operator, SortDirection } from '../runtime/types';
import {
  filtersTypeName,
  optionsTypeName,
  schemaConstName,
  updaterTypeName,
} from '../synthesis/method-synthesizer';
import { BodyKind } from '../synthesis/method.types';
import type { MethodSpec, Parameter, RecordMethods } from '../synthesis/method.types';

export interface AssembleOptions {
  source: string;                    // shown in the generated header
  runtimeImport: string;             // module exporting Operator, Filter, ...
  modulePath?: string;               // module exporting same-namespace named types
  imports: Record<string, string>;   // namespace -> module for qualified named types
}

export interface AssembledFile {
  code: string;
  unresolvedReferences: string[];    // named types no import could be emitted for
}

const OPERATOR_MEMBERS: Record<Operator, string> = {
  [Operator.Equal]: 'Equal',
  [Operator.NotEqual]: 'NotEqual',
  [Operator.LessThan]: 'LessThan',
  [Operator.LessOrEqual]: 'LessOrEqual',
  [Operator.GreaterThan]: 'GreaterThan',
  [Operator.GreaterOrEqual]: 'GreaterOrEqual',
  [Operator.Like]: 'Like',
  [Operator.NotLike]: 'NotLike',
  [Operator.IsNull]: 'IsNull',
  [Operator.IsNotNull]: 'IsNotNull',
  [Operator.In]: 'In',
  [Operator.NotIn]: 'NotIn',
};

/**
 * Render synthesized records into one TypeScript module
 * Output is a pure function of the inputs
 */
export function assembleFile(records: readonly RecordMethods[], options: AssembleOptions): AssembledFile {
  const imports = buildImports(records, options);
  const usesSort = records.some(record => record.sortMethods.length > 0);

  const header = [
    `// Code generated by querysmith from ${options.source}. DO NOT EDIT.`,
    '',
    `import { Operator${usesSort ? ', SortDirection' : ''} } from ${quote(options.runtimeImport)};`,
    `import type { ChangeSet, EntityFilter, EntityUpdater, Filter, OptionSource, QueryOptions } from ${quote(options.runtimeImport)};`,
    ...imports.lines,
  ].join('\n');

  const body = records.map(record => buildRecord(record)).join('\n\n');

  return {
    code: `${header}\n\n${body}\n`,
    unresolvedReferences: imports.unresolved,
  };
}

/**
 * Import lines for named types used in signatures
 * Qualified names import their namespace, unqualified ones come from the model module
 */
function buildImports(records: readonly RecordMethods[], options: AssembleOptions): { lines: string[]; unresolved: string[] } {
  const references = new Set(records.flatMap(record => record.typeReferences));
  const localNames = new Set<string>();
  const namespaces = new Set<string>();
  const unresolved: string[] = [];

  for (const reference of references) {
    const dot = reference.indexOf('.');
    if (dot === -1) {
      if (options.modulePath) {
        localNames.add(reference);
      } else {
        unresolved.push(reference);
      }
      continue;
    }

    const namespace = reference.slice(0, dot);
    if (options.imports[namespace]) {
      namespaces.add(namespace);
    } else {
      unresolved.push(reference);
    }
  }

  const lines: string[] = [];
  if (localNames.size > 0 && options.modulePath) {
    lines.push(`import type { ${Array.from(localNames).sort().join(', ')} } from ${quote(options.modulePath)};`);
  }
  for (const namespace of Array.from(namespaces).sort()) {
    lines.push(`import type * as ${namespace} from ${quote(options.imports[namespace])};`);
  }

  return { lines, unresolved: unresolved.sort() };
}

function buildRecord(record: RecordMethods): string {
  return [
    buildSchema(record),
    buildFilters(record),
    buildUpdater(record),
    buildOptions(record),
  ].join('\n\n');
}

function buildSchema(record: RecordMethods): string {
  const name = schemaConstName(record.recordName);
  const entries = record.columns
    .map(column => `  ${column.logicalName}: ${quote(column.columnName)},`)
    .join('\n');

  return `/**
 * ${name} maps ${record.recordName} fields to database columns
 */
export const ${name} = {
${entries}
} as const;

export type ${name}Field = (typeof ${name})[keyof typeof ${name}];`;
}

function buildFilters(record: RecordMethods): string {
  const typeName = filtersTypeName(record.recordName);
  const fieldType = `${schemaConstName(record.recordName)}Field`;

  return `/**
 * ${typeName} provides filtering capabilities for ${record.recordName}
 */
export class ${typeName} implements EntityFilter {
  private readonly filters = new Map<${fieldType}, Filter[]>();

  listFilters(): Filter[] {
    return Array.from(this.filters.values()).flat();
  }

  private add(field: ${fieldType}, operator: Operator, value: unknown): this {
    const filters = this.filters.get(field) ?? [];
    filters.push({ field, operator, value });
    this.filters.set(field, filters);
    return this;
  }
${record.filterMethods.map(buildMethod).join('')}}`;
}

function buildUpdater(record: RecordMethods): string {
  const typeName = updaterTypeName(record.recordName);

  return `/**
 * ${typeName} provides update capabilities for ${record.recordName}
 */
export class ${typeName} implements EntityUpdater {
  private readonly fields: ChangeSet = {};

  getChangeSet(): ChangeSet {
    return this.fields;
  }
${record.updateMethods.map(buildMethod).join('')}}`;
}

function buildOptions(record: RecordMethods): string {
  const typeName = optionsTypeName(record.recordName);

  return `/**
 * ${typeName} provides query options for ${record.recordName}
 */
export class ${typeName} implements OptionSource {
  private readonly options: Array<(options: QueryOptions) => void> = [];

  apply(options: QueryOptions): void {
    for (const option of this.options) {
      option(options);
    }
  }
${record.sortMethods.map(buildMethod).join('')}}`;
}

function buildMethod(method: MethodSpec): string {
  const parameters = method.parameterList.map(buildParameter).join(', ');

  return `
  /**
   * ${method.documentation}
   */
  ${method.name}(${parameters}): ${method.returnType} {
${buildBody(method).map(line => `    ${line}`).join('\n')}
  }
`;
}

export function buildParameter(parameter: Parameter): string {
  if (!parameter.variadic) {
    return `${parameter.name}: ${parameter.type}`;
  }
  const element = /[|&]/.test(parameter.type) ? `(${parameter.type})` : parameter.type;
  return `...${parameter.name}: ${element}[]`;
}

/**
 * Body lines for a method, one template per body kind
 */
export function buildBody(method: MethodSpec): string[] {
  const body = method.body;
  switch (body.template) {
    case 'filter': {
      const value = method.bodyKind === BodyKind.Unary || body.value === null ? 'null' : body.value;
      return [`return this.add(${body.columnRef}, Operator.${OPERATOR_MEMBERS[body.operator]}, ${value});`];
    }

    case 'update':
      return [
        `this.fields[${quote(body.fieldName)}] = ${body.value};`,
        'return this;',
      ];

    case 'order':
      return [
        'this.options.push((options) => {',
        `  options.sortFields.push({ field: ${body.columnRef}, direction: SortDirection.${body.direction === SortDirection.Asc ? 'Asc' : 'Desc'} });`,
        '});',
        'return this;',
      ];
  }
}

/**
 * Single-quoted string literal
 */
function quote(text: string): string {
  return `'${text.replace(/[\\']/g, '\\$&').replace(/\n/g, '\\n').replace(/\r/g, '\\r')}'`;
}
