import type { RawTypeShape } from '../common/types';
import { printTypeNode } from './type-expression';
import type { TypeNode } from './type-expression';

/**
 * A named type declared in the schema's types section
 * params is empty for non-generic declarations
 */
export interface TypeDeclaration {
  name: string;
  namespace: string | undefined;
  params: string[];
  definition: TypeNode;
}

const PRIMITIVES = new Map<string, { isString: boolean; isNumeric: boolean }>([
  ['string', { isString: true, isNumeric: false }],
  ['number', { isString: false, isNumeric: true }],
  ['bigint', { isString: false, isNumeric: true }],
  ['boolean', { isString: false, isNumeric: false }],
  ['unknown', { isString: false, isNumeric: false }],
  ['any', { isString: false, isNumeric: false }],
  ['object', { isString: false, isNumeric: false }],
  ['symbol', { isString: false, isNumeric: false }],
]);

const NULLISH = new Set(['null', 'undefined']);

// Namespaces that exist globally at runtime and are never imported
const GLOBAL_NAMESPACES = new Set(['Temporal', 'Intl']);

/**
 * Resolves parsed type expressions into raw shapes
 * Generic declarations are instantiated by substitution, so shapes are always concrete
 */
export class ShapeResolver {
  private readonly declarations = new Map<string, TypeDeclaration>();

  constructor(
    declarations: TypeDeclaration[],
    private readonly namespace: string,
  ) {
    for (const declaration of declarations) {
      this.declarations.set(this.declarationKey(declaration.namespace, declaration.name), declaration);
    }
  }

  resolve(node: TypeNode): RawTypeShape {
    return this.resolveNode(node, []);
  }

  private resolveNode(node: TypeNode, stack: string[]): RawTypeShape {
    switch (node.kind) {
      case 'literal':
      case 'opaque':
        return { kind: 'opaque', text: node.text };

      case 'object':
        return {
          kind: 'aggregate',
          members: node.members.map(member => ({ name: member.name, type: printTypeNode(member.type) })),
        };

      case 'array':
        return { kind: 'slice', element: this.resolveNode(node.element, stack) };

      case 'union':
        return this.resolveUnion(node.members, stack);

      case 'reference':
        return this.resolveReference(node.name, node.args, stack);
    }
  }

  /**
   * T | null and T | undefined mean a nullable reference to T
   */
  private resolveUnion(members: TypeNode[], stack: string[]): RawTypeShape {
    const rest = members.filter(member => !(member.kind === 'reference' && NULLISH.has(member.name)));
    if (rest.length === members.length || rest.length === 0) {
      return { kind: 'opaque', text: printTypeNode({ kind: 'union', members }) };
    }
    const element = rest.length === 1 ? rest[0] : { kind: 'union' as const, members: rest };
    return { kind: 'pointer', element: this.resolveNode(element, stack) };
  }

  private resolveReference(name: string, args: TypeNode[], stack: string[]): RawTypeShape {
    const primitive = PRIMITIVES.get(name);
    if (primitive && args.length === 0) {
      return { kind: 'primitive', name, ...primitive };
    }

    if (NULLISH.has(name)) {
      return { kind: 'opaque', text: name };
    }

    const container = this.resolveContainer(name, args, stack);
    if (container) {
      return container;
    }

    const { namespace, bareName } = splitTypeName(name, this.namespace);
    const key = this.declarationKey(namespace, bareName);
    const declaration = this.declarations.get(key);
    const typeArguments = args.map(arg => this.resolveNode(arg, stack));

    if (!declaration) {
      if (name === 'Date') {
        return { kind: 'named', name: 'Date', namespace: undefined, underlying: { kind: 'aggregate', members: [] }, typeArguments };
      }
      return { kind: 'named', name: bareName, namespace, underlying: { kind: 'opaque', text: name }, typeArguments };
    }

    if (declaration.params.length !== args.length) {
      throw new Error(`Type '${name}' expects ${declaration.params.length} type argument(s), got ${args.length}`);
    }

    // A declaration that refers to itself has no concrete underlying shape
    const underlying = stack.includes(key)
      ? { kind: 'opaque' as const, text: name }
      : this.resolveNode(substitute(declaration.definition, declaration.params, args), [...stack, key]);

    return { kind: 'named', name: bareName, namespace, underlying, typeArguments };
  }

  private resolveContainer(name: string, args: TypeNode[], stack: string[]): RawTypeShape | undefined {
    if ((name === 'Array' || name === 'ReadonlyArray' || name === 'Set') && args.length === 1) {
      const element = this.resolveNode(args[0], stack);
      return name === 'Array'
        ? { kind: 'slice', element }
        : { kind: 'slice', element, collection: name };
    }
    if ((name === 'Record' || name === 'Map') && args.length === 2) {
      const key = this.resolveNode(args[0], stack);
      const value = this.resolveNode(args[1], stack);
      return name === 'Record'
        ? { kind: 'map', key, value }
        : { kind: 'map', key, value, collection: 'Map' };
    }
    return undefined;
  }

  private declarationKey(namespace: string | undefined, name: string): string {
    return namespace === undefined || namespace === this.namespace ? name : `${namespace}.${name}`;
  }
}

/**
 * Split "ns.Name" into namespace and name; unqualified names live in the schema namespace
 */
export function splitTypeName(name: string, schemaNamespace: string): { namespace: string | undefined; bareName: string } {
  const dot = name.indexOf('.');
  if (dot === -1) {
    return { namespace: schemaNamespace, bareName: name };
  }
  const namespace = name.slice(0, dot);
  if (GLOBAL_NAMESPACES.has(namespace)) {
    return { namespace: undefined, bareName: name };
  }
  return { namespace, bareName: name.slice(dot + 1) };
}

function substitute(node: TypeNode, params: string[], args: TypeNode[]): TypeNode {
  if (params.length === 0) {
    return node;
  }
  switch (node.kind) {
    case 'reference': {
      const index = params.indexOf(node.name);
      if (index !== -1 && node.args.length === 0) {
        return args[index];
      }
      return { ...node, args: node.args.map(arg => substitute(arg, params, args)) };
    }
    case 'array':
      return { kind: 'array', element: substitute(node.element, params, args) };
    case 'union':
      return { kind: 'union', members: node.members.map(member => substitute(member, params, args)) };
    case 'object':
      return {
        kind: 'object',
        members: node.members.map(member => ({ name: member.name, type: substitute(member.type, params, args) })),
      };
    case 'literal':
    case 'opaque':
      return node;
  }
}
