import * as ts from 'typescript';
import { groupForPostfix, groupForUnion } from '../common/type-text';

/**
 * Type expressions as written in schema files, parsed by the TypeScript parser
 * Only the forms the shape resolver understands get their own node; everything else is opaque text
 */
export type TypeNode =
  | { kind: 'reference'; name: string; args: TypeNode[] }
  | { kind: 'array'; element: TypeNode }
  | { kind: 'union'; members: TypeNode[] }
  | { kind: 'object'; members: Array<{ name: string; type: TypeNode }> }
  | { kind: 'literal'; text: string }
  | { kind: 'opaque'; text: string };

const ALIAS_NAME = '__SchemaType';

// Keywords that name a type; void, never and this stay opaque
const KEYWORD_TYPES = new Map<ts.SyntaxKind, string>([
  [ts.SyntaxKind.StringKeyword, 'string'],
  [ts.SyntaxKind.NumberKeyword, 'number'],
  [ts.SyntaxKind.BigIntKeyword, 'bigint'],
  [ts.SyntaxKind.BooleanKeyword, 'boolean'],
  [ts.SyntaxKind.UnknownKeyword, 'unknown'],
  [ts.SyntaxKind.AnyKeyword, 'any'],
  [ts.SyntaxKind.ObjectKeyword, 'object'],
  [ts.SyntaxKind.SymbolKeyword, 'symbol'],
  [ts.SyntaxKind.UndefinedKeyword, 'undefined'],
]);

export class TypeExpressionError extends Error {
  constructor(expression: string, detail: string) {
    super(`Invalid type expression '${expression}': ${detail}`);
    this.name = 'TypeExpressionError';
  }
}

export function parseTypeExpression(expression: string): TypeNode {
  if (expression.trim() === '') {
    throw new TypeExpressionError(expression, 'empty expression');
  }

  const source = `type ${ALIAS_NAME} = ${expression};`;
  const { diagnostics = [] } = ts.transpileModule(source, { reportDiagnostics: true });
  if (diagnostics.length > 0) {
    throw new TypeExpressionError(expression, ts.flattenDiagnosticMessageText(diagnostics[0].messageText, '\n'));
  }

  const sourceFile = ts.createSourceFile(`${ALIAS_NAME}.ts`, source, ts.ScriptTarget.Latest, true);
  const [statement, ...rest] = sourceFile.statements;
  if (!statement || rest.length > 0 || !ts.isTypeAliasDeclaration(statement)) {
    throw new TypeExpressionError(expression, 'expected a single type');
  }

  return toTypeNode(statement.type, sourceFile);
}

/**
 * Render a node back to source text, normalising whitespace
 */
export function printTypeNode(node: TypeNode): string {
  switch (node.kind) {
    case 'reference':
      return node.args.length === 0 ? node.name : `${node.name}<${node.args.map(printTypeNode).join(', ')}>`;
    case 'array':
      return `${groupForPostfix(printTypeNode(node.element))}[]`;
    case 'union':
      return node.members.map(member => groupForUnion(printTypeNode(member))).join(' | ');
    case 'object':
      return node.members.length === 0
        ? '{}'
        : `{ ${node.members.map(member => `${member.name}: ${printTypeNode(member.type)}`).join('; ')} }`;
    case 'literal':
    case 'opaque':
      return node.text;
  }
}

function toTypeNode(node: ts.TypeNode, sourceFile: ts.SourceFile): TypeNode {
  if (ts.isParenthesizedTypeNode(node)) {
    return toTypeNode(node.type, sourceFile);
  }

  const keyword = KEYWORD_TYPES.get(node.kind);
  if (keyword) {
    return { kind: 'reference', name: keyword, args: [] };
  }

  if (ts.isTypeReferenceNode(node)) {
    return {
      kind: 'reference',
      name: entityName(node.typeName),
      args: (node.typeArguments ?? []).map(arg => toTypeNode(arg, sourceFile)),
    };
  }

  if (ts.isArrayTypeNode(node)) {
    return { kind: 'array', element: toTypeNode(node.elementType, sourceFile) };
  }

  // readonly T[] is ReadonlyArray<T>
  if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword && ts.isArrayTypeNode(node.type)) {
    return { kind: 'reference', name: 'ReadonlyArray', args: [toTypeNode(node.type.elementType, sourceFile)] };
  }

  if (ts.isUnionTypeNode(node)) {
    return { kind: 'union', members: node.types.map(member => toTypeNode(member, sourceFile)) };
  }

  if (ts.isLiteralTypeNode(node)) {
    if (node.literal.kind === ts.SyntaxKind.NullKeyword) {
      return { kind: 'reference', name: 'null', args: [] };
    }
    return { kind: 'literal', text: node.literal.getText(sourceFile) };
  }

  if (ts.isTypeLiteralNode(node)) {
    const object = toObjectNode(node, sourceFile);
    if (object) {
      return object;
    }
  }

  return { kind: 'opaque', text: normalize(node.getText(sourceFile)) };
}

/**
 * Property signatures only; methods, index signatures and untyped members make the literal opaque
 */
function toObjectNode(node: ts.TypeLiteralNode, sourceFile: ts.SourceFile): TypeNode | undefined {
  const members: Array<{ name: string; type: TypeNode }> = [];

  for (const member of node.members) {
    if (!ts.isPropertySignature(member) || !member.type) {
      return undefined;
    }
    const name = ts.isIdentifier(member.name) ? member.name.text : member.name.getText(sourceFile);
    const isReadonly = member.modifiers?.some(modifier => modifier.kind === ts.SyntaxKind.ReadonlyKeyword) ?? false;
    members.push({
      name: `${isReadonly ? 'readonly ' : ''}${name}${member.questionToken ? '?' : ''}`,
      type: toTypeNode(member.type, sourceFile),
    });
  }

  return { kind: 'object', members };
}

function entityName(name: ts.EntityName): string {
  return ts.isIdentifier(name) ? name.text : `${entityName(name.left)}.${name.right.text}`;
}

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
