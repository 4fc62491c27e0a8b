import { parseTypeExpression, printTypeNode, TypeExpressionError } from './type-expression';

describe('parseTypeExpression', () => {
  it('should parse plain and dotted references', () => {
    expect(parseTypeExpression('string')).toEqual({ kind: 'reference', name: 'string', args: [] });
    expect(parseTypeExpression('luxon.DateTime')).toEqual({ kind: 'reference', name: 'luxon.DateTime', args: [] });
  });

  it('should parse generic arguments', () => {
    expect(parseTypeExpression('Record<string, number>')).toEqual({
      kind: 'reference',
      name: 'Record',
      args: [
        { kind: 'reference', name: 'string', args: [] },
        { kind: 'reference', name: 'number', args: [] },
      ],
    });
  });

  it('should parse array suffixes', () => {
    expect(parseTypeExpression('string[][]')).toEqual({
      kind: 'array',
      element: { kind: 'array', element: { kind: 'reference', name: 'string', args: [] } },
    });
  });

  it('should parse nullable unions', () => {
    expect(parseTypeExpression('Date | null')).toEqual({
      kind: 'union',
      members: [
        { kind: 'reference', name: 'Date', args: [] },
        { kind: 'reference', name: 'null', args: [] },
      ],
    });
  });

  it('should parse object literals with optional members', () => {
    expect(parseTypeExpression('{ width: number; height?: number }')).toEqual({
      kind: 'object',
      members: [
        { name: 'width', type: { kind: 'reference', name: 'number', args: [] } },
        { name: 'height?', type: { kind: 'reference', name: 'number', args: [] } },
      ],
    });
  });

  it('should parse string and number literals', () => {
    expect(parseTypeExpression("'draft'")).toEqual({ kind: 'literal', text: "'draft'" });
    expect(parseTypeExpression('42')).toEqual({ kind: 'literal', text: '42' });
  });

  it('should read booleans and negative numbers as literals', () => {
    expect(parseTypeExpression('true')).toEqual({ kind: 'literal', text: 'true' });
    expect(parseTypeExpression('-1')).toEqual({ kind: 'literal', text: '-1' });
  });

  it('should read readonly arrays as ReadonlyArray references', () => {
    expect(parseTypeExpression('readonly string[]')).toEqual({
      kind: 'reference',
      name: 'ReadonlyArray',
      args: [{ kind: 'reference', name: 'string', args: [] }],
    });
  });

  it('should drop parentheses', () => {
    expect(parseTypeExpression('(string)')).toEqual({ kind: 'reference', name: 'string', args: [] });
  });

  it.each([
    ['[number, number]', '[number, number]'],
    ['() => void', '() => void'],
    ['string & { brand: true }', 'string & { brand: true }'],
    ['keyof Foo', 'keyof Foo'],
    ['void', 'void'],
    ['{ [key: string]: number }', '{ [key: string]: number }'],
    ['`sku-${number}`', '`sku-${number}`'],
  ])('should keep %s as opaque text', (input, text) => {
    expect(parseTypeExpression(input)).toEqual({ kind: 'opaque', text });
  });

  it('should collapse whitespace in opaque text', () => {
    expect(parseTypeExpression('(a: string,\n   b: number) =>   void')).toEqual({
      kind: 'opaque',
      text: '(a: string, b: number) => void',
    });
  });

  it('should reject empty expressions', () => {
    expect(() => parseTypeExpression('  ')).toThrow(new TypeExpressionError('  ', 'empty expression'));
  });

  it('should reject unterminated generics', () => {
    expect(() => parseTypeExpression('Array<')).toThrow(TypeExpressionError);
    expect(() => parseTypeExpression('Array<')).toThrow("Invalid type expression 'Array<': ");
  });

  it('should reject trailing statements', () => {
    expect(() => parseTypeExpression('string; type Other = number')).toThrow(
      "Invalid type expression 'string; type Other = number': expected a single type",
    );
  });

  it('should reject text that is not a type', () => {
    expect(() => parseTypeExpression('string string')).toThrow(TypeExpressionError);
  });
});

describe('printTypeNode', () => {
  it.each([
    ['string', 'string'],
    ['(string | number)[]', '(string | number)[]'],
    ['Map<string,number>', 'Map<string, number>'],
    ["| 'a' | 'b'", "'a' | 'b'"],
    ['{a:string,b:number}', '{ a: string; b: number }'],
    ['{}', '{}'],
    ['(() => void)[]', '(() => void)[]'],
    ['(() => void) | null', '(() => void) | null'],
    ['(keyof Foo)[]', '(keyof Foo)[]'],
  ])('should print %s as %s', (input, expected) => {
    expect(printTypeNode(parseTypeExpression(input))).toBe(expected);
  });
});
