import { isReservedWord, toLowerCamel, toParameterName } from './identifiers';

describe('identifiers', () => {
  describe('toLowerCamel', () => {
    it.each([
      ['Name', 'name'],
      ['ID', 'id'],
      ['URLPath', 'urlPath'],
      ['CategoryID', 'categoryID'],
      ['price', 'price'],
      ['X', 'x'],
    ])('should convert %s to %s', (input, expected) => {
      expect(toLowerCamel(input)).toBe(expected);
    });
  });

  describe('toParameterName', () => {
    it('should lower the leading capital', () => {
      expect(toParameterName('Name')).toBe('name');
    });

    it('should pluralise variadic parameters', () => {
      expect(toParameterName('ID', true)).toBe('ids');
      expect(toParameterName('Tag', true)).toBe('tags');
    });

    it('should suffix reserved words', () => {
      expect(toParameterName('Type')).toBe('typeValue');
      expect(toParameterName('Default')).toBe('defaultValue');
      expect(toParameterName('Interface')).toBe('interfaceValue');
    });

    it('should check reserved words after pluralising', () => {
      expect(toParameterName('Type', true)).toBe('types');
    });

    it('should name empty fields "value"', () => {
      expect(toParameterName('')).toBe('value');
    });
  });

  describe('isReservedWord', () => {
    it('should know keywords and contextual type keywords', () => {
      expect(isReservedWord('class')).toBe(true);
      expect(isReservedWord('let')).toBe(true);
      expect(isReservedWord('string')).toBe(true);
      expect(isReservedWord('name')).toBe(false);
    });
  });
});
