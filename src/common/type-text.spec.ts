import { groupForPostfix, groupForUnion } from './type-text';

describe('groupForPostfix', () => {
  it.each([
    ['string', 'string'],
    ['Record<string, number>', 'Record<string, number>'],
    ['[number, number]', '[number, number]'],
    ['string | number', '(string | number)'],
    ['string & { brand: true }', '(string & { brand: true })'],
    ['() => void', '(() => void)'],
    ['keyof Product', '(keyof Product)'],
    ['T extends string ? 1 : 0', '(T extends string ? 1 : 0)'],
  ])('should render %s as %s', (input, expected) => {
    expect(groupForPostfix(input)).toBe(expected);
  });
});

describe('groupForUnion', () => {
  it.each([
    ['string', 'string'],
    ['string & { brand: true }', 'string & { brand: true }'],
    ['keyof Product', 'keyof Product'],
    ['() => void', '(() => void)'],
    ['new () => Product', '(new () => Product)'],
    ['T extends string ? 1 : 0', '(T extends string ? 1 : 0)'],
  ])('should render %s as %s', (input, expected) => {
    expect(groupForUnion(input)).toBe(expected);
  });
});
