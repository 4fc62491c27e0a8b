import reservedWords from './reserved-words.json';

const RESERVED = new Set<string>([
  ...reservedWords.reserved,
  ...reservedWords.strict,
  ...reservedWords.contextual,
]);

export function isReservedWord(identifier: string): boolean {
  return RESERVED.has(identifier);
}

/**
 * Parameter identifier for a field: lower camel case, pluralised for variadic
 * parameters, suffixed with "Value" when the result is a reserved word
 */
export function toParameterName(fieldName: string, variadic = false): string {
  let name = fieldName.length === 0 ? 'value' : toLowerCamel(fieldName);
  if (variadic) {
    name += 's';
  }
  return isReservedWord(name) ? `${name}Value` : name;
}

/**
 * Lower-case the leading capital run, leaving the capital that starts the next word
 * Name -> name, ID -> id, URLPath -> urlPath, CategoryID -> categoryID
 */
export function toLowerCamel(name: string): string {
  let run = 0;
  while (run < name.length && isUpper(name[run])) {
    run++;
  }
  if (run === 0) {
    return name;
  }
  if (run > 1 && run < name.length && isLower(name[run])) {
    run--;
  }
  return name.slice(0, run).toLowerCase() + name.slice(run);
}

function isUpper(char: string): boolean {
  return char >= 'A' && char <= 'Z';
}

function isLower(char: string): boolean {
  return char >= 'a' && char <= 'z';
}
