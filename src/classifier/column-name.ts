/**
 * Default physical column name for a logical field name
 * snake_case that keeps initialisms together: CategoryID -> category_id, HTTPStatus -> http_status
 */
export function toColumnName(fieldName: string): string {
  let result = '';
  for (let i = 0; i < fieldName.length; i++) {
    const char = fieldName[i];
    if (isUpper(char) && i > 0) {
      const prev = fieldName[i - 1];
      const next = fieldName[i + 1];
      const startsWord = isLower(prev) || isDigit(prev) || (isUpper(prev) && next !== undefined && isLower(next));
      if (startsWord && prev !== '_') {
        result += '_';
      }
    }
    result += char.toLowerCase();
  }
  return result;
}

function isUpper(char: string): boolean {
  return char >= 'A' && char <= 'Z';
}

function isLower(char: string): boolean {
  return char >= 'a' && char <= 'z';
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}
