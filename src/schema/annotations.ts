const ANNOTATIONS = ['gen:querybuilder', '@querybuilder', '+querybuilder'];

/**
 * True when any annotation marks the record for query builder generation
 * Comment markers are stripped and matching is case-insensitive
 */
export function hasQueryBuilderAnnotation(annotations: readonly string[] | undefined): boolean {
  if (!annotations) {
    return false;
  }
  return annotations.some(annotation => {
    const text = cleanAnnotation(annotation).toLowerCase();
    return text !== '' && ANNOTATIONS.some(marker => text.includes(marker));
  });
}

function cleanAnnotation(annotation: string): string {
  let text = annotation.trim();
  if (text.startsWith('//')) {
    text = text.slice(2);
  } else if (text.startsWith('/*')) {
    text = text.slice(2);
  }
  if (text.endsWith('*/')) {
    text = text.slice(0, -2);
  }
  return text.trim();
}
