/**
 * Parenthesisation of rendered type text
 * Rendered types are plain strings by the time they are combined, so precedence is read off the text
 */

const LOOSE_PREFIX = /^(keyof|typeof|unique|readonly|infer|new|asserts)\s/;

/**
 * Wrap a type that is about to take a [] suffix
 */
export function groupForPostfix(text: string): string {
  return /[|&]|=>|\sextends\s/.test(text) || LOOSE_PREFIX.test(text) ? `(${text})` : text;
}

/**
 * Wrap a type that is about to become a union member
 */
export function groupForUnion(text: string): string {
  return /=>|\sextends\s/.test(text) || /^new\s/.test(text) ? `(${text})` : text;
}
