// pattern: Functional Core

/**
 * Fold text for locale-aware containment: decompose, drop combining marks, lowercase.
 * "Depresión" and "DEPRESION" fold to the same string.
 */
export function foldForMatch(text: string, locale?: string): string {
  return text.normalize("NFD").replace(/\p{M}/gu, "").toLocaleLowerCase(locale);
}
