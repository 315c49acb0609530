/**
 * Remove every whitespace character, for compact single-line logging of raw documents
 */
export function stripWhitespace(text: string): string {
  return text.replace(/\s+/g, '');
}
