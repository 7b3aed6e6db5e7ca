/**
 * Shared utility functions
 */

/**
 * Format a `.env` line.
 *
 * @example
 * envLine('QDRANT_URL', 'http://qdrant-vectorstore:6333') // → 'QDRANT_URL="http://qdrant-vectorstore:6333"'
 */
export function envLine(key: string, value: string): string {
   return `${key}=${JSON.stringify(value)}`;
}

/**
 * Extract the key from a `KEY="value"` line. Returns undefined for anything that is not
 * a well-formed env line.
 */
export function envKey(line: string): string | undefined {
   const match = /^([A-Z][A-Z0-9_]*)="(?:[^"\\]|\\.)*"$/.exec(line);

   return match ? match[1] : undefined;
}

/**
 * Remove duplicates while keeping first-seen order.
 */
export function unique<T>(values: Iterable<T>): T[] {
   return [ ...new Set(values) ];
}

/**
 * Join fragment lines, dropping nothing. Code fragments are built as arrays of lines so
 * that indentation is explicit.
 */
export function lines(...parts: string[]): string {
   return parts.join('\n');
}

