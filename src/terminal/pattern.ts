export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the regex used to search a session buffer. Searches always start at
 * the beginning of the buffer, so stateful flags (g, y) are dropped.
 */
export function compilePattern(pattern: string | RegExp, literal = false): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  return new RegExp(literal ? escapeRegExp(pattern) : pattern);
}
