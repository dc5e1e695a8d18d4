// pattern: Functional Core

/**
 * Shorten a secret for display: the first four characters and the length,
 * or only the length for short values
 */
export function maskToken(token: string): string {
  if (token.length < 8) {
    return `(${token.length} chars)`;
  }
  return `${token.slice(0, 4)}…(${token.length} chars)`;
}
