import { parse } from 'shell-quote';

/**
 * Split free-form extra arguments the way a shell would.
 * Operators, globs and comments are not arguments aria2c understands, so
 * any of them (or a tokenizer failure) drops back to whitespace splitting.
 */
export function tokenizeArgs(input: string): string[] {
  const trimmed = input.trim();
  if (!trimmed) return [];

  try {
    // Keep $VARS literal instead of expanding them from the environment
    const entries = parse(trimmed, (key) => `$${key}`);
    const tokens: string[] = [];
    for (const entry of entries) {
      if (typeof entry !== 'string') {
        return splitOnWhitespace(trimmed);
      }
      tokens.push(entry);
    }
    return tokens;
  } catch {
    return splitOnWhitespace(trimmed);
  }
}

function splitOnWhitespace(input: string): string[] {
  return input.split(/\s+/).filter(Boolean);
}
