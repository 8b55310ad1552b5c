/**
 * Command-line tokenizer
 *
 * Splits command text into an argv the way a POSIX shell splits words,
 * and nothing more: quotes and backslash escapes are honoured, but there is
 * no variable expansion, globbing, redirection or command substitution.
 * Operators such as `|` or `&&` come through as ordinary characters; the
 * policy engine rejects them.
 */

import { RequestParseError } from './errors.js';

const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', '\\', '$', '`']);

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && i + 1 < text.length && DOUBLE_QUOTE_ESCAPABLE.has(text[i + 1])) {
        current += text[i + 1];
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
      continue;
    }

    if (ch === '\\') {
      if (i + 1 >= text.length) {
        throw new RequestParseError('Command ends with a dangling escape character');
      }
      current += text[i + 1];
      inToken = true;
      i++;
      continue;
    }

    // Newlines stay inside the token so the policy engine still sees them.
    if (ch === ' ' || ch === '\t') {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (quote) {
    throw new RequestParseError(`Unterminated ${quote === '"' ? 'double' : 'single'} quote in command`);
  }
  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Render an argv for display, quoting tokens that would otherwise be
 * ambiguous when read back.
 */
export function formatArgv(argv: readonly string[]): string {
  return argv
    .map((token) => (token === '' || /[\s'"\\]/.test(token) ? `'${token.replace(/'/g, `'\\''`)}'` : token))
    .join(' ');
}
