/**
 * POSIX shell-style word splitting
 *
 * Follows POSIX shell quoting without expansion:
 * - space, tab, CR and LF separate words
 * - single quotes preserve everything up to the closing quote
 * - inside double quotes a backslash escapes only `"` and `\`
 * - outside quotes a backslash escapes the next character
 * - quoted and unquoted runs with no whitespace between them form one word
 *
 * Example: `1.2.3.4 - - "GET / HTTP/1.1"` → ['1.2.3.4', '-', '-', 'GET / HTTP/1.1']
 */

import { MalformedLineError } from '../errors';

const WHITESPACE = new Set([' ', '\t', '\r', '\n']);

type TokenizerState = 'between' | 'word' | 'single' | 'double';

/**
 * Splits text into shell-style words
 *
 * @throws MalformedLineError on an unterminated quote or a trailing lone backslash
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let state: TokenizerState = 'between';
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    switch (state) {
      case 'between':
      case 'word':
        if (WHITESPACE.has(char)) {
          if (state === 'word') {
            tokens.push(current);
            current = '';
            state = 'between';
          }
        } else if (char === "'") {
          state = 'single';
        } else if (char === '"') {
          state = 'double';
        } else if (char === '\\') {
          if (i + 1 >= text.length) {
            throw new MalformedLineError('No escaped character');
          }
          current += text[++i];
          state = 'word';
        } else {
          current += char;
          state = 'word';
        }
        break;

      case 'single':
        if (char === "'") {
          state = 'word';
        } else {
          current += char;
        }
        break;

      case 'double':
        if (char === '"') {
          state = 'word';
        } else if (char === '\\' && (text[i + 1] === '"' || text[i + 1] === '\\')) {
          current += text[++i];
        } else {
          current += char;
        }
        break;
    }
  }

  if (state === 'single' || state === 'double') {
    throw new MalformedLineError('No closing quotation');
  }
  if (state === 'word') {
    tokens.push(current);
  }

  return tokens;
}
