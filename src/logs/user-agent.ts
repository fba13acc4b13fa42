/**
 * User-Agent scanner
 *
 * Accepts `(product)* (comment)*` in the loose form real clients send:
 *
 *   Opera/9.80 (Windows NT 5.1; U; MRA 5.6 (build 03278); ru) Presto/2.6.30 Version/10.63
 *
 * A product token is any whitespace-delimited word without the characters
 * `(),:;<=>?@{}`. `/` separates product from version and `[`/`]` show up in
 * locale tags such as `[en]`, so both are allowed. A comment is a nestable
 * parenthesized run whose parentheses may sit anywhere inside a word.
 */

import { FieldResult } from '../types';

const PRODUCT_DISALLOWED = new Set(['(', ')', ',', ':', ';', '<', '=', '>', '?', '@', '{', '}']);

type TokenKind = 'none' | 'product' | 'comment';

/**
 * Validates a User-Agent header value
 *
 * @returns The agent string unchanged
 */
export function validateUserAgent(agent: string): FieldResult<string> {
  const tokens = agent.split(/\s+/).filter(token => token.length > 0);
  let lastKind: TokenKind = 'none';
  let depth = 0;

  for (const token of tokens) {
    // The first word is always read as a product
    const expectProduct =
      lastKind === 'none' ||
      ((lastKind === 'product' || (lastKind === 'comment' && depth === 0)) && !token.startsWith('('));

    if (expectProduct) {
      for (const char of token) {
        if (PRODUCT_DISALLOWED.has(char)) {
          return {
            success: false,
            reason: 'agent-invalid',
            message: `Invalid character '${char}' in product token: ${token}`,
          };
        }
      }
      lastKind = 'product';
      continue;
    }

    for (const char of token) {
      if (char === '(') {
        depth++;
        lastKind = 'comment';
      } else if (char === ')') {
        if (depth === 0) {
          return {
            success: false,
            reason: 'agent-invalid',
            message: `Comment closed without being opened in: ${token}`,
          };
        }
        depth--;
        lastKind = 'comment';
      }
    }
  }

  if (depth !== 0) {
    return { success: false, reason: 'agent-invalid', message: `Unclosed comment in: ${agent}` };
  }

  return { success: true, value: agent };
}
