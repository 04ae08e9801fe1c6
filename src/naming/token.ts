// Token grammar shared by node names and namespace segments

import { NameError } from './errors.js';
import { TOKEN_PATTERN, type NameResult } from './types.js';

/**
 * Validate a single token against the naming grammar.
 *
 * Non-empty, first character a letter or underscore, every later character
 * a letter, digit or underscore. Failures carry kind `InvalidName`; callers
 * re-tag them for their own context.
 */
export function validateToken(token: string): NameResult<string> {
  if (token.length === 0) {
    return { valid: false, error: new NameError('InvalidName', { value: token, reason: 'empty' }) };
  }

  const first = token.charCodeAt(0);
  if (isDigit(first)) {
    return {
      valid: false,
      error: new NameError('InvalidName', { value: token, reason: 'starts-with-number', index: 0 }),
    };
  }

  for (let i = 0; i < token.length; i++) {
    const code = token.charCodeAt(i);
    if (!isAlpha(code) && !isDigit(code) && code !== UNDERSCORE) {
      return {
        valid: false,
        error: new NameError('InvalidName', { value: token, reason: 'invalid-character', index: i }),
      };
    }
  }

  return { valid: true, value: token };
}

/**
 * Boolean form of validateToken.
 */
export function isValidToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

const UNDERSCORE = 0x5f;

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

function isAlpha(code: number): boolean {
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}
