// src/lexer/lexerErrors.ts
import { InvalidSourceError, formatLocation } from '../errors/errors.ts';
import type { Token } from './index.ts';

// 代表ケース: どのトークンにもマッチしない文字列
export function failInvalidToken(token: Token): never {
  const loc = formatLocation(token.line, token.column);
  const msg = loc
    ? `Invalid source: unexpected character sequence '${token.text}' at ${loc}.`
    : `Invalid source: unexpected character sequence '${token.text}'.`;
  throw new InvalidSourceError(msg, token.line, token.column, token.text);
}
