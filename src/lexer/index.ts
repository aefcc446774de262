// src/lexer/index.ts
// 公開API: Zig ソースを minifier 用のトークン列へ変換します。
// 字句エラーは例外にせず Invalid トークンとして位置順に流し、扱いは呼び出し側（emitter）に任せる。

import { Lexer } from 'chevrotain';
import type { IToken, ILexingError } from 'chevrotain';
import { allTokens, categoryByTokenType } from './tokens.ts';
import type { Category } from './categories.ts';

export interface Span {
  start: number; // 含む
  end: number; // 含まない
}

export interface Token {
  readonly category: Category;
  readonly span: Span;
  readonly text: string;
  readonly line?: number;
  readonly column?: number;
}

// emitter が要求する契約。末尾では Eof を返し続ける。
export interface TokenSource {
  next(): Token;
}

const lexer = new Lexer(allTokens);

function fromLexedToken(token: IToken): Token {
  const category = categoryByTokenType.get(token.tokenType);
  if (category === undefined) {
    // allTokens に追加したのに categoryByTokenType を更新し忘れた場合のみ到達
    throw new Error(`No category registered for token type '${token.tokenType.name}'`);
  }
  return {
    category,
    span: { start: token.startOffset, end: token.startOffset + token.image.length },
    text: token.image,
    line: token.startLine,
    column: token.startColumn,
  };
}

function fromLexingError(source: string, error: ILexingError): Token {
  const end = error.offset + error.length;
  return {
    category: 'Invalid',
    span: { start: error.offset, end },
    text: source.slice(error.offset, end),
    line: error.line,
    column: error.column,
  };
}

// Chevrotain はエラー箇所を読み飛ばして字句解析を続けるため、
// 成功トークンとエラーをオフセット順にマージして1本の列にする。
export function tokenize(source: string): Token[] {
  const lexResult = lexer.tokenize(source);
  const tokens = lexResult.tokens.map(fromLexedToken);
  const invalid = lexResult.errors.map((e) => fromLexingError(source, e));
  const merged = invalid.length === 0
    ? tokens
    : [...tokens, ...invalid].sort((a, b) => a.span.start - b.span.start);
  const eof: Token = {
    category: 'Eof',
    span: { start: source.length, end: source.length },
    text: '',
  };
  return [...merged, eof];
}

export class TokenStream implements TokenSource {
  private readonly tokens: Token[];
  private readonly eof: Token;
  private index = 0;

  constructor(public readonly source: string) {
    this.tokens = tokenize(source);
    this.eof = { category: 'Eof', span: { start: source.length, end: source.length }, text: '' };
  }

  next(): Token {
    const token = this.tokens[this.index] ?? this.eof;
    if (token.category !== 'Eof') this.index++;
    return token;
  }
}

export { allTokens, categoryByTokenType, categoriesOf } from './tokens.ts';
export type { Category, KeywordCategory } from './categories.ts';
export { keywordCategory } from './categories.ts';
