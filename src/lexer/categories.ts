// src/lexer/categories.ts
import { createToken, Lexer } from 'chevrotain';

// すべてのトークンの基底カテゴリ。
// Chevrotainのカテゴリは実行時のフィルタリング用途で、Lexerの allTokens には含めません。
export const Token = createToken({ name: 'Token', pattern: Lexer.NA });

// 空白なしで隣接させると別のトークン列として再字句解析されてしまう種類。
// 例: `const` + `x` → `constx`、`1` + `else` → `1else`
// minifier の空白挿入判定（spacing.ts）はこのカテゴリだけを唯一の正として参照します。
export const SpaceSensitive = createToken({ name: 'SpaceSensitive', categories: [Token] });

// 予約語。個々のキーワードは tokens.ts で keywords.json から生成します。
export const Keyword = createToken({ name: 'Keyword', categories: [Token] });

// ドキュメントコメント（/// と //!）。minifier は出力から削除する。
// 通常の // コメントは Lexer で SKIPPED なのでここには入らない。
export const Comment = createToken({ name: 'Comment', categories: [Token] });

// ----- minifier から見たトークン分類 -----
// 個々のキーワードは `Keyword_<word>` として区別する（例: Keyword_const）。
export type KeywordCategory = `Keyword_${string}`;

export type Category =
  | 'Identifier'
  | 'Builtin'
  | KeywordCategory
  | 'IntegerLiteral'
  | 'FloatLiteral'
  | 'CharLiteral'
  | 'StringLiteral'
  | 'MultilineStringLiteralLine'
  | 'DocComment'
  | 'ContainerDocComment'
  | 'Period'
  | 'Punctuation' // 上記以外の演算子・区切り文字すべて
  | 'Eof'
  | 'Invalid';

export function keywordCategory(word: string): KeywordCategory {
  return `Keyword_${word}`;
}
