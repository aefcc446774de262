// src/lexer/tokens.ts
import { createToken, Lexer } from 'chevrotain';
import type { TokenType } from 'chevrotain';
import {
  SpaceSensitive,
  Keyword,
  Comment,
  keywordCategory,
} from './categories.ts';
import type { Category, KeywordCategory } from './categories.ts';
import keywords from './keywords.json';

// 空白・改行は Lexer.SKIPPED。minifier は必要な空白だけを自前で挿入する。
export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /[ \t\r\n]+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// ----- Comments -----
// 注意: `//!` と `///` は通常コメントより先に並べること。
// `////` 以上は通常コメント扱い（Zig の字句規則に合わせる）。
export const ContainerDocComment = createToken({
  name: 'ContainerDocComment',
  pattern: /\/\/![^\n]*/,
  categories: [Comment],
  start_chars_hint: ['/'],
});
export const DocComment = createToken({
  name: 'DocComment',
  pattern: /\/\/\/(?!\/)[^\n]*/,
  categories: [Comment],
  start_chars_hint: ['/'],
});
export const LineComment = createToken({
  name: 'LineComment',
  pattern: /\/\/[^\n]*/,
  group: Lexer.SKIPPED,
  start_chars_hint: ['/'],
});

// ----- Literals -----
// 複数行文字列は行末の改行までを1トークンに含める。
// 空白を全削除しても次の行の `\\` が行頭に来るため、出力が壊れない。
export const MultilineStringLiteralLine = createToken({
  name: 'MultilineStringLiteralLine',
  pattern: /\\\\[^\n]*\n?/,
  line_breaks: true,
  start_chars_hint: ['\\'],
});
export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"(?:[^"\\\n]|\\.)*"/,
  start_chars_hint: ['"'],
});
// エスケープは \n \r \t \\ \' \" \xNN \u{N...} のみ。サロゲートペアは1文字として扱う。
export const CharLiteral = createToken({
  name: 'CharLiteral',
  pattern: /'(?:[\uD800-\uDBFF][\uDC00-\uDFFF]|[^'\\\n]|\\(?:x[0-9a-fA-F]{2}|u\{[0-9a-fA-F]+\}|[nrt'"\\]))'/,
  start_chars_hint: ["'"],
});

// ----- Identifiers -----
// @name は組み込み関数、@"..." は任意文字列の識別子。
export const Builtin = createToken({
  name: 'Builtin',
  pattern: /@[a-zA-Z_][a-zA-Z0-9_]*/,
  categories: [SpaceSensitive],
  start_chars_hint: ['@'],
});
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /@"(?:[^"\\\n]|\\.)*"|[a-zA-Z_][a-zA-Z0-9_]*/,
  categories: [SpaceSensitive],
});

// ----- Keywords -----
// 注意: Chevrotain は配列順に最初にマッチしたものを採用する。
// `or` が `orelse` の先頭を食わないよう、長い語から並べる。
// longer_alt により `constant` のような語は Identifier になる。
const keywordEntries: Array<[TokenType, KeywordCategory]> = [...keywords]
  .sort((a, b) => b.length - a.length)
  .map((word): [TokenType, KeywordCategory] => {
    const category = keywordCategory(word);
    const token = createToken({
      name: category,
      pattern: new RegExp(word),
      longer_alt: Identifier,
      categories: [Keyword, SpaceSensitive],
    });
    return [token, category];
  });

export const keywordTokens: TokenType[] = keywordEntries.map(([token]) => token);

// ----- Numbers -----
// FloatLiteral を IntegerLiteral より先に。`1..2` は Integer, `..`, Integer になる。
export const FloatLiteral = createToken({
  name: 'FloatLiteral',
  pattern:
    /0x[0-9a-fA-F][0-9a-fA-F_]*(?:\.[0-9a-fA-F][0-9a-fA-F_]*(?:[pP][+-]?[0-9][0-9_]*)?|[pP][+-]?[0-9][0-9_]*)|[0-9][0-9_]*(?:\.[0-9][0-9_]*(?:[eE][+-]?[0-9][0-9_]*)?|[eE][+-]?[0-9][0-9_]*)/,
  categories: [SpaceSensitive],
});
export const IntegerLiteral = createToken({
  name: 'IntegerLiteral',
  pattern: /0x[0-9a-fA-F_]+|0o[0-7_]+|0b[01_]+|[0-9][0-9_]*/,
  categories: [SpaceSensitive],
});

// ----- Operators & Separators -----
// 個別の演算子は区別しない（minifier は素通しするだけ）。
// 複合演算子（長いもの）を先に並べるのが重要。`..` `...` `.*` もここで拾う。
export const Punctuation = createToken({
  name: 'Punctuation',
  pattern:
    /<<\|=|<<=|<<\||>>=|\+%=|\+\|=|-%=|-\|=|\*%=|\*\|=|\.\.\.|\.\.|\.\*|\*\*|\+\+|\+%|\+\||\+=|-%|-\||-=|->|\*%|\*\||\*=|\/=|%=|&=|\|=|\^=|==|=>|!=|<=|>=|<<|>>|\|\||[-+*\/%&|^~!=<>?:;,()[\]{}]/,
});
// メンバアクセスの `.`。直後の識別子はリネーム対象外。
export const Period = createToken({
  name: 'Period',
  pattern: /\./,
  start_chars_hint: ['.'],
});

// ----- Token order (priority) -----
// 1) WhiteSpace（SKIPPED）
// 2) Comments: `//!`, `///` → 通常コメント（SKIPPED）
// 3) Literals（文字列系）
// 4) Builtin → Keywords（長い順）→ Identifier
// 5) Numbers: Float → Integer
// 6) Punctuation → Period（`..` 等を先に）
export const allTokens: TokenType[] = [
  WhiteSpace,

  ContainerDocComment, DocComment, LineComment,

  MultilineStringLiteralLine, StringLiteral, CharLiteral,

  Builtin, ...keywordTokens, Identifier,

  FloatLiteral, IntegerLiteral,

  Punctuation, Period,
];

// トークン種別 → minifier の Category。SKIPPED のトークンは含めない。
export const categoryByTokenType: ReadonlyMap<TokenType, Category> = new Map<TokenType, Category>([
  [ContainerDocComment, 'ContainerDocComment'],
  [DocComment, 'DocComment'],
  [MultilineStringLiteralLine, 'MultilineStringLiteralLine'],
  [StringLiteral, 'StringLiteral'],
  [CharLiteral, 'CharLiteral'],
  [Builtin, 'Builtin'],
  ...keywordEntries,
  [Identifier, 'Identifier'],
  [FloatLiteral, 'FloatLiteral'],
  [IntegerLiteral, 'IntegerLiteral'],
  [Punctuation, 'Punctuation'],
  [Period, 'Period'],
]);

// 指定カテゴリ（SpaceSensitive, Comment など）に属するトークン種別の Category 集合。
// 判定表はすべてここから作り、トークン定義を唯一の正とする。
export function categoriesOf(parent: TokenType): ReadonlySet<Category> {
  const table = new Set<Category>();
  for (const [tokenType, category] of categoryByTokenType) {
    if (tokenType.CATEGORIES?.includes(parent)) table.add(category);
  }
  return table;
}
