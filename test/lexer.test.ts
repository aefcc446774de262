// test/lexer.test.ts
import { describe, it, expect } from 'vitest';
import { tokenize, TokenStream, categoriesOf, keywordCategory } from '../src/lexer/index.ts';
import type { Category } from '../src/lexer/index.ts';
import { Keyword, Comment } from '../src/lexer/categories.ts';
import keywords from '../src/lexer/keywords.json';

function categories(source: string): Category[] {
  return tokenize(source).map(t => t.category);
}

function texts(source: string): string[] {
  return tokenize(source).map(t => t.text);
}

describe('lexer', () => {
  it('should classify a simple declaration', () => {
    expect(categories("const xyz_counter: i64 = 'A';")).toEqual([
      'Keyword_const', 'Identifier', 'Punctuation', 'Identifier', 'Punctuation', 'CharLiteral', 'Punctuation', 'Eof',
    ]);
  });

  it('should record spans into the source', () => {
    const [kw, id, eof] = tokenize('const x');
    expect(kw?.span).toEqual({ start: 0, end: 5 });
    expect(id?.span).toEqual({ start: 6, end: 7 });
    expect(id?.text).toBe('x');
    expect(eof?.category).toBe('Eof');
    expect(eof?.span).toEqual({ start: 7, end: 7 });
  });

  it('should not split identifiers that start with a keyword', () => {
    expect(categories('constant orelse_x')).toEqual(['Identifier', 'Identifier', 'Eof']);
  });

  it('should prefer the longer keyword (orelse over or)', () => {
    expect(categories('a orelse b or c')).toEqual([
      'Identifier', 'Keyword_orelse', 'Identifier', 'Keyword_or', 'Identifier', 'Eof',
    ]);
  });

  it('should distinguish builtins and quoted identifiers', () => {
    expect(categories('@import @"a b"')).toEqual(['Builtin', 'Identifier', 'Eof']);
    expect(texts('@import @"a b"')).toEqual(['@import', '@"a b"', '']);
  });

  it('should lex ranges as integer, punctuation, integer', () => {
    expect(texts('0..3')).toEqual(['0', '..', '3', '']);
    expect(categories('0..3')).toEqual(['IntegerLiteral', 'Punctuation', 'IntegerLiteral', 'Eof']);
  });

  it('should lex float literals', () => {
    expect(categories('1.5 2e10 0x1.8p3 0x1e5')).toEqual([
      'FloatLiteral', 'FloatLiteral', 'FloatLiteral', 'IntegerLiteral', 'Eof',
    ]);
  });

  it('should keep member access periods apart from other dot operators', () => {
    expect(texts('a.b.* c.?')).toEqual(['a', '.', 'b', '.*', 'c', '.', '?', '']);
    expect(categories('a.b')).toEqual(['Identifier', 'Period', 'Identifier', 'Eof']);
  });

  it('should emit doc comments as tokens and skip plain comments', () => {
    const source = '//! top\n/// doc\n// plain\n//// banner\nx';
    expect(categories(source)).toEqual(['ContainerDocComment', 'DocComment', 'Identifier', 'Eof']);
    expect(texts(source)).toEqual(['//! top', '/// doc', 'x', '']);
  });

  it('should include the newline in multiline string lines', () => {
    expect(texts('\\\\hello\n  \\\\world\n;')).toEqual(['\\\\hello\n', '\\\\world\n', ';', '']);
  });

  it('should lex char literals with escapes', () => {
    expect(categories("'a' '\\n' '\\x41' '\\u{1F600}' 'é'")).toEqual([
      'CharLiteral', 'CharLiteral', 'CharLiteral', 'CharLiteral', 'CharLiteral', 'Eof',
    ]);
  });

  it('should report unlexable input as an Invalid token in source order', () => {
    const tokens = tokenize('a # b');
    expect(tokens.map(t => t.category)).toEqual(['Identifier', 'Invalid', 'Identifier', 'Eof']);
    expect(tokens[1]?.text).toBe('#');
    expect(tokens[1]?.line).toBe(1);
    expect(tokens[1]?.column).toBe(3);
  });
});

describe('token categories', () => {
  it('should register every keyword under the Keyword category', () => {
    const table = categoriesOf(Keyword);
    expect(table.size).toBe(keywords.length);
    for (const word of keywords) {
      expect(table.has(keywordCategory(word))).toBe(true);
      expect(categories(word)).toEqual([keywordCategory(word), 'Eof']);
    }
  });

  it('should put both doc comment kinds under the Comment category', () => {
    expect([...categoriesOf(Comment)].sort()).toEqual(['ContainerDocComment', 'DocComment']);
  });
});

describe('TokenStream', () => {
  it('should yield tokens in order and then Eof repeatedly', () => {
    const stream = new TokenStream('x = 1');
    expect(stream.next().text).toBe('x');
    expect(stream.next().text).toBe('=');
    expect(stream.next().text).toBe('1');
    expect(stream.next().category).toBe('Eof');
    expect(stream.next().category).toBe('Eof');
  });

  it('should yield only Eof for empty input', () => {
    const stream = new TokenStream('');
    expect(stream.next().category).toBe('Eof');
  });
});
