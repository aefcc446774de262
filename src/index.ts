// src/index.ts
export * from './minifier/index.ts';
export { tokenize, TokenStream } from './lexer/index.ts';
export type { Token, TokenSource, Span, Category, KeywordCategory } from './lexer/index.ts';
export { ZigminError, InvalidSourceError, RenameError, InputError } from './errors/errors.ts';
export type { ErrorCode } from './errors/errors.ts';
