// src/errors/errors.ts
// zigmin - error types and helpers
// 目的: 層ごとに例外型を分離し、呼び出し側が分類しやすい構造を提供
// ログはライブラリ層では行わず、呼び出し側（CLI/REPL）で処理する方針

export type ErrorCode =
  | 'E_LEX_INVALID_SOURCE'
  | 'E_RENAME_EXHAUSTED'
  | 'E_INPUT_TOO_LARGE'
  | 'E_INPUT_GENERIC';

export abstract class ZigminError extends Error {
  public abstract readonly code: ErrorCode;
  constructor(message: string) {
    super(message);
    // Errorのプロトタイプ連鎖調整（Babel/TS互換）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Lexer: 字句として成立しない入力
// 失敗した時点で実行全体を中断する（部分出力は返さない）
export class InvalidSourceError extends ZigminError {
  public readonly code: ErrorCode = 'E_LEX_INVALID_SOURCE';
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly snippet?: string,
  ) {
    super(message);
    this.name = 'InvalidSourceError';
  }
}

// Renamer: 短縮名の枯渇
export class RenameError extends ZigminError {
  public readonly code: ErrorCode = 'E_RENAME_EXHAUSTED';
  constructor(
    message: string,
    public readonly identifier?: string,
  ) {
    super(message);
    this.name = 'RenameError';
  }
}

// 入出力境界（CLI）: サイズ上限超過など
export class InputError extends ZigminError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly source?: string, // 例: 'stdin' / ファイルパス
    code: Extract<ErrorCode, 'E_INPUT_TOO_LARGE' | 'E_INPUT_GENERIC'> = 'E_INPUT_GENERIC',
  ) {
    super(message);
    this.name = 'InputError';
    this.code = code;
  }
}

// スニペット整形（必要に応じて使用）
export function formatLocation(line?: number, column?: number): string {
  if (line == null || column == null) return '';
  return `${line}:${column}`;
}
