// src/minifier/renamer.ts
import { reservedRenames } from './reserved.ts';
import type { PointerWidth } from './reserved.ts';
import { failNamesExhausted } from './renameErrors.ts';

// 短縮名の候補: a..z, A..Z の52個（この順で払い出す）
export const SHORT_NAMES: readonly string[] = [
  ...'abcdefghijklmnopqrstuvwxyz',
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
];

// i7, u128 などの任意幅整数型。ビット幅の妥当性は検証しない。
const ARBITRARY_WIDTH_INT = /^[iu][0-9]+$/;

export type RenameOptions = {
  pointerWidth?: PointerWidth;
};

/**
 * 1回の minify 実行に閉じたリネーム状態（対応表 + 払い出しカーソル）。
 * 実行ごとに new すること。使い回すと別ファイルの名前が混ざる。
 */
export class RenameState {
  private readonly table: Map<string, string>;
  private readonly assigned: Array<readonly [string, string]> = [];
  private cursor = 0;

  constructor(options: RenameOptions = {}) {
    this.table = reservedRenames(options.pointerWidth);
  }

  rename(original: string): string {
    const known = this.table.get(original);
    if (known !== undefined) return known;

    if (isArbitraryWidthInt(original)) return original;

    const next = SHORT_NAMES[this.cursor];
    if (next === undefined) failNamesExhausted(original, SHORT_NAMES.length);
    this.cursor++;
    this.table.set(original, next);
    this.assigned.push([original, next]);
    return next;
  }

  // 払い出し済みの対応（予約語の恒等写像は含まない）を払い出し順で返す
  entries(): ReadonlyArray<readonly [string, string]> {
    return this.assigned;
  }

  get remaining(): number {
    return SHORT_NAMES.length - this.cursor;
  }
}

export function isArbitraryWidthInt(name: string): boolean {
  return ARBITRARY_WIDTH_INT.test(name);
}
