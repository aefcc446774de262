// src/minifier/reserved.ts
// リネームしてはいけない識別子（初期テーブル）。
// Zig ではプリミティブ型や true/false/null/undefined はキーワードではなく識別子として字句解析される。
// i8/u32 のような任意幅整数は renamer 側のパターン判定で素通しするため、ここには載せない。

export type PointerWidth = 32 | 64;

export const PRIMITIVE_NAMES: readonly string[] = [
  'isize', 'usize',
  'f16', 'f32', 'f64', 'f80', 'f128',
  'bool', 'void', 'noreturn', 'type', 'anyerror', 'anyopaque',
  'comptime_int', 'comptime_float',
  'c_short', 'c_ushort', 'c_int', 'c_uint', 'c_long', 'c_ulong',
  'c_longlong', 'c_ulonglong', 'c_longdouble', 'c_void',
  'true', 'false', 'null', 'undefined',
];

// 破棄用の `_` とエントリポイントの `main`
export const SPECIAL_NAMES: readonly string[] = ['_', 'main'];

// 初期テーブルを構築する。
// pointerWidth 指定時は isize/usize を同幅の固定長整数に置き換える（1バイト短くなる）。
export function reservedRenames(pointerWidth?: PointerWidth): Map<string, string> {
  const table = new Map<string, string>();
  for (const name of [...PRIMITIVE_NAMES, ...SPECIAL_NAMES]) {
    table.set(name, name);
  }
  if (pointerWidth !== undefined) {
    table.set('isize', `i${pointerWidth}`);
    table.set('usize', `u${pointerWidth}`);
  }
  return table;
}
