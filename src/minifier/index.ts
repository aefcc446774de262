// src/minifier/index.ts
// 公開API: Zig ソース文字列を縮小する。
// 1回の呼び出しごとに RenameState を新しく作り、実行間で状態を共有しない。

import { TokenStream } from '../lexer/index.ts';
import { RenameState } from './renamer.ts';
import type { PointerWidth } from './reserved.ts';
import { BufferSink, emit } from './emitter.ts';

export type MinifyOptions = {
  // 指定すると isize/usize を i64/u64（または i32/u32）に置き換える
  pointerWidth?: PointerWidth;
};

export type MinifyResult = {
  output: string;
  // 払い出した短縮名（元の名前, 短縮名）の一覧。払い出し順。
  renames: ReadonlyArray<readonly [string, string]>;
  inputBytes: number;
  outputBytes: number;
};

export function minify(source: string, options: MinifyOptions = {}): MinifyResult {
  const renames = new RenameState(options);
  const sink = new BufferSink();

  emit(new TokenStream(source), renames, sink);

  const output = sink.toString();
  return {
    output,
    renames: renames.entries(),
    inputBytes: Buffer.byteLength(source, 'utf8'),
    outputBytes: Buffer.byteLength(output, 'utf8'),
  };
}

export { emit, BufferSink } from './emitter.ts';
export type { OutputSink } from './emitter.ts';
export { RenameState, SHORT_NAMES, isArbitraryWidthInt } from './renamer.ts';
export type { RenameOptions } from './renamer.ts';
export { encodeCharLiteral } from './literals.ts';
export { needsSpace, isSpaceSensitive, SPACE_SENSITIVE } from './spacing.ts';
export { PRIMITIVE_NAMES, SPECIAL_NAMES } from './reserved.ts';
export type { PointerWidth } from './reserved.ts';
