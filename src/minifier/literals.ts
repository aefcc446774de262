// src/minifier/literals.ts
// 文字リテラルを10進数に置き換える（例: 'a' → 97 で1バイト短縮）。
// 対象は引用符 + ASCII 1バイト + 引用符の3バイト形と、改行エスケープ '\n' のみ。
// それ以外のエスケープやマルチバイト文字は短くなる保証がないので素通し。

const ESCAPED_NEWLINE = "'\\n'";

export function encodeCharLiteral(literal: string): string {
  if (literal === ESCAPED_NEWLINE) return '10';
  if (literal.length === 3 && literal[0] === "'" && literal[2] === "'") {
    const code = literal.charCodeAt(1);
    // 0x80 以上は UTF-8 で2バイト以上になるため3バイト形ではない
    if (code < 0x80 && code !== 0x5c) return String(code);
  }
  return literal;
}

// 置換後のテキストが整数リテラルになったか（emitter の空白判定で使う）
export function isDecimalEncoding(encoded: string): boolean {
  return /^[0-9]+$/.test(encoded);
}
