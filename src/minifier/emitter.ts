// src/minifier/emitter.ts
// トークン列を1回だけ走査して縮小後のテキストを sink に書き出す。
// 状態は「直前に出力したトークンの Category」だけ。

import type { Token, TokenSource } from '../lexer/index.ts';
import type { Category } from '../lexer/categories.ts';
import { Comment } from '../lexer/categories.ts';
import { categoriesOf } from '../lexer/tokens.ts';
import { failInvalidToken } from '../lexer/lexerErrors.ts';
import type { RenameState } from './renamer.ts';
import { encodeCharLiteral, isDecimalEncoding } from './literals.ts';
import { needsSpace } from './spacing.ts';

// 出力から丸ごと削除する種類（ドキュメントコメント）
const STRIPPED: ReadonlySet<Category> = categoriesOf(Comment);

export interface OutputSink {
  write(text: string): void;
}

// 全体を溜めておき、成功時にだけ取り出す。失敗時の部分出力は捨てる。
export class BufferSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

type Rewritten = {
  text: string;
  // 出力側で再字句解析したときの分類（空白判定に使う）
  category: Category;
};

function rewrite(token: Token, previous: Category, renames: RenameState): Rewritten {
  switch (token.category) {
    case 'Identifier':
      // `std.mem` の `mem` のようなメンバ名は束縛ではないので触らない
      if (previous === 'Period') return { text: token.text, category: token.category };
      return { text: renames.rename(token.text), category: token.category };
    case 'CharLiteral': {
      const text = encodeCharLiteral(token.text);
      return { text, category: isDecimalEncoding(text) ? 'IntegerLiteral' : token.category };
    }
    default:
      return { text: token.text, category: token.category };
  }
}

export function emit(tokens: TokenSource, renames: RenameState, sink: OutputSink): void {
  // 初期値 Invalid は空白判定で常に false になる番兵
  let previous: Category = 'Invalid';

  for (let token = tokens.next(); token.category !== 'Eof'; token = tokens.next()) {
    if (token.category === 'Invalid') failInvalidToken(token);

    // ドキュメントコメントは0バイト。previous も更新しない（前後の語が融合しないように）
    if (STRIPPED.has(token.category)) continue;

    const { text, category } = rewrite(token, previous, renames);
    if (needsSpace(previous, category)) sink.write(' ');
    sink.write(text);
    previous = category;
  }
}
