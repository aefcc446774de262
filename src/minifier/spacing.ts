// src/minifier/spacing.ts
// 隣接トークン間に空白が必要かの判定。
// 判定表は lexer/tokens.ts で SpaceSensitive カテゴリを付けたトークン種別から一度だけ構築する。

import { categoriesOf } from '../lexer/tokens.ts';
import { SpaceSensitive } from '../lexer/categories.ts';
import type { Category } from '../lexer/categories.ts';

export const SPACE_SENSITIVE: ReadonlySet<Category> = categoriesOf(SpaceSensitive);

export function isSpaceSensitive(category: Category): boolean {
  return SPACE_SENSITIVE.has(category);
}

export function needsSpace(previous: Category, current: Category): boolean {
  // @builtin は `@` で始まるので直前と融合しない
  if (current === 'Builtin') return false;
  return isSpaceSensitive(previous) && isSpaceSensitive(current);
}
