/**
 * zigmin REPL (簡易)
 *
 * 目的:
 * - 1行の Zig ソースを入力し、縮小結果を即時表示する。:q で終了。
 * - 1行ごとに独立した実行として扱う（リネーム表は行をまたいで持ち越さない）。
 *
 * 使い方:
 *   zigmin repl
 *
 * コマンド:
 *   :q                      終了
 *   :mode output            出力モードを縮小結果に変更（デフォルト）
 *   :mode tokens            出力モードをトークン列に変更
 *   :mode renames           出力モードをリネーム表に変更
 *   :width 32|64|off        isize/usize の置き換え設定
 */

import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { minify } from '../minifier/index.ts';
import type { PointerWidth } from '../minifier/index.ts';
import { tokenize } from '../lexer/index.ts';

type Mode = 'output' | 'tokens' | 'renames';

export async function startRepl(): Promise<void> {
  let mode: Mode = 'output';
  let pointerWidth: PointerWidth | undefined = undefined;

  const rl = readline.createInterface({ input, output, prompt: 'zigmin> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') { rl.prompt(); continue; }
    if (text === ':q') { break; }

    // 設定コマンド
    if (text.startsWith(':mode ')) {
      const m = text.slice(6).trim();
      if (m === 'output' || m === 'tokens' || m === 'renames') {
        mode = m;
        console.log(`mode = ${mode}`);
      } else {
        console.log('usage: :mode output|tokens|renames');
      }
      rl.prompt();
      continue;
    }
    if (text.startsWith(':width ')) {
      const v = text.slice(7).trim();
      if (v === '32') pointerWidth = 32;
      else if (v === '64') pointerWidth = 64;
      else if (v === 'off') pointerWidth = undefined;
      else console.log('usage: :width 32|64|off');
      console.log(`pointerWidth = ${pointerWidth ?? '(off)'}`);
      rl.prompt();
      continue;
    }

    try {
      if (mode === 'tokens') {
        for (const token of tokenize(text)) {
          console.log(`${token.category}\t${JSON.stringify(token.text)}`);
        }
      } else {
        const result = minify(text, pointerWidth !== undefined ? { pointerWidth } : {});
        if (mode === 'renames') {
          for (const [from, to] of result.renames) console.log(`${from} -> ${to}`);
        } else {
          console.log(result.output);
        }
        console.log(`(${result.inputBytes} -> ${result.outputBytes} bytes)`);
      }
    } catch (err: unknown) {
      console.error('REPL error:', err instanceof Error ? err.message : err);
    }

    rl.prompt();
  }

  rl.close();
}
