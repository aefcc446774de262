#!/usr/bin/env tsx
/**
 * zigmin CLI
 *
 * 目的:
 * - Zig ソースを受け取り、縮小したソースを標準出力へ書き出す最小CLI。
 * - 入力は --input または STDIN。上限サイズ（既定 1 MiB）を超える入力は読み込まない。
 *
 * 使い方:
 *   zigmin < solution.zig > golfed.zig
 *   zigmin --input solution.zig --pointer-width 64
 *   zigmin --input solution.zig --print renames
 *   zigmin repl   // 対話モード（1行ずつ縮小）
 *
 * オプション:
 *   --input <path>                 Zigソースファイル（省略時はSTDIN）
 *   --print output|tokens|renames  出力内容（既定: output）
 *   --pointer-width 32|64          isize/usize を固定幅整数に置き換える
 *   --max-size <bytes>             入力サイズ上限（環境変数 ZIGMIN_MAX_SIZE でも可）
 *
 * 備考:
 * - 失敗時は何も出力せず、stderr にエラーを出して終了コード1で終わる。
 */

import process from 'node:process';
import { minify } from '../minifier/index.ts';
import type { PointerWidth } from '../minifier/index.ts';
import { tokenize } from '../lexer/index.ts';
import { readSource, resolveMaxSize } from './input.ts';

type PrintMode = 'output' | 'tokens' | 'renames';

type Args = {
  cmd?: 'run' | 'repl';
  input?: string;
  print?: PrintMode;
  pointerWidth?: PointerWidth;
  maxSize?: string;
};

function printHelp(): void {
  console.log(`zigmin CLI

Usage:
  zigmin < solution.zig
  zigmin --input solution.zig --pointer-width 64
  zigmin --input solution.zig --print renames
  zigmin repl

Options:
  --input <path>                 Zig source file (default: stdin)
  --print output|tokens|renames  Output mode (default: output)
  --pointer-width 32|64          Rewrite isize/usize to fixed-width integers
  --max-size <bytes>             Input size limit (default: 1048576, env: ZIGMIN_MAX_SIZE)
`);
}

function nextValueOrExit(argv: string[], idxRef: { i: number }, flag: string): string {
  idxRef.i++;
  const v = argv[idxRef.i];
  if (typeof v === 'string' && v.length > 0 && !v.startsWith('--')) return v;
  console.error(`Error: ${flag} requires a value`);
  printHelp();
  process.exit(1);
}

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  const ref = { i: 1 };
  // サブコマンド風に "repl" を認識
  if (argv[2] === 'repl') {
    args.cmd = 'repl';
    return args;
  }
  while (++ref.i < argv.length) {
    const a = argv[ref.i];
    if (a === '--input') args.input = nextValueOrExit(argv, ref, '--input');
    else if (a === '--max-size') args.maxSize = nextValueOrExit(argv, ref, '--max-size');
    else if (a === '--print') {
      const v = nextValueOrExit(argv, ref, '--print');
      if (v === 'output' || v === 'tokens' || v === 'renames') args.print = v;
      else {
        console.error(`Error: --print must be one of "output" | "tokens" | "renames" (got "${v}")`);
        printHelp();
        process.exit(1);
      }
    } else if (a === '--pointer-width') {
      const v = nextValueOrExit(argv, ref, '--pointer-width');
      if (v === '32') args.pointerWidth = 32;
      else if (v === '64') args.pointerWidth = 64;
      else {
        console.error(`Error: --pointer-width must be 32 or 64 (got "${v}")`);
        process.exit(1);
      }
    } else if (a === '--help' || a === '-h') {
      printHelp();
      process.exit(0);
    } else {
      console.error(`Unknown option: ${a}`);
      printHelp();
      process.exit(1);
    }
  }
  return args;
}

async function runOnce(args: Args): Promise<void> {
  const maxSize = resolveMaxSize(args.maxSize, process.env.ZIGMIN_MAX_SIZE);
  const source = await readSource(args.input, maxSize);

  const mode = args.print ?? 'output';
  if (mode === 'tokens') {
    const tokens = tokenize(source).map(({ category, text, line, column }) => ({ category, text, line, column }));
    console.log(JSON.stringify(tokens, null, 2));
    return;
  }

  const result = minify(source, args.pointerWidth !== undefined ? { pointerWidth: args.pointerWidth } : {});
  if (mode === 'renames') {
    console.log(JSON.stringify({
      renames: Object.fromEntries(result.renames),
      inputBytes: result.inputBytes,
      outputBytes: result.outputBytes,
    }, null, 2));
    return;
  }

  // 末尾に改行は足さない（1バイトでも惜しいので）
  process.stdout.write(result.output);
}

async function main() {
  const args = parseArgs(process.argv);
  if (args.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl();
    return;
  }
  await runOnce(args);
}

main().catch((err: unknown) => {
  console.error('zigmin error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
