// src/cli/input.ts
// 入出力境界: ソースの読み込みとサイズ上限のチェック。
// コア（minifier）はサイズを気にしない。上限はここでだけ扱う。

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { InputError } from '../errors/errors.ts';

// 1 MiB。ZIGMIN_MAX_SIZE または --max-size で上書きできる
export const DEFAULT_MAX_SOURCE_SIZE = 1024 * 1024;

export function resolveMaxSize(flag: string | undefined, env: string | undefined): number {
  const raw = flag ?? env;
  if (raw === undefined || raw === '') return DEFAULT_MAX_SOURCE_SIZE;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InputError(`Max size must be a positive integer number of bytes (got "${raw}").`);
  }
  return n;
}

export function checkSourceSize(bytes: number, maxSize: number, label: string): void {
  if (bytes > maxSize) {
    throw new InputError(
      `Source from ${label} is ${bytes} bytes, over the limit of ${maxSize} bytes.`,
      label,
      'E_INPUT_TOO_LARGE',
    );
  }
}

async function readStdin(maxSize: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of process.stdin) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    // 上限を超えた時点で読むのをやめる
    checkSourceSize(total, maxSize, 'stdin');
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function readSource(inputPath: string | undefined, maxSize: number): Promise<string> {
  if (inputPath === undefined) return readStdin(maxSize);
  const resolved = path.resolve(inputPath);
  const stat = await fs.stat(resolved);
  checkSourceSize(stat.size, maxSize, inputPath);
  return fs.readFile(resolved, 'utf8');
}
