// src/minifier/renameErrors.ts
import { RenameError } from '../errors/errors.ts';

export function failNamesExhausted(identifier: string, available: number): never {
  throw new RenameError(
    `Ran out of short names: '${identifier}' would be distinct identifier #${available + 1}, only ${available} are available.`,
    identifier,
  );
}
