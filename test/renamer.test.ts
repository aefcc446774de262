// test/renamer.test.ts
import { describe, it, expect } from 'vitest';
import { RenameState, SHORT_NAMES, isArbitraryWidthInt } from '../src/minifier/renamer.ts';
import { PRIMITIVE_NAMES } from '../src/minifier/reserved.ts';
import { RenameError } from '../src/errors/errors.ts';

describe('RenameState', () => {
  it('should hand out short names in order and reuse them', () => {
    const state = new RenameState();
    expect(state.rename('foo')).toBe('a');
    expect(state.rename('bar')).toBe('b');
    expect(state.rename('foo')).toBe('a');
    expect(state.entries()).toEqual([['foo', 'a'], ['bar', 'b']]);
  });

  it('should keep reserved identifiers as they are', () => {
    const state = new RenameState();
    for (const name of ['_', 'main', ...PRIMITIVE_NAMES]) {
      expect(state.rename(name)).toBe(name);
    }
    expect(state.entries()).toEqual([]);
    expect(state.rename('x')).toBe('a');
  });

  it('should pass arbitrary-width integer types through without using a name', () => {
    const state = new RenameState();
    expect(state.rename('u8')).toBe('u8');
    expect(state.rename('i1024')).toBe('i1024');
    expect(state.rename('u0')).toBe('u0');
    expect(state.entries()).toEqual([]);
    expect(state.remaining).toBe(52);
  });

  it('should rename names that only look like integer types', () => {
    const state = new RenameState();
    expect(state.rename('i')).toBe('a');
    expect(state.rename('u')).toBe('b');
    expect(state.rename('i8a')).toBe('c');
    expect(state.rename('I8')).toBe('d');
  });

  it('should treat an original name equal to a short name as a new identifier', () => {
    const state = new RenameState();
    expect(state.rename('foo')).toBe('a');
    expect(state.rename('a')).toBe('b');
    expect(state.rename('foo')).toBe('a');
  });

  it('should substitute isize/usize when a pointer width is given', () => {
    const wide = new RenameState({ pointerWidth: 64 });
    expect(wide.rename('isize')).toBe('i64');
    expect(wide.rename('usize')).toBe('u64');

    const narrow = new RenameState({ pointerWidth: 32 });
    expect(narrow.rename('usize')).toBe('u32');
  });

  it('should not share state between instances', () => {
    const first = new RenameState();
    first.rename('foo');
    const second = new RenameState();
    expect(second.rename('bar')).toBe('a');
  });

  it('should use all 52 names and then fail', () => {
    const state = new RenameState();
    const assigned = SHORT_NAMES.map((_, i) => state.rename(`v${i}`));
    expect(assigned).toEqual([...SHORT_NAMES]);
    expect(assigned[25]).toBe('z');
    expect(assigned[26]).toBe('A');
    expect(assigned[51]).toBe('Z');
    expect(state.remaining).toBe(0);

    // 既知の名前はまだ引ける
    expect(state.rename('v0')).toBe('a');

    let caught: unknown;
    try {
      state.rename('oneTooMany');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(RenameError);
    if (!(caught instanceof RenameError)) return;
    expect(caught.code).toBe('E_RENAME_EXHAUSTED');
    expect(caught.identifier).toBe('oneTooMany');
  });
});

describe('isArbitraryWidthInt', () => {
  it('should match i/u followed by digits only', () => {
    expect(isArbitraryWidthInt('i7')).toBe(true);
    expect(isArbitraryWidthInt('u65535')).toBe(true);
    expect(isArbitraryWidthInt('u99999999')).toBe(true);
    expect(isArbitraryWidthInt('i')).toBe(false);
    expect(isArbitraryWidthInt('f32')).toBe(false);
    expect(isArbitraryWidthInt('u8_t')).toBe(false);
  });
});
