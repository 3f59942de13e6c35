import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LoadError } from '../errors';
import { MachineState } from '../hardware/machine-state';
import { loadImage, readImage } from '../image';

describe('loadImage', () => {
  let state: MachineState;

  beforeEach(() => {
    state = new MachineState();
  });

  it('places the words after the origin word at the origin', () => {
    const loaded = loadImage(state, new Uint8Array([0x30, 0x00, 0x10, 0x01, 0x10, 0x02]));

    expect(loaded).toEqual({ origin: 0x3000, wordCount: 2 });
    expect(state.peek(0x3000)).toBe(0x1001);
    expect(state.peek(0x3001)).toBe(0x1002);
    expect(state.pc).toBe(0x3000);
  });

  it('leaves the program counter at x3000 whatever the origin', () => {
    loadImage(state, new Uint8Array([0x40, 0x00, 0x12, 0x34]));

    expect(state.peek(0x4000)).toBe(0x1234);
    expect(state.pc).toBe(0x3000);
  });

  it('ignores a trailing odd byte', () => {
    const loaded = loadImage(state, new Uint8Array([0x40, 0x00, 0xab, 0xcd, 0xef]));

    expect(loaded.wordCount).toBe(1);
    expect(state.peek(0x4000)).toBe(0xabcd);
    expect(state.peek(0x4001)).toBe(0);
  });

  it('accepts an image holding only the origin', () => {
    expect(loadImage(state, new Uint8Array([0x30, 0x00]))).toEqual({ origin: 0x3000, wordCount: 0 });
  });

  it('reads from a view into a larger buffer', () => {
    const backing = new Uint8Array([0xff, 0xff, 0x50, 0x00, 0x00, 0x2a]);
    loadImage(state, backing.subarray(2));

    expect(state.peek(0x5000)).toBe(0x002a);
  });

  it('fails when the origin word is missing', () => {
    expect(() => loadImage(state, new Uint8Array([]))).toThrow(LoadError);
    expect(() => loadImage(state, new Uint8Array([0x30]))).toThrow(LoadError);
  });

  it('fills memory up to the last address', () => {
    loadImage(state, new Uint8Array([0xff, 0xff, 0x12, 0x34]));
    expect(state.peek(0xffff)).toBe(0x1234);
  });

  it('fails instead of wrapping past the end of memory', () => {
    const image = new Uint8Array([0xff, 0xff, 0x12, 0x34, 0x56, 0x78]);

    expect(() => loadImage(state, image)).toThrow(
      'image of 2 words at origin xFFFF runs past the end of memory',
    );
    expect(state.peek(0x0000)).toBe(0);
  });
});

describe('readImage', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lc3-image-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads an image file', () => {
    const path = join(dir, 'program.obj');
    writeFileSync(path, Buffer.from([0x30, 0x00, 0xf0, 0x25]));

    const state = new MachineState();
    expect(readImage(state, path)).toEqual({ origin: 0x3000, wordCount: 1 });
    expect(state.peek(0x3000)).toBe(0xf025);
  });

  it('wraps a missing file in a LoadError', () => {
    const path = join(dir, 'missing.obj');

    let error: unknown;
    try {
      readImage(new MachineState(), path);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(LoadError);
    expect(error).toHaveProperty('message', `cannot read image ${path}`);
    expect(error).toHaveProperty('cause.code', 'ENOENT');
  });
});
