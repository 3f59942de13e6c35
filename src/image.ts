import { readFileSync } from 'fs';
import { MEMORY_SIZE } from './constants/memory';
import { LoadError, hex } from './errors';
import type { MachineState } from './hardware/machine-state';

export interface LoadedImage {
  origin: number;
  /** Number of words placed in memory, not counting the origin word. */
  wordCount: number;
}

/**
 * Places a program image in memory. The first big-endian word is the origin;
 * the words after it are stored at consecutive addresses from there. A
 * trailing odd byte is ignored.
 */
export function loadImage(state: MachineState, image: Uint8Array): LoadedImage {
  if (image.length < 2) {
    throw new LoadError('image is too short to contain an origin word');
  }
  const view = new DataView(image.buffer, image.byteOffset, image.byteLength);

  /* the origin tells us where in memory to place the image */
  const origin = view.getUint16(0);
  const wordCount = Math.floor(image.length / 2) - 1;

  if (origin + wordCount > MEMORY_SIZE) {
    throw new LoadError(
      `image of ${wordCount} words at origin ${hex(origin)} runs past the end of memory`,
    );
  }

  for (let pos = 0; pos < wordCount; pos++) {
    state.poke(origin + pos, view.getUint16((pos + 1) * 2));
  }

  return { origin, wordCount };
}

export function readImage(state: MachineState, imagePath: string): LoadedImage {
  let image: Buffer;
  try {
    image = readFileSync(imagePath);
  } catch (err) {
    throw new LoadError(`cannot read image ${imagePath}`, { cause: err });
  }
  return loadImage(state, image);
}
