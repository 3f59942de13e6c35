import { keyIn } from 'readline-sync';
import { IOError } from '../errors';
import type { CharacterInput } from './types';

/**
 * Blocking keyboard on readline-sync. It cannot look ahead without waiting,
 * so polling the keyboard status register never sees a key.
 */
export class KeyInInput implements CharacterInput {
  poll(): undefined {
    return undefined;
  }

  read(): number {
    let input: string;
    try {
      input = keyIn('', { hideEchoBack: true, mask: '' });
    } catch (err) {
      throw new IOError('keyboard read failed', { cause: err });
    }
    if (input.length === 0) {
      throw new IOError('keyboard read returned no character');
    }
    return input.charCodeAt(0);
  }
}
