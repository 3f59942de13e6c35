import type { Writable } from 'stream';
import type { CharacterOutput } from './types';

export class StreamOutput implements CharacterOutput {
  constructor(private readonly stream: Writable) {}

  write(bytes: readonly number[]): void {
    if (bytes.length > 0) {
      this.stream.write(Buffer.from(bytes.map((b) => b & 0xff)));
    }
  }
}
