import type { Readable } from 'stream';
import type { ReadStream } from 'tty';
import { IOError } from '../errors';
import type { CharacterInput } from './types';

const CTRL_C = 0x03;

interface Waiter {
  resolve(char: number): void;
  reject(err: IOError): void;
}

export interface TerminalInputOptions {
  /** Called for Ctrl-C while the terminal is in raw mode. */
  onInterrupt?: () => void;
}

function isTTY(stream: Readable): stream is ReadStream {
  return 'isTTY' in stream && stream.isTTY === true && 'setRawMode' in stream;
}

/**
 * Keyboard backed by a readable stream, normally stdin. A TTY is put in raw
 * mode so keys arrive one at a time without echo.
 */
export class TerminalInput implements CharacterInput {
  private readonly buffer: number[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: IOError | undefined;
  private readonly raw: boolean;

  constructor(
    private readonly stream: Readable,
    private readonly options: TerminalInputOptions = {},
  ) {
    this.raw = isTTY(stream);
    if (isTTY(stream)) {
      stream.setRawMode(true);
    }
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    stream.on('error', this.onError);
    stream.resume();
  }

  poll(): number | undefined {
    return this.buffer.shift();
  }

  read(signal?: AbortSignal): number | Promise<number> {
    const char = this.buffer.shift();
    if (char !== undefined) {
      return char;
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (signal?.aborted) {
      return Promise.reject(new IOError('keyboard read cancelled'));
    }
    return new Promise<number>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new IOError('keyboard read cancelled'));
      };
      const waiter: Waiter = {
        resolve: (c) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(c);
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Restores the terminal and stops listening. */
  close(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('error', this.onError);
    if (isTTY(this.stream)) {
      this.stream.setRawMode(false);
    }
    this.stream.pause();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    for (const byte of bytes) {
      if (this.raw && byte === CTRL_C && this.options.onInterrupt) {
        this.options.onInterrupt();
        continue;
      }
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(byte);
      } else {
        this.buffer.push(byte);
      }
    }
  };

  private readonly onEnd = (): void => {
    this.fail(new IOError('keyboard input closed'));
  };

  private readonly onError = (err: Error): void => {
    this.fail(new IOError('keyboard input failed', { cause: err }));
  };

  private fail(err: IOError): void {
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }
}
