/**
 * Keyboard side of the machine. Character codes are widened to 16 bits by
 * the caller; implementations return plain byte values.
 */
export interface CharacterInput {
  /** Takes a buffered character without waiting, or returns undefined. */
  poll(): number | undefined;
  /**
   * Takes the next character. Returns it directly when one is available now,
   * otherwise a promise that settles once one arrives. Failures are IOErrors.
   * Once `signal` aborts, a waiting read gives up its place and the next
   * character stays buffered.
   */
  read(signal?: AbortSignal): number | Promise<number>;
}

export interface CharacterOutput {
  /** Writes the low byte of each value. */
  write(bytes: readonly number[]): void;
}
