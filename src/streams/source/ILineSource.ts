/**
 * An already-open, synchronous, line-oriented input.
 *
 * The stream reading from a source never closes it; whoever opened the
 * source releases it.
 */
export interface ILineSource {
  /**
   * Next line without its terminator, or null when exhausted.
   */
  readLine(): string | null;

  isExhausted(): boolean;

  /**
   * Reposition to the first line. Throws RewindError once closed.
   */
  rewind(): void;

  close(): void;

  isClosed(): boolean;

  describe(): string;
}
