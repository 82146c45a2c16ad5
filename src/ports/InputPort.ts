/**
 * Source of raw key presses for the command loop.
 */
export interface InputPort {
  /** Resolves with the next key name, or null once the input is closed. */
  nextKey(): Promise<string | null>;
  /** Resolves any pending nextKey() with null and releases the terminal. */
  close(): void;
}
