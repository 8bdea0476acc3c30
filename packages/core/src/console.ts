/**
 * ConsoleOutput: abstraction over terminal output for testability.
 */

export interface ConsoleOutput {
  /** Progress note */
  info(text: string): void;
  /** Non-fatal problem; the bootstrap carries on */
  warn(text: string): void;
  error(text: string): void;
}
