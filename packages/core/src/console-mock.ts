/**
 * MockConsoleOutput: captures output for test assertions.
 */

import type { ConsoleOutput } from "./console.js";

export type CapturedLine = {
  level: "info" | "warn" | "error";
  text: string;
};

export class MockConsoleOutput implements ConsoleOutput {
  public lines: CapturedLine[] = [];

  info(text: string): void {
    this.lines.push({ level: "info", text });
  }

  warn(text: string): void {
    this.lines.push({ level: "warn", text });
  }

  error(text: string): void {
    this.lines.push({ level: "error", text });
  }

  /** Get all text from lines matching a level */
  textsAt(level: CapturedLine["level"]): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.text);
  }

  /** Check if any line contains a substring */
  hasText(substring: string): boolean {
    return this.lines.some((l) => l.text.includes(substring));
  }
}
