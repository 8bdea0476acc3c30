/**
 * LiveConsoleOutput: real terminal output with colors via picocolors.
 *
 * Everything goes to stderr so it never mixes with the output of the
 * command handed off to.
 */

import pc from "picocolors";
import type { ConsoleOutput } from "./console.js";

const PREFIX = "cubestart:";

function emit(text: string): void {
  process.stderr.write(text + "\n");
}

export class LiveConsoleOutput implements ConsoleOutput {
  info(text: string): void {
    emit(pc.dim(`${PREFIX} ${text}`));
  }

  warn(text: string): void {
    emit(pc.yellow(`${PREFIX} ${text}`));
  }

  error(text: string): void {
    emit(pc.red(`${PREFIX} ${text}`));
  }
}
