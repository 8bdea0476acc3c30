/**
 * Handoff: what the process does once bootstrapping is over.
 */

import type { ExecRequest } from "./system-ops.js";
import type { Env } from "./types.js";

export type Handoff =
  | ({ kind: "exec" } & ExecRequest)
  | { kind: "exit"; code: 0 };

/** Run the trailing arguments as a command, or finish quietly without one */
export function planHandoff(args: readonly string[], env: Env): Handoff {
  if (args.length === 0) return { kind: "exit", code: 0 };
  return { kind: "exec", argv: [...args], env };
}
