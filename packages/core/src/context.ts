/**
 * Execution context: the ambient process state every stage reads.
 *
 * Captured once at start; stages never look at `process` themselves.
 */

import { homedir, userInfo } from "node:os";
import type { SystemOperations } from "./system-ops.js";
import type { DirectoryOwner, Env, FileSystemError, ProcessIdentity } from "./types.js";
import type { Result } from "./result.js";
import { ok } from "./result.js";

export type ExecutionContext = {
  readonly identity: ProcessIdentity;
  /** Absolute working directory */
  readonly cwd: string;
  readonly cwdOwner: DirectoryOwner;
  readonly env: Env;
  /** Home directory of the running account ($HOME, else the OS default) */
  readonly home: string;
  /** argv that starts this program again (runtime, flags, script) */
  readonly self: readonly string[];
  /** Trailing arguments: the command to hand off to */
  readonly args: readonly string[];
};

/** Effective ids of the current process */
export function currentIdentity(): ProcessIdentity {
  const info = userInfo();
  return {
    uid: process.geteuid?.() ?? info.uid,
    gid: process.getegid?.() ?? info.gid,
  };
}

/** argv that re-runs the current script under the same runtime flags */
export function selfInvocation(): string[] {
  const script = process.argv[1];
  return script === undefined
    ? [process.execPath, ...process.execArgv]
    : [process.execPath, ...process.execArgv, script];
}

export async function captureContext(
  ops: SystemOperations,
  args: readonly string[],
): Promise<Result<ExecutionContext, FileSystemError>> {
  const owner = await ops.ownerOf(ops.cwd);
  if (!owner.ok) return owner;

  const env: Env = { ...process.env };
  return ok({
    identity: currentIdentity(),
    cwd: ops.cwd,
    cwdOwner: owner.value,
    env,
    home: env.HOME || homedir(),
    self: selfInvocation(),
    args: [...args],
  });
}
