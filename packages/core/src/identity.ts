/**
 * Identity reconciliation: make the runner account own what the mounted
 * working directory's owner owns, then drop privileges to it.
 *
 * Only meaningful while elevated. A root-owned working directory is left
 * alone and the bootstrap keeps running as root.
 */

import type { ExecutionContext } from "./context.js";
import type { SystemOperations } from "./system-ops.js";
import type { Account, AccountNotFoundError, IOError, RunError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";
import { ROOT_UID } from "./constants.js";

export type IdentityDecision =
  | { kind: "run_as_root" }
  | {
      kind: "reexec";
      /** Runner account, with the ids it has after reconciliation */
      account: Account;
      /** Whether the account's uid/gid were rewritten */
      remapped: boolean;
    };

export type IdentityError =
  | { kind: "lookup_failed"; user: string; error: AccountNotFoundError | IOError }
  | { kind: "remap_failed"; user: string; step: "groupmod" | "usermod" | "chown"; error: RunError };

export type IdentityOptions = {
  ctx: ExecutionContext;
  ops: SystemOperations;
  runnerUser: string;
};

export async function reconcileIdentity(
  options: IdentityOptions,
): Promise<Result<IdentityDecision, IdentityError>> {
  const { ctx, ops, runnerUser } = options;
  const owner = ctx.cwdOwner;

  // Never remap the runner onto root
  if (owner.uid === ROOT_UID) return ok({ kind: "run_as_root" });

  const lookup = await ops.lookupAccount(runnerUser);
  if (!lookup.ok) return err({ kind: "lookup_failed", user: runnerUser, error: lookup.error });
  const current = lookup.value;

  const remapped = current.uid !== owner.uid || current.gid !== owner.gid;
  if (remapped) {
    // -o: the directory owner's ids may already belong to another account
    const groupmod = await ops.run("groupmod", ["-o", "-g", String(owner.gid), runnerUser]);
    if (!groupmod.ok) {
      return err({ kind: "remap_failed", user: runnerUser, step: "groupmod", error: groupmod.error });
    }

    const usermod = await ops.run("usermod", [
      "-o",
      "-u",
      String(owner.uid),
      "-g",
      String(owner.gid),
      runnerUser,
    ]);
    if (!usermod.ok) {
      return err({ kind: "remap_failed", user: runnerUser, step: "usermod", error: usermod.error });
    }

    const chown = await ops.chownRecursive(current.home, { user: runnerUser, group: runnerUser });
    if (!chown.ok) {
      return err({ kind: "remap_failed", user: runnerUser, step: "chown", error: chown.error });
    }
  }

  return ok({
    kind: "reexec",
    account: { ...current, uid: owner.uid, gid: owner.gid },
    remapped,
  });
}
