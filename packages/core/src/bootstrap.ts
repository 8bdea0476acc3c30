/**
 * cubestart bootstrap: the sequencer.
 *
 * 1. Privilege gate
 * 2. Elevated only: start the local database (failures only warn)
 * 3. Elevated only: reconcile the runner's ids and re-exec as the runner,
 *    unless the working directory belongs to root
 * 4. Activate the environment and plan the handoff
 *
 * Returns what the process must do next instead of doing it, so every
 * path can be driven from tests.
 */

import type { ExecutionContext } from "./context.js";
import type { ConsoleOutput } from "./console.js";
import type { SystemOperations } from "./system-ops.js";
import type { BootstrapConfig } from "./types.js";
import type { Result } from "./result.js";
import { ok, mapErr } from "./result.js";
import type { BootstrapState, TerminalState } from "./state.js";
import { nextState } from "./state.js";
import type { DatabaseStartResult, DatabaseWarning } from "./database.js";
import { startDatabase } from "./database.js";
import type { IdentityError } from "./identity.js";
import { reconcileIdentity } from "./identity.js";
import type { ActivationError, ActivationResult } from "./environment.js";
import { activateEnvironment } from "./environment.js";
import type { Handoff } from "./handoff.js";
import { planHandoff } from "./handoff.js";

export type BootstrapOptions = {
  ctx: ExecutionContext;
  ops: SystemOperations;
  config: BootstrapConfig;
  out: ConsoleOutput;
};

export type BootstrapOutcome = {
  state: TerminalState;
  handoff: Handoff;
  /** Present when this pass ran elevated */
  database?: Result<DatabaseStartResult, DatabaseWarning>;
  /** Absent when the pass ends in a re-exec */
  activation?: ActivationResult;
};

export type BootstrapError =
  | { kind: "identity"; error: IdentityError }
  | { kind: "activation"; error: ActivationError };

export async function bootstrap(
  options: BootstrapOptions,
): Promise<Result<BootstrapOutcome, BootstrapError>> {
  const { ctx, ops, config, out } = options;

  let state: BootstrapState = nextState("privilege_gate", ctx);
  let database: Result<DatabaseStartResult, DatabaseWarning> | undefined;

  if (state === "elevated_entry") {
    // ── Database ──────────────────────────────────────────────────────
    if (!config.skipDb) out.info(`starting database in ${config.dataDir}`);
    database = await startDatabase({
      ops,
      dataDir: config.dataDir,
      role: config.dbRole,
      skip: config.skipDb,
    });
    if (!database.ok) {
      out.warn(`failed to launch db, continuing without it (${database.error.step}: ${database.error.message})`);
    } else if (database.value.initialized) {
      out.info(`initialized database storage in ${config.dataDir}`);
    }

    // ── Identity ──────────────────────────────────────────────────────
    const decision = mapErr(
      await reconcileIdentity({ ctx, ops, runnerUser: config.runnerUser }),
      (error): BootstrapError => ({ kind: "identity", error }),
    );
    if (!decision.ok) return decision;

    if (decision.value.kind === "reexec") {
      const { account, remapped } = decision.value;
      if (remapped) out.info(`remapped ${account.name} to uid ${account.uid}, gid ${account.gid}`);
      out.info(`dropping privileges to ${account.name}`);
      return ok({
        state: "reexec",
        database,
        handoff: {
          kind: "exec",
          argv: [...ctx.self, ...ctx.args],
          identity: { uid: account.uid, gid: account.gid },
          env: { ...ctx.env, HOME: account.home, USER: account.name, LOGNAME: account.name },
        },
      });
    }

    out.warn("running as root: working directory is owned by root");
    state = "running_as_root";
  }

  // ── Environment ─────────────────────────────────────────────────────
  const activation = mapErr(
    await activateEnvironment({ ctx, ops, envRoot: config.envRoot }),
    (error): BootstrapError => ({ kind: "activation", error }),
  );
  if (!activation.ok) return activation;

  const { value } = activation;
  if (value.activated) {
    out.info(`activated ${config.envRoot}`);
    if (value.gdalData && value.gdalData.source !== "preset" && value.gdalData.source !== "unresolved") {
      out.info(`GDAL_DATA=${value.gdalData.path} (from ${value.gdalData.source})`);
    }
  }

  return ok({
    state: state === "running_as_root" ? "running_as_root" : "running_as_user",
    database,
    activation: value,
    handoff: planHandoff(ctx.args, value.env),
  });
}
