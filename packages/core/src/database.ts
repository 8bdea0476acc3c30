/**
 * Local database startup: initialize storage once, start the server,
 * ensure the test role and databases exist.
 *
 * Idempotent: the storage directory is only initialized when its marker
 * file is missing. Role and database creation fail on every run after the
 * first; any failure in this stage ends it with a single warning and the
 * bootstrap carries on without a database.
 */

import { join } from "node:path";
import type { SystemOperations } from "./system-ops.js";
import type { Account } from "./types.js";
import { describeError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";
import { DB_INIT_MARKER, DB_LOG_FILE, DB_SERVER_USER, EXTRA_DATABASES } from "./constants.js";

export type DatabaseStep =
  | "lookup_server_account"
  | "check_storage"
  | "prepare_storage"
  | "initialize_storage"
  | "start_server"
  | "create_role"
  | "create_database";

/** Stage failure, reported and then ignored */
export type DatabaseWarning = {
  step: DatabaseStep;
  message: string;
};

export type DatabaseStartResult = {
  skipped: boolean;
  /** Whether the storage directory was initialized on this run */
  initialized: boolean;
};

export type DatabaseOptions = {
  ops: SystemOperations;
  dataDir: string;
  role: string;
  skip: boolean;
};

function warning(step: DatabaseStep, message: string): Result<never, DatabaseWarning> {
  return err({ step, message });
}

export async function startDatabase(
  options: DatabaseOptions,
): Promise<Result<DatabaseStartResult, DatabaseWarning>> {
  const { ops, dataDir, role, skip } = options;
  if (skip) return ok({ skipped: true, initialized: false });

  const serverResult = await ops.lookupAccount(DB_SERVER_USER);
  if (!serverResult.ok) {
    return warning("lookup_server_account", describeError(serverResult.error));
  }
  const server: Account = serverResult.value;

  // ── 1. Initialize storage ───────────────────────────────────────────
  let initialized = false;
  const marker = await ops.exists(join(dataDir, DB_INIT_MARKER));
  if (!marker.ok) return warning("check_storage", describeError(marker.error));

  if (!marker.value) {
    const mkdirResult = await ops.mkdir(dataDir);
    if (!mkdirResult.ok) return warning("prepare_storage", describeError(mkdirResult.error));
    const chownResult = await ops.chown(dataDir, { uid: server.uid, gid: server.gid });
    if (!chownResult.ok) return warning("prepare_storage", describeError(chownResult.error));

    const initResult = await ops.run(
      "initdb",
      ["-D", dataDir, "--encoding=UTF8", "--auth-host=md5"],
      { asUser: server },
    );
    if (!initResult.ok) return warning("initialize_storage", describeError(initResult.error));
    initialized = true;
  }

  // ── 2. Start server ─────────────────────────────────────────────────
  const startResult = await ops.run(
    "pg_ctl",
    ["-D", dataDir, "-l", join(dataDir, DB_LOG_FILE), "start"],
    { asUser: server },
  );
  if (!startResult.ok) return warning("start_server", describeError(startResult.error));

  // ── 3. Role and databases ───────────────────────────────────────────
  const roleResult = await ops.run("createuser", ["--superuser", role], { asUser: server });
  if (!roleResult.ok) return warning("create_role", describeError(roleResult.error));

  for (const database of [role, ...EXTRA_DATABASES]) {
    const dbResult = await ops.run("createdb", [database], { asUser: server });
    if (!dbResult.ok) {
      return warning("create_database", `${database}: ${describeError(dbResult.error)}`);
    }
  }

  return ok({ skipped: false, initialized });
}
