/**
 * cubestart core types.
 *
 * Process identity, accounts, configuration and the error shapes shared by
 * every stage of the bootstrap.
 */

// ── Identity ───────────────────────────────────────────────────────────

/** A numeric (uid, gid) pair, as carried by processes and inodes */
export type Ids = {
  uid: number;
  gid: number;
};

/** Effective identity of the running process */
export type ProcessIdentity = Ids;

/** Owner of the working directory at invocation time */
export type DirectoryOwner = Ids;

/** An OS account as listed in the passwd database */
export type Account = Ids & {
  name: string;
  home: string;
};

// ── Config ─────────────────────────────────────────────────────────────

export type BootstrapConfig = {
  /** Skip the local database entirely (SKIP_DB=yes) */
  skipDb: boolean;
  /** Database storage directory (PGDATA) */
  dataDir: string;
  /** Superuser role, also created as a database (DB_USERNAME) */
  dbRole: string;
  /** Virtual environment root probed for bin/activate (PYENV) */
  envRoot: string;
  /** Unprivileged account the container ends up running as (RUNNER_USER) */
  runnerUser: string;
};

/** Environment map, as handed to children */
export type Env = Readonly<Record<string, string | undefined>>;

// ── Errors ─────────────────────────────────────────────────────────────

export type NotFoundError = { kind: "not_found"; path: string };
export type PermissionDeniedError = { kind: "permission_denied"; path: string; operation: string };
export type IOError = { kind: "io_error"; path: string; message: string };
export type AccountNotFoundError = { kind: "account_not_found"; name: string };

/** An external command ran but exited non-zero (or died on a signal) */
export type CommandFailedError = {
  kind: "command_failed";
  command: string;
  exitCode: number | null;
  stderr: string;
};

export type FileSystemError = NotFoundError | PermissionDeniedError | IOError;

/** Everything `SystemOperations.run` can return */
export type RunError = NotFoundError | PermissionDeniedError | CommandFailedError | IOError;

/** One-line description of any system error */
export function describeError(
  e: FileSystemError | AccountNotFoundError | CommandFailedError,
): string {
  switch (e.kind) {
    case "not_found":
      return `${e.path}: not found`;
    case "permission_denied":
      return `${e.path}: permission denied (${e.operation})`;
    case "io_error":
      return e.path ? `${e.path}: ${e.message}` : e.message;
    case "account_not_found":
      return `no such account: ${e.name}`;
    case "command_failed": {
      const status = e.exitCode === null ? "was killed" : `exited ${e.exitCode}`;
      const detail = e.stderr.trim();
      return detail ? `${e.command} ${status}: ${detail}` : `${e.command} ${status}`;
    }
  }
}
