/**
 * SystemOperations: abstraction over every OS-level effect of the bootstrap.
 *
 * Relative paths resolve against the working directory given at
 * construction time; absolute paths are used as-is.
 * Each method declares exactly which errors it can return.
 */

import type {
  Account,
  AccountNotFoundError,
  DirectoryOwner,
  Env,
  FileSystemError,
  IOError,
  Ids,
  RunError,
} from "./types.js";
import type { Result } from "./result.js";

export type RunOptions = {
  /** Environment for the child (defaults to the current process environment) */
  env?: Env;
  /** Run the command under this account's uid/gid */
  asUser?: Account;
  /** Working directory for the child */
  cwd?: string;
  /** Stream output to this process's stdout/stderr instead of capturing it */
  passthrough?: boolean;
};

export type CommandOutput = {
  stdout: string;
  stderr: string;
};

/** Replace the running program with another one */
export type ExecRequest = {
  argv: string[];
  env: Env;
  /** Drop to these ids before running argv */
  identity?: Ids;
};

export interface SystemOperations {
  /** Working directory relative paths resolve against */
  readonly cwd: string;

  /** Check if a path exists */
  exists(path: string): Promise<Result<boolean, IOError>>;

  /** Numeric owner of a path */
  ownerOf(path: string): Promise<Result<DirectoryOwner, FileSystemError>>;

  /** Write content to a file, replacing it. Creates parent dirs if needed. */
  writeFile(path: string, content: string): Promise<Result<void, FileSystemError>>;

  /** Create a directory, including parents */
  mkdir(path: string): Promise<Result<void, FileSystemError>>;

  /** Change the numeric owner of a single path */
  chown(path: string, owner: Ids): Promise<Result<void, FileSystemError>>;

  /** Change ownership of a whole tree, by account and group name */
  chownRecursive(
    path: string,
    owner: { user: string; group: string },
  ): Promise<Result<void, RunError>>;

  /** Look up an account in the passwd database */
  lookupAccount(name: string): Promise<Result<Account, AccountNotFoundError | IOError>>;

  /** Run an external command to completion */
  run(command: string, args: string[], options?: RunOptions): Promise<Result<CommandOutput, RunError>>;

  /**
   * Hand the process over to another program: it inherits stdio and
   * receives our signals. Resolves with the status this process must exit
   * with, or with an error if the program could not be started.
   */
  replaceProcess(request: ExecRequest): Promise<Result<number, RunError>>;
}
