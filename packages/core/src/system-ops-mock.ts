/**
 * Mock SystemOperations for testing.
 *
 * Keeps an in-memory file table and passwd database, runs scripted
 * command handlers, and records every mutation and command for assertion.
 */

import { resolve } from "node:path";
import type { CommandOutput, ExecRequest, RunOptions, SystemOperations } from "./system-ops.js";
import type {
  Account,
  AccountNotFoundError,
  DirectoryOwner,
  FileSystemError,
  IOError,
  Ids,
  RunError,
} from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

/** Records what the mock *did* */
export type RecordedOp =
  | { kind: "write"; path: string }
  | { kind: "mkdir"; path: string }
  | { kind: "chown"; path: string; owner: Ids }
  | { kind: "chown_recursive"; path: string; owner: { user: string; group: string } }
  | { kind: "run"; command: string; args: string[]; options: RunOptions }
  | { kind: "exec"; request: ExecRequest };

/** Decides the outcome of a scripted command; may mutate the mock */
export type CommandHandler = (
  args: string[],
  options: RunOptions,
) => Result<CommandOutput, RunError>;

type MockEntry = {
  content: string;
  owner: DirectoryOwner;
};

export class MockSystemOps implements SystemOperations {
  public readonly cwd: string;
  private files: Map<string, MockEntry> = new Map();
  private accounts: Map<string, Account> = new Map();
  private handlers: Map<string, CommandHandler> = new Map();
  public ops: RecordedOp[] = [];

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  private resolve(path: string): string {
    return resolve(this.cwd, path);
  }

  /** Add a simulated file or directory */
  addFile(path: string, content = "", owner: DirectoryOwner = { uid: 0, gid: 0 }): void {
    this.files.set(this.resolve(path), { content, owner: { ...owner } });
  }

  /** Add a simulated passwd entry */
  addAccount(account: Account): void {
    this.accounts.set(account.name, { ...account });
  }

  /** Current state of a simulated account */
  account(name: string): Account | undefined {
    return this.accounts.get(name);
  }

  /** Content of a simulated file */
  fileContent(path: string): string | undefined {
    return this.files.get(this.resolve(path))?.content;
  }

  /** Script the outcome of a command (matched on argv[0]) */
  onCommand(command: string, handler: CommandHandler): void {
    this.handlers.set(command, handler);
  }

  /** Commands run so far, as argv arrays */
  get commands(): string[][] {
    return this.ops.flatMap((op) => (op.kind === "run" ? [[op.command, ...op.args]] : []));
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    return ok(this.files.has(this.resolve(path)));
  }

  async ownerOf(path: string): Promise<Result<DirectoryOwner, FileSystemError>> {
    const entry = this.files.get(this.resolve(path));
    if (!entry) return err({ kind: "not_found", path });
    return ok({ ...entry.owner });
  }

  async writeFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const full = this.resolve(path);
    const previous = this.files.get(full);
    this.files.set(full, { content, owner: previous?.owner ?? { uid: 1000, gid: 1000 } });
    this.ops.push({ kind: "write", path });
    return ok(undefined);
  }

  async mkdir(path: string): Promise<Result<void, FileSystemError>> {
    const full = this.resolve(path);
    if (!this.files.has(full)) {
      this.files.set(full, { content: "", owner: { uid: 0, gid: 0 } });
    }
    this.ops.push({ kind: "mkdir", path });
    return ok(undefined);
  }

  async chown(path: string, owner: Ids): Promise<Result<void, FileSystemError>> {
    const entry = this.files.get(this.resolve(path));
    if (!entry) return err({ kind: "not_found", path });
    entry.owner = { ...owner };
    this.ops.push({ kind: "chown", path, owner });
    return ok(undefined);
  }

  async chownRecursive(
    path: string,
    owner: { user: string; group: string },
  ): Promise<Result<void, RunError>> {
    if (!this.files.has(this.resolve(path))) return err({ kind: "not_found", path });
    this.ops.push({ kind: "chown_recursive", path, owner });
    return ok(undefined);
  }

  async lookupAccount(name: string): Promise<Result<Account, AccountNotFoundError | IOError>> {
    const account = this.accounts.get(name);
    if (!account) return err({ kind: "account_not_found", name });
    return ok({ ...account });
  }

  /**
   * Scripted commands use their handler; `groupmod` and `usermod` update
   * the passwd table; anything else succeeds with empty output.
   */
  async run(
    command: string,
    args: string[],
    options: RunOptions = {},
  ): Promise<Result<CommandOutput, RunError>> {
    this.ops.push({ kind: "run", command, args, options });

    const handler = this.handlers.get(command);
    if (handler) return handler(args, options);

    if (command === "groupmod" || command === "usermod") {
      return this.applyAccountChange(command, args);
    }
    return ok({ stdout: "", stderr: "" });
  }

  /**
   * A handler scripted for argv[0] decides the outcome: success exits 0,
   * a failed command exits with its status, other errors mean the program
   * could not be started. Unscripted programs exit 0.
   */
  async replaceProcess(request: ExecRequest): Promise<Result<number, RunError>> {
    this.ops.push({ kind: "exec", request });

    const [command, ...args] = request.argv;
    const handler = command === undefined ? undefined : this.handlers.get(command);
    if (!handler) return ok(0);

    const result = handler(args, { env: request.env });
    if (result.ok) return ok(0);
    if (result.error.kind === "command_failed") return ok(result.error.exitCode ?? 1);
    return result;
  }

  private applyAccountChange(command: string, args: string[]): Result<CommandOutput, RunError> {
    const name = args[args.length - 1];
    const account = name === undefined ? undefined : this.accounts.get(name);
    if (!account) {
      return err({ kind: "command_failed", command, exitCode: 6, stderr: `user '${name}' does not exist` });
    }

    const flag = (f: string): number | undefined => {
      const i = args.indexOf(f);
      const value = i >= 0 ? args[i + 1] : undefined;
      return value === undefined ? undefined : Number(value);
    };

    // groupmod -g sets the group's id, which is the account's primary group here
    const gid = flag("-g");
    if (gid !== undefined) account.gid = gid;
    if (command === "usermod") {
      const uid = flag("-u");
      if (uid !== undefined) account.uid = uid;
    }
    return ok({ stdout: "", stderr: "" });
  }
}
