/**
 * NodeSystemOps: real OS-level operations via Node.js APIs.
 *
 * Maps errno codes to typed Result errors. Node.js has no execve, so
 * process replacement runs the target as a child with inherited stdio,
 * relays signals to it and reports its status for the caller to exit with.
 */

import { resolve, dirname } from "node:path";
import {
  stat as fsStat,
  writeFile as fsWriteFile,
  mkdir as fsMkdir,
  chown as fsChown,
  access,
} from "node:fs/promises";
import { spawn } from "node:child_process";
import { constants } from "node:os";
import type { CommandOutput, ExecRequest, RunOptions, SystemOperations } from "./system-ops.js";
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
import { ok, err } from "./result.js";
import { FORWARDED_SIGNALS } from "./constants.js";

/** Map Node.js errno to our typed errors */
function mapError(e: unknown, path: string, operation: string): FileSystemError {
  if (e instanceof Error && "code" in e) {
    const code = e.code;
    if (code === "ENOENT") return { kind: "not_found", path };
    if (code === "EACCES" || code === "EPERM") {
      return { kind: "permission_denied", path, operation };
    }
  }
  const message = e instanceof Error ? e.message : String(e);
  return { kind: "io_error", path, message };
}

const TERMINAL_SIGNALS = new Set<NodeJS.Signals>(["SIGINT", "SIGQUIT"]);

const ABSENT_CODES = new Set(["ENOENT", "ENOTDIR", "EACCES", "ELOOP"]);

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Exit status a shell reports for a child killed by `signal` */
function signalStatus(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/**
 * Signals to pass on to a handed-off child. With a terminal attached the
 * keyboard signals already reach the whole foreground process group, so
 * relaying them would deliver each one twice.
 */
export function relayedSignals(interactive: boolean): readonly NodeJS.Signals[] {
  return FORWARDED_SIGNALS.filter((signal) => !interactive || !TERMINAL_SIGNALS.has(signal));
}

function childEnv(env: Env): NodeJS.ProcessEnv {
  return { ...env };
}

function idsOption(ids: Ids | undefined): { uid?: number; gid?: number } {
  return ids ? { uid: ids.uid, gid: ids.gid } : {};
}

/** Parse one `getent passwd` line: name:pw:uid:gid:gecos:home:shell */
export function parsePasswdLine(line: string): Account | undefined {
  const fields = line.trim().split(":");
  if (fields.length < 7) return undefined;
  const [name, , uid, gid, , home] = fields;
  if (!name || !home || !/^\d+$/.test(uid ?? "") || !/^\d+$/.test(gid ?? "")) return undefined;
  return { name, uid: Number(uid), gid: Number(gid), home };
}

export class NodeSystemOps implements SystemOperations {
  public readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = resolve(cwd);
  }

  private resolvePath(path: string): string {
    return resolve(this.cwd, path);
  }

  async exists(path: string): Promise<Result<boolean, IOError>> {
    try {
      await access(this.resolvePath(path));
      return ok(true);
    } catch (e) {
      // Unreachable counts as absent, like `test -e`
      if (e instanceof Error && "code" in e && typeof e.code === "string" && ABSENT_CODES.has(e.code)) {
        return ok(false);
      }
      return err({
        kind: "io_error",
        path,
        message: `exists: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  async ownerOf(path: string): Promise<Result<DirectoryOwner, FileSystemError>> {
    try {
      const s = await fsStat(this.resolvePath(path));
      return ok({ uid: s.uid, gid: s.gid });
    } catch (e) {
      return err(mapError(e, path, "stat"));
    }
  }

  async writeFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const full = this.resolvePath(path);
    try {
      await fsMkdir(dirname(full), { recursive: true });
      await fsWriteFile(full, content, "utf-8");
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "writeFile"));
    }
  }

  async mkdir(path: string): Promise<Result<void, FileSystemError>> {
    try {
      await fsMkdir(this.resolvePath(path), { recursive: true });
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "mkdir"));
    }
  }

  async chown(path: string, owner: Ids): Promise<Result<void, FileSystemError>> {
    try {
      await fsChown(this.resolvePath(path), owner.uid, owner.gid);
      return ok(undefined);
    } catch (e) {
      return err(mapError(e, path, "chown"));
    }
  }

  async chownRecursive(
    path: string,
    owner: { user: string; group: string },
  ): Promise<Result<void, RunError>> {
    const result = await this.run("chown", ["-R", `${owner.user}:${owner.group}`, this.resolvePath(path)]);
    return result.ok ? ok(undefined) : result;
  }

  async lookupAccount(name: string): Promise<Result<Account, AccountNotFoundError | IOError>> {
    const result = await this.run("getent", ["passwd", name]);
    if (!result.ok) {
      // getent exits 2 when the key is unknown
      if (result.error.kind === "command_failed" && result.error.exitCode === 2) {
        return err({ kind: "account_not_found", name });
      }
      const message =
        result.error.kind === "command_failed" ? result.error.stderr.trim() : result.error.kind;
      return err({ kind: "io_error", path: "", message: `lookupAccount(${name}): ${message}` });
    }

    const account = parsePasswdLine(result.value.stdout.split("\n")[0] ?? "");
    if (!account) {
      return err({ kind: "io_error", path: "", message: `lookupAccount(${name}): malformed passwd entry` });
    }
    return ok(account);
  }

  run(
    command: string,
    args: string[],
    options: RunOptions = {},
  ): Promise<Result<CommandOutput, RunError>> {
    const { env = process.env, asUser, cwd, passthrough = false } = options;

    return new Promise((settle) => {
      const child = spawn(command, args, {
        cwd: cwd === undefined ? this.cwd : this.resolvePath(cwd),
        env: childEnv(env),
        stdio: passthrough ? ["ignore", "inherit", "inherit"] : ["ignore", "pipe", "pipe"],
        ...idsOption(asUser),
      });

      let stdout = "";
      let stderr = "";
      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf-8");
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf-8");
      });

      child.on("error", (e) => settle(err(mapError(e, command, "spawn"))));
      child.on("close", (code) => {
        if (code === 0) {
          settle(ok({ stdout, stderr }));
        } else {
          settle(err({ kind: "command_failed", command, exitCode: code, stderr }));
        }
      });
    });
  }

  replaceProcess(request: ExecRequest): Promise<Result<number, RunError>> {
    const [command, ...args] = request.argv;
    if (command === undefined) {
      return Promise.resolve(err({ kind: "io_error", path: "", message: "empty command" }));
    }

    return new Promise((settle) => {
      const child = spawn(command, args, {
        cwd: this.cwd,
        env: childEnv(request.env),
        stdio: "inherit",
        ...idsOption(request.identity),
      });

      const relayed = relayedSignals(process.stdin.isTTY === true);
      // Every forwarded signal gets a listener so this process outlives the child
      const listeners = FORWARDED_SIGNALS.map((signal) => {
        const listener = (): void => {
          if (relayed.includes(signal)) child.kill(signal);
        };
        process.on(signal, listener);
        return { signal, listener };
      });

      const detach = (): void => {
        for (const { signal, listener } of listeners) process.off(signal, listener);
      };

      child.on("error", (e) => {
        detach();
        settle(err(mapError(e, command, "exec")));
      });
      child.on("exit", (code, signal) => {
        detach();
        settle(ok(code ?? (signal ? signalStatus(signal) : 1)));
      });
    });
  }
}
