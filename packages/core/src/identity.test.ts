import { describe, expect, test } from "vitest";
import { MockSystemOps } from "./system-ops-mock.js";
import { reconcileIdentity } from "./identity.js";
import type { ExecutionContext } from "./context.js";
import { err } from "./result.js";

const RUNNER = { name: "odc", uid: 1000, gid: 1000, home: "/home/odc" };

function makeCtx(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    identity: { uid: 0, gid: 0 },
    cwd: "/code",
    cwdOwner: { uid: 1001, gid: 1002 },
    env: { HOME: "/root" },
    home: "/root",
    self: ["/usr/local/bin/node", "/opt/cubestart/cli.js"],
    args: [],
    ...overrides,
  };
}

function setup(): MockSystemOps {
  const ops = new MockSystemOps("/code");
  ops.addAccount(RUNNER);
  ops.addFile("/home/odc", "", { uid: 1000, gid: 1000 });
  return ops;
}

describe("reconcileIdentity", () => {
  test("root-owned directory needs no mapping", async () => {
    const ops = setup();

    const result = await reconcileIdentity({
      ctx: makeCtx({ cwdOwner: { uid: 0, gid: 0 } }),
      ops,
      runnerUser: "odc",
    });
    expect(result).toEqual({ ok: true, value: { kind: "run_as_root" } });
    expect(ops.ops).toEqual([]);
  });

  test("remaps the runner onto the directory owner", async () => {
    const ops = setup();

    const result = await reconcileIdentity({ ctx: makeCtx(), ops, runnerUser: "odc" });
    expect(result).toEqual({
      ok: true,
      value: {
        kind: "reexec",
        account: { name: "odc", uid: 1001, gid: 1002, home: "/home/odc" },
        remapped: true,
      },
    });
    expect(ops.commands).toEqual([
      ["groupmod", "-o", "-g", "1002", "odc"],
      ["usermod", "-o", "-u", "1001", "-g", "1002", "odc"],
    ]);
    expect(ops.ops[ops.ops.length - 1]).toEqual({
      kind: "chown_recursive",
      path: "/home/odc",
      owner: { user: "odc", group: "odc" },
    });
    expect(ops.account("odc")).toEqual({ name: "odc", uid: 1001, gid: 1002, home: "/home/odc" });
  });

  test("matching ids still re-exec, without mutation", async () => {
    const ops = setup();

    const result = await reconcileIdentity({
      ctx: makeCtx({ cwdOwner: { uid: 1000, gid: 1000 } }),
      ops,
      runnerUser: "odc",
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({ kind: "reexec", account: RUNNER, remapped: false });
    expect(ops.ops).toEqual([]);
  });

  test("a gid-only difference is remapped", async () => {
    const ops = setup();

    const result = await reconcileIdentity({
      ctx: makeCtx({ cwdOwner: { uid: 1000, gid: 50 } }),
      ops,
      runnerUser: "odc",
    });
    expect(result.ok && result.value.kind === "reexec" && result.value.remapped).toBe(true);
    expect(ops.account("odc")?.gid).toBe(50);
  });

  test("unknown runner account is an error", async () => {
    const ops = new MockSystemOps("/code");

    const result = await reconcileIdentity({ ctx: makeCtx(), ops, runnerUser: "odc" });
    expect(result).toEqual({
      ok: false,
      error: { kind: "lookup_failed", user: "odc", error: { kind: "account_not_found", name: "odc" } },
    });
  });

  test("a failed groupmod stops before usermod", async () => {
    const ops = setup();
    const failure = { kind: "command_failed" as const, command: "groupmod", exitCode: 10, stderr: "cannot lock" };
    ops.onCommand("groupmod", () => err(failure));

    const result = await reconcileIdentity({ ctx: makeCtx(), ops, runnerUser: "odc" });
    expect(result).toEqual({
      ok: false,
      error: { kind: "remap_failed", user: "odc", step: "groupmod", error: failure },
    });
    expect(ops.commands).toEqual([["groupmod", "-o", "-g", "1002", "odc"]]);
  });

  test("a missing home directory fails the chown step", async () => {
    const ops = new MockSystemOps("/code");
    ops.addAccount(RUNNER);

    const result = await reconcileIdentity({ ctx: makeCtx(), ops, runnerUser: "odc" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      kind: "remap_failed",
      user: "odc",
      step: "chown",
      error: { kind: "not_found", path: "/home/odc" },
    });
  });
});
