/**
 * Tests for NodeSystemOps: local tests that don't require root.
 *
 * Commands are run through the current Node.js binary so nothing outside
 * the test machine's own runtime is needed. chown, lookupAccount and the
 * uid/gid options need root and real accounts and are not covered here.
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, readFile, rm, mkdir, stat, realpath } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NodeSystemOps, parsePasswdLine, relayedSignals } from "./system-ops-node.js";

const NODE = process.execPath;

let workspace: string;
let ops: NodeSystemOps;

beforeEach(async () => {
  workspace = await realpath(await mkdtemp(join(tmpdir(), "cubestart-test-")));
  ops = new NodeSystemOps(workspace);
});

afterEach(async () => {
  await rm(workspace, { recursive: true, force: true });
});

describe("NodeSystemOps", () => {
  // ── exists ──────────────────────────────────────────────────────────

  describe("exists", () => {
    test("true for an existing relative path", async () => {
      await writeFile(join(workspace, "setup.py"), "");
      expect(await ops.exists("setup.py")).toEqual({ ok: true, value: true });
    });

    test("false for a missing absolute path", async () => {
      expect(await ops.exists(join(workspace, "nope"))).toEqual({ ok: true, value: false });
    });

    test("false for a path that runs through a regular file", async () => {
      await writeFile(join(workspace, "tests"), "");
      expect(await ops.exists("tests/drivers/fail_drivers/setup.py")).toEqual({ ok: true, value: false });
    });
  });

  // ── ownerOf ─────────────────────────────────────────────────────────

  describe("ownerOf", () => {
    test("returns the numeric owner", async () => {
      const s = await stat(workspace);

      const result = await ops.ownerOf(".");
      expect(result).toEqual({ ok: true, value: { uid: s.uid, gid: s.gid } });
    });

    test("returns not_found for a missing path", async () => {
      const result = await ops.ownerOf("missing");
      expect(result).toEqual({ ok: false, error: { kind: "not_found", path: "missing" } });
    });
  });

  // ── writeFile / mkdir ───────────────────────────────────────────────

  describe("writeFile", () => {
    test("creates parent directories and replaces content", async () => {
      expect((await ops.writeFile("home/.conf", "first\n")).ok).toBe(true);
      expect((await ops.writeFile("home/.conf", "second\n")).ok).toBe(true);

      expect(await readFile(join(workspace, "home", ".conf"), "utf-8")).toBe("second\n");
    });
  });

  describe("mkdir", () => {
    test("creates nested directories and tolerates existing ones", async () => {
      expect((await ops.mkdir("a/b/c")).ok).toBe(true);
      expect((await ops.mkdir("a/b/c")).ok).toBe(true);
      expect((await stat(join(workspace, "a", "b", "c"))).isDirectory()).toBe(true);
    });
  });

  // ── run ─────────────────────────────────────────────────────────────

  describe("run", () => {
    test("captures stdout and stderr", async () => {
      const result = await ops.run(NODE, [
        "-e",
        "process.stdout.write('out'); process.stderr.write('err')",
      ]);
      expect(result).toEqual({ ok: true, value: { stdout: "out", stderr: "err" } });
    });

    test("non-zero exit is command_failed", async () => {
      const result = await ops.run(NODE, ["-e", "process.stderr.write('bad'); process.exit(3)"]);
      expect(result).toEqual({
        ok: false,
        error: { kind: "command_failed", command: NODE, exitCode: 3, stderr: "bad" },
      });
    });

    test("missing binary is not_found", async () => {
      const result = await ops.run("cubestart-no-such-binary", []);
      expect(result).toEqual({
        ok: false,
        error: { kind: "not_found", path: "cubestart-no-such-binary" },
      });
    });

    test("passes env and runs in the working directory", async () => {
      const result = await ops.run(
        NODE,
        ["-e", "process.stdout.write(process.env.PROBE + ' ' + process.cwd())"],
        { env: { PROBE: "yes" } },
      );
      expect(result.ok && result.value.stdout).toBe(`yes ${workspace}`);
    });

    test("resolves a relative cwd against the working directory", async () => {
      await mkdir(join(workspace, "sub"));

      const result = await ops.run(NODE, ["-e", "process.stdout.write(process.cwd())"], { cwd: "sub" });
      expect(result.ok && result.value.stdout).toBe(join(workspace, "sub"));
    });
  });

  // ── replaceProcess ──────────────────────────────────────────────────

  describe("replaceProcess", () => {
    test("resolves with the child's exit status", async () => {
      const result = await ops.replaceProcess({ argv: [NODE, "-e", "process.exit(5)"], env: {} });
      expect(result).toEqual({ ok: true, value: 5 });
    });

    test("passes argv through unchanged", async () => {
      const out = join(workspace, "argv.json");
      const script = "require('fs').writeFileSync(process.argv[1], JSON.stringify(process.argv.slice(2)))";

      const result = await ops.replaceProcess({
        argv: [NODE, "-e", script, out, "-k", "foo bar", "--"],
        env: {},
      });
      expect(result).toEqual({ ok: true, value: 0 });
      expect(JSON.parse(await readFile(out, "utf-8"))).toEqual(["-k", "foo bar", "--"]);
    });

    test("missing binary is not_found", async () => {
      const result = await ops.replaceProcess({ argv: ["cubestart-no-such-binary"], env: {} });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("not_found");
    });

    test("a child killed by a signal reports 128 plus its number", async () => {
      const result = await ops.replaceProcess({ argv: ["sh", "-c", "kill -TERM $$"], env: {} });
      expect(result).toEqual({ ok: true, value: 143 });
    });

    test("relays SIGTERM to the child and detaches afterwards", async () => {
      const ready = join(workspace, "ready");
      const script = [
        "process.on('SIGTERM', () => process.exit(7));",
        "require('fs').writeFileSync(process.argv[1], '');",
        "setInterval(() => {}, 1000);",
      ].join(" ");
      const isReady = async (): Promise<boolean> => {
        const result = await ops.exists(ready);
        return result.ok && result.value;
      };
      const before = process.listenerCount("SIGTERM");

      const pending = ops.replaceProcess({ argv: [NODE, "-e", script, ready], env: {} });
      while (!(await isReady())) {
        await new Promise<void>((r) => setTimeout(r, 20));
      }
      expect(process.listenerCount("SIGTERM")).toBe(before + 1);
      process.emit("SIGTERM", "SIGTERM");

      expect(await pending).toEqual({ ok: true, value: 7 });
      expect(process.listenerCount("SIGTERM")).toBe(before);
    });

    test("empty argv is rejected", async () => {
      const result = await ops.replaceProcess({ argv: [], env: {} });
      expect(result).toEqual({ ok: false, error: { kind: "io_error", path: "", message: "empty command" } });
    });
  });
});

describe("relayedSignals", () => {
  test("relays every forwarded signal without a terminal", () => {
    expect(relayedSignals(false)).toEqual(["SIGINT", "SIGTERM", "SIGHUP", "SIGQUIT"]);
  });

  test("leaves keyboard signals to the terminal", () => {
    expect(relayedSignals(true)).toEqual(["SIGTERM", "SIGHUP"]);
  });
});

describe("parsePasswdLine", () => {
  test("parses a passwd entry", () => {
    expect(parsePasswdLine("odc:x:1000:1000:,,,:/home/odc:/bin/bash\n")).toEqual({
      name: "odc",
      uid: 1000,
      gid: 1000,
      home: "/home/odc",
    });
  });

  test("rejects malformed entries", () => {
    expect(parsePasswdLine("")).toBeUndefined();
    expect(parsePasswdLine("odc:x:abc:1000::/home/odc:/bin/sh")).toBeUndefined();
    expect(parsePasswdLine("odc:x:1000:1000")).toBeUndefined();
  });
});
