/**
 * CLI command: cubestart [command...]
 */

import type { ConsoleOutput } from "../console.js";
import type { BootstrapError, BootstrapOptions } from "../bootstrap.js";
import { bootstrap } from "../bootstrap.js";
import type { IdentityError } from "../identity.js";
import type { ActivationError } from "../environment.js";
import type { RunError } from "../types.js";
import { describeError } from "../types.js";

/** Exit statuses a shell uses when it cannot run a command */
const EXIT_NOT_FOUND = 127;
const EXIT_NOT_EXECUTABLE = 126;

function formatIdentityError(e: IdentityError): string {
  switch (e.kind) {
    case "lookup_failed":
      return `cannot look up ${e.user}: ${describeError(e.error)}`;
    case "remap_failed":
      return `cannot remap ${e.user} (${e.step}): ${describeError(e.error)}`;
  }
}

function formatActivationError(e: ActivationError): string {
  switch (e.kind) {
    case "config_write_failed":
      return `cannot write ${e.path}: ${describeError(e.error)}`;
    case "probe_failed":
      return `cannot check ${e.path}: ${describeError(e.error)}`;
    case "install_failed":
      return `install of ${e.target} failed: ${describeError(e.error)}`;
  }
}

export function formatBootstrapError(e: BootstrapError): string {
  return e.kind === "identity" ? formatIdentityError(e.error) : formatActivationError(e.error);
}

function execFailureStatus(e: RunError): number {
  return e.kind === "not_found" ? EXIT_NOT_FOUND : EXIT_NOT_EXECUTABLE;
}

export class BootstrapCommand {
  constructor(
    private options: BootstrapOptions,
    private out: ConsoleOutput,
  ) {}

  /** Returns the status the process must exit with */
  async execute(): Promise<number> {
    const result = await bootstrap(this.options);

    if (!result.ok) {
      this.out.error(formatBootstrapError(result.error));
      return 1;
    }

    const { handoff } = result.value;
    if (handoff.kind === "exit") return handoff.code;

    const { kind: _kind, ...request } = handoff;
    const replaced = await this.options.ops.replaceProcess(request);
    if (!replaced.ok) {
      this.out.error(`cannot run ${request.argv[0] ?? ""}: ${describeError(replaced.error)}`);
      return execFailureStatus(replaced.error);
    }
    return replaced.value;
  }
}
