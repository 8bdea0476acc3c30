#!/usr/bin/env node
/**
 * cubestart CLI entry point.
 *
 * Takes no options of its own: every argument is the command to hand off
 * to once the container is bootstrapped.
 */

import { Command } from "commander";
import { LiveConsoleOutput } from "./console-live.js";
import { BootstrapCommand } from "./cli/bootstrap-command.js";
import { NodeSystemOps } from "./system-ops-node.js";
import { captureContext } from "./context.js";
import { loadConfig } from "./config.js";
import { describeError } from "./types.js";

const program = new Command()
  .name("cubestart")
  .description("Bootstrap an integration-test container, then run a command")
  .helpOption(false)
  .allowUnknownOption()
  .allowExcessArguments()
  .passThroughOptions()
  .argument("[command...]", "command to run once bootstrapped")
  .action(async (command: string[]) => {
    const out = new LiveConsoleOutput();
    const ops = new NodeSystemOps(process.cwd());

    const ctx = await captureContext(ops, command);
    if (!ctx.ok) {
      out.error(`cannot inspect working directory: ${describeError(ctx.error)}`);
      process.exitCode = 1;
      return;
    }

    const config = loadConfig(ctx.value.env);
    const cmd = new BootstrapCommand({ ctx: ctx.value, ops, config, out }, out);
    // Exit at once, as an exec'd program would leave no handlers behind
    process.exit(await cmd.execute());
  });

await program.parseAsync();
