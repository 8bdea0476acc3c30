// Shared primitives
export type {
  Ids,
  ProcessIdentity,
  DirectoryOwner,
  Account,
  BootstrapConfig,
  Env,
  // Errors
  FileSystemError,
  NotFoundError,
  PermissionDeniedError,
  IOError,
  AccountNotFoundError,
  CommandFailedError,
  RunError,
} from "./types.js";
export { describeError } from "./types.js";

// Result (generic pattern)
export type { Result } from "./result.js";
export { ok, err, mapErr } from "./result.js";

// Config
export { bootstrapEnvSchema, parseBootstrapEnv } from "./schema.js";
export type { BootstrapEnv } from "./schema.js";
export { loadConfig } from "./config.js";
export { DEFAULTS, EXTRA_DATABASES, INSTALL_EXTRAS, INTEGRATION_CONFIG_FILE } from "./constants.js";

// System operations
export type { SystemOperations, RunOptions, CommandOutput, ExecRequest } from "./system-ops.js";
export { MockSystemOps } from "./system-ops-mock.js";
export type { RecordedOp, CommandHandler } from "./system-ops-mock.js";
export { NodeSystemOps, parsePasswdLine } from "./system-ops-node.js";

// Context + state machine
export { captureContext, currentIdentity, selfInvocation } from "./context.js";
export type { ExecutionContext } from "./context.js";
export { isElevated } from "./privilege.js";
export { nextState, resolveState, isTerminal } from "./state.js";
export type { BootstrapState, TerminalState, StateFacts } from "./state.js";

// Stages
export { startDatabase } from "./database.js";
export type { DatabaseOptions, DatabaseStartResult, DatabaseWarning, DatabaseStep } from "./database.js";
export { reconcileIdentity } from "./identity.js";
export type { IdentityDecision, IdentityError, IdentityOptions } from "./identity.js";
export { activateEnvironment, activatedEnv, renderIntegrationConfig } from "./environment.js";
export type { ActivationOptions, ActivationResult, ActivationError } from "./environment.js";
export { resolveGdalData, RASTERIO_PROBE } from "./geodata.js";
export type { GdalDataOptions, GdalDataResolution } from "./geodata.js";
export { planHandoff } from "./handoff.js";
export type { Handoff } from "./handoff.js";

// Sequencer
export { bootstrap } from "./bootstrap.js";
export type { BootstrapOptions, BootstrapOutcome, BootstrapError } from "./bootstrap.js";

// Console output
export type { ConsoleOutput } from "./console.js";
export { LiveConsoleOutput } from "./console-live.js";

// CLI commands
export { BootstrapCommand, formatBootstrapError } from "./cli/bootstrap-command.js";
