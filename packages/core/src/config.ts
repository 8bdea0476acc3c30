/**
 * Bootstrap configuration: built once from the environment, immutable after.
 */

import type { BootstrapConfig, Env } from "./types.js";
import { DEFAULTS } from "./constants.js";
import { parseBootstrapEnv } from "./schema.js";

export function loadConfig(env: Env): BootstrapConfig {
  const vars = parseBootstrapEnv(env);
  const runnerUser = vars.RUNNER_USER ?? DEFAULTS.runnerUser;

  return Object.freeze({
    skipDb: (vars.SKIP_DB ?? DEFAULTS.skipDb) === "yes",
    dataDir: vars.PGDATA ?? DEFAULTS.dataDir,
    dbRole: vars.DB_USERNAME ?? runnerUser,
    envRoot: vars.PYENV ?? DEFAULTS.envRoot,
    runnerUser,
  });
}
