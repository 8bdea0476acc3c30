/**
 * Environment activation: runs under the final identity.
 *
 * 1. Overwrite the integration config in the home directory
 * 2. Activate the virtual environment unless one is already active
 * 3. On fresh activation only: install the project and test drivers,
 *    resolve GDAL_DATA
 */

import { join } from "node:path";
import type { ExecutionContext } from "./context.js";
import type { SystemOperations } from "./system-ops.js";
import type { Env, FileSystemError, IOError, RunError } from "./types.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";
import type { GdalDataResolution } from "./geodata.js";
import { resolveGdalData } from "./geodata.js";
import {
  INSTALL_EXTRAS,
  INTEGRATION_CONFIG_FILE,
  PROJECT_MANIFEST,
  TEST_DRIVER_DIR,
} from "./constants.js";

export type ActivationResult = {
  /** Environment for everything that runs after activation */
  env: Env;
  configPath: string;
  activated: boolean;
  /** Install targets, in install order */
  installed: string[];
  /** Only present when the environment was freshly activated */
  gdalData?: GdalDataResolution;
};

export type ActivationError =
  | { kind: "config_write_failed"; path: string; error: FileSystemError }
  | { kind: "probe_failed"; path: string; error: IOError }
  | { kind: "install_failed"; target: string; error: RunError };

export type ActivationOptions = {
  ctx: ExecutionContext;
  ops: SystemOperations;
  envRoot: string;
};

type Profile = {
  name: string;
  hostname: string;
  database: string;
  driver: string;
};

const PROFILES: readonly Profile[] = [
  { name: "datacube", hostname: "", database: "agdcintegration", driver: "default" },
  // Points at a driver that does not exist, for the negative-path tests
  { name: "no_such_driver_env", hostname: "", database: "agdcintegration", driver: "no_such_driver" },
];

/** The integration config, byte-for-byte identical on every run */
export function renderIntegrationConfig(): string {
  return PROFILES.map((p) =>
    [
      `[${p.name}]`,
      `db_hostname:${p.hostname ? ` ${p.hostname}` : ""}`,
      `db_database: ${p.database}`,
      `index_driver: ${p.driver}`,
    ].join("\n"),
  ).join("\n\n") + "\n";
}

/** Environment as `bin/activate` would leave it */
export function activatedEnv(env: Env, envRoot: string): Env {
  const bin = join(envRoot, "bin");
  const { PYTHONHOME: _pythonHome, ...rest } = env;
  return {
    ...rest,
    VIRTUAL_ENV: envRoot,
    PATH: env.PATH ? `${bin}:${env.PATH}` : bin,
  };
}

export async function activateEnvironment(
  options: ActivationOptions,
): Promise<Result<ActivationResult, ActivationError>> {
  const { ctx, ops, envRoot } = options;

  // ── 1. Integration config ───────────────────────────────────────────
  const configPath = join(ctx.home, INTEGRATION_CONFIG_FILE);
  const written = await ops.writeFile(configPath, renderIntegrationConfig());
  if (!written.ok) return err({ kind: "config_write_failed", path: configPath, error: written.error });

  // ── 2. Activation ───────────────────────────────────────────────────
  const marker = join(envRoot, "bin", "activate");
  const markerFound = await ops.exists(marker);
  if (!markerFound.ok) return err({ kind: "probe_failed", path: marker, error: markerFound.error });

  if (!markerFound.value || ctx.env.VIRTUAL_ENV) {
    return ok({ env: ctx.env, configPath, activated: false, installed: [] });
  }

  let env = activatedEnv(ctx.env, envRoot);
  const pip = join(envRoot, "bin", "pip");

  // ── 3. Installs ─────────────────────────────────────────────────────
  const targets: string[] = [];
  const manifest = await ops.exists(join(ctx.cwd, PROJECT_MANIFEST));
  if (!manifest.ok) return err({ kind: "probe_failed", path: PROJECT_MANIFEST, error: manifest.error });
  if (manifest.value) targets.push(`.[${INSTALL_EXTRAS.join(",")}]`);

  const driverManifest = join(TEST_DRIVER_DIR, PROJECT_MANIFEST);
  const drivers = await ops.exists(join(ctx.cwd, driverManifest));
  if (!drivers.ok) return err({ kind: "probe_failed", path: driverManifest, error: drivers.error });
  if (drivers.value) targets.push(TEST_DRIVER_DIR);

  for (const target of targets) {
    const install = await ops.run(pip, ["install", "--no-cache-dir", "-e", target], {
      env,
      cwd: ctx.cwd,
      passthrough: true,
    });
    if (!install.ok) return err({ kind: "install_failed", target, error: install.error });
  }

  // ── 4. GDAL data ────────────────────────────────────────────────────
  const gdalData = await resolveGdalData({ ops, env, python: join(envRoot, "bin", "python") });
  if (gdalData.source !== "unresolved") env = { ...env, GDAL_DATA: gdalData.path };

  return ok({ env, configPath, activated: true, installed: targets, gdalData });
}
