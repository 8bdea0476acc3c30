/**
 * GDAL data directory discovery.
 *
 * Fallback chain: a preset GDAL_DATA wins; then the `gdal_data` directory
 * shipped beside the installed rasterio package; then `gdal-config`.
 * Failing all three leaves GDAL_DATA unset.
 */

import { join } from "node:path";
import type { SystemOperations } from "./system-ops.js";
import type { Env } from "./types.js";

export type GdalDataResolution =
  | { source: "preset" | "rasterio" | "gdal-config"; path: string }
  | { source: "unresolved" };

/** Prints the directory of the installed rasterio package */
export const RASTERIO_PROBE = "import os, rasterio; print(os.path.dirname(rasterio.__file__))";

export type GdalDataOptions = {
  ops: SystemOperations;
  env: Env;
  /** Interpreter of the active environment */
  python: string;
};

export async function resolveGdalData(options: GdalDataOptions): Promise<GdalDataResolution> {
  const { ops, env, python } = options;

  const preset = env.GDAL_DATA;
  if (preset) return { source: "preset", path: preset };

  const probe = await ops.run(python, ["-c", RASTERIO_PROBE], { env });
  if (probe.ok) {
    const packageDir = probe.value.stdout.trim();
    if (packageDir) {
      const candidate = join(packageDir, "gdal_data");
      const found = await ops.exists(candidate);
      if (found.ok && found.value) return { source: "rasterio", path: candidate };
    }
  }

  const config = await ops.run("gdal-config", ["--datadir"], { env });
  if (config.ok) {
    const dataDir = config.value.stdout.trim();
    if (dataDir) return { source: "gdal-config", path: dataDir };
  }

  return { source: "unresolved" };
}
