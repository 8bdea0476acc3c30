/**
 * Environment schema: runtime validation via Zod.
 *
 * Reads the raw bootstrap variables; defaults are applied by loadConfig,
 * which turns them into the canonical BootstrapConfig in types.ts.
 */

import { z } from "zod";

/** Empty strings behave like unset variables */
const optionalVar = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v === "" ? undefined : v));

export const bootstrapEnvSchema = z.object({
  SKIP_DB: optionalVar,
  PGDATA: optionalVar,
  DB_USERNAME: optionalVar,
  PYENV: optionalVar,
  RUNNER_USER: optionalVar,
});

export type BootstrapEnv = z.infer<typeof bootstrapEnvSchema>;

/**
 * Parse the bootstrap variables out of an environment map.
 * Unrelated variables are ignored.
 */
export function parseBootstrapEnv(raw: unknown): BootstrapEnv {
  return bootstrapEnvSchema.parse(raw);
}
