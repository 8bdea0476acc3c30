/**
 * Shared constants for cubestart.
 */

/** Administrative user id */
export const ROOT_UID = 0;

/** Account the database server runs as */
export const DB_SERVER_USER = "postgres";

/** Databases created alongside the role's own database */
export const EXTRA_DATABASES = ["datacube", "agdcintegration"] as const;

/** File whose presence means the storage directory is initialized */
export const DB_INIT_MARKER = "PG_VERSION";

/** Server log, kept inside the storage directory */
export const DB_LOG_FILE = "postgresql.log";

/** Integration config, written to the running account's home */
export const INTEGRATION_CONFIG_FILE = ".datacube_integration.conf";

/** Optional dependency groups installed with the project */
export const INSTALL_EXTRAS = ["test", "cf", "celery", "s3", "performance", "distributed"] as const;

/** Project manifest, relative to the working directory */
export const PROJECT_MANIFEST = "setup.py";

/** Test driver package, relative to the working directory */
export const TEST_DRIVER_DIR = "tests/drivers/fail_drivers";

/** Signals relayed to a handed-off child */
export const FORWARDED_SIGNALS = ["SIGINT", "SIGTERM", "SIGHUP", "SIGQUIT"] as const;

export const DEFAULTS = {
  skipDb: "no",
  dataDir: "/srv/postgresql",
  envRoot: "/env",
  runnerUser: "odc",
} as const;
