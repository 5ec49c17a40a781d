import type { Config } from "../config.js";
import { log } from "../logger.js";
import { PgliteRepository } from "./pglite.js";
import { PostgresRepository } from "./postgres.js";
import type { Repository } from "./types.js";

export * from "./types.js";
export { PgliteRepository } from "./pglite.js";
export { PostgresRepository } from "./postgres.js";

type RepositoryConfig = Pick<Config, "DATABASE_URL" | "PGLITE_DATA_DIR" | "DATABASE_POOL_MAX">;

/**
 * PostgreSQL server when DATABASE_URL is set, embedded PGlite otherwise.
 */
export function createRepository(cfg: RepositoryConfig): Repository {
  if (cfg.DATABASE_URL) {
    log.db.info({ dialect: "postgres", poolMax: cfg.DATABASE_POOL_MAX }, "using PostgreSQL");
    return PostgresRepository.connect(cfg.DATABASE_URL, { max: cfg.DATABASE_POOL_MAX });
  }

  log.db.info({ dialect: "pglite", dataDir: cfg.PGLITE_DATA_DIR }, "using embedded PGlite");
  return PgliteRepository.open(cfg.PGLITE_DATA_DIR);
}
