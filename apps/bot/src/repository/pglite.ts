import type { PgliteQueryResultHKT } from "drizzle-orm/pglite";
import { createPgliteDb, type PgliteDatabase } from "@nestfinder/db";
import { PgRepository } from "./pg-repository.js";

type PgliteClient = ReturnType<typeof createPgliteDb>["client"];

/**
 * Embedded adapter: PostgreSQL compiled to WASM, running in this process.
 * Data lives in a local directory, or in memory for "memory://".
 * Queries on the single connection are serialized by PGlite.
 */
export class PgliteRepository extends PgRepository<PgliteQueryResultHKT> {
  readonly dialect = "pglite" as const;

  constructor(
    db: PgliteDatabase,
    private readonly client: PgliteClient
  ) {
    super(db);
  }

  static open(dataDir: string): PgliteRepository {
    const { db, client } = createPgliteDb(dataDir);
    return new PgliteRepository(db, client);
  }

  protected async execScript(script: string): Promise<void> {
    await this.client.exec(script);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
