import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import { createPostgresDb, type PostgresConnectionOptions, type PostgresDatabase } from "@nestfinder/db";
import { PgRepository } from "./pg-repository.js";

type PostgresClient = ReturnType<typeof createPostgresDb>["sql"];

/**
 * PostgreSQL server adapter (postgres.js). The client connects lazily on the
 * first query.
 */
export class PostgresRepository extends PgRepository<PostgresJsQueryResultHKT> {
  readonly dialect = "postgres" as const;

  constructor(
    db: PostgresDatabase,
    private readonly client: PostgresClient
  ) {
    super(db);
  }

  static connect(databaseUrl: string, options: PostgresConnectionOptions = {}): PostgresRepository {
    const { db, sql } = createPostgresDb(databaseUrl, options);
    return new PostgresRepository(db, sql);
  }

  protected async execScript(script: string): Promise<void> {
    await this.client.unsafe(script);
  }

  async close(): Promise<void> {
    await this.client.end({ timeout: 5 });
  }
}
