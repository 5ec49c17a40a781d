import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { drizzle as drizzlePostgres } from "drizzle-orm/postgres-js";
import { drizzle as drizzlePglite } from "drizzle-orm/pglite";
import { PGlite } from "@electric-sql/pglite";
import postgres from "postgres";
import { z } from "zod";
import * as pgSchema from "./schema.js";
import type { SeedCity } from "./types.js";

export * from "./types.js";
export { pgSchema };

export interface PostgresConnectionOptions {
  max?: number;
}

export function createPostgresDb(databaseUrl: string, options: PostgresConnectionOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 10,
    onnotice: () => {},
  });
  return { db: drizzlePostgres(sql, { schema: pgSchema }), sql };
}

/**
 * Embedded PostgreSQL (PGlite). `dataDir` is a directory on disk, or
 * "memory://" for a throwaway in-memory database.
 */
export function createPgliteDb(dataDir: string) {
  const client = new PGlite(dataDir);
  return { db: drizzlePglite(client, { schema: pgSchema }), client };
}

export type PostgresDatabase = ReturnType<typeof createPostgresDb>["db"];
export type PgliteDatabase = ReturnType<typeof createPgliteDb>["db"];

// =============================================================================
// Bundled files (schema DDL and city seed)
// =============================================================================

function packageFile(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url));
}

/** `CREATE ... IF NOT EXISTS` script, shared by both engines */
export function readSchemaSql(): string {
  return readFileSync(packageFile("../sql/schema.sql"), "utf8");
}

const seedCitiesSchema = z.array(
  z.object({
    code: z.string().min(1),
    nameUk: z.string().min(1),
    channelUrl: z.string().url().nullable(),
    isActive: z.boolean().optional(),
    aliases: z.array(z.string().min(1)),
  })
);

export function loadSeedCities(path: string = packageFile("../data/cities.json")): SeedCity[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return seedCitiesSchema.parse(raw);
}
