import { and, asc, count, eq, gte, isNotNull, ne, sql } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import {
  pgSchema,
  readSchemaSql,
  type BroadcastStats,
  type BroadcastStatus,
  type DeliveryStatus,
  type Dialect,
  type SeedCity,
} from "@nestfinder/db";
import type { Recipient } from "../domain/broadcast/types.js";
import { DAY_MS } from "../domain/utils/time.js";
import { log } from "../logger.js";
import {
  charLength,
  chunk,
  contentColumns,
  DELIVERY_INSERT_CHUNK,
  emptyDeliveryCounts,
  normalizeAlias,
} from "./normalize.js";
import type {
  AdminStats,
  BroadcastRecord,
  CityRecord,
  CreateBroadcastInput,
  DailyMetricsDelta,
  DailyMetricsRecord,
  DeliveryCounts,
  Repository,
  SaveUserInput,
  UserRecord,
} from "./types.js";

const {
  adminActions,
  broadcasts,
  cities,
  cityAliases,
  deliveries,
  metricsDaily,
  unsubscriptions,
  userCityHistory,
  users,
} = pgSchema;

type BroadcastRow = typeof broadcasts.$inferSelect;

const cityColumns = {
  code: cities.code,
  nameUk: cities.nameUk,
  channelUrl: cities.channelUrl,
  isActive: cities.isActive,
};

function toBroadcastRecord({ statsJson, ...row }: BroadcastRow): BroadcastRecord {
  return { ...row, stats: statsJson };
}

/**
 * Drizzle queries shared by the PostgreSQL adapters. Multi-write operations
 * run in transactions. Subclasses own the connection: how the schema script
 * is executed and how the client is closed.
 */
export abstract class PgRepository<TQueryResult extends PgQueryResultHKT> implements Repository {
  abstract readonly dialect: Dialect;

  constructor(protected readonly db: PgDatabase<TQueryResult, typeof pgSchema>) {}

  /** Run a multi-statement SQL script */
  protected abstract execScript(script: string): Promise<void>;

  abstract close(): Promise<void>;

  async bootstrap(): Promise<void> {
    await this.execScript(readSchemaSql());
    log.db.debug({ dialect: this.dialect }, "schema ready");
  }

  async seedCities(seed: SeedCity[]): Promise<number> {
    return this.db.transaction(async (tx) => {
      let inserted = 0;
      for (const city of seed) {
        const created = await tx
          .insert(cities)
          .values({
            code: city.code,
            nameUk: city.nameUk,
            channelUrl: city.channelUrl,
            isActive: city.isActive ?? true,
          })
          .onConflictDoNothing()
          .returning({ code: cities.code });
        inserted += created.length;

        if (city.aliases.length > 0) {
          await tx
            .insert(cityAliases)
            .values(city.aliases.map((alias) => ({ cityCode: city.code, alias: normalizeAlias(alias) })))
            .onConflictDoNothing();
        }
      }
      return inserted;
    });
  }

  // ===========================================================================
  // Users
  // ===========================================================================

  async saveUser(input: SaveUserInput): Promise<UserRecord> {
    const now = new Date();
    const [row] = await this.db
      .insert(users)
      .values({
        tgId: input.tgId,
        username: input.username ?? null,
        firstName: input.firstName ?? null,
        utmSource: input.utmSource ?? null,
        lastSeenAt: now,
      })
      .onConflictDoUpdate({
        target: users.tgId,
        set: {
          username: input.username ?? null,
          firstName: input.firstName ?? null,
          lastSeenAt: now,
          updatedAt: now,
        },
      })
      .returning();

    if (!row) {
      throw new Error(`upsert returned no row for user ${input.tgId}`);
    }
    return row;
  }

  async getUserByExternalId(tgId: number): Promise<UserRecord | null> {
    const [row] = await this.db.select().from(users).where(eq(users.tgId, tgId)).limit(1);
    return row ?? null;
  }

  async setUserBlocked(tgId: number, blocked: boolean, reason: string = "blocked"): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [user] = await tx
        .update(users)
        .set({ isBlocked: blocked, isActive: !blocked, updatedAt: new Date() })
        .where(eq(users.tgId, tgId))
        .returning({ id: users.id });

      if (user && blocked) {
        await tx.insert(unsubscriptions).values({ userId: user.id, reason });
      }
    });
  }

  async countUsers(activeOnly: boolean = true): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(users)
      .where(activeOnly ? and(eq(users.isActive, true), eq(users.isBlocked, false)) : undefined);
    return row?.value ?? 0;
  }

  async listActiveUsers(): Promise<UserRecord[]> {
    return this.db
      .select()
      .from(users)
      .where(and(eq(users.isActive, true), eq(users.isBlocked, false)))
      .orderBy(asc(users.id));
  }

  // ===========================================================================
  // Cities
  // ===========================================================================

  async findCityByAlias(input: string): Promise<CityRecord | null> {
    const alias = normalizeAlias(input);
    if (alias === "") return null;

    const [row] = await this.db
      .select(cityColumns)
      .from(cityAliases)
      .innerJoin(cities, eq(cities.code, cityAliases.cityCode))
      .where(and(eq(cityAliases.alias, alias), eq(cities.isActive, true)))
      .orderBy(asc(cityAliases.id))
      .limit(1);
    return row ?? null;
  }

  async findCitiesByPrefix(prefix: string, limit: number): Promise<CityRecord[]> {
    const normalized = normalizeAlias(prefix);
    if (normalized === "") return [];

    return this.db
      .select(cityColumns)
      .from(cityAliases)
      .innerJoin(cities, eq(cities.code, cityAliases.cityCode))
      .where(
        and(
          sql`substr(${cityAliases.alias}, 1, ${charLength(normalized)}::int) = ${normalized}`,
          eq(cities.isActive, true)
        )
      )
      .orderBy(sql`length(${cityAliases.alias})`, asc(cityAliases.id))
      .limit(limit);
  }

  async findCityByCode(code: string): Promise<CityRecord | null> {
    const [row] = await this.db
      .select(cityColumns)
      .from(cities)
      .where(and(eq(cities.code, code), eq(cities.isActive, true)))
      .limit(1);
    return row ?? null;
  }

  async listAvailableCities(): Promise<CityRecord[]> {
    const rows = await this.db
      .select(cityColumns)
      .from(cities)
      .where(and(eq(cities.isActive, true), isNotNull(cities.channelUrl), ne(cities.channelUrl, "")));
    return rows.sort((a, b) => a.nameUk.localeCompare(b.nameUk, "uk"));
  }

  async updateUserCity(tgId: number, cityCode: string, cityNameUk: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [user] = await tx
        .update(users)
        .set({ lastCity: cityNameUk, updatedAt: new Date() })
        .where(eq(users.tgId, tgId))
        .returning({ id: users.id });
      if (!user) return;

      await tx.insert(userCityHistory).values({ userId: user.id, cityCode, cityNameUk });
    });
  }

  // ===========================================================================
  // Broadcasts
  // ===========================================================================

  async createBroadcast(input: CreateBroadcastInput): Promise<number> {
    const [admin] = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.tgId, input.createdByTgId))
      .limit(1);

    const [row] = await this.db
      .insert(broadcasts)
      .values({
        title: input.title,
        ...contentColumns(input.content),
        status: "draft",
        createdBy: admin?.id ?? null,
      })
      .returning({ id: broadcasts.id });

    if (!row) {
      throw new Error("broadcast insert returned no row");
    }
    return row.id;
  }

  async createDeliveriesForBroadcast(broadcastId: number): Promise<number> {
    return this.db.transaction(async (tx) => {
      const recipients = await tx
        .select({ id: users.id })
        .from(users)
        .where(and(eq(users.isActive, true), eq(users.isBlocked, false)))
        .orderBy(asc(users.id));

      let created = 0;
      for (const batch of chunk(recipients, DELIVERY_INSERT_CHUNK)) {
        const rows = await tx
          .insert(deliveries)
          .values(batch.map((user) => ({ broadcastId, userId: user.id })))
          .onConflictDoNothing()
          .returning({ id: deliveries.id });
        created += rows.length;
      }
      return created;
    });
  }

  async getQueuedDeliveries(broadcastId: number, limit?: number): Promise<Recipient[]> {
    let query = this.db
      .select({ deliveryId: deliveries.id, userId: deliveries.userId, tgId: users.tgId })
      .from(deliveries)
      .innerJoin(users, eq(users.id, deliveries.userId))
      .where(and(eq(deliveries.broadcastId, broadcastId), eq(deliveries.status, "queued")))
      .orderBy(asc(deliveries.id))
      .$dynamic();
    if (limit !== undefined) {
      query = query.limit(limit);
    }
    return query;
  }

  async markBroadcastRunning(broadcastId: number, startedAt: Date): Promise<void> {
    await this.db
      .update(broadcasts)
      .set({ status: "running", startedAt })
      .where(eq(broadcasts.id, broadcastId));
  }

  async updateDeliveryStatus(
    deliveryId: number,
    status: DeliveryStatus,
    errorCode: string | null = null
  ): Promise<void> {
    await this.db
      .update(deliveries)
      .set({
        status,
        attempts: sql`${deliveries.attempts} + 1`,
        errorCode,
        ...(status === "sent" && { sentAt: new Date() }),
      })
      .where(eq(deliveries.id, deliveryId));
  }

  async completeBroadcast(
    broadcastId: number,
    status: Extract<BroadcastStatus, "completed" | "interrupted">,
    stats: BroadcastStats,
    finishedAt: Date
  ): Promise<void> {
    await this.db
      .update(broadcasts)
      .set({ status, statsJson: stats, finishedAt })
      .where(eq(broadcasts.id, broadcastId));
  }

  async listBroadcastsByStatus(status: BroadcastStatus): Promise<BroadcastRecord[]> {
    const rows = await this.db
      .select()
      .from(broadcasts)
      .where(eq(broadcasts.status, status))
      .orderBy(asc(broadcasts.id));
    return rows.map(toBroadcastRecord);
  }

  async countDeliveriesByStatus(broadcastId: number): Promise<DeliveryCounts> {
    const rows = await this.db
      .select({ status: deliveries.status, value: count() })
      .from(deliveries)
      .where(eq(deliveries.broadcastId, broadcastId))
      .groupBy(deliveries.status);

    const counts = emptyDeliveryCounts();
    for (const row of rows) {
      counts[row.status] = row.value;
    }
    return counts;
  }

  // ===========================================================================
  // Admin
  // ===========================================================================

  async getAdminStats(now: Date): Promise<AdminStats> {
    const weekAgo = new Date(now.getTime() - 7 * DAY_MS);
    const monthAgo = new Date(now.getTime() - 30 * DAY_MS);
    const countOf = (rows: { value: number }[]) => rows[0]?.value ?? 0;
    const selections = count();

    const [total, active, blocked, unsubs, newUsers, unsubs7d, topCities] = await Promise.all([
      this.db.select({ value: count() }).from(users),
      this.db
        .select({ value: count() })
        .from(users)
        .where(and(eq(users.isActive, true), eq(users.isBlocked, false))),
      this.db.select({ value: count() }).from(users).where(eq(users.isBlocked, true)),
      this.db.select({ value: count() }).from(unsubscriptions),
      this.db.select({ value: count() }).from(users).where(gte(users.createdAt, weekAgo)),
      this.db
        .select({ value: count() })
        .from(unsubscriptions)
        .where(gte(unsubscriptions.createdAt, weekAgo)),
      this.db
        .select({ cityNameUk: userCityHistory.cityNameUk, count: selections })
        .from(userCityHistory)
        .where(gte(userCityHistory.selectedAt, monthAgo))
        .groupBy(userCityHistory.cityNameUk)
        .orderBy(sql`${selections} desc`, asc(userCityHistory.cityNameUk))
        .limit(5),
    ]);

    return {
      totalUsers: countOf(total),
      activeUsers: countOf(active),
      blockedUsers: countOf(blocked),
      totalUnsubscriptions: countOf(unsubs),
      newUsers7d: countOf(newUsers),
      unsubscribed7d: countOf(unsubs7d),
      topCities,
    };
  }

  async logAdminAction(adminTgId: number, action: string, payload?: Record<string, unknown>): Promise<void> {
    await this.db.insert(adminActions).values({ adminTgId, action, payloadJson: payload ?? null });
  }

  async recordDailyMetrics(day: string, delta: DailyMetricsDelta): Promise<void> {
    const values = {
      newUsers: delta.newUsers ?? 0,
      activeUsers: delta.activeUsers ?? 0,
      blockedUsers: delta.blockedUsers ?? 0,
      sentMessages: delta.sentMessages ?? 0,
      errorsCount: delta.errorsCount ?? 0,
      unsubs: delta.unsubs ?? 0,
    };

    await this.db
      .insert(metricsDaily)
      .values({ date: day, ...values })
      .onConflictDoUpdate({
        target: metricsDaily.date,
        set: {
          newUsers: sql`${metricsDaily.newUsers} + ${values.newUsers}`,
          activeUsers: sql`${metricsDaily.activeUsers} + ${values.activeUsers}`,
          blockedUsers: sql`${metricsDaily.blockedUsers} + ${values.blockedUsers}`,
          sentMessages: sql`${metricsDaily.sentMessages} + ${values.sentMessages}`,
          errorsCount: sql`${metricsDaily.errorsCount} + ${values.errorsCount}`,
          unsubs: sql`${metricsDaily.unsubs} + ${values.unsubs}`,
        },
      });
  }

  async getDailyMetrics(day: string): Promise<DailyMetricsRecord | null> {
    const [row] = await this.db.select().from(metricsDaily).where(eq(metricsDaily.date, day)).limit(1);
    return row ?? null;
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}
