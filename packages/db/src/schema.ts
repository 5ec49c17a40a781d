import {
  pgTable,
  bigserial,
  bigint,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  date,
  index,
  unique,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import {
  BROADCAST_KINDS,
  BROADCAST_STATUSES,
  DELIVERY_STATUSES,
  RENTAL_REQUEST_STATUSES,
  type BroadcastStats,
} from "./types.js";

// PostgreSQL schema. Must stay in step with sql/postgres.sql, which creates it at startup.

// Users table
export const users = pgTable(
  "users",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    tgId: bigint("tg_id", { mode: "number" }).notNull().unique(),
    username: text("username"),
    firstName: text("first_name"),
    lang: text("lang").default("uk").notNull(),
    lastCity: text("last_city"),
    isActive: boolean("is_active").default(true).notNull(),
    isBlocked: boolean("is_blocked").default(false).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
    lastSeenAt: timestamp("last_seen_at", { withTimezone: true }),
    utmSource: text("utm_source"),
  },
  (table) => ({
    isActiveIdx: index("idx_users_is_active").on(table.isActive),
    lastSeenIdx: index("idx_users_last_seen_at").on(table.lastSeenAt),
  })
);

// Cities (static reference data)
export const cities = pgTable("cities", {
  code: text("code").primaryKey(),
  nameUk: text("name_uk").notNull(),
  // NULL or '' means the city has no channel yet
  channelUrl: text("channel_url"),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export const cityAliases = pgTable(
  "city_aliases",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    cityCode: text("city_code")
      .notNull()
      .references(() => cities.code, { onDelete: "cascade" }),
    alias: text("alias").notNull(),
  },
  (table) => ({
    cityAliasUnique: unique("city_aliases_city_code_alias_key").on(table.cityCode, table.alias),
    aliasIdx: index("idx_city_alias").on(table.alias),
  })
);

export const userCityHistory = pgTable(
  "user_city_history",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: bigint("user_id", { mode: "number" })
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    cityCode: text("city_code").references(() => cities.code),
    cityNameUk: text("city_name_uk").notNull(),
    selectedAt: timestamp("selected_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userSelectedIdx: index("idx_uch_user_id").on(table.userId, table.selectedAt),
  })
);

export const rentalRequests = pgTable(
  "rental_requests",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: bigint("user_id", { mode: "number" }).references(() => users.id, {
      onDelete: "set null",
    }),
    cityCode: text("city_code").references(() => cities.code),
    contact: text("contact"),
    description: text("description"),
    status: text("status", { enum: RENTAL_REQUEST_STATUSES }).default("new").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    statusIdx: index("idx_rr_status").on(table.status),
  })
);

// Broadcasts
export const broadcasts = pgTable("broadcasts", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  title: text("title"),
  body: text("body"),
  kind: text("kind", { enum: BROADCAST_KINDS }).default("text").notNull(),
  photoFileId: text("photo_file_id"),
  status: text("status", { enum: BROADCAST_STATUSES }).default("draft").notNull(),
  createdBy: bigint("created_by", { mode: "number" }).references(() => users.id),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  startedAt: timestamp("started_at", { withTimezone: true }),
  finishedAt: timestamp("finished_at", { withTimezone: true }),
  statsJson: jsonb("stats_json").$type<BroadcastStats>(),
});

// Deliveries - one row per (broadcast, recipient), created up front as the recipient snapshot
export const deliveries = pgTable(
  "deliveries",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    broadcastId: bigint("broadcast_id", { mode: "number" })
      .notNull()
      .references(() => broadcasts.id, { onDelete: "cascade" }),
    userId: bigint("user_id", { mode: "number" })
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    status: text("status", { enum: DELIVERY_STATUSES }).default("queued").notNull(),
    attempts: integer("attempts").default(0).notNull(),
    errorCode: text("error_code"),
    sentAt: timestamp("sent_at", { withTimezone: true }),
  },
  (table) => ({
    broadcastUserUnique: unique("deliveries_broadcast_id_user_id_key").on(
      table.broadcastId,
      table.userId
    ),
    broadcastStatusIdx: index("idx_deliv_bcast_status").on(table.broadcastId, table.status),
  })
);

export const unsubscriptions = pgTable(
  "unsubscriptions",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: bigint("user_id", { mode: "number" })
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    reason: text("reason"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userIdx: index("idx_unsub_user").on(table.userId),
  })
);

export const adminActions = pgTable(
  "admin_actions",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    adminTgId: bigint("admin_tg_id", { mode: "number" }).notNull(),
    action: text("action").notNull(),
    payloadJson: jsonb("payload_json").$type<Record<string, unknown>>(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    createdIdx: index("idx_admin_actions_time").on(table.createdAt),
  })
);

export const metricsDaily = pgTable("metrics_daily", {
  date: date("date", { mode: "string" }).primaryKey(),
  newUsers: integer("new_users").default(0).notNull(),
  activeUsers: integer("active_users").default(0).notNull(),
  blockedUsers: integer("blocked_users").default(0).notNull(),
  sentMessages: integer("sent_messages").default(0).notNull(),
  errorsCount: integer("errors_count").default(0).notNull(),
  unsubs: integer("unsubs").default(0).notNull(),
});

// Relations
export const citiesRelations = relations(cities, ({ many }) => ({
  aliases: many(cityAliases),
}));

export const cityAliasesRelations = relations(cityAliases, ({ one }) => ({
  city: one(cities, {
    fields: [cityAliases.cityCode],
    references: [cities.code],
  }),
}));

export const broadcastsRelations = relations(broadcasts, ({ many }) => ({
  deliveries: many(deliveries),
}));

export const deliveriesRelations = relations(deliveries, ({ one }) => ({
  broadcast: one(broadcasts, {
    fields: [deliveries.broadcastId],
    references: [broadcasts.id],
  }),
  user: one(users, {
    fields: [deliveries.userId],
    references: [users.id],
  }),
}));

// Types
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type City = typeof cities.$inferSelect;
export type Broadcast = typeof broadcasts.$inferSelect;
export type NewBroadcast = typeof broadcasts.$inferInsert;
export type Delivery = typeof deliveries.$inferSelect;
