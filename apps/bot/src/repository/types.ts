import type {
  BroadcastKind,
  BroadcastStats,
  BroadcastStatus,
  DeliveryStatus,
  Dialect,
  SeedCity,
} from "@nestfinder/db";
import type { BroadcastContent, Recipient } from "../domain/broadcast/types.js";

export interface UserRecord {
  id: number;
  tgId: number;
  username: string | null;
  firstName: string | null;
  lang: string;
  lastCity: string | null;
  isActive: boolean;
  isBlocked: boolean;
  createdAt: Date;
  updatedAt: Date;
  lastSeenAt: Date | null;
  utmSource: string | null;
}

export interface SaveUserInput {
  tgId: number;
  username?: string | null;
  firstName?: string | null;
  /** Only written when the user row is created */
  utmSource?: string | null;
}

export interface CityRecord {
  code: string;
  nameUk: string;
  /** null or "" while the city has no channel */
  channelUrl: string | null;
  isActive: boolean;
}

export interface BroadcastRecord {
  id: number;
  title: string | null;
  body: string | null;
  kind: BroadcastKind;
  photoFileId: string | null;
  status: BroadcastStatus;
  createdBy: number | null;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  stats: BroadcastStats | null;
}

export interface CreateBroadcastInput {
  title: string | null;
  content: BroadcastContent;
  /** Telegram id of the admin; resolved to a user row when one exists */
  createdByTgId: number;
}

export type DeliveryCounts = Record<DeliveryStatus, number>;

export interface CityPopularity {
  cityNameUk: string;
  count: number;
}

export interface AdminStats {
  totalUsers: number;
  activeUsers: number;
  blockedUsers: number;
  totalUnsubscriptions: number;
  newUsers7d: number;
  unsubscribed7d: number;
  /** Top 5 selections over the last 30 days */
  topCities: CityPopularity[];
}

export interface DailyMetricsRecord {
  date: string;
  newUsers: number;
  activeUsers: number;
  blockedUsers: number;
  sentMessages: number;
  errorsCount: number;
  unsubs: number;
}

export interface DailyMetricsDelta {
  newUsers?: number;
  activeUsers?: number;
  blockedUsers?: number;
  sentMessages?: number;
  errorsCount?: number;
  unsubs?: number;
}

/**
 * Persistence capability used by the core. Two adapters implement it
 * (PostgreSQL server and embedded PGlite); callers never branch on which one is active.
 */
export interface Repository {
  readonly dialect: Dialect;

  /** Create tables and indexes if missing */
  bootstrap(): Promise<void>;
  /** Insert cities and aliases that are not there yet; returns cities inserted */
  seedCities(cities: SeedCity[]): Promise<number>;

  // Users
  saveUser(input: SaveUserInput): Promise<UserRecord>;
  getUserByExternalId(tgId: number): Promise<UserRecord | null>;
  /** Sets is_blocked / is_active and, when blocking, records an unsubscription. Atomic. */
  setUserBlocked(tgId: number, blocked: boolean, reason?: string): Promise<void>;
  countUsers(activeOnly?: boolean): Promise<number>;
  listActiveUsers(): Promise<UserRecord[]>;

  // Cities
  findCityByAlias(input: string): Promise<CityRecord | null>;
  findCitiesByPrefix(prefix: string, limit: number): Promise<CityRecord[]>;
  findCityByCode(code: string): Promise<CityRecord | null>;
  listAvailableCities(): Promise<CityRecord[]>;
  /** Sets last_city and appends a history row. Atomic. */
  updateUserCity(tgId: number, cityCode: string, cityNameUk: string): Promise<void>;

  // Broadcasts
  createBroadcast(input: CreateBroadcastInput): Promise<number>;
  /** Snapshot: one queued delivery per active, unblocked user; returns rows created */
  createDeliveriesForBroadcast(broadcastId: number): Promise<number>;
  getQueuedDeliveries(broadcastId: number, limit?: number): Promise<Recipient[]>;
  markBroadcastRunning(broadcastId: number, startedAt: Date): Promise<void>;
  updateDeliveryStatus(deliveryId: number, status: DeliveryStatus, errorCode?: string | null): Promise<void>;
  completeBroadcast(
    broadcastId: number,
    status: Extract<BroadcastStatus, "completed" | "interrupted">,
    stats: BroadcastStats,
    finishedAt: Date
  ): Promise<void>;
  listBroadcastsByStatus(status: BroadcastStatus): Promise<BroadcastRecord[]>;
  countDeliveriesByStatus(broadcastId: number): Promise<DeliveryCounts>;

  // Admin
  getAdminStats(now: Date): Promise<AdminStats>;
  logAdminAction(adminTgId: number, action: string, payload?: Record<string, unknown>): Promise<void>;
  /** Adds the delta to the counters of `day` (YYYY-MM-DD) */
  recordDailyMetrics(day: string, delta: DailyMetricsDelta): Promise<void>;
  getDailyMetrics(day: string): Promise<DailyMetricsRecord | null>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
