// Status vocabularies

export const BROADCAST_STATUSES = ["draft", "running", "completed", "interrupted"] as const;
export const BROADCAST_KINDS = ["text", "photo"] as const;
export const DELIVERY_STATUSES = ["queued", "sent", "blocked", "failed"] as const;
export const RENTAL_REQUEST_STATUSES = ["new", "in_progress", "published", "rejected"] as const;

export type BroadcastStatus = (typeof BROADCAST_STATUSES)[number];
export type BroadcastKind = (typeof BROADCAST_KINDS)[number];
export type DeliveryStatus = (typeof DELIVERY_STATUSES)[number];
export type RentalRequestStatus = (typeof RENTAL_REQUEST_STATUSES)[number];

/**
 * Counters persisted into broadcasts.stats_json when a run ends
 */
export type BroadcastStats = {
  total: number;
  sent: number;
  blocked: number;
  failed: number;
  successRatio: number;
};

/**
 * One entry of data/cities.json
 */
export type SeedCity = {
  code: string;
  nameUk: string;
  channelUrl: string | null;
  /** Defaults to true */
  isActive?: boolean;
  aliases: string[];
};

export type Dialect = "postgres" | "pglite";
