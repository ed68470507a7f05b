import { createClient } from "redis";
import { config } from "../config";
import { errorMessage, logger } from "../utils/logger";

type RedisClientInstance = ReturnType<typeof createClient>;

export type RedisStatus = "disabled" | "connecting" | "ready" | "error";

export interface RedisHealth {
  status: RedisStatus;
  error: string | null;
  healthy: boolean;
}

/** JSON key/value store backing the catalog cache across restarts. */
export interface RedisManager {
  readonly status: RedisStatus;
  readonly error: Error | undefined;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  getJson: <T>(key: string) => Promise<T | null>;
  setJson: <T>(key: string, value: T, ttlMs?: number) => Promise<void>;
  health: () => RedisHealth;
}

export interface RedisStoreOptions {
  keyPrefix?: string;
  maxReconnectDelayMs?: number;
}

const DEFAULT_KEY_PREFIX = "route-timeline:";
const DEFAULT_MAX_RECONNECT_DELAY_MS = 5_000;

export const describeRedisHealth = (status: RedisStatus, error: Error | undefined): RedisHealth => ({
  status,
  error: error ? error.message : null,
  healthy: status === "ready" && !error,
});

export const createNoopRedisManager = (): RedisManager => ({
  status: "disabled",
  error: undefined,
  connect: async () => {
    logger.debug("Redis disabled; skipping connect");
  },
  disconnect: async () => {
    logger.debug("Redis disabled; skipping disconnect");
  },
  getJson: async () => null,
  setJson: async () => undefined,
  health: () => describeRedisHealth("disabled", undefined),
});

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

/**
 * Namespaced JSON store on a single Redis connection. Reads and writes are
 * skipped while the connection is not ready; the catalog cache then falls
 * back to upstream loads.
 */
class RedisJsonStore implements RedisManager {
  private readonly client: RedisClientInstance;
  private readonly keyPrefix: string;
  private currentStatus: RedisStatus = "connecting";
  private lastError: Error | undefined;

  constructor(url: string, options: RedisStoreOptions = {}) {
    const maxReconnectDelayMs = options.maxReconnectDelayMs ?? DEFAULT_MAX_RECONNECT_DELAY_MS;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.client = createClient({
      url,
      socket: { reconnectStrategy: (retries: number) => Math.min(250 * 2 ** retries, maxReconnectDelayMs) },
    });

    this.client.on("error", (error: unknown) => {
      this.currentStatus = "error";
      this.lastError = toError(error);
      logger.error("Redis connection error", { message: this.lastError.message });
    });
    this.client.on("ready", () => {
      this.currentStatus = "ready";
      this.lastError = undefined;
    });
    this.client.on("reconnecting", () => {
      this.currentStatus = "connecting";
    });
    this.client.on("end", () => {
      this.currentStatus = "disabled";
      logger.info("Redis connection closed");
    });
  }

  get status() {
    return this.currentStatus;
  }

  get error() {
    return this.lastError;
  }

  health() {
    return describeRedisHealth(this.currentStatus, this.lastError);
  }

  async connect() {
    if (this.client.isOpen) return;
    try {
      this.currentStatus = "connecting";
      await this.client.connect();
      logger.info("Redis connection established");
    } catch (error) {
      this.currentStatus = "error";
      this.lastError = toError(error);
      logger.error("Failed to connect to Redis", { message: this.lastError.message });
    }
  }

  async disconnect() {
    if (!this.client.isOpen) return;
    try {
      await this.client.disconnect();
    } catch (error) {
      logger.warn("Failed to close Redis connection", { message: errorMessage(error) });
    }
  }

  async getJson<T>(key: string): Promise<T | null> {
    if (this.currentStatus !== "ready") return null;
    try {
      const payload = await this.client.get(this.namespaced(key));
      return payload ? (JSON.parse(payload) as T) : null;
    } catch (error) {
      logger.warn("Redis read failed", { key, message: errorMessage(error) });
      return null;
    }
  }

  async setJson<T>(key: string, value: T, ttlMs?: number) {
    if (this.currentStatus !== "ready") return;
    const serialized = JSON.stringify(value);
    try {
      if (ttlMs !== undefined && ttlMs > 0) {
        await this.client.set(this.namespaced(key), serialized, { PX: Math.round(ttlMs) });
      } else {
        await this.client.set(this.namespaced(key), serialized);
      }
    } catch (error) {
      logger.warn("Redis write failed", { key, message: errorMessage(error) });
    }
  }

  private namespaced(key: string) {
    return `${this.keyPrefix}${key}`;
  }
}

export const createRedisManager = (
  redisUrl: string | undefined = config.redisUrl,
  options: RedisStoreOptions = {},
): RedisManager => {
  if (!redisUrl) {
    logger.info("Redis URL not configured; catalog cache will remain in-memory");
    return createNoopRedisManager();
  }

  const store = new RedisJsonStore(redisUrl, options);
  void store.connect();
  return store;
};
