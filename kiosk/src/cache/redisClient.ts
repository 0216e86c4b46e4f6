import { createClient } from "redis";
import { logger } from "../utils/logger";
import { toErrorMessage } from "../utils/errors";

export type RedisStatus = "disabled" | "connecting" | "ready" | "error";

export type SnapshotKind = "waitTimes" | "weather";

/** How long a persisted snapshot survives without a newer write. */
export const SNAPSHOT_TTL_MS: Record<SnapshotKind, number> = {
  waitTimes: 1000 * 60 * 60 * 24,
  weather: 1000 * 60 * 60 * 3,
};

const KEY_SUFFIX: Record<SnapshotKind, string> = {
  waitTimes: "wait-times",
  weather: "weather",
};

export const snapshotKey = (keyPrefix: string, kind: SnapshotKind) => `${keyPrefix}:cache:${KEY_SUFFIX[kind]}`;

/** The two commands the snapshot store issues. */
export interface SnapshotCommands {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, options: { PX: number }) => Promise<unknown>;
}

export interface SnapshotStore {
  readSnapshot: (kind: SnapshotKind) => Promise<unknown>;
  writeSnapshot: (kind: SnapshotKind, payload: unknown) => Promise<void>;
}

export interface RedisManager extends SnapshotStore {
  readonly status: RedisStatus;
  readonly error: Error | undefined;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
}

/**
 * JSON snapshots under `<prefix>:cache:*`, each written with its TTL. Read and
 * write failures are logged and read back as a missing snapshot.
 */
export const bindSnapshotStore = (commands: SnapshotCommands, keyPrefix: string): SnapshotStore => ({
  readSnapshot: async (kind) => {
    const key = snapshotKey(keyPrefix, kind);
    try {
      const payload = await commands.get(key);
      if (!payload) return null;
      const parsed: unknown = JSON.parse(payload);
      return parsed;
    } catch (error) {
      logger.warn("Failed to read cached snapshot", { key, message: toErrorMessage(error) });
      return null;
    }
  },
  writeSnapshot: async (kind, payload) => {
    const key = snapshotKey(keyPrefix, kind);
    try {
      await commands.set(key, JSON.stringify(payload), { PX: SNAPSHOT_TTL_MS[kind] });
    } catch (error) {
      logger.warn("Failed to write cached snapshot", { key, message: toErrorMessage(error) });
    }
  },
});

export const NOOP_REDIS: RedisManager = {
  status: "disabled",
  error: undefined,
  connect: async () => {
    logger.debug("Redis disabled; skipping connect");
  },
  disconnect: async () => {
    logger.debug("Redis disabled; skipping disconnect");
  },
  readSnapshot: async () => null,
  writeSnapshot: async () => undefined,
};

const asError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

/**
 * Connects lazily: callers await connect() before hydrating so the first
 * snapshot read sees a ready client. Snapshot reads and writes are skipped
 * unless the connection is ready.
 */
export const createRedisManager = (url: string | undefined, keyPrefix: string): RedisManager => {
  if (!url) {
    logger.info("Redis URL not configured; snapshots stay in memory");
    return NOOP_REDIS;
  }

  const client = createClient({ url });
  let status: RedisStatus = "connecting";
  let connectionError: Error | undefined;

  client.on("error", (error: unknown) => {
    status = "error";
    connectionError = asError(error);
    logger.error("Redis connection error", { message: connectionError.message });
  });

  client.on("end", () => {
    status = "disabled";
    logger.info("Redis connection closed");
  });

  const store = bindSnapshotStore(
    {
      get: (key) => client.get(key),
      set: (key, value, options) => client.set(key, value, options),
    },
    keyPrefix,
  );

  return {
    get status() {
      return status;
    },
    get error() {
      return connectionError;
    },
    connect: async () => {
      if (status === "ready") return;
      try {
        status = "connecting";
        await client.connect();
        status = "ready";
        connectionError = undefined;
        logger.info("Redis connection established", { keyPrefix });
      } catch (error) {
        status = "error";
        connectionError = asError(error);
        logger.error("Failed to connect to Redis", { message: connectionError.message });
      }
    },
    disconnect: async () => {
      if (status !== "ready") return;
      try {
        await client.disconnect();
        status = "disabled";
      } catch (error) {
        logger.warn("Failed to close Redis connection", { message: toErrorMessage(error) });
      }
    },
    readSnapshot: async (kind) => (status === "ready" ? store.readSnapshot(kind) : null),
    writeSnapshot: async (kind, payload) => {
      if (status === "ready") await store.writeSnapshot(kind, payload);
    },
  };
};
