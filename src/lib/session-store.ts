import { Redis } from "@upstash/redis";
import type { SerializedState } from "./vim-types";

export interface SessionStore {
  readonly backend: "redis" | "memory";
  save(sessionId: string, state: SerializedState): Promise<void>;
  load(sessionId: string): Promise<SerializedState | undefined>;
  remove(sessionId: string): Promise<void>;
}

export interface SessionStoreConfig {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Seconds before a saved session expires in Redis; no expiry when unset. */
  ttlSeconds?: number;
}

type RedisConfig = { url: string; token: string };

// Opt into Redis via USE_REDIS=true; anything else keeps sessions in memory
export function redisConfigFromEnv(
  env: Record<string, string | undefined>
): RedisConfig | null {
  if (env.USE_REDIS !== "true") return null;
  if (env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN) {
    return { url: env.UPSTASH_REDIS_REST_URL, token: env.UPSTASH_REDIS_REST_TOKEN };
  }
  if (env.KV_REST_API_URL && env.KV_REST_API_TOKEN) {
    return { url: env.KV_REST_API_URL, token: env.KV_REST_API_TOKEN };
  }
  return null;
}

const sessionKey = (sessionId: string) => `session:${sessionId}`;

function createRedisStore(redis: Redis, ttlSeconds?: number): SessionStore {
  return {
    backend: "redis",

    save: async (sessionId, state) => {
      try {
        if (ttlSeconds !== undefined) {
          await redis.set(sessionKey(sessionId), state, { ex: ttlSeconds });
        } else {
          await redis.set(sessionKey(sessionId), state);
        }
      } catch (error) {
        console.error(`[SessionStore] Failed to save session ${sessionId}:`, error);
        throw error;
      }
    },

    load: async (sessionId) => {
      try {
        return (await redis.get<SerializedState>(sessionKey(sessionId))) || undefined;
      } catch (error) {
        console.error(`[SessionStore] Failed to load session ${sessionId}:`, error);
        return undefined;
      }
    },

    remove: async (sessionId) => {
      try {
        await redis.del(sessionKey(sessionId));
      } catch (error) {
        console.error(`[SessionStore] Failed to remove session ${sessionId}:`, error);
        throw error;
      }
    },
  };
}

function createMemoryStore(): SessionStore {
  // JSON text, so a loaded state never aliases the saved object
  const sessions = new Map<string, string>();
  return {
    backend: "memory",

    save: async (sessionId, state) => {
      sessions.set(sessionId, JSON.stringify(state));
    },

    load: async (sessionId) => {
      const raw = sessions.get(sessionId);
      if (raw === undefined) return undefined;
      const state: SerializedState = JSON.parse(raw);
      return state;
    },

    remove: async (sessionId) => {
      sessions.delete(sessionId);
    },
  };
}

export function createSessionStore(config: SessionStoreConfig = {}): SessionStore {
  const redisConfig = redisConfigFromEnv(config.env ?? process.env);
  if (!redisConfig) return createMemoryStore();
  return createRedisStore(new Redis(redisConfig), config.ttlSeconds);
}
