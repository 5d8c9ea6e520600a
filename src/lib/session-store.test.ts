import { describe, expect, test } from "vitest";
import { createSessionStore, redisConfigFromEnv } from "./session-store";
import { VimSimulator } from "./vim-simulator";

describe("redisConfigFromEnv", () => {
  test("Redis is opt-in", () => {
    expect(
      redisConfigFromEnv({
        UPSTASH_REDIS_REST_URL: "https://redis.test",
        UPSTASH_REDIS_REST_TOKEN: "test-secret",
      })
    ).toBeNull();
  });

  test("Upstash variables win over KV ones", () => {
    expect(
      redisConfigFromEnv({
        USE_REDIS: "true",
        UPSTASH_REDIS_REST_URL: "https://redis.test",
        UPSTASH_REDIS_REST_TOKEN: "test-secret",
        KV_REST_API_URL: "https://kv.test",
        KV_REST_API_TOKEN: "kv-secret",
      })
    ).toEqual({ url: "https://redis.test", token: "test-secret" });
  });

  test("KV variables as a fallback", () => {
    expect(
      redisConfigFromEnv({
        USE_REDIS: "true",
        KV_REST_API_URL: "https://kv.test",
        KV_REST_API_TOKEN: "kv-secret",
      })
    ).toEqual({ url: "https://kv.test", token: "kv-secret" });
  });

  test("missing credentials", () => {
    expect(redisConfigFromEnv({ USE_REDIS: "true" })).toBeNull();
  });
});

describe("in-memory session store", () => {
  test("saves, loads and removes simulator state", async () => {
    const store = createSessionStore({ env: {} });
    expect(store.backend).toBe("memory");

    const simulator = new VimSimulator("draft");
    simulator.processInput("A!<Esc>yy");
    await store.save("lesson-1", simulator.serializeState());

    const loaded = await store.load("lesson-1");
    const restored = new VimSimulator();
    restored.deserializeState(loaded);
    expect(restored.getContent()).toBe("draft!");
    restored.processInput("p");
    expect(restored.getContent()).toBe("draft!\ndraft!");

    await store.remove("lesson-1");
    expect(await store.load("lesson-1")).toBeUndefined();
  });

  test("a loaded state is a copy", async () => {
    const store = createSessionStore({ env: {} });
    const state = new VimSimulator("a").serializeState();
    await store.save("s", state);
    state.lines.push("mutated");
    expect((await store.load("s"))?.lines).toEqual(["a"]);
  });
});
