import RedisMock from "ioredis-mock";
import { Redis } from "ioredis";
import {
  ITokenStore,
  TokenRecord,
  TokenStoreConnectionError,
  TokenStoreError,
} from "@tokenward/core";
import { IoredisTokenStore, DEFAULT_PREFIX } from "../ioredis.adapter";

const DIGEST = "c".repeat(64);

function createTestRecord(overrides?: Partial<TokenRecord>): TokenRecord {
  const now = Date.now();
  return {
    digest: DIGEST,
    userId: "test-user",
    scopes: ["storage.read"],
    kind: "refresh",
    issuedAt: now,
    expiresAt: now + 60_000,
    linkedDigest: "d".repeat(64),
    generation: 2,
    sessionId: "test-session",
    ...overrides,
  };
}

describe("IoredisTokenStore", () => {
  let redis: Redis;
  let store: IoredisTokenStore;

  beforeEach(() => {
    redis = new RedisMock();
    store = new IoredisTokenStore(redis);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await redis.flushall();
  });

  it("should implement ITokenStore", () => {
    expect(store).toMatchObject<ITokenStore>({
      put: expect.any(Function),
      get: expect.any(Function),
      delete: expect.any(Function),
      health: expect.any(Function),
    });
  });

  describe("put", () => {
    it("should write JSON under the prefixed key with a TTL", async () => {
      const record = createTestRecord();

      await store.put(DIGEST, record, 60);

      expect(await redis.get(`${DEFAULT_PREFIX}:${DIGEST}`)).toBe(
        JSON.stringify(record)
      );
      const ttl = await redis.ttl(`${DEFAULT_PREFIX}:${DIGEST}`);
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(60);
    });

    it("should honour a custom key prefix", async () => {
      const prefixed = new IoredisTokenStore(redis, { keyPrefix: "auth" });

      await prefixed.put(DIGEST, createTestRecord(), 60);

      expect(await redis.exists(`auth:${DIGEST}`)).toBe(1);
      expect(prefixed.getTokenKey(DIGEST)).toBe(`auth:${DIGEST}`);
    });

    it("should map connection failures to TokenStoreConnectionError", async () => {
      jest
        .spyOn(redis, "set")
        .mockRejectedValue(
          Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), {
            code: "ECONNREFUSED",
          })
        );

      await expect(store.put(DIGEST, createTestRecord(), 60)).rejects.toThrow(
        TokenStoreConnectionError
      );
    });
  });

  describe("get", () => {
    it("should read back what was written", async () => {
      const record = createTestRecord();
      await store.put(DIGEST, record, 60);

      await expect(store.get(DIGEST)).resolves.toEqual(record);
    });

    it("should return null for a missing key", async () => {
      await expect(store.get(DIGEST)).resolves.toBeNull();
    });

    it("should fail on unparsable data instead of reporting a missing key", async () => {
      await redis.set(`${DEFAULT_PREFIX}:${DIGEST}`, "{not json");

      await expect(store.get(DIGEST)).rejects.toThrow(TokenStoreError);
    });

    it("should fail on data that is not a token record", async () => {
      await redis.set(
        `${DEFAULT_PREFIX}:${DIGEST}`,
        JSON.stringify({ userId: "test-user" })
      );

      await expect(store.get(DIGEST)).rejects.toThrow(
        /^Store operation 'get' failed: Malformed token record/
      );
    });

    it("should map other client errors to TokenStoreError", async () => {
      jest
        .spyOn(redis, "get")
        .mockRejectedValue(new Error("WRONGTYPE Operation against a key"));

      const error = await store.get(DIGEST).catch((e) => e);

      expect(error).toBeInstanceOf(TokenStoreError);
      expect(error).not.toBeInstanceOf(TokenStoreConnectionError);
      expect(error.code).toBe("STORE_FAILURE");
    });
  });

  describe("delete", () => {
    it("should report whether a key was removed", async () => {
      await store.put(DIGEST, createTestRecord(), 60);

      await expect(store.delete(DIGEST)).resolves.toBe(true);
      await expect(store.delete(DIGEST)).resolves.toBe(false);
      await expect(store.get(DIGEST)).resolves.toBeNull();
    });

    it("should map timeouts to TokenStoreConnectionError", async () => {
      jest
        .spyOn(redis, "del")
        .mockRejectedValue(
          Object.assign(new Error("read ETIMEDOUT"), { code: "ETIMEDOUT" })
        );

      await expect(store.delete(DIGEST)).rejects.toThrow(
        TokenStoreConnectionError
      );
    });
  });

  describe("health", () => {
    it("should be healthy", async () => {
      await expect(store.health()).resolves.toBe(true);
    });

    it("should return false when Redis is not available", async () => {
      jest.spyOn(redis, "ping").mockRejectedValue(new Error("Connection failed"));

      await expect(store.health()).resolves.toBe(false);
    });
  });

  describe("close", () => {
    it("should quit the client", async () => {
      const quit = jest.spyOn(redis, "quit").mockResolvedValue("OK");

      await store.close();

      expect(quit).toHaveBeenCalledTimes(1);
    });

    it("should disconnect when quit fails", async () => {
      jest.spyOn(redis, "quit").mockRejectedValue(new Error("Connection is closed."));
      const disconnect = jest
        .spyOn(redis, "disconnect")
        .mockImplementation(() => undefined);

      await store.close();

      expect(disconnect).toHaveBeenCalledTimes(1);
    });
  });
});
