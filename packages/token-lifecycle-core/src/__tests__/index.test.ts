import * as core from "../index";

describe("package exports", () => {
  it("should expose the token lifecycle API", () => {
    expect(core.TokenManager).toBeDefined();
    expect(core.TokenManagerFactory).toBeDefined();
    expect(core.InMemoryTokenStore).toBeDefined();
    expect(core.OpaqueTokenCodec).toBeDefined();
    expect(typeof core.authorize).toBe("function");
    expect(typeof core.createScopeGate).toBe("function");
    expect(typeof core.loadTokenManagerConfig).toBe("function");
  });

  it("should expose the error hierarchy", () => {
    const storeError = new core.TokenStoreConnectionError(
      "get",
      new Error("ECONNREFUSED")
    );

    expect(storeError).toBeInstanceOf(core.TokenStoreError);
    expect(storeError).toBeInstanceOf(core.TokenLifecycleError);
    expect(storeError.code).toBe("STORE_CONNECTION_ERROR");
    expect(storeError.toJSON()).toMatchObject({
      name: "TokenStoreConnectionError",
      code: "STORE_CONNECTION_ERROR",
      message: "Store operation 'get' failed: ECONNREFUSED",
      context: { operation: "get", originalError: "ECONNREFUSED" },
    });
    expect(new core.InvalidTokenError().code).toBe("INVALID_TOKEN");
  });

  it("should export default configuration", () => {
    expect(core.DEFAULT_CONFIG).toEqual({
      accessTtl: 3600,
      refreshTtl: 86400,
      enableEvents: true,
    });
    expect(core.TOKEN_TYPE).toBe("Bearer");
  });
});
