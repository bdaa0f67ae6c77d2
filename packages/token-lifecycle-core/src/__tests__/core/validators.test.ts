import { TokenInputValidator } from "../../core/validators";
import { DEFAULT_CONFIG, TokenValidationError } from "../../core/interfaces";

describe("TokenInputValidator", () => {
  let validator: TokenInputValidator;

  beforeEach(() => {
    validator = new TokenInputValidator();
  });

  describe("validateConfig", () => {
    it("should accept the default configuration", () => {
      expect(() => validator.validateConfig(DEFAULT_CONFIG)).not.toThrow();
    });

    it("should reject negative TTLs", () => {
      expect(() =>
        validator.validateConfig({ ...DEFAULT_CONFIG, accessTtl: -1 })
      ).toThrow("Validation failed: accessTtl must be a positive integer (seconds)");
    });

    it("should reject TTLs over one year", () => {
      expect(() =>
        validator.validateConfig({
          ...DEFAULT_CONFIG,
          refreshTtl: 365 * 24 * 60 * 60 + 1,
        })
      ).toThrow("Validation failed: refreshTtl too large (maximum 1 year)");
    });

    it("should attach the offending value as context", () => {
      let caught: unknown;
      try {
        validator.validateConfig({ ...DEFAULT_CONFIG, accessTtl: 0 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TokenValidationError);
      expect(caught).toMatchObject({
        code: "VALIDATION_ERROR",
        context: { accessTtl: 0 },
      });
    });
  });

  describe("validateUserId", () => {
    it("should return a valid user id unchanged", () => {
      expect(validator.validateUserId("user-1")).toBe("user-1");
    });

    it.each([[""], ["   "], [42], [undefined]])(
      "should reject %p",
      (userId) => {
        expect(() => validator.validateUserId(userId)).toThrow(
          TokenValidationError
        );
      }
    );

    it("should reject user ids over 255 characters", () => {
      expect(() => validator.validateUserId("u".repeat(256))).toThrow(
        "Validation failed: userId too long (maximum 255 characters)"
      );
    });
  });

  describe("validateScopes", () => {
    it("should deduplicate and sort scopes", () => {
      expect(
        validator.validateScopes(["storage.write", "admin", "storage.write"])
      ).toEqual(["admin", "storage.write"]);
    });

    it("should accept sets", () => {
      expect(validator.validateScopes(new Set(["b", "a"]))).toEqual(["a", "b"]);
    });

    it("should accept no scopes", () => {
      expect(validator.validateScopes([])).toEqual([]);
    });

    it("should reject scopes containing whitespace", () => {
      expect(() => validator.validateScopes(["storage read"])).toThrow(
        "Validation failed: Scope cannot contain whitespace"
      );
    });

    it("should reject non-string scopes", () => {
      expect(() => validator.validateScopes([1])).toThrow(
        "Validation failed: Scope must be a non-empty string"
      );
    });

    it("should refuse a bare string instead of splitting it", () => {
      expect(() => validator.validateScopes("admin")).toThrow(
        "Validation failed: scopes must be an array or a set of strings"
      );
    });

    it.each([null, undefined, 42, { admin: true }])(
      "should reject %p as a scope list",
      (scopes) => {
        expect(() => validator.validateScopes(scopes)).toThrow(
          TokenValidationError
        );
      }
    );

    it("should reject more than 128 distinct scopes", () => {
      const scopes = Array.from({ length: 129 }, (_, i) => `scope.${i}`);

      expect(() => validator.validateScopes(scopes)).toThrow(
        "Validation failed: Too many scopes (maximum 128)"
      );
    });
  });
});
