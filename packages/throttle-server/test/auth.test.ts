import { describe, expect, it } from "vitest";
import { assertControlAuth, mintIdentityToken, resolveIdentity, verifyIdentityToken } from "../src/auth.js";

const secret = "test-secret";

describe("assertControlAuth", () => {
  it("accepts the configured bearer token", () => {
    expect(() => assertControlAuth("Bearer control-token", "control-token")).not.toThrow();
  });

  it("rejects missing or mismatched tokens", () => {
    expect(() => assertControlAuth(undefined, "control-token")).toThrow("Unauthorized");
    expect(() => assertControlAuth("Basic control-token", "control-token")).toThrow("Unauthorized");
    expect(() => assertControlAuth("Bearer other", "control-token")).toThrow("Unauthorized");
  });
});

describe("identity tokens", () => {
  it("round-trips the subject claim", () => {
    const token = mintIdentityToken({ subject: "alice" }, secret, 60);

    expect(verifyIdentityToken(token, secret)).toEqual({ subject: "alice" });
  });

  it("rejects tokens signed with another secret", () => {
    const token = mintIdentityToken({ subject: "alice" }, "other-secret", 60);

    expect(() => verifyIdentityToken(token, secret)).toThrow();
  });
});

describe("resolveIdentity", () => {
  it("throttles verified users by subject", () => {
    const token = mintIdentityToken({ subject: "alice" }, secret, 60);

    expect(resolveIdentity({ authorization: `Bearer ${token}`, ip: "10.0.0.1" }, secret)).toBe("user:alice");
  });

  it("falls back to the address without a valid token", () => {
    expect(resolveIdentity({ authorization: undefined, ip: "10.0.0.1" }, secret)).toBe("ip:10.0.0.1");
    expect(resolveIdentity({ authorization: "Bearer not-a-jwt", ip: "10.0.0.1" }, secret)).toBe("ip:10.0.0.1");
  });
});
