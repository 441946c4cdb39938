import jwt from "jsonwebtoken";

import { AuthUtil } from "./auth.utils";

describe("AuthUtil", () => {
  const payload = {
    userId: "user-1",
    email: "client@example.com",
    role: "client",
    accountStatus: "active",
    emailVerified: true,
  } as const;

  it("verifies the access tokens it signs", () => {
    const token = AuthUtil.generateAccessToken(payload);

    expect(AuthUtil.verifyAccessToken(token)).toMatchObject(payload);
  });

  it("rejects a token signed with another secret", () => {
    const token = jwt.sign({ userId: "user-1" }, "other-secret");

    expect(() => AuthUtil.verifyRefreshToken(token)).toThrow(
      expect.objectContaining({
        statusCode: 401,
        errorCode: "AUTH_INVALID_TOKEN",
      })
    );
  });

  it("does not accept an access token as a refresh token", () => {
    const token = AuthUtil.generateAccessToken(payload);

    expect(AuthUtil.decodeRefreshToken(token)).toBeNull();
  });

  it("decodes a fresh refresh token", () => {
    const token = AuthUtil.generateRefreshToken("user-1");

    expect(AuthUtil.decodeRefreshToken(token)).toMatchObject({
      userId: "user-1",
    });
  });

  it.each([
    ["malformed", "not-a-token"],
    [
      "expired",
      jwt.sign({ userId: "user-1" }, "test-refresh-secret", {
        expiresIn: -10,
      }),
    ],
    ["shapeless", jwt.sign({ foo: 1 }, "test-refresh-secret")],
  ])("decodes a %s refresh token to null", (_label, token) => {
    expect(AuthUtil.decodeRefreshToken(token)).toBeNull();
  });

  it("gives two refresh tokens for the same user distinct digests", () => {
    const first = AuthUtil.generateRefreshToken("user-1");
    const second = AuthUtil.generateRefreshToken("user-1");

    expect(AuthUtil.hashToken(first)).toMatch(/^[0-9a-f]{64}$/);
    expect(AuthUtil.hashToken(first)).not.toBe(AuthUtil.hashToken(second));
  });

  it.each([
    ["15m", 900],
    ["7d", 604_800],
    ["2h", 7_200],
    ["3600", 3_600],
  ])("converts %s to %i seconds", (expiry, seconds) => {
    expect(AuthUtil.toSeconds(expiry)).toBe(seconds);
  });

  it("rejects an unreadable expiry", () => {
    expect(() => AuthUtil.toSeconds("soon")).toThrow(
      "Invalid token expiry: soon"
    );
  });
});
