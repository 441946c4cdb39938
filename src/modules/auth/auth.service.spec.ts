import { user } from "../../../test/factories";
import {
  InMemoryCleaningServiceStore,
  InMemoryUserStore,
  RecordingNotifier,
} from "../../../test/fakes";
import type { IUser } from "@/modules/user/user.interface";
import { UserService } from "@/modules/user/user.service";
import { OTPUtil } from "@/utils/otp.utils";
import { hashPassword } from "@/utils/password.utils";

import { AuthService } from "./auth.service";

describe("AuthService", () => {
  const now = new Date("2030-01-01T09:00:00.000Z");
  const password = "Correct-horse-1";

  let users: InMemoryUserStore;
  let notifier: RecordingNotifier;
  let passwordHash: string;

  const build = (verificationRequired: boolean) =>
    new AuthService(
      users,
      new UserService(users, new InMemoryCleaningServiceStore(), notifier),
      notifier,
      { verificationRequired, now: () => now }
    );

  const seedUser = (overrides: Partial<IUser> = {}) => {
    const seeded = user({ password: passwordHash, ...overrides });
    users.collection.seed(seeded);
    return seeded;
  };

  beforeAll(async () => {
    passwordHash = await hashPassword(password);
  });

  beforeEach(() => {
    users = new InMemoryUserStore();
    notifier = new RecordingNotifier();
  });

  describe("register", () => {
    const payload = {
      email: "New.Client@Example.com",
      password,
      fullName: "New Client",
    };

    it("leaves the account pending until the email is verified", async () => {
      const result = await build(true).register(payload);

      expect(result.verificationRequired).toBe(true);
      expect(result.verification?.expiresInMinutes).toBe(10);
      expect(result.user).toMatchObject({
        email: "new.client@example.com",
        role: "client",
        accountStatus: "pending",
        emailVerified: false,
      });
      expect(notifier.kinds()).toEqual(["verification"]);
      expect(notifier.lastVerificationCode).toMatch(/^\d{4}$/);
    });

    it("activates the account straight away when verification is off", async () => {
      const result = await build(false).register(payload);

      expect(result.verification).toBeUndefined();
      expect(result.user.accountStatus).toBe("active");
      expect(notifier.kinds()).toEqual(["welcome"]);
    });

    it("refuses an email that is already registered", async () => {
      seedUser({ email: "new.client@example.com" });

      await expect(build(true).register(payload)).rejects.toMatchObject({
        statusCode: 409,
        errorCode: "AUTH_EMAIL_ALREADY_EXISTS",
      });
    });
  });

  describe("verifyEmail", () => {
    it("activates the account with the mailed code", async () => {
      const auth = build(true);
      await auth.register({
        email: "client@example.com",
        password,
        fullName: "Test Client",
      });

      await expect(
        auth.verifyEmail({
          email: "client@example.com",
          code: notifier.lastVerificationCode ?? "",
        })
      ).resolves.toEqual({ email: "client@example.com", emailVerified: true });

      expect(users.collection.docs[0]).toMatchObject({
        emailVerified: true,
        accountStatus: "active",
      });
      expect(notifier.kinds()).toEqual(["verification", "welcome"]);
    });

    it("counts a wrong code as an attempt", async () => {
      const auth = build(true);
      await auth.register({
        email: "client@example.com",
        password,
        fullName: "Test Client",
      });

      await expect(
        auth.verifyEmail({ email: "client@example.com", code: "0000" })
      ).rejects.toMatchObject({ statusCode: 400 });
      expect(users.collection.docs[0].emailVerificationAttempts).toBe(1);
    });
  });

  describe("login", () => {
    it("issues tokens and resets the failure count", async () => {
      const client = seedUser({ failedLoginAttempts: 2 });

      const result = await build(true).login({
        email: "client@example.com",
        password,
      });

      expect(result.user.email).toBe("client@example.com");
      expect(typeof result.tokens.accessToken).toBe("string");
      expect(typeof result.tokens.refreshToken).toBe("string");
      expect(client.failedLoginAttempts).toBe(0);
      expect(client.lastLoginAt).toEqual(now);
    });

    it("locks the account after five wrong passwords", async () => {
      const client = seedUser();
      const auth = build(true);
      const wrong = { email: "client@example.com", password: "wrong-pass" };

      for (let attempt = 1; attempt <= 4; attempt++) {
        await expect(auth.login(wrong)).rejects.toMatchObject({
          statusCode: 401,
          errorCode: "AUTH_UNAUTHORIZED_ACCESS",
        });
      }
      await expect(auth.login(wrong)).rejects.toMatchObject({
        errorCode: "AUTH_ACCOUNT_LOCKED",
      });

      expect(client.lockedUntil).toEqual(
        new Date("2030-01-01T09:15:00.000Z")
      );
      await expect(
        auth.login({ email: "client@example.com", password })
      ).rejects.toMatchObject({ errorCode: "AUTH_ACCOUNT_LOCKED" });
    });

    it("refuses an unverified account with the right password", async () => {
      seedUser({ emailVerified: false, accountStatus: "pending" });

      await expect(
        build(true).login({ email: "client@example.com", password })
      ).rejects.toMatchObject({ statusCode: 403 });
    });

    it("checks the password before reporting a suspension", async () => {
      seedUser({ accountStatus: "suspended" });
      const auth = build(true);

      await expect(
        auth.login({ email: "client@example.com", password: "wrong-pass" })
      ).rejects.toMatchObject({ statusCode: 401 });
      await expect(
        auth.login({ email: "client@example.com", password })
      ).rejects.toMatchObject({ statusCode: 403 });
    });
  });

  describe("refresh tokens", () => {
    it("stops working after logout", async () => {
      const client = seedUser();
      const auth = build(true);
      const { tokens } = await auth.login({
        email: "client@example.com",
        password,
      });

      await expect(
        auth.refreshAccessToken(tokens.refreshToken)
      ).resolves.toHaveProperty("accessToken");

      await auth.logout(client._id.toString(), tokens.refreshToken);

      await expect(
        auth.refreshAccessToken(tokens.refreshToken)
      ).rejects.toMatchObject({
        statusCode: 401,
        errorCode: "AUTH_INVALID_TOKEN",
      });
      expect(client.revokedRefreshTokens[0].reason).toBe("logout");
    });

    it("are invalidated by a password change", async () => {
      const client = seedUser();
      const auth = build(true);
      const { tokens } = await auth.login({
        email: "client@example.com",
        password,
      });

      await auth.changePassword(client._id.toString(), {
        currentPassword: password,
        newPassword: "Another-horse-2",
      });

      await expect(
        auth.refreshAccessToken(tokens.refreshToken)
      ).rejects.toMatchObject({ errorCode: "AUTH_INVALID_TOKEN" });
    });
  });

  describe("changePassword", () => {
    it("stores the new hash and notifies the user", async () => {
      const client = seedUser();
      const auth = build(true);

      await expect(
        auth.changePassword(client._id.toString(), {
          currentPassword: password,
          newPassword: "Another-horse-2",
        })
      ).resolves.toEqual({ changedAt: now });

      expect(client.passwordChangedAt).toEqual(now);
      expect(notifier.kinds()).toEqual(["password-changed"]);
      await expect(
        auth.login({ email: "client@example.com", password: "Another-horse-2" })
      ).resolves.toHaveProperty("tokens");
    });

    it("refuses a wrong current password", async () => {
      const client = seedUser();

      await expect(
        build(true).changePassword(client._id.toString(), {
          currentPassword: "wrong-pass",
          newPassword: "Another-horse-2",
        })
      ).rejects.toMatchObject({ statusCode: 400 });
      expect(client.password).toBe(passwordHash);
    });
  });

  describe("password reset", () => {
    const newPassword = "Another-horse-2";
    const inTenMinutes = new Date("2030-01-01T09:10:00.000Z");

    it("mails a code to a registered account", async () => {
      const client = seedUser();

      await expect(
        build(true).requestPasswordReset("Client@Example.com")
      ).resolves.toEqual({ expiresInMinutes: 10 });

      expect(notifier.kinds()).toEqual(["password-reset"]);
      expect(notifier.lastPasswordResetCode).toMatch(/^\d{4}$/);
      expect(client.passwordResetExpiresAt).toEqual(inTenMinutes);
      expect(client.passwordResetCodeHash).toBe(
        OTPUtil.hash(notifier.lastPasswordResetCode ?? "")
      );
    });

    it("answers an unknown email the same way without mailing", async () => {
      await expect(
        build(true).requestPasswordReset("nobody@example.com")
      ).resolves.toEqual({ expiresInMinutes: 10 });

      expect(notifier.sent).toEqual([]);
    });

    it("sets the new password and lifts a login lockout", async () => {
      const client = seedUser({
        failedLoginAttempts: 3,
        lockedUntil: new Date("2030-01-01T09:05:00.000Z"),
      });
      const auth = build(true);
      await auth.requestPasswordReset("client@example.com");

      await expect(
        auth.resetPassword({
          email: "client@example.com",
          code: notifier.lastPasswordResetCode ?? "",
          newPassword,
        })
      ).resolves.toEqual({ changedAt: now });

      expect(client.passwordChangedAt).toEqual(now);
      expect(client.passwordResetCodeHash).toBeUndefined();
      expect(client.lockedUntil).toBeNull();
      expect(notifier.kinds()).toEqual(["password-reset", "password-changed"]);
      await expect(
        auth.login({ email: "client@example.com", password: newPassword })
      ).resolves.toHaveProperty("tokens");
    });

    it("refuses an expired code and counts the attempt", async () => {
      const client = seedUser({
        passwordResetCodeHash: OTPUtil.hash("1234"),
        passwordResetExpiresAt: new Date("2030-01-01T08:59:00.000Z"),
      });

      await expect(
        build(true).resetPassword({
          email: "client@example.com",
          code: "1234",
          newPassword,
        })
      ).rejects.toMatchObject({
        statusCode: 400,
        message: "Invalid or expired password reset code.",
      });
      expect(client.passwordResetAttempts).toBe(1);
      expect(client.password).toBe(passwordHash);
    });

    it("gives an unknown email the same refusal as a wrong code", async () => {
      await expect(
        build(true).resetPassword({
          email: "nobody@example.com",
          code: "1234",
          newPassword,
        })
      ).rejects.toMatchObject({
        statusCode: 400,
        message: "Invalid or expired password reset code.",
      });
    });

    it("stops accepting codes after too many wrong attempts", async () => {
      const client = seedUser({
        passwordResetCodeHash: OTPUtil.hash("1234"),
        passwordResetExpiresAt: inTenMinutes,
        passwordResetAttempts: 5,
      });

      await expect(
        build(true).resetPassword({
          email: "client@example.com",
          code: "1234",
          newPassword,
        })
      ).rejects.toMatchObject({
        statusCode: 400,
        errorCode: "AUTH_TOO_MANY_ATTEMPTS",
      });
      expect(client.password).toBe(passwordHash);
    });
  });
});
