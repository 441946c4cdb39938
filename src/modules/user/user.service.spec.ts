import { Types } from "mongoose";

import { cleaningService, user } from "../../../test/factories";
import {
  InMemoryCleaningServiceStore,
  InMemoryUserStore,
  RecordingNotifier,
} from "../../../test/fakes";

import { UserService } from "./user.service";

describe("UserService", () => {
  const sofa = cleaningService({ name: "Sofa cleaning" });

  let users: InMemoryUserStore;
  let services: InMemoryCleaningServiceStore;

  beforeEach(() => {
    users = new InMemoryUserStore();
    services = new InMemoryCleaningServiceStore();
    services.collection.seed(sofa);
  });

  describe("createCleaner", () => {
    const payload = {
      fullName: "Test Cleaner",
      email: "Cleaner@Example.com",
      serviceIds: [sofa._id.toString()],
    };

    it("creates an active cleaner and mails the credentials", async () => {
      const notifier = new RecordingNotifier();
      const result = await new UserService(
        users,
        services,
        notifier
      ).createCleaner(payload);

      expect(result.emailSent).toBe(true);
      expect(result.temporaryPassword).toBeUndefined();
      expect(result.cleaner).toMatchObject({
        email: "cleaner@example.com",
        role: "cleaner",
        accountStatus: "active",
        emailVerified: true,
        serviceIds: [sofa._id.toString()],
      });
      expect(notifier.kinds()).toEqual(["credentials"]);
    });

    it("returns the password when the mail could not be sent", async () => {
      const result = await new UserService(
        users,
        services,
        new RecordingNotifier(false)
      ).createCleaner(payload);

      expect(result.emailSent).toBe(false);
      expect(result.temporaryPassword).toHaveLength(12);
    });

    it("refuses an unknown service", async () => {
      await expect(
        new UserService(users, services, new RecordingNotifier()).createCleaner(
          { ...payload, serviceIds: [new Types.ObjectId().toString()] }
        )
      ).rejects.toMatchObject({
        statusCode: 400,
        errorCode: "SERVICE_NOT_FOUND",
      });
      expect(users.collection.docs).toHaveLength(0);
    });
  });

  it("filters cleaners by search text and service", async () => {
    const service = new UserService(users, services, new RecordingNotifier());

    await service.listCleaners({
      search: "a.b",
      serviceId: sofa._id.toString(),
    });

    expect(users.collection.lastFilter).toEqual({
      role: "cleaner",
      isDeleted: { $ne: true },
      $or: [{ fullName: /a\.b/i }, { email: /a\.b/i }],
      serviceIds: sofa._id,
    });
  });

  it("leaves serviceIds out of a client profile", async () => {
    const client = user({ phoneNumber: undefined });
    users.collection.seed(client);

    const profile = await new UserService(
      users,
      services,
      new RecordingNotifier()
    ).getProfile(client._id.toString());

    expect(profile.serviceIds).toBeUndefined();
    expect(profile.phone).toBe("");
  });

  it("updates only the supplied profile fields", async () => {
    const client = user({ fullName: "Old Name", address: "1 Main St" });
    users.collection.seed(client);

    const profile = await new UserService(
      users,
      services,
      new RecordingNotifier()
    ).updateProfile(client._id.toString(), { fullName: "New Name" });

    expect(profile).toMatchObject({
      fullName: "New Name",
      address: "1 Main St",
    });
  });
});
