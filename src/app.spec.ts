import request from "supertest";

import app from "@/app";
import { AuthUtil } from "@/modules/auth/auth.utils";

describe("app", () => {
  it("answers on the root path", async () => {
    const response = await request(app).get("/");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: "HomeClean API" });
  });

  it("reports unknown routes", async () => {
    const response = await request(app).get("/api/v1/nowhere");

    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({
      success: false,
      message: "Route GET /api/v1/nowhere not found",
      errorCode: "RESOURCE_NOT_FOUND",
    });
  });

  it("requires a bearer token for the profile", async () => {
    const response = await request(app).get("/api/v1/users/profile");

    expect(response.status).toBe(401);
    expect(response.body.errorCode).toBe("AUTH_TOKEN_NOT_FOUND");
  });

  it("keeps cleaner management away from clients", async () => {
    const token = AuthUtil.generateAccessToken({
      userId: "64b7f0c2a1b2c3d4e5f60718",
      email: "client@example.com",
      role: "client",
      accountStatus: "active",
      emailVerified: true,
    });

    const response = await request(app)
      .get("/api/v1/users/cleaners")
      .set("Authorization", `Bearer ${token}`);

    expect(response.status).toBe(403);
  });

  it("validates the price calculation body", async () => {
    const response = await request(app)
      .post("/api/v1/orders/calculate")
      .send({ items: [] });

    expect(response.status).toBe(400);
    expect(response.body.errorCode).toBe("VALIDATION_ERROR");
  });

  it("validates the password reset confirmation", async () => {
    const response = await request(app)
      .post("/api/v1/auth/reset-password")
      .send({
        email: "client@example.com",
        code: "1234",
        newPassword: "Another-horse-2",
        confirmPassword: "Another-horse-3",
      });

    expect(response.status).toBe(400);
    expect(response.body.errorCode).toBe("VALIDATION_ERROR");
  });

  it("rejects malformed JSON", async () => {
    const response = await request(app)
      .post("/api/v1/orders/calculate")
      .set("Content-Type", "application/json")
      .send('{"items": [');

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Invalid JSON format in request body");
  });
});
