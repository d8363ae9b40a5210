/**
 * HTTP surface tests: authentication, access rules, schema strictness and the
 * registration round trip, all through `app.inject` on the in-memory store.
 */
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { SYSTEM_ACTOR } from "./actor";
import { buildApp } from "./app";
import { recordAudit } from "./audit";
import { generateToken } from "./middleware/auth";
import { getRegistryStore, resetRegistryStoreForTests } from "./store";
import { InMemoryRegistryStore } from "./store/memory-store";
import { TEST_PASSWORD, registrationInput, seedAdmin, seedIdentity } from "./test-fixtures";

const OWNER = "111122223333";

function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}` };
}

function citizenToken(nationalId = OWNER): string {
  return generateToken({ userType: "CITIZEN", citizenId: 7, username: "citizen", nationalId });
}

describe("Civic Registry API", () => {
  let app: FastifyInstance;
  let adminToken: string;

  beforeAll(async () => {
    app = await buildApp(false);
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    const admin = await seedAdmin();
    adminToken = generateToken({
      userType: "ADMIN",
      adminId: admin.adminId,
      username: admin.username,
      fullName: "Test Reviewer",
    });
  });

  describe("health", () => {
    it("reports liveness and echoes the request id", async () => {
      const res = await app.inject({ method: "GET", url: "/health", headers: { "x-request-id": "req-123" } });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: "ok" });
      expect(res.headers["x-request-id"]).toBe("req-123");
    });

    it("reports readiness of the store", async () => {
      const res = await app.inject({ method: "GET", url: "/ready" });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: "ok", store: "memory" });
    });

    it("degrades readiness when the store cannot be reached", async () => {
      const store = new InMemoryRegistryStore();
      vi.spyOn(store, "ping").mockRejectedValue(new Error("connection refused"));
      resetRegistryStoreForTests(store);

      const res = await app.inject({ method: "GET", url: "/ready" });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ status: "degraded", reason: "store_unreachable" });
    });
  });

  describe("authentication and access", () => {
    it("requires a bearer token on protected routes", async () => {
      const missing = await app.inject({ method: "GET", url: "/api/v1/admin/stats" });
      expect(missing.statusCode).toBe(401);
      expect(missing.json().error).toBe("AUTHENTICATION_REQUIRED");

      const invalid = await app.inject({ method: "GET", url: "/api/v1/admin/stats", headers: bearer("not-a-jwt") });
      expect(invalid.statusCode).toBe(401);
      expect(invalid.json().error).toBe("INVALID_TOKEN");
    });

    it("keeps citizens out of administrator routes", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/admin/stats", headers: bearer(citizenToken()) });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ error: "FORBIDDEN", message: "Administrator access required", statusCode: 403 });
    });

    it("answers 404 when a citizen asks for someone else's identity", async () => {
      await seedIdentity();
      await seedIdentity({ nationalId: "999988887777", name: "Other Person" });

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/identities/999988887777/service-counts",
        headers: bearer(citizenToken()),
      });
      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe("IDENTITY_NOT_FOUND");

      const own = await app.inject({
        method: "GET",
        url: `/api/v1/identities/${OWNER}/service-counts`,
        headers: bearer(citizenToken()),
      });
      expect(own.statusCode).toBe(200);
      expect(own.json()).toEqual({ counts: { taxId: 0, voter: 0, sim: 0, bank: 0, case: 0 } });
    });

    it("rejects bad credentials", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/auth/login",
        payload: { username: "reviewer", password: "wrong-password" },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: "INVALID_CREDENTIALS",
        message: "Invalid username or password",
        statusCode: 401,
      });
    });

    it("returns the current principal", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/auth/me", headers: bearer(adminToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ user: { role: "Admin", username: "reviewer" }, account: null });
    });
  });

  describe("registration round trip", () => {
    it("submits, approves and logs the new citizen in", async () => {
      const submitted = await app.inject({
        method: "POST",
        url: "/api/v1/registrations",
        payload: registrationInput(),
      });
      expect(submitted.statusCode).toBe(201);
      expect(submitted.json()).toEqual({ requestId: 1, status: "Pending" });

      const pending = await app.inject({
        method: "GET",
        url: "/api/v1/admin/registrations/pending",
        headers: bearer(adminToken),
      });
      expect(pending.json().registrations).toHaveLength(1);

      const approved = await app.inject({
        method: "POST",
        url: "/api/v1/admin/registrations/1/approve",
        headers: bearer(adminToken),
        payload: {},
      });
      expect(approved.statusCode).toBe(200);
      expect(approved.json().approval).toMatchObject({ requestId: 1, nationalId: "444455556666", username: "applicant" });

      const login = await app.inject({
        method: "POST",
        url: "/api/v1/auth/login",
        payload: { username: "applicant", password: TEST_PASSWORD },
      });
      expect(login.statusCode).toBe(200);
      const body = login.json();
      expect(body.user).toMatchObject({ userType: "CITIZEN", username: "applicant", nationalId: "444455556666" });

      const dashboard = await app.inject({
        method: "GET",
        url: "/api/v1/identities/444455556666",
        headers: bearer(body.token),
      });
      expect(dashboard.statusCode).toBe(200);
      expect(dashboard.json().dashboard).toMatchObject({
        identity: { nationalId: "444455556666", name: "New Applicant" },
        accountStatus: "Active",
      });
    });

    it("maps domain validation failures to 400", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/registrations",
        payload: registrationInput({ nationalId: "12345" }),
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "INVALID_INPUT",
        message: "nationalId: validation.national_id",
        statusCode: 400,
      });
    });
  });

  describe("request schemas", () => {
    it("rejects unknown body fields", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/v1/registrations",
        payload: { ...registrationInput(), nickname: "app" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("INVALID_REQUEST_BODY");
    });

    it("rejects malformed path and query parameters", async () => {
      const path = await app.inject({ method: "GET", url: "/api/v1/identities/12345", headers: bearer(adminToken) });
      expect(path.statusCode).toBe(400);
      expect(path.json().error).toBe("INVALID_PATH_PARAMS");

      const query = await app.inject({
        method: "GET",
        url: "/api/v1/admin/reports/minimum?kind=passport&threshold=2",
        headers: bearer(adminToken),
      });
      expect(query.statusCode).toBe(400);
      expect(query.json().error).toBe("INVALID_QUERY_PARAMS");
    });
  });

  describe("administration", () => {
    it("deletes an identity and answers 404 afterwards", async () => {
      await seedIdentity();

      const deleted = await app.inject({
        method: "DELETE",
        url: `/api/v1/admin/identities/${OWNER}`,
        headers: bearer(adminToken),
      });
      expect(deleted.statusCode).toBe(204);

      const missing = await app.inject({ method: "GET", url: `/api/v1/identities/${OWNER}`, headers: bearer(adminToken) });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toEqual({
        error: "IDENTITY_NOT_FOUND",
        message: `No identity with national ID ${OWNER}`,
        statusCode: 404,
      });
    });

    it("runs the minimum-threshold report", async () => {
      await seedIdentity();
      await app.inject({
        method: "POST",
        url: `/api/v1/identities/${OWNER}/sims`,
        headers: bearer(adminToken),
        payload: { simNumber: "8991000000000001", provider: "Northline" },
      });

      const res = await app.inject({
        method: "GET",
        url: "/api/v1/admin/reports/minimum?kind=sim&threshold=1",
        headers: bearer(adminToken),
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        identities: [{ nationalId: OWNER, name: "Test Person", count: 1, keys: ["8991000000000001"] }],
      });
    });

    it("clamps oversized audit pages to 100 entries", async () => {
      await getRegistryStore().transaction(async (tx) => {
        for (let index = 1; index <= 105; index += 1) {
          await recordAudit(tx, SYSTEM_ACTOR, { operation: "UPDATE_TAX_ID", table: "tax_id", recordId: index });
        }
      });

      const res = await app.inject({ method: "GET", url: "/api/v1/admin/audit?limit=500", headers: bearer(adminToken) });
      expect(res.statusCode).toBe(200);
      const { entries } = res.json();
      expect(entries).toHaveLength(100);
      expect(entries[0]).toMatchObject({ logId: 106, recordId: "105" });
      expect(entries[99]).toMatchObject({ logId: 7, recordId: "6" });
    });
  });

  describe("OpenAPI document", () => {
    it("marks protected operations with bearer security and default responses", async () => {
      const res = await app.inject({ method: "GET", url: "/api/v1/openapi.json" });
      expect(res.statusCode).toBe(200);
      const doc = res.json();

      const stats = doc.paths["/api/v1/admin/stats"].get;
      expect(stats.security).toEqual([{ bearerAuth: [] }]);
      expect(stats.operationId).toBe("get_api_v1_admin_stats");
      expect(stats.tags).toEqual(["reports"]);
      expect(Object.keys(stats.responses)).toEqual(
        expect.arrayContaining(["200", "400", "401", "403", "404", "409", "422", "429", "500"])
      );

      expect(doc.paths["/api/v1/auth/login"].post.security).toBeUndefined();
    });
  });
});
