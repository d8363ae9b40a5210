import { beforeEach, describe, expect, it, vi } from "vitest";
import type { AdminActor } from "../actor";
import { rejectRegistration } from "../registrations";
import { resetRegistryStoreForTests } from "./index";
import { PostgresRegistryStore } from "./postgres-store";

type Statement = { text: string; params: unknown[] };
type FakeResult = { rows: Array<Record<string, unknown>>; rowCount: number };
type Responder = (text: string) => FakeResult;

const fake = vi.hoisted(() => {
  const statements: Statement[] = [];
  const empty: Responder = () => ({ rows: [], rowCount: 0 });
  const state = { respond: empty };
  const query = vi.fn(async (text: string, params: unknown[] = []) => {
    statements.push({ text, params });
    return state.respond(text);
  });
  const release = vi.fn();
  const end = vi.fn(async () => undefined);
  return {
    statements,
    state,
    empty,
    release,
    end,
    client: { query, release },
    pool: { query, end },
  };
});

vi.mock("../db", () => ({
  pool: fake.pool,
  getClient: async () => fake.client,
  runQuery: (
    executor: { query: (text: string, params: unknown[]) => Promise<FakeResult> },
    text: string,
    params: unknown[] = []
  ) => executor.query(text, params),
}));

const IDENTITY_ROW = {
  national_id: "111122223333",
  name: "Test Person",
  gender: "F",
  birth_date: "1990-05-17",
  mobile: "9876543210",
  email: null,
  created_at: "2026-01-01T00:00:00.000Z",
};

const PENDING_REGISTRATION_ROW = {
  request_id: 1,
  username: "applicant",
  password_hash: "$argon2id$placeholder",
  national_id: "444455556666",
  name: "New Applicant",
  gender: "M",
  birth_date: "1985-09-01",
  mobile: "9123456780",
  email: "applicant@example.test",
  request_date: new Date("2026-01-01T00:00:00.000Z"),
  status: "Pending",
  reviewed_by: null,
  review_date: null,
  rejection_reason: null,
};

function texts(): string[] {
  return fake.statements.map((statement) => statement.text.replace(/\s+/g, " ").trim());
}

beforeEach(() => {
  fake.statements.length = 0;
  fake.state.respond = fake.empty;
  fake.release.mockClear();
  fake.end.mockClear();
});

describe("PostgresRegistryStore", () => {
  it("wraps work in a transaction with a lock timeout and commits", async () => {
    fake.state.respond = (text) =>
      text.includes("FROM identity WHERE national_id") ? { rows: [IDENTITY_ROW], rowCount: 1 } : { rows: [], rowCount: 0 };
    const store = new PostgresRegistryStore();

    const found = await store.transaction((tx) => tx.findIdentity("111122223333"));

    expect(found).toEqual(IDENTITY_ROW);
    expect(texts()).toEqual([
      "BEGIN",
      "SET LOCAL lock_timeout = '5s'",
      "SELECT national_id, name, gender, birth_date, mobile, email, created_at FROM identity WHERE national_id = $1",
      "COMMIT",
    ]);
    expect(fake.statements[2].params).toEqual(["111122223333"]);
    expect(fake.release).toHaveBeenCalledTimes(1);
  });

  it("opens read-only transactions at repeatable read", async () => {
    const store = new PostgresRegistryStore();
    await store.transaction(async () => "done", { readOnly: true });
    expect(texts()[0]).toBe("BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY");
  });

  it("rolls back and translates driver errors", async () => {
    fake.state.respond = (text) => {
      if (text.startsWith("INSERT INTO identity")) {
        throw Object.assign(new Error("duplicate key value violates unique constraint"), {
          code: "23505",
          constraint: "identity_pkey",
        });
      }
      return { rows: [], rowCount: 0 };
    };
    const store = new PostgresRegistryStore();

    await expect(
      store.transaction((tx) =>
        tx.insertIdentity({
          national_id: "111122223333",
          name: "Test Person",
          gender: "F",
          birth_date: "1990-05-17",
          mobile: "9876543210",
          email: null,
        })
      )
    ).rejects.toMatchObject({ kind: "CONFLICT", code: "NATIONAL_ID_TAKEN" });

    expect(texts().at(-1)).toBe("ROLLBACK");
    expect(texts()).not.toContain("COMMIT");
    expect(fake.release).toHaveBeenCalledTimes(1);
  });

  it("releases a connection whose ROLLBACK failed as broken", async () => {
    const rollbackFailure = new Error("connection terminated");
    fake.state.respond = (text) => {
      if (text === "ROLLBACK") throw rollbackFailure;
      if (text.startsWith("DELETE FROM sim_record")) throw new Error("statement timeout");
      return { rows: [], rowCount: 0 };
    };
    const store = new PostgresRegistryStore();

    await expect(store.transaction((tx) => tx.deleteSim("8991000000000001"))).rejects.toThrow("statement timeout");

    expect(fake.release).toHaveBeenCalledTimes(1);
    expect(fake.release).toHaveBeenCalledWith(rollbackFailure);
  });

  it("returns the pooled connection cleanly after a successful rollback", async () => {
    fake.state.respond = (text) => {
      if (text.startsWith("DELETE FROM sim_record")) throw new Error("statement timeout");
      return { rows: [], rowCount: 0 };
    };
    const store = new PostgresRegistryStore();

    await expect(store.transaction((tx) => tx.deleteSim("8991000000000001"))).rejects.toThrow("statement timeout");

    expect(fake.release).toHaveBeenCalledWith(undefined);
  });

  it("reports no transition when the request left Pending concurrently", async () => {
    const store = new PostgresRegistryStore();

    const affected = await store.transaction((tx) =>
      tx.transitionRegistration(1, { status: "Approved", reviewed_by: 1, rejection_reason: null })
    );

    expect(affected).toBe(0);
    expect(texts()[2]).toBe(
      "UPDATE registration_request SET status = $2, reviewed_by = $3, review_date = NOW(), rejection_reason = $4 WHERE request_id = $1 AND status = 'Pending'"
    );
  });

  it("turns a lost review race into a conflict and rolls back", async () => {
    resetRegistryStoreForTests(new PostgresRegistryStore());
    fake.state.respond = (text) =>
      text.includes("FROM registration_request") && text.includes("FOR UPDATE")
        ? { rows: [PENDING_REGISTRATION_ROW], rowCount: 1 }
        : { rows: [], rowCount: 0 };
    const reviewer: AdminActor = { role: "Admin", adminId: 1, username: "reviewer", ipAddress: null };

    await expect(rejectRegistration(1, reviewer, { reason: "Duplicate application" })).rejects.toMatchObject({
      kind: "CONFLICT",
      code: "REGISTRATION_ALREADY_REVIEWED",
    });

    expect(texts().some((text) => text.startsWith("INSERT INTO audit_log"))).toBe(false);
    expect(texts().at(-1)).toBe("ROLLBACK");
    expect(texts()).not.toContain("COMMIT");
  });

  it("escapes LIKE wildcards in directory searches", async () => {
    const store = new PostgresRegistryStore();
    await store.transaction((tx) => tx.listIdentities({ search: " 50%_off ", limit: 20, offset: 0 }));

    const search = fake.statements.find((statement) => statement.text.includes("LEFT JOIN citizen_account"));
    expect(search?.params).toEqual(["50%_off", "50\\%\\_off", 20, 0]);
  });

  it("pings and closes through the pool", async () => {
    const store = new PostgresRegistryStore();
    await store.ping();
    expect(texts()).toEqual(["SELECT 1"]);

    await store.close();
    expect(fake.end).toHaveBeenCalledTimes(1);
  });
});
