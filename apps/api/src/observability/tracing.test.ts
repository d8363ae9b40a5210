import { describe, expect, it, vi } from "vitest";
import { annotateRegistrySpan, registrySpanAttributes, tracingEnabled } from "./tracing";

describe("registry span attributes", () => {
  it("names the operation, table, record and actor role", () => {
    expect(
      registrySpanAttributes({ operation: "DELETE_SIM", table: "sim_record", recordId: "8991000000000001", actorRole: "Admin" })
    ).toEqual({
      "registry.operation": "DELETE_SIM",
      "registry.table": "sim_record",
      "registry.record_id": "8991000000000001",
      "registry.actor_role": "Admin",
    });
  });

  it("omits a missing record id", () => {
    expect(registrySpanAttributes({ operation: "CREATE_ADMIN", table: "admin_account", recordId: null })).toEqual({
      "registry.operation": "CREATE_ADMIN",
      "registry.table": "admin_account",
    });
  });

  it("sets the attributes on the given span", () => {
    const span = { setAttributes: vi.fn() };
    annotateRegistrySpan({ operation: "UPDATE_TAX_ID", table: "tax_id", recordId: "1" }, span);
    expect(span.setAttributes).toHaveBeenCalledWith({
      "registry.operation": "UPDATE_TAX_ID",
      "registry.table": "tax_id",
      "registry.record_id": "1",
    });
  });

  it("does nothing without an active span", () => {
    expect(() =>
      annotateRegistrySpan({ operation: "UPDATE_TAX_ID", table: "tax_id", recordId: "1" }, undefined)
    ).not.toThrow();
  });
});

describe("tracingEnabled", () => {
  it("follows OTEL_ENABLED and stays off under the test runner otherwise", () => {
    expect(tracingEnabled({ OTEL_ENABLED: "true" })).toBe(true);
    expect(tracingEnabled({ OTEL_ENABLED: "false" })).toBe(false);
    expect(tracingEnabled({})).toBe(false);
  });
});
