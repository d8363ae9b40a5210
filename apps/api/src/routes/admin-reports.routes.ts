/**
 * Admin sub-module: derived-count reports, audit trail and registry totals.
 */
import type { FastifyInstance } from "fastify";
import { RecentAuditSchema, type LinkedRecordKind } from "@civic-registry/shared";
import { getRegistryStatistics, identitiesWithMinimum, maxCombined } from "../aggregates";
import { listRecentAudit } from "../audit";
import { parseInput } from "../errors";
import { requireAdmin } from "../route-access";

const LINKED_KINDS = ["taxId", "voter", "sim", "bank", "case"];

const minimumReportSchema = {
  querystring: {
    type: "object",
    required: ["kind", "threshold"],
    additionalProperties: false,
    properties: {
      kind: { type: "string", enum: LINKED_KINDS },
      threshold: { type: "string", pattern: "^[0-9]{1,6}$" },
    },
  },
};

const maxCombinedReportSchema = {
  querystring: {
    type: "object",
    required: ["kindA", "kindB"],
    additionalProperties: false,
    properties: {
      kindA: { type: "string", enum: LINKED_KINDS },
      kindB: { type: "string", enum: LINKED_KINDS },
      single: { type: "string", enum: ["true", "false"] },
    },
  },
};

const auditReadSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      limit: { type: "string", pattern: "^[0-9]{1,6}$" },
    },
  },
};

const statsReadSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

export async function registerAdminReportRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { kind: LinkedRecordKind; threshold: string } }>(
    "/api/v1/admin/reports/minimum",
    { schema: minimumReportSchema },
    async (request, reply) => {
      if (!requireAdmin(request, reply)) return;
      const identities = await identitiesWithMinimum({
        kind: request.query.kind,
        threshold: Number(request.query.threshold),
      });
      return { identities };
    }
  );

  app.get<{ Querystring: { kindA: LinkedRecordKind; kindB: LinkedRecordKind; single?: "true" | "false" } }>(
    "/api/v1/admin/reports/max-combined",
    { schema: maxCombinedReportSchema },
    async (request, reply) => {
      if (!requireAdmin(request, reply)) return;
      const identities = await maxCombined({
        kinds: [request.query.kindA, request.query.kindB],
        single: request.query.single === "true",
      });
      return { identities };
    }
  );

  app.get<{ Querystring: { limit?: string } }>(
    "/api/v1/admin/audit",
    { schema: auditReadSchema },
    async (request, reply) => {
      if (!requireAdmin(request, reply)) return;
      const { limit } = parseInput(RecentAuditSchema, request.query);
      return { entries: await listRecentAudit(limit) };
    }
  );

  app.get("/api/v1/admin/stats", { schema: statsReadSchema }, async (request, reply) => {
    if (!requireAdmin(request, reply)) return;
    return { stats: await getRegistryStatistics() };
  });
}
