import type { FastifyInstance } from "fastify";
import type { AccountStatus } from "@civic-registry/shared";
import { setCitizenAccountStatus } from "../auth";
import { deleteIdentity, listIdentities } from "../identities";
import { requireAdmin } from "../route-access";
import { nationalIdParamsSchema, strictParams, usernameParam } from "./route-schemas";

const identityDirectorySchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      search: { type: "string", minLength: 1, maxLength: 100 },
      limit: { type: "string", pattern: "^[1-9][0-9]{0,2}$" },
      offset: { type: "string", pattern: "^(0|[1-9][0-9]{0,8})$" },
    },
  },
};

const accountStatusSchema = {
  params: strictParams({ username: usernameParam }),
  body: {
    type: "object",
    required: ["status"],
    additionalProperties: false,
    properties: {
      status: { type: "string", enum: ["Active", "Suspended", "Inactive"] },
    },
  },
};

export function parsePositiveInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export async function registerAdminRoutes(app: FastifyInstance) {
  app.get<{ Querystring: { search?: string; limit?: string; offset?: string } }>(
    "/api/v1/admin/identities",
    { schema: identityDirectorySchema },
    async (request, reply) => {
      if (!requireAdmin(request, reply)) return;
      const identities = await listIdentities({
        search: request.query.search,
        limit: parsePositiveInteger(request.query.limit),
        offset: parsePositiveInteger(request.query.offset),
      });
      return { identities };
    }
  );

  app.delete<{ Params: { nationalId: string } }>(
    "/api/v1/admin/identities/:nationalId",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      await deleteIdentity(request.params.nationalId, admin);
      return reply.code(204).send();
    }
  );

  app.patch<{ Params: { username: string }; Body: { status: AccountStatus } }>(
    "/api/v1/admin/citizen-accounts/:username/status",
    { schema: accountStatusSchema },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      return { account: await setCitizenAccountStatus(request.params.username, request.body, admin) };
    }
  );
}
