import type { FastifyInstance } from "fastify";
import { getCitizenDashboard, getServiceCounts } from "../aggregates";
import { getBiometric, photoMaxBytes, storePhoto } from "../biometrics";
import { listCasesForIdentity } from "../criminal-cases";
import { updateIdentityContact } from "../identities";
import { requireIdentityAccess } from "../route-access";
import { nationalIdParamsSchema } from "./route-schemas";

const contactUpdateSchema = {
  params: nationalIdParamsSchema,
  body: {
    type: "object",
    required: ["mobile"],
    additionalProperties: false,
    properties: {
      mobile: { type: "string", minLength: 1, maxLength: 10 },
      email: { type: ["string", "null"], maxLength: 100 },
    },
  },
};

const biometricReadSchema = {
  params: nationalIdParamsSchema,
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {
      includePhoto: { type: "string", enum: ["true", "false"] },
    },
  },
};

const photoUploadSchema = {
  params: nationalIdParamsSchema,
  body: {
    type: "object",
    required: ["format", "photo"],
    additionalProperties: false,
    properties: {
      format: { type: "string", enum: ["jpg", "png"] },
      photo: { type: "string", pattern: "^[A-Za-z0-9+/]*={0,2}$" },
    },
  },
};

type IdentityParams = { nationalId: string };

export async function registerIdentityRoutes(app: FastifyInstance) {
  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { dashboard: await getCitizenDashboard(request.params.nationalId) };
    }
  );

  app.put<{ Params: IdentityParams; Body: { mobile: string; email?: string | null } }>(
    "/api/v1/identities/:nationalId/contact",
    { schema: contactUpdateSchema },
    async (request, reply) => {
      const actor = requireIdentityAccess(request, reply, request.params.nationalId);
      if (!actor) return;
      return { identity: await updateIdentityContact(request.params.nationalId, request.body, actor) };
    }
  );

  app.get<{ Params: IdentityParams; Querystring: { includePhoto?: "true" | "false" } }>(
    "/api/v1/identities/:nationalId/biometric",
    { schema: biometricReadSchema },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      const { photo, ...biometric } = await getBiometric(request.params.nationalId, {
        includePhoto: request.query.includePhoto === "true",
      });
      return { biometric: { ...biometric, photo: photo ? photo.toString("base64") : null } };
    }
  );

  // Photos travel base64-encoded, so the body limit sits a third above the byte limit.
  app.put<{ Params: IdentityParams; Body: { format: string; photo: string } }>(
    "/api/v1/identities/:nationalId/biometric",
    { schema: photoUploadSchema, bodyLimit: Math.ceil((photoMaxBytes() * 4) / 3) + 16 * 1024 },
    async (request, reply) => {
      const actor = requireIdentityAccess(request, reply, request.params.nationalId);
      if (!actor) return;
      const bytes = Buffer.from(request.body.photo, "base64");
      return { biometric: await storePhoto(request.params.nationalId, bytes, request.body.format, actor) };
    }
  );

  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId/service-counts",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { counts: await getServiceCounts(request.params.nationalId) };
    }
  );

  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId/criminal-cases",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { cases: await listCasesForIdentity(request.params.nationalId) };
    }
  );
}
