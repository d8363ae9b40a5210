import type { FastifyInstance } from "fastify";
import {
  deleteCriminalCase,
  getCriminalCase,
  linkIdentityToCase,
  registerCriminalCase,
  unlinkIdentityFromCase,
} from "../criminal-cases";
import { requireAdmin } from "../route-access";
import { nationalIdParam, positiveIntegerParam, strictParams } from "./route-schemas";

const caseParamsSchema = strictParams({ caseNumber: positiveIntegerParam });
const caseLinkParamsSchema = strictParams({ caseNumber: positiveIntegerParam, nationalId: nationalIdParam });

const registerCaseSchema = {
  body: {
    type: "object",
    required: ["offence"],
    additionalProperties: false,
    properties: {
      offence: { type: "string", minLength: 1, maxLength: 100 },
      nationalIds: { type: "array", maxItems: 50, items: nationalIdParam },
    },
  },
};

const linkSchema = {
  params: caseParamsSchema,
  body: {
    type: "object",
    required: ["nationalId"],
    additionalProperties: false,
    properties: {
      nationalId: nationalIdParam,
    },
  },
};

type CaseParams = { caseNumber: string };

export async function registerCriminalCaseRoutes(app: FastifyInstance) {
  app.post<{ Body: { offence: string; nationalIds?: string[] } }>(
    "/api/v1/admin/criminal-cases",
    { schema: registerCaseSchema },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      const criminalCase = await registerCriminalCase(request.body, admin);
      reply.code(201);
      return { criminalCase };
    }
  );

  app.get<{ Params: CaseParams }>(
    "/api/v1/admin/criminal-cases/:caseNumber",
    { schema: { params: caseParamsSchema } },
    async (request, reply) => {
      if (!requireAdmin(request, reply)) return;
      return { criminalCase: await getCriminalCase(Number(request.params.caseNumber)) };
    }
  );

  app.delete<{ Params: CaseParams }>(
    "/api/v1/admin/criminal-cases/:caseNumber",
    { schema: { params: caseParamsSchema } },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      await deleteCriminalCase(Number(request.params.caseNumber), admin);
      return reply.code(204).send();
    }
  );

  app.post<{ Params: CaseParams; Body: { nationalId: string } }>(
    "/api/v1/admin/criminal-cases/:caseNumber/links",
    { schema: linkSchema },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      const caseNumber = Number(request.params.caseNumber);
      return { criminalCase: await linkIdentityToCase(caseNumber, request.body.nationalId, admin) };
    }
  );

  app.delete<{ Params: CaseParams & { nationalId: string } }>(
    "/api/v1/admin/criminal-cases/:caseNumber/links/:nationalId",
    { schema: { params: caseLinkParamsSchema } },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      const caseNumber = Number(request.params.caseNumber);
      return { criminalCase: await unlinkIdentityFromCase(caseNumber, request.params.nationalId, admin) };
    }
  );
}
