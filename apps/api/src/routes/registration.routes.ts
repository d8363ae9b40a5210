import type { FastifyInstance } from "fastify";
import type { Gender } from "@civic-registry/shared";
import {
  approveRegistration,
  getRegistration,
  listPendingRegistrations,
  rejectRegistration,
  submitRegistration,
} from "../registrations";
import { requireAdmin } from "../route-access";
import { emptyBodySchema, positiveIntegerParam, strictParams } from "./route-schemas";

const submitRegistrationSchema = {
  body: {
    type: "object",
    required: ["username", "password", "nationalId", "name", "gender", "birthDate", "mobile"],
    additionalProperties: false,
    properties: {
      username: { type: "string", minLength: 1, maxLength: 50 },
      password: { type: "string", minLength: 1, maxLength: 128 },
      nationalId: { type: "string", minLength: 1, maxLength: 12 },
      name: { type: "string", minLength: 1, maxLength: 100 },
      gender: { type: "string", enum: ["M", "F", "O"] },
      birthDate: { type: "string", minLength: 1, maxLength: 10 },
      mobile: { type: "string", minLength: 1, maxLength: 10 },
      email: { type: ["string", "null"], maxLength: 100 },
    },
  },
};

const requestParamsSchema = strictParams({ requestId: positiveIntegerParam });

const pendingReadSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

const rejectSchema = {
  params: requestParamsSchema,
  body: {
    type: "object",
    required: ["reason"],
    additionalProperties: false,
    properties: {
      reason: { type: "string", minLength: 1, maxLength: 255 },
    },
  },
};

type SubmitBody = {
  username: string;
  password: string;
  nationalId: string;
  name: string;
  gender: Gender;
  birthDate: string;
  mobile: string;
  email?: string | null;
};

type RequestParams = { requestId: string };

export async function registerRegistrationRoutes(app: FastifyInstance) {
  app.post<{ Body: SubmitBody }>(
    "/api/v1/registrations",
    { schema: submitRegistrationSchema, config: { rateLimit: { max: 5, timeWindow: "1 minute" } } },
    async (request, reply) => {
      const registration = await submitRegistration(request.body, request.ip);
      reply.code(201);
      return { requestId: registration.requestId, status: registration.status };
    }
  );

  app.get("/api/v1/admin/registrations/pending", { schema: pendingReadSchema }, async (request, reply) => {
    if (!requireAdmin(request, reply)) return;
    return { registrations: await listPendingRegistrations() };
  });

  app.get<{ Params: RequestParams }>(
    "/api/v1/admin/registrations/:requestId",
    { schema: { params: requestParamsSchema } },
    async (request, reply) => {
      if (!requireAdmin(request, reply)) return;
      return { registration: await getRegistration(Number(request.params.requestId)) };
    }
  );

  app.post<{ Params: RequestParams }>(
    "/api/v1/admin/registrations/:requestId/approve",
    { schema: { params: requestParamsSchema, body: emptyBodySchema } },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      return { approval: await approveRegistration(Number(request.params.requestId), admin) };
    }
  );

  app.post<{ Params: RequestParams; Body: { reason: string } }>(
    "/api/v1/admin/registrations/:requestId/reject",
    { schema: rejectSchema },
    async (request, reply) => {
      const admin = requireAdmin(request, reply);
      if (!admin) return;
      return { registration: await rejectRegistration(Number(request.params.requestId), admin, request.body) };
    }
  );
}
