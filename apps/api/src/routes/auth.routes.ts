import type { FastifyInstance } from "fastify";
import * as auth from "../auth";
import { send401, send403 } from "../errors";
import { generateToken } from "../middleware/auth";
import { requireActor } from "../route-access";

const loginSchema = {
  body: {
    type: "object",
    required: ["username", "password"],
    additionalProperties: false,
    properties: {
      username: { type: "string", minLength: 1, maxLength: 50 },
      password: { type: "string", minLength: 1, maxLength: 128 },
    },
  },
};

const meSchema = {
  querystring: {
    type: "object",
    additionalProperties: false,
    properties: {},
  },
};

type LoginBody = { username: string; password: string };

export async function registerAuthRoutes(app: FastifyInstance) {
  app.post<{ Body: LoginBody }>(
    "/api/v1/auth/login",
    { schema: loginSchema, config: { rateLimit: { max: 10, timeWindow: "1 minute" } } },
    async (request, reply) => {
      const result = await auth.verifyCredentials(request.body.username, request.body.password, request.ip);
      if (!result.ok) {
        if (result.reason === "INVALID_CREDENTIALS") {
          return send401(reply, "INVALID_CREDENTIALS", "Invalid username or password");
        }
        return send403(
          reply,
          result.reason,
          result.reason === "ACCOUNT_LOCKED"
            ? "Account suspended after too many failed login attempts"
            : "Account is not active"
        );
      }
      return { user: result.principal, token: generateToken(result.principal) };
    }
  );

  app.get("/api/v1/auth/me", { schema: meSchema }, async (request, reply) => {
    const actor = requireActor(request, reply);
    if (!actor) return;
    if (actor.role === "Citizen") {
      const account = await auth.getCitizenAccountByNationalId(actor.nationalId);
      return { user: { role: actor.role, username: actor.username, nationalId: actor.nationalId }, account };
    }
    return { user: { role: actor.role, username: actor.username }, account: null };
  });
}
