import type { FastifyReply, FastifyRequest } from "fastify";
import type { Actor, AdminActor } from "./actor";
import { send401, send403, send404 } from "./errors";

/** The acting principal for the current request, or null when anonymous. */
export function actorFromRequest(request: FastifyRequest): Actor | null {
  const user = request.authUser;
  if (!user) return null;
  if (user.userType === "ADMIN") {
    return { role: "Admin", adminId: user.userId, username: user.login, ipAddress: request.ip };
  }
  if (!user.nationalId) return null;
  return {
    role: "Citizen",
    citizenId: user.userId,
    username: user.login,
    nationalId: user.nationalId,
    ipAddress: request.ip,
  };
}

export function requireActor(request: FastifyRequest, reply: FastifyReply): Actor | null {
  const actor = actorFromRequest(request);
  if (!actor) {
    reply.send(send401(reply, "AUTHENTICATION_REQUIRED"));
    return null;
  }
  return actor;
}

export function requireAdmin(request: FastifyRequest, reply: FastifyReply): AdminActor | null {
  const actor = requireActor(request, reply);
  if (!actor) return null;
  if (actor.role !== "Admin") {
    reply.send(send403(reply, "FORBIDDEN", "Administrator access required"));
    return null;
  }
  return actor;
}

/**
 * Admins may act on any identity; citizens only on their own. Another
 * person's identity answers 404, the same as an unknown one.
 */
export function requireIdentityAccess(
  request: FastifyRequest,
  reply: FastifyReply,
  nationalId: string
): Actor | null {
  const actor = requireActor(request, reply);
  if (!actor) return null;
  if (actor.role === "Citizen" && actor.nationalId !== nationalId) {
    reply.send(send404(reply, "IDENTITY_NOT_FOUND", `No identity with national ID ${nationalId}`));
    return null;
  }
  return actor;
}
