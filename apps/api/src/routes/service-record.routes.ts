/**
 * Linked service records. Collection routes hang off the owning identity;
 * item routes address a record by its own key and check ownership in the
 * domain layer (a citizen sees other people's records as absent).
 */
import type { FastifyInstance } from "fastify";
import type { VoterRegistrationType } from "@civic-registry/shared";
import {
  deleteBankAccount,
  listBankAccounts,
  registerBankAccount,
  updateBankAccount,
} from "../bank-accounts";
import { requireActor, requireIdentityAccess } from "../route-access";
import { deleteSim, listSims, registerSim, updateSimStatus } from "../sims";
import { deleteTaxId, listTaxIds, registerTaxId, updateTaxIdStatus } from "../tax-ids";
import {
  deleteVoterRecord,
  listVoterRecords,
  registerVoterRecord,
  updateVoterRecord,
} from "../voter-records";
import {
  electoralCodeParam,
  nationalIdParamsSchema,
  simNumberParam,
  strictParams,
  taxIdParam,
} from "./route-schemas";

const statusBodySchema = {
  type: "object",
  required: ["status"],
  additionalProperties: false,
  properties: {
    status: { type: "string", minLength: 1, maxLength: 30 },
  },
};

const registerTaxIdSchema = {
  params: nationalIdParamsSchema,
  body: {
    type: "object",
    required: ["code", "issueDate"],
    additionalProperties: false,
    properties: {
      code: { type: "string", minLength: 1, maxLength: 10 },
      issueDate: { type: "string", minLength: 1, maxLength: 10 },
      status: { type: "string", minLength: 1, maxLength: 20 },
    },
  },
};

const registerVoterRecordSchema = {
  params: nationalIdParamsSchema,
  body: {
    type: "object",
    required: ["code", "address"],
    additionalProperties: false,
    properties: {
      code: { type: "string", minLength: 1, maxLength: 10 },
      address: { type: "string", minLength: 1, maxLength: 300 },
      registrationType: { type: "string", enum: ["City", "Village", "Rural", "Urban", "Other"] },
      issueDate: { type: "string", minLength: 1, maxLength: 10 },
      status: { type: "string", minLength: 1, maxLength: 30 },
      isPrimary: { type: "boolean" },
    },
  },
};

const updateVoterRecordSchema = {
  params: strictParams({ code: electoralCodeParam }),
  body: {
    type: "object",
    minProperties: 1,
    additionalProperties: false,
    properties: {
      address: { type: "string", minLength: 1, maxLength: 300 },
      registrationType: { type: "string", enum: ["City", "Village", "Rural", "Urban", "Other"] },
      status: { type: "string", minLength: 1, maxLength: 30 },
      isPrimary: { type: "boolean" },
    },
  },
};

const registerSimSchema = {
  params: nationalIdParamsSchema,
  body: {
    type: "object",
    required: ["simNumber", "provider"],
    additionalProperties: false,
    properties: {
      simNumber: { type: "string", minLength: 1, maxLength: 18 },
      provider: { type: "string", minLength: 1, maxLength: 50 },
      status: { type: "string", minLength: 1, maxLength: 20 },
    },
  },
};

const registerBankAccountSchema = {
  params: nationalIdParamsSchema,
  body: {
    type: "object",
    required: ["accountNumber", "bankName", "accountType", "branchCode"],
    additionalProperties: false,
    properties: {
      accountNumber: { type: "string", minLength: 1, maxLength: 18 },
      bankName: { type: "string", minLength: 1, maxLength: 50 },
      accountType: { type: "string", minLength: 1, maxLength: 20 },
      branchCode: { type: "string", minLength: 1, maxLength: 11 },
    },
  },
};

const bankAccountParamsSchema = strictParams({
  bankName: { type: "string", minLength: 1, maxLength: 50 },
  accountNumber: { type: "string", pattern: "^[1-9][0-9]{0,17}$" },
});

const updateBankAccountSchema = {
  params: bankAccountParamsSchema,
  body: {
    type: "object",
    minProperties: 1,
    additionalProperties: false,
    properties: {
      accountType: { type: "string", minLength: 1, maxLength: 20 },
      branchCode: { type: "string", minLength: 1, maxLength: 11 },
    },
  },
};

const taxIdParamsSchema = strictParams({ code: taxIdParam });
const voterParamsSchema = strictParams({ code: electoralCodeParam });
const simParamsSchema = strictParams({ simNumber: simNumberParam });

type IdentityParams = { nationalId: string };
type CodeParams = { code: string };
type SimParams = { simNumber: string };
type BankAccountParams = { bankName: string; accountNumber: string };
type StatusBody = { status: string };

function registerTaxIdRoutes(app: FastifyInstance) {
  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId/tax-ids",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { taxIds: await listTaxIds(request.params.nationalId) };
    }
  );

  app.post<{ Params: IdentityParams; Body: { code: string; issueDate: string; status?: string } }>(
    "/api/v1/identities/:nationalId/tax-ids",
    { schema: registerTaxIdSchema },
    async (request, reply) => {
      const actor = requireIdentityAccess(request, reply, request.params.nationalId);
      if (!actor) return;
      const taxId = await registerTaxId(request.params.nationalId, request.body, actor);
      reply.code(201);
      return { taxId };
    }
  );

  app.patch<{ Params: CodeParams; Body: StatusBody }>(
    "/api/v1/tax-ids/:code",
    { schema: { params: taxIdParamsSchema, body: statusBodySchema } },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      return { taxId: await updateTaxIdStatus(request.params.code, request.body, actor) };
    }
  );

  app.delete<{ Params: CodeParams }>(
    "/api/v1/tax-ids/:code",
    { schema: { params: taxIdParamsSchema } },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      await deleteTaxId(request.params.code, actor);
      return reply.code(204).send();
    }
  );
}

function registerVoterRecordRoutes(app: FastifyInstance) {
  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId/voter-records",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { voterRecords: await listVoterRecords(request.params.nationalId) };
    }
  );

  app.post<{
    Params: IdentityParams;
    Body: {
      code: string;
      address: string;
      registrationType?: VoterRegistrationType;
      issueDate?: string;
      status?: string;
      isPrimary?: boolean;
    };
  }>("/api/v1/identities/:nationalId/voter-records", { schema: registerVoterRecordSchema }, async (request, reply) => {
    const actor = requireIdentityAccess(request, reply, request.params.nationalId);
    if (!actor) return;
    const voterRecord = await registerVoterRecord(request.params.nationalId, request.body, actor);
    reply.code(201);
    return { voterRecord };
  });

  app.patch<{
    Params: CodeParams;
    Body: { address?: string; registrationType?: VoterRegistrationType; status?: string; isPrimary?: boolean };
  }>("/api/v1/voter-records/:code", { schema: updateVoterRecordSchema }, async (request, reply) => {
    const actor = requireActor(request, reply);
    if (!actor) return;
    return { voterRecord: await updateVoterRecord(request.params.code, request.body, actor) };
  });

  app.delete<{ Params: CodeParams }>(
    "/api/v1/voter-records/:code",
    { schema: { params: voterParamsSchema } },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      await deleteVoterRecord(request.params.code, actor);
      return reply.code(204).send();
    }
  );
}

function registerSimRoutes(app: FastifyInstance) {
  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId/sims",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { sims: await listSims(request.params.nationalId) };
    }
  );

  app.post<{ Params: IdentityParams; Body: { simNumber: string; provider: string; status?: string } }>(
    "/api/v1/identities/:nationalId/sims",
    { schema: registerSimSchema },
    async (request, reply) => {
      const actor = requireIdentityAccess(request, reply, request.params.nationalId);
      if (!actor) return;
      const sim = await registerSim(request.params.nationalId, request.body, actor);
      reply.code(201);
      return { sim };
    }
  );

  app.patch<{ Params: SimParams; Body: StatusBody }>(
    "/api/v1/sims/:simNumber",
    { schema: { params: simParamsSchema, body: statusBodySchema } },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      return { sim: await updateSimStatus(request.params.simNumber, request.body, actor) };
    }
  );

  app.delete<{ Params: SimParams }>(
    "/api/v1/sims/:simNumber",
    { schema: { params: simParamsSchema } },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      await deleteSim(request.params.simNumber, actor);
      return reply.code(204).send();
    }
  );
}

function registerBankAccountRoutes(app: FastifyInstance) {
  app.get<{ Params: IdentityParams }>(
    "/api/v1/identities/:nationalId/bank-accounts",
    { schema: { params: nationalIdParamsSchema } },
    async (request, reply) => {
      if (!requireIdentityAccess(request, reply, request.params.nationalId)) return;
      return { bankAccounts: await listBankAccounts(request.params.nationalId) };
    }
  );

  app.post<{
    Params: IdentityParams;
    Body: { accountNumber: string; bankName: string; accountType: string; branchCode: string };
  }>("/api/v1/identities/:nationalId/bank-accounts", { schema: registerBankAccountSchema }, async (request, reply) => {
    const actor = requireIdentityAccess(request, reply, request.params.nationalId);
    if (!actor) return;
    const bankAccount = await registerBankAccount(request.params.nationalId, request.body, actor);
    reply.code(201);
    return { bankAccount };
  });

  app.patch<{ Params: BankAccountParams; Body: { accountType?: string; branchCode?: string } }>(
    "/api/v1/bank-accounts/:bankName/:accountNumber",
    { schema: updateBankAccountSchema },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      return { bankAccount: await updateBankAccount(request.params, request.body, actor) };
    }
  );

  app.delete<{ Params: BankAccountParams }>(
    "/api/v1/bank-accounts/:bankName/:accountNumber",
    { schema: { params: bankAccountParamsSchema } },
    async (request, reply) => {
      const actor = requireActor(request, reply);
      if (!actor) return;
      await deleteBankAccount(request.params, actor);
      return reply.code(204).send();
    }
  );
}

export async function registerServiceRecordRoutes(app: FastifyInstance) {
  registerTaxIdRoutes(app);
  registerVoterRecordRoutes(app);
  registerSimRoutes(app);
  registerBankAccountRoutes(app);
}
