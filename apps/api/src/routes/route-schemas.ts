/**
 * JSON-schema fragments shared by the route modules. Format rules are
 * repeated from @civic-registry/shared so malformed keys fail at the edge
 * with INVALID_PATH_PARAMS; the domain re-validates everything it persists.
 */
import {
  ELECTORAL_CODE_PATTERN,
  NATIONAL_ID_PATTERN,
  SIM_NUMBER_PATTERN,
  TAX_ID_PATTERN,
  USERNAME_PATTERN,
} from "@civic-registry/shared";

export const emptyBodySchema = {
  type: "object",
  additionalProperties: false,
  properties: {},
} as const;

export function strictParams(properties: Record<string, Record<string, unknown>>) {
  return {
    type: "object",
    required: Object.keys(properties),
    additionalProperties: false,
    properties,
  };
}

// Codes are upper-cased by the domain, so the edge check is case-insensitive.
function caseInsensitive(pattern: RegExp): string {
  return pattern.source.replace(/\[A-Z\]/g, "[A-Za-z]").replace(/\[A-Z0-9\]/g, "[A-Za-z0-9]");
}

export const nationalIdParam = { type: "string", pattern: NATIONAL_ID_PATTERN.source };
export const taxIdParam = { type: "string", pattern: caseInsensitive(TAX_ID_PATTERN) };
export const electoralCodeParam = { type: "string", pattern: caseInsensitive(ELECTORAL_CODE_PATTERN) };
export const simNumberParam = { type: "string", pattern: SIM_NUMBER_PATTERN.source };
export const usernameParam = { type: "string", pattern: USERNAME_PATTERN.source };
export const positiveIntegerParam = { type: "string", pattern: "^[1-9][0-9]{0,8}$" };

export const nationalIdParamsSchema = strictParams({ nationalId: nationalIdParam });
