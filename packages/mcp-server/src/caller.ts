// Who a tool call acts for
// A server pinned through INSIGHT_MCP_ROLE / INSIGHT_MCP_IDENTITY answers only
// for that caller; arguments naming another caller are refused.

import { ConfigError, isRole, type Role } from "@insight-desk/engine";
import type { CallerInput } from "./schemas/common.js";

export interface Caller {
  role: Role;
  identity: string;
}

/** Identity used for business callers that do not name themselves */
export const DEFAULT_BUSINESS_IDENTITY = "mcp";

export class CallerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CallerError";
  }
}

export function pinnedCallerFromEnv(env: NodeJS.ProcessEnv = process.env): Caller | null {
  const role = env.INSIGHT_MCP_ROLE?.trim() ?? "";
  const identity = env.INSIGHT_MCP_IDENTITY?.trim() ?? "";

  if (role === "") {
    if (identity !== "") throw new ConfigError("INSIGHT_MCP_IDENTITY requires INSIGHT_MCP_ROLE");
    return null;
  }
  if (!isRole(role)) {
    throw new ConfigError(`Invalid configuration INSIGHT_MCP_ROLE: expected customer or business, got "${role}"`);
  }
  if (role === "customer" && identity === "") {
    throw new ConfigError("INSIGHT_MCP_ROLE=customer requires INSIGHT_MCP_IDENTITY");
  }
  return { role, identity: identity || DEFAULT_BUSINESS_IDENTITY };
}

export function resolveCaller(input: CallerInput, pinned: Caller | null): Caller {
  if (pinned) {
    const otherRole = input.role !== undefined && input.role !== pinned.role;
    const otherIdentity = input.identity !== undefined && input.identity !== pinned.identity;
    if (otherRole || otherIdentity) {
      throw new CallerError("This server only answers for its configured caller.");
    }
    return pinned;
  }

  if (!input.role) throw new CallerError("role is required (customer or business).");
  if (input.role === "customer") {
    if (!input.identity) throw new CallerError("identity is required for the customer role.");
    return { role: "customer", identity: input.identity };
  }
  return { role: "business", identity: input.identity ?? DEFAULT_BUSINESS_IDENTITY };
}
