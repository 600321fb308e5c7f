import { EngineError, createLogger, errorMessage, toUserMessage } from "@insight-desk/engine";
import { ZodError } from "zod";
import { CallerError } from "../caller.js";

const log = createLogger("McpServer");

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

/**
 * Render a tool result as pretty JSON text, or an error as `{error, code?}`.
 * Errors only ever carry the caller-safe message; the detail goes to the log.
 */
export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text", text: JSON.stringify(describeError(result)) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text", text: typeof result === "string" ? result : JSON.stringify(result, null, 2) }],
  };
}

export async function runTool(tool: string, fn: () => Promise<unknown>): Promise<ToolResponse> {
  try {
    return wrapResponse(await fn());
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    log.warn(`${tool} failed`, { error: errorMessage(error), name: error.name });
    return wrapResponse(error);
  }
}

function describeError(err: Error): { error: string; code?: string } {
  if (err instanceof EngineError) return { error: err.userMessage, code: err.code };
  if (err instanceof CallerError) return { error: err.message, code: "INVALID_CALLER" };
  if (err instanceof ZodError) {
    const issues = err.issues.map(i => `${i.path.join(".") || "arguments"}: ${i.message}`);
    return { error: `Invalid arguments: ${issues.join("; ")}`, code: "INVALID_ARGUMENTS" };
  }
  return { error: toUserMessage(err) };
}
