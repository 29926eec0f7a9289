import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { LedgerError, NotFoundError, errorMessage } from "../errors.js";
import { createLogger, type LogFields } from "../logger.js";

const log = createLogger("tools");

function text(value: string, isError = false): CallToolResult {
  return {
    content: [{ type: "text" as const, text: value }],
    ...(isError ? { isError: true } : {}),
  };
}

export function errorResponse(message: string, details?: unknown): CallToolResult {
  const payload: { error: string; details?: unknown } = { error: message };
  if (details !== undefined) payload.details = details;
  return text(JSON.stringify(payload), true);
}

/**
 * Run a tool body and turn its outcome into a tool result. Strings pass
 * through as-is, anything else is serialized as JSON. Errors become
 * `{ "error": ..., "details"?: ... }` results with `isError` set.
 */
export async function runTool(
  name: string,
  fields: LogFields,
  fn: () => unknown
): Promise<CallToolResult> {
  log.info(name, fields);
  const started = Date.now();

  try {
    const result = await fn();
    log.debug("tool_completed", { tool: name, durationMs: Date.now() - started });
    return text(
      typeof result === "string" ? result : JSON.stringify(result, null, 2)
    );
  } catch (error) {
    if (error instanceof ZodError) {
      log.warn("tool_validation_error", { tool: name, issues: error.issues });
      return errorResponse("Validation failed", error.issues);
    }
    if (error instanceof NotFoundError) {
      log.info("tool_not_found", { tool: name, message: error.message });
      return errorResponse(error.message, error.details);
    }
    if (error instanceof LedgerError) {
      log.warn("tool_domain_error", { tool: name, message: error.message });
      return errorResponse(error.message, error.details);
    }
    log.error("tool_unexpected_error", {
      tool: name,
      errorType: error instanceof Error ? error.name : typeof error,
      message: errorMessage(error),
    });
    return errorResponse(`Unexpected error: ${errorMessage(error)}`);
  }
}
