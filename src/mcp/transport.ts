import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  ErrorCode,
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCError,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";

export interface HttpTransportOptions {
  /** How long to wait for the server's response (default: 60s) */
  timeoutMs?: number;
}

function errorReply(id: RequestId, code: number, message: string): JSONRPCError {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

/**
 * A lightweight request/response transport for MCP behind a hono route.
 *
 * Bridges individual HTTP requests to the MCP Server's transport interface.
 * Each JSON-RPC request gets its response via a Promise-based dispatch.
 */
export class HttpTransport implements Transport {
  private pending = new Map<
    RequestId,
    { resolve: (response: JSONRPCMessage) => void; timer: NodeJS.Timeout }
  >();
  private readonly timeoutMs: number;

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async start(): Promise<void> {
    // Request-driven: nothing to open
  }

  async close(): Promise<void> {
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.resolve(errorReply(id, ErrorCode.ConnectionClosed, "Transport closed"));
    }
    this.pending.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // Route responses to the waiting HTTP request; server-initiated
    // notifications and requests have no HTTP request to ride on.
    if (!isJSONRPCResponse(message) && !isJSONRPCError(message)) return;

    const entry = this.pending.get(message.id);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.pending.delete(message.id);
    entry.resolve(message);
  }

  /**
   * Dispatch one JSON-RPC message from an HTTP POST. Resolves with the
   * response for requests, or null for notifications and responses.
   */
  async handleJsonRpc(body: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    if (!isJSONRPCRequest(body)) {
      this.onmessage?.(body);
      return null;
    }

    const { id } = body;
    return new Promise<JSONRPCMessage>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          resolve(errorReply(id, ErrorCode.RequestTimeout, "Request timed out"));
        }
      }, this.timeoutMs);
      timer.unref();

      // Register before dispatching so a synchronous reply is not lost
      this.pending.set(id, { resolve, timer });
      this.onmessage?.(body);
    });
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
