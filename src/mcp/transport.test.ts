import { ErrorCode, type JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, test, vi } from "vitest";
import { HttpTransport } from "./transport.js";

const ping: JSONRPCMessage = { jsonrpc: "2.0", id: 7, method: "ping" };

afterEach(() => {
  vi.useRealTimers();
});

describe("HttpTransport", () => {
  test("resolves a request with the matching response", async () => {
    const transport = new HttpTransport();
    transport.onmessage = (message) => {
      if ("id" in message) {
        void transport.send({ jsonrpc: "2.0", id: message.id, result: {} });
      }
    };

    await expect(transport.handleJsonRpc(ping)).resolves.toEqual({
      jsonrpc: "2.0",
      id: 7,
      result: {},
    });
    expect(transport.pendingCount).toBe(0);
  });

  test("returns null for notifications", async () => {
    const transport = new HttpTransport();
    const seen: JSONRPCMessage[] = [];
    transport.onmessage = (message) => seen.push(message);

    const note: JSONRPCMessage = { jsonrpc: "2.0", method: "notifications/initialized" };
    await expect(transport.handleJsonRpc(note)).resolves.toBeNull();
    expect(seen).toEqual([note]);
  });

  test("times out unanswered requests", async () => {
    vi.useFakeTimers();
    const transport = new HttpTransport({ timeoutMs: 1_000 });

    const reply = transport.handleJsonRpc(ping);
    expect(transport.pendingCount).toBe(1);
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(reply).resolves.toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: ErrorCode.RequestTimeout, message: "Request timed out" },
    });
    expect(transport.pendingCount).toBe(0);
  });

  test("close answers pending requests and fires onclose", async () => {
    const transport = new HttpTransport();
    const onclose = vi.fn();
    transport.onclose = onclose;

    const reply = transport.handleJsonRpc(ping);
    await transport.close();

    await expect(reply).resolves.toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: ErrorCode.ConnectionClosed, message: "Transport closed" },
    });
    expect(onclose).toHaveBeenCalledOnce();
  });
});
