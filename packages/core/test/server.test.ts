import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import * as z from "zod/v4";

import { bootstrapServer, type McpServer } from "../src/server.js";

const SIGNALS = ["SIGTERM", "SIGINT"] as const;

function isSignalListener(fn: Function): fn is NodeJS.SignalsListener {
  return typeof fn === "function";
}

describe("bootstrapServer", () => {
  let server: McpServer | undefined;
  let existing: Map<string, Function[]>;

  beforeEach(() => {
    existing = new Map(SIGNALS.map((signal) => [signal, process.listeners(signal)]));
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    // Drop the shutdown handlers installed by bootstrapServer
    for (const signal of SIGNALS) {
      const before = existing.get(signal) ?? [];
      for (const listener of process.listeners(signal)) {
        if (!before.includes(listener) && isSignalListener(listener)) {
          process.off(signal, listener);
        }
      }
    }
  });

  it("registers tools and runs the startup hook before connecting", async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const calls: string[] = [];

    server = await bootstrapServer({
      config: { name: "skeleton-extract:test", version: "0.0.1" },
      createServices: () => ({ greeting: "hello" }),
      registerTools: (mcp, services) => {
        calls.push("register");
        mcp.registerTool(
          "greet",
          { description: "Greets", inputSchema: { name: z.string() } },
          async ({ name }) => ({ content: [{ type: "text", text: `${services.greeting} ${name}` }] })
        );
      },
      onStartup: () => {
        calls.push("startup");
      },
      createTransport: () => serverTransport,
    });

    const client = new Client({ name: "test-client", version: "0.0.1" });
    await client.connect(clientTransport);

    const tools = await client.listTools();
    expect(tools.tools.map((t) => t.name)).toEqual(["greet"]);

    const result = await client.callTool({ name: "greet", arguments: { name: "world" } });
    expect(result.content).toEqual([{ type: "text", text: "hello world" }]);
    expect(calls).toEqual(["register", "startup"]);

    await client.close();
  });

  it("awaits asynchronous service factories", async () => {
    const [, serverTransport] = InMemoryTransport.createLinkedPair();
    let received: unknown;

    server = await bootstrapServer({
      config: { name: "skeleton-extract:test", version: "0.0.1" },
      createServices: async () => ({ ready: true }),
      registerTools: (_mcp, services) => {
        received = services;
      },
      createTransport: () => serverTransport,
    });

    expect(received).toEqual({ ready: true });
  });
});
