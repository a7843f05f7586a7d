import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DeclarationService } from "../core/services/DeclarationService.js";

export interface ToolRegistrar {
  (server: McpServer, service: DeclarationService): void;
}

export type ToolResponse<T = Record<string, unknown>> = {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  structuredContent?: T;
};
