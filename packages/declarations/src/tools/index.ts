import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { DeclarationService } from "../core/services/DeclarationService.js";
import { registerExtractDeclarations } from "./extractDeclarations.js";
import { registerListDeclarations } from "./listDeclarations.js";

export interface Services {
  declarations: DeclarationService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  registerExtractDeclarations(server, services.declarations);
  registerListDeclarations(server, services.declarations);
}

export { formatOutline } from "./formatOutline.js";
export * from "./types.js";
export * from "./schemas.js";
