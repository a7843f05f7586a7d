import * as z from "zod/v4";

import type { DeclarationSummary, TypeDeclarationKind } from "../core/model.js";
import { DeclarationSummarySchema, TypeDeclarationKindSchema } from "./schemas.js";
import type { ToolRegistrar, ToolResponse } from "./types.js";

interface ListDeclarationsInput {
  file_path: string;
  kinds?: TypeDeclarationKind[];
}

interface ListDeclarationsOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  declarations?: DeclarationSummary[];
  count?: number;
}

export const registerListDeclarations: ToolRegistrar = (server, service) => {
  server.registerTool(
    "list_declarations",
    {
      title: "List declarations",
      description: `List the classes, interfaces and enums declared in a C# source file.

Cheaper than extract_declarations when only the type names are needed.`,
      inputSchema: {
        file_path: z.string().describe("Path to the .cs file"),
        kinds: z.array(TypeDeclarationKindSchema).optional().describe("Filter by kind (e.g., ['class', 'enum'])"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        declarations: z.array(DeclarationSummarySchema).optional(),
        count: z.number().optional(),
      },
    },
    async (input: ListDeclarationsInput): Promise<ToolResponse<ListDeclarationsOutput>> => {
      const result = await service.listDeclarations({
        filePath: input.file_path,
        kinds: input.kinds,
      });

      if (!result.ok) {
        return {
          content: [{ type: "text", text: `Error: ${result.error}` }],
          structuredContent: { success: false, error: result.error },
        };
      }

      const declarations = result.value;
      if (declarations.length === 0) {
        return {
          content: [{ type: "text", text: "No declarations found in this file." }],
          structuredContent: { success: true, declarations: [], count: 0 },
        };
      }

      const lines = declarations.map(
        (d) => `- ${d.modifier} ${d.kind} ${d.name} (${d.memberCount} members)`
      );

      return {
        content: [{ type: "text", text: lines.join("\n") }],
        structuredContent: { success: true, declarations, count: declarations.length },
      };
    }
  );
};
