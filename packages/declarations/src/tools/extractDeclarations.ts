import * as z from "zod/v4";

import type { SourceModel } from "../core/model.js";
import type { ParseError } from "../core/ports/SyntaxTreeParser.js";
import { formatOutline } from "./formatOutline.js";
import { ParseErrorSchema, SourceModelSchema } from "./schemas.js";
import type { ToolRegistrar, ToolResponse } from "./types.js";

interface ExtractDeclarationsInput {
  file_path: string;
}

interface ExtractDeclarationsOutput extends Record<string, unknown> {
  success: boolean;
  error?: string;
  model?: SourceModel;
  syntaxErrors?: ParseError[];
}

export const registerExtractDeclarations: ToolRegistrar = (server, service) => {
  server.registerTool(
    "extract_declarations",
    {
      title: "Extract declarations",
      description: `Extract the declaration model of a C# source file.

Returns classes, interfaces and enums with their visible members:
- Properties marked public, internal or protected
- Public methods and constructors, with parameter names and types
- Enum values with their literal initializers ("no-value" otherwise)

Each declaration carries one modifier: static, public, internal, protected or private.
Nested types are listed alongside top-level ones. Method bodies are not included.`,
      inputSchema: {
        file_path: z.string().describe("Path to the .cs file"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        model: SourceModelSchema.optional(),
        syntaxErrors: z.array(ParseErrorSchema).optional(),
      },
    },
    async (input: ExtractDeclarationsInput): Promise<ToolResponse<ExtractDeclarationsOutput>> => {
      const result = await service.extractFile(input.file_path);

      if (!result.ok) {
        return {
          content: [{ type: "text", text: `Error: ${result.error}` }],
          structuredContent: { success: false, error: result.error },
        };
      }

      const { model, errors } = result.value;
      let text = formatOutline(model);
      if (errors.length > 0) {
        text += `\n\n${errors.length} syntax error(s); declarations were read from a partial tree.`;
      }

      return {
        content: [{ type: "text", text }],
        structuredContent: { success: true, model, syntaxErrors: errors },
      };
    }
  );
};
