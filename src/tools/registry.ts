import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { DuplicateToolError, UnknownToolError, ValidationError } from "../errors.js";
import type { ToolContext, ToolDefinition } from "./types.js";

export type Validation =
  | { ok: true; call(context: ToolContext): Promise<unknown> }
  | { ok: false; error: ValidationError };

type JsonObjectSchema = Tool["inputSchema"];

function toJsonObjectSchema(schema: z.ZodTypeAny): JsonObjectSchema {
  const { $schema: _dialect, ...json } = zodToJsonSchema(schema, { $refStrategy: "none" });
  return { ...json, type: "object" };
}

/** Names the first offending field, in schema declaration order. */
export function toValidationError(issues: z.ZodIssue[]): ValidationError {
  const issue = issues[0];
  if (!issue) return new ValidationError("arguments", "Invalid arguments");
  const field = issue.path.length > 0 ? issue.path.join(".") : "arguments";
  return new ValidationError(field, issue.message);
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) throw new DuplicateToolError(definition.name);
    this.tools.set(definition.name, definition);
  }

  lookup(name: string): ToolDefinition {
    const definition = this.tools.get(name);
    if (!definition) throw new UnknownToolError(name);
    return definition;
  }

  validate(definition: ToolDefinition, args: unknown): Validation {
    const prepared = definition.prepare(args ?? {});
    if (prepared.ok) return prepared;
    return { ok: false, error: toValidationError(prepared.issues) };
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Tool descriptors for `tools/list`, in registration order. */
  list(): Tool[] {
    return [...this.tools.values()].map((definition) => ({
      name: definition.name,
      description: definition.description,
      inputSchema: toJsonObjectSchema(definition.input),
      outputSchema: toJsonObjectSchema(definition.output),
    }));
  }
}
