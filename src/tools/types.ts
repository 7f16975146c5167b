import type { z } from "zod";
import type { MealieClient } from "../mealie/client.js";

export interface ToolContext {
  client: MealieClient;
  /** Fires when the caller goes away; pass it to every backend call. */
  signal?: AbortSignal;
  now(): Date;
}

/** What a tool module writes: schemas plus the handler that uses them. */
export interface ToolSpec<I extends z.ZodTypeAny, O extends z.AnyZodObject> {
  name: string;
  description: string;
  input: I;
  output: O;
  execute(args: z.output<I>, context: ToolContext): Promise<z.input<O>>;
}

export type Prepared =
  | { ok: true; call(context: ToolContext): Promise<unknown> }
  | { ok: false; issues: z.ZodIssue[] };

/** A registered tool with its argument types erased. */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly input: z.ZodTypeAny;
  readonly output: z.AnyZodObject;
  /** Parses raw arguments and, if they fit, binds them to the handler. */
  prepare(args: unknown): Prepared;
}

export function defineTool<I extends z.ZodTypeAny, O extends z.AnyZodObject>(spec: ToolSpec<I, O>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    input: spec.input,
    output: spec.output,
    prepare(args) {
      const parsed = spec.input.safeParse(args);
      if (!parsed.success) return { ok: false, issues: parsed.error.issues };
      const value: z.output<I> = parsed.data;
      return { ok: true, call: (context) => spec.execute(value, context) };
    },
  };
}
