import { type Failure, toFailure, TransportError, UpstreamShapeError } from "./errors.js";
import type { MealieClient } from "./mealie/client.js";
import type { ToolRegistry } from "./tools/registry.js";

export interface ToolCallRequest {
  toolName: string;
  arguments?: Record<string, unknown>;
  /** Aborted by the transport when the caller cancels or disconnects. */
  signal?: AbortSignal;
}

export interface Success {
  status: "success";
  payload: Record<string, unknown>;
}

export type ToolCallResult = Success | Failure;

type Stage = "received" | "executing";

export interface DispatcherOptions {
  now?: () => Date;
}

/**
 * Turns one tool call into exactly one ToolCallResult.
 *
 * Received → Validated → Executing → Completed. Unknown tools and invalid
 * arguments complete before the handler runs, so they never reach Mealie.
 * Nothing thrown below escapes `dispatch`.
 */
export class Dispatcher {
  private readonly now: () => Date;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly client: MealieClient,
    options: DispatcherOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(request: ToolCallRequest): Promise<ToolCallResult> {
    const { toolName, signal } = request;
    let stage: Stage = "received";
    console.error(`[Info] Received tool call: ${toolName}`);

    try {
      const tool = this.registry.lookup(toolName);
      const validation = this.registry.validate(tool, request.arguments);
      if (!validation.ok) return this.fail(toolName, stage, validation.error);

      stage = "executing";
      const raw = await validation.call({ client: this.client, signal, now: this.now });
      if (signal?.aborted) {
        return this.fail(toolName, stage, new TransportError(`${toolName} was cancelled by the caller`));
      }

      const shaped = tool.output.safeParse(raw);
      if (!shaped.success) {
        const issue = shaped.error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join(".") : "result";
        const reason = issue ? issue.message : "unexpected shape";
        return this.fail(
          toolName,
          stage,
          new UpstreamShapeError(`Unexpected response shape for ${toolName}: ${where}: ${reason}`),
        );
      }

      console.error(`[Info] Tool call completed: ${toolName}`);
      return { status: "success", payload: shaped.data };
    } catch (error) {
      return this.fail(toolName, stage, error);
    }
  }

  private fail(toolName: string, stage: Stage, error: unknown): Failure {
    const failure = toFailure(error);
    console.error(`[Error] Tool call failed during ${stage}: ${toolName} (${failure.kind}) ${failure.message}`);
    return failure;
  }
}
