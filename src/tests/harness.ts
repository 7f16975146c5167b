import type { ToolCallResult } from "../dispatcher.js";
import { Dispatcher } from "../dispatcher.js";
import { MealieClient } from "../mealie/client.js";
import { buildToolRegistry } from "../tools/index.js";
import type { ToolRegistry } from "../tools/registry.js";
import { BASE_URL, FakeMealie, TOKEN } from "./fakeMealie.js";

/** Monday, 19 October 2026, local time. */
export const NOW = new Date(2026, 9, 19, 12, 0, 0);

export interface Harness {
  fake: FakeMealie;
  client: MealieClient;
  registry: ToolRegistry;
  dispatcher: Dispatcher;
}

export function createHarness(options: { timeoutMs?: number; configured?: boolean } = {}): Harness {
  const fake = new FakeMealie();
  const credentials = options.configured === false ? {} : { baseUrl: BASE_URL, apiToken: TOKEN };
  const client = new MealieClient({ credentials, timeoutMs: options.timeoutMs, http: fake.http() });
  const registry = buildToolRegistry();
  const dispatcher = new Dispatcher(registry, client, { now: () => NOW });
  return { fake, client, registry, dispatcher };
}

export function expectSuccess(result: ToolCallResult): Record<string, unknown> {
  if (result.status !== "success") {
    throw new Error(`Expected success, got ${result.kind}: ${result.message}`);
  }
  return result.payload;
}
