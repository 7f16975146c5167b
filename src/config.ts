import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// --- Configuration ---

/** Where Mealie lives and how to authenticate. Either field may be missing. */
export interface BackendCredentials {
  readonly baseUrl?: string;
  readonly apiToken?: string;
}

export type TransportKind = "stdio" | "http";

export interface Config {
  readonly credentials: BackendCredentials;
  readonly timeoutMs: number;
  readonly transport: TransportKind;
  readonly host: string;
  readonly port: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

const BaseUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");
const TimeoutSchema = z.coerce.number().int().positive();
const TransportSchema = z.enum(["stdio", "http"]);
const PortSchema = z.coerce.number().int().min(1).max(65535);

function read(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

function parseSetting<T>(schema: z.ZodType<T>, name: string, raw: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? "invalid value";
    throw new ConfigurationError(`${name} is invalid: ${reason}`);
  }
  return parsed.data;
}

/**
 * Reads the process environment once at startup.
 *
 * Missing or malformed credentials do not stop the server: they are logged here
 * and reported as ConfigurationError by the first tool call that needs Mealie.
 * Malformed transport or timeout settings are fatal.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  let baseUrl = read(env, "MEALIE_URL", "MEALIE_BASE_URL");
  // Some MCP clients call the token a KEY; Mealie calls it a token.
  const apiToken = read(env, "MEALIE_API_TOKEN", "MEALIE_API_KEY");

  if (baseUrl) {
    const parsed = BaseUrlSchema.safeParse(baseUrl);
    if (!parsed.success) {
      console.error(`[Warning] MEALIE_URL ignored: ${parsed.error.issues[0]?.message ?? "invalid URL"}`);
      baseUrl = undefined;
    }
  }
  if (!baseUrl) console.error("[Warning] MEALIE_URL is not set; tool calls will fail until it is.");
  if (!apiToken) console.error("[Warning] MEALIE_API_TOKEN is not set; tool calls will fail until it is.");

  const timeoutRaw = read(env, "MEALIE_TIMEOUT_MS");
  const transportRaw = read(env, "MCP_TRANSPORT");
  const portRaw = read(env, "MCP_PORT");

  return {
    credentials: { baseUrl, apiToken },
    timeoutMs: timeoutRaw ? parseSetting(TimeoutSchema, "MEALIE_TIMEOUT_MS", timeoutRaw) : DEFAULT_TIMEOUT_MS,
    transport: transportRaw ? parseSetting(TransportSchema, "MCP_TRANSPORT", transportRaw) : "stdio",
    host: read(env, "MCP_HOST") ?? "0.0.0.0",
    port: portRaw ? parseSetting(PortSchema, "MCP_PORT", portRaw) : 8000,
  };
}
