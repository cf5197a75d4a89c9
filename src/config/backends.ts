/**
 * Backend configuration loading
 *
 * Backends come from a settings file shaped like
 *   { "mcpServers": { "<name>": { "url": "...", "enabled": true, ... } } }
 * plus the MCP_BACKENDS environment variable, which holds the inner
 * `mcpServers` object as JSON. Entries from the environment override file
 * entries of the same name.
 */
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "../services/errors.js";
import type { BackendDescriptor, TransportSpec } from "../types/index.js";
import { config } from "./index.js";

const serverEntrySchema = z.object({
  type: z.enum(["http", "stdio", "in-process"]).optional(),
  description: z.string().default(""),
  enabled: z.boolean().default(true),
  initialize: z.boolean().optional(),
  // http
  url: z.string().url().optional(),
  /** Legacy key */
  httpUrl: z.string().url().optional(),
  headers: z.record(z.string()).optional(),
  timeoutMs: z.number().int().positive().optional(),
  // stdio
  command: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
  // in-process
  handler: z.string().min(1).optional(),
});

const serversSchema = z.record(serverEntrySchema);

const settingsSchema = z.object({
  mcpServers: serversSchema.default({}),
});

export type ServerEntry = z.infer<typeof serverEntrySchema>;

function inferTransportType(entry: ServerEntry): TransportSpec["type"] | undefined {
  if (entry.type) return entry.type;
  if (entry.handler) return "in-process";
  if (entry.command) return "stdio";
  if (entry.url ?? entry.httpUrl) return "http";
  return undefined;
}

/**
 * Turn one settings entry into a Backend Descriptor.
 * Returns null for entries that name no way to reach the backend.
 */
export function toBackendDescriptor(name: string, entry: ServerEntry): BackendDescriptor | null {
  const type = inferTransportType(entry);
  let transport: TransportSpec;

  switch (type) {
    case "http": {
      const url = entry.url ?? entry.httpUrl;
      if (!url) {
        throw new ConfigError(`Backend '${name}' is an http backend without a url`);
      }
      transport = { type: "http", url, headers: entry.headers, timeoutMs: entry.timeoutMs };
      break;
    }
    case "stdio": {
      if (!entry.command) {
        throw new ConfigError(`Backend '${name}' is a stdio backend without a command`);
      }
      transport = {
        type: "stdio",
        command: entry.command,
        args: entry.args,
        env: entry.env,
        cwd: entry.cwd,
        timeoutMs: entry.timeoutMs,
      };
      break;
    }
    case "in-process": {
      if (!entry.handler) {
        throw new ConfigError(`Backend '${name}' is an in-process backend without a handler`);
      }
      transport = { type: "in-process", handler: entry.handler };
      break;
    }
    case undefined:
      console.warn(`[Config] No url, command or handler for backend '${name}', skipping`);
      return null;
  }

  return Object.freeze({
    name,
    description: entry.description,
    enabled: entry.enabled,
    transport: Object.freeze(transport),
    initialize: entry.initialize ?? transport.type === "stdio",
  });
}

/**
 * Parse an `mcpServers` object into descriptors, in key order
 */
export function parseBackends(servers: unknown, source: string): BackendDescriptor[] {
  const parsed = serversSchema.safeParse(servers);
  if (!parsed.success) {
    throw new ConfigError(`Invalid backend configuration in ${source}`, parsed.error.issues);
  }

  const backends: BackendDescriptor[] = [];
  for (const [name, entry] of Object.entries(parsed.data)) {
    const backend = toBackendDescriptor(name, entry);
    if (backend) {
      backends.push(backend);
    }
  }
  return backends;
}

async function readSettingsFile(settingsPath: string): Promise<BackendDescriptor[]> {
  const fullPath = resolve(settingsPath);
  let raw: string;
  try {
    raw = await readFile(fullPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.warn(`[Config] Settings file not found: ${fullPath}`);
      return [];
    }
    throw new ConfigError(`Failed to read settings file ${fullPath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Settings file ${fullPath} is not valid JSON: ${errorMessage(error)}`);
  }

  const settings = settingsSchema.safeParse(json);
  if (!settings.success) {
    throw new ConfigError(`Invalid settings file ${fullPath}`, settings.error.issues);
  }

  console.log(`[Config] Loaded settings from ${fullPath}`);
  return parseBackends(settings.data.mcpServers, fullPath);
}

function parseBackendsEnv(json: string): BackendDescriptor[] {
  let servers: unknown;
  try {
    servers = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(`MCP_BACKENDS is not valid JSON: ${errorMessage(error)}`);
  }
  return parseBackends(servers, "MCP_BACKENDS");
}

export interface LoadBackendsOptions {
  settingsPath?: string;
  backendsJson?: string;
}

/**
 * Load backends from the settings file and MCP_BACKENDS.
 * Read once per run; the result is frozen and safe to share.
 */
export async function loadBackends(options: LoadBackendsOptions = {}): Promise<BackendDescriptor[]> {
  const settingsPath = options.settingsPath ?? config.gateway.settingsPath;
  const backendsJson = options.backendsJson ?? config.gateway.backendsJson;

  const byName = new Map<string, BackendDescriptor>();
  for (const backend of await readSettingsFile(settingsPath)) {
    byName.set(backend.name, backend);
  }
  if (backendsJson) {
    for (const backend of parseBackendsEnv(backendsJson)) {
      byName.set(backend.name, backend);
    }
  }

  if (byName.size === 0) {
    console.warn("[Config] No MCP backends configured");
  }
  return Array.from(byName.values());
}
