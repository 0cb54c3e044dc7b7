/**
 * Configuration
 *
 * zod schemas for server configs, the servers file and manager options.
 * Everything that crosses into the manager is parsed here first.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { TransportType } from './types.js';
import type { ServerConfig } from './types.js';

export const VERSION = '0.1.0';

const StringRecordSchema = z.record(z.string());

export const StdioTransportSchema = z
  .object({
    type: z.literal(TransportType.STDIO),
    command: z.string().min(1).describe("Command that launches the server (e.g. 'node', 'uvx')"),
    args: z.array(z.string()).default([]),
    env: StringRecordSchema.default({}),
    cwd: z.string().optional()
  })
  .strict();

export const SocketTransportSchema = z
  .object({
    type: z.literal(TransportType.SOCKET),
    path: z.string().min(1).describe('Local domain socket path')
  })
  .strict();

export const HttpTransportSchema = z
  .object({
    type: z.literal(TransportType.HTTP),
    url: z.string().url().describe('Streamable HTTP endpoint'),
    headers: StringRecordSchema.default({})
  })
  .strict();

export const TransportDescriptorSchema = z.discriminatedUnion('type', [
  StdioTransportSchema,
  SocketTransportSchema,
  HttpTransportSchema
]);

export const ServerConfigSchema = z.object({
  id: z.string().trim().min(1, 'server id must not be empty'),
  name: z.string().min(1).optional(),
  transport: TransportDescriptorSchema,
  env: StringRecordSchema.optional()
});

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

export const ReconnectPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(5),
    baseDelayMs: z.number().int().min(0).default(500),
    maxDelayMs: z.number().int().min(0).default(30_000),
    jitterMs: z.number().int().min(0).default(250),
    stableAfterMs: z
      .number()
      .int()
      .min(0)
      .default(10_000)
      .describe('How long a session must stay up before its reconnection attempts are forgotten')
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: 'maxDelayMs must not be lower than baseDelayMs',
    path: ['maxDelayMs']
  });

export type ReconnectPolicy = z.output<typeof ReconnectPolicySchema>;

export const HealthOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    intervalMs: z.number().int().positive().default(30_000),
    degradedIntervalMs: z.number().int().positive().default(5_000),
    probeTimeoutMs: z.number().int().positive().default(5_000),
    missThreshold: z.number().int().min(1).default(3),
    failureThreshold: z.number().int().min(1).default(6)
  })
  .refine((health) => health.failureThreshold >= health.missThreshold, {
    message: 'failureThreshold must not be lower than missThreshold',
    path: ['failureThreshold']
  });

export type HealthOptions = z.output<typeof HealthOptionsSchema>;

export const ManagerOptionsSchema = z.object({
  requestTimeoutMs: z.number().int().positive().default(30_000),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  handshakeTimeoutMs: z.number().int().positive().default(15_000),
  reconnect: ReconnectPolicySchema.default({}),
  health: HealthOptionsSchema.default({}),
  unmatchedResponses: z
    .enum(['drop', 'degrade'])
    .default('drop')
    .describe('What a response with no pending request does besides being counted'),
  clientInfo: z
    .object({
      name: z.string().min(1).default('mcplex'),
      version: z.string().min(1).default(VERSION)
    })
    .default({})
});

export type ManagerOptions = z.output<typeof ManagerOptionsSchema>;
export type ManagerOptionsInput = z.input<typeof ManagerOptionsSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a server config. The result is frozen.
 */
export function parseServerConfig(input: unknown): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid server config', formatIssues(parsed.error));
  }

  const { id, name, transport, env } = parsed.data;
  if (transport.type === TransportType.STDIO) {
    Object.freeze(transport.args);
    Object.freeze(transport.env);
  } else if (transport.type === TransportType.HTTP) {
    Object.freeze(transport.headers);
  }

  return Object.freeze({
    id,
    name: name ?? id,
    transport: Object.freeze(transport),
    env: env ? Object.freeze(env) : undefined
  });
}

export function resolveManagerOptions(input: unknown = {}): ManagerOptions {
  const parsed = ManagerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid manager options', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Entry of the `servers` object in mcp-servers.json. `type` may be omitted.
 */
export const ServerEntrySchema = z.object({
  type: z.enum(['stdio', 'socket', 'http', 'streamable-http']).optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: StringRecordSchema.optional(),
  cwd: z.string().optional(),
  path: z.string().optional(),
  url: z.string().optional(),
  headers: StringRecordSchema.optional()
});

export type ServerEntry = z.infer<typeof ServerEntrySchema>;

export const ServersFileSchema = z.object({
  servers: z.record(ServerEntrySchema)
});

function inferTransportType(id: string, entry: ServerEntry): TransportType {
  switch (entry.type) {
    case 'stdio':
      return TransportType.STDIO;
    case 'socket':
      return TransportType.SOCKET;
    case 'http':
    case 'streamable-http':
      return TransportType.HTTP;
    case undefined:
      break;
  }

  if (entry.command) return TransportType.STDIO;
  if (entry.path) return TransportType.SOCKET;
  if (entry.url) return TransportType.HTTP;
  throw new ConfigError(`Cannot infer transport type for '${id}': specify type, command, path or url`);
}

/**
 * Convert a servers-file entry into a validated ServerConfig
 */
export function entryToServerConfig(id: string, entry: ServerEntry): ServerConfig {
  const type = inferTransportType(id, entry);
  const transport =
    type === TransportType.STDIO
      ? { type, command: entry.command, args: entry.args, env: entry.env, cwd: entry.cwd }
      : type === TransportType.SOCKET
        ? { type, path: entry.path }
        : { type, url: entry.url, headers: entry.headers };

  try {
    return parseServerConfig({ id, name: entry.name, transport });
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`Invalid entry for server '${id}'`, issuesOf(error));
    }
    throw error;
  }
}

function issuesOf(error: ConfigError): string[] {
  const issues = error.context.issues;
  return Array.isArray(issues) ? issues.map(String) : [error.message];
}

export interface LoadedServers {
  path: string | null;
  servers: ServerConfig[];
}

/**
 * Find the servers file. Lookup order: explicit path, MCPLEX_CONFIG,
 * ./mcp-servers.json, ./config/mcp-servers.json.
 */
export function findServersFile(explicitPath?: string): string | null {
  if (explicitPath) {
    const absolute = resolve(explicitPath);
    if (!existsSync(absolute)) {
      throw new ConfigError(`Config file not found: ${absolute}`);
    }
    return absolute;
  }

  const candidates = [
    process.env.MCPLEX_CONFIG,
    join(process.cwd(), 'mcp-servers.json'),
    join(process.cwd(), 'config', 'mcp-servers.json')
  ];
  return candidates.find((candidate): candidate is string => !!candidate && existsSync(candidate)) ?? null;
}

export function parseServersFile(content: string): ServerConfig[] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Servers file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = ServersFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError('Invalid servers file', formatIssues(parsed.error));
  }
  return Object.entries(parsed.data.servers).map(([id, entry]) => entryToServerConfig(id, entry));
}

export function loadServersFile(explicitPath?: string): LoadedServers {
  const path = findServersFile(explicitPath);
  if (!path) {
    return { path: null, servers: [] };
  }
  return { path, servers: parseServersFile(readFileSync(path, 'utf-8')) };
}
