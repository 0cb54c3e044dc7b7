/**
 * JSON-RPC codec boundary
 *
 * Outbound messages are built here; inbound frames arrive as unknown values
 * and are classified into results, errors, notifications and server requests.
 */

import { z } from 'zod';
import { JSONRPCMessageSchema, LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import type { ToolSchema } from './types.js';

export type RequestId = string | number;

export const METHODS = {
  initialize: 'initialize',
  initialized: 'notifications/initialized',
  ping: 'ping',
  listTools: 'tools/list',
  callTool: 'tools/call',
  toolsListChanged: 'notifications/tools/list_changed',
  sandboxState: 'notifications/sandbox_state'
} as const;

export const METHOD_NOT_FOUND = -32601;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcResult {
  jsonrpc: '2.0';
  id: RequestId;
  result: Record<string, unknown>;
}

export interface RpcErrorPayload {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: RequestId;
  error: RpcErrorPayload;
}

export type OutboundMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResult | JsonRpcErrorResponse;

export type InboundMessage =
  | { kind: 'result'; id: RequestId; result: unknown }
  | { kind: 'error'; id: RequestId | null; error: RpcErrorPayload }
  | { kind: 'notification'; method: string; params?: Record<string, unknown> }
  | { kind: 'request'; id: RequestId; method: string; params?: Record<string, unknown> }
  | { kind: 'invalid'; reason: string };

export function buildRequest(id: RequestId, method: string, params?: Record<string, unknown>): JsonRpcRequest {
  return params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params };
}

export function buildNotification(method: string, params?: Record<string, unknown>): JsonRpcNotification {
  return params === undefined ? { jsonrpc: '2.0', method } : { jsonrpc: '2.0', method, params };
}

export function buildResult(id: RequestId, result: Record<string, unknown>): JsonRpcResult {
  return { jsonrpc: '2.0', id, result };
}

export function buildErrorResponse(id: RequestId, code: number, message: string, data?: unknown): JsonRpcErrorResponse {
  const error: RpcErrorPayload = data === undefined ? { code, message } : { code, message, data };
  return { jsonrpc: '2.0', id, error };
}

export function buildInitializeParams(clientInfo: { name: string; version: string }): Record<string, unknown> {
  return {
    protocolVersion: LATEST_PROTOCOL_VERSION,
    capabilities: {},
    clientInfo
  };
}

/**
 * Validate an outbound message against the SDK's wire schema
 */
export function toSdkMessage(message: OutboundMessage): JSONRPCMessage {
  return JSONRPCMessageSchema.parse(message);
}

const RequestIdSchema = z.union([z.string(), z.number().int()]);

const RpcErrorPayloadSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

const EnvelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: RequestIdSchema.nullable().optional(),
    method: z.string().optional(),
    params: z.record(z.unknown()).optional(),
    result: z.unknown().optional(),
    error: RpcErrorPayloadSchema.optional()
  })
  .passthrough();

/**
 * Classify an inbound frame. Never throws.
 */
export function classifyMessage(raw: unknown): InboundMessage {
  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { kind: 'invalid', reason: `${where}${issue?.message ?? 'not a JSON-RPC 2.0 message'}` };
  }

  const envelope = parsed.data;
  const id = envelope.id;

  if (envelope.method !== undefined) {
    if (id === undefined) {
      return envelope.params === undefined
        ? { kind: 'notification', method: envelope.method }
        : { kind: 'notification', method: envelope.method, params: envelope.params };
    }
    if (id === null) {
      return { kind: 'invalid', reason: `request '${envelope.method}' has a null id` };
    }
    return envelope.params === undefined
      ? { kind: 'request', id, method: envelope.method }
      : { kind: 'request', id, method: envelope.method, params: envelope.params };
  }

  if (envelope.error !== undefined) {
    if (id === undefined) {
      return { kind: 'invalid', reason: 'error response without id' };
    }
    return { kind: 'error', id, error: envelope.error };
  }

  if (Object.prototype.hasOwnProperty.call(envelope, 'result')) {
    if (id === undefined || id === null) {
      return { kind: 'invalid', reason: 'result response without id' };
    }
    return { kind: 'result', id, result: envelope.result };
  }

  return { kind: 'invalid', reason: 'message is neither a request, a notification nor a response' };
}

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    capabilities: z.record(z.unknown()).default({}),
    serverInfo: z.object({ name: z.string(), version: z.string() }).passthrough(),
    instructions: z.string().optional()
  })
  .passthrough();

export const ListToolsPageSchema = z
  .object({
    tools: z.array(z.unknown()),
    nextCursor: z.string().optional()
  })
  .passthrough();

const ToolEntrySchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()).optional()
  })
  .passthrough();

/**
 * Parse one `tools/list` entry; null when it is malformed
 */
export function parseToolEntry(raw: unknown): ToolSchema | null {
  const parsed = ToolEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return {
    name: parsed.data.name,
    description: parsed.data.description ?? '',
    inputSchema: parsed.data.inputSchema ?? { type: 'object' }
  };
}

export const ToolCallResultSchema = z
  .object({
    content: z.array(z.object({ type: z.string() }).passthrough()),
    isError: z.boolean().optional(),
    structuredContent: z.record(z.unknown()).optional()
  })
  .passthrough();

export const SandboxStateSchema = z
  .object({
    enabled: z.boolean(),
    policy: z.string().optional()
  })
  .passthrough();
