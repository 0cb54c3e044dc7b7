/**
 * mcplex type definitions
 *
 * Server configuration, connection lifecycle and tool metadata shared by the
 * transports, connections, the manager and the daemon.
 */

/**
 * Transport type
 */
export enum TransportType {
  STDIO = "stdio",
  SOCKET = "socket",
  HTTP = "http"
}

/**
 * Spawned process: stdin/stdout carry newline-delimited JSON-RPC
 */
export interface StdioTransportDescriptor {
  type: TransportType.STDIO;
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
}

/**
 * Local domain socket
 */
export interface SocketTransportDescriptor {
  type: TransportType.SOCKET;
  path: string;
}

/**
 * Streamable HTTP endpoint
 */
export interface HttpTransportDescriptor {
  type: TransportType.HTTP;
  url: string;
  headers: Record<string, string>;
}

export type TransportDescriptor =
  | StdioTransportDescriptor
  | SocketTransportDescriptor
  | HttpTransportDescriptor;

/**
 * Tool server configuration
 */
export interface ServerConfig {
  /** Unique server identifier, the registry key */
  id: string;
  /** Display name */
  name: string;
  transport: TransportDescriptor;
  /** Environment overrides, merged over the stdio descriptor's env */
  env?: Record<string, string>;
}

/**
 * Connection lifecycle states
 */
export enum ConnectionState {
  DISCONNECTED = "disconnected",
  CONNECTING = "connecting",
  HANDSHAKING = "handshaking",
  READY = "ready",
  DEGRADED = "degraded",
  CLOSED = "closed"
}

/**
 * Coarse health view of a server
 */
export enum ServerHealth {
  HEALTHY = "healthy",
  UNHEALTHY = "unhealthy",
  DISCONNECTED = "disconnected",
  UNKNOWN = "unknown"
}

export interface StateChange {
  serverId: string;
  from: ConnectionState;
  to: ConnectionState;
  reason?: string;
  at: Date;
}

/**
 * Tool schema as discovered from a server. `inputSchema` is opaque.
 */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ServerTool {
  serverId: string;
  tool: ToolSchema;
}

/**
 * Server metadata returned by the initialize exchange
 */
export interface ServerInfo {
  name: string;
  version: string;
  protocolVersion: string;
  capabilities: Record<string, unknown>;
  instructions?: string;
}

/**
 * Tool call result, passed through without interpretation
 */
export interface ToolCallResult {
  content: Array<{
    type: string;
    [key: string]: unknown;
  }>;
  isError?: boolean;
  structuredContent?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface CallOptions {
  /** Overrides the manager's default request timeout */
  timeoutMs?: number;
  /** Aborting removes the pending request without notifying the server */
  signal?: AbortSignal;
}

/**
 * Sandbox state carried by `notifications/sandbox_state`
 */
export interface SandboxState {
  enabled: boolean;
  policy?: string;
  [key: string]: unknown;
}

export interface SandboxStateEvent {
  serverId: string;
  state: SandboxState;
  receivedAt: Date;
}

export interface InboundNotification {
  method: string;
  params?: Record<string, unknown>;
}

export interface NotificationEvent {
  serverId: string;
  notification: InboundNotification;
  receivedAt: Date;
}

export interface AnomalyCounters {
  unmatchedResponses: number;
  malformedFrames: number;
}

/**
 * Point-in-time view of one connection
 */
export interface ConnectionStatus {
  id: string;
  name: string;
  transport: TransportType;
  state: ConnectionState;
  health: ServerHealth;
  generation: number;
  serverInfo: ServerInfo | null;
  toolCount: number;
  toolsStale: boolean;
  pendingRequests: number;
  lastHealthCheckAt: string | null;
  consecutiveFailures: number;
  anomalies: AnomalyCounters;
}
