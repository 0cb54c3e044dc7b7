/**
 * mcplex - connection manager for Model Context Protocol tool servers
 *
 * Establishes, multiplexes and supervises connections to independent tool
 * servers, caches their tool schemas and routes tool calls.
 *
 * @version 0.1.0
 */

// Manager (registry + dispatcher)
export { ConnectionManager } from './manager.js';
export type { ConnectionManagerOptions } from './manager.js';

// Per-server connection
export { ServerConnection } from './connection.js';
export type { ConnectionHooks, ServerConnectionOptions } from './connection.js';

// Building blocks
export { ToolCache } from './tool-cache.js';
export type { ToolSnapshot } from './tool-cache.js';
export { HealthMonitor } from './health.js';
export type { ProbeOutcome } from './health.js';
export { ConnectionStateMachine, canTransition, healthFromState } from './state.js';
export { PendingRequests } from './pending.js';
export { computeBackoffDelay } from './backoff.js';
export { METHODS, classifyMessage } from './codec.js';
export type { InboundMessage, OutboundMessage, RequestId } from './codec.js';

// Transports
export { createTransport, FrameQueue, SdkFrameTransport, SocketTransport } from './transports/index.js';
export type { Frame, Transport, TransportFactory } from './transports/index.js';

// Configuration
export {
  VERSION,
  entryToServerConfig,
  loadServersFile,
  parseServerConfig,
  parseServersFile,
  resolveManagerOptions
} from './config.js';
export type { HealthOptions, ManagerOptions, ManagerOptionsInput, ReconnectPolicy, ServerConfigInput } from './config.js';

// Errors
export * from './errors.js';

// Logging
export { Logger, logger } from './logger.js';
export type { LogLevel } from './logger.js';

// Daemon and its client
export { ManagerDaemon } from './daemon.js';
export type { DaemonConfig, ReloadResult } from './daemon.js';
export { SocketClient, sendCommand } from './socket-client.js';
export type { SocketClientOptions } from './socket-client.js';
export type { DaemonCommand, DaemonRequest, DaemonResponse } from './protocol.js';
export {
  SessionListener,
  describeEndpoint,
  hasLiveDaemon,
  readDaemonPid,
  removeSessionFiles,
  resolveSession,
  sessionEndpoint,
  sessionFiles
} from './session.js';
export type { SessionEndpoint, SessionFiles } from './session.js';

export { ConnectionState, ServerHealth, TransportType } from './types.js';
export type {
  CallOptions,
  ConnectionStatus,
  InboundNotification,
  NotificationEvent,
  SandboxState,
  SandboxStateEvent,
  ServerConfig,
  ServerInfo,
  ServerTool,
  StateChange,
  ToolCallResult,
  ToolSchema,
  TransportDescriptor
} from './types.js';
