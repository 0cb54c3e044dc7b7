/**
 * Structured errors
 *
 * Every failure carries an ErrorType tag, the server it concerns and a context
 * record, so callers can branch on `type` and the daemon can serialize it.
 */

import type { ConnectionState } from './types.js';

/**
 * Error type enum
 */
export enum ErrorType {
  Transport = 'transport_error',
  Closed = 'connection_closed',
  Timeout = 'timeout',
  Protocol = 'protocol_error',
  NotFound = 'not_found',
  NotReady = 'not_ready',
  Tool = 'tool_error',
  Rpc = 'rpc_error',
  Connect = 'connect_error',
  AlreadyConnected = 'already_connected',
  Cancelled = 'cancelled',
  InvalidTransition = 'invalid_transition',
  Config = 'config_error'
}

/**
 * Base error class
 */
export class ConnectionManagerError extends Error {
  readonly timestamp: Date;

  constructor(
    public readonly type: ErrorType,
    public readonly serverId: string | undefined,
    public readonly context: Record<string, unknown>,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  format(): string {
    return this.serverId ? `[${this.serverId}] ${this.message}` : this.message;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      serverId: this.serverId,
      context: this.context,
      timestamp: this.timestamp.toISOString()
    };
  }
}

/**
 * Open, send or receive failure
 */
export class TransportError extends ConnectionManagerError {
  constructor(serverId: string | undefined, detail: string, cause?: unknown) {
    super(ErrorType.Transport, serverId, { detail }, `Transport error: ${detail}`, { cause });
  }
}

/**
 * The peer ended the stream, or the connection was closed locally
 */
export class ConnectionClosedError extends ConnectionManagerError {
  constructor(serverId: string | undefined, reason = 'connection closed') {
    super(ErrorType.Closed, serverId, { reason }, `Connection closed: ${reason}`);
  }
}

export class RequestTimeoutError extends ConnectionManagerError {
  constructor(serverId: string | undefined, method: string, timeoutMs: number) {
    super(
      ErrorType.Timeout,
      serverId,
      { method, timeoutMs },
      `Request '${method}' timed out after ${timeoutMs}ms`
    );
  }
}

export class RequestCancelledError extends ConnectionManagerError {
  constructor(serverId: string | undefined, method: string) {
    super(ErrorType.Cancelled, serverId, { method }, `Request '${method}' was cancelled`);
  }
}

/**
 * Malformed or unexpected frame
 */
export class ProtocolError extends ConnectionManagerError {
  constructor(serverId: string | undefined, detail: string) {
    super(ErrorType.Protocol, serverId, { detail }, `Protocol error: ${detail}`);
  }
}

export class ServerNotFoundError extends ConnectionManagerError {
  constructor(serverId: string, availableServers: string[]) {
    super(
      ErrorType.NotFound,
      serverId,
      { availableServers },
      `Server not found: ${serverId}`
    );
  }

  format(): string {
    const available = this.context.availableServers;
    const list = Array.isArray(available) && available.length > 0 ? available.join(', ') : 'none';
    return `Server not found: ${this.serverId}\nAvailable servers: ${list}`;
  }
}

export class ToolNotFoundError extends ConnectionManagerError {
  constructor(serverId: string, tool: string) {
    super(ErrorType.NotFound, serverId, { tool }, `Tool not found: ${tool}`);
  }
}

export class NotReadyError extends ConnectionManagerError {
  constructor(serverId: string, state: ConnectionState) {
    super(ErrorType.NotReady, serverId, { state }, `Server '${serverId}' is not ready (state: ${state})`);
  }
}

/**
 * JSON-RPC error response
 */
export class RpcError extends ConnectionManagerError {
  constructor(
    serverId: string | undefined,
    public readonly code: number,
    public readonly rpcMessage: string,
    public readonly data?: unknown
  ) {
    super(ErrorType.Rpc, serverId, { code, data }, `RPC error ${code}: ${rpcMessage}`);
  }
}

/**
 * Application-level failure returned by the server for a tool call
 */
export class ToolError extends ConnectionManagerError {
  constructor(
    serverId: string,
    public readonly tool: string,
    public readonly code: number,
    detail: string,
    public readonly data?: unknown
  ) {
    super(ErrorType.Tool, serverId, { tool, code, data }, `Tool '${tool}' failed: ${detail}`);
  }
}

/**
 * Connection attempts exhausted
 */
export class ConnectError extends ConnectionManagerError {
  constructor(serverId: string, attempts: number, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : 'unknown error';
    super(
      ErrorType.Connect,
      serverId,
      { attempts },
      `Failed to connect to '${serverId}' after ${attempts} attempt(s): ${detail}`,
      { cause }
    );
  }
}

export class AlreadyConnectedError extends ConnectionManagerError {
  constructor(serverId: string, state: ConnectionState) {
    super(
      ErrorType.AlreadyConnected,
      serverId,
      { state },
      `Server '${serverId}' already has an active connection (state: ${state})`
    );
  }
}

export class InvalidTransitionError extends ConnectionManagerError {
  constructor(serverId: string, from: ConnectionState, to: ConnectionState) {
    super(
      ErrorType.InvalidTransition,
      serverId,
      { from, to },
      `Invalid state transition ${from} -> ${to}`
    );
  }
}

export class ConfigError extends ConnectionManagerError {
  constructor(detail: string, issues: string[] = []) {
    super(ErrorType.Config, undefined, { issues }, issues.length > 0 ? `${detail}: ${issues.join('; ')}` : detail);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
