/**
 * ConnectionManager - registry and dispatcher
 *
 * Holds one ServerConnection per server id, routes tool calls, reacts to
 * server notifications and fans events out to subscribers.
 *
 * The registry is mutated synchronously before any await, so concurrent
 * calls for the same id always see each other's entries.
 */

import { SandboxStateSchema, METHODS } from './codec.js';
import { formatIssues, parseServerConfig, resolveManagerOptions } from './config.js';
import type { ManagerOptions, ManagerOptionsInput, ServerConfigInput } from './config.js';
import { ServerConnection } from './connection.js';
import {
  AlreadyConnectedError,
  ConfigError,
  ConnectionClosedError,
  ServerNotFoundError,
  toError
} from './errors.js';
import { HealthMonitor } from './health.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { healthFromState } from './state.js';
import { ToolCache } from './tool-cache.js';
import { createTransport } from './transports/index.js';
import type { TransportFactory } from './transports/index.js';
import { ConnectionState, ServerHealth } from './types.js';
import type {
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
  ToolSchema
} from './types.js';

export type ConnectionManagerOptions = ManagerOptionsInput & {
  /** Defaults to createTransport; tests plug in-process transports here */
  transportFactory?: TransportFactory;
  logger?: Logger;
  /** Jitter source for reconnection delays */
  random?: () => number;
};

type Listener<T> = (event: T) => void;

export class ConnectionManager {
  private readonly connections = new Map<string, ServerConnection>();
  private readonly cache = new ToolCache();
  private readonly options: ManagerOptions;
  private readonly health: HealthMonitor;
  private readonly transportFactory: TransportFactory;
  private readonly log: Logger;
  private readonly random: (() => number) | undefined;

  private readonly sandboxListeners = new Set<Listener<SandboxStateEvent>>();
  private readonly notificationListeners = new Set<Listener<NotificationEvent>>();
  private readonly stateListeners = new Set<Listener<StateChange>>();

  private shutDown = false;

  constructor(options: ConnectionManagerOptions = {}) {
    const { transportFactory, logger, random, ...rest } = options;
    this.options = resolveManagerOptions(rest);
    this.transportFactory = transportFactory ?? createTransport;
    this.log = (logger ?? defaultLogger).child({ component: 'manager' });
    this.random = random;
    this.health = new HealthMonitor(this.options.health, this.log);
  }

  get managerOptions(): ManagerOptions {
    return this.options;
  }

  /**
   * Register and start a connection. Resolves once it is ready.
   */
  async connect(input: ServerConfig | ServerConfigInput): Promise<ServerInfo> {
    if (this.shutDown) {
      throw new ConnectionClosedError(undefined, 'manager has been shut down');
    }
    const config = parseServerConfig(input);

    const existing = this.connections.get(config.id);
    if (existing && existing.state !== ConnectionState.CLOSED) {
      throw new AlreadyConnectedError(config.id, existing.state);
    }
    if (existing) {
      // A fresh connection counts generations from 1 again
      this.health.unwatch(config.id);
      this.cache.delete(config.id);
    }

    const connection = new ServerConnection({
      config,
      options: this.options,
      cache: this.cache,
      transportFactory: this.transportFactory,
      hooks: {
        onNotification: (serverId, notification) => this.handleNotification(serverId, notification),
        onTerminated: (serverId, error) => this.onTerminated(serverId, error)
      },
      logger: this.log,
      random: this.random
    });
    connection.onStateChange((change) => this.emit(this.stateListeners, change, 'state'));
    this.connections.set(config.id, connection);
    this.health.watch(connection);

    this.log.info(`Connecting to '${config.id}' over ${config.transport.type}`);
    return connection.start();
  }

  private onTerminated(serverId: string, error: Error): void {
    this.health.unwatch(serverId);
    this.log.error(`Server '${serverId}' closed after exhausting reconnection attempts`, {
      error: error.message
    });
  }

  /**
   * Close and forget a connection. Returns false when the id is unknown.
   */
  async disconnect(serverId: string): Promise<boolean> {
    const connection = this.connections.get(serverId);
    if (!connection) {
      return false;
    }
    this.connections.delete(serverId);
    this.health.unwatch(serverId);

    await connection.close('disconnected');
    this.cache.delete(serverId);
    this.log.info(`Disconnected '${serverId}'`);
    return true;
  }

  private requireConnection(serverId: string): ServerConnection {
    const connection = this.connections.get(serverId);
    if (!connection) {
      throw new ServerNotFoundError(serverId, Array.from(this.connections.keys()));
    }
    return connection;
  }

  /**
   * Cached tools: possibly stale while degraded, empty while reconnecting
   */
  listTools(serverId: string): readonly ToolSchema[] {
    this.requireConnection(serverId);
    return this.cache.list(serverId);
  }

  listAllTools(): ServerTool[] {
    return this.cache.all();
  }

  findTool(toolName: string): ServerTool[] {
    return this.cache.find(toolName);
  }

  async callTool(
    serverId: string,
    tool: string,
    args: Record<string, unknown> = {},
    options: CallOptions = {}
  ): Promise<ToolCallResult> {
    return this.requireConnection(serverId).callTool(tool, args, options);
  }

  async refreshTools(serverId: string): Promise<readonly ToolSchema[]> {
    return this.requireConnection(serverId).refreshTools();
  }

  /**
   * React to a server notification, then pass it to subscribers
   */
  handleNotification(serverId: string, notification: InboundNotification): void {
    const connection = this.connections.get(serverId);
    if (!connection) {
      this.log.debug('Notification from unknown server dropped', { serverId, method: notification.method });
      return;
    }

    switch (notification.method) {
      case METHODS.toolsListChanged:
        this.refreshInBackground(connection, 'tool list changed');
        break;

      case METHODS.sandboxState: {
        const parsed = SandboxStateSchema.safeParse(notification.params ?? {});
        if (!parsed.success) {
          this.log.warn('Ignoring invalid sandbox state', { serverId, issues: formatIssues(parsed.error) });
          break;
        }
        this.cache.markStale(serverId);
        this.refreshInBackground(connection, 'sandbox state changed');
        this.emit(this.sandboxListeners, { serverId, state: parsed.data, receivedAt: new Date() }, 'sandbox');
        break;
      }
    }

    this.emit(this.notificationListeners, { serverId, notification, receivedAt: new Date() }, 'notification');
  }

  private refreshInBackground(connection: ServerConnection, reason: string): void {
    connection
      .refreshTools()
      .then((tools) => {
        this.log.debug(`Re-discovered ${tools.length} tool(s)`, { server: connection.id, reason });
      })
      .catch((error: unknown) => {
        this.log.warn('Tool re-discovery failed', { server: connection.id, reason, error: toError(error).message });
      });
  }

  private emit<T>(listeners: Set<Listener<T>>, event: T, kind: string): void {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error(`${kind} listener threw`, { error: toError(error).message });
      }
    }
  }

  private subscribe<T>(listeners: Set<Listener<T>>, listener: Listener<T>): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  onSandboxState(listener: Listener<SandboxStateEvent>): () => void {
    return this.subscribe(this.sandboxListeners, listener);
  }

  onNotification(listener: Listener<NotificationEvent>): () => void {
    return this.subscribe(this.notificationListeners, listener);
  }

  onStateChange(listener: Listener<StateChange>): () => void {
    return this.subscribe(this.stateListeners, listener);
  }

  /**
   * Send `notifications/sandbox_state` to every ready or degraded server.
   * Returns the ids that were notified.
   */
  async notifySandboxState(state: SandboxState): Promise<string[]> {
    const parsed = SandboxStateSchema.safeParse(state);
    if (!parsed.success) {
      throw new ConfigError('Invalid sandbox state', formatIssues(parsed.error));
    }

    const targets = Array.from(this.connections.values()).filter((connection) => connection.isServing());
    const results = await Promise.allSettled(
      targets.map((connection) => connection.notify(METHODS.sandboxState, parsed.data))
    );

    const notified: string[] = [];
    results.forEach((result, index) => {
      const target = targets[index];
      if (!target) return;
      if (result.status === 'fulfilled') {
        notified.push(target.id);
      } else {
        this.log.warn('Failed to notify sandbox state', {
          server: target.id,
          error: toError(result.reason).message
        });
      }
    });
    return notified;
  }

  getStatus(serverId: string): ConnectionStatus {
    return this.requireConnection(serverId).status();
  }

  listServers(): ConnectionStatus[] {
    return Array.from(this.connections.values()).map((connection) => connection.status());
  }

  serverHealth(serverId: string): ServerHealth {
    return healthFromState(this.requireConnection(serverId).state);
  }

  /**
   * Probe every connection now and report the resulting health
   */
  async healthCheck(): Promise<Record<string, ServerHealth>> {
    await this.health.probeAll(this.connections.values());
    const report: Record<string, ServerHealth> = {};
    for (const [serverId, connection] of this.connections) {
      report[serverId] = healthFromState(connection.state);
    }
    return report;
  }

  has(serverId: string): boolean {
    return this.connections.has(serverId);
  }

  /**
   * Close every connection. Further connect() calls are rejected.
   */
  async shutdown(): Promise<void> {
    this.shutDown = true;
    this.health.stop();

    const all = Array.from(this.connections.values());
    this.connections.clear();
    await Promise.all(all.map((connection) => connection.close('manager shutdown')));
    for (const connection of all) {
      this.cache.delete(connection.id);
    }
    this.log.info(`Shut down ${all.length} connection(s)`);
  }
}
