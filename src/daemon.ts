/**
 * ManagerDaemon - long-running host for a ConnectionManager
 *
 * Responsibilities:
 * - Connect every server listed in mcp-servers.json and keep them supervised
 * - Accept newline-delimited JSON commands from the CLI over a session socket
 * - Translate commands into manager operations
 *
 * Socket Protocol (newline-delimited JSON):
 * - Command: {"id":"1","action":"list","server":"docs"}
 * - Response: {"id":"1","success":true,"data":{...}}
 */

import * as net from 'net';
import { formatIssues, loadServersFile } from './config.js';
import { ConnectionManagerError, ServerNotFoundError, ToolNotFoundError, toError } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ConnectionManager } from './manager.js';
import type { ConnectionManagerOptions } from './manager.js';
import { DaemonCommandSchema } from './protocol.js';
import type { DaemonCommand, DaemonResponse } from './protocol.js';
import { SessionListener, describeEndpoint, resolveSession } from './session.js';
import type { ServerConfig } from './types.js';

export interface DaemonConfig {
  configPath?: string;
  /** Session name for the socket */
  session?: string;
  manager?: ConnectionManagerOptions;
  logger?: Logger;
}

export interface ReloadResult {
  reconnected: string[];
  failed: Array<{ server: string; error: string }>;
}

function idOf(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return null;
}

/**
 * Daemon hosting one ConnectionManager
 */
export class ManagerDaemon {
  readonly manager: ConnectionManager;
  private readonly listener: SessionListener;
  private serverConfigs = new Map<string, ServerConfig>();
  readonly session: string;
  private readonly configPath?: string;
  private readonly log: Logger;
  private readonly startedAt = new Date();
  private stopping: Promise<void> | null = null;
  private stopped = false;
  private readonly stoppedWaiters: Array<() => void> = [];

  constructor(config: DaemonConfig = {}) {
    this.session = resolveSession(config.session);
    this.configPath = config.configPath;
    this.log = (config.logger ?? defaultLogger).child({ component: 'daemon' });
    this.manager = new ConnectionManager({ logger: config.logger, ...config.manager });

    this.listener = new SessionListener(this.session, (socket) => this.handleSocketConnection(socket));
  }

  private handleSocketConnection(socket: net.Socket): void {
    let buffer = '';

    socket.on('data', (data) => {
      buffer += data.toString();

      while (buffer.includes('\n')) {
        const newlineIdx = buffer.indexOf('\n');
        const line = buffer.substring(0, newlineIdx);
        buffer = buffer.substring(newlineIdx + 1);

        if (!line.trim()) continue;

        this.handleLine(line)
          .then((response) => {
            if (!socket.destroyed) {
              socket.write(JSON.stringify(response) + '\n');
            }
          })
          .catch((error: unknown) => {
            this.log.error('Failed to answer command', { error: toError(error).message });
          });
      }
    });

    socket.on('error', (error) => {
      this.log.debug('Client socket error', { error: error.message });
    });
  }

  private async handleLine(line: string): Promise<DaemonResponse> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      return { id: null, success: false, error: `Invalid JSON: ${toError(error).message}`, errorType: 'invalid_command' };
    }
    return this.handleCommand(raw);
  }

  /**
   * Validate and execute one command. Never rejects.
   */
  async handleCommand(raw: unknown): Promise<DaemonResponse> {
    const parsed = DaemonCommandSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        id: idOf(raw),
        success: false,
        error: `Invalid command: ${formatIssues(parsed.error).join('; ')}`,
        errorType: 'invalid_command'
      };
    }

    const command = parsed.data;
    try {
      const data = await this.execute(command);
      return { id: command.id, success: true, data };
    } catch (error) {
      if (error instanceof ConnectionManagerError) {
        return { id: command.id, success: false, error: error.format(), errorType: error.type };
      }
      return { id: command.id, success: false, error: toError(error).message };
    }
  }

  private async execute(command: DaemonCommand): Promise<unknown> {
    switch (command.action) {
      case 'ping':
        return {
          status: 'ok',
          session: this.session,
          pid: process.pid,
          uptime: Math.floor((Date.now() - this.startedAt.getTime()) / 1000),
          servers: this.manager.listServers().map((server) => server.id)
        };

      case 'servers':
        return { servers: this.manager.listServers() };

      case 'list': {
        const tools = this.manager.listTools(command.server).map((tool) => ({
          name: tool.name,
          description: tool.description
        }));
        const { toolsStale } = this.manager.getStatus(command.server);
        return { server: command.server, tools, count: tools.length, stale: toolsStale };
      }

      case 'schema': {
        const tool = this.manager.listTools(command.server).find((candidate) => candidate.name === command.tool);
        if (!tool) {
          throw new ToolNotFoundError(command.server, command.tool);
        }
        return tool;
      }

      case 'call': {
        const result = await this.manager.callTool(command.server, command.tool, command.arguments, {
          timeoutMs: command.timeoutMs
        });
        return { server: command.server, tool: command.tool, result };
      }

      case 'status':
        return command.server ? this.manager.getStatus(command.server) : { servers: this.manager.listServers() };

      case 'refresh': {
        const tools = await this.manager.refreshTools(command.server);
        return { server: command.server, tools: tools.map(({ name, description }) => ({ name, description })), count: tools.length };
      }

      case 'connect': {
        const config = this.serverConfigs.get(command.server);
        if (!config) {
          throw new ServerNotFoundError(command.server, Array.from(this.serverConfigs.keys()));
        }
        const serverInfo = await this.manager.connect(config);
        return { server: command.server, serverInfo };
      }

      case 'disconnect':
        return { server: command.server, disconnected: await this.manager.disconnect(command.server) };

      case 'reload':
        this.loadServerConfigs();
        return { message: 'Configuration reloaded', ...(await this.reconnectServers()) };

      case 'shutdown':
        // Stop after this response has been written
        setImmediate(() => {
          this.stop().catch((error: unknown) => {
            this.log.error('Daemon stop failed', { error: toError(error).message });
          });
        });
        return { message: 'Daemon shutting down' };
    }
  }

  /**
   * Load mcp-servers.json
   */
  private loadServerConfigs(): void {
    const { path, servers } = loadServersFile(this.configPath);
    if (!path) {
      this.log.warn('mcp-servers.json not found; starting with no servers');
    } else {
      this.log.info(`Loaded servers config: ${path}`);
    }
    this.serverConfigs = new Map(servers.map((server): [string, ServerConfig] => [server.id, server]));
    this.log.info(`Configured servers: ${Array.from(this.serverConfigs.keys()).join(', ') || '(none)'}`);
  }

  /**
   * Connect every configured server; failures are logged, not fatal
   */
  private async connectConfiguredServers(): Promise<ReloadResult> {
    const configs = Array.from(this.serverConfigs.values());
    const results = await Promise.allSettled(configs.map((config) => this.manager.connect(config)));

    const outcome: ReloadResult = { reconnected: [], failed: [] };
    results.forEach((result, index) => {
      const config = configs[index];
      if (!config) return;
      if (result.status === 'fulfilled') {
        outcome.reconnected.push(config.id);
        this.log.info(`${config.id} connected`);
      } else {
        const message = toError(result.reason).message;
        outcome.failed.push({ server: config.id, error: message });
        this.log.error(`${config.id} connect failed`, { error: message });
      }
    });
    return outcome;
  }

  /**
   * Drop every connection and connect the servers of the reloaded config
   */
  private async reconnectServers(): Promise<ReloadResult> {
    const current = this.manager.listServers().map((server) => server.id);
    await Promise.all(current.map((id) => this.manager.disconnect(id)));
    return this.connectConfiguredServers();
  }

  /**
   * Start Daemon
   */
  async start(): Promise<void> {
    this.loadServerConfigs();

    this.log.info('Connecting configured servers...');
    await this.connectConfiguredServers();

    try {
      const endpoint = await this.listener.listen();
      this.log.info(`Daemon listening on ${describeEndpoint(endpoint)}`, { session: this.session });
    } catch (error) {
      this.log.error('Daemon start failed', { error: toError(error).message });
      await this.manager.shutdown();
      throw error;
    }
  }

  /**
   * Stop Daemon
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    await this.manager.shutdown();
    if (this.listener.listening) {
      await this.listener.close();
    }
    this.log.info('Daemon stopped');
    this.stopped = true;
    for (const waiter of this.stoppedWaiters.splice(0)) {
      waiter();
    }
  }

  /**
   * Resolves once the daemon has stopped, whatever stopped it
   */
  waitUntilStopped(): Promise<void> {
    if (this.stopped) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.stoppedWaiters.push(resolve);
    });
  }
}

// Run daemon if this is the entry point
if (/daemon\.(js|ts)$/.test(process.argv[1] ?? '') || process.env.MCPLEX_DAEMON === '1') {
  const daemon = new ManagerDaemon();

  defaultLogger.info('Starting mcplex daemon...');

  daemon
    .start()
    .then(() => daemon.waitUntilStopped())
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      defaultLogger.error('Daemon start failed', { error: toError(error).message });
      process.exit(1);
    });

  // Graceful shutdown
  const onSignal = (): void => {
    defaultLogger.info('Stopping mcplex daemon...');
    daemon.stop().catch((error: unknown) => {
      defaultLogger.error('Daemon stop failed', { error: toError(error).message });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
