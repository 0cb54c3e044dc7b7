/**
 * Socket client for the daemon
 *
 * Used by the CLI. Responses are correlated with the same pending-request
 * table the server connections use.
 *
 * Protocol: newline-delimited JSON
 * - Command: {"id":"1","action":"list","server":"docs"}
 * - Response: {"id":"1","success":true,"data":{...}}
 */

import * as net from 'net';
import { ConnectionClosedError, TransportError } from './errors.js';
import { logger } from './logger.js';
import { PendingRequests } from './pending.js';
import { DaemonResponseSchema } from './protocol.js';
import type { DaemonRequest, DaemonResponse } from './protocol.js';
import { resolveSession, sessionEndpoint } from './session.js';

/**
 * Socket Client options
 */
export interface SocketClientOptions {
  session?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  connectTimeout?: number;
}

export class SocketClient {
  private readonly session: string;
  private socket: net.Socket | null = null;
  private connected = false;
  private readonly timeout: number;
  private readonly connectTimeout: number;
  private readonly pending = new PendingRequests<DaemonResponse>('daemon');

  constructor(options: SocketClientOptions = {}) {
    this.session = resolveSession(options.session);
    this.timeout = options.timeout || 30000;
    this.connectTimeout = options.connectTimeout || 5000;
  }

  /**
   * Connect to daemon
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const endpoint = sessionEndpoint(this.session);
    const socket =
      endpoint.type === 'tcp' ? net.createConnection(endpoint.port, endpoint.host) : net.createConnection(endpoint.path);
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new TransportError(undefined, 'connection to daemon timed out'));
      }, this.connectTimeout);

      socket.on('connect', () => {
        clearTimeout(timer);
        this.connected = true;
        this.setupSocket(socket);
        resolve();
      });

      socket.on('error', (err: Error) => {
        clearTimeout(timer);
        this.connected = false;
        reject(new TransportError(undefined, `failed to connect to daemon: ${err.message}`, err));
      });
    });
  }

  private setupSocket(socket: net.Socket): void {
    let buffer = '';

    socket.on('data', (data: Buffer | string) => {
      buffer += data.toString();

      while (buffer.includes('\n')) {
        const newlineIdx = buffer.indexOf('\n');
        const line = buffer.substring(0, newlineIdx);
        buffer = buffer.substring(newlineIdx + 1);

        if (!line.trim()) continue;
        this.handleLine(line);
      }
    });

    socket.on('close', () => {
      this.connected = false;
      this.pending.rejectAll(() => new ConnectionClosedError('daemon', 'daemon connection closed'));
    });
  }

  private handleLine(line: string): void {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      logger.debug('Ignoring non-JSON line from daemon', { error: error instanceof Error ? error.message : String(error) });
      return;
    }

    const parsed = DaemonResponseSchema.safeParse(json);
    if (!parsed.success || parsed.data.id === null) {
      logger.debug('Ignoring unexpected daemon message', { line });
      return;
    }
    this.pending.resolve(parsed.data.id, parsed.data);
  }

  /**
   * Send command and wait for response
   */
  async send(command: DaemonRequest): Promise<DaemonResponse> {
    if (!this.connected) {
      await this.connect();
    }
    const socket = this.socket;
    if (!socket) {
      throw new ConnectionClosedError('daemon', 'not connected to daemon');
    }

    const id = String(this.pending.nextRequestId());
    const response = this.pending.register(id, command.action, { timeoutMs: this.timeout });

    socket.write(JSON.stringify({ ...command, id }) + '\n', (err) => {
      if (err) {
        this.pending.reject(id, new TransportError('daemon', `write failed: ${err.message}`, err));
      }
    });
    return response;
  }

  /**
   * Disconnect from daemon
   */
  async disconnect(): Promise<void> {
    if (this.socket) {
      this.socket.end();
      this.socket = null;
    }
    this.connected = false;
    this.pending.rejectAll(() => new ConnectionClosedError('daemon', 'client disconnected'));
  }

  isConnected(): boolean {
    return this.connected;
  }
}

/**
 * Quick helper for one-shot commands
 */
export async function sendCommand(command: DaemonRequest, options?: SocketClientOptions): Promise<DaemonResponse> {
  const client = new SocketClient(options);
  try {
    return await client.send(command);
  } finally {
    await client.disconnect();
  }
}
