/**
 * Local domain socket transport
 *
 * Newline-delimited JSON over `net`, framed with the SDK line buffer.
 */

import * as net from 'net';
import { ReadBuffer, serializeMessage } from '@modelcontextprotocol/sdk/shared/stdio.js';
import { FrameQueue } from './base.js';
import type { Frame, Transport } from './base.js';
import { toSdkMessage } from '../codec.js';
import type { OutboundMessage } from '../codec.js';
import { ConnectionClosedError, ProtocolError, TransportError, toError } from '../errors.js';
import { TransportType } from '../types.js';

export class SocketTransport implements Transport {
  readonly type = TransportType.SOCKET;
  private socket: net.Socket | null = null;
  private opening: Promise<void> | null = null;
  private readonly buffer = new ReadBuffer();
  private readonly queue = new FrameQueue();
  private lastError: Error | undefined;

  constructor(
    private readonly path: string,
    private readonly serverId?: string
  ) {}

  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.connect();
    }
    return this.opening;
  }

  private connect(): Promise<void> {
    if (this.queue.closed) {
      return Promise.reject(new ConnectionClosedError(this.serverId, 'socket transport is closed'));
    }

    return new Promise((resolve, reject) => {
      // Held before it connects so close() can abandon the attempt
      const socket = net.createConnection(this.path);
      this.socket = socket;

      const onConnectError = (error: Error): void => {
        reject(new TransportError(this.serverId, `cannot connect to ${this.path}: ${error.message}`, error));
      };
      const onClosedEarly = (): void => {
        reject(new ConnectionClosedError(this.serverId, 'socket closed before it connected'));
      };
      socket.once('error', onConnectError);
      socket.once('close', onClosedEarly);

      socket.on('data', (chunk: Buffer) => this.onData(chunk));
      socket.on('error', (error) => {
        this.lastError = new TransportError(this.serverId, error.message, error);
      });
      socket.on('close', () => {
        this.queue.push({ kind: 'closed', error: this.lastError });
      });

      socket.once('connect', () => {
        socket.off('error', onConnectError);
        socket.off('close', onClosedEarly);
        resolve();
      });
    });
  }

  private onData(chunk: Buffer): void {
    this.buffer.append(chunk);
    for (;;) {
      try {
        const message = this.buffer.readMessage();
        if (message === null) break;
        this.queue.push({ kind: 'message', message });
      } catch (error) {
        // readMessage consumes the bad line before throwing
        this.queue.push({
          kind: 'error',
          error: new ProtocolError(this.serverId, `undecodable frame: ${toError(error).message}`)
        });
      }
    }
  }

  send(message: OutboundMessage): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed || this.queue.closed) {
      return Promise.reject(new ConnectionClosedError(this.serverId, 'socket is not open'));
    }

    const line = serializeMessage(toSdkMessage(message));
    return new Promise((resolve, reject) => {
      socket.write(line, (error) => {
        if (error) {
          reject(new TransportError(this.serverId, `write failed: ${error.message}`, error));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<Frame> {
    return this.queue.next();
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.buffer.clear();
    if (socket && !socket.destroyed) {
      socket.destroy();
    }
    this.queue.push({ kind: 'closed' });
  }
}
