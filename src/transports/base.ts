/**
 * Transport abstraction
 *
 * A transport moves JSON-RPC messages to and from one server. Inbound traffic
 * is exposed as a stream of frames pulled with `receive()`, so the read loop
 * and senders never wait on each other.
 */

import type { Transport as SdkTransport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ConnectionClosedError, ConnectionManagerError, ProtocolError, TransportError, toError } from '../errors.js';
import { toSdkMessage } from '../codec.js';
import type { OutboundMessage } from '../codec.js';
import type { ServerConfig, TransportType } from '../types.js';

export type MessageFrame = { kind: 'message'; message: unknown };
/** Malformed frame or non-fatal transport error; the stream stays open */
export type ErrorFrame = { kind: 'error'; error: Error };
/** Terminal */
export type ClosedFrame = { kind: 'closed'; error?: Error };

export type Frame = MessageFrame | ErrorFrame | ClosedFrame;

export interface Transport {
  readonly type: TransportType;
  open(): Promise<void>;
  send(message: OutboundMessage): Promise<void>;
  /** Next inbound frame; after `closed`, every call returns that same frame */
  receive(): Promise<Frame>;
  close(): Promise<void>;
}

export type TransportFactory = (config: ServerConfig) => Transport;

/**
 * Unbounded frame buffer between a transport's callbacks and its reader
 */
export class FrameQueue {
  private readonly frames: Frame[] = [];
  private readonly waiters: Array<(frame: Frame) => void> = [];
  private closedFrame: ClosedFrame | null = null;

  push(frame: Frame): void {
    if (this.closedFrame) return;
    if (frame.kind === 'closed') {
      this.closedFrame = frame;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      this.frames.push(frame);
    }

    if (this.closedFrame) {
      for (const pending of this.waiters.splice(0)) {
        pending(this.closedFrame);
      }
    }
  }

  next(): Promise<Frame> {
    const frame = this.frames.shift();
    if (frame) return Promise.resolve(frame);
    if (this.closedFrame) return Promise.resolve(this.closedFrame);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get closed(): boolean {
    return this.closedFrame !== null;
  }
}

function isDecodeFailure(error: Error): boolean {
  return error instanceof SyntaxError || error.name === 'ZodError';
}

/**
 * Adapts a callback-style SDK transport to the frame interface
 */
export class SdkFrameTransport implements Transport {
  private readonly queue = new FrameQueue();

  constructor(
    readonly type: TransportType,
    private readonly inner: SdkTransport,
    private readonly serverId?: string
  ) {
    inner.onmessage = (message) => {
      this.queue.push({ kind: 'message', message });
    };
    inner.onerror = (error) => {
      const wrapped = isDecodeFailure(error)
        ? new ProtocolError(serverId, `undecodable frame: ${error.message}`)
        : new TransportError(serverId, error.message, error);
      this.queue.push({ kind: 'error', error: wrapped });
    };
    inner.onclose = () => {
      this.queue.push({ kind: 'closed' });
    };
  }

  async open(): Promise<void> {
    try {
      await this.inner.start();
    } catch (error) {
      throw new TransportError(this.serverId, `failed to open ${this.type} transport: ${toError(error).message}`, error);
    }
  }

  async send(message: OutboundMessage): Promise<void> {
    if (this.queue.closed) {
      throw new ConnectionClosedError(this.serverId, 'transport is closed');
    }
    try {
      await this.inner.send(toSdkMessage(message));
    } catch (error) {
      if (error instanceof ConnectionManagerError) throw error;
      throw new TransportError(this.serverId, `send failed: ${toError(error).message}`, error);
    }
  }

  receive(): Promise<Frame> {
    return this.queue.next();
  }

  async close(): Promise<void> {
    try {
      await this.inner.close();
    } finally {
      this.queue.push({ kind: 'closed' });
    }
  }
}
