/**
 * Scripted in-process tool server
 *
 * Every factory call yields a new ScriptedTransport bound to the same
 * FakeServer, so tests can crash one generation and watch the next.
 */

import { buildErrorResponse, buildResult } from '../../src/codec.js';
import type { JsonRpcRequest, OutboundMessage, RpcErrorPayload } from '../../src/codec.js';
import { ConnectionClosedError, TransportError } from '../../src/errors.js';
import { FrameQueue } from '../../src/transports/base.js';
import type { Frame, Transport, TransportFactory } from '../../src/transports/base.js';
import { TransportType } from '../../src/types.js';
import type { ServerConfig } from '../../src/types.js';

export type CallReply = { result: Record<string, unknown> } | { error: RpcErrorPayload } | 'hold';

export interface FakeServerOptions {
  name?: string;
  version?: string;
  tools?: unknown[];
  capabilities?: Record<string, unknown>;
}

function isRequest(message: OutboundMessage): message is JsonRpcRequest {
  return 'method' in message && 'id' in message;
}

export function textResult(text: string): { result: Record<string, unknown> } {
  return { result: { content: [{ type: 'text', text }] } };
}

export class ScriptedTransport implements Transport {
  readonly type = TransportType.STDIO;
  readonly sent: OutboundMessage[] = [];
  closeCalls = 0;
  private readonly queue = new FrameQueue();

  constructor(
    private readonly server: FakeServer,
    readonly config: ServerConfig
  ) {}

  async open(): Promise<void> {
    if (this.server.failOpens > 0) {
      this.server.failOpens--;
      throw new TransportError(this.config.id, 'connection refused');
    }
  }

  async send(message: OutboundMessage): Promise<void> {
    if (this.queue.closed) {
      throw new ConnectionClosedError(this.config.id, 'transport is closed');
    }
    this.sent.push(message);
    this.server.handle(message, this);
  }

  receive(): Promise<Frame> {
    return this.queue.next();
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.queue.push({ kind: 'closed' });
  }

  /** Push a raw inbound message */
  deliver(message: unknown): void {
    this.queue.push({ kind: 'message', message });
  }

  /** Push a non-fatal error frame */
  fail(error: Error): void {
    this.queue.push({ kind: 'error', error });
  }

  /** The server side ends the stream */
  crash(error?: Error): void {
    this.queue.push(error ? { kind: 'closed', error } : { kind: 'closed' });
  }

  requests(method?: string): JsonRpcRequest[] {
    return this.sent.filter(isRequest).filter((request) => method === undefined || request.method === method);
  }

  notifications(method?: string): OutboundMessage[] {
    return this.sent.filter(
      (message) => !('id' in message) && 'method' in message && (method === undefined || message.method === method)
    );
  }
}

export class FakeServer {
  name: string;
  version: string;
  tools: unknown[];
  /** When set, tools/list is served page by page with numeric cursors */
  toolPages: unknown[][] | null = null;
  capabilities: Record<string, unknown>;
  answerPings = true;
  /** Number of upcoming open() calls that fail */
  failOpens = 0;
  onCall: (name: string, args: unknown) => CallReply = (name, args) => textResult(`${name}:${JSON.stringify(args)}`);

  readonly transports: ScriptedTransport[] = [];
  /** tools/call requests that were held instead of answered */
  readonly held: Array<{ transport: ScriptedTransport; request: JsonRpcRequest }> = [];

  readonly factory: TransportFactory = (config) => {
    const transport = new ScriptedTransport(this, config);
    this.transports.push(transport);
    return transport;
  };

  constructor(options: FakeServerOptions = {}) {
    this.name = options.name ?? 'fake-server';
    this.version = options.version ?? '1.0.0';
    this.tools = options.tools ?? [];
    this.capabilities = options.capabilities ?? { tools: {} };
  }

  get current(): ScriptedTransport {
    const transport = this.transports[this.transports.length - 1];
    if (!transport) {
      throw new Error('no transport has been created');
    }
    return transport;
  }

  handle(message: OutboundMessage, transport: ScriptedTransport): void {
    if (!isRequest(message)) return;

    switch (message.method) {
      case 'initialize':
        transport.deliver(
          buildResult(message.id, {
            protocolVersion: '2025-06-18',
            capabilities: this.capabilities,
            serverInfo: { name: this.name, version: this.version }
          })
        );
        return;

      case 'tools/list': {
        if (!this.toolPages) {
          transport.deliver(buildResult(message.id, { tools: this.tools }));
          return;
        }
        const cursor = message.params?.cursor;
        const index = typeof cursor === 'string' ? Number(cursor) : 0;
        const page = { tools: this.toolPages[index] ?? [] };
        transport.deliver(
          buildResult(message.id, index + 1 < this.toolPages.length ? { ...page, nextCursor: String(index + 1) } : page)
        );
        return;
      }

      case 'ping':
        if (this.answerPings) {
          transport.deliver(buildResult(message.id, {}));
        }
        return;

      case 'tools/call': {
        const params = message.params ?? {};
        const reply = this.onCall(String(params.name), params.arguments);
        if (reply === 'hold') {
          this.held.push({ transport, request: message });
        } else if ('error' in reply) {
          transport.deliver(buildErrorResponse(message.id, reply.error.code, reply.error.message, reply.error.data));
        } else {
          transport.deliver(buildResult(message.id, reply.result));
        }
        return;
      }

      default:
        transport.deliver(buildErrorResponse(message.id, -32601, `Method not found: ${message.method}`));
    }
  }
}
