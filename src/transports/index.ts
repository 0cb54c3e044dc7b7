import { createHttpTransport } from './http.js';
import { SocketTransport } from './socket.js';
import { createStdioTransport } from './stdio.js';
import type { Transport } from './base.js';
import { TransportType } from '../types.js';
import type { ServerConfig } from '../types.js';

export { FrameQueue, SdkFrameTransport } from './base.js';
export type { Frame, MessageFrame, ErrorFrame, ClosedFrame, Transport, TransportFactory } from './base.js';
export { SocketTransport } from './socket.js';
export { createHttpTransport } from './http.js';
export { createStdioTransport } from './stdio.js';

/**
 * Build the transport a server config describes
 */
export function createTransport(config: ServerConfig): Transport {
  const { transport } = config;
  switch (transport.type) {
    case TransportType.STDIO:
      return createStdioTransport(config.id, transport, config.env);
    case TransportType.SOCKET:
      return new SocketTransport(transport.path, config.id);
    case TransportType.HTTP:
      return createHttpTransport(config.id, transport);
    default: {
      const unsupported: never = transport;
      throw new Error(`Unsupported transport: ${JSON.stringify(unsupported)}`);
    }
  }
}
