/**
 * Streamable HTTP transport
 *
 * Requests are POSTed; server-sent events come back as individual frames.
 */

import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { SdkFrameTransport } from './base.js';
import { TransportType } from '../types.js';
import type { HttpTransportDescriptor } from '../types.js';

export function createHttpTransport(serverId: string, descriptor: HttpTransportDescriptor): SdkFrameTransport {
  const inner = new StreamableHTTPClientTransport(new URL(descriptor.url), {
    requestInit: {
      headers: descriptor.headers
    }
  });
  return new SdkFrameTransport(TransportType.HTTP, inner, serverId);
}
