/**
 * Spawned-process transport
 *
 * Launches the server with the SDK's safe default environment plus the
 * configured variables. Process exit surfaces as a closed frame.
 */

import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SdkFrameTransport } from './base.js';
import { TransportType } from '../types.js';
import type { StdioTransportDescriptor } from '../types.js';

export function createStdioTransport(
  serverId: string,
  descriptor: StdioTransportDescriptor,
  envOverrides: Record<string, string> = {}
): SdkFrameTransport {
  const inner = new StdioClientTransport({
    command: descriptor.command,
    args: descriptor.args,
    env: { ...getDefaultEnvironment(), ...descriptor.env, ...envOverrides },
    cwd: descriptor.cwd,
    stderr: 'inherit'
  });
  return new SdkFrameTransport(TransportType.STDIO, inner, serverId);
}
