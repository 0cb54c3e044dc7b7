/**
 * Server management commands: servers, status, refresh, connect, disconnect
 */

import { runCommand } from '../utils/run.js';
import type { CommonOptions } from '../utils/run.js';

export function servers(options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({
    success: true,
    data: await client.request({ action: 'servers' })
  }));
}

export function status(server: string | undefined, options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({
    success: true,
    server,
    data: await client.request(server ? { action: 'status', server } : { action: 'status' })
  }));
}

export function refresh(server: string, options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({
    success: true,
    server,
    data: await client.request({ action: 'refresh', server })
  }));
}

export function connect(server: string, options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({
    success: true,
    server,
    data: await client.request({ action: 'connect', server })
  }));
}

export function disconnect(server: string, options: CommonOptions): Promise<number> {
  return runCommand(
    options,
    async (client) => ({
      success: true,
      server,
      data: await client.request({ action: 'disconnect', server })
    }),
    { autoStart: false }
  );
}
