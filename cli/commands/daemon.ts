/**
 * Daemon commands: start, stop, reload, health
 */

import { OutputFormatter } from '../formatter.js';
import { ensureDaemon } from '../utils/daemon.js';
import { printFailure, runCommand } from '../utils/run.js';
import type { CommonOptions } from '../utils/run.js';

export async function daemonStart(options: CommonOptions): Promise<number> {
  try {
    const result = await ensureDaemon({ session: options.session, config: options.config });
    const message = result.alreadyRunning
      ? 'Daemon is already running'
      : `Daemon started${result.configPath ? ` (config: ${result.configPath})` : ''}`;
    OutputFormatter.printResponse({ success: true, data: { message } }, options.json);
    return 0;
  } catch (error) {
    return printFailure(error, options);
  }
}

export function daemonStop(options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({ success: true, data: await client.request({ action: 'shutdown' }) }), {
    autoStart: false
  });
}

export function daemonReload(options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({ success: true, data: await client.request({ action: 'reload' }) }), {
    autoStart: false
  });
}

export function daemonHealth(options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({ success: true, data: await client.request({ action: 'ping' }) }), {
    autoStart: false
  });
}
