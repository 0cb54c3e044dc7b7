import { ConnectionManagerError } from '../../src/errors.js';
import { DaemonClient } from '../client/daemon-client.js';
import { CommandError } from '../errors.js';
import { OutputFormatter } from '../formatter.js';
import type { ApiResponse } from '../formatter.js';
import { ensureDaemon } from './daemon.js';

export interface CommonOptions {
  json?: boolean;
  session?: string;
  config?: string;
}

export interface RunSettings {
  /** Start the daemon first when it is not running (default true) */
  autoStart?: boolean;
  /** Socket request timeout */
  timeoutMs?: number;
}

export function describeError(error: unknown): string {
  if (error instanceof CommandError || error instanceof ConnectionManagerError) {
    return error.format();
  }
  return error instanceof Error ? error.message : String(error);
}

export function printFailure(error: unknown, options: CommonOptions): number {
  OutputFormatter.printResponse({ success: false, error: describeError(error) }, options.json);
  return 1;
}

/**
 * Run one daemon round trip and print its outcome. Resolves to the exit code.
 */
export async function runCommand(
  options: CommonOptions,
  action: (client: DaemonClient) => Promise<ApiResponse>,
  settings: RunSettings = {}
): Promise<number> {
  const client = new DaemonClient({ session: options.session, timeout: settings.timeoutMs });
  try {
    if (settings.autoStart ?? true) {
      await ensureDaemon({ session: options.session, config: options.config });
    }
    OutputFormatter.printResponse(await action(client), options.json);
    return 0;
  } catch (error) {
    return printFailure(error, options);
  } finally {
    await client.close();
  }
}
