/**
 * Daemon helpers
 * ensureDaemon() starts a detached daemon when none is listening for the session.
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { findServersFile } from '../../src/config.js';
import { hasLiveDaemon } from '../../src/session.js';
import { SocketClient } from '../../src/socket-client.js';
import { DaemonStartError } from '../errors.js';

export interface EnsureDaemonOptions {
  session?: string;
  config?: string;
  /** How long to wait for the daemon to accept connections */
  readyTimeoutMs?: number;
}

export interface DaemonResult {
  alreadyRunning: boolean;
  configPath: string | null;
}

/**
 * Locate the daemon entry point: compiled output first, sources as a fallback
 */
export function findDaemonEntry(): string {
  let projectRoot = dirname(fileURLToPath(import.meta.url));

  // Walk up from cli/utils or dist/cli/utils to the package root
  while (projectRoot !== dirname(projectRoot)) {
    if (existsSync(join(projectRoot, 'package.json'))) {
      break;
    }
    projectRoot = dirname(projectRoot);
  }

  const distEntry = join(projectRoot, 'dist/src/daemon.js');
  if (existsSync(distEntry)) {
    return distEntry;
  }

  const srcEntry = join(projectRoot, 'src/daemon.ts');
  if (existsSync(srcEntry)) {
    return srcEntry;
  }

  throw new DaemonStartError('daemon entry point not found. Please run: npm run build');
}

/**
 * PID file first, then an actual connection (covers a daemon started by hand)
 */
export async function isDaemonRunning(session?: string): Promise<boolean> {
  if (hasLiveDaemon(session)) {
    return true;
  }

  const client = new SocketClient({ session, connectTimeout: 1000 });
  try {
    await client.connect();
    return true;
  } catch {
    return false;
  } finally {
    await client.disconnect();
  }
}

function spawnDaemon(session: string | undefined, configPath: string | null): ChildProcess {
  const entry = findDaemonEntry();
  const env: NodeJS.ProcessEnv = { ...process.env, MCPLEX_DAEMON: '1' };
  if (session) {
    env.MCPLEX_SESSION = session;
  }
  if (configPath) {
    env.MCPLEX_CONFIG = configPath;
  }

  // Sources run through the tsx loader
  const args = entry.endsWith('.ts') ? ['--import', 'tsx', entry] : [entry];

  const child = spawn(process.execPath, args, {
    env,
    detached: true,
    stdio: 'ignore',
    windowsHide: true
  });
  child.unref();
  return child;
}

async function waitForDaemon(child: ChildProcess, session: string | undefined, timeoutMs: number): Promise<void> {
  const delay = 250;
  const deadline = Date.now() + timeoutMs;

  while (Date.now() < deadline) {
    if (child.exitCode !== null) {
      throw new DaemonStartError(`daemon exited with code ${child.exitCode}`);
    }
    if (await isDaemonRunning(session)) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, delay));
  }

  throw new DaemonStartError(`daemon did not come up within ${Math.round(timeoutMs / 1000)} seconds`);
}

/**
 * Make sure a daemon is running, starting one if needed
 *
 * @example
 * const result = await ensureDaemon({ session: 'default' });
 * if (!result.alreadyRunning) {
 *   console.log('Daemon started');
 * }
 */
export async function ensureDaemon(options: EnsureDaemonOptions = {}): Promise<DaemonResult> {
  // Throws for an explicit --config that does not exist
  const configPath = findServersFile(options.config);

  if (await isDaemonRunning(options.session)) {
    return { alreadyRunning: true, configPath };
  }

  const child = spawnDaemon(options.session, configPath);
  await waitForDaemon(child, options.session, options.readyTimeoutMs ?? 60000);
  return { alreadyRunning: false, configPath };
}
