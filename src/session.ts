/**
 * Daemon sessions
 *
 * A session names one daemon. Its endpoint is a domain socket in the temp
 * directory, or a loopback TCP port derived from the name on Windows, where
 * the port is also written to a file for other tools to find.
 */

import * as net from 'net';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const DEFAULT_SESSION = 'default';
const SESSION_NAME = /^[A-Za-z0-9_.-]+$/;

// Dynamic/private range
const PORT_BASE = 49152;
const PORT_SPAN = 16383;

export type SessionEndpoint = { type: 'unix'; path: string } | { type: 'tcp'; port: number; host: string };

export interface SessionFiles {
  session: string;
  endpoint: SessionEndpoint;
  pidFile: string;
  /** Only for TCP endpoints */
  portFile: string | null;
}

/**
 * Session from the argument, MCPLEX_SESSION or the default
 */
export function resolveSession(session?: string): string {
  const name = session || process.env.MCPLEX_SESSION || DEFAULT_SESSION;
  if (!SESSION_NAME.test(name)) {
    throw new ConfigError(`Invalid session name '${name}': use letters, digits, '.', '_' or '-'`);
  }
  return name;
}

/** 32-bit FNV-1a */
function hashName(name: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < name.length; i++) {
    hash ^= name.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function sessionPort(session: string): number {
  return PORT_BASE + (hashName(session) % PORT_SPAN);
}

export function sessionFiles(session?: string): SessionFiles {
  const name = resolveSession(session);
  const base = path.join(os.tmpdir(), `mcplex-${name}`);

  if (process.platform === 'win32') {
    return {
      session: name,
      endpoint: { type: 'tcp', port: sessionPort(name), host: '127.0.0.1' },
      pidFile: `${base}.pid`,
      portFile: `${base}.port`
    };
  }
  return {
    session: name,
    endpoint: { type: 'unix', path: `${base}.sock` },
    pidFile: `${base}.pid`,
    portFile: null
  };
}

export function sessionEndpoint(session?: string): SessionEndpoint {
  return sessionFiles(session).endpoint;
}

export function describeEndpoint(endpoint: SessionEndpoint): string {
  return endpoint.type === 'tcp' ? `${endpoint.host}:${endpoint.port}` : endpoint.path;
}

/**
 * PID recorded for the session, or null without a readable PID file
 */
export function readDaemonPid(session?: string): number | null {
  const { pidFile } = sessionFiles(session);
  let content: string;
  try {
    content = fs.readFileSync(pidFile, 'utf8');
  } catch {
    return null;
  }
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

function processExists(pid: number): boolean {
  try {
    // Signal 0 probes without delivering anything
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive but owned by someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * True when the session's PID file names a live process. A stale PID file
 * and its endpoint are removed.
 */
export function hasLiveDaemon(session?: string): boolean {
  const pid = readDaemonPid(session);
  if (pid === null) {
    return false;
  }
  if (processExists(pid)) {
    return true;
  }
  removeSessionFiles(session);
  return false;
}

/**
 * Remove the PID file and the socket or port file of a session
 */
export function removeSessionFiles(session?: string): void {
  const { endpoint, pidFile, portFile } = sessionFiles(session);
  const files = [pidFile, endpoint.type === 'unix' ? endpoint.path : portFile];

  for (const file of files) {
    if (!file) continue;
    try {
      fs.rmSync(file, { force: true });
    } catch (error) {
      logger.debug(`Could not remove ${file}`, { error: error instanceof Error ? error.message : String(error) });
    }
  }
}

/**
 * A net.Server bound to a session endpoint. Owns the session files while it
 * listens and ends every client connection when closed.
 */
export class SessionListener {
  readonly files: SessionFiles;
  private readonly server: net.Server;
  private readonly connections = new Set<net.Socket>();

  constructor(session: string | undefined, onConnection: (socket: net.Socket) => void) {
    this.files = sessionFiles(session);
    this.server = net.createServer((socket) => {
      this.connections.add(socket);
      socket.on('close', () => this.connections.delete(socket));
      onConnection(socket);
    });
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /**
   * Bind the endpoint and write the PID file once it accepts connections
   */
  listen(): Promise<SessionEndpoint> {
    const { endpoint, pidFile, portFile } = this.files;

    // Files left behind by a daemon that did not shut down cleanly
    removeSessionFiles(this.files.session);

    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once('error', onError);

      const onListening = (): void => {
        this.server.off('error', onError);
        fs.writeFileSync(pidFile, String(process.pid));
        if (portFile && endpoint.type === 'tcp') {
          fs.writeFileSync(portFile, String(endpoint.port));
        }
        resolve(endpoint);
      };

      if (endpoint.type === 'tcp') {
        this.server.listen(endpoint.port, endpoint.host, onListening);
      } else {
        this.server.listen(endpoint.path, onListening);
      }
    });
  }

  close(): Promise<void> {
    for (const socket of this.connections) {
      socket.end();
    }
    return new Promise((resolve) => {
      this.server.close(() => {
        removeSessionFiles(this.files.session);
        resolve();
      });
    });
  }
}
