/**
 * Daemon client for CLI commands
 * Unwraps daemon responses into data or a CommandError.
 */

import { TransportError } from '../../src/errors.js';
import type { DaemonRequest, DaemonResponse } from '../../src/protocol.js';
import { SocketClient } from '../../src/socket-client.js';
import type { SocketClientOptions } from '../../src/socket-client.js';
import { DaemonNotRunningError, RemoteCommandError } from '../errors.js';

export class DaemonClient {
  private readonly client: SocketClient;

  constructor(options: SocketClientOptions = {}) {
    this.client = new SocketClient(options);
  }

  async request(command: DaemonRequest): Promise<unknown> {
    let response: DaemonResponse;
    try {
      response = await this.client.send(command);
    } catch (error) {
      if (error instanceof TransportError) {
        throw new DaemonNotRunningError(error.message);
      }
      throw error;
    }

    if (!response.success) {
      throw new RemoteCommandError(response.error || 'Unknown error', response.errorType);
    }
    return response.data;
  }

  async close(): Promise<void> {
    await this.client.disconnect();
  }
}
