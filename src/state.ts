/**
 * Connection state machine
 *
 * Transitions are synchronous and checked against TRANSITIONS; anything else
 * throws InvalidTransitionError. `closed` is terminal.
 */

import { InvalidTransitionError } from './errors.js';
import { ConnectionState, ServerHealth } from './types.js';
import type { StateChange } from './types.js';
import type { Logger } from './logger.js';

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  [ConnectionState.DISCONNECTED]: [ConnectionState.CONNECTING, ConnectionState.CLOSED],
  [ConnectionState.CONNECTING]: [ConnectionState.HANDSHAKING, ConnectionState.DISCONNECTED, ConnectionState.CLOSED],
  [ConnectionState.HANDSHAKING]: [ConnectionState.READY, ConnectionState.DISCONNECTED, ConnectionState.CLOSED],
  [ConnectionState.READY]: [ConnectionState.DEGRADED, ConnectionState.DISCONNECTED, ConnectionState.CLOSED],
  [ConnectionState.DEGRADED]: [ConnectionState.READY, ConnectionState.DISCONNECTED, ConnectionState.CLOSED],
  [ConnectionState.CLOSED]: []
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function healthFromState(state: ConnectionState): ServerHealth {
  switch (state) {
    case ConnectionState.READY:
      return ServerHealth.HEALTHY;
    case ConnectionState.DEGRADED:
      return ServerHealth.UNHEALTHY;
    case ConnectionState.CONNECTING:
    case ConnectionState.HANDSHAKING:
      return ServerHealth.UNKNOWN;
    case ConnectionState.DISCONNECTED:
    case ConnectionState.CLOSED:
      return ServerHealth.DISCONNECTED;
  }
}

export type StateListener = (change: StateChange) => void;

export class ConnectionStateMachine {
  private current = ConnectionState.DISCONNECTED;
  private readonly listeners = new Set<StateListener>();

  constructor(
    private readonly serverId: string,
    private readonly log: Logger
  ) {}

  get state(): ConnectionState {
    return this.current;
  }

  is(...states: ConnectionState[]): boolean {
    return states.includes(this.current);
  }

  transition(to: ConnectionState, reason?: string): StateChange {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(this.serverId, from, to);
    }
    this.current = to;

    const change: StateChange = { serverId: this.serverId, from, to, reason, at: new Date() };
    this.log.debug(`State ${from} -> ${to}`, reason ? { reason } : undefined);
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.log.error('State listener threw', { error: error instanceof Error ? error.message : String(error) });
      }
    }
    return change;
  }

  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
