import { describe, it, expect, vi } from 'vitest';
import { ConnectionStateMachine, canTransition, healthFromState } from '../../src/state.js';
import { InvalidTransitionError } from '../../src/errors.js';
import { Logger } from '../../src/logger.js';
import { ConnectionState, ServerHealth } from '../../src/types.js';
import type { StateChange } from '../../src/types.js';

const log = Logger.create({ silent: true });

describe('canTransition', () => {
  it('should follow the connection lifecycle', () => {
    expect(canTransition(ConnectionState.DISCONNECTED, ConnectionState.CONNECTING)).toBe(true);
    expect(canTransition(ConnectionState.CONNECTING, ConnectionState.HANDSHAKING)).toBe(true);
    expect(canTransition(ConnectionState.HANDSHAKING, ConnectionState.READY)).toBe(true);
    expect(canTransition(ConnectionState.READY, ConnectionState.DEGRADED)).toBe(true);
    expect(canTransition(ConnectionState.DEGRADED, ConnectionState.READY)).toBe(true);
    expect(canTransition(ConnectionState.DEGRADED, ConnectionState.DISCONNECTED)).toBe(true);
  });

  it('should reject shortcuts', () => {
    expect(canTransition(ConnectionState.DISCONNECTED, ConnectionState.READY)).toBe(false);
    expect(canTransition(ConnectionState.CONNECTING, ConnectionState.READY)).toBe(false);
    expect(canTransition(ConnectionState.HANDSHAKING, ConnectionState.DEGRADED)).toBe(false);
  });

  it('should treat closed as terminal', () => {
    for (const state of Object.values(ConnectionState)) {
      expect(canTransition(ConnectionState.CLOSED, state)).toBe(false);
    }
  });

  it('should allow closing from every other state', () => {
    for (const state of Object.values(ConnectionState)) {
      if (state !== ConnectionState.CLOSED) {
        expect(canTransition(state, ConnectionState.CLOSED)).toBe(true);
      }
    }
  });
});

describe('healthFromState', () => {
  it('should map states to health', () => {
    expect(healthFromState(ConnectionState.READY)).toBe(ServerHealth.HEALTHY);
    expect(healthFromState(ConnectionState.DEGRADED)).toBe(ServerHealth.UNHEALTHY);
    expect(healthFromState(ConnectionState.HANDSHAKING)).toBe(ServerHealth.UNKNOWN);
    expect(healthFromState(ConnectionState.DISCONNECTED)).toBe(ServerHealth.DISCONNECTED);
    expect(healthFromState(ConnectionState.CLOSED)).toBe(ServerHealth.DISCONNECTED);
  });
});

describe('ConnectionStateMachine', () => {
  it('should start disconnected', () => {
    const machine = new ConnectionStateMachine('docs', log);
    expect(machine.state).toBe(ConnectionState.DISCONNECTED);
    expect(machine.is(ConnectionState.DISCONNECTED, ConnectionState.CLOSED)).toBe(true);
  });

  it('should notify listeners with the change', () => {
    const machine = new ConnectionStateMachine('docs', log);
    const changes: StateChange[] = [];
    machine.onChange((change) => changes.push(change));

    machine.transition(ConnectionState.CONNECTING, 'generation 1');

    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({
      serverId: 'docs',
      from: ConnectionState.DISCONNECTED,
      to: ConnectionState.CONNECTING,
      reason: 'generation 1'
    });
  });

  it('should throw on an invalid transition and keep the state', () => {
    const machine = new ConnectionStateMachine('docs', log);

    expect(() => machine.transition(ConnectionState.READY)).toThrow(InvalidTransitionError);
    expect(() => machine.transition(ConnectionState.READY)).toThrow('Invalid state transition disconnected -> ready');
    expect(machine.state).toBe(ConnectionState.DISCONNECTED);
  });

  it('should stop notifying after unsubscribe', () => {
    const machine = new ConnectionStateMachine('docs', log);
    const listener = vi.fn();
    const unsubscribe = machine.onChange(listener);

    machine.transition(ConnectionState.CONNECTING);
    unsubscribe();
    machine.transition(ConnectionState.DISCONNECTED);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should keep going when a listener throws', () => {
    const machine = new ConnectionStateMachine('docs', log);
    const second = vi.fn();
    machine.onChange(() => {
      throw new Error('listener bug');
    });
    machine.onChange(second);

    machine.transition(ConnectionState.CONNECTING);

    expect(machine.state).toBe(ConnectionState.CONNECTING);
    expect(second).toHaveBeenCalledTimes(1);
  });
});
