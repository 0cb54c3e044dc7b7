/**
 * Health monitor
 *
 * One timer per connection. Ready servers are probed every `intervalMs`,
 * degraded ones every `degradedIntervalMs`; other states are skipped.
 * `missThreshold` consecutive misses degrade a server and
 * `failureThreshold` misses force a reconnect. A check already in flight
 * for a server is shared rather than repeated.
 */

import type { HealthOptions } from './config.js';
import type { ServerConnection } from './connection.js';
import { toError } from './errors.js';
import type { Logger } from './logger.js';
import { ConnectionState } from './types.js';

export type ProbeOutcome = 'alive' | 'missed' | 'skipped';

export class HealthMonitor {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly inFlight = new Map<ServerConnection, Promise<ProbeOutcome>>();

  constructor(
    private readonly options: HealthOptions,
    private readonly log: Logger
  ) {}

  watch(connection: ServerConnection): void {
    this.unwatch(connection.id);
    if (this.options.enabled) {
      this.schedule(connection);
    }
  }

  unwatch(serverId: string): void {
    const timer = this.timers.get(serverId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(serverId);
    }
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private schedule(connection: ServerConnection): void {
    const delay =
      connection.state === ConnectionState.DEGRADED ? this.options.degradedIntervalMs : this.options.intervalMs;

    const timer = setTimeout(() => {
      if (this.timers.get(connection.id) !== timer) return;
      this.probe(connection)
        .catch((error: unknown) => {
          this.log.error('Health probe crashed', { server: connection.id, error: toError(error).message });
        })
        .finally(() => {
          if (this.timers.get(connection.id) === timer) {
            this.schedule(connection);
          }
        });
    }, delay);
    timer.unref();
    this.timers.set(connection.id, timer);
  }

  /**
   * Probe once and apply the thresholds
   */
  probe(connection: ServerConnection): Promise<ProbeOutcome> {
    const running = this.inFlight.get(connection);
    if (running) {
      return running;
    }

    const outcome = this.runProbe(connection).finally(() => {
      if (this.inFlight.get(connection) === outcome) {
        this.inFlight.delete(connection);
      }
    });
    this.inFlight.set(connection, outcome);
    return outcome;
  }

  private async runProbe(connection: ServerConnection): Promise<ProbeOutcome> {
    if (!connection.isServing()) {
      return 'skipped';
    }

    try {
      const latencyMs = await connection.ping(this.options.probeTimeoutMs);
      connection.recordProbeSuccess();
      this.log.debug('Health probe ok', { server: connection.id, latencyMs });
      return 'alive';
    } catch (error) {
      if (!connection.isServing()) {
        return 'skipped';
      }

      const misses = connection.recordProbeFailure();
      this.log.warn(`Health probe missed (${misses} in a row)`, {
        server: connection.id,
        error: toError(error).message
      });

      if (misses >= this.options.failureThreshold) {
        connection.reconnect(`${misses} consecutive health probe failures`);
      } else if (misses >= this.options.missThreshold) {
        connection.markDegraded(`${misses} consecutive health probe misses`);
      }
      return 'missed';
    }
  }

  async probeAll(connections: Iterable<ServerConnection>): Promise<Map<string, ProbeOutcome>> {
    const list = Array.from(connections);
    const outcomes = await Promise.all(list.map((connection) => this.probe(connection)));
    return new Map(
      list.map((connection, index): [string, ProbeOutcome] => [connection.id, outcomes[index] ?? 'skipped'])
    );
  }
}
