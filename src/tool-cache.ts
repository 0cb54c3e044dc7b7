/**
 * Tool cache
 *
 * One frozen snapshot per server, tagged with the connection generation that
 * discovered it. Invalidation raises a per-server floor so a discovery that
 * finishes after a reconnect cannot overwrite the newer state.
 */

import type { ServerTool, ToolSchema } from './types.js';

export interface ToolSnapshot {
  readonly generation: number;
  readonly tools: readonly ToolSchema[];
  /** Set while the server is degraded or its sandbox state changed */
  readonly stale: boolean;
  readonly updatedAt: Date;
}

export class ToolCache {
  private readonly snapshots = new Map<string, ToolSnapshot>();
  private readonly floors = new Map<string, number>();

  /**
   * Store the result of a discovery. Returns false when the generation is
   * older than the current snapshot or the invalidation floor.
   */
  replace(serverId: string, generation: number, tools: readonly ToolSchema[]): boolean {
    const floor = this.floors.get(serverId) ?? 0;
    const current = this.snapshots.get(serverId);
    if (generation < floor || (current && generation < current.generation)) {
      return false;
    }

    const frozen = Object.freeze(
      tools.map((tool) => Object.freeze({ ...tool, inputSchema: Object.freeze({ ...tool.inputSchema }) }))
    );
    this.snapshots.set(serverId, { generation, tools: frozen, stale: false, updatedAt: new Date() });
    return true;
  }

  /**
   * Drop the snapshot; discoveries from generations below `generation` are
   * rejected from now on
   */
  invalidate(serverId: string, generation: number): void {
    this.snapshots.delete(serverId);
    this.floors.set(serverId, Math.max(this.floors.get(serverId) ?? 0, generation));
  }

  markStale(serverId: string): void {
    this.setStale(serverId, true);
  }

  markFresh(serverId: string): void {
    this.setStale(serverId, false);
  }

  private setStale(serverId: string, stale: boolean): void {
    const snapshot = this.snapshots.get(serverId);
    if (snapshot && snapshot.stale !== stale) {
      this.snapshots.set(serverId, { ...snapshot, stale });
    }
  }

  list(serverId: string): readonly ToolSchema[] {
    return this.snapshots.get(serverId)?.tools ?? [];
  }

  get(serverId: string): ToolSnapshot | undefined {
    return this.snapshots.get(serverId);
  }

  /**
   * Every server whose snapshot has a tool named `toolName`
   */
  find(toolName: string): ServerTool[] {
    const matches: ServerTool[] = [];
    for (const [serverId, snapshot] of this.snapshots) {
      const tool = snapshot.tools.find((candidate) => candidate.name === toolName);
      if (tool) {
        matches.push({ serverId, tool });
      }
    }
    return matches;
  }

  all(): ServerTool[] {
    const result: ServerTool[] = [];
    for (const [serverId, snapshot] of this.snapshots) {
      for (const tool of snapshot.tools) {
        result.push({ serverId, tool });
      }
    }
    return result;
  }

  delete(serverId: string): void {
    this.snapshots.delete(serverId);
    this.floors.delete(serverId);
  }
}
