/**
 * ServerConnection - lifecycle of one tool server
 *
 * Owns the transport of the current generation, its pending-request table
 * and read loop, and drives the state machine through connect, handshake,
 * discovery, degradation and reconnection.
 *
 * Every (re)connection attempt is a new generation with a fresh transport
 * and pending table. Work started by an older generation is discarded.
 */

import { computeBackoffDelay, sleep, withTimeout } from './backoff.js';
import {
  InitializeResultSchema,
  ListToolsPageSchema,
  METHOD_NOT_FOUND,
  METHODS,
  ToolCallResultSchema,
  buildErrorResponse,
  buildInitializeParams,
  buildNotification,
  buildRequest,
  buildResult,
  classifyMessage,
  parseToolEntry
} from './codec.js';
import type { InboundMessage } from './codec.js';
import type { ManagerOptions } from './config.js';
import {
  ConnectError,
  ConnectionClosedError,
  ConnectionManagerError,
  NotReadyError,
  ProtocolError,
  RpcError,
  ToolError,
  ToolNotFoundError,
  TransportError,
  toError
} from './errors.js';
import type { Logger } from './logger.js';
import { PendingRequests } from './pending.js';
import { ConnectionStateMachine, healthFromState } from './state.js';
import type { StateListener } from './state.js';
import type { ToolCache } from './tool-cache.js';
import type { Transport, TransportFactory } from './transports/base.js';
import { ConnectionState } from './types.js';
import type {
  AnomalyCounters,
  CallOptions,
  ConnectionStatus,
  InboundNotification,
  ServerConfig,
  ServerInfo,
  ToolCallResult,
  ToolSchema
} from './types.js';

/**
 * Callbacks into the owning manager
 */
export interface ConnectionHooks {
  onNotification(serverId: string, notification: InboundNotification): void;
  /** Reconnection attempts are exhausted; the connection is closed */
  onTerminated(serverId: string, error: Error): void;
}

export interface ServerConnectionOptions {
  config: ServerConfig;
  options: ManagerOptions;
  cache: ToolCache;
  transportFactory: TransportFactory;
  hooks: ConnectionHooks;
  logger: Logger;
  random?: () => number;
}

interface Session {
  generation: number;
  transport: Transport;
  pending: PendingRequests<unknown>;
}

export class ServerConnection {
  readonly id: string;
  readonly config: ServerConfig;

  private readonly options: ManagerOptions;
  private readonly cache: ToolCache;
  private readonly transportFactory: TransportFactory;
  private readonly hooks: ConnectionHooks;
  private readonly log: Logger;
  private readonly random: () => number;
  private readonly machine: ConnectionStateMachine;

  private session: Session | null = null;
  private generation = 0;
  private serverInfo: ServerInfo | null = null;
  private readonly anomalies: AnomalyCounters = { unmatchedResponses: 0, malformedFrames: 0 };
  private consecutiveFailures = 0;
  private lastHealthCheckAt: Date | null = null;
  private backoff: AbortController | null = null;
  private reconnecting = false;
  /**
   * Attempts made in the current episode. A session that reached ready still
   * counts until it stays up for `stableAfterMs` or passes a health check.
   */
  private episodeAttempts = 0;
  private stableTimer: NodeJS.Timeout | null = null;
  private discoverySeq = 0;
  private appliedDiscoverySeq = 0;

  constructor(init: ServerConnectionOptions) {
    this.id = init.config.id;
    this.config = init.config;
    this.options = init.options;
    this.cache = init.cache;
    this.transportFactory = init.transportFactory;
    this.hooks = init.hooks;
    this.log = init.logger.child({ server: init.config.id });
    this.random = init.random ?? Math.random;
    this.machine = new ConnectionStateMachine(this.id, this.log);
  }

  get state(): ConnectionState {
    return this.machine.state;
  }

  /** Ready or degraded: control traffic may flow */
  isServing(): boolean {
    return this.machine.is(ConnectionState.READY, ConnectionState.DEGRADED);
  }

  getServerInfo(): ServerInfo | null {
    return this.serverInfo;
  }

  onStateChange(listener: StateListener): () => void {
    return this.machine.onChange(listener);
  }

  /**
   * Connect with the reconnection policy. Resolves on the first ready state;
   * rejects with ConnectError once the attempts are exhausted.
   */
  start(): Promise<ServerInfo> {
    this.episodeAttempts = 0;
    return this.connectWithRetry('initial connect', { backoffFirst: false });
  }

  /**
   * Attempt until ready or until the episode has used up `maxAttempts`.
   * Every attempt but the first of an initial connect waits its backoff.
   */
  private async connectWithRetry(
    reason: string,
    options: { backoffFirst: boolean; cause?: Error }
  ): Promise<ServerInfo> {
    const policy = this.options.reconnect;
    let lastError: unknown = options.cause;
    let backoff = options.backoffFirst;

    while (this.episodeAttempts < policy.maxAttempts) {
      if (backoff) {
        await this.waitBeforeAttempt(computeBackoffDelay(Math.max(this.episodeAttempts, 1), policy, this.random));
      }
      backoff = true;
      if (this.machine.is(ConnectionState.CLOSED)) {
        throw new ConnectionClosedError(this.id, 'connection closed while connecting');
      }

      const attempt = ++this.episodeAttempts;
      try {
        return await this.establish();
      } catch (error) {
        lastError = error;
        if (this.machine.is(ConnectionState.CLOSED)) {
          throw new ConnectionClosedError(this.id, 'connection closed while connecting');
        }
        this.log.warn(`Connection attempt ${attempt}/${policy.maxAttempts} failed`, {
          reason,
          error: toError(error).message
        });
      }
    }

    const error = new ConnectError(this.id, policy.maxAttempts, lastError);
    this.terminate(error);
    throw error;
  }

  /**
   * Sleep through a backoff delay; close() cuts it short
   */
  private async waitBeforeAttempt(delay: number): Promise<void> {
    const controller = new AbortController();
    this.backoff = controller;
    const elapsed = await sleep(delay, controller.signal);
    if (this.backoff === controller) {
      this.backoff = null;
    }
    if (!elapsed) {
      throw new ConnectionClosedError(this.id, 'connection closed while waiting to reconnect');
    }
  }

  private armStableTimer(session: Session): void {
    this.clearStableTimer();
    const timer = setTimeout(() => {
      if (this.stableTimer !== timer) return;
      this.stableTimer = null;
      if (this.session === session && this.isServing()) {
        this.episodeAttempts = 0;
      }
    }, this.options.reconnect.stableAfterMs);
    timer.unref();
    this.stableTimer = timer;
  }

  private clearStableTimer(): void {
    if (this.stableTimer) {
      clearTimeout(this.stableTimer);
      this.stableTimer = null;
    }
  }

  /**
   * One attempt: open, handshake, discover
   */
  private async establish(): Promise<ServerInfo> {
    const generation = ++this.generation;
    this.cache.invalidate(this.id, generation);
    this.machine.transition(ConnectionState.CONNECTING, `generation ${generation}`);

    let session: Session | null = null;
    try {
      const transport = this.transportFactory(this.config);
      session = { generation, transport, pending: new PendingRequests<unknown>(this.id) };
      this.session = session;

      await withTimeout(
        transport.open(),
        this.options.connectTimeoutMs,
        () => new TransportError(this.id, `open timed out after ${this.options.connectTimeoutMs}ms`)
      );
      this.assertCurrent(session);
      this.machine.transition(ConnectionState.HANDSHAKING, 'transport open');

      const loop = session;
      this.readLoop(loop).catch((error: unknown) => {
        this.log.error('Read loop failed', { generation: loop.generation, error: toError(error).message });
        this.dropSession(loop, 'read loop failed');
      });

      const info = await withTimeout(
        this.handshake(session),
        this.options.handshakeTimeoutMs,
        () => new ProtocolError(this.id, `handshake timed out after ${this.options.handshakeTimeoutMs}ms`)
      );
      this.assertCurrent(session);

      this.consecutiveFailures = 0;
      this.reconnecting = false;
      this.armStableTimer(session);
      this.machine.transition(ConnectionState.READY, 'handshake complete');
      this.log.info(`Connected to ${info.name} ${info.version}`, {
        generation,
        tools: this.cache.list(this.id).length
      });
      return info;
    } catch (error) {
      if (session) {
        this.dropSession(session, `attempt failed: ${toError(error).message}`);
      } else if (this.machine.is(ConnectionState.CONNECTING)) {
        this.machine.transition(ConnectionState.DISCONNECTED, 'transport could not be created');
      }
      throw error;
    }
  }

  private assertCurrent(session: Session): void {
    if (this.session !== session) {
      throw new ConnectionClosedError(this.id, 'connection was reset');
    }
  }

  private async handshake(session: Session): Promise<ServerInfo> {
    const raw = await this.request(session, METHODS.initialize, buildInitializeParams(this.options.clientInfo), {
      timeoutMs: this.options.handshakeTimeoutMs
    });
    const parsed = InitializeResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(this.id, `invalid initialize result: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const info: ServerInfo = {
      name: parsed.data.serverInfo.name,
      version: parsed.data.serverInfo.version,
      protocolVersion: parsed.data.protocolVersion,
      capabilities: parsed.data.capabilities,
      instructions: parsed.data.instructions
    };
    this.serverInfo = info;

    await session.transport.send(buildNotification(METHODS.initialized));
    await this.discover(session);
    return info;
  }

  /**
   * Fetch every tools/list page and replace the cache snapshot
   */
  private async discover(session: Session): Promise<readonly ToolSchema[]> {
    const seq = ++this.discoverySeq;
    const tools: ToolSchema[] = [];

    if (this.serverInfo && !('tools' in this.serverInfo.capabilities)) {
      this.log.debug('Server declares no tools capability; skipping tools/list');
    } else {
      const seen = new Set<string>();
      let cursor: string | undefined;
      do {
        const raw = await this.request(session, METHODS.listTools, cursor === undefined ? undefined : { cursor }, {
          timeoutMs: this.options.requestTimeoutMs
        });
        const page = ListToolsPageSchema.safeParse(raw);
        if (!page.success) {
          throw new ProtocolError(this.id, `invalid tools/list result: ${page.error.issues[0]?.message ?? 'unknown'}`);
        }

        for (const entry of page.data.tools) {
          const tool = parseToolEntry(entry);
          if (tool) {
            tools.push(tool);
          } else {
            this.log.warn('Skipping malformed tool entry', { entry: JSON.stringify(entry) });
          }
        }

        cursor = page.data.nextCursor;
        if (cursor !== undefined) {
          if (seen.has(cursor)) {
            throw new ProtocolError(this.id, `tools/list repeated cursor '${cursor}'`);
          }
          seen.add(cursor);
        }
      } while (cursor !== undefined);
    }

    if (this.session === session && seq > this.appliedDiscoverySeq) {
      if (this.cache.replace(this.id, session.generation, tools)) {
        this.appliedDiscoverySeq = seq;
        if (this.machine.is(ConnectionState.DEGRADED)) {
          this.cache.markStale(this.id);
        }
      }
    }
    return tools;
  }

  /**
   * Register a slot and send. The slot settles on response, send failure,
   * deadline, abort or session teardown.
   */
  private request(
    session: Session,
    method: string,
    params: Record<string, unknown> | undefined,
    options: { timeoutMs: number; signal?: AbortSignal }
  ): Promise<unknown> {
    const id = session.pending.nextRequestId();
    const slot = session.pending.register(id, method, options);
    if (!session.pending.has(id)) {
      return slot;
    }

    session.transport.send(buildRequest(id, method, params)).catch((error: unknown) => {
      const failure =
        error instanceof ConnectionManagerError
          ? error
          : new TransportError(this.id, `send failed: ${toError(error).message}`, error);
      session.pending.reject(id, failure);
    });
    return slot;
  }

  private async readLoop(session: Session): Promise<void> {
    for (;;) {
      const frame = await session.transport.receive();
      if (this.session !== session) return;

      switch (frame.kind) {
        case 'message':
          this.dispatch(session, classifyMessage(frame.message));
          break;
        case 'error':
          if (frame.error instanceof ProtocolError) {
            this.noteMalformed(frame.error.message);
          } else {
            this.log.warn('Transport error', { error: frame.error.message });
          }
          break;
        case 'closed':
          this.onTransportClosed(session, frame.error);
          return;
      }
    }
  }

  private dispatch(session: Session, message: InboundMessage): void {
    switch (message.kind) {
      case 'result':
        if (!session.pending.resolve(message.id, message.result)) {
          this.noteUnmatched(message.id);
        }
        break;

      case 'error': {
        if (message.id === null) {
          this.noteMalformed(`error response without id: ${message.error.message}`);
          break;
        }
        const error = new RpcError(this.id, message.error.code, message.error.message, message.error.data);
        if (!session.pending.reject(message.id, error)) {
          this.noteUnmatched(message.id);
        }
        break;
      }

      case 'notification':
        try {
          this.hooks.onNotification(this.id, { method: message.method, params: message.params });
        } catch (error) {
          this.log.error('Notification handler threw', { method: message.method, error: toError(error).message });
        }
        break;

      case 'request': {
        const reply =
          message.method === METHODS.ping
            ? buildResult(message.id, {})
            : buildErrorResponse(message.id, METHOD_NOT_FOUND, `Method not found: ${message.method}`);
        session.transport.send(reply).catch((error: unknown) => {
          this.log.debug('Failed to answer server request', { method: message.method, error: toError(error).message });
        });
        break;
      }

      case 'invalid':
        this.noteMalformed(message.reason);
        break;
    }
  }

  private noteUnmatched(id: string | number): void {
    this.anomalies.unmatchedResponses++;
    this.log.warn('Dropped response with no pending request', { id });
    if (this.options.unmatchedResponses === 'degrade') {
      this.markDegraded('unmatched response');
    }
  }

  private noteMalformed(reason: string): void {
    this.anomalies.malformedFrames++;
    this.log.warn('Malformed frame', { reason });
    this.markDegraded('malformed frame');
  }

  private onTransportClosed(session: Session, error?: Error): void {
    const wasServing = this.isServing();
    const reason = error ? `transport closed: ${error.message}` : 'transport closed';
    this.log.warn('Connection lost', { reason });
    this.dropSession(session, reason);
    if (wasServing) {
      this.scheduleReconnect(reason, error);
    }
  }

  /**
   * Tear down a session once: fail its pending requests, clear the cache
   * entry, fall back to disconnected and release the transport
   */
  private dropSession(session: Session, reason: string): boolean {
    if (this.session !== session) return false;
    this.session = null;
    this.clearStableTimer();

    const failed = session.pending.rejectAll(() => new ConnectionClosedError(this.id, reason));
    if (failed > 0) {
      this.log.debug(`Failed ${failed} pending request(s)`, { reason });
    }
    this.cache.invalidate(this.id, session.generation + 1);
    if (!this.machine.is(ConnectionState.CLOSED, ConnectionState.DISCONNECTED)) {
      this.machine.transition(ConnectionState.DISCONNECTED, reason);
    }
    session.transport.close().catch((error: unknown) => {
      this.log.debug('Transport close failed', { error: toError(error).message });
    });
    return true;
  }

  /**
   * Start a reconnection loop for a session that was lost while serving.
   * The first attempt waits its backoff too.
   */
  private scheduleReconnect(reason: string, cause?: Error): void {
    if (this.reconnecting || this.machine.is(ConnectionState.CLOSED)) return;
    this.reconnecting = true;
    this.log.info('Reconnecting', { reason, attempts: this.episodeAttempts });

    // reconnecting is cleared on ready, before a new session can be lost
    this.connectWithRetry(reason, {
      backoffFirst: true,
      cause: cause ?? new ConnectionClosedError(this.id, reason)
    }).then(
      () => {
        this.log.info('Reconnected', { generation: this.generation });
      },
      (error: unknown) => {
        this.reconnecting = false;
        this.log.warn('Reconnection abandoned', { error: toError(error).message });
      }
    );
  }

  private terminate(error: Error): void {
    if (this.machine.is(ConnectionState.CLOSED)) return;
    this.machine.transition(ConnectionState.CLOSED, error.message);
    this.cache.invalidate(this.id, this.generation + 1);
    this.log.error('Giving up on server', { error: error.message });
    this.hooks.onTerminated(this.id, error);
  }

  /**
   * Close for good. Pending requests are failed before the transport is
   * released.
   */
  async close(reason = 'closed by caller'): Promise<void> {
    if (!this.machine.is(ConnectionState.CLOSED)) {
      this.machine.transition(ConnectionState.CLOSED, reason);
    }
    this.backoff?.abort();
    this.backoff = null;
    this.clearStableTimer();

    const session = this.session;
    this.session = null;
    if (!session) return;

    session.pending.rejectAll(() => new ConnectionClosedError(this.id, reason));
    await session.transport.close().catch((error: unknown) => {
      this.log.debug('Transport close failed', { error: toError(error).message });
    });
  }

  async callTool(tool: string, args: Record<string, unknown>, options: CallOptions = {}): Promise<ToolCallResult> {
    const session = this.session;
    if (!session || !this.machine.is(ConnectionState.READY)) {
      throw new NotReadyError(this.id, this.state);
    }

    const snapshot = this.cache.get(this.id);
    if (snapshot && snapshot.generation === session.generation && !snapshot.tools.some((t) => t.name === tool)) {
      throw new ToolNotFoundError(this.id, tool);
    }

    let raw: unknown;
    try {
      raw = await this.request(
        session,
        METHODS.callTool,
        { name: tool, arguments: args },
        { timeoutMs: options.timeoutMs ?? this.options.requestTimeoutMs, signal: options.signal }
      );
    } catch (error) {
      if (error instanceof RpcError) {
        throw new ToolError(this.id, tool, error.code, error.rpcMessage, error.data);
      }
      throw error;
    }

    const parsed = ToolCallResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(this.id, `invalid tools/call result: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }

  /**
   * Round-trip a ping. A JSON-RPC error reply still proves liveness.
   * Resolves with the latency in milliseconds.
   */
  async ping(timeoutMs = this.options.health.probeTimeoutMs): Promise<number> {
    const session = this.requireServing();
    const started = Date.now();
    try {
      await this.request(session, METHODS.ping, undefined, { timeoutMs });
    } catch (error) {
      if (!(error instanceof RpcError)) throw error;
    }
    return Date.now() - started;
  }

  async refreshTools(): Promise<readonly ToolSchema[]> {
    return this.discover(this.requireServing());
  }

  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    const session = this.requireServing();
    await session.transport.send(buildNotification(method, params));
  }

  private requireServing(): Session {
    const session = this.session;
    if (!session || !this.isServing()) {
      throw new NotReadyError(this.id, this.state);
    }
    return session;
  }

  recordProbeSuccess(): void {
    this.lastHealthCheckAt = new Date();
    this.consecutiveFailures = 0;
    this.episodeAttempts = 0;
    if (this.machine.is(ConnectionState.DEGRADED)) {
      this.machine.transition(ConnectionState.READY, 'health probe succeeded');
      this.cache.markFresh(this.id);
    }
  }

  /**
   * Returns the number of consecutive failures including this one
   */
  recordProbeFailure(): number {
    this.lastHealthCheckAt = new Date();
    return ++this.consecutiveFailures;
  }

  markDegraded(reason: string): void {
    if (!this.machine.is(ConnectionState.READY)) return;
    this.machine.transition(ConnectionState.DEGRADED, reason);
    this.cache.markStale(this.id);
  }

  /**
   * Drop the current session and start the reconnection loop
   */
  reconnect(reason: string): void {
    const session = this.session;
    if (!session || !this.isServing()) return;
    this.log.warn('Forcing reconnect', { reason });
    this.dropSession(session, reason);
    this.scheduleReconnect(reason);
  }

  status(): ConnectionStatus {
    const snapshot = this.cache.get(this.id);
    return {
      id: this.id,
      name: this.config.name,
      transport: this.config.transport.type,
      state: this.state,
      health: healthFromState(this.state),
      generation: this.generation,
      serverInfo: this.serverInfo,
      toolCount: snapshot?.tools.length ?? 0,
      toolsStale: snapshot?.stale ?? false,
      pendingRequests: this.session?.pending.size ?? 0,
      lastHealthCheckAt: this.lastHealthCheckAt?.toISOString() ?? null,
      consecutiveFailures: this.consecutiveFailures,
      anomalies: { ...this.anomalies }
    };
  }
}
