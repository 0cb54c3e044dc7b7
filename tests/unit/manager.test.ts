import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildResult } from '../../src/codec.js';
import {
  AlreadyConnectedError,
  ConfigError,
  ConnectError,
  ConnectionClosedError,
  NotReadyError,
  RequestCancelledError,
  RequestTimeoutError,
  ServerNotFoundError,
  ToolError,
  ToolNotFoundError
} from '../../src/errors.js';
import type { ConnectionManager } from '../../src/manager.js';
import type { TransportFactory } from '../../src/transports/base.js';
import { ConnectionState, ServerHealth } from '../../src/types.js';
import type { NotificationEvent, SandboxStateEvent, StateChange } from '../../src/types.js';
import { FakeServer, textResult } from '../helpers/fake-server.js';
import { FAST_OPTIONS, createManager, stdioConfig } from '../helpers/manager.js';

const SEARCH = {
  name: 'search',
  description: 'Search the docs',
  inputSchema: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] }
};
const FETCH = { name: 'fetch', description: 'Fetch a page' };

function routeById(servers: Record<string, FakeServer>): TransportFactory {
  return (config) => {
    const server = servers[config.id];
    if (!server) {
      throw new Error(`no fake server for ${config.id}`);
    }
    return server.factory(config);
  };
}

describe('ConnectionManager', () => {
  let manager: ConnectionManager | undefined;

  afterEach(async () => {
    await manager?.shutdown();
    manager = undefined;
  });

  describe('connect', () => {
    it('should handshake, discover tools and become ready', async () => {
      const server = new FakeServer({ tools: [SEARCH, FETCH] });
      manager = createManager(server.factory);

      const info = await manager.connect(stdioConfig('docs'));

      expect(info).toMatchObject({ name: 'fake-server', version: '1.0.0', protocolVersion: '2025-06-18' });
      expect(manager.getStatus('docs')).toMatchObject({
        state: ConnectionState.READY,
        health: ServerHealth.HEALTHY,
        generation: 1,
        toolCount: 2,
        toolsStale: false,
        pendingRequests: 0
      });
      expect(manager.listTools('docs').map((tool) => tool.name)).toEqual(['search', 'fetch']);
    });

    it('should send initialize, initialized and tools/list in order', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);

      await manager.connect(stdioConfig('docs'));

      const methods = server.current.sent.map((message) => ('method' in message ? message.method : 'response'));
      expect(methods).toEqual(['initialize', 'notifications/initialized', 'tools/list']);
      expect(server.current.requests('initialize')[0]?.params).toMatchObject({
        capabilities: {},
        clientInfo: { name: 'mcplex', version: '0.1.0' }
      });
    });

    it('should follow tools/list pages', async () => {
      const server = new FakeServer();
      server.toolPages = [[SEARCH], [FETCH]];
      manager = createManager(server.factory);

      await manager.connect(stdioConfig('docs'));

      expect(manager.listTools('docs').map((tool) => tool.name)).toEqual(['search', 'fetch']);
      expect(server.current.requests('tools/list').map((request) => request.params)).toEqual([undefined, { cursor: '1' }]);
    });

    it('should skip malformed tool entries', async () => {
      const server = new FakeServer({ tools: [SEARCH, { description: 'no name' }, FETCH] });
      manager = createManager(server.factory);

      await manager.connect(stdioConfig('docs'));

      expect(manager.listTools('docs').map((tool) => tool.name)).toEqual(['search', 'fetch']);
    });

    it('should not list tools when the server has no tools capability', async () => {
      const server = new FakeServer({ tools: [SEARCH], capabilities: {} });
      manager = createManager(server.factory);

      await manager.connect(stdioConfig('docs'));

      expect(server.current.requests('tools/list')).toHaveLength(0);
      expect(manager.listTools('docs')).toEqual([]);
    });

    it('should reject a second connect for an active id', async () => {
      const server = new FakeServer();
      manager = createManager(server.factory);

      const first = manager.connect(stdioConfig('docs'));
      await expect(manager.connect(stdioConfig('docs'))).rejects.toThrow(
        "Server 'docs' already has an active connection (state: connecting)"
      );
      await first;
      await expect(manager.connect(stdioConfig('docs'))).rejects.toBeInstanceOf(AlreadyConnectedError);
    });

    it('should reject an invalid config before registering it', async () => {
      const server = new FakeServer();
      manager = createManager(server.factory);

      await expect(manager.connect({ id: '', transport: stdioConfig('x').transport })).rejects.toBeInstanceOf(ConfigError);
      expect(manager.listServers()).toEqual([]);
    });

    it('should close the entry after exhausting attempts', async () => {
      const server = new FakeServer();
      server.failOpens = 10;
      manager = createManager(server.factory);

      const error = await manager.connect(stdioConfig('docs')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectError);
      expect(error).toHaveProperty(
        'message',
        "Failed to connect to 'docs' after 3 attempt(s): Transport error: connection refused"
      );
      expect(server.transports).toHaveLength(3);
      expect(manager.getStatus('docs').state).toBe(ConnectionState.CLOSED);
      await expect(manager.callTool('docs', 'search')).rejects.toThrow(
        "Server 'docs' is not ready (state: closed)"
      );
    });

    it('should allow a new connect once the entry is closed', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.failOpens = 3;
      manager = createManager(server.factory);
      await expect(manager.connect(stdioConfig('docs'))).rejects.toBeInstanceOf(ConnectError);

      await manager.connect(stdioConfig('docs'));

      expect(manager.getStatus('docs').state).toBe(ConnectionState.READY);
      expect(manager.listTools('docs')).toHaveLength(1);
    });

    it('should succeed on a later attempt', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.failOpens = 2;
      manager = createManager(server.factory);

      await manager.connect(stdioConfig('docs'));

      expect(manager.getStatus('docs').generation).toBe(3);
      expect(manager.listTools('docs')).toHaveLength(1);
    });
  });

  describe('callTool', () => {
    it('should route the call and return the result', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      const result = await manager.callTool('docs', 'search', { q: 'routing' });

      expect(result).toEqual({ content: [{ type: 'text', text: 'search:{"q":"routing"}' }] });
      expect(server.current.requests('tools/call')[0]?.params).toEqual({ name: 'search', arguments: { q: 'routing' } });
    });

    it('should fail for an unknown server', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      const error = await manager.callTool('nope', 'search').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerNotFoundError);
      expect(error instanceof ServerNotFoundError && error.format()).toBe('Server not found: nope\nAvailable servers: docs');
    });

    it('should fail for a tool the server does not list without sending', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      await expect(manager.callTool('docs', 'delete_everything')).rejects.toBeInstanceOf(ToolNotFoundError);
      expect(server.current.requests('tools/call')).toHaveLength(0);
    });

    it('should turn a JSON-RPC error into a ToolError', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => ({ error: { code: -32602, message: 'q is required' } });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      const error = await manager.callTool('docs', 'search', {}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ToolError);
      expect(error).toMatchObject({ code: -32602, tool: 'search', message: "Tool 'search' failed: q is required" });
      // An application error leaves the connection alone
      expect(manager.getStatus('docs').state).toBe(ConnectionState.READY);
    });

    it('should pass isError results through', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => ({ result: { content: [{ type: 'text', text: 'no hits' }], isError: true } });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      await expect(manager.callTool('docs', 'search', { q: 'x' })).resolves.toEqual({
        content: [{ type: 'text', text: 'no hits' }],
        isError: true
      });
    });

    it('should match responses that arrive in reverse order', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => 'hold';
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      const first = manager.callTool('docs', 'search', { q: 'one' });
      const second = manager.callTool('docs', 'search', { q: 'two' });
      await vi.waitFor(() => expect(server.held).toHaveLength(2));

      const [heldFirst, heldSecond] = server.held;
      if (!heldFirst || !heldSecond) throw new Error('calls were not held');
      heldSecond.transport.deliver(buildResult(heldSecond.request.id, textResult('second').result));
      heldFirst.transport.deliver(buildResult(heldFirst.request.id, textResult('first').result));

      await expect(first).resolves.toEqual({ content: [{ type: 'text', text: 'first' }] });
      await expect(second).resolves.toEqual({ content: [{ type: 'text', text: 'second' }] });
    });

    it('should time out one server without affecting another', async () => {
      const slow = new FakeServer({ tools: [SEARCH] });
      slow.onCall = () => 'hold';
      const fast = new FakeServer({ tools: [SEARCH] });
      manager = createManager(routeById({ slow, fast }));
      await manager.connect(stdioConfig('slow'));
      await manager.connect(stdioConfig('fast'));

      const slowCall = manager.callTool('slow', 'search', { q: 'a' }, { timeoutMs: 50 });
      const fastCall = manager.callTool('fast', 'search', { q: 'b' });

      await expect(fastCall).resolves.toEqual({ content: [{ type: 'text', text: 'search:{"q":"b"}' }] });
      await expect(slowCall).rejects.toBeInstanceOf(RequestTimeoutError);
      expect(manager.getStatus('slow').state).toBe(ConnectionState.READY);
      expect(manager.getStatus('slow').pendingRequests).toBe(0);
    });

    it('should count a response that arrives after the deadline', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => 'hold';
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      await expect(manager.callTool('docs', 'search', { q: 'a' }, { timeoutMs: 20 })).rejects.toThrow(
        "Request 'tools/call' timed out after 20ms"
      );
      const held = server.held[0];
      if (!held) throw new Error('call was not held');
      held.transport.deliver(buildResult(held.request.id, textResult('late').result));

      await vi.waitFor(() => expect(manager?.getStatus('docs').anomalies.unmatchedResponses).toBe(1));
      expect(manager.getStatus('docs').state).toBe(ConnectionState.READY);
    });

    it('should cancel through an abort signal', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => 'hold';
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      const controller = new AbortController();
      const call = manager.callTool('docs', 'search', { q: 'a' }, { signal: controller.signal });
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      controller.abort();

      await expect(call).rejects.toBeInstanceOf(RequestCancelledError);
      expect(manager.getStatus('docs').pendingRequests).toBe(0);
    });

    it('should fail in-flight calls when the transport closes', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => 'hold';
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));
      const changes: StateChange[] = [];
      manager.onStateChange((change) => changes.push(change));

      const call = manager.callTool('docs', 'search', { q: 'a' });
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      server.current.crash();

      const error = await call.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConnectionClosedError);
      expect(error).toHaveProperty('message', 'Connection closed: transport closed');
      expect(changes[0]).toMatchObject({ from: ConnectionState.READY, to: ConnectionState.DISCONNECTED });
    });

    it('should reconnect after the transport closes and serve the new tool list', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      server.tools = [FETCH];
      server.current.crash(new Error('server exited'));

      await vi.waitFor(() => {
        expect(manager?.getStatus('docs')).toMatchObject({ state: ConnectionState.READY, generation: 2 });
      });
      expect(server.transports).toHaveLength(2);
      expect(manager.listTools('docs').map((tool) => tool.name)).toEqual(['fetch']);

      await expect(manager.callTool('docs', 'search', { q: 'a' })).rejects.toBeInstanceOf(ToolNotFoundError);
      expect(server.current.requests('tools/call')).toHaveLength(0);
    });

    it('should wait out the backoff before the first reconnect attempt', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory, {
        reconnect: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 1000, jitterMs: 0 }
      });
      await manager.connect(stdioConfig('docs'));

      server.current.crash();
      await new Promise((resolve) => setTimeout(resolve, 50));

      expect(server.transports).toHaveLength(1);
      expect(manager.getStatus('docs').state).toBe(ConnectionState.DISCONNECTED);
    });

    it('should close a server that exits after every handshake once the attempts are used up', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory, {
        reconnect: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 }
      });
      manager.onStateChange((change) => {
        if (change.to === ConnectionState.READY) {
          server.current.crash(new Error('exited after handshake'));
        }
      });

      await manager.connect(stdioConfig('docs'));

      await vi.waitFor(() => expect(manager?.getStatus('docs').state).toBe(ConnectionState.CLOSED), {
        timeout: 3000
      });
      expect(server.transports).toHaveLength(3);
      expect(manager.getStatus('docs').generation).toBe(3);
    });

    it('should forget reconnect attempts once a session stays up', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory, {
        reconnect: { maxAttempts: 1, baseDelayMs: 10, maxDelayMs: 10, jitterMs: 0, stableAfterMs: 20 }
      });
      await manager.connect(stdioConfig('docs'));
      await new Promise((resolve) => setTimeout(resolve, 60));

      server.current.crash();

      await vi.waitFor(() => {
        expect(manager?.getStatus('docs')).toMatchObject({ state: ConnectionState.READY, generation: 2 });
      });
      expect(server.transports).toHaveLength(2);
    });
  });

  describe('anomalies', () => {
    it('should degrade on a malformed frame and keep the tools as stale', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      server.current.deliver({ jsonrpc: '2.0', id: 1 });

      await vi.waitFor(() => expect(manager?.getStatus('docs').state).toBe(ConnectionState.DEGRADED));
      expect(manager.getStatus('docs')).toMatchObject({
        toolsStale: true,
        toolCount: 1,
        anomalies: { malformedFrames: 1, unmatchedResponses: 0 }
      });
      expect(manager.listTools('docs')).toHaveLength(1);
      await expect(manager.callTool('docs', 'search', { q: 'a' })).rejects.toBeInstanceOf(NotReadyError);
    });

    it('should only count unmatched responses by default', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      server.current.deliver(buildResult(999, {}));

      await vi.waitFor(() => expect(manager?.getStatus('docs').anomalies.unmatchedResponses).toBe(1));
      expect(manager.getStatus('docs').state).toBe(ConnectionState.READY);
    });

    it('should degrade on unmatched responses when configured to', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory, { unmatchedResponses: 'degrade' });
      await manager.connect(stdioConfig('docs'));

      server.current.deliver(buildResult(999, {}));

      await vi.waitFor(() => expect(manager?.getStatus('docs').state).toBe(ConnectionState.DEGRADED));
    });

    it('should answer server pings and refuse other server requests', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      server.current.deliver({ jsonrpc: '2.0', id: 'srv-1', method: 'ping' });
      server.current.deliver({ jsonrpc: '2.0', id: 'srv-2', method: 'sampling/createMessage', params: {} });

      await vi.waitFor(() => {
        expect(server.current.sent.slice(-2)).toEqual([
          { jsonrpc: '2.0', id: 'srv-1', result: {} },
          { jsonrpc: '2.0', id: 'srv-2', error: { code: -32601, message: 'Method not found: sampling/createMessage' } }
        ]);
      });
    });
  });

  describe('notifications', () => {
    it('should re-discover tools on list_changed', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));
      const events: NotificationEvent[] = [];
      manager.onNotification((event) => events.push(event));

      server.tools = [SEARCH, FETCH];
      server.current.deliver({ jsonrpc: '2.0', method: 'notifications/tools/list_changed' });

      await vi.waitFor(() => expect(manager?.listTools('docs').map((tool) => tool.name)).toEqual(['search', 'fetch']));
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        serverId: 'docs',
        notification: { method: 'notifications/tools/list_changed' }
      });
    });

    it('should deliver sandbox state to subscribers and refresh the tools', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));
      const events: SandboxStateEvent[] = [];
      manager.onSandboxState((event) => events.push(event));

      server.tools = [FETCH];
      server.current.deliver({
        jsonrpc: '2.0',
        method: 'notifications/sandbox_state',
        params: { enabled: true, policy: 'workspace-write' }
      });

      await vi.waitFor(() => expect(events).toHaveLength(1));
      expect(events[0]).toMatchObject({ serverId: 'docs', state: { enabled: true, policy: 'workspace-write' } });
      await vi.waitFor(() => expect(manager?.listTools('docs').map((tool) => tool.name)).toEqual(['fetch']));
      expect(manager.getStatus('docs').toolsStale).toBe(false);
    });

    it('should ignore an invalid sandbox state but still report the notification', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));
      const sandbox = vi.fn();
      const notifications = vi.fn();
      manager.onSandboxState(sandbox);
      manager.onNotification(notifications);

      server.current.deliver({ jsonrpc: '2.0', method: 'notifications/sandbox_state', params: { enabled: 'yes' } });

      await vi.waitFor(() => expect(notifications).toHaveBeenCalledTimes(1));
      expect(sandbox).not.toHaveBeenCalled();
    });

    it('should stop delivering after unsubscribe', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));
      const listener = vi.fn();
      const unsubscribe = manager.onNotification(listener);
      const witness = vi.fn();
      manager.onNotification(witness);

      unsubscribe();
      server.current.deliver({ jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info' } });

      await vi.waitFor(() => expect(witness).toHaveBeenCalledTimes(1));
      expect(listener).not.toHaveBeenCalled();
    });

    it('should push sandbox state to every serving server', async () => {
      const docs = new FakeServer({ tools: [SEARCH] });
      const web = new FakeServer({ tools: [FETCH] });
      manager = createManager(routeById({ docs, web }));
      await manager.connect(stdioConfig('docs'));
      await manager.connect(stdioConfig('web'));

      const notified = await manager.notifySandboxState({ enabled: false });

      expect(notified).toEqual(['docs', 'web']);
      expect(docs.current.notifications('notifications/sandbox_state')).toEqual([
        { jsonrpc: '2.0', method: 'notifications/sandbox_state', params: { enabled: false } }
      ]);
      expect(web.current.notifications('notifications/sandbox_state')).toHaveLength(1);
    });
  });

  describe('disconnect and shutdown', () => {
    it('should forget the server and report false the second time', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      await expect(manager.disconnect('docs')).resolves.toBe(true);
      await expect(manager.disconnect('docs')).resolves.toBe(false);

      expect(manager.has('docs')).toBe(false);
      expect(server.current.closeCalls).toBe(1);
      expect(manager.listAllTools()).toEqual([]);
      expect(() => manager?.listTools('docs')).toThrow(ServerNotFoundError);
    });

    it('should fail pending calls on disconnect', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      server.onCall = () => 'hold';
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      const call = manager.callTool('docs', 'search', { q: 'a' });
      await vi.waitFor(() => expect(server.held).toHaveLength(1));
      await manager.disconnect('docs');

      await expect(call).rejects.toThrow('Connection closed: disconnected');
    });

    it('should refuse connects after shutdown', async () => {
      const server = new FakeServer({ tools: [SEARCH] });
      manager = createManager(server.factory);
      await manager.connect(stdioConfig('docs'));

      await manager.shutdown();

      expect(manager.listServers()).toEqual([]);
      await expect(manager.connect(stdioConfig('web'))).rejects.toThrow(
        'Connection closed: manager has been shut down'
      );
    });
  });

  describe('lookups', () => {
    it('should find tools across servers', async () => {
      const docs = new FakeServer({ tools: [SEARCH, FETCH] });
      const web = new FakeServer({ tools: [FETCH] });
      manager = createManager(routeById({ docs, web }));
      await manager.connect(stdioConfig('docs'));
      await manager.connect(stdioConfig('web'));

      expect(manager.findTool('fetch').map((match) => match.serverId)).toEqual(['docs', 'web']);
      expect(manager.listAllTools()).toHaveLength(3);
      expect(manager.listServers().map((status) => status.id)).toEqual(['docs', 'web']);
    });

    it('should expose the resolved options', () => {
      manager = createManager(new FakeServer().factory);
      expect(manager.managerOptions.requestTimeoutMs).toBe(FAST_OPTIONS.requestTimeoutMs);
      expect(manager.managerOptions.reconnect.maxAttempts).toBe(3);
    });
  });
});
