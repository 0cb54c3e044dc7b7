/**
 * Output formatting
 * Two modes: JSON (for agents) and human-readable
 */

import chalk from 'chalk';
import { z } from 'zod';

export interface ApiResponse {
  success: boolean;
  error?: string;
  data?: unknown;
  server?: string;
  tool?: string;
}

const ToolListView = z.object({
  tools: z.array(z.object({ name: z.string(), description: z.string().optional() })),
  stale: z.boolean().optional()
});

const SchemaView = z.object({
  name: z.string(),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown())
});

const CallView = z.object({
  result: z.object({
    content: z.array(z.object({ type: z.string() }).passthrough()),
    isError: z.boolean().optional()
  })
});

const StatusView = z.object({
  id: z.string(),
  name: z.string(),
  transport: z.string(),
  state: z.string(),
  health: z.string(),
  toolCount: z.number(),
  toolsStale: z.boolean()
});

const ServersView = z.object({ servers: z.array(StatusView) });

const HealthView = z.object({
  status: z.literal('ok'),
  session: z.string(),
  pid: z.number(),
  uptime: z.number(),
  servers: z.array(z.string())
});

const ReloadView = z.object({
  message: z.string(),
  reconnected: z.array(z.string()),
  failed: z.array(z.object({ server: z.string(), error: z.string() }))
});

const MessageView = z.object({ message: z.string() });

function statusLine(status: z.infer<typeof StatusView>): string {
  const colour = status.state === 'ready' ? chalk.green : status.state === 'degraded' ? chalk.yellow : chalk.red;
  const stale = status.toolsStale ? chalk.gray(' (stale)') : '';
  return `  ${chalk.cyan(status.id)} [${status.transport}] ${colour(status.state)} health=${status.health} tools=${status.toolCount}${stale}`;
}

function contentLine(item: { type: string; [key: string]: unknown }): string {
  if (item.type === 'text' && typeof item.text === 'string') {
    return `  Result: ${item.text}`;
  }
  return `  ${item.type}: ${JSON.stringify(item)}`;
}

export class OutputFormatter {
  /**
   * Render a response as the lines that would be printed
   */
  static format(resp: ApiResponse, jsonMode = false): string[] {
    if (jsonMode) {
      return [JSON.stringify(resp)];
    }

    if (!resp.success) {
      return [`${chalk.red('✗')} ${resp.error || 'Unknown error'}`];
    }

    const data = resp.data ?? {};

    const health = HealthView.safeParse(data);
    if (health.success) {
      const { session, pid, uptime, servers } = health.data;
      return [
        `${chalk.green('✓')} Daemon is running`,
        `  Session: ${session}`,
        `  PID: ${pid}`,
        `  Uptime: ${uptime}s`,
        `  Servers: ${servers.length ? servers.join(', ') : '(none)'}`
      ];
    }

    const toolList = ToolListView.safeParse(data);
    if (toolList.success) {
      const { tools, stale } = toolList.data;
      const header = `Available tools (${tools.length})${stale ? chalk.yellow(' [stale]') : ''}:`;
      return [header, ...tools.map((tool) => `  - ${chalk.cyan(tool.name)}: ${tool.description || 'No description'}`)];
    }

    const schema = SchemaView.safeParse(data);
    if (schema.success) {
      return [
        `${chalk.green('✓')} ${schema.data.name}`,
        `  Description: ${schema.data.description || 'No description'}`,
        '  Schema:',
        JSON.stringify(schema.data.inputSchema, null, 2)
      ];
    }

    const call = CallView.safeParse(data);
    if (call.success) {
      const { content, isError } = call.data.result;
      const header = isError
        ? `${chalk.red('✗')} ${resp.tool ?? 'Tool'} reported an error`
        : `${chalk.green('✓')} Called ${resp.tool ?? 'tool'}`;
      return [header, ...content.map(contentLine)];
    }

    const servers = ServersView.safeParse(data);
    if (servers.success) {
      if (!servers.data.servers.length) {
        return ['No servers connected'];
      }
      return [`Servers (${servers.data.servers.length}):`, ...servers.data.servers.map(statusLine)];
    }

    const status = StatusView.safeParse(data);
    if (status.success) {
      return [statusLine(status.data).trimStart()];
    }

    const reload = ReloadView.safeParse(data);
    if (reload.success) {
      const { message, reconnected, failed } = reload.data;
      return [
        `${chalk.green('✓')} ${message}`,
        `  Connected: ${reconnected.length ? reconnected.join(', ') : '(none)'}`,
        ...failed.map(({ server, error }) => `  ${chalk.red('✗')} ${server}: ${error}`)
      ];
    }

    const message = MessageView.safeParse(data);
    if (message.success) {
      return [`${chalk.green('✓')} ${message.data.message}`];
    }

    return [`${chalk.green('✓')} Done`];
  }

  static printResponse(resp: ApiResponse, jsonMode = false): void {
    const lines = OutputFormatter.format(resp, jsonMode);
    const write = resp.success || jsonMode ? console.log : console.error;
    for (const line of lines) {
      write(line);
    }
  }
}
